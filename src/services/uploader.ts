// src/services/uploader.ts
// What: Handles file uploads: computes hash, checks for duplicates, runs ingestion.
// How: Computes SHA256 hash for duplicate detection, sanitizes filename, then routes the bytes to PDF or text
//      ingestion. Uploads run one at a time, so the duplicate check and the insert never interleave.
//      Uploads are never written to disk in clear; the encrypted vault is the only copy.

import { createHash } from 'crypto';
import pLimit from 'p-limit';
import path from 'path';
import logger from '../logging.js';
import type { DocumentMetadata } from '../models/types.js';
import type { DocumentStore } from './documentStore.js';
import { finalProgress, type Orchestrator } from './orchestrator.js';
import { fileTypeOf } from './scanner.js';

/**
 * Compute SHA256 hash of a buffer.
 */
export function computeFileHash(buffer: Buffer): string {
  return createHash('sha256').update(buffer).digest('hex');
}

/**
 * Sanitize filename to prevent path traversal and ensure valid characters.
 * - Removes path components (/, \)
 * - Limits length to 200 characters
 * - Replaces problematic characters
 */
export function sanitizeFilename(name: string): string {
  let sanitized = path.basename(name.replace(/\\/g, '/'));

  sanitized = sanitized.replace(/[<>:"|?*\x00-\x1f]/g, '_');

  // Limit length (preserve extension)
  const ext = path.extname(sanitized);
  const base = path.basename(sanitized, ext);
  const maxBaseLen = 200 - ext.length;

  if (base.length > maxBaseLen) {
    sanitized = base.substring(0, maxBaseLen) + ext;
  }

  return sanitized || 'upload.txt';
}

export interface UploadDeps {
  store: DocumentStore;
  orchestrator: Orchestrator;
}

export interface UploadResult {
  success: boolean;
  documentId?: string;
  fileName: string;
  sha256: string;
  chunkCount?: number;
  status: 'indexed' | 'already_exists' | 'failed';
  error?: string;
}

const uploadQueue = pLimit(1);

/**
 * Handle an uploaded file:
 * 1. Compute hash for duplicate detection
 * 2. Skip files whose hash is already in the vault
 * 3. Run the ingestion pipeline
 */
export function handleUpload(deps: UploadDeps, buffer: Buffer, originalFilename: string): Promise<UploadResult> {
  return uploadQueue(() => processUpload(deps, buffer, originalFilename));
}

async function processUpload(deps: UploadDeps, buffer: Buffer, originalFilename: string): Promise<UploadResult> {
  const fileName = sanitizeFilename(originalFilename);
  const sha256 = computeFileHash(buffer);

  logger.info({ fileName, hash: sha256 }, 'Processing upload');

  const existingId = await deps.store.findDocumentIdByMetadata('sha256', sha256);
  if (existingId) {
    logger.info({ fileName, documentId: existingId }, 'Upload already in vault');
    return { success: true, documentId: existingId, fileName, sha256, status: 'already_exists' };
  }

  const fileType = fileTypeOf(fileName);
  const metadata: DocumentMetadata = {
    fileName,
    fileType,
    fileSize: buffer.length,
    uploadedAt: Date.now(),
    customFields: { sha256 },
  };
  const events =
    fileType === 'pdf'
      ? deps.orchestrator.ingestPdf(buffer, metadata)
      : deps.orchestrator.ingestText(buffer.toString('utf8'), metadata);
  const last = await finalProgress(events);

  if (last?.kind === 'complete') {
    return {
      success: true,
      documentId: last.documentId,
      fileName,
      sha256,
      chunkCount: last.chunkCount,
      status: 'indexed',
    };
  }
  return {
    success: false,
    fileName,
    sha256,
    status: 'failed',
    error: last?.kind === 'error' ? last.reason : 'Ingestion produced no result',
  };
}
