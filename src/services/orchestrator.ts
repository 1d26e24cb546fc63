// src/services/orchestrator.ts
// What: Ingestion (chunk → embed → store) and query (retrieve → format → generate) pipelines.
// How: Each pipeline is an async generator of tagged progress events; stages run strictly in order and every
//      failure ends the stream with an `error` event instead of a thrown exception. Text is redacted before it is
//      chunked or embedded. A chunk whose embedding fails is skipped, unless the model is not loaded, which aborts
//      the document. Queries never write.

import fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { ModelNotLoadedError, errorMessage } from '../errors.js';
import logger from '../logging.js';
import type {
  Document,
  DocumentChunk,
  DocumentMetadata,
  IngestionProgress,
  Metadata,
  QueryProgress,
} from '../models/types.js';
import { chunkText, estimateTokenCount, type ChunkingConfig } from './chunking.js';
import type { DocumentStore } from './documentStore.js';
import type { EmbeddingGateway } from './embeddings.js';
import { DEFAULT_GENERATION, type GenerationGateway, type GenerationParams } from './generation.js';
import type { PdfExtractor } from './pdf.js';
import { formatContextForPrompt, type RetrievalConfig, type Retriever } from './retriever.js';
import { fileTypeOf, scanDirectory, type ScannedFile } from './scanner.js';

export interface OrchestratorDeps {
  store: DocumentStore;
  embedder: EmbeddingGateway;
  generator: GenerationGateway;
  retriever: Retriever;
  pdfExtractor?: PdfExtractor;
  chunking?: Partial<ChunkingConfig>;
}

export interface AskOptions {
  retrieval?: Partial<RetrievalConfig>;
  generation?: Partial<GenerationParams>;
  signal?: AbortSignal;
}

export const CANCELLED = 'cancelled';

const log = logger.child({ component: 'orchestrator' });

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async *ingestText(
    content: string,
    metadata: DocumentMetadata,
    config: Partial<ChunkingConfig> = {},
  ): AsyncGenerator<IngestionProgress> {
    const start = Date.now();
    const fileName = metadata.fileName;
    try {
      yield { kind: 'reading', fileName };
      // Redact the whole text first: a number split across two chunks would not match in either half.
      const redacted = this.deps.store.redactText(content);
      yield { kind: 'chunking', fileName, totalChars: redacted.length };
      const texts = chunkText(redacted, { ...this.deps.chunking, ...config });
      if (texts.length === 0) {
        yield { kind: 'error', fileName, reason: 'No valid chunks generated from document' };
        return;
      }

      const documentId = uuidv4();
      const chunks: DocumentChunk[] = [];
      for (let i = 0; i < texts.length; i++) {
        yield { kind: 'embedding', fileName, chunkIndex: i + 1, totalChunks: texts.length };
        let embedding: number[];
        try {
          embedding = await this.deps.embedder.embed(texts[i]);
        } catch (err) {
          if (err instanceof ModelNotLoadedError) throw err;
          log.warn({ fileName, chunkIndex: i, err: errorMessage(err) }, 'Embedding failed; chunk skipped');
          continue;
        }
        chunks.push({
          id: uuidv4(),
          documentId,
          content: texts[i],
          chunkIndex: i,
          tokenCount: estimateTokenCount(texts[i]),
          embedding,
          createdAt: Date.now(),
        });
      }
      if (chunks.length === 0) {
        yield { kind: 'error', fileName, reason: 'Failed to generate embeddings for any chunks' };
        return;
      }

      yield { kind: 'storing', fileName };
      const document: Document = {
        id: documentId,
        content: redacted,
        sourcePath: fileName,
        metadata: toMetadataMap(metadata),
        chunkCount: chunks.length,
        createdAt: metadata.uploadedAt,
        updatedAt: Date.now(),
      };
      await this.deps.store.addDocument(document, chunks);

      const durationMs = Date.now() - start;
      log.info({ fileName, documentId, chunks: chunks.length, durationMs }, 'Document ingested');
      yield { kind: 'complete', fileName, documentId, chunkCount: chunks.length, durationMs };
    } catch (err) {
      log.error({ fileName, err: errorMessage(err) }, 'Ingestion failed');
      yield { kind: 'error', fileName, reason: `Ingestion failed: ${errorMessage(err)}` };
    }
  }

  async *ingestPdf(
    bytes: Uint8Array,
    metadata: DocumentMetadata,
    config: Partial<ChunkingConfig> = {},
  ): AsyncGenerator<IngestionProgress> {
    const fileName = metadata.fileName;
    const extractor = this.deps.pdfExtractor;
    if (!extractor) {
      yield { kind: 'error', fileName, reason: 'PDF extraction not available: no PdfExtractor configured' };
      return;
    }
    let text: string;
    let enriched: DocumentMetadata;
    try {
      yield { kind: 'reading', fileName };
      const extraction = await extractor.extract(bytes);
      text = extraction.text;
      enriched = {
        ...metadata,
        pageCount: extraction.pageCount,
        customFields: { ...metadata.customFields, ...extraction.metadata },
      };
    } catch (err) {
      yield { kind: 'error', fileName, reason: `PDF extraction failed: ${errorMessage(err)}` };
      return;
    }
    yield* this.ingestText(text, enriched, config);
  }

  /** Ingests every .txt, .md and .pdf file under `dir`, tagged `folder:<folderName>`, one after another. */
  async *ingestFolder(
    dir: string,
    folderName: string,
    config: Partial<ChunkingConfig> = {},
  ): AsyncGenerator<IngestionProgress> {
    let files: ScannedFile[];
    try {
      files = await scanDirectory(dir);
    } catch (err) {
      yield { kind: 'error', fileName: dir, reason: `Cannot read folder: ${errorMessage(err)}` };
      return;
    }
    log.info({ folderName, files: files.length }, 'Ingesting folder');

    let succeeded = 0;
    let failed = 0;
    for (const file of files) {
      const fileType = fileTypeOf(file.filename);
      const metadata: DocumentMetadata = {
        fileName: file.filename,
        fileType,
        fileSize: file.size,
        uploadedAt: Date.now(),
        tags: [`folder:${folderName}`],
      };
      let events: AsyncGenerator<IngestionProgress>;
      try {
        const bytes = await fs.readFile(file.path);
        events =
          fileType === 'pdf'
            ? this.ingestPdf(bytes, metadata, config)
            : this.ingestText(bytes.toString('utf8'), metadata, config);
      } catch (err) {
        failed++;
        yield { kind: 'error', fileName: file.filename, reason: `Failed to read file: ${errorMessage(err)}` };
        continue;
      }
      for await (const progress of events) {
        if (progress.kind === 'complete') succeeded++;
        if (progress.kind === 'error') failed++;
        yield progress;
      }
    }
    log.info({ folderName, succeeded, failed }, 'Folder ingestion finished');
  }

  /**
   * Answers a question from stored documents. Aborting `signal`, or stopping iteration, ends generation
   * promptly; an aborted query ends with `error("cancelled")`.
   */
  async *ask(query: string, options: AskOptions = {}): AsyncGenerator<QueryProgress> {
    const start = Date.now();
    const signal = options.signal;
    const cancelled = (): boolean => signal?.aborted === true;
    const params: GenerationParams = { ...DEFAULT_GENERATION, ...options.generation };

    try {
      yield { kind: 'retrieving', query };
      const context = await this.deps.retriever.retrieveContext(query, options.retrieval);
      if (cancelled()) {
        yield { kind: 'error', reason: CANCELLED };
        return;
      }
      if (context.chunks.length > 0) {
        yield { kind: 'context-retrieved', chunkCount: context.chunks.length };
      } else {
        yield { kind: 'no-context' };
      }

      const prompt = formatContextForPrompt(context) || query;
      yield { kind: 'generating' };
      let tokenCount = 0;
      for await (const text of this.deps.generator.generate(prompt, params, signal)) {
        if (cancelled()) break;
        tokenCount++;
        yield { kind: 'token', text };
      }
      if (cancelled()) {
        yield { kind: 'error', reason: CANCELLED };
        return;
      }
      const durationMs = Date.now() - start;
      log.info({ tokenCount, durationMs, contextChunks: context.chunks.length }, 'Query answered');
      yield { kind: 'complete', tokenCount, durationMs };
    } catch (err) {
      if (cancelled()) {
        yield { kind: 'error', reason: CANCELLED };
        return;
      }
      log.error({ err: errorMessage(err) }, 'Query failed');
      yield { kind: 'error', reason: errorMessage(err) };
    }
  }
}

export function toMetadataMap(metadata: DocumentMetadata): Metadata {
  const out: Metadata = {
    file_name: metadata.fileName,
    file_type: metadata.fileType,
    file_size: String(metadata.fileSize),
    uploaded_at: String(metadata.uploadedAt),
  };
  if (metadata.author) out.author = metadata.author;
  if (metadata.title) out.title = metadata.title;
  if (metadata.pageCount !== undefined) out.page_count = String(metadata.pageCount);
  if (metadata.tags && metadata.tags.length > 0) out.tags = metadata.tags.join(',');
  return { ...out, ...metadata.customFields };
}

/** Drains a progress stream and returns its final event. */
export async function finalProgress<T>(events: AsyncIterable<T>): Promise<T | undefined> {
  let last: T | undefined;
  for await (const event of events) last = event;
  return last;
}
