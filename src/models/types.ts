// src/models/types.ts
// What: Shared TypeScript types for vault entities, retrieval results and pipeline progress.
// How: Interfaces mirror the persisted records (timestamps are epoch milliseconds); progress events are
//      discriminated unions on `kind`.

export type Metadata = Record<string, string>;

export interface Document {
  id: string;
  content: string; // redacted before it is stored
  sourcePath: string;
  metadata: Metadata;
  chunkCount: number;
  createdAt: number;
  updatedAt: number;
}

export interface DocumentChunk {
  id: string;
  documentId: string;
  content: string;
  chunkIndex: number;
  tokenCount: number;
  embedding: number[];
  createdAt: number;
}

export interface Session {
  id: string;
  name: string;
  description?: string;
  createdAt: number;
  lastAccessed: number;
}

export interface SearchResult {
  chunk: DocumentChunk;
  document: Document;
  similarity: number; // [0,1]
}

export interface SearchFilter {
  documentIds?: ReadonlySet<string>;
}

export interface StoreStats {
  documentCount: number;
  chunkCount: number;
  indexedChunkCount: number;
  totalTokens: number;
  oldestDocumentAt: number | null;
  newestDocumentAt: number | null;
  dimension: number | null;
  indexAttached: boolean;
}

export interface ContextChunk {
  content: string;
  sourceDocument: string;
  documentId: string;
  chunkIndex: number;
  relevanceScore: number;
  tokenCount: number;
  metadata: Metadata;
}

export interface RetrievedContext {
  chunks: ContextChunk[];
  totalRetrieved: number;
  query: string;
  retrievalTimeMs: number;
}

export interface ContextWindowStats {
  availableTokens: number;
  usedTokens: number;
  documentCount: number;
  oldestDocumentAgeMs: number;
  newestDocumentAgeMs: number;
}

export interface DocumentMetadata {
  fileName: string;
  fileType: string;
  fileSize: number;
  uploadedAt: number;
  author?: string;
  title?: string;
  pageCount?: number;
  tags?: string[];
  customFields?: Metadata;
}

export type IngestionProgress =
  | { kind: 'reading'; fileName: string }
  | { kind: 'chunking'; fileName: string; totalChars: number }
  | { kind: 'embedding'; fileName: string; chunkIndex: number; totalChunks: number }
  | { kind: 'storing'; fileName: string }
  | { kind: 'complete'; fileName: string; documentId: string; chunkCount: number; durationMs: number }
  | { kind: 'error'; fileName: string; reason: string };

export type QueryProgress =
  | { kind: 'retrieving'; query: string }
  | { kind: 'context-retrieved'; chunkCount: number }
  | { kind: 'no-context' }
  | { kind: 'generating' }
  | { kind: 'token'; text: string }
  | { kind: 'complete'; tokenCount: number; durationMs: number }
  | { kind: 'error'; reason: string };
