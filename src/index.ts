// src/index.ts
// What: Library entrypoint for embedding the vault without the HTTP server.

export * from './errors.js';
export type * from './models/types.js';
export { chunkText, estimateTokenCount, DEFAULT_CHUNKING, type ChunkingConfig } from './services/chunking.js';
export { RegexRedactor, NoopRedactor, type Redactor, type RedactionReport } from './services/redaction.js';
export { DocumentStore, type DocumentStoreOptions, type NewSession } from './services/documentStore.js';
export { SqliteSimilarityIndex, type SimilarityIndex } from './services/vectorIndex.js';
export { OpenAICompatibleEmbeddings, type EmbeddingGateway } from './services/embeddings.js';
export {
  OpenAICompatibleGenerator,
  DEFAULT_GENERATION,
  type GenerationGateway,
  type GenerationParams,
} from './services/generation.js';
export type { PdfExtractor, PdfExtraction } from './services/pdf.js';
export { Retriever, DEFAULT_RETRIEVAL, formatContextForPrompt, type RetrievalConfig } from './services/retriever.js';
export { Orchestrator, finalProgress, type AskOptions, type OrchestratorDeps } from './services/orchestrator.js';
export { createApp, type AppDeps } from './app.js';
