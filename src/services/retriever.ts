// src/services/retriever.ts
// What: Turns a question into a ranked, deduplicated, token-budgeted context bundle.
// How: Embeds the query, over-fetches 2 x topK from the store, keeps the first chunk per (source, ordinal),
//      trims to topK, then adds chunks greedily until the next one would break the token budget.
//      Embedding and search failures degrade to an empty context.

import logger from '../logging.js';
import { errorMessage } from '../errors.js';
import type { ContextChunk, ContextWindowStats, RetrievedContext, SearchFilter } from '../models/types.js';
import { estimateTokenCount } from './chunking.js';
import type { DocumentStore } from './documentStore.js';
import type { EmbeddingGateway } from './embeddings.js';

export interface RetrievalConfig {
  topK: number;
  minRelevanceScore: number;
  deduplicate: boolean;
  includeMetadata: boolean;
  maxContextLength: number; // estimated tokens
  sessionId?: string;
}

export const DEFAULT_RETRIEVAL: RetrievalConfig = {
  topK: 5,
  minRelevanceScore: 0.7,
  deduplicate: true,
  includeMetadata: true,
  maxContextLength: 2048,
};

export const DEFAULT_CONTEXT_WINDOW = 8192;

export interface RetrieverOptions {
  contextWindowTokens?: number;
}

const log = logger.child({ component: 'retriever' });

export class Retriever {
  private readonly contextWindowTokens: number;

  constructor(
    private readonly store: DocumentStore,
    private readonly embedder: EmbeddingGateway,
    options: RetrieverOptions = {},
  ) {
    this.contextWindowTokens = options.contextWindowTokens ?? DEFAULT_CONTEXT_WINDOW;
  }

  /** Never throws for embedding or search failures. An unknown sessionId raises NotFoundError. */
  async retrieveContext(query: string, overrides: Partial<RetrievalConfig> = {}): Promise<RetrievedContext> {
    const cfg: RetrievalConfig = { ...DEFAULT_RETRIEVAL, ...overrides };
    const start = Date.now();
    const empty = (): RetrievedContext => ({ chunks: [], totalRetrieved: 0, query, retrievalTimeMs: Date.now() - start });

    if (query.trim().length === 0 || cfg.topK <= 0) return empty();

    const filter: SearchFilter | undefined = cfg.sessionId
      ? { documentIds: await this.store.getSessionDocumentIds(cfg.sessionId) }
      : undefined;

    try {
      const vector = await this.embedder.embed(query);
      const results = await this.store.searchSimilar(vector, cfg.topK * 2, cfg.minRelevanceScore, filter);

      let candidates: ContextChunk[] = results.map((r) => ({
        content: r.chunk.content,
        sourceDocument: r.document.sourcePath,
        documentId: r.document.id,
        chunkIndex: r.chunk.chunkIndex,
        relevanceScore: r.similarity,
        tokenCount: r.chunk.tokenCount,
        metadata: cfg.includeMetadata ? r.document.metadata : {},
      }));
      if (cfg.deduplicate) candidates = dedupe(candidates);
      const chunks = withinBudget(candidates.slice(0, cfg.topK), cfg.maxContextLength);

      const retrievalTimeMs = Date.now() - start;
      log.debug({ chunks: chunks.length, candidates: results.length, retrievalTimeMs }, 'Context retrieved');
      return { chunks, totalRetrieved: results.length, query, retrievalTimeMs };
    } catch (err) {
      log.error({ err: errorMessage(err) }, 'Context retrieval failed; continuing without context');
      return empty();
    }
  }

  async *retrieveContextStream(query: string, overrides: Partial<RetrievalConfig> = {}): AsyncGenerator<ContextChunk> {
    const context = await this.retrieveContext(query, overrides);
    for (const chunk of context.chunks) {
      yield chunk;
    }
  }

  async getContextWindowStats(now: number = Date.now()): Promise<ContextWindowStats> {
    const stats = await this.store.getStats();
    return {
      availableTokens: this.contextWindowTokens,
      usedTokens: stats.totalTokens,
      documentCount: stats.documentCount,
      oldestDocumentAgeMs: stats.oldestDocumentAt === null ? 0 : now - stats.oldestDocumentAt,
      newestDocumentAgeMs: stats.newestDocumentAt === null ? 0 : now - stats.newestDocumentAt,
    };
  }
}

function dedupe(chunks: ContextChunk[]): ContextChunk[] {
  const seen = new Set<string>();
  return chunks.filter((c) => {
    const key = `${c.sourceDocument}:${c.chunkIndex}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function withinBudget(chunks: ContextChunk[], maxTokens: number): ContextChunk[] {
  const out: ContextChunk[] = [];
  let used = 0;
  for (const chunk of chunks) {
    const tokens = estimateTokenCount(chunk.content);
    if (used + tokens > maxTokens) break;
    out.push(chunk);
    used += tokens;
  }
  return out;
}

export function formatContextForPrompt(context: RetrievedContext): string {
  if (context.chunks.length === 0) return '';

  const parts: string[] = [
    '=== RELEVANT CONTEXT ===\n\n',
    `Retrieved ${context.chunks.length} relevant document excerpts:\n\n`,
  ];
  context.chunks.forEach((chunk, i) => {
    parts.push(`--- Context ${i + 1} ---\n`);
    parts.push(`Source: ${chunk.sourceDocument}\n`);
    parts.push(`Relevance: ${Math.floor(chunk.relevanceScore * 100)}%\n`);
    const tags = chunk.metadata.tags;
    if (tags) parts.push(`Tags: ${tags}\n`);
    parts.push(`\n${chunk.content}\n\n`);
  });
  parts.push('=== END CONTEXT ===\n\n');
  parts.push("Use the above context to answer the user's question. Cite specific sources when possible.\n\n");
  parts.push(`User Question: ${context.query}\n`);
  return parts.join('');
}
