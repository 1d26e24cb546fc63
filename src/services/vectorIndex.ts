// src/services/vectorIndex.ts
// What: Similarity index over chunk vectors.
// How: Index entries are rows of the vector_index table, written by the store in the same transaction as the
//      chunks they point at. Decrypted vectors are kept in an insertion-ordered Map for brute-force cosine
//      search; Array.prototype.sort is stable, so equal scores keep insertion order.

import type { SqliteDatabase } from '../db/database.js';
import { VECTOR_INDEX_SQL } from '../db/schema.js';
import { IndexUnavailableError } from '../errors.js';
import type { SearchFilter } from '../models/types.js';
import { clampSimilarity, cosineSimilarity } from '../util/vector.js';

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  vector: number[];
}

export interface IndexHit {
  chunkId: string;
  documentId: string;
  score: number;
}

export interface IndexedRef {
  chunkId: string;
  documentId: string;
}

export interface SimilarityIndex {
  readonly name: string;
  /** Prepares storage on the vault connection; throws IndexUnavailableError when the index cannot be used. */
  attach(db: SqliteDatabase): void;
  /** Writes entry rows; callers run it inside their own transaction. */
  persist(entries: readonly IndexEntry[]): void;
  /** Makes committed entries searchable. */
  remember(entries: readonly IndexEntry[]): void;
  forget(chunkIds: readonly string[]): void;
  /** Persisted entries in insertion order. */
  persistedRefs(): IndexedRef[];
  size(): number;
  search(query: readonly number[], limit: number, minScore: number, filter?: SearchFilter): IndexHit[];
}

interface Slot {
  documentId: string;
  vector: number[];
}

export class SqliteSimilarityIndex implements SimilarityIndex {
  readonly name = 'sqlite-brute-force';
  private db: SqliteDatabase | null = null;
  private readonly slots = new Map<string, Slot>();

  attach(db: SqliteDatabase): void {
    try {
      db.exec(VECTOR_INDEX_SQL);
    } catch (err) {
      throw new IndexUnavailableError('Could not create the vector index table', { cause: err });
    }
    this.db = db;
    this.slots.clear();
  }

  persist(entries: readonly IndexEntry[]): void {
    const insert = this.connection().prepare<[string, string, number]>(
      'INSERT OR REPLACE INTO vector_index (chunk_id, document_id, dimension) VALUES (?, ?, ?)',
    );
    for (const e of entries) {
      insert.run(e.chunkId, e.documentId, e.vector.length);
    }
  }

  remember(entries: readonly IndexEntry[]): void {
    for (const e of entries) {
      this.slots.set(e.chunkId, { documentId: e.documentId, vector: e.vector });
    }
  }

  forget(chunkIds: readonly string[]): void {
    for (const id of chunkIds) this.slots.delete(id);
  }

  persistedRefs(): IndexedRef[] {
    return this.connection()
      .prepare<[], { chunk_id: string; document_id: string }>(
        'SELECT chunk_id, document_id FROM vector_index ORDER BY rowid',
      )
      .all()
      .map((r) => ({ chunkId: r.chunk_id, documentId: r.document_id }));
  }

  size(): number {
    return this.slots.size;
  }

  search(query: readonly number[], limit: number, minScore: number, filter?: SearchFilter): IndexHit[] {
    if (limit <= 0) return [];
    const hits: IndexHit[] = [];
    for (const [chunkId, slot] of this.slots) {
      if (filter?.documentIds && !filter.documentIds.has(slot.documentId)) continue;
      const score = clampSimilarity(cosineSimilarity(query, slot.vector));
      if (score >= minScore) {
        hits.push({ chunkId, documentId: slot.documentId, score });
      }
    }
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, limit);
  }

  private connection(): SqliteDatabase {
    if (!this.db) throw new IndexUnavailableError('Vector index is not attached');
    return this.db;
  }
}
