// src/services/documentStore.ts
// What: Encrypted single-file store for documents, chunks, vectors and sessions.
// How: better-sqlite3 file whose text, metadata and vector columns are sealed with a passphrase-derived key.
//      Every write runs redaction first, validates before touching the file, then commits rows and index entries
//      in one transaction. Writes to the same document id go through a per-document p-limit(1) queue.

import pLimit, { type LimitFunction } from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { openDatabase, type SqliteDatabase } from '../db/database.js';
import { SCHEMA_VERSION, type ChunkRow, type DocumentRow, type SessionRow } from '../db/schema.js';
import {
  ConfigurationError,
  DimensionMismatchError,
  DocumentExistsError,
  IndexUnavailableError,
  NotFoundError,
  StoreClosedError,
  ValidationError,
  WrongPassphraseError,
  errorMessage,
} from '../errors.js';
import logger from '../logging.js';
import type {
  Document,
  DocumentChunk,
  Metadata,
  SearchFilter,
  SearchResult,
  Session,
  StoreStats,
} from '../models/types.js';
import { blobToVector, vectorToBlob } from '../util/vector.js';
import { estimateTokenCount } from './chunking.js';
import { VaultCipher } from './cipher.js';
import { RegexRedactor, type RedactionCategory, type Redactor } from './redaction.js';
import { SqliteSimilarityIndex, type IndexEntry, type SimilarityIndex } from './vectorIndex.js';

export interface DocumentStoreOptions {
  path: string;
  passphrase: string;
  /** Expected embedding width; when omitted the width recorded in the file (or the first insert) decides. */
  dimension?: number;
  redactor?: Redactor;
  index?: SimilarityIndex;
}

export interface NewSession {
  name: string;
  description?: string;
}

type IndexState = 'detached' | 'attached' | 'degraded';

const KEY_CHECK_PLAINTEXT = 'vault-key-check:v1';
const META_SALT = 'kdf_salt';
const META_KEY_CHECK = 'key_check';
const META_DIMENSION = 'embedding_dimension';
const META_SCHEMA_VERSION = 'schema_version';

const metadataSchema = z.record(z.string());

// Machine-written values; their digit runs would otherwise read as phone or id numbers.
export const UNREDACTED_METADATA_KEYS: ReadonlySet<string> = new Set([
  'file_type',
  'file_size',
  'uploaded_at',
  'page_count',
  'sha256',
]);

interface PreparedChunk {
  row: ChunkRow;
  entry: IndexEntry;
}

interface LockSlot {
  limit: LimitFunction;
  users: number;
}

const log = logger.child({ component: 'document-store' });

export class DocumentStore {
  private indexState: IndexState = 'detached';
  private closed = false;
  private readonly locks = new Map<string, LockSlot>();

  private constructor(
    private readonly db: SqliteDatabase,
    private readonly cipher: VaultCipher,
    private dimension: number | null,
    private readonly redactor: Redactor,
    private readonly index: SimilarityIndex,
    readonly path: string,
  ) {}

  /**
   * Opens or creates the vault file and unlocks it. Throws WrongPassphraseError when the key check fails and
   * DimensionMismatchError when `dimension` disagrees with the width recorded in the file.
   */
  static open(options: DocumentStoreOptions): DocumentStore {
    if (!options.passphrase) {
      throw new ConfigurationError('A passphrase is required to open the vault');
    }
    if (options.dimension !== undefined && (!Number.isInteger(options.dimension) || options.dimension <= 0)) {
      throw new ConfigurationError(`Embedding dimension must be a positive integer, got ${options.dimension}`);
    }

    let db: SqliteDatabase;
    try {
      db = openDatabase(options.path);
    } catch (err) {
      throw new ConfigurationError(`Cannot open vault at ${options.path}: ${errorMessage(err)}`, { cause: err });
    }

    try {
      const cipher = unlock(db, options.passphrase, options.path);
      const dimension = resolveDimension(db, options.dimension);
      log.info({ path: options.path, dimension }, 'Vault opened');
      return new DocumentStore(
        db,
        cipher,
        dimension,
        options.redactor ?? new RegexRedactor(),
        options.index ?? new SqliteSimilarityIndex(),
        options.path,
      );
    } catch (err) {
      db.close();
      throw err;
    }
  }

  /**
   * Attaches the similarity index and repairs entries missing for stored chunks. Without index support,
   * throws IndexUnavailableError when `requireIndexCapability` is set, otherwise continues in degraded mode.
   */
  async initialize(requireIndexCapability = true): Promise<void> {
    this.ensureOpen();
    try {
      this.index.attach(this.db);
    } catch (err) {
      if (requireIndexCapability) {
        throw err instanceof IndexUnavailableError
          ? err
          : new IndexUnavailableError(`Similarity index ${this.index.name} unavailable: ${errorMessage(err)}`, {
              cause: err,
            });
      }
      this.indexState = 'degraded';
      log.warn({ index: this.index.name, err: errorMessage(err) }, 'Similarity index unavailable; search disabled');
      return;
    }
    this.indexState = 'attached';
    this.loadIndex();
    const rebuilt = this.rebuildMissingEntries();
    const stats = this.getStatsSync();
    log.info(
      { index: this.index.name, chunks: stats.chunkCount, indexed: stats.indexedChunkCount, rebuilt },
      'Similarity index attached',
    );
  }

  get indexAttached(): boolean {
    return this.indexState === 'attached';
  }

  get embeddingDimension(): number | null {
    return this.dimension;
  }

  patternsHandled(): string[] {
    return this.redactor.patternsHandled();
  }

  /** The redaction this store applies before sealing; callers redact with it before splitting text. */
  redactText(text: string): string {
    return this.redactor.redact(text);
  }

  async addDocument(document: Document, chunks: readonly DocumentChunk[]): Promise<void> {
    this.ensureOpen();
    await this.withDocumentLock(document.id, () => this.writeDocument(document, chunks, false));
  }

  async replaceDocument(document: Document, chunks: readonly DocumentChunk[]): Promise<void> {
    this.ensureOpen();
    await this.withDocumentLock(document.id, () => this.writeDocument(document, chunks, true));
  }

  async removeDocument(id: string): Promise<boolean> {
    this.ensureOpen();
    return this.withDocumentLock(id, () => {
      const chunkIds = this.chunkIdsOf(id);
      const info = this.db.prepare<[string]>('DELETE FROM documents WHERE id = ?').run(id);
      this.index.forget(chunkIds);
      if (info.changes > 0) {
        log.info({ documentId: id, chunks: chunkIds.length }, 'Document removed');
      }
      return info.changes > 0;
    });
  }

  async getDocument(id: string): Promise<Document | undefined> {
    this.ensureOpen();
    const row = this.db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(id);
    return row ? this.decodeDocument(row) : undefined;
  }

  async listDocuments(): Promise<Document[]> {
    this.ensureOpen();
    return this.db
      .prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY created_at DESC, rowid DESC')
      .all()
      .map((row) => this.decodeDocument(row));
  }

  /** Id of the oldest document whose metadata has `key` set to `value`. Only the metadata column is opened. */
  async findDocumentIdByMetadata(key: string, value: string): Promise<string | undefined> {
    this.ensureOpen();
    const rows = this.db
      .prepare<[], { id: string; metadata: Buffer }>('SELECT id, metadata FROM documents ORDER BY created_at, rowid')
      .all();
    for (const row of rows) {
      const metadata = metadataSchema.parse(JSON.parse(this.cipher.openText(row.metadata)));
      if (metadata[key] === value) return row.id;
    }
    return undefined;
  }

  async getDocumentChunks(documentId: string): Promise<DocumentChunk[]> {
    this.ensureOpen();
    return this.db
      .prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE document_id = ? ORDER BY chunk_index, rowid')
      .all(documentId)
      .map((row) => this.decodeChunk(row));
  }

  async searchSimilar(
    queryVector: readonly number[],
    limit: number,
    minScore: number,
    filter?: SearchFilter,
  ): Promise<SearchResult[]> {
    this.ensureOpen();
    if (this.indexState !== 'attached') {
      log.warn({ state: this.indexState }, 'Search skipped: similarity index not attached');
      return [];
    }
    if (this.dimension === null) return [];
    if (queryVector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, queryVector.length, 'query vector');
    }

    const hits = this.index.search(queryVector, limit, minScore, filter);
    const chunkStmt = this.db.prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE id = ?');
    const docStmt = this.db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?');
    const documents = new Map<string, Document>();
    const results: SearchResult[] = [];
    for (const hit of hits) {
      const chunkRow = chunkStmt.get(hit.chunkId);
      if (!chunkRow) continue;
      let document = documents.get(chunkRow.document_id);
      if (!document) {
        const docRow = docStmt.get(chunkRow.document_id);
        if (!docRow) continue;
        document = this.decodeDocument(docRow);
        documents.set(document.id, document);
      }
      results.push({ chunk: this.decodeChunk(chunkRow), document, similarity: hit.score });
    }
    return results;
  }

  // ---- sessions ----

  async createSession(input: NewSession): Promise<Session> {
    this.ensureOpen();
    const name = input.name.trim();
    if (!name) throw new ValidationError('Session name must not be empty');
    const now = Date.now();
    const session: Session = {
      id: uuidv4(),
      name,
      ...(input.description ? { description: input.description } : {}),
      createdAt: now,
      lastAccessed: now,
    };
    this.db
      .prepare<[string, Buffer, Buffer | null, number, number]>(
        'INSERT INTO sessions (id, name, description, created_at, last_accessed) VALUES (?, ?, ?, ?, ?)',
      )
      .run(
        session.id,
        this.cipher.sealText(session.name),
        session.description === undefined ? null : this.cipher.sealText(session.description),
        session.createdAt,
        session.lastAccessed,
      );
    return session;
  }

  async getSession(id: string): Promise<Session | undefined> {
    this.ensureOpen();
    const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
    return row ? this.decodeSession(row) : undefined;
  }

  async listSessions(): Promise<Session[]> {
    this.ensureOpen();
    return this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY last_accessed DESC, rowid DESC')
      .all()
      .map((row) => this.decodeSession(row));
  }

  async deleteSession(id: string): Promise<boolean> {
    this.ensureOpen();
    return this.db.prepare<[string]>('DELETE FROM sessions WHERE id = ?').run(id).changes > 0;
  }

  async addDocumentToSession(sessionId: string, documentId: string): Promise<void> {
    this.ensureOpen();
    this.requireSession(sessionId);
    if (!this.db.prepare<[string], { id: string }>('SELECT id FROM documents WHERE id = ?').get(documentId)) {
      throw new NotFoundError('Document', documentId);
    }
    const now = Date.now();
    this.db.transaction(() => {
      this.db
        .prepare<[string, string, number]>(
          'INSERT OR IGNORE INTO session_documents (session_id, document_id, added_at) VALUES (?, ?, ?)',
        )
        .run(sessionId, documentId, now);
      this.db.prepare<[number, string]>('UPDATE sessions SET last_accessed = ? WHERE id = ?').run(now, sessionId);
    })();
  }

  async removeDocumentFromSession(sessionId: string, documentId: string): Promise<boolean> {
    this.ensureOpen();
    return (
      this.db
        .prepare<[string, string]>('DELETE FROM session_documents WHERE session_id = ? AND document_id = ?')
        .run(sessionId, documentId).changes > 0
    );
  }

  async getSessionDocuments(sessionId: string): Promise<Document[]> {
    this.ensureOpen();
    this.requireSession(sessionId);
    return this.db
      .prepare<[string], DocumentRow>(
        `SELECT d.* FROM documents d
         JOIN session_documents sd ON sd.document_id = d.id
         WHERE sd.session_id = ?
         ORDER BY sd.added_at, d.rowid`,
      )
      .all(sessionId)
      .map((row) => this.decodeDocument(row));
  }

  async getSessionDocumentIds(sessionId: string): Promise<Set<string>> {
    this.ensureOpen();
    this.requireSession(sessionId);
    const rows = this.db
      .prepare<[string], { document_id: string }>('SELECT document_id FROM session_documents WHERE session_id = ?')
      .all(sessionId);
    return new Set(rows.map((r) => r.document_id));
  }

  async getStats(): Promise<StoreStats> {
    this.ensureOpen();
    return this.getStatsSync();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
    log.info({ path: this.path }, 'Vault closed');
  }

  // ---- internals ----

  private getStatsSync(): StoreStats {
    const docs = this.db
      .prepare<[], { n: number; oldest: number | null; newest: number | null }>(
        'SELECT COUNT(*) AS n, MIN(created_at) AS oldest, MAX(created_at) AS newest FROM documents',
      )
      .get();
    const chunks = this.db
      .prepare<[], { n: number; tokens: number | null }>('SELECT COUNT(*) AS n, SUM(token_count) AS tokens FROM chunks')
      .get();
    return {
      documentCount: docs?.n ?? 0,
      chunkCount: chunks?.n ?? 0,
      indexedChunkCount: this.indexState === 'attached' ? this.index.size() : 0,
      totalTokens: chunks?.tokens ?? 0,
      oldestDocumentAt: docs?.oldest ?? null,
      newestDocumentAt: docs?.newest ?? null,
      dimension: this.dimension,
      indexAttached: this.indexState === 'attached',
    };
  }

  private writeDocument(document: Document, chunks: readonly DocumentChunk[], replace: boolean): void {
    // Validate everything before the first write.
    const width = this.dimension ?? chunks[0]?.embedding.length ?? null;
    for (const chunk of chunks) {
      if (chunk.documentId !== document.id) {
        throw new ValidationError(`Chunk ${chunk.id} belongs to ${chunk.documentId}, not ${document.id}`);
      }
      if (width !== null && chunk.embedding.length !== width) {
        throw new DimensionMismatchError(width, chunk.embedding.length, `chunk ${chunk.chunkIndex} of ${document.id}`);
      }
      if (chunk.embedding.length === 0 || !chunk.embedding.every(Number.isFinite)) {
        throw new ValidationError(`Chunk ${chunk.id} has an empty or non-finite embedding`);
      }
    }

    const categories = new Set<RedactionCategory>();
    const redact = (text: string): string => {
      const report = this.redactor.inspect(text);
      report.categories.forEach((c) => categories.add(c));
      return report.text;
    };

    const content = redact(document.content);
    const sourcePath = redact(document.sourcePath);
    const metadata: Metadata = {};
    for (const [key, value] of Object.entries(document.metadata)) {
      metadata[key] = UNREDACTED_METADATA_KEYS.has(key) ? value : redact(value);
    }
    const docRow: DocumentRow = {
      id: document.id,
      content: this.cipher.sealText(content),
      source_path: this.cipher.sealText(sourcePath),
      metadata: this.cipher.sealText(JSON.stringify(metadata)),
      chunk_count: chunks.length,
      created_at: document.createdAt,
      updated_at: document.updatedAt,
    };
    const prepared: PreparedChunk[] = chunks.map((chunk) => {
      const text = redact(chunk.content);
      return {
        row: {
          id: chunk.id,
          document_id: document.id,
          content: this.cipher.sealText(text),
          chunk_index: chunk.chunkIndex,
          token_count: estimateTokenCount(text),
          embedding: this.cipher.seal(vectorToBlob(chunk.embedding)),
          created_at: chunk.createdAt,
        },
        entry: { chunkId: chunk.id, documentId: document.id, vector: blobToVector(vectorToBlob(chunk.embedding)) },
      };
    });

    const lockDimension = this.dimension === null && width !== null ? width : null;
    const indexed = this.indexState === 'attached';
    const previousChunkIds = replace ? this.chunkIdsOf(document.id) : [];

    this.db.transaction(() => {
      if (replace) {
        this.db.prepare<[string]>('DELETE FROM documents WHERE id = ?').run(document.id);
      } else if (this.db.prepare<[string], { id: string }>('SELECT id FROM documents WHERE id = ?').get(document.id)) {
        throw new DocumentExistsError(document.id);
      }
      this.db
        .prepare<DocumentRow>(
          `INSERT INTO documents (id, content, source_path, metadata, chunk_count, created_at, updated_at)
           VALUES (@id, @content, @source_path, @metadata, @chunk_count, @created_at, @updated_at)`,
        )
        .run(docRow);
      const insertChunk = this.db.prepare<ChunkRow>(
        `INSERT INTO chunks (id, document_id, content, chunk_index, token_count, embedding, created_at)
         VALUES (@id, @document_id, @content, @chunk_index, @token_count, @embedding, @created_at)`,
      );
      for (const p of prepared) insertChunk.run(p.row);
      if (indexed) this.index.persist(prepared.map((p) => p.entry));
      if (lockDimension !== null) writeMeta(this.db, META_DIMENSION, String(lockDimension));
    })();

    // Committed: publish to the in-memory index.
    this.index.forget(previousChunkIds);
    if (indexed) this.index.remember(prepared.map((p) => p.entry));
    if (lockDimension !== null) {
      this.dimension = lockDimension;
      log.info({ dimension: lockDimension }, 'Embedding dimension locked');
    }

    if (categories.size > 0) {
      log.warn({ documentId: document.id, categories: [...categories] }, 'Sensitive data redacted before storage');
    }
    log.info({ documentId: document.id, chunks: chunks.length, replaced: replace }, 'Document stored');
  }

  private loadIndex(): void {
    const chunkStmt = this.db.prepare<[string], { embedding: Buffer }>('SELECT embedding FROM chunks WHERE id = ?');
    const entries: IndexEntry[] = [];
    for (const ref of this.index.persistedRefs()) {
      const row = chunkStmt.get(ref.chunkId);
      if (!row) continue;
      entries.push({ ...ref, vector: blobToVector(this.cipher.open(row.embedding)) });
    }
    this.index.remember(entries);
  }

  private rebuildMissingEntries(): number {
    const missing = this.db
      .prepare<[], { id: string; document_id: string; embedding: Buffer }>(
        `SELECT c.id, c.document_id, c.embedding FROM chunks c
         LEFT JOIN vector_index v ON v.chunk_id = c.id
         WHERE v.chunk_id IS NULL
         ORDER BY c.rowid`,
      )
      .all();
    if (missing.length === 0) return 0;
    const entries: IndexEntry[] = missing.map((r) => ({
      chunkId: r.id,
      documentId: r.document_id,
      vector: blobToVector(this.cipher.open(r.embedding)),
    }));
    this.db.transaction(() => this.index.persist(entries))();
    this.index.remember(entries);
    log.warn({ rebuilt: entries.length }, 'Rebuilt missing similarity index entries');
    return entries.length;
  }

  private chunkIdsOf(documentId: string): string[] {
    return this.db
      .prepare<[string], { id: string }>('SELECT id FROM chunks WHERE document_id = ?')
      .all(documentId)
      .map((r) => r.id);
  }

  private requireSession(sessionId: string): void {
    if (!this.db.prepare<[string], { id: string }>('SELECT id FROM sessions WHERE id = ?').get(sessionId)) {
      throw new NotFoundError('Session', sessionId);
    }
  }

  private decodeDocument(row: DocumentRow): Document {
    return {
      id: row.id,
      content: this.cipher.openText(row.content),
      sourcePath: this.cipher.openText(row.source_path),
      metadata: metadataSchema.parse(JSON.parse(this.cipher.openText(row.metadata))),
      chunkCount: row.chunk_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private decodeChunk(row: ChunkRow): DocumentChunk {
    return {
      id: row.id,
      documentId: row.document_id,
      content: this.cipher.openText(row.content),
      chunkIndex: row.chunk_index,
      tokenCount: row.token_count,
      embedding: blobToVector(this.cipher.open(row.embedding)),
      createdAt: row.created_at,
    };
  }

  private decodeSession(row: SessionRow): Session {
    return {
      id: row.id,
      name: this.cipher.openText(row.name),
      ...(row.description ? { description: this.cipher.openText(row.description) } : {}),
      createdAt: row.created_at,
      lastAccessed: row.last_accessed,
    };
  }

  private ensureOpen(): void {
    if (this.closed) throw new StoreClosedError();
  }

  private async withDocumentLock<T>(documentId: string, fn: () => T): Promise<T> {
    let slot = this.locks.get(documentId);
    if (!slot) {
      slot = { limit: pLimit(1), users: 0 };
      this.locks.set(documentId, slot);
    }
    const current = slot;
    current.users++;
    try {
      return await current.limit(() => {
        this.ensureOpen();
        return fn();
      });
    } finally {
      current.users--;
      if (current.users === 0) this.locks.delete(documentId);
    }
  }
}

function readMeta(db: SqliteDatabase, key: string): string | undefined {
  return db.prepare<[string], { value: string }>('SELECT value FROM vault_meta WHERE key = ?').get(key)?.value;
}

function writeMeta(db: SqliteDatabase, key: string, value: string): void {
  db.prepare<[string, string]>(
    'INSERT INTO vault_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
  ).run(key, value);
}

function unlock(db: SqliteDatabase, passphrase: string, path: string): VaultCipher {
  const saltHex = readMeta(db, META_SALT);
  if (saltHex === undefined) {
    const salt = VaultCipher.newSalt();
    const cipher = VaultCipher.derive(passphrase, salt);
    db.transaction(() => {
      writeMeta(db, META_SALT, salt.toString('hex'));
      writeMeta(db, META_KEY_CHECK, cipher.sealText(KEY_CHECK_PLAINTEXT).toString('base64'));
      writeMeta(db, META_SCHEMA_VERSION, String(SCHEMA_VERSION));
    })();
    return cipher;
  }

  const cipher = VaultCipher.derive(passphrase, Buffer.from(saltHex, 'hex'));
  const keyCheck = readMeta(db, META_KEY_CHECK);
  if (keyCheck === undefined) {
    throw new ConfigurationError(`Vault at ${path} has a salt but no key check; the file is damaged`);
  }
  let opened: string;
  try {
    opened = cipher.openText(Buffer.from(keyCheck, 'base64'));
  } catch (err) {
    log.debug({ path, err: errorMessage(err) }, 'Key check failed');
    throw new WrongPassphraseError(path);
  }
  if (opened !== KEY_CHECK_PLAINTEXT) throw new WrongPassphraseError(path);
  return cipher;
}

function resolveDimension(db: SqliteDatabase, configured: number | undefined): number | null {
  const recorded = readMeta(db, META_DIMENSION);
  const stored = recorded === undefined ? null : Number(recorded);
  if (configured !== undefined) {
    if (stored !== null && stored !== configured) {
      throw new DimensionMismatchError(stored, configured, 'configured dimension differs from the vault');
    }
    if (stored === null) writeMeta(db, META_DIMENSION, String(configured));
    return configured;
  }
  return stored;
}
