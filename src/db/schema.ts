// src/db/schema.ts
// What: SQLite schema of the vault file and the row shapes read back from it.
// How: Idempotent DDL (IF NOT EXISTS) applied on every open. Columns holding user text, metadata or vectors
//      are BLOBs sealed by VaultCipher; ids, ordinals, counts and timestamps stay in clear for joins and ordering.

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS vault_meta (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS documents (
  id          TEXT PRIMARY KEY,
  content     BLOB NOT NULL,
  source_path BLOB NOT NULL,
  metadata    BLOB NOT NULL,
  chunk_count INTEGER NOT NULL,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  id          TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  content     BLOB NOT NULL,
  chunk_index INTEGER NOT NULL,
  token_count INTEGER NOT NULL,
  embedding   BLOB NOT NULL,
  created_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id, chunk_index);

CREATE TABLE IF NOT EXISTS sessions (
  id            TEXT PRIMARY KEY,
  name          BLOB NOT NULL,
  description   BLOB,
  created_at    INTEGER NOT NULL,
  last_accessed INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS session_documents (
  session_id  TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
  document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
  added_at    INTEGER NOT NULL,
  PRIMARY KEY (session_id, document_id)
);
CREATE INDEX IF NOT EXISTS idx_session_documents_document ON session_documents(document_id);
`;

// Owned by the similarity index; created when the index attaches.
export const VECTOR_INDEX_SQL = `
CREATE TABLE IF NOT EXISTS vector_index (
  chunk_id    TEXT PRIMARY KEY REFERENCES chunks(id) ON DELETE CASCADE,
  document_id TEXT NOT NULL,
  dimension   INTEGER NOT NULL
);
`;

export interface DocumentRow {
  id: string;
  content: Buffer;
  source_path: Buffer;
  metadata: Buffer;
  chunk_count: number;
  created_at: number;
  updated_at: number;
}

export interface ChunkRow {
  id: string;
  document_id: string;
  content: Buffer;
  chunk_index: number;
  token_count: number;
  embedding: Buffer;
  created_at: number;
}

export interface SessionRow {
  id: string;
  name: Buffer;
  description: Buffer | null;
  created_at: number;
  last_accessed: number;
}

export interface MetaRow {
  key: string;
  value: string;
}
