// src/db/database.ts
// What: Opens the single-file SQLite database behind the vault.
// How: better-sqlite3 connection with WAL journaling and foreign keys enabled (cascades depend on it),
//      creating the parent directory on first use, then applies the schema.

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { SCHEMA_SQL } from './schema.js';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  try {
    if (dbPath !== IN_MEMORY) db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA_SQL);
  } catch (err) {
    db.close();
    throw err;
  }
  return db;
}
