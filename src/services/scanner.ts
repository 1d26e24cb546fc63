// src/services/scanner.ts
// What: Filesystem scanner for ingestible documents.
// How: Recursively walks a directory and returns { filename, path, size } for .txt, .md and .pdf files,
//      sorted by filename so folder ingestion is deterministic.

import fs from 'fs/promises';
import path from 'path';

export const INGESTIBLE_EXTENSIONS: readonly string[] = ['.txt', '.md', '.pdf'];

export interface ScannedFile {
  filename: string;
  path: string; // absolute path
  size: number;
}

export async function scanDirectory(dir: string, extensions = INGESTIBLE_EXTENSIONS): Promise<ScannedFile[]> {
  const out: ScannedFile[] = [];
  await walk(path.resolve(dir), extensions, out);
  return out.sort((a, b) => a.filename.localeCompare(b.filename) || a.path.localeCompare(b.path));
}

async function walk(dir: string, extensions: readonly string[], acc: ScannedFile[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = path.join(dir, e.name);
    if (e.isDirectory()) {
      await walk(full, extensions, acc);
    } else if (e.isFile() && extensions.includes(path.extname(e.name).toLowerCase())) {
      const stat = await fs.stat(full);
      acc.push({ filename: e.name, path: full, size: stat.size });
    }
  }
}

export function fileTypeOf(filename: string): string {
  return path.extname(filename).slice(1).toLowerCase() || 'txt';
}
