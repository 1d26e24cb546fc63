import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigurationError,
  DimensionMismatchError,
  DocumentExistsError,
  IndexUnavailableError,
  NotFoundError,
  StoreClosedError,
  ValidationError,
  WrongPassphraseError,
} from '../errors.js';
import { FIXED_TIME, TEST_PASSPHRASE, makeDocument, makeTempDir, removeDir } from '../testing/fakes.js';
import { DocumentStore, type DocumentStoreOptions } from './documentStore.js';
import { SqliteSimilarityIndex } from './vectorIndex.js';

class BrokenIndex extends SqliteSimilarityIndex {
  attach(): void {
    throw new Error('no vector support');
  }
}

describe('DocumentStore', () => {
  let dir: string;
  let dbPath: string;
  const opened: DocumentStore[] = [];

  async function openStore(options: Partial<DocumentStoreOptions> = {}, requireIndex = true): Promise<DocumentStore> {
    const store = DocumentStore.open({ path: dbPath, passphrase: TEST_PASSPHRASE, ...options });
    opened.push(store);
    await store.initialize(requireIndex);
    return store;
  }

  beforeEach(() => {
    dir = makeTempDir();
    dbPath = path.join(dir, 'vault.db');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const store of opened.splice(0)) store.close();
    removeDir(dir);
  });

  describe('opening', () => {
    it('requires a passphrase', () => {
      expect(() => DocumentStore.open({ path: dbPath, passphrase: '' })).toThrow(ConfigurationError);
    });

    it('refuses a different passphrase and leaves the data readable with the right one', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['dock schedule'], [[1, 0, 0]]);
      await store.addDocument(document, chunks);
      store.close();

      expect(() => DocumentStore.open({ path: dbPath, passphrase: 'other-secret' })).toThrow(WrongPassphraseError);

      const reopened = await openStore();
      expect((await reopened.getDocument('doc-a'))?.content).toBe('dock schedule');
    });

    it('keeps content out of the file in clear', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['quarterly harvest ledger'], [[1, 0, 0]], 'farm-notes.txt');
      await store.addDocument(document, chunks);
      await store.createSession({ name: 'orchard review' });
      store.close();

      const files = fs.readdirSync(dir).map((f) => fs.readFileSync(path.join(dir, f)));
      for (const bytes of files) {
        expect(bytes.includes(Buffer.from('harvest'))).toBe(false);
        expect(bytes.includes(Buffer.from('farm-notes'))).toBe(false);
        expect(bytes.includes(Buffer.from('orchard'))).toBe(false);
      }
    });

    it('locks the dimension on first insert and rejects a conflicting configuration later', async () => {
      const store = await openStore();
      expect(store.embeddingDimension).toBeNull();
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await store.addDocument(document, chunks);
      expect(store.embeddingDimension).toBe(3);
      store.close();

      expect(() => DocumentStore.open({ path: dbPath, passphrase: TEST_PASSPHRASE, dimension: 4 })).toThrow(
        DimensionMismatchError,
      );
      expect((await openStore()).embeddingDimension).toBe(3);
    });
  });

  describe('writing', () => {
    it('redacts content, chunk text and metadata before storing', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument(
        'doc-a',
        ['Reach me at jane@example.com'],
        [[1, 0, 0]],
        'john.doe@example.com 555-123-4567.txt',
      );
      await store.addDocument(
        { ...document, metadata: { note: 'call 555-123-4567', uploaded_at: '1700000000000' } },
        chunks,
      );

      const stored = await store.getDocument('doc-a');
      expect(stored?.content).toBe('Reach me at [EMAIL_REDACTED]');
      expect(stored?.sourcePath).toBe('[EMAIL_REDACTED] [PHONE_REDACTED].txt');
      const [hit] = await store.searchSimilar([1, 0, 0], 1, 0.5);
      expect(hit.document.sourcePath).toBe('[EMAIL_REDACTED] [PHONE_REDACTED].txt');
      expect(stored?.metadata).toEqual({ note: 'call [PHONE_REDACTED]', uploaded_at: '1700000000000' });
      expect(stored?.chunkCount).toBe(1);

      const storedChunks = await store.getDocumentChunks('doc-a');
      expect(storedChunks).toEqual([
        {
          id: 'doc-a-c0',
          documentId: 'doc-a',
          content: 'Reach me at [EMAIL_REDACTED]',
          chunkIndex: 0,
          tokenCount: 7,
          embedding: [1, 0, 0],
          createdAt: FIXED_TIME,
        },
      ]);
    });

    it('rejects vectors of the wrong width without writing anything', async () => {
      const store = await openStore({ dimension: 3 });
      const narrow = makeDocument('doc-a', ['dock'], [[1, 0]]);
      await expect(store.addDocument(narrow.document, narrow.chunks)).rejects.toThrow(DimensionMismatchError);

      const mixed = makeDocument('doc-b', ['dock', 'truck'], [[1, 0, 0], [1, 0]]);
      await expect(store.addDocument(mixed.document, mixed.chunks)).rejects.toThrow(DimensionMismatchError);

      expect((await store.getStats()).documentCount).toBe(0);
      expect(await store.getDocumentChunks('doc-b')).toEqual([]);
    });

    it('rejects chunks that belong to another document', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await expect(store.addDocument(document, [{ ...chunks[0], documentId: 'doc-z' }])).rejects.toThrow(
        ValidationError,
      );
      expect(await store.getDocument('doc-a')).toBeUndefined();
    });

    it('refuses to add an existing id and replaces on request', async () => {
      const store = await openStore();
      const first = makeDocument('doc-a', ['first version'], [[1, 0, 0]]);
      await store.addDocument(first.document, first.chunks);
      await expect(store.addDocument(first.document, first.chunks)).rejects.toThrow(DocumentExistsError);

      const second = makeDocument('doc-a', ['second version', 'more'], [[0, 1, 0], [0, 0, 1]]);
      await store.replaceDocument(second.document, second.chunks);

      expect((await store.getDocument('doc-a'))?.content).toBe('second version\n\nmore');
      expect((await store.getDocumentChunks('doc-a')).map((c) => c.content)).toEqual(['second version', 'more']);
      expect(await store.searchSimilar([1, 0, 0], 5, 0.5)).toEqual([]);
      expect((await store.searchSimilar([0, 1, 0], 5, 0.5)).map((r) => r.chunk.id)).toEqual(['doc-a-c0']);
    });

    it('serializes writes to the same document in call order', async () => {
      const store = await openStore();
      const first = makeDocument('doc-a', ['first version'], [[1, 0, 0]]);
      const second = makeDocument('doc-a', ['second version'], [[0, 1, 0]]);
      const other = makeDocument('doc-b', ['other'], [[0, 0, 1]]);

      await Promise.all([
        store.addDocument(first.document, first.chunks),
        store.replaceDocument(second.document, second.chunks),
        store.addDocument(other.document, other.chunks),
      ]);

      expect((await store.getDocument('doc-a'))?.content).toBe('second version');
      expect((await store.getStats()).chunkCount).toBe(2);
    });

    it('removes a document with its chunks, index entries and memberships', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await store.addDocument(document, chunks);
      const session = await store.createSession({ name: 'loading' });
      await store.addDocumentToSession(session.id, 'doc-a');

      expect(await store.removeDocument('doc-a')).toBe(true);
      expect(await store.removeDocument('doc-a')).toBe(false);
      expect(await store.getDocument('doc-a')).toBeUndefined();
      expect(await store.getDocumentChunks('doc-a')).toEqual([]);
      expect(await store.searchSimilar([1, 0, 0], 5, 0)).toEqual([]);
      expect(await store.getSessionDocuments(session.id)).toEqual([]);
      expect(await store.getSession(session.id)).toBeDefined();
    });
  });

  describe('searchSimilar', () => {
    async function seeded(): Promise<DocumentStore> {
      const store = await openStore();
      const docs = [
        makeDocument('doc-a', ['alpha'], [[1, 0, 0]]),
        makeDocument('doc-b', ['bravo'], [[0, 1, 0]]),
        makeDocument('doc-c', ['charlie'], [[1, 0, 0]]),
        makeDocument('doc-d', ['delta'], [[1, 1, 0]]),
      ];
      for (const { document, chunks } of docs) {
        await store.addDocument(document, chunks);
      }
      return store;
    }

    it('returns nothing on an empty store', async () => {
      expect(await (await openStore()).searchSimilar([1, 0, 0], 5, 0)).toEqual([]);
    });

    it('returns nothing on an empty store with a configured dimension', async () => {
      expect(await (await openStore({ dimension: 3 })).searchSimilar([1, 0, 0], 5, 0)).toEqual([]);
    });

    it('ranks by similarity, keeps insertion order on ties and applies threshold and limit', async () => {
      const store = await seeded();
      const results = await store.searchSimilar([1, 0, 0], 10, 0.5);
      expect(results.map((r) => r.document.id)).toEqual(['doc-a', 'doc-c', 'doc-d']);
      expect(results[0].similarity).toBe(1);
      expect(results[2].similarity).toBeCloseTo(Math.SQRT1_2, 6);
      expect(results[0].chunk.content).toBe('alpha');

      expect((await store.searchSimilar([1, 0, 0], 2, 0.5)).map((r) => r.document.id)).toEqual(['doc-a', 'doc-c']);
    });

    it('restricts results to the filtered documents', async () => {
      const store = await seeded();
      const results = await store.searchSimilar([1, 0, 0], 10, 0.5, { documentIds: new Set(['doc-c', 'doc-d']) });
      expect(results.map((r) => r.document.id)).toEqual(['doc-c', 'doc-d']);
    });

    it('rejects a query vector of the wrong width', async () => {
      const store = await seeded();
      await expect(store.searchSimilar([1, 0], 5, 0)).rejects.toThrow(DimensionMismatchError);
    });
  });

  describe('similarity index', () => {
    it('fails initialization when the index is required but unavailable', async () => {
      const store = DocumentStore.open({ path: dbPath, passphrase: TEST_PASSPHRASE, index: new BrokenIndex() });
      opened.push(store);
      await expect(store.initialize(true)).rejects.toThrow(IndexUnavailableError);
    });

    it('degrades to empty search and rebuilds entries once the index is back', async () => {
      const degraded = await openStore({ index: new BrokenIndex() }, false);
      expect(degraded.indexAttached).toBe(false);
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await degraded.addDocument(document, chunks);
      expect(await degraded.searchSimilar([1, 0, 0], 5, 0)).toEqual([]);
      degraded.close();

      const healthy = await openStore();
      expect(healthy.indexAttached).toBe(true);
      expect((await healthy.searchSimilar([1, 0, 0], 5, 0)).map((r) => r.chunk.id)).toEqual(['doc-a-c0']);
      expect((await healthy.getStats()).indexedChunkCount).toBe(1);
    });

    it('recovers chunks whose index entries were lost', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['dock', 'truck'], [[1, 0, 0], [0, 1, 0]]);
      await store.addDocument(document, chunks);
      store.close();

      const raw = new Database(dbPath);
      raw.prepare("DELETE FROM vector_index WHERE chunk_id = 'doc-a-c1'").run();
      raw.close();

      const recovered = await openStore();
      expect((await recovered.searchSimilar([0, 1, 0], 5, 0.5)).map((r) => r.chunk.id)).toEqual(['doc-a-c1']);
      expect((await recovered.getStats()).indexedChunkCount).toBe(2);
    });
  });

  describe('sessions', () => {
    it('creates, lists and deletes sessions without touching documents', async () => {
      const store = await openStore();
      const now = vi.spyOn(Date, 'now').mockReturnValue(1_000);
      const session = await store.createSession({ name: '  Loading dock  ', description: 'Weekly review' });
      expect(session).toMatchObject({ name: 'Loading dock', description: 'Weekly review', createdAt: 1_000 });
      expect(await store.getSession(session.id)).toEqual(session);

      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await store.addDocument(document, chunks);
      now.mockReturnValue(5_000);
      await store.addDocumentToSession(session.id, 'doc-a');
      await store.addDocumentToSession(session.id, 'doc-a');

      expect((await store.getSession(session.id))?.lastAccessed).toBe(5_000);
      expect((await store.getSessionDocuments(session.id)).map((d) => d.id)).toEqual(['doc-a']);
      expect(await store.getSessionDocumentIds(session.id)).toEqual(new Set(['doc-a']));
      expect((await store.listSessions()).map((s) => s.id)).toEqual([session.id]);

      expect(await store.deleteSession(session.id)).toBe(true);
      expect(await store.deleteSession(session.id)).toBe(false);
      expect(await store.getDocument('doc-a')).toBeDefined();
    });

    it('rejects blank names and unknown members', async () => {
      const store = await openStore();
      await expect(store.createSession({ name: '   ' })).rejects.toThrow(ValidationError);
      const session = await store.createSession({ name: 'empty' });
      expect(session.description).toBeUndefined();
      await expect(store.addDocumentToSession(session.id, 'missing')).rejects.toThrow(NotFoundError);
      await expect(store.addDocumentToSession('missing', 'doc-a')).rejects.toThrow(NotFoundError);
      await expect(store.getSessionDocuments('missing')).rejects.toThrow(NotFoundError);
      expect(await store.removeDocumentFromSession(session.id, 'doc-a')).toBe(false);
    });

    it('removes a single membership', async () => {
      const store = await openStore();
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await store.addDocument(document, chunks);
      const session = await store.createSession({ name: 'dock' });
      await store.addDocumentToSession(session.id, 'doc-a');

      expect(await store.removeDocumentFromSession(session.id, 'doc-a')).toBe(true);
      expect(await store.getSessionDocuments(session.id)).toEqual([]);
    });
  });

  describe('stats and lifecycle', () => {
    it('reports counts, token totals and document ages', async () => {
      const store = await openStore();
      const a = makeDocument('doc-a', ['abcd', 'abcdefgh'], [[1, 0, 0], [0, 1, 0]]);
      const b = makeDocument('doc-b', ['abc'], [[0, 0, 1]]);
      await store.addDocument(a.document, a.chunks);
      await store.addDocument({ ...b.document, createdAt: FIXED_TIME + 10 }, b.chunks);

      expect(await store.getStats()).toEqual({
        documentCount: 2,
        chunkCount: 3,
        indexedChunkCount: 3,
        totalTokens: 4,
        oldestDocumentAt: FIXED_TIME,
        newestDocumentAt: FIXED_TIME + 10,
        dimension: 3,
        indexAttached: true,
      });
      expect((await store.listDocuments()).map((d) => d.id)).toEqual(['doc-b', 'doc-a']);
    });

    it('fails every operation after close', async () => {
      const store = await openStore();
      store.close();
      store.close();
      await expect(store.getDocument('doc-a')).rejects.toThrow(StoreClosedError);
      await expect(store.searchSimilar([1], 1, 0)).rejects.toThrow(StoreClosedError);
      const { document, chunks } = makeDocument('doc-a', ['dock'], [[1, 0, 0]]);
      await expect(store.addDocument(document, chunks)).rejects.toThrow(StoreClosedError);
    });
  });
});
