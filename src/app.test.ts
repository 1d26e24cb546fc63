import type { Server } from 'http';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app.js';
import { DocumentStore } from './services/documentStore.js';
import { Orchestrator } from './services/orchestrator.js';
import { Retriever } from './services/retriever.js';
import { ScriptedGenerator, TEST_PASSPHRASE, VocabularyEmbedder, makeTempDir, removeDir } from './testing/fakes.js';

const DOCK_RULES = 'Dock rules: trucks over 40 feet must use Dock 7 or 8 between 6AM-10AM.';
const DOCK_QUERY = 'Which dock for a 45-foot truck at 8AM?';

async function readBody(res: Response) {
  return JSON.parse(await res.text());
}

describe('HTTP API', () => {
  let dir: string;
  let store: DocumentStore;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    dir = makeTempDir();
    store = DocumentStore.open({ path: path.join(dir, 'vault.db'), passphrase: TEST_PASSPHRASE });
    await store.initialize(true);
    const embedder = new VocabularyEmbedder();
    const retriever = new Retriever(store, embedder);
    const orchestrator = new Orchestrator({ store, embedder, retriever, generator: new ScriptedGenerator() });
    const app = createApp({ store, retriever, orchestrator });

    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    store.close();
    removeDir(dir);
  });

  function postJson(route: string, body: unknown): Promise<Response> {
    return fetch(`${base}${route}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  async function addDockRules(): Promise<string> {
    const res = await postJson('/documents', { content: DOCK_RULES, fileName: 'dock-rules.txt', tags: ['ops'] });
    expect(res.status).toBe(201);
    const body = await readBody(res);
    expect(body).toMatchObject({ kind: 'complete', fileName: 'dock-rules.txt', chunkCount: 1 });
    return body.documentId;
  }

  it('reports health and stats', async () => {
    const health = await fetch(`${base}/health`);
    expect(await readBody(health)).toEqual({ status: 'ok', indexAttached: true });

    await addDockRules();
    const stats = await readBody(await fetch(`${base}/stats`));
    expect(stats.store).toMatchObject({ documentCount: 1, chunkCount: 1, indexedChunkCount: 1, dimension: 5 });
    expect(stats.contextWindow.availableTokens).toBe(8192);
    expect(stats.redaction).toHaveLength(6);
  });

  it('creates, reads, lists and deletes documents', async () => {
    const id = await addDockRules();

    const list = await readBody(await fetch(`${base}/documents`));
    expect(list.total).toBe(1);
    expect(list.items[0]).toMatchObject({ id, sourcePath: 'dock-rules.txt', chunkCount: 1 });
    expect(list.items[0].metadata.tags).toBe('ops');
    expect(list.items[0].content).toBeUndefined();

    const doc = await readBody(await fetch(`${base}/documents/${id}`));
    expect(doc.content).toBe(DOCK_RULES);
    expect(doc.chunks).toHaveLength(1);
    expect(Object.keys(doc.chunks[0]).sort()).toEqual(['chunkIndex', 'content', 'id', 'tokenCount']);

    expect((await fetch(`${base}/documents/${id}`, { method: 'DELETE' })).status).toBe(204);
    const again = await fetch(`${base}/documents/${id}`, { method: 'DELETE' });
    expect(again.status).toBe(404);
    expect(await readBody(again)).toEqual({ error: { message: `Document ${id} not found`, code: 'NOT_FOUND' } });
  });

  it('validates request bodies', async () => {
    const res = await postJson('/documents', { fileName: 'x.txt' });
    expect(res.status).toBe(400);
    expect((await readBody(res)).error.code).toBe('VALIDATION');

    const malformed = await fetch(`${base}/search`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"query":',
    });
    expect(malformed.status).toBe(400);
    expect(await readBody(malformed)).toEqual({ error: { message: 'Malformed JSON body', code: 'VALIDATION' } });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const res = await fetch(`${base}/nowhere`);
    expect(res.status).toBe(404);
    expect(await readBody(res)).toEqual({ error: { message: 'Not Found', code: 'NOT_FOUND' } });
  });

  it('searches and optionally renders the prompt', async () => {
    await addDockRules();
    const res = await postJson('/search', { query: DOCK_QUERY, minScore: 0.5, includePrompt: true });
    expect(res.status).toBe(200);
    const body = await readBody(res);
    expect(body.chunks).toHaveLength(1);
    expect(body.chunks[0].sourceDocument).toBe('dock-rules.txt');
    expect(body.prompt.startsWith('=== RELEVANT CONTEXT ===\n\n')).toBe(true);
    expect(body.prompt.endsWith(`User Question: ${DOCK_QUERY}\n`)).toBe(true);

    const unknownSession = await postJson('/search', { query: DOCK_QUERY, sessionId: 'missing' });
    expect(unknownSession.status).toBe(404);
  });

  it('streams chat progress as NDJSON', async () => {
    await addDockRules();
    const res = await postJson('/chat', { query: DOCK_QUERY, minScore: 0.5 });
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/x-ndjson; charset=utf-8');

    const events = (await res.text())
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line) => JSON.parse(line));
    expect(events.map((e) => e.kind)).toEqual([
      'retrieving',
      'context-retrieved',
      'generating',
      'token',
      'token',
      'token',
      'complete',
    ]);
    expect(events.filter((e) => e.kind === 'token').map((e) => e.text).join('')).toBe('Dock 7.');
  });

  it('manages sessions and their documents', async () => {
    const docId = await addDockRules();

    const created = await postJson('/sessions', { name: '  Billing  ', description: 'monthly close' });
    expect(created.status).toBe(201);
    const session = await readBody(created);
    expect(session).toMatchObject({ name: 'Billing', description: 'monthly close' });

    const member = `${base}/sessions/${session.id}/documents/${docId}`;
    expect((await fetch(member, { method: 'PUT' })).status).toBe(204);
    const docs = await readBody(await fetch(`${base}/sessions/${session.id}/documents`));
    expect(docs.total).toBe(1);
    expect(docs.items[0].id).toBe(docId);

    expect((await fetch(`${base}/sessions/${session.id}/documents/missing`, { method: 'PUT' })).status).toBe(404);
    expect((await fetch(member, { method: 'DELETE' })).status).toBe(204);
    expect((await fetch(member, { method: 'DELETE' })).status).toBe(404);

    const list = await readBody(await fetch(`${base}/sessions`));
    expect(list.items.map((s: { id: string }) => s.id)).toEqual([session.id]);

    expect((await fetch(`${base}/sessions/${session.id}`, { method: 'DELETE' })).status).toBe(204);
    expect((await fetch(`${base}/sessions/${session.id}`)).status).toBe(404);
    expect((await fetch(`${base}/documents/${docId}`)).status).toBe(200);
  });

  it('uploads text files once and refuses other types', async () => {
    const upload = (name: string, text: string) => {
      const form = new FormData();
      form.append('file', new Blob([text], { type: 'text/plain' }), name);
      return fetch(`${base}/upload`, { method: 'POST', body: form });
    };

    const first = await upload('bill.txt', 'invoice payment due');
    expect(first.status).toBe(200);
    expect(await readBody(first)).toMatchObject({ success: true, status: 'indexed', fileName: 'bill.txt', chunkCount: 1 });

    const second = await upload('bill-copy.txt', 'invoice payment due');
    expect(second.status).toBe(200);
    expect((await readBody(second)).status).toBe('already_exists');

    const image = await upload('photo.png', 'not text');
    expect(image.status).toBe(415);
    expect((await readBody(image)).error.code).toBe('UNSUPPORTED_TYPE');

    const noFile = new FormData();
    noFile.append('note', 'no attachment');
    const empty = await fetch(`${base}/upload`, { method: 'POST', body: noFile });
    expect(empty.status).toBe(400);
  });
});
