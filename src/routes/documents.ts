/**
 * src/routes/documents.ts
 * What: /documents routes to list, read, ingest and delete vault documents.
 * How:
 *  - GET /documents: newest first, without content.
 *  - GET /documents/:id: the redacted content plus its chunks (vectors omitted).
 *  - POST /documents: runs text ingestion and answers with the final progress event.
 *  - DELETE /documents/:id: chunks, index entries and session memberships go with it.
 */
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import type { Document } from '../models/types.js';
import { finalProgress } from '../services/orchestrator.js';
import type { RouteDeps } from './index.js';

const createSchema = z.object({
  content: z.string().min(1).max(5_000_000),
  fileName: z.string().min(1).max(255),
  tags: z.array(z.string().min(1).max(100)).max(50).optional(),
});

export function toDocumentSummary(doc: Document) {
  return {
    id: doc.id,
    sourcePath: doc.sourcePath,
    metadata: doc.metadata,
    chunkCount: doc.chunkCount,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function createDocumentsRouter({ store, orchestrator }: RouteDeps): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const docs = await store.listDocuments();
      res.json({ items: docs.map(toDocumentSummary), total: docs.length });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      const doc = await store.getDocument(id);
      if (!doc) throw new NotFoundError('Document', id);
      const chunks = await store.getDocumentChunks(id);
      res.json({
        ...toDocumentSummary(doc),
        content: doc.content,
        chunks: chunks.map((c) => ({ id: c.id, chunkIndex: c.chunkIndex, tokenCount: c.tokenCount, content: c.content })),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = createSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION' } });
        return;
      }
      const { content, fileName, tags } = parsed.data;
      const last = await finalProgress(
        orchestrator.ingestText(content, {
          fileName,
          fileType: 'txt',
          fileSize: Buffer.byteLength(content, 'utf8'),
          uploadedAt: Date.now(),
          tags,
        }),
      );
      if (last?.kind === 'complete') {
        res.status(201).json(last);
        return;
      }
      res.status(422).json({
        error: { message: last?.kind === 'error' ? last.reason : 'Ingestion produced no result', code: 'INGESTION_FAILED' },
      });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      if (!(await store.removeDocument(id))) throw new NotFoundError('Document', id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
