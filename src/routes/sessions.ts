// src/routes/sessions.ts
// What: /sessions routes: named working sets of documents.
// How: CRUD on sessions plus membership edits. Deleting a session never deletes its documents.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import { toDocumentSummary } from './documents.js';
import type { RouteDeps } from './index.js';

const createSchema = z.object({
  name: z.string().trim().min(1).max(200),
  description: z.string().max(2000).optional(),
});

export function createSessionsRouter({ store }: RouteDeps): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const sessions = await store.listSessions();
      res.json({ items: sessions, total: sessions.length });
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
      res.status(201).json(await store.createSession(parsed.data));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      const session = await store.getSession(id);
      if (!session) throw new NotFoundError('Session', id);
      res.json(session);
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = String(req.params.id);
      if (!(await store.deleteSession(id))) throw new NotFoundError('Session', id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id/documents', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const docs = await store.getSessionDocuments(String(req.params.id));
      res.json({ items: docs.map(toDocumentSummary), total: docs.length });
    } catch (err) {
      next(err);
    }
  });

  router.put('/:id/documents/:docId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await store.addDocumentToSession(String(req.params.id), String(req.params.docId));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id/documents/:docId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = String(req.params.id);
      const docId = String(req.params.docId);
      if (!(await store.removeDocumentFromSession(sessionId, docId))) {
        throw new NotFoundError('Session membership', `${sessionId}/${docId}`);
      }
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
