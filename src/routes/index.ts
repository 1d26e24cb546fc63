// src/routes/index.ts
// What: Root router composition.
// How: Exposes /health and /stats, mounts /documents, /upload, /search, /chat and /sessions. Every router is
//      built from the same explicitly constructed dependencies; nothing here opens the vault.

import { Router, Request, Response, NextFunction } from 'express';
import type { DocumentStore } from '../services/documentStore.js';
import type { Orchestrator } from '../services/orchestrator.js';
import type { Retriever } from '../services/retriever.js';
import { createChatRouter } from './chat.js';
import { createDocumentsRouter } from './documents.js';
import { createSearchRouter } from './search.js';
import { createSessionsRouter } from './sessions.js';
import { createUploadRouter } from './upload.js';

export interface RouteDeps {
  store: DocumentStore;
  retriever: Retriever;
  orchestrator: Orchestrator;
}

export function createRouter(deps: RouteDeps): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', indexAttached: deps.store.indexAttached });
  });

  router.get('/stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const [store, contextWindow] = await Promise.all([
        deps.store.getStats(),
        deps.retriever.getContextWindowStats(),
      ]);
      res.json({ store, contextWindow, redaction: deps.store.patternsHandled() });
    } catch (err) {
      next(err);
    }
  });

  router.use('/documents', createDocumentsRouter(deps));
  router.use('/upload', createUploadRouter(deps));
  router.use('/search', createSearchRouter(deps));
  router.use('/chat', createChatRouter(deps));
  router.use('/sessions', createSessionsRouter(deps));

  return router;
}
