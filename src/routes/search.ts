// src/routes/search.ts
// What: /search route for semantic retrieval over the vault.
// How: Validates input with zod and runs the retriever, so results are deduplicated and token-budgeted exactly
//      as they would be for a chat prompt. Chunk text is included; the vault is local to the caller.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { formatContextForPrompt } from '../services/retriever.js';
import type { RouteDeps } from './index.js';

const schema = z.object({
  // Cap query length to avoid oversized embedding requests
  query: z.string().min(1).max(2000),
  topK: z.number().int().positive().max(100).optional(),
  minScore: z.number().min(0).max(1).optional(),
  sessionId: z.string().min(1).optional(),
  includePrompt: z.boolean().optional().default(false),
});

export function createSearchRouter({ retriever }: RouteDeps): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION' } });
        return;
      }
      const { query: q, topK, minScore, sessionId, includePrompt } = parsed.data;

      const context = await retriever.retrieveContext(q, {
        ...(topK !== undefined ? { topK } : {}),
        ...(minScore !== undefined ? { minRelevanceScore: minScore } : {}),
        ...(sessionId !== undefined ? { sessionId } : {}),
      });

      res.json({
        ...context,
        ...(includePrompt ? { prompt: formatContextForPrompt(context) } : {}),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
