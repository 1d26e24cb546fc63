// src/routes/chat.ts
// What: /chat route for grounded question answering.
// How: Validates input, then streams the orchestrator's query progress as newline-delimited JSON. A client
//      disconnect aborts the AbortController, which stops generation; queries never write to the vault.

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import logger from '../logging.js';
import type { RouteDeps } from './index.js';

const schema = z.object({
  query: z.string().min(1).max(4000),
  sessionId: z.string().min(1).optional(),
  topK: z.number().int().positive().max(50).optional(),
  minScore: z.number().min(0).max(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(8192).optional(),
});

export function createChatRouter({ orchestrator }: RouteDeps): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: { message: parsed.error.message, code: 'VALIDATION' } });
      return;
    }
    const { query, sessionId, topK, minScore, temperature, maxTokens } = parsed.data;

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      res.status(200);
      res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
      res.setHeader('Cache-Control', 'no-store');

      const events = orchestrator.ask(query, {
        signal: controller.signal,
        retrieval: {
          ...(sessionId !== undefined ? { sessionId } : {}),
          ...(topK !== undefined ? { topK } : {}),
          ...(minScore !== undefined ? { minRelevanceScore: minScore } : {}),
        },
        generation: {
          ...(temperature !== undefined ? { temperature } : {}),
          ...(maxTokens !== undefined ? { maxTokens } : {}),
        },
      });
      for await (const event of events) {
        if (controller.signal.aborted) break;
        res.write(`${JSON.stringify(event)}\n`);
      }
      if (controller.signal.aborted) {
        logger.info('Chat stream cancelled by client');
      }
      res.end();
    } catch (err) {
      if (res.headersSent) {
        logger.error({ err }, 'Chat stream failed');
        res.end();
        return;
      }
      next(err);
    }
  });

  return router;
}
