// src/app.ts
// What: Express application factory.
// How: Creates the app with a JSON body limit, mounts routes over injected dependencies and installs the
//      centralized error handler returning { error: { message, code? } } with the status each VaultError carries.

import express, { Express, NextFunction, Request, Response } from 'express';
import { VaultError, errorMessage } from './errors.js';
import logger from './logging.js';
import { createRouter, type RouteDeps } from './routes/index.js';

export type AppDeps = RouteDeps;

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '10mb' }));

  app.use('/', createRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: { message: 'Not Found', code: 'NOT_FOUND' } });
  });

  // Centralized error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof VaultError) {
      if (err.status >= 500) logger.error({ err, code: err.code }, 'Request failed');
      res.status(err.status).json({ error: { message: err.message, code: err.code } });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: { message: 'Malformed JSON body', code: 'VALIDATION' } });
      return;
    }
    logger.error({ err }, 'Unhandled error');
    res.status(500).json({ error: { message: errorMessage(err) || 'Internal Server Error' } });
  });

  return app;
}
