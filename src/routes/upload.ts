// src/routes/upload.ts
// What: HTTP endpoint for file uploads.
// How: Uses multer for multipart/form-data handling, validates file type and size,
//      then delegates to the upload service for processing.

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import path from 'path';
import logger from '../logging.js';
import { INGESTIBLE_EXTENSIONS } from '../services/scanner.js';
import { handleUpload } from '../services/uploader.js';
import type { RouteDeps } from './index.js';

export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;
const UNSUPPORTED_TYPE = 'Only .txt, .md and .pdf files are allowed';

// Memory storage: the upload is never written to disk in clear.
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
  },
  fileFilter: (_req, file, cb) => {
    if (INGESTIBLE_EXTENSIONS.includes(path.extname(file.originalname).toLowerCase())) {
      cb(null, true);
    } else {
      cb(new Error(UNSUPPORTED_TYPE));
    }
  },
});

// Runs multer and maps its failures to 413/415 instead of the generic error handler.
const singleFile: RequestHandler = (req, res, next) => {
  upload.single('file')(req, res, (err: unknown) => {
    if (!err) {
      next();
      return;
    }
    if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
      res.status(413).json({ error: { message: 'File too large. Maximum size is 25MB.', code: 'FILE_TOO_LARGE' } });
      return;
    }
    if (err instanceof Error && err.message === UNSUPPORTED_TYPE) {
      res.status(415).json({ error: { message: err.message, code: 'UNSUPPORTED_TYPE' } });
      return;
    }
    next(err);
  });
};

export function createUploadRouter(deps: RouteDeps): Router {
  const router = Router();

  // POST /upload - Upload a .txt, .md or .pdf file
  router.post('/', singleFile, async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        res.status(400).json({ error: { message: 'No file provided', code: 'VALIDATION' } });
        return;
      }

      const { buffer, originalname } = req.file;

      logger.info({ filename: originalname, size: buffer.length }, 'Upload request received');

      const result = await handleUpload(deps, buffer, originalname);

      // 422: the file was received but could not be ingested
      res.status(result.success ? 200 : 422).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
