import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { HttpError } from '../utils/httpError.js';
import { logger } from '../utils/logger.js';

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof multer.MulterError) return 400;
  // body-parser errors carry a numeric status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/** Central error handler - MUST have 4 args to be recognized by Express */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  // Avoid leaking internal details; HttpError messages are written for clients
  const response = status >= 500 && !(err instanceof HttpError)
    ? ResponseUtils.internalError()
    : ResponseUtils.error(message || 'Request failed');

  const fields = { err, status, url: req.originalUrl, method: req.method };
  if (status >= 500) logger.error(fields, 'request_error');
  else logger.warn(fields, 'request_rejected');

  res.status(status).json(response);
}
