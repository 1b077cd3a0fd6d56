import type { NextFunction, Request, Response } from 'express';
import { HttpError } from '../types.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, `Route not found: ${req.method} ${req.path}`));
}

// body-parser tags its failures (malformed JSON, oversized body) with a 4xx `status`.
function clientErrorStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = err instanceof HttpError ? err.status : clientErrorStatus(err) ?? 500;
  if (status === 500) console.error('[server] unhandled error:', err);
  const message = err instanceof Error ? err.message : 'Unexpected server error';
  res.status(status).json({ error: message });
}
