import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export type HttpError = Error & { status: number };

export function httpError(status: number, message: string): HttpError {
  return Object.assign(new Error(message), { status });
}

function statusOf(err: Error): number {
  return 'status' in err && typeof err.status === 'number' ? err.status : 500;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof Error) {
    const status = statusOf(err);
    if (status >= 500) console.error('[api] unhandled error', err);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
