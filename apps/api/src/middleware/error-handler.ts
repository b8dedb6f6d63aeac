import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { isDomainError } from '@cargotrace/domain';

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
  if (isDomainError(err)) {
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err.retryable ? { retryable: true } : {}),
    });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}
