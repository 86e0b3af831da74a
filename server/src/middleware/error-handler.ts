import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { logger } from '../config/logger.js';
import { DomainError } from '../errors/domain-errors.js';

export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Not found' } });
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof DomainError) {
    if (err.status >= 500) {
      logger.error('Domain error', { code: err.code, error: err.message, context: err.context, path: req.path });
    } else {
      logger.warn('Request rejected', { code: err.code, error: err.message, path: req.path });
    }
    res.status(err.status).json({ error: { code: err.code, message: err.message } });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: err.errors.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      },
    });
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unhandled error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
  });
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
}

/**
 * Forward rejections of an async handler to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
