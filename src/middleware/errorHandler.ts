import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';
import { AppError, InvalidInputError } from '@/utils/errors';
import { createErrorResponse } from '@/utils/errorResponse';

const log = logger.getSubLogger({ name: 'http' });

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const correlationId: unknown = res.locals.correlationId;

  if (err instanceof AppError) {
    const context = { code: err.code, path: req.path, correlationId, message: err.message };
    if (err.statusCode >= 500) {
      log.error('http:request_failed', context);
    } else {
      log.warn('http:request_rejected', context);
    }
    const errors = err instanceof InvalidInputError ? err.errors : undefined;
    res.status(err.statusCode).json(createErrorResponse(err.message, errors, err.code));
    return;
  }

  log.error('http:unhandled_error', {
    path: req.path,
    correlationId,
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  });
  res.status(500).json(createErrorResponse('Internal Server Error', undefined, 'INTERNAL_ERROR'));
}
