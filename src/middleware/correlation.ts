// Correlation ID for request tracing.
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const CORRELATION_HEADER = 'x-correlation-id';

export function attachCorrelationId(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  const correlationId = req.header(CORRELATION_HEADER) ?? randomUUID();
  res.locals.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);
  next();
}
