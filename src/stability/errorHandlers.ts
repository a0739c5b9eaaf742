// Process-level error handlers, graceful shutdown and the request-timeout middleware.
import type { Server } from 'http';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '@/services/logger';

const log = logger.getSubLogger({ name: 'stability' });
const SHUTDOWN_GRACE_MS = 15_000;

let serverInstance: Server | null = null;

export function setServerInstance(server: Server): void {
  serverInstance = server;
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    log.error('process:unhandled_rejection', {
      reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason),
    });
    // Keep serving in production; fail fast everywhere else.
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    log.fatal('process:uncaught_exception', { error: error.stack ?? error.message });
    gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];
  for (const signal of signals) {
    process.on(signal, () => gracefulShutdown(signal, 0));
  }
}

function gracefulShutdown(reason: string, exitCode: number): void {
  log.info('process:shutdown', { reason });

  const forced = setTimeout(() => {
    log.error('process:forced_shutdown', { afterMs: SHUTDOWN_GRACE_MS });
    process.exit(1);
  }, SHUTDOWN_GRACE_MS);
  forced.unref();

  if (!serverInstance) {
    process.exit(exitCode);
  }
  serverInstance.close((err) => {
    if (err) log.error('process:server_close_failed', { error: err.message });
    process.exit(err ? 1 : exitCode);
  });
}

/**
 * Answers 408 when a request outlives its budget. Flight searches get the longest
 * aggregation budget plus headroom.
 */
export function requestTimeout(timeoutMs: number = 15_000, longRunningMs: number = 100_000) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const isFlightSearch = req.path.startsWith('/api/flights');
    const isRecommendation = req.path.startsWith('/api/destinations/recommend');
    const effectiveTimeout = isFlightSearch ? longRunningMs : isRecommendation ? 45_000 : timeoutMs;

    const timer = setTimeout(() => {
      if (!res.headersSent) {
        res.status(408).json({
          success: false,
          message: `Request exceeded ${effectiveTimeout}ms timeout`,
          code: 'REQUEST_TIMEOUT',
        });
      }
    }, effectiveTimeout);

    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    next();
  };
}
