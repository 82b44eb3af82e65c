/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last. Express 5 forwards rejected promises from async handlers
 * here, so controllers do not wrap their bodies in try/catch.
 *
 *   - AppError (operational): logged at warn, answered with its status code
 *     and message. A SyncError adds its context to the log line.
 *   - anything else: logged at error, answered with a generic 500.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import { SyncError } from '@shared/errors/SyncError';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    const context = err instanceof SyncError ? err.context : undefined;
    logger.warn({ statusCode: err.statusCode, message: err.message, context }, 'Operational error');
    res.status(err.statusCode).json({
      status: 'error',
      message: err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
