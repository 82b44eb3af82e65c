/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps `req.requestStartTime` as the request enters the pipeline; the sync
 * controller reports `meta.totalTimeMs` from it. Registered first.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
