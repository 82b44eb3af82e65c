/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  ->  { status: 'ok', uptime, timestamp, loadTarget }
 *
 * Liveness only: it does not touch the database or the source API.
 * `loadTarget` is the sink a trigger without overrides writes to.
 */
import { config } from '@core/config';
import { Router } from 'express';

export function healthRoutes(): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      loadTarget: config.sync.defaultLoadTo,
    });
  });

  return router;
}
