/**
 * Sync Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/sync`:
 *
 *   POST /api/v1/sync            { startDt?, stopDt?, testMode?, testModeLimitSessions? }
 *   GET  /api/v1/sync/watermark  { watermark: ISO string | null }
 *   GET  /api/v1/sync/status     { state, running }
 */
import { Router } from 'express';
import { SyncController, syncRequestSchema } from '@interfaces/http/controllers/SyncController';
import { validateBody } from '@interfaces/http/middleware/validation';

export function syncRoutes(): Router {
  const router = Router();
  const controller = new SyncController();

  router.post('/', validateBody(syncRequestSchema), controller.trigger);
  router.get('/watermark', controller.watermark);
  router.get('/status', controller.status);

  return router;
}
