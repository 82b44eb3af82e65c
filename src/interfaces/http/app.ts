/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call, so integration tests can register stand-ins
 * in the container first and then build an app that resolves them.
 *
 * Middleware order:
 *   1. requestTimer   stamps req.requestStartTime
 *   2. helmet, cors, compression
 *   3. express.json
 *   4. requestLogger  pino-http
 *   5. routes
 *   6. errorHandler   last
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { syncRoutes } from '@interfaces/http/routes/syncRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes());
  app.use('/api/v1/sync', syncRoutes());

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
