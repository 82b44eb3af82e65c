/**
 * Server Entry Point: HTTP trigger
 * Layer: Entry Point (top of the dependency tree)
 *
 * A single process: sync runs are sequential and hold state (the active run,
 * the sink buffers), so the trigger is never forked across workers.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. stop accepting connections (server.close())
 *   2. let in-flight requests finish
 *   3. destroy the DB pool, then exit 0
 */
import { config } from '@core/config';
import { logger } from '@core/logger';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { createApp } from '@interfaces/http/app';

const app = createApp();

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `Sync trigger listening on :${config.port}`);
});

const shutdown = (signal: string): void => {
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
  server.close(() => {
    destroyDbConnection()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to close the database pool');
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
