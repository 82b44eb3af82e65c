/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development. Sync components log an object first (window bounds, table,
 * record id) and a message second, so a failed window can be re-run by hand
 * from the log line alone.
 *
 * The exported `Logger` type lets components declare the dependency without
 * binding to the singleton, which keeps them constructible in tests.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
