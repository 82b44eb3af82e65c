/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place where tokens are bound to implementations. Classes declare
 * what they need with `@inject(TOKENS.X)` and never construct their
 * collaborators by hand.
 *
 *   - `useValue` for ready-made singletons (config, logger, table mappings)
 *   - `useClass` for pipeline stages, built with their own dependencies
 *   - `instanceCachingFactory` for the Knex pool, so it is only opened when
 *     something that writes to the database is actually resolved
 *
 * The sink and watermark store depend on the load target. `DATABASE_URL`
 * picks the default; the sync CLI calls `registerLoadTarget` again for
 * `--load-to` before it resolves the SyncService.
 */
import 'reflect-metadata';
import type { Knex } from 'knex';
import { container, instanceCachingFactory } from 'tsyringe';

import { config } from './config';
import type { LoadTarget } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { Extractor } from '@application/extract/Extractor';
import { WindowPlanner } from '@application/planning/WindowPlanner';
import { SyncService } from '@application/services/SyncService';
import { TABLE_MAPPINGS } from '@application/transform/mappings';
import { Transformer } from '@application/transform/Transformer';
import type { ISink } from '@domain/interfaces/ISink';
import type { IWatermarkStore } from '@domain/interfaces/IWatermarkStore';
import { getDbConnection } from '@infrastructure/database/connection';
import { FileSink } from '@infrastructure/sinks/FileSink';
import { KnexSink } from '@infrastructure/sinks/KnexSink';
import { AnalyticsApiClient } from '@infrastructure/source/AnalyticsApiClient';
import { FileWatermarkStore } from '@infrastructure/watermark/FileWatermarkStore';
import { KnexWatermarkStore } from '@infrastructure/watermark/KnexWatermarkStore';

container.register(TOKENS.Config, { useValue: config });
container.register(TOKENS.Logger, { useValue: logger });
container.register<Knex>(TOKENS.Knex, {
  useFactory: instanceCachingFactory<Knex>(() => getDbConnection()),
});
container.register(TOKENS.TableMappings, { useValue: TABLE_MAPPINGS });

container.register(TOKENS.SourceApiClient, { useClass: AnalyticsApiClient });
container.register(TOKENS.WindowPlanner, { useClass: WindowPlanner });
container.register(TOKENS.Extractor, { useClass: Extractor });
container.register(TOKENS.Transformer, { useClass: Transformer });
container.registerSingleton(TOKENS.SyncService, SyncService);

export function registerLoadTarget(target: LoadTarget): void {
  if (target === 'db') {
    container.register<ISink>(TOKENS.Sink, { useClass: KnexSink });
    container.register<IWatermarkStore>(TOKENS.WatermarkStore, { useClass: KnexWatermarkStore });
    return;
  }
  container.register<ISink>(TOKENS.Sink, {
    useFactory: () => new FileSink(target, config.sync.outputDir, logger),
  });
  container.register<IWatermarkStore>(TOKENS.WatermarkStore, {
    useFactory: () => new FileWatermarkStore(config.sync.watermarkFile, logger),
  });
}

registerLoadTarget(config.sync.defaultLoadTo);

export { container };
