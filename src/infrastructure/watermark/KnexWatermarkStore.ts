/**
 * Watermark in the target database
 * Layer: Infrastructure
 *
 * One row per sync stream in `sync_watermarks`; the table is created on
 * first use. Keeping the watermark next to the data means a restored
 * database carries its own resume point.
 */
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { IWatermarkStore } from '@domain/interfaces/IWatermarkStore';

export const WATERMARK_TABLE = 'sync_watermarks';
const STREAM = 'sessions';

interface WatermarkRow {
  name: string;
  stop: Date | string | number;
}

@injectable()
export class KnexWatermarkStore implements IWatermarkStore {
  private ready: Promise<void> | null = null;

  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async read(): Promise<Date | null> {
    await this.ensureTable();
    const row = await this.db<WatermarkRow>(WATERMARK_TABLE).where({ name: STREAM }).first();
    if (!row) return null;
    const stop = new Date(row.stop);
    return Number.isNaN(stop.getTime()) ? null : stop;
  }

  async write(stop: Date): Promise<void> {
    await this.ensureTable();
    await this.db<WatermarkRow>(WATERMARK_TABLE)
      .insert({ name: STREAM, stop: stop.toISOString() })
      .onConflict('name')
      .merge(['stop']);
    this.log.info({ watermark: stop.toISOString() }, 'Watermark advanced');
  }

  private ensureTable(): Promise<void> {
    this.ready ??= (async () => {
      if (await this.db.schema.hasTable(WATERMARK_TABLE)) return;
      await this.db.schema.createTable(WATERMARK_TABLE, (t) => {
        t.string('name', 64).primary();
        t.timestamp('stop', { useTz: true }).notNullable();
      });
    })().catch((err: unknown) => {
      this.ready = null;
      throw err;
    });
    return this.ready;
  }
}
