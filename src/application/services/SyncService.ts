/**
 * Sync Service: the Run Controller
 * Layer: Application
 * Pattern: Facade over planner, extractor, transformer, sink and watermark
 *
 *   idle → planning → extracting_base_dicts → (per window)
 *     extracting_data → transforming → loading → … → done | failed
 *
 * Failure scopes:
 *   - planning (bad range) fails the run before anything is written
 *   - base dictionaries failing fails the run: data keys cannot resolve
 *   - AuthError anywhere fails the run immediately
 *   - anything else fails only its window; the next window still runs
 *   - a SchemaMismatchError while loading fails only that table; the other
 *     tables of the batch are still loaded, and the window counts as failed
 * The run is `failed` when every window failed, `done` otherwise; `partial`
 * flags a done run with failures in it.
 *
 * The watermark moves to a window's stop right after the window loads, but
 * only while every earlier window of the run succeeded and every base table
 * loaded, so the next run starts at the first failed window. Keys of a table
 * that failed to load leave the KeyIndex, and rows referencing them are
 * skipped and counted rather than loaded against missing parents. Test mode caps the number of sessions
 * across the run and never writes the watermark.
 *
 * In daily mode (no explicit start) the run ends with a refresh pass over the
 * last SYNC_REFRESH_DAYS days: sessions with manual scores, and sessions in
 * categories changed since the previous watermark, are extracted again and
 * upserted over the rows already loaded.
 */
import { inject, injectable } from 'tsyringe';
import { TOKENS } from '@core/types';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { NormalizedRow, TableRows } from '@domain/entities/NormalizedRow';
import type { RawRecord } from '@domain/entities/RawRecord';
import { windowContext } from '@domain/entities/TimeWindow';
import type { TimeWindow } from '@domain/entities/TimeWindow';
import type { ISink } from '@domain/interfaces/ISink';
import type { IWatermarkStore } from '@domain/interfaces/IWatermarkStore';
import { SCHEMA_REGISTRY, findTable } from '@domain/schema/registry';
import {
  AuthError,
  RecordTransformError,
  SchemaMismatchError,
  describeError,
} from '@shared/errors/SyncError';
import type { RecordErrorReason } from '@shared/errors/SyncError';
import { Extractor, FILTER_SEPARATOR } from '../extract/Extractor';
import { DAY_MS, WindowPlanner } from '../planning/WindowPlanner';
import { parseTimestamp } from '../transform/coerce';
import type { KeyIndex } from '../transform/KeyIndex';
import { Transformer } from '../transform/Transformer';

export type SyncState =
  | 'idle'
  | 'planning'
  | 'extracting_base_dicts'
  | 'extracting_data'
  | 'transforming'
  | 'loading'
  | 'done'
  | 'failed';

export const DEFAULT_TEST_MODE_LIMIT = 200;

export interface SyncRunOptions {
  startDt?: string;
  stopDt?: string;
  testMode?: boolean;
  testModeLimitSessions?: number;
  /** Clock override. */
  now?: Date;
}

export interface WindowOutcome {
  kind: 'window' | 'refresh';
  windowStart: string;
  windowStop: string;
  filters?: string;
  status: 'done' | 'failed';
  extracted: number;
  written: Record<string, number>;
  recordErrors: number;
  failedTables: string[];
  error?: string;
}

export interface RecordErrorSummary {
  table: string;
  reason: RecordErrorReason;
  count: number;
}

export interface SyncRunResult {
  status: 'done' | 'failed';
  /** Done, but some window, refresh or table failed. */
  partial: boolean;
  testMode: boolean;
  sink: string;
  startedAt: string;
  finishedAt: string;
  baseDicts: { written: Record<string, number>; recordErrors: number; failedTables: string[] } | null;
  windows: WindowOutcome[];
  refresh: WindowOutcome[];
  recordErrors: RecordErrorSummary[];
  watermark: string | null;
  error?: string;
}

interface RunContext {
  testMode: boolean;
  remaining: number | undefined;
  errorCounts: Map<string, RecordErrorSummary>;
}

@injectable()
export class SyncService {
  private currentState: SyncState = 'idle';
  private active = false;
  private sinkOpen = false;

  constructor(
    @inject(TOKENS.WindowPlanner) private planner: WindowPlanner,
    @inject(TOKENS.Extractor) private extractor: Extractor,
    @inject(TOKENS.Transformer) private transformer: Transformer,
    @inject(TOKENS.Sink) private sink: ISink,
    @inject(TOKENS.WatermarkStore) private watermarks: IWatermarkStore,
    @inject(TOKENS.Config) private cfg: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  get state(): SyncState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.active;
  }

  async readWatermark(): Promise<Date | null> {
    return this.watermarks.read();
  }

  async run(options: SyncRunOptions = {}): Promise<SyncRunResult> {
    this.active = true;
    try {
      return await this.execute(options);
    } finally {
      this.active = false;
    }
  }

  private transition(state: SyncState, context: Record<string, unknown> = {}): void {
    if (state === this.currentState) return;
    const level = state === 'done' || state === 'failed' || state === 'planning' ? 'info' : 'debug';
    this.log[level]({ ...context, from: this.currentState, to: state }, 'Sync state changed');
    this.currentState = state;
  }

  private async execute(options: SyncRunOptions): Promise<SyncRunResult> {
    const now = options.now ?? new Date();
    const testMode = options.testMode ?? false;
    const result: SyncRunResult = {
      status: 'done',
      partial: false,
      testMode,
      sink: this.sink.kind,
      startedAt: now.toISOString(),
      finishedAt: now.toISOString(),
      baseDicts: null,
      windows: [],
      refresh: [],
      recordErrors: [],
      watermark: null,
    };
    const ctx: RunContext = {
      testMode,
      remaining: testMode ? (options.testModeLimitSessions ?? DEFAULT_TEST_MODE_LIMIT) : undefined,
      errorCounts: new Map(),
    };

    this.currentState = 'idle';
    this.sinkOpen = false;
    this.transition('planning', { startDt: options.startDt, stopDt: options.stopDt, testMode });

    let windows: TimeWindow[];
    let previousWatermark: Date | null = null;
    try {
      previousWatermark = await this.watermarks.read();
      windows = this.planner.plan({
        startDt: options.startDt,
        stopDt: options.stopDt,
        testMode,
        watermark: options.startDt ? null : previousWatermark,
        historicalStart: this.cfg.sync.historicalStart,
        now,
      });
    } catch (err) {
      return this.finish(result, ctx, err);
    }
    result.watermark = previousWatermark?.toISOString() ?? null;

    if (windows.length === 0) {
      this.log.info({ watermark: result.watermark }, 'Nothing to sync, already up to date');
      return this.finish(result, ctx);
    }
    this.log.info(
      { windows: windows.length, ...windowContext({ start: windows[0].start, stop: windows[windows.length - 1].stop }) },
      'Windows planned',
    );

    try {
      this.sinkOpen = true;
      await this.sink.ensureSchema(SCHEMA_REGISTRY);
      const keys = await this.syncBaseDicts(result, ctx);

      // Rows skipped for a base table that failed to load must be synced again.
      let prefixIntact = (result.baseDicts?.failedTables.length ?? 0) === 0;
      if (!prefixIntact) {
        this.log.warn({ failedTables: result.baseDicts?.failedTables }, 'Base tables failed to load; watermark held');
      }
      for (const window of windows) {
        if (ctx.remaining !== undefined && ctx.remaining <= 0) {
          this.log.info({ ...windowContext(window) }, 'Test mode session cap reached, skipping window');
          break;
        }
        const outcome = await this.runWindow(window, 'window', keys.base, ctx);
        result.windows.push(outcome);

        if (outcome.status === 'failed') {
          prefixIntact = false;
        } else if (prefixIntact && !testMode) {
          await this.watermarks.write(window.stop);
          result.watermark = window.stop.toISOString();
        }
      }

      const daily = !options.startDt && !testMode && this.cfg.sync.refreshDays > 0;
      if (daily && result.windows.some((w) => w.status === 'done')) {
        const stop = windows[windows.length - 1].stop;
        await this.refresh(stop, keys, previousWatermark, result, ctx);
      }
    } catch (err) {
      return this.finish(result, ctx, err);
    }

    return this.finish(result, ctx);
  }

  private async syncBaseDicts(
    result: SyncRunResult,
    ctx: RunContext,
  ): Promise<{ base: KeyIndex; categories: RawRecord[] }> {
    this.transition('extracting_base_dicts');
    const snapshot = await this.extractor.extractBaseDicts();

    this.transition('transforming');
    const transformed = this.transformer.transformBaseDicts(snapshot);
    this.countErrors(transformed.errors, ctx, {});

    this.transition('loading');
    const written: Record<string, number> = {};
    const loaded = await this.loadTables(transformed.tables, transformed.keys, written, {});
    this.countErrors(loaded.errors, ctx, {});
    const recordErrors = transformed.errors.length + loaded.errors.length;
    result.baseDicts = { written, recordErrors, failedTables: loaded.failed };
    this.log.info({ written, recordErrors, failedTables: loaded.failed }, 'Base dictionaries loaded');
    return { base: transformed.keys, categories: snapshot.categories };
  }

  private async runWindow(
    window: TimeWindow,
    kind: WindowOutcome['kind'],
    keys: KeyIndex,
    ctx: RunContext,
    filters: string[] = [],
  ): Promise<WindowOutcome> {
    const outcome: WindowOutcome = {
      kind,
      ...windowContext(window),
      ...(filters.length > 0 ? { filters: filters.join(FILTER_SEPARATOR) } : {}),
      status: 'done',
      extracted: 0,
      written: {},
      recordErrors: 0,
      failedTables: [],
    };
    const logContext = { ...windowContext(window), kind, filters: outcome.filters };
    const batchSize = this.cfg.sync.batchSize;
    const batch: RawRecord[] = [];

    try {
      this.transition('extracting_data', logContext);
      for await (const record of this.extractor.extractData(window, { limit: ctx.remaining, filters })) {
        batch.push(record);
        outcome.extracted += 1;
        if (batch.length >= batchSize) {
          await this.processBatch(batch.splice(0), keys, outcome, ctx);
          this.transition('extracting_data', logContext);
        }
      }
      if (batch.length > 0) await this.processBatch(batch.splice(0), keys, outcome, ctx);
    } catch (err) {
      if (err instanceof AuthError) throw err;
      outcome.status = 'failed';
      outcome.error = describeError(err);
      this.log.error({ ...logContext, err }, 'Window failed; re-run it once the cause is fixed');
    } finally {
      if (ctx.remaining !== undefined) ctx.remaining -= outcome.extracted;
    }

    if (outcome.failedTables.length > 0 && outcome.status === 'done') {
      outcome.status = 'failed';
      outcome.error = `Schema mismatch in ${outcome.failedTables.join(', ')}`;
    }
    this.log.info(
      { ...logContext, status: outcome.status, extracted: outcome.extracted, written: outcome.written },
      'Window finished',
    );
    return outcome;
  }

  private async processBatch(
    records: RawRecord[],
    keys: KeyIndex,
    outcome: WindowOutcome,
    ctx: RunContext,
  ): Promise<void> {
    const context = { windowStart: outcome.windowStart, windowStop: outcome.windowStop };

    this.transition('transforming', context);
    const transformed = this.transformer.transformData(records, keys);
    outcome.recordErrors += transformed.errors.length;
    this.countErrors(transformed.errors, ctx, context);

    this.transition('loading', context);
    const loaded = await this.loadTables(transformed.tables, transformed.keys, outcome.written, context);
    outcome.recordErrors += loaded.errors.length;
    this.countErrors(loaded.errors, ctx, context);
    for (const table of loaded.failed) {
      if (!outcome.failedTables.includes(table)) outcome.failedTables.push(table);
    }
  }

  /**
   * Loads every table in registry order. A table that hits a schema mismatch
   * is reported in `failed` and its keys leave the index; rows of later
   * tables whose foreign keys no longer resolve are skipped as record errors.
   */
  private async loadTables(
    tables: TableRows,
    keys: KeyIndex,
    written: Record<string, number>,
    context: Record<string, string>,
  ): Promise<{ failed: string[]; errors: RecordTransformError[] }> {
    const failed: string[] = [];
    const errors: RecordTransformError[] = [];
    for (const [name, rows] of tables) {
      const table = findTable(name);
      if (!table) continue;

      const loadable: NormalizedRow[] = [];
      for (const row of rows) {
        const unresolved = table.foreignKeys.find((fk) => {
          const values = fk.columns.map((c) => row[c] ?? null);
          return values.every((v) => v !== null) && !keys.has(fk.references, values);
        });
        if (!unresolved) {
          loadable.push(row);
          continue;
        }
        keys.remove(name, table.primaryKey.map((c) => row[c] ?? null));
        errors.push(
          new RecordTransformError(
            `${name}: ${unresolved.columns.join(',')} does not resolve to ${unresolved.references}, which failed to load`,
            name,
            'unresolved_fk',
            {
              references: unresolved.references,
              value: unresolved.columns.map((c) => String(row[c])).join(','),
            },
          ),
        );
      }

      try {
        written[name] = (written[name] ?? 0) + (await this.sink.upsert(table, loadable));
      } catch (err) {
        if (!(err instanceof SchemaMismatchError)) throw err;
        this.log.error({ ...context, ...err.context, table: name }, err.message);
        keys.drop(name);
        failed.push(name);
      }
    }
    return { failed, errors };
  }

  private async refresh(
    stop: Date,
    keys: { base: KeyIndex; categories: RawRecord[] },
    previousWatermark: Date | null,
    result: SyncRunResult,
    ctx: RunContext,
  ): Promise<void> {
    const window: TimeWindow = {
      start: new Date(stop.getTime() - this.cfg.sync.refreshDays * DAY_MS),
      stop,
    };
    const passes: string[][] = [['is_scored,manual']];

    if (previousWatermark) {
      const since = previousWatermark.getTime();
      const changed = keys.categories
        .filter((c) => {
          const updated = typeof c.updated_at === 'string' ? parseTimestamp(c.updated_at) : null;
          return typeof updated === 'number' && updated > since;
        })
        .map((c) => String(c.id));
      if (changed.length > 0) passes.push([`categories,${changed.join(',')}|or`]);
    }

    for (const filters of passes) {
      this.log.info({ ...windowContext(window), filters }, 'Refresh pass');
      result.refresh.push(await this.runWindow(window, 'refresh', keys.base, ctx, filters));
    }
  }

  private countErrors(
    errors: RecordTransformError[],
    ctx: RunContext,
    context: Record<string, string>,
  ): void {
    for (const err of errors) {
      this.log.warn({ ...context, ...err.context }, `Record skipped: ${err.message}`);
      const key = `${err.table}:${err.reason}`;
      const summary = ctx.errorCounts.get(key);
      if (summary) summary.count += 1;
      else ctx.errorCounts.set(key, { table: err.table, reason: err.reason, count: 1 });
    }
  }

  private async finish(result: SyncRunResult, ctx: RunContext, error?: unknown): Promise<SyncRunResult> {
    if (this.sinkOpen) {
      this.sinkOpen = false;
      try {
        await this.sink.close();
      } catch (err) {
        this.log.error({ err }, 'Sink failed to close');
        error ??= err;
      }
    }

    result.recordErrors = [...ctx.errorCounts.values()];
    result.finishedAt = new Date().toISOString();

    const allWindowsFailed = result.windows.length > 0 && result.windows.every((w) => w.status === 'failed');
    if (error !== undefined || allWindowsFailed) {
      result.status = 'failed';
      result.error = error !== undefined ? describeError(error) : 'Every window failed';
      if (error !== undefined) this.log.error({ err: error }, 'Sync run failed');
    }
    const anyFailed =
      [...result.windows, ...result.refresh].some((w) => w.status === 'failed') ||
      (result.baseDicts?.failedTables.length ?? 0) > 0;
    result.partial = result.status === 'done' && anyFailed;

    this.transition(result.status, {
      windows: result.windows.length,
      failedWindows: result.windows.filter((w) => w.status === 'failed').length,
      watermark: result.watermark,
    });
    return result;
  }
}
