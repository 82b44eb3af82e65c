#!/usr/bin/env node
/**
 * Sync CLI
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run sync -- [--test-mode] [--test-mode-limit-sessions N]
 *                   [--start-dt YYYY-MM-DD] [--stop-dt YYYY-MM-DD]
 *                   [--load-to db|json|v8]
 *
 * Runs one sync with the same SyncService the HTTP trigger uses, prints a
 * summary and exits 0 only when the run is done with no failed window,
 * refresh or table. Meant for cron: a non-zero exit is the alert.
 */
import 'dotenv/config';

import { config } from '@core/config';
import { container, registerLoadTarget } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SyncRunResult, SyncService } from '@application/services/SyncService';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { parseSyncArgs } from './syncArgs';

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

function sum(values: Record<string, number>): number {
  return Object.values(values).reduce((a, b) => a + b, 0);
}

function printSummary(result: SyncRunResult, log: (line: string) => void): void {
  const durationMs = Date.parse(result.finishedAt) - Date.parse(result.startedAt);
  const windows = [...result.windows, ...result.refresh];

  log('');
  log(`  Status:       ${result.status}${result.partial ? ' (partial)' : ''}`);
  log(`  Sink:         ${result.sink}${result.testMode ? ' (test mode)' : ''}`);
  log(`  Duration:     ${formatDuration(durationMs)}`);
  if (result.baseDicts) {
    log(`  Base dicts:   ${formatNumber(sum(result.baseDicts.written))} rows`);
  }
  for (const w of windows) {
    const label = w.kind === 'refresh' ? `refresh ${w.filters ?? ''}`.trim() : 'window';
    log(
      `  ${w.status === 'done' ? '✓' : '✗'} ${w.windowStart} .. ${w.windowStop}  ${label}: ` +
        `${formatNumber(w.extracted)} sessions, ${formatNumber(sum(w.written))} rows` +
        (w.recordErrors > 0 ? `, ${formatNumber(w.recordErrors)} skipped` : '') +
        (w.error ? `  (${w.error})` : ''),
    );
  }
  for (const e of result.recordErrors) {
    log(`  Skipped:      ${e.table} ${e.reason} x${formatNumber(e.count)}`);
  }
  log(`  Watermark:    ${result.watermark ?? '(none)'}`);
  if (result.error) log(`  Error:        ${result.error}`);
  log('');
}

// Main

async function main(): Promise<number> {
  // eslint-disable-next-line no-console
  const log = console.log;

  const options = parseSyncArgs(process.argv.slice(2), config.sync.defaultLoadTo);
  if (options.testMode) logger.level = 'debug';

  registerLoadTarget(options.loadTo);
  const service = container.resolve<SyncService>(TOKENS.SyncService);

  log('');
  log(`  Source:       ${config.source.domain || '(ET_DOMAIN not set)'}`);
  log(`  Load to:      ${options.loadTo}`);
  log(`  Range:        ${options.startDt ?? '(watermark)'} .. ${options.stopDt ?? '(today)'}`);

  try {
    const result = await service.run({
      startDt: options.startDt,
      stopDt: options.stopDt,
      testMode: options.testMode,
      testModeLimitSessions: options.testModeLimitSessions,
    });
    printSummary(result, log);
    return result.status === 'done' && !result.partial ? 0 : 1;
  } finally {
    await destroyDbConnection();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Sync failed:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
