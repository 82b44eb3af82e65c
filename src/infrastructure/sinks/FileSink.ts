/**
 * File Sink (JSON or V8 serialization)
 * Layer: Infrastructure
 * Pattern: implements ISink
 *
 * Append only: every row handed to `upsert` is kept, in arrival order, with
 * no dedup. `close()` writes one artifact per run holding one array per
 * table, in registry order:
 *
 *   json  sync-<timestamp>.json  readable, diffable
 *   v8    sync-<timestamp>.v8    node:v8 structured serialization, read back
 *                                 with v8.deserialize
 */
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { serialize } from 'node:v8';
import type { Logger } from '@core/logger';
import type { NormalizedRow } from '@domain/entities/NormalizedRow';
import type { ISink } from '@domain/interfaces/ISink';
import type { TargetTable } from '@domain/schema/TargetTable';

export type FileFormat = 'json' | 'v8';

export class FileSink implements ISink {
  private tables = new Map<string, NormalizedRow[]>();
  /** Path of the last artifact written by `close()`. */
  lastArtifact: string | null = null;

  constructor(
    readonly kind: FileFormat,
    private outputDir: string,
    private log: Logger,
    private clock: () => Date = () => new Date(),
  ) {}

  async ensureSchema(tables: readonly TargetTable[]): Promise<void> {
    for (const table of tables) {
      if (!this.tables.has(table.name)) this.tables.set(table.name, []);
    }
  }

  async upsert(table: TargetTable, rows: NormalizedRow[]): Promise<number> {
    const existing = this.tables.get(table.name);
    if (existing) {
      existing.push(...rows);
    } else {
      this.tables.set(table.name, [...rows]);
    }
    return rows.length;
  }

  async close(): Promise<void> {
    const content: Record<string, NormalizedRow[]> = Object.fromEntries(this.tables);
    const stamp = this.clock().toISOString().replace(/[:.]/g, '-');
    const file = path.resolve(this.outputDir, `sync-${stamp}.${this.kind}`);

    await mkdir(this.outputDir, { recursive: true });
    await writeFile(file, this.kind === 'json' ? JSON.stringify(content, null, 2) : serialize(content));

    const counts = Object.fromEntries([...this.tables].map(([name, rows]) => [name, rows.length]));
    this.log.info({ file, counts }, 'Sync artifact written');
    this.lastArtifact = file;
    this.tables = new Map();
  }
}
