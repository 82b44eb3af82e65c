/**
 * Relational Sink (Knex)
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements ISink)
 *
 * Creates missing tables from the Schema Registry, with their primary and
 * foreign keys, and upserts rows by primary key: `INSERT ... ON CONFLICT
 * (pk) DO UPDATE SET` every declared non-key column, or `DO NOTHING` when
 * the key covers every column. Rows
 * are written in chunks, one transaction per chunk, so a failed chunk
 * leaves nothing behind. A failed chunk is retried per the load retry
 * policy and then surfaces as a WindowLoadFailure.
 *
 * Existing tables are never altered. A declared column missing from an
 * existing table is reported once by ensureSchema and makes every load
 * into that table fail with SchemaMismatchError; other tables still load.
 *
 * Works against PostgreSQL (pg) and SQLite (better-sqlite3). JSON columns
 * are stringified here, since neither driver takes a nested array as JSON.
 */
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';
import { TOKENS } from '@core/types';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { NormalizedRow } from '@domain/entities/NormalizedRow';
import type { ISink } from '@domain/interfaces/ISink';
import { findTable } from '@domain/schema/registry';
import type { ColumnDef, ForeignKey, TargetTable } from '@domain/schema/TargetTable';
import {
  LoadBatchError,
  SchemaMismatchError,
  WindowLoadFailure,
  describeError,
} from '@shared/errors/SyncError';
import { retry } from '@shared/retry';

/** Stay under both PostgreSQL's 65,535 and SQLite's 32,766 bind parameters per statement. */
const MAX_BIND_PARAMS = 30_000;

type DbValue = string | number | boolean | null;

function columnBuilder(t: Knex.CreateTableBuilder, column: ColumnDef): Knex.ColumnBuilder {
  switch (column.type) {
    case 'integer':
      return t.integer(column.name);
    case 'float':
      return t.double(column.name);
    case 'boolean':
      return t.boolean(column.name);
    case 'string':
      return column.length ? t.string(column.name, column.length) : t.text(column.name);
    case 'text':
      return t.text(column.name);
    case 'timestamp':
      return t.timestamp(column.name, { useTz: true });
    case 'uuid':
      return t.uuid(column.name);
    case 'json':
      return t.json(column.name);
    case 'enum':
      return t.enu(column.name, [...(column.values ?? [])]);
  }
}

function addColumn(t: Knex.CreateTableBuilder, column: ColumnDef): void {
  const builder = columnBuilder(t, column);
  if (!column.nullable) builder.notNullable();
}

/** Foreign key columns are declared in the order of the referenced primary key. */
function referencedColumns(fk: ForeignKey): string[] {
  const target = findTable(fk.references);
  if (!target || target.primaryKey.length !== fk.columns.length) {
    throw new SchemaMismatchError(`Foreign key ${fk.columns.join(',')} does not match ${fk.references}`, {
      references: fk.references,
    });
  }
  return target.primaryKey;
}

export function toDbRow(table: TargetTable, row: NormalizedRow): Record<string, DbValue> {
  const out: Record<string, DbValue> = {};
  for (const column of table.columns) {
    const value = row[column.name] ?? null;
    if (value === null) {
      out[column.name] = null;
    } else if (column.type === 'json' || typeof value === 'object') {
      out[column.name] = JSON.stringify(value);
    } else {
      out[column.name] = value;
    }
  }
  return out;
}

@injectable()
export class KnexSink implements ISink {
  readonly kind = 'db';
  private readonly missingColumns = new Map<string, string[]>();

  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Config) private cfg: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async ensureSchema(tables: readonly TargetTable[]): Promise<void> {
    for (const table of tables) {
      if (!(await this.db.schema.hasTable(table.name))) {
        const references = table.foreignKeys.map((fk) => ({ fk, columns: referencedColumns(fk) }));
        await this.db.schema.createTable(table.name, (t) => {
          for (const column of table.columns) addColumn(t, column);
          t.primary(table.primaryKey);
          for (const { fk, columns } of references) {
            t.foreign(fk.columns).references(columns).inTable(fk.references);
          }
        });
        this.log.info({ table: table.name }, 'Table created');
        continue;
      }

      const existing = await this.db(table.name).columnInfo();
      const missing = table.columns.map((c) => c.name).filter((name) => !(name in existing));
      if (missing.length > 0) {
        this.missingColumns.set(table.name, missing);
        this.log.warn(
          { table: table.name, missing },
          'Existing table lacks declared columns; loads into it will fail until it is migrated',
        );
      } else {
        this.missingColumns.delete(table.name);
      }
    }
  }

  async upsert(table: TargetTable, rows: NormalizedRow[]): Promise<number> {
    if (rows.length === 0) return 0;

    const missing = this.missingColumns.get(table.name);
    if (missing) {
      throw new SchemaMismatchError(`Table ${table.name} is missing columns: ${missing.join(', ')}`, {
        table: table.name,
        columns: missing.join(','),
      });
    }
    const declared = new Set(table.columns.map((c) => c.name));
    const undeclared = [...new Set(rows.flatMap((r) => Object.keys(r)))].filter((k) => !declared.has(k));
    if (undeclared.length > 0) {
      throw new SchemaMismatchError(
        `Rows for ${table.name} carry undeclared columns: ${undeclared.join(', ')}`,
        { table: table.name, columns: undeclared.join(',') },
      );
    }

    const prepared = rows.map((row) => toDbRow(table, row));
    const mergeColumns = table.columns
      .map((c) => c.name)
      .filter((name) => !table.primaryKey.includes(name));
    const chunkSize = Math.max(
      1,
      Math.min(this.cfg.sync.batchSize, Math.floor(MAX_BIND_PARAMS / table.columns.length)),
    );

    let written = 0;
    for (let offset = 0; offset < prepared.length; offset += chunkSize) {
      const chunk = prepared.slice(offset, offset + chunkSize);
      const context = { table: table.name, offset, rows: chunk.length };
      try {
        await retry(() => this.writeChunk(table, chunk, mergeColumns, context), this.cfg.sync.loadRetry, {
          shouldRetry: (err) => err instanceof LoadBatchError,
          onRetry: ({ attempt, maxAttempts, error }) => {
            this.log.warn({ ...context, attempt, maxAttempts, err: describeError(error) }, 'Load batch failed, retrying');
          },
        });
      } catch (err) {
        throw new WindowLoadFailure(`Load into ${table.name} failed: ${describeError(err)}`, context, err);
      }
      written += chunk.length;
    }

    this.log.debug({ table: table.name, written }, 'Upsert complete');
    return written;
  }

  async close(): Promise<void> {
    // The pool is shared with the watermark store; destroyDbConnection() ends it on shutdown.
    this.log.debug('Relational sink closed');
  }

  private async writeChunk(
    table: TargetTable,
    chunk: Record<string, DbValue>[],
    mergeColumns: string[],
    context: { table: string; offset: number; rows: number },
  ): Promise<void> {
    try {
      await this.db.transaction(async (trx) => {
        const insert = trx(table.name).insert(chunk).onConflict(table.primaryKey);
        if (mergeColumns.length > 0) {
          await insert.merge(mergeColumns);
        } else {
          await insert.ignore();
        }
      });
    } catch (err) {
      throw new LoadBatchError(describeError(err), context, err);
    }
  }
}
