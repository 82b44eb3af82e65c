/**
 * Sink Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Where normalized rows end up. The relational sink upserts by primary key
 * and is idempotent; the file sinks append everything they receive and write
 * one artifact per run on `close()`.
 */
import type { NormalizedRow } from '@domain/entities/NormalizedRow';
import type { TargetTable } from '@domain/schema/TargetTable';

export interface ISink {
  /** Short name for logs and run results (`db`, `json`, `v8`). */
  readonly kind: string;

  /** Creates missing tables. Never alters or drops an existing one. */
  ensureSchema(tables: readonly TargetTable[]): Promise<void>;

  /** Writes rows for one table. Returns the number of rows written. */
  upsert(table: TargetTable, rows: NormalizedRow[]): Promise<number>;

  /** Flushes buffered output and releases connections. */
  close(): Promise<void>;
}
