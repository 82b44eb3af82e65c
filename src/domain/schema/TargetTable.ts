/**
 * Target Table Declarations
 * Layer: Domain
 *
 * The relational shape the sync writes to. Declared once in registry.ts and
 * read by the Transformer (which columns exist, how to coerce them, which
 * keys must resolve) and by the sinks (what to create, what to upsert on).
 */
export type SemanticType =
  | 'integer'
  | 'float'
  | 'boolean'
  | 'string'
  | 'text'
  | 'timestamp'
  | 'uuid'
  | 'json'
  | 'enum';

export interface ColumnDef {
  name: string;
  type: SemanticType;
  nullable: boolean;
  /** Allowed values for `enum` columns, compared case-insensitively. */
  values?: readonly string[];
  /** Max length for `string` columns. */
  length?: number;
  /** Replaces an out-of-range timestamp (before 1900) instead of null. */
  fallback?: string;
}

export interface ForeignKey {
  /** Columns on this table, in the order of the referenced table's primary key. */
  columns: string[];
  references: string;
}

export type DataClass = 'base' | 'data';

export interface TargetTable {
  name: string;
  dataClass: DataClass;
  columns: ColumnDef[];
  primaryKey: string[];
  foreignKeys: ForeignKey[];
}
