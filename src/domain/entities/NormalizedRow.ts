/**
 * NormalizedRow: Transformer output for one target table. Keys are exactly
 * the table's declared columns and values are already coerced to the
 * column's semantic type (timestamps as UTC ISO-8601 strings).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ColumnValue = JsonValue;

export type NormalizedRow = Record<string, ColumnValue>;

/** Rows per target table, in registry order. */
export type TableRows = Map<string, NormalizedRow[]>;
