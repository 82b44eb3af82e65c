/**
 * Transformer: raw source records to normalized rows
 * Layer: Application
 *
 * Walks the Schema Registry in order and, per table:
 *   1. fans each source record out along the mapping's `each` path
 *   2. reads and coerces every declared column (see coerce.ts)
 *   3. dedups by primary key, the last record seen winning
 *   4. checks every foreign key against the KeyIndex and records the
 *      accepted keys, so children of this table can resolve against them
 *
 * A row that fails 2 or 4 is dropped and reported as a RecordTransformError;
 * other rows of the same source record are unaffected. A mapping that does
 * not fit the declared schema throws SchemaMismatchError for the whole batch.
 */
import { inject, injectable } from 'tsyringe';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import type { NormalizedRow, TableRows } from '@domain/entities/NormalizedRow';
import { isRawRecord, recordId } from '@domain/entities/RawRecord';
import type { BaseDictSnapshot, RawRecord } from '@domain/entities/RawRecord';
import { findTable, tablesOf } from '@domain/schema/registry';
import type { DataClass, TargetTable } from '@domain/schema/TargetTable';
import { RecordTransformError, SchemaMismatchError } from '@shared/errors/SyncError';
import { coerceValue } from './coerce';
import { KeyIndex } from './KeyIndex';
import type { FieldSource, MappingSource, TableMapping } from './mappings';

export interface TransformResult {
  tables: TableRows;
  errors: RecordTransformError[];
  /** Keys accepted by this call, layered over the index it was given. */
  keys: KeyIndex;
}

interface Scope {
  item: unknown;
  parent: unknown;
  root: RawRecord;
}

/** Automated reviews are attributed to user 0, which the users endpoint does not list. */
export const SYSTEM_USER: RawRecord = {
  id: 0,
  full_name: 'System',
  email: null,
  is_active: false,
  is_superuser: false,
};

function expand(mapping: TableMapping, record: RawRecord): Scope[] {
  let scopes: Scope[] = [{ item: record, parent: null, root: record }];
  for (const key of mapping.each ?? []) {
    const next: Scope[] = [];
    for (const scope of scopes) {
      if (!isRawRecord(scope.item)) continue;
      const value = scope.item[key];
      const items = Array.isArray(value) ? value : value === null || value === undefined ? [] : [value];
      for (const item of items) next.push({ item, parent: scope.item, root: record });
    }
    scopes = next;
  }
  return scopes;
}

function resolvePath(path: string, scope: Scope): unknown {
  if (path === '.') return isRawRecord(scope.item) ? undefined : scope.item;

  let current: unknown = scope.item;
  let rest = path;
  if (path.startsWith('$')) {
    current = scope.root;
    rest = path.slice(1);
  } else if (path.startsWith('^')) {
    current = scope.parent;
    rest = path.slice(1);
  }
  for (const segment of rest.split('.')) {
    if (!isRawRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function resolve(source: FieldSource, scope: Scope): unknown {
  const paths = typeof source === 'string' ? [source] : source;
  for (const path of paths) {
    const value = resolvePath(path, scope);
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

/** Source fields a mapping accounts for at its own fan-out level. */
function knownFields(mapping: TableMapping, table: TargetTable, all: readonly TableMapping[]): Set<string> {
  const known = new Set<string>(table.columns.map((c) => c.name));
  for (const source of Object.values(mapping.fields ?? {})) {
    for (const path of typeof source === 'string' ? [source] : source) {
      if (!/^[$^.]/.test(path)) known.add(path.split('.')[0]);
    }
  }
  for (const field of mapping.ignore ?? []) known.add(field);

  const depth = mapping.each?.length ?? 0;
  for (const other of all) {
    const each = other.each ?? [];
    if (other.source !== mapping.source || each.length <= depth) continue;
    if (each.slice(0, depth).every((key, i) => mapping.each?.[i] === key)) known.add(each[depth]);
  }
  return known;
}

@injectable()
export class Transformer {
  private readonly warnedTables = new Set<string>();

  constructor(
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.TableMappings) private mappings: readonly TableMapping[],
  ) {}

  transformBaseDicts(snapshot: BaseDictSnapshot): TransformResult {
    const users = snapshot.users.some((u) => Number(u.id) === 0)
      ? snapshot.users
      : [...snapshot.users, SYSTEM_USER];
    const recordsOf = (source: MappingSource): RawRecord[] => {
      if (source === 'sessions') return [];
      return source === 'users' ? users : snapshot[source];
    };
    return this.run('base', recordsOf, new KeyIndex());
  }

  transformData(records: RawRecord[], keys: KeyIndex): TransformResult {
    return this.run('data', (source) => (source === 'sessions' ? records : []), keys.extend());
  }

  private mappingFor(table: TargetTable): TableMapping {
    const mapping = this.mappings.find((m) => m.table === table.name);
    if (!mapping) {
      throw new SchemaMismatchError(`No field mapping for table ${table.name}`, { table: table.name });
    }
    const declared = new Set(table.columns.map((c) => c.name));
    const undeclared = Object.keys(mapping.fields ?? {}).filter((name) => !declared.has(name));
    if (undeclared.length > 0) {
      throw new SchemaMismatchError(
        `Mapping for ${table.name} targets undeclared columns: ${undeclared.join(', ')}`,
        { table: table.name, columns: undeclared.join(',') },
      );
    }
    return mapping;
  }

  private run(
    dataClass: DataClass,
    recordsOf: (source: MappingSource) => RawRecord[],
    keys: KeyIndex,
  ): TransformResult {
    for (const mapping of this.mappings) {
      if (!findTable(mapping.table)) {
        throw new SchemaMismatchError(`Mapping targets undeclared table ${mapping.table}`, {
          table: mapping.table,
        });
      }
    }

    const tables: TableRows = new Map();
    const errors: RecordTransformError[] = [];

    for (const table of tablesOf(dataClass)) {
      const mapping = this.mappingFor(table);
      const known = knownFields(mapping, table, this.mappings);
      const unknown = new Set<string>();
      const byKey = new Map<string, { row: NormalizedRow; id: string }>();

      for (const record of recordsOf(mapping.source)) {
        const id = recordId(record);
        for (const scope of expand(mapping, record)) {
          if (isRawRecord(scope.item)) {
            for (const field of Object.keys(scope.item)) if (!known.has(field)) unknown.add(field);
          }
          const row = this.buildRow(table, mapping, scope, id);
          if (row instanceof RecordTransformError) {
            errors.push(row);
            continue;
          }
          const key = JSON.stringify(table.primaryKey.map((c) => row[c]));
          byKey.delete(key);
          byKey.set(key, { row, id });
        }
      }

      const accepted: NormalizedRow[] = [];
      for (const { row, id } of byKey.values()) {
        const unresolved = table.foreignKeys.find((fk) => {
          const values = fk.columns.map((c) => row[c] ?? null);
          return values.every((v) => v !== null) && !keys.has(fk.references, values);
        });
        if (unresolved) {
          errors.push(
            new RecordTransformError(
              `${table.name}: ${unresolved.columns.join(',')} does not resolve to ${unresolved.references}`,
              table.name,
              'unresolved_fk',
              {
                recordId: id,
                references: unresolved.references,
                value: unresolved.columns.map((c) => String(row[c])).join(','),
              },
            ),
          );
          continue;
        }
        keys.add(table.name, table.primaryKey.map((c) => row[c] ?? null));
        accepted.push(row);
      }

      tables.set(table.name, accepted);
      this.warnUnknown(table.name, unknown);
    }

    return { tables, errors, keys };
  }

  private buildRow(
    table: TargetTable,
    mapping: TableMapping,
    scope: Scope,
    id: string,
  ): NormalizedRow | RecordTransformError {
    const row: NormalizedRow = {};
    for (const column of table.columns) {
      const raw = resolve(mapping.fields?.[column.name] ?? column.name, scope);
      const coerced = coerceValue(column, raw);
      if (!coerced.ok) {
        const missingKey = table.primaryKey.includes(column.name) && raw === undefined;
        return new RecordTransformError(
          `${table.name}.${column.name}: ${coerced.reason}`,
          table.name,
          missingKey ? 'missing_key' : 'invalid_field',
          { recordId: id, column: column.name },
        );
      }
      row[column.name] = coerced.value;
    }
    return row;
  }

  private warnUnknown(table: string, fields: Set<string>): void {
    if (fields.size === 0 || this.warnedTables.has(table)) return;
    this.warnedTables.add(table);
    this.log.warn({ table, fields: [...fields].sort() }, 'Source fields not declared for table, not loaded');
  }
}
