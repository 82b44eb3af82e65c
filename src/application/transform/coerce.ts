/**
 * Column Coercion
 * Layer: Application
 *
 * Turns one raw source value into the value stored for a declared column.
 * `null` and `undefined` become null; a non-nullable column then takes its
 * fallback or fails. Every other value must parse as the column's semantic
 * type, or the row it belongs to is rejected.
 *
 * Timestamps come back as UTC ISO-8601 strings rounded to the second. A
 * source timestamp without an offset is read as UTC. Dates before 1900 are
 * placeholders in the source ("0001-01-01T00:00:00" means "unknown") and are
 * replaced by the column fallback, or null.
 */
import type { ColumnValue, JsonValue } from '@domain/entities/NormalizedRow';
import type { ColumnDef } from '@domain/schema/TargetTable';

export type Coerced = { ok: true; value: ColumnValue } | { ok: false; reason: string };

const MIN_YEAR = 1900;

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const TRUE_STRINGS = new Set(['true', '1', 'yes', 't', 'y']);
const FALSE_STRINGS = new Set(['false', '0', 'no', 'f', 'n']);

const ok = (value: ColumnValue): Coerced => ({ ok: true, value });
const fail = (reason: string): Coerced => ({ ok: false, reason });

/** Offset in minutes east of UTC for `Z`, `+02`, `+0200` or `-05:30`. */
function parseOffset(raw: string | undefined): number {
  if (!raw || raw.toUpperCase() === 'Z') return 0;
  const sign = raw.startsWith('-') ? -1 : 1;
  const digits = raw.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Milliseconds since the epoch, rounded to the second, or `'out_of_range'`
 * for dates before 1900, or null when the string is not a timestamp.
 */
export function parseTimestamp(raw: string): number | 'out_of_range' | null {
  const match = ISO_TIMESTAMP.exec(raw.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (year < MIN_YEAR) return 'out_of_range';

  const fractionMs = frac ? Number(`0.${frac}`) * 1000 : 0;
  const utcMs =
    Date.UTC(year, month - 1, day, hour, minute, second) +
    fractionMs -
    parseOffset(offset) * 60_000;
  if (new Date(utcMs).getUTCFullYear() < MIN_YEAR) return 'out_of_range';
  return Math.round(utcMs / 1000) * 1000;
}

function coerceTimestamp(column: ColumnDef, value: unknown): Coerced {
  let ms: number | 'out_of_range' | null = null;
  if (value instanceof Date) {
    ms = Number.isNaN(value.getTime()) ? null : Math.round(value.getTime() / 1000) * 1000;
    if (ms !== null && value.getUTCFullYear() < MIN_YEAR) ms = 'out_of_range';
  } else if (typeof value === 'string') {
    ms = parseTimestamp(value);
  }

  if (ms === 'out_of_range') return finish(column, null);
  if (ms === null) return fail(`not a timestamp: ${String(value)}`);
  return ok(new Date(ms).toISOString());
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function coerceBoolean(value: unknown): Coerced {
  if (typeof value === 'boolean') return ok(value);
  if (value === 0 || value === 1) return ok(value === 1);
  if (typeof value === 'string') {
    const s = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(s)) return ok(true);
    if (FALSE_STRINGS.has(s)) return ok(false);
  }
  return fail(`not a boolean: ${String(value)}`);
}

function coerceText(column: ColumnDef, value: unknown): Coerced {
  if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
    return fail('not a scalar');
  }
  const text = String(value);
  return ok(column.length !== undefined ? text.slice(0, column.length) : text);
}

/** Deep copy restricted to JSON values; undefined when something is not representable. */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const json = toJsonValue(item);
      if (json === undefined) return undefined;
      items.push(json);
    }
    return items;
  }
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      const json = toJsonValue(item);
      if (json === undefined) return undefined;
      out[key] = json;
    }
    return out;
  }
  return undefined;
}

function finish(column: ColumnDef, value: ColumnValue): Coerced {
  if (value !== null || column.nullable) return ok(value);
  if (column.fallback !== undefined) return ok(column.fallback);
  return fail('required value is missing');
}

export function coerceValue(column: ColumnDef, value: unknown): Coerced {
  if (value === null || value === undefined) return finish(column, null);

  switch (column.type) {
    case 'timestamp':
      return coerceTimestamp(column, value);

    case 'integer': {
      if (value === '') return finish(column, null);
      const n = toNumber(value);
      if (n === null || !Number.isInteger(n)) return fail(`not an integer: ${String(value)}`);
      return ok(n);
    }

    case 'float': {
      if (value === '') return finish(column, null);
      const n = toNumber(value);
      return n === null ? fail(`not a number: ${String(value)}`) : ok(n);
    }

    case 'boolean':
      return coerceBoolean(value);

    case 'string':
    case 'text':
      return coerceText(column, value);

    case 'uuid':
      if (typeof value === 'string' && UUID.test(value.trim())) {
        return ok(value.trim().toLowerCase());
      }
      return fail(`not a uuid: ${String(value)}`);

    case 'enum': {
      if (typeof value !== 'string') return fail('enum value is not a string');
      const wanted = value.trim().toLowerCase();
      const match = column.values?.find((v) => v.toLowerCase() === wanted);
      return match === undefined ? fail(`unknown ${column.name}: ${value}`) : ok(match);
    }

    case 'json': {
      const json = toJsonValue(value);
      return json === undefined ? fail('not JSON-serializable') : ok(json);
    }
  }
}
