/**
 * Raw Source Records
 * Layer: Domain
 *
 * A RawRecord is one entity instance exactly as the source API returned it.
 * No key order or field set is assumed; the Transformer validates each
 * record against the declared columns of the tables it maps to.
 *
 * Base dictionaries are fetched whole on every run and keyed by their `id`.
 * Data records are sessions (conversations) with nested tag matches,
 * categories, reviewers and CRM statuses, plus the detail payloads the
 * Extractor attaches under `scores`, `summary` and `comments`.
 */
export type RawRecord = Record<string, unknown>;

export const BASE_DICT_KINDS = [
  'scorecards',
  'groups',
  'agents',
  'users',
  'labels',
  'categories',
  'tags',
] as const;

export type BaseDictKind = (typeof BASE_DICT_KINDS)[number];

export type BaseDictSnapshot = Record<BaseDictKind, RawRecord[]>;

/** Per-session detail endpoints; the payload is stored under the same key. */
export type SessionDetail = 'scores' | 'summary' | 'comments';

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Identifier used in logs and record-level errors. */
export function recordId(record: RawRecord): string {
  const id = record.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : 'unknown';
}
