/**
 * Integration Tests: Relational Sink and Watermark Store
 *
 * Runs against an in-memory SQLite database through better-sqlite3, the
 * same Knex code path the sync takes with a sqlite:// DATABASE_URL.
 */
import knex from 'knex';
import type { Knex } from 'knex';
import { SCHEMA_REGISTRY } from '@domain/schema/registry';
import type { TargetTable } from '@domain/schema/TargetTable';
import { knexConfigFor } from '@infrastructure/database/connection';
import { KnexSink } from '@infrastructure/sinks/KnexSink';
import { KnexWatermarkStore, WATERMARK_TABLE } from '@infrastructure/watermark/KnexWatermarkStore';
import { SchemaMismatchError, WindowLoadFailure } from '@shared/errors/SyncError';

import { silentLogger, testConfig } from '../helpers/fixtures';

const labels: TargetTable = {
  name: 'labels',
  dataClass: 'base',
  primaryKey: ['id'],
  columns: [
    { name: 'id', type: 'integer', nullable: false },
    { name: 'text', type: 'string', nullable: true },
  ],
  foreignKeys: [],
};

const tagLabels: TargetTable = {
  name: 'tag_labels',
  dataClass: 'base',
  primaryKey: ['tag_id', 'label_id'],
  columns: [
    { name: 'tag_id', type: 'integer', nullable: false },
    { name: 'label_id', type: 'integer', nullable: false },
  ],
  foreignKeys: [],
};

const events: TargetTable = {
  name: 'events',
  dataClass: 'data',
  primaryKey: ['id'],
  columns: [
    { name: 'id', type: 'uuid', nullable: false },
    { name: 'kind', type: 'enum', nullable: true, values: ['call', 'chat'] },
    { name: 'is_processed', type: 'boolean', nullable: true },
    { name: 'score', type: 'float', nullable: true },
    { name: 'details', type: 'json', nullable: true },
    { name: 'start_dt', type: 'timestamp', nullable: false },
  ],
  foreignKeys: [],
};

const EVENT_A = '00000000-0000-4000-8000-00000000000a';

describe('KnexSink', () => {
  let db: Knex;

  function sink(env: Record<string, string> = {}): KnexSink {
    return new KnexSink(db, testConfig(env), silentLogger());
  }

  async function count(table: string): Promise<number> {
    return (await db(table).select()).length;
  }

  beforeEach(() => {
    db = knex(knexConfigFor('sqlite::memory:', { min: 1, max: 1 }));
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should create every missing table, and do nothing the second time', async () => {
    const target = sink();

    await target.ensureSchema([labels, tagLabels, events]);
    await target.ensureSchema([labels, tagLabels, events]);

    expect(await db.schema.hasTable('labels')).toBe(true);
    expect(await db.schema.hasTable('tag_labels')).toBe(true);
    expect(Object.keys(await db('events').columnInfo()).sort()).toEqual([
      'details',
      'id',
      'is_processed',
      'kind',
      'score',
      'start_dt',
    ]);
  });

  it('should declare the registry foreign keys on the tables it creates', async () => {
    await sink().ensureSchema(SCHEMA_REGISTRY);

    const foreignKeys = async (table: string): Promise<string[]> => {
      const rows: Array<{ table: string; from: string; to: string }> = await db.raw(
        `PRAGMA foreign_key_list('${table}')`,
      );
      return rows.map((r) => `${r.from} -> ${r.table}.${r.to}`).sort();
    };

    expect(await foreignKeys('sessions_tags')).toEqual(['session_id -> sessions.id', 'tag_id -> tags.id']);
    expect(await foreignKeys('sessions_scores')).toEqual([
      'reviewer_id -> users.id',
      'scorecard_id -> scorecard_points.scorecard_id',
      'scorecard_id -> scorecards.id',
      'scorecard_point_id -> scorecard_points.id',
      'session_id -> sessions.id',
    ]);
    expect(await foreignKeys('labels')).toEqual([]);
  });

  it('should overwrite a row with the same primary key', async () => {
    const target = sink();
    await target.ensureSchema([labels]);

    await target.upsert(labels, [{ id: 20, text: 'billing' }]);
    await expect(target.upsert(labels, [{ id: 20, text: 'invoices' }])).resolves.toBe(1);

    expect(await db('labels').select()).toEqual([{ id: 20, text: 'invoices' }]);
  });

  it('should keep one row per key when every column is part of the key', async () => {
    const target = sink();
    await target.ensureSchema([tagLabels]);

    await target.upsert(tagLabels, [
      { tag_id: 40, label_id: 20 },
      { tag_id: 40, label_id: 21 },
    ]);
    await target.upsert(tagLabels, [{ tag_id: 40, label_id: 20 }]);

    expect(await count('tag_labels')).toBe(2);
  });

  it('should store JSON as text and booleans as integers', async () => {
    const target = sink();
    await target.ensureSchema([events]);

    await target.upsert(events, [
      {
        id: EVENT_A,
        kind: 'call',
        is_processed: true,
        score: 4.5,
        details: { talk: 100, hold: [1, 2] },
        start_dt: '2025-03-20T10:15:45.678Z',
      },
    ]);

    expect(await db('events').where({ id: EVENT_A }).first()).toEqual({
      id: EVENT_A,
      kind: 'call',
      is_processed: 1,
      score: 4.5,
      details: '{"talk":100,"hold":[1,2]}',
      start_dt: '2025-03-20T10:15:45.678Z',
    });
  });

  it('should return zero for an empty batch', async () => {
    await expect(sink().upsert(labels, [])).resolves.toBe(0);
  });

  it('should write more rows than one chunk holds', async () => {
    const target = sink({ SYNC_BATCH_SIZE: '2' });
    await target.ensureSchema([labels]);

    const rows = [1, 2, 3, 4, 5].map((id) => ({ id, text: `label ${id}` }));
    await expect(target.upsert(labels, rows)).resolves.toBe(5);

    expect(await count('labels')).toBe(5);
  });

  it('should reject loads into an existing table that lacks declared columns', async () => {
    await db.schema.createTable('labels', (t) => {
      t.integer('id').primary();
    });
    const target = sink();
    await target.ensureSchema([labels, tagLabels]);

    await expect(target.upsert(labels, [{ id: 20, text: 'billing' }])).rejects.toThrow(
      new SchemaMismatchError('Table labels is missing columns: text'),
    );
    await expect(target.upsert(tagLabels, [{ tag_id: 40, label_id: 20 }])).resolves.toBe(1);
  });

  it('should reject rows that carry undeclared columns', async () => {
    const target = sink();
    await target.ensureSchema([labels]);

    await expect(target.upsert(labels, [{ id: 20, text: 'billing', color: 'red' }])).rejects.toThrow(
      'Rows for labels carry undeclared columns: color',
    );
    expect(await count('labels')).toBe(0);
  });

  it('should keep committed chunks, roll back the failed one and report the window load failure', async () => {
    const target = sink({ SYNC_BATCH_SIZE: '2' });
    await target.ensureSchema([events]);
    const row = (n: number, start: string | null) => ({
      id: `00000000-0000-4000-8000-00000000000${n}`,
      kind: 'chat',
      is_processed: false,
      score: null,
      details: null,
      start_dt: start,
    });

    await expect(
      target.upsert(events, [
        row(1, '2025-03-20T10:00:00.000Z'),
        row(2, '2025-03-20T11:00:00.000Z'),
        row(3, '2025-03-20T12:00:00.000Z'),
        row(4, null),
      ]),
    ).rejects.toThrow(WindowLoadFailure);
    expect(await db('events').select('id').orderBy('id')).toEqual([
      { id: '00000000-0000-4000-8000-000000000001' },
      { id: '00000000-0000-4000-8000-000000000002' },
    ]);
  });
});

describe('KnexWatermarkStore', () => {
  let db: Knex;

  beforeEach(() => {
    db = knex(knexConfigFor('sqlite::memory:', { min: 1, max: 1 }));
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('should read null from a fresh database and create its table', async () => {
    const store = new KnexWatermarkStore(db, silentLogger());

    await expect(store.read()).resolves.toBeNull();
    expect(await db.schema.hasTable(WATERMARK_TABLE)).toBe(true);
  });

  it('should keep a single row that moves forward', async () => {
    const store = new KnexWatermarkStore(db, silentLogger());

    await store.write(new Date('2025-03-21T00:00:00Z'));
    await store.write(new Date('2025-03-22T00:00:00Z'));

    await expect(store.read()).resolves.toEqual(new Date('2025-03-22T00:00:00Z'));
    expect(await db(WATERMARK_TABLE).select()).toEqual([{ name: 'sessions', stop: '2025-03-22T00:00:00.000Z' }]);
  });
});
