/**
 * Unit Tests: File Sink
 *
 * Writes into a fresh temp directory per test.
 */
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { deserialize } from 'node:v8';
import type { TargetTable } from '@domain/schema/TargetTable';
import { FileSink } from '@infrastructure/sinks/FileSink';

import { silentLogger } from '../helpers/fixtures';

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
const tags: TargetTable = { ...labels, name: 'tags' };

const clock = () => new Date('2025-03-20T10:15:45.123Z');

describe('FileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'file-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write one JSON artifact with every row appended in order', async () => {
    const sink = new FileSink('json', dir, silentLogger(), clock);
    await sink.ensureSchema([labels, tags]);

    await expect(sink.upsert(labels, [{ id: 1, text: 'a' }])).resolves.toBe(1);
    await sink.upsert(labels, [{ id: 1, text: 'b' }, { id: 2, text: 'c' }]);
    await sink.close();

    const file = path.resolve(dir, 'sync-2025-03-20T10-15-45-123Z.json');
    expect(sink.lastArtifact).toBe(file);
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
      labels: [
        { id: 1, text: 'a' },
        { id: 1, text: 'b' },
        { id: 2, text: 'c' },
      ],
      tags: [],
    });
  });

  it('should write a v8 artifact that deserializes to the same tables', async () => {
    const sink = new FileSink('v8', dir, silentLogger(), clock);
    await sink.ensureSchema([labels]);
    await sink.upsert(labels, [{ id: 20, text: 'billing' }]);
    await sink.close();

    expect(sink.lastArtifact).toBe(path.resolve(dir, 'sync-2025-03-20T10-15-45-123Z.v8'));
    const content: unknown = deserialize(await readFile(path.resolve(dir, 'sync-2025-03-20T10-15-45-123Z.v8')));
    expect(content).toEqual({ labels: [{ id: 20, text: 'billing' }] });
  });

  it('should create the output directory when it is missing', async () => {
    const nested = path.join(dir, 'runs', 'daily');
    const sink = new FileSink('json', nested, silentLogger(), clock);
    await sink.ensureSchema([labels]);
    await sink.close();

    expect(await readdir(nested)).toEqual(['sync-2025-03-20T10-15-45-123Z.json']);
  });

  it('should start empty again after close', async () => {
    const sink = new FileSink('json', dir, silentLogger(), clock);
    await sink.upsert(labels, [{ id: 1, text: 'a' }]);
    await sink.close();
    await sink.close();

    const file = path.resolve(dir, 'sync-2025-03-20T10-15-45-123Z.json');
    expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({});
  });
});
