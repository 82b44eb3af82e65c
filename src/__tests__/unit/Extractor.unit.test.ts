/**
 * Unit Tests: Extractor
 *
 * Against the in-memory source: half-day slicing, skip/limit paging, the
 * session limit, extra filters, detail enrichment and failure scoping.
 */
import { Extractor, halfDaySlices } from '@application/extract/Extractor';
import type { ExtractOptions } from '@application/extract/Extractor';
import type { RawRecord } from '@domain/entities/RawRecord';
import type { TimeWindow } from '@domain/entities/TimeWindow';
import { AuthError, SourceRequestError, WindowExtractFailure } from '@shared/errors/SyncError';

import { FakeSourceApiClient } from '../helpers/fakes';
import { sessionOn, silentLogger, testConfig } from '../helpers/fixtures';

const DAY: TimeWindow = { start: new Date('2025-03-20T00:00:00Z'), stop: new Date('2025-03-21T00:00:00Z') };
const MORNING = 'date_range,2025-03-20,2025-03-20||00:00,11:59';
const AFTERNOON = 'date_range,2025-03-20,2025-03-20||12:00,23:59';

async function collect(extractor: Extractor, window: TimeWindow, options?: ExtractOptions): Promise<RawRecord[]> {
  const out: RawRecord[] = [];
  for await (const record of extractor.extractData(window, options)) out.push(record);
  return out;
}

function fiveSessions(): RawRecord[] {
  return [1, 2, 3, 4, 5].map((n) => sessionOn('2025-03-20', n, { reviewers: [] }));
}

describe('halfDaySlices', () => {
  it('should cut each UTC day into two date filters', () => {
    expect(halfDaySlices(DAY)).toEqual([MORNING, AFTERNOON]);
  });

  it('should cover the whole day of a window that starts mid-day', () => {
    const window = { start: new Date('2025-03-20T06:00:00Z'), stop: new Date('2025-03-21T00:00:00Z') };

    expect(halfDaySlices(window)).toEqual([MORNING, AFTERNOON]);
  });
});

describe('Extractor', () => {
  let source: FakeSourceApiClient;

  function extractor(env: Record<string, string> = {}): Extractor {
    return new Extractor(source, testConfig({ SYNC_PAGE_LIMIT: '2', ...env }), silentLogger());
  }

  beforeEach(() => {
    source = new FakeSourceApiClient(fiveSessions());
  });

  it('should fetch every base dictionary', async () => {
    const snapshot = await extractor().extractBaseDicts();

    expect(Object.keys(snapshot)).toEqual(['scorecards', 'groups', 'agents', 'users', 'labels', 'categories', 'tags']);
    expect(snapshot.tags).toHaveLength(1);
  });

  it('should page through each slice until a short page', async () => {
    const records = await collect(extractor(), DAY);

    expect(records).toHaveLength(5);
    expect(source.pageCalls).toEqual([
      { filters: MORNING, skip: 0, limit: 2 },
      { filters: MORNING, skip: 2, limit: 2 },
      { filters: MORNING, skip: 4, limit: 2 },
      { filters: AFTERNOON, skip: 0, limit: 2 },
    ]);
  });

  it('should stop at the session limit', async () => {
    const records = await collect(extractor(), DAY, { limit: 3 });

    expect(records).toHaveLength(3);
    expect(source.pageCalls.map((q) => q.skip)).toEqual([0, 2]);
  });

  it('should not call the source for a zero limit', async () => {
    expect(await collect(extractor(), DAY, { limit: 0 })).toEqual([]);
    expect(source.pageCalls).toEqual([]);
  });

  it('should append extra filter clauses to the date filter', async () => {
    await collect(extractor(), DAY, { filters: ['is_scored,manual'] });

    expect(source.pageCalls[0].filters).toBe(`${MORNING}±is_scored,manual`);
  });

  it('should attach scores only to reviewed sessions and summaries when enabled', async () => {
    source.sessions = [sessionOn('2025-03-20', 1), sessionOn('2025-03-20', 2, { reviewers: [] })];

    const [reviewed, unreviewed] = await collect(extractor(), DAY);

    expect(source.detailCalls.filter((c) => c.detail === 'scores').map((c) => c.sessionId)).toEqual([
      '00000000-0000-4000-8000-000000000001',
    ]);
    expect(reviewed.scores).toEqual(source.sessions[0].scores);
    expect(unreviewed.scores).toEqual([]);
    expect(unreviewed.summary).toEqual(source.sessions[1].summary);
  });

  it('should fetch comments only when enabled and present', async () => {
    const comment = { id: 1, author_id: 3, text: 'check this' };
    source.sessions = [
      sessionOn('2025-03-20', 1, { comments_count: 1, comments: [comment] }),
      sessionOn('2025-03-20', 2, { comments_count: 0 }),
    ];

    const [withComments, without] = await collect(extractor({ SYNC_FETCH_COMMENTS: 'true' }), DAY);

    expect(withComments.comments).toEqual([comment]);
    expect(without.comments).toEqual([]);
    expect(source.detailCalls.filter((c) => c.detail === 'comments')).toHaveLength(1);
  });

  it('should skip details that are turned off', async () => {
    await collect(extractor({ SYNC_FETCH_SUMMARIES: 'false' }), DAY);

    expect(source.detailCalls.some((c) => c.detail === 'summary')).toBe(false);
  });

  it('should keep a session whose detail call fails', async () => {
    source.sessions = [sessionOn('2025-03-20', 1)];
    source.failDetail = (_id, detail) => (detail === 'scores' ? new SourceRequestError('Source API returned 404') : undefined);

    const [record] = await collect(extractor(), DAY);

    expect(record.scores).toEqual([]);
    expect(record.summary).toEqual(source.sessions[0].summary);
  });

  it('should turn a page failure into a window failure with the window bounds', async () => {
    source.failPage = (query) => (query.skip === 2 ? new SourceRequestError('Source API returned 400') : undefined);

    const error = await collect(extractor(), DAY).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WindowExtractFailure);
    if (!(error instanceof WindowExtractFailure)) return;
    expect(error.message).toBe('Extraction failed for window: Source API returned 400');
    expect(error.context).toEqual({
      windowStart: '2025-03-20T00:00:00.000Z',
      windowStop: '2025-03-21T00:00:00.000Z',
      filters: MORNING,
      skip: 2,
    });
  });

  it('should let an authentication failure through unchanged', async () => {
    source.failPage = () => new AuthError('Source API rejected credentials (401)');

    await expect(collect(extractor(), DAY)).rejects.toBeInstanceOf(AuthError);
  });

  it('should not swallow an authentication failure on a detail call', async () => {
    source.sessions = [sessionOn('2025-03-20', 1)];
    source.failDetail = () => new AuthError('Source API rejected credentials (403)');

    await expect(collect(extractor(), DAY)).rejects.toBeInstanceOf(AuthError);
  });
});
