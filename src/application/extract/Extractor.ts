/**
 * Extractor
 * Layer: Application
 *
 * Base dictionaries are fetched whole, once per run. Sessions are pulled
 * lazily per window: the window is cut into half-day slices (the source
 * cannot page reliably through a full busy day), and each slice is paged
 * with skip/limit until a short page arrives or the record limit is hit.
 *
 * Each session gets its detail payloads attached before it is yielded:
 * `scores` when it has reviewers, `summary` and `comments` when enabled.
 * A detail call that fails for any reason other than authentication is
 * logged and the session is kept without that detail.
 *
 * A failure while paging ends the window: AuthError passes through (it is
 * fatal to the run), anything else becomes a WindowExtractFailure carrying
 * the window bounds. Nothing is persisted, so re-running a window re-fetches
 * it from the start.
 */
import { inject, injectable } from 'tsyringe';
import { TOKENS } from '@core/types';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { BASE_DICT_KINDS, recordId } from '@domain/entities/RawRecord';
import type { BaseDictSnapshot, RawRecord, SessionDetail } from '@domain/entities/RawRecord';
import { toDateString, windowContext } from '@domain/entities/TimeWindow';
import type { TimeWindow } from '@domain/entities/TimeWindow';
import type { ISourceApiClient } from '@domain/interfaces/ISourceApiClient';
import { AuthError, WindowExtractFailure, describeError } from '@shared/errors/SyncError';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Separator the source uses between filter clauses. */
export const FILTER_SEPARATOR = '±';

export interface ExtractOptions {
  /** Stop after this many sessions. */
  limit?: number;
  /** Extra filter clauses, appended to the date filter. */
  filters?: string[];
}

/** Date filters for the half-day slices of every UTC day the window touches. */
export function halfDaySlices(window: TimeWindow): string[] {
  const slices: string[] = [];
  const firstDay = Date.UTC(
    window.start.getUTCFullYear(),
    window.start.getUTCMonth(),
    window.start.getUTCDate(),
  );
  for (let day = firstDay; day < window.stop.getTime(); day += DAY_MS) {
    const date = toDateString(new Date(day));
    slices.push(`date_range,${date},${date}||00:00,11:59`);
    slices.push(`date_range,${date},${date}||12:00,23:59`);
  }
  return slices;
}

@injectable()
export class Extractor {
  constructor(
    @inject(TOKENS.SourceApiClient) private client: ISourceApiClient,
    @inject(TOKENS.Config) private cfg: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async extractBaseDicts(): Promise<BaseDictSnapshot> {
    const snapshot: BaseDictSnapshot = {
      scorecards: [],
      groups: [],
      agents: [],
      users: [],
      labels: [],
      categories: [],
      tags: [],
    };
    for (const kind of BASE_DICT_KINDS) {
      snapshot[kind] = await this.client.listBaseDict(kind);
      this.log.info({ kind, count: snapshot[kind].length }, 'Base dictionary extracted');
    }
    return snapshot;
  }

  async *extractData(window: TimeWindow, options: ExtractOptions = {}): AsyncGenerator<RawRecord> {
    const { limit, filters = [] } = options;
    const pageLimit = limit !== undefined ? Math.min(this.cfg.sync.pageLimit, limit) : this.cfg.sync.pageLimit;
    if (limit !== undefined && limit <= 0) return;
    let yielded = 0;

    for (const slice of halfDaySlices(window)) {
      const filter = [slice, ...filters].join(FILTER_SEPARATOR);
      for (let skip = 0; ; ) {
        const page = await this.fetchPage(window, filter, skip, pageLimit);
        this.log.debug({ filter, skip, count: page.length }, 'Sessions page fetched');

        for (const session of page) {
          yield await this.attachDetails(session);
          yielded += 1;
          if (yielded % this.cfg.sync.logEvery === 0) {
            this.log.info({ ...windowContext(window), extracted: yielded }, 'Extraction progress');
          }
          if (limit !== undefined && yielded >= limit) {
            this.log.info({ ...windowContext(window), limit }, 'Session limit reached, stopping extraction');
            return;
          }
        }
        if (page.length < pageLimit) break;
        skip += page.length;
      }
    }
  }

  private async fetchPage(
    window: TimeWindow,
    filters: string,
    skip: number,
    limit: number,
  ): Promise<RawRecord[]> {
    try {
      return await this.client.listSessions({ filters, skip, limit });
    } catch (err) {
      if (err instanceof AuthError) throw err;
      throw new WindowExtractFailure(
        `Extraction failed for window: ${describeError(err)}`,
        { ...windowContext(window), filters, skip },
        err,
      );
    }
  }

  private async attachDetails(session: RawRecord): Promise<RawRecord> {
    const { fetchSummaries, fetchComments } = this.cfg.sync;
    const reviewers = session.reviewers;
    const commentsCount = Number(session.comments_count ?? 0);

    const enriched: RawRecord = { ...session, scores: [], summary: [], comments: [] };
    if (Array.isArray(reviewers) && reviewers.length > 0) {
      enriched.scores = await this.detail(session, 'scores');
    }
    if (fetchSummaries) enriched.summary = await this.detail(session, 'summary');
    if (fetchComments && commentsCount > 0) enriched.comments = await this.detail(session, 'comments');
    return enriched;
  }

  private async detail(
    session: RawRecord,
    detail: SessionDetail,
  ): Promise<RawRecord[] | RawRecord> {
    const id = recordId(session);
    try {
      return (await this.client.getSessionDetail(id, detail)) ?? [];
    } catch (err) {
      if (err instanceof AuthError) throw err;
      this.log.error({ sessionId: id, detail, err: describeError(err) }, 'Session detail not loaded');
      return [];
    }
  }
}
