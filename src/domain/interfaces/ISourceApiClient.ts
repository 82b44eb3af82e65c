/**
 * Source API Client Interface
 * Layer: Domain
 * Pattern: Port (implemented by infrastructure/source/AnalyticsApiClient)
 *
 * The Extractor only knows these three calls. Implementations classify
 * failures into the sync error taxonomy: 401/403 as AuthError, retries
 * exhausted as TransientExtractError, any other non-2xx as
 * SourceRequestError. That classification is what lets the Run Controller
 * decide between aborting the run and moving on to the next window.
 */
import type { BaseDictKind, RawRecord, SessionDetail } from '@domain/entities/RawRecord';

export interface SessionPageQuery {
  /** Source filter expression, e.g. `date_range,2025-03-20,2025-03-20||00:00,11:59`. */
  filters: string;
  skip: number;
  limit: number;
}

export interface ISourceApiClient {
  /** Full listing of one base dictionary. */
  listBaseDict(kind: BaseDictKind): Promise<RawRecord[]>;

  /** One page of sessions. A page shorter than `limit` is the last one. */
  listSessions(query: SessionPageQuery): Promise<RawRecord[]>;

  /** Detail payload for one session: scores and comments are lists, a summary may be a single object. */
  getSessionDetail(sessionId: string, detail: SessionDetail): Promise<RawRecord[] | RawRecord | null>;
}
