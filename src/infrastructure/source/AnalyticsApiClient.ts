/**
 * Analytics API Client
 * Layer: Infrastructure
 * Pattern: Adapter (implements ISourceApiClient)
 *
 * Native fetch with a per-request timeout, wrapped in the shared bounded
 * retry. Responses are classified before they leave this file:
 *
 *   network error, timeout, 429, 5xx  TransientExtractError (retried)
 *   401, 403                          AuthError (never retried)
 *   any other non-2xx, bad payload    SourceRequestError (never retried)
 *
 * When retries run out the last TransientExtractError is rethrown; the
 * Extractor turns it into a window-level failure. Payloads are checked with
 * zod: list endpoints answer with an array or with `{ items: [...] }`.
 */
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';
import { TOKENS } from '@core/types';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { BaseDictKind, RawRecord, SessionDetail } from '@domain/entities/RawRecord';
import type { ISourceApiClient, SessionPageQuery } from '@domain/interfaces/ISourceApiClient';
import { AppError } from '@shared/errors/AppError';
import {
  AuthError,
  SourceRequestError,
  TransientExtractError,
  describeError,
} from '@shared/errors/SyncError';
import { retry } from '@shared/retry';

const recordSchema = z.record(z.string(), z.unknown());
const listSchema = z.union([z.array(recordSchema), z.object({ items: z.array(recordSchema) })]);

type QueryParams = Record<string, string | number>;

const BASE_DICT_ENDPOINTS: Record<BaseDictKind, { path: string; params?: QueryParams }> = {
  agents: { path: '/agents', params: { limit: 999 } },
  groups: { path: '/agent-groups' },
  users: { path: '/users', params: { limit: 999 } },
  categories: { path: '/categories' },
  labels: { path: '/labels' },
  scorecards: { path: '/scorecards' },
  tags: { path: '/tags', params: { limit: 9999 } },
};

/** `https://<domain>/api/v1`; a domain given with a scheme keeps it. */
export function apiBaseUrl(domain: string): string {
  const origin = /^https?:\/\//i.test(domain) ? domain : `https://${domain}`;
  return `${origin.replace(/\/+$/, '')}/api/v1`;
}

function unwrapList(payload: z.infer<typeof listSchema>): RawRecord[] {
  return Array.isArray(payload) ? payload : payload.items;
}

@injectable()
export class AnalyticsApiClient implements ISourceApiClient {
  constructor(
    @inject(TOKENS.Config) private cfg: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async listBaseDict(kind: BaseDictKind): Promise<RawRecord[]> {
    const { path, params } = BASE_DICT_ENDPOINTS[kind];
    const payload = await this.getJson(path, params);
    return unwrapList(this.parse(listSchema, payload, path));
  }

  async listSessions(query: SessionPageQuery): Promise<RawRecord[]> {
    const payload = await this.getJson('/sessions', {
      skip: query.skip,
      limit: query.limit,
      filters: query.filters,
    });
    return unwrapList(this.parse(listSchema, payload, '/sessions'));
  }

  async getSessionDetail(
    sessionId: string,
    detail: SessionDetail,
  ): Promise<RawRecord[] | RawRecord | null> {
    const path = `/sessions/${encodeURIComponent(sessionId)}/${detail}`;
    const payload = await this.getJson(path);
    if (payload === null) return null;
    const list = listSchema.safeParse(payload);
    if (list.success) return unwrapList(list.data);
    return this.parse(recordSchema, payload, path);
  }

  private parse<T extends z.ZodType>(schema: T, payload: unknown, path: string): z.infer<T> {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new SourceRequestError(`Unexpected response shape from ${path}`, { path });
    }
    return result.data;
  }

  private authHeader(): string {
    const { authByToken, token, user, password } = this.cfg.source;
    if (authByToken) {
      if (!token) throw new AuthError('ET_TOKEN is required when ET_AUTH_BY_TOKEN is true');
      return `Bearer ${token}`;
    }
    if (!user || !password) {
      throw new AuthError('ET_USER and ET_PASSWORD are required when ET_AUTH_BY_TOKEN is false');
    }
    return `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
  }

  private async getJson(path: string, params: QueryParams = {}): Promise<unknown> {
    const { domain, timeoutMs, retry: policy } = this.cfg.source;
    if (!domain) throw new AppError('ET_DOMAIN is not configured', 500, false);

    const url = new URL(apiBaseUrl(domain) + path);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, String(value));
    const requestUrl = `${url.pathname}${url.search}`;
    const authorization = this.authHeader();

    const doFetch = async (): Promise<unknown> => {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      let res: Response;
      try {
        res = await fetch(url, {
          headers: { Authorization: authorization, Accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (err) {
        const reason = controller.signal.aborted ? `timeout after ${timeoutMs}ms` : describeError(err);
        throw new TransientExtractError(`Source request failed: ${reason}`, { url: requestUrl });
      } finally {
        clearTimeout(timeout);
      }

      if (!res.ok) {
        await res.text().catch(() => '');
        const context = { url: requestUrl, status: res.status };
        if (res.status === 401 || res.status === 403) {
          throw new AuthError(`Source API rejected credentials (${res.status})`, context);
        }
        if (res.status === 429 || res.status >= 500) {
          const retryAfter = res.headers.get('retry-after');
          const delayMs = retryAfter && /^\d+$/.test(retryAfter) ? Number(retryAfter) * 1000 : undefined;
          throw new TransientExtractError(`Source API returned ${res.status}`, context, delayMs);
        }
        throw new SourceRequestError(`Source API returned ${res.status}`, context);
      }

      try {
        return await res.json();
      } catch (err) {
        throw new SourceRequestError(`Invalid JSON from source API: ${describeError(err)}`, {
          url: requestUrl,
        });
      }
    };

    this.log.debug({ url: requestUrl }, 'Source request');
    return retry(doFetch, policy, {
      shouldRetry: (err) =>
        err instanceof TransientExtractError ? { retry: true, delayMs: err.retryDelayMs } : false,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
        this.log.warn(
          { url: requestUrl, attempt, maxAttempts, delayMs, err: describeError(error) },
          'Source request failed, retrying',
        );
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        if (error instanceof TransientExtractError) {
          this.log.error(
            { url: requestUrl, attempt, maxAttempts, err: describeError(error) },
            'Source request retries exhausted',
          );
        }
      },
    });
  }
}
