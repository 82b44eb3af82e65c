/**
 * Test Fixtures
 * Layer: Test Helpers
 *
 * One small, consistent world: scorecard 1 (category 10, points 100 and
 * 101), group 5, agent 7, reviewer user 3, label 20, category 30 and tag 40,
 * plus a session that references all of them. Timestamps are fixed.
 */
import pino from 'pino';
import { parseEnv } from '@core/config';
import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import type { BaseDictSnapshot, RawRecord } from '@domain/entities/RawRecord';

export const SESSION_ID = '0b7c1e9a-3f5d-4c2e-9a1b-2d3e4f5a6b7c';

/** Config for tests: fast retries, refresh pass off, token auth. */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return parseEnv({
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
    ET_DOMAIN: 'analytics.test',
    ET_TOKEN: 'test-token',
    EXTRACT_RETRY_ATTEMPTS: '3',
    EXTRACT_RETRY_BASE_MS: '1',
    EXTRACT_RETRY_MAX_MS: '5',
    LOAD_RETRY_BASE_MS: '0',
    SYNC_REFRESH_DAYS: '0',
    ...overrides,
  });
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function sampleSnapshot(): BaseDictSnapshot {
  return {
    scorecards: [
      {
        id: 1,
        name: 'Support QA',
        type: 'manual',
        na_behavior: 'skip',
        is_automated: false,
        is_default: true,
        is_archived: false,
        team_ids: [5],
        categories: [
          {
            id: 10,
            name: 'Greeting',
            sort_order: 1,
            points: [
              { id: 100, name: 'Said hello', critical: false, max_score: 5, sort_order: 1 },
              { id: 101, name: 'Used the name', critical: true, max_score: 5, sort_order: 2 },
            ],
          },
        ],
      },
    ],
    groups: [{ id: 5, name: 'Tier 1', scorecard_id: 1, is_default: true }],
    agents: [
      { id: 7, name: 'Agent Seven', phone_number: '100', is_active: true, deactivated_at: null, groups: [5] },
    ],
    users: [
      {
        id: 3,
        email: 'reviewer@example.com',
        is_active: true,
        is_superuser: false,
        full_name: 'Reviewer Three',
        agent_id: 7,
        agent_group_id: 5,
      },
    ],
    labels: [{ id: 20, text: 'billing', color: '#ffffff' }],
    categories: [
      {
        id: 30,
        name: 'Refunds',
        position: 1,
        created_at: '2025-01-01T00:00:00Z',
        updated_at: '2025-01-02T00:00:00Z',
        labels: [{ id: 20, text: 'billing' }],
      },
    ],
    tags: [{ id: 40, name: 'refund request', type: 'phrase', team_id: 5, is_archived: false, labels: [20] }],
  };
}

/** A session as the list endpoint returns it, with its detail payloads inline. */
export function sampleSession(overrides: RawRecord = {}): RawRecord {
  return {
    id: SESSION_ID,
    type: 'CALL',
    start_dt: '2025-03-20T10:15:45.678',
    updated_at: '2025-03-20T11:00:00Z',
    direction: 'inbound',
    agent_id: 7,
    group_id: 5,
    duration: 125.5,
    comments_count: 0,
    is_processed: true,
    duration_details: { talk: 100, hold: 25.5 },
    tags: [
      {
        id: 40,
        match: [{ transcript_id: 1, score: 0.92, matched_corpus_text: 'I want a refund', is_agent: false }],
      },
    ],
    categories: [30],
    reviewers: [{ id: 3, last_reviewed_at: '2025-03-20T12:00:00Z' }],
    crm_statuses: ['won'],
    scores: [
      {
        scorecard_id: 1,
        reviewer_id: 3,
        point_scores: [
          { point_id: 100, score: 4 },
          { point_id: 101, score: 5, comment: 'good' },
        ],
      },
    ],
    summary: { text: 'Customer asked for a refund.', created_at: '2025-03-20T12:05:00Z' },
    comments: [],
    ...overrides,
  };
}

/** A session with its own id on the given day; `n` keeps ids unique. */
export function sessionOn(day: string, n: number, overrides: RawRecord = {}): RawRecord {
  const suffix = String(n).padStart(12, '0');
  return sampleSession({
    id: `00000000-0000-4000-8000-${suffix}`,
    start_dt: `${day}T09:00:00Z`,
    ...overrides,
  });
}
