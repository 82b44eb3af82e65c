/**
 * Schema Registry
 * Layer: Domain
 *
 * Every table the sync owns, in dependency order: a table only references
 * tables declared above it. The Transformer resolves keys in this order and
 * the sinks create and load tables in this order.
 *
 * Association tables have no surrogate id; their natural columns form the
 * primary key, so an upsert is always keyed by values that come from the
 * source and re-running a window lands on the same rows.
 */
import type { ColumnDef, DataClass, ForeignKey, SemanticType, TargetTable } from './TargetTable';

interface ColumnOptions {
  nullable?: boolean;
  values?: readonly string[];
  length?: number;
  fallback?: string;
}

function col(name: string, type: SemanticType, options: ColumnOptions = {}): ColumnDef {
  return {
    name,
    type,
    nullable: options.nullable ?? true,
    ...(options.values ? { values: options.values } : {}),
    ...(options.length ? { length: options.length } : {}),
    ...(options.fallback ? { fallback: options.fallback } : {}),
  };
}

const key = (name: string, type: SemanticType = 'integer'): ColumnDef =>
  col(name, type, { nullable: false });

function fk(references: string, ...columns: string[]): ForeignKey {
  return { columns, references };
}

function table(
  name: string,
  dataClass: DataClass,
  primaryKey: string[],
  columns: ColumnDef[],
  foreignKeys: ForeignKey[] = [],
): TargetTable {
  return { name, dataClass, primaryKey, columns, foreignKeys };
}

export const SESSION_TYPES = ['call', 'chat', 'email', 'ticket', 'meeting', 'other'] as const;

/** Source default for "no start date" on agent/group membership. */
export const EPOCH_FALLBACK = '1900-01-01T00:00:00.000Z';

export const SCHEMA_REGISTRY: readonly TargetTable[] = [
  // Base dictionaries
  table('scorecards', 'base', ['id'], [
    key('id'),
    col('name', 'string'),
    col('type', 'string', { length: 64 }),
    col('na_behavior', 'string', { length: 64 }),
    col('count_critical_scores', 'boolean'),
    col('is_automated', 'boolean'),
    col('is_protected', 'boolean'),
    col('is_default', 'boolean'),
    col('is_archived', 'boolean'),
  ]),
  table('groups', 'base', ['id'], [
    key('id'),
    col('name', 'string'),
    col('scorecard_id', 'integer'),
    col('is_default', 'boolean'),
  ], [fk('scorecards', 'scorecard_id')]),
  table('agents', 'base', ['id'], [
    key('id'),
    col('name', 'string'),
    col('phone_number', 'string', { length: 64 }),
    col('is_active', 'boolean'),
    col('deactivated_at', 'timestamp'),
  ]),
  table('agent_group_associations', 'base', ['group_id', 'agent_id', 'start_dt'], [
    key('group_id'),
    key('agent_id'),
    col('start_dt', 'timestamp', { nullable: false, fallback: EPOCH_FALLBACK }),
  ], [fk('groups', 'group_id'), fk('agents', 'agent_id')]),
  table('users', 'base', ['id'], [
    key('id'),
    col('email', 'string'),
    col('is_active', 'boolean'),
    col('is_superuser', 'boolean'),
    col('full_name', 'string'),
    col('agent_id', 'integer'),
    col('agent_group_id', 'integer'),
    col('language', 'string', { length: 16 }),
    col('uuid', 'uuid'),
    col('invite_expires', 'timestamp'),
  ], [fk('agents', 'agent_id'), fk('groups', 'agent_group_id')]),
  table('labels', 'base', ['id'], [
    key('id'),
    col('text', 'string'),
  ]),
  table('categories', 'base', ['id'], [
    key('id'),
    col('name', 'string'),
    col('filter_data', 'text'),
    col('position', 'integer'),
    col('created_at', 'timestamp'),
    col('updated_at', 'timestamp'),
  ]),
  table('category_labels', 'base', ['category_id', 'label_id'], [
    key('category_id'),
    key('label_id'),
  ], [fk('categories', 'category_id'), fk('labels', 'label_id')]),
  table('scorecard_categories', 'base', ['id', 'scorecard_id'], [
    key('id'),
    key('scorecard_id'),
    col('name', 'string'),
    col('sort_order', 'integer'),
  ], [fk('scorecards', 'scorecard_id')]),
  table('scorecard_points', 'base', ['id', 'scorecard_id'], [
    key('id'),
    key('scorecard_id'),
    col('category_id', 'integer'),
    col('name', 'string'),
    col('description', 'text'),
    col('sort_order', 'integer'),
    col('critical', 'boolean'),
    col('max_score', 'integer'),
    col('allow_partial_score', 'boolean'),
  ], [fk('scorecards', 'scorecard_id'), fk('scorecard_categories', 'category_id', 'scorecard_id')]),
  table('tags', 'base', ['id'], [
    key('id'),
    col('name', 'string'),
    col('type', 'string', { length: 64 }),
    col('team_id', 'integer'),
    col('is_archived', 'boolean'),
    col('archived_by_id', 'integer'),
    col('archived_at', 'timestamp'),
  ], [fk('groups', 'team_id')]),
  table('tag_labels', 'base', ['tag_id', 'label_id'], [
    key('tag_id'),
    key('label_id'),
  ], [fk('tags', 'tag_id'), fk('labels', 'label_id')]),

  // Data
  table('sessions', 'data', ['id'], [
    key('id', 'uuid'),
    col('type', 'enum', { values: SESSION_TYPES }),
    col('caller_id', 'string'),
    col('source', 'string'),
    col('language_code', 'string', { length: 16 }),
    col('asr_size', 'string', { length: 32 }),
    col('filename', 'text'),
    col('destination_id', 'string'),
    col('start_dt', 'timestamp', { nullable: false }),
    col('updated_at', 'timestamp'),
    col('direction', 'string', { length: 32 }),
    col('agent_id', 'integer'),
    col('group_id', 'integer'),
    col('duration', 'float'),
    col('silence', 'float'),
    col('silence_percent', 'float'),
    col('agent_channel', 'integer'),
    col('comments_count', 'integer'),
    col('default_scorecard_id', 'integer'),
    col('average_score', 'float'),
    col('is_processed', 'boolean'),
    col('overlaps_data', 'json'),
    col('duration_details', 'json'),
    col('score_details', 'json'),
    col('queue_name', 'string'),
    col('campaign_name', 'string'),
    col('term_reason', 'string'),
    col('waiting_time', 'integer'),
    col('fcr', 'integer'),
    col('csi', 'integer'),
    col('nps', 'integer'),
    col('list_id', 'integer'),
    col('words_count_agent', 'integer'),
    col('words_count_client', 'integer'),
    col('words_count_both', 'integer'),
    col('caller_prev_session_id', 'uuid'),
    col('additional_info', 'json'),
  ], [fk('agents', 'agent_id'), fk('groups', 'group_id')]),
  table('sessions_tags', 'data', ['session_id', 'tag_id', 'transcript_id'], [
    key('session_id', 'uuid'),
    key('tag_id'),
    key('transcript_id'),
    col('score', 'float'),
    col('matched_corpus_text', 'text'),
    col('is_agent', 'boolean'),
    col('matched_query_text', 'text'),
    col('meta', 'json'),
  ], [fk('sessions', 'session_id'), fk('tags', 'tag_id')]),
  table('sessions_categories', 'data', ['session_id', 'category_id'], [
    key('session_id', 'uuid'),
    key('category_id'),
    col('is_verified', 'boolean'),
  ], [fk('sessions', 'session_id'), fk('categories', 'category_id')]),
  table('sessions_reviewers', 'data', ['session_id', 'reviewer_id'], [
    key('session_id', 'uuid'),
    key('reviewer_id'),
    col('last_reviewed_at', 'timestamp'),
  ], [fk('sessions', 'session_id'), fk('users', 'reviewer_id')]),
  table('sessions_scores', 'data', ['session_id', 'scorecard_id', 'reviewer_id', 'scorecard_point_id'], [
    key('session_id', 'uuid'),
    key('scorecard_id'),
    key('reviewer_id'),
    key('scorecard_point_id'),
    col('score', 'float'),
    col('comment', 'text'),
  ], [
    fk('sessions', 'session_id'),
    fk('scorecards', 'scorecard_id'),
    fk('users', 'reviewer_id'),
    fk('scorecard_points', 'scorecard_point_id', 'scorecard_id'),
  ]),
  table('sessions_crm_statuses', 'data', ['session_id', 'crm_status'], [
    key('session_id', 'uuid'),
    col('crm_status', 'string', { nullable: false }),
  ], [fk('sessions', 'session_id')]),
  table('sessions_comments', 'data', ['session_id', 'id'], [
    key('session_id', 'uuid'),
    key('id'),
    col('author_id', 'integer'),
    col('text', 'text'),
    col('created_at', 'timestamp'),
    col('updated_at', 'timestamp'),
  ], [fk('sessions', 'session_id'), fk('users', 'author_id')]),
  table('sessions_summaries', 'data', ['session_id'], [
    key('session_id', 'uuid'),
    col('text', 'text'),
    col('created_at', 'timestamp'),
    col('updated_at', 'timestamp'),
  ], [fk('sessions', 'session_id')]),
];

const byName = new Map(SCHEMA_REGISTRY.map((t) => [t.name, t]));

export function findTable(name: string): TargetTable | undefined {
  return byName.get(name);
}

export function tablesOf(dataClass: DataClass): TargetTable[] {
  return SCHEMA_REGISTRY.filter((t) => t.dataClass === dataClass);
}
