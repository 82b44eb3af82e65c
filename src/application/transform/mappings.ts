/**
 * Source-to-Table Field Mappings
 * Layer: Application
 *
 * One entry per target table. A mapping names the source the rows come from,
 * an optional fan-out path of nested lists, and the columns whose values do
 * not sit under the column's own name. Every other declared column is read
 * from the item under the same name.
 *
 * Source paths are dotted and resolved against the current item, with three
 * prefixes:
 *   `$`  the top-level source record (`$id` is the session id)
 *   `^`  the item one fan-out level up
 *   `.`  the item itself, for lists of bare ids
 * An array of paths is a list of alternatives; the first one present wins.
 *
 * `ignore` lists source fields that are known and deliberately not loaded,
 * so that only genuinely new fields are reported as unknown.
 */
import type { BaseDictKind } from '@domain/entities/RawRecord';

export type FieldSource = string | readonly string[];

export type MappingSource = BaseDictKind | 'sessions';

export interface TableMapping {
  table: string;
  source: MappingSource;
  each?: readonly string[];
  fields?: Readonly<Record<string, FieldSource>>;
  ignore?: readonly string[];
}

export const TABLE_MAPPINGS: readonly TableMapping[] = [
  {
    table: 'scorecards',
    source: 'scorecards',
    ignore: ['team_ids'],
  },
  {
    table: 'groups',
    source: 'groups',
    ignore: ['additional_scorecards'],
  },
  {
    table: 'agents',
    source: 'agents',
    ignore: ['user', 'reactions', 'phone_number_aliases'],
  },
  {
    table: 'agent_group_associations',
    source: 'agents',
    each: ['groups'],
    fields: { agent_id: '$id', group_id: ['group_id', 'id', '.'] },
  },
  {
    table: 'users',
    source: 'users',
    ignore: ['role_ids', 'permissions'],
  },
  {
    table: 'labels',
    source: 'labels',
    ignore: ['color'],
  },
  {
    table: 'categories',
    source: 'categories',
  },
  {
    table: 'category_labels',
    source: 'categories',
    each: ['labels'],
    fields: { category_id: '$id', label_id: ['id', '.'] },
    ignore: ['text', 'color'],
  },
  {
    table: 'scorecard_categories',
    source: 'scorecards',
    each: ['categories'],
    fields: { scorecard_id: ['scorecard_id', '$id'] },
  },
  {
    table: 'scorecard_points',
    source: 'scorecards',
    each: ['categories', 'points'],
    fields: { scorecard_id: ['scorecard_id', '$id'], category_id: ['category_id', '^id'] },
    ignore: ['score_values', 'user_data'],
  },
  {
    table: 'tags',
    source: 'tags',
    ignore: ['words', 'phrases', 'color'],
  },
  {
    table: 'tag_labels',
    source: 'tags',
    each: ['labels'],
    fields: { tag_id: '$id', label_id: ['id', '.'] },
    ignore: ['text', 'color'],
  },
  {
    table: 'sessions',
    source: 'sessions',
    fields: { agent_id: ['agent_id', 'agent.id'], group_id: ['group_id', 'group.id'] },
    ignore: [
      'end_dt',
      'created_at',
      'compliance_matches',
      'ptp_kept_prediction',
      'comment_author_ids',
      'group',
      'agent',
      'agent_name',
      'category_ids',
      'emotions',
      'activity',
      'sentiments',
      'events_call_id',
      'low_quality',
      'transcripts',
    ],
  },
  {
    table: 'sessions_tags',
    source: 'sessions',
    each: ['tags', 'match'],
    fields: { session_id: '$id', tag_id: '^id' },
  },
  {
    table: 'sessions_categories',
    source: 'sessions',
    each: ['categories'],
    fields: { session_id: '$id', category_id: ['category_id', 'id', '.'] },
    ignore: ['name'],
  },
  {
    table: 'sessions_reviewers',
    source: 'sessions',
    each: ['reviewers'],
    fields: { session_id: '$id', reviewer_id: ['reviewer_id', 'id', '.'] },
    ignore: ['name'],
  },
  {
    table: 'sessions_scores',
    source: 'sessions',
    each: ['scores', 'point_scores'],
    fields: {
      session_id: ['^session_id', '$id'],
      scorecard_id: '^scorecard_id',
      reviewer_id: '^reviewer_id',
      scorecard_point_id: ['scorecard_point_id', 'point_id'],
    },
    ignore: ['id', 'meta'],
  },
  {
    table: 'sessions_crm_statuses',
    source: 'sessions',
    each: ['crm_statuses'],
    fields: { session_id: '$id', crm_status: ['crm_status', 'status', 'name', '.'] },
  },
  {
    table: 'sessions_comments',
    source: 'sessions',
    each: ['comments'],
    fields: { session_id: ['session_id', '$id'] },
  },
  {
    table: 'sessions_summaries',
    source: 'sessions',
    each: ['summary'],
    fields: { session_id: ['session_id', '$id'] },
    ignore: ['id'],
  },
];
