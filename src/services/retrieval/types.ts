/**
 * Retrieval Core Type Definitions
 *
 * Shared types for the source registry, intent classifier, truncation engine,
 * search coordinator, suggestion generator and content extractor.
 *
 * @module services/retrieval/types
 */

import type { ResultRow, StatementType } from '../storage/database/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE TABLES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One registered content table. Lower priority_rank is searched first.
 */
export interface SourceTableDescriptor {
  readonly name: string;
  readonly title_field: string;
  readonly content_field: string;
  readonly key_field: string;
  /** Column holding the last-modified timestamp; null disables the recency tie-break */
  readonly modified_field: string | null;
  readonly icon: string;
  readonly priority_rank: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTENT AND TRUNCATION
// ═══════════════════════════════════════════════════════════════════════════════

export type QueryIntent = 'CONTENT_FOCUSED' | 'OVERVIEW' | 'BALANCED';

/**
 * How long text values may be in a query response.
 * limit === null means no truncation.
 */
export interface TruncationPolicy {
  strategy: QueryIntent;
  limit: number | null;
  /** True when the caller supplied the limit explicitly */
  overridden: boolean;
  reason: string;
  detected_patterns: string[];
}

export interface TruncatedField {
  original_length: number;
  rendered_value: string;
  was_truncated: boolean;
}

/**
 * A row after truncation: values carry rendered strings, and every field that
 * was shortened is reported under its column name.
 */
export interface TruncatedRow {
  values: ResultRow;
  truncated: Record<string, TruncatedField>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH
// ═══════════════════════════════════════════════════════════════════════════════

export type MatchKind = 'EXACT_KEY' | 'PREFIX_KEY' | 'EXACT_TITLE' | 'FUZZY_TITLE';

export interface MatchResult {
  table: SourceTableDescriptor;
  key: string;
  title: string;
  content: string;
  match_kind: MatchKind;
  modified_at: string | number | null;
}

export interface SearchRequest {
  key?: string | null;
  title?: string | null;
  table?: string | null;
}

/** Search strategies in the order they were attempted */
export type SearchStrategy = 'key' | 'title';

export type SearchOutcome =
  | {
      found: true;
      match: MatchResult;
      tables_tried: string[];
      strategies_tried: SearchStrategy[];
    }
  | {
      found: false;
      tables_tried: string[];
      /** Registry tables storage does not have; never queried */
      tables_skipped: string[];
      strategies_tried: SearchStrategy[];
    };

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT SEARCH
// ═══════════════════════════════════════════════════════════════════════════════

export interface ContentSearchRequest {
  query: string;
  /** Configured source tables to search; omitted means all */
  tables?: readonly string[] | null;
  limit?: number;
  snippetLength?: number;
}

export interface ContentSearchHit {
  table: string;
  icon: string;
  key: string;
  title: string;
  snippet: string;
  content_length: number;
  /** Two points per word found in the title, one per word found in the content */
  score: number;
  matched_in: Array<'title' | 'content'>;
  modified_at: string | number | null;
  rendered_instruction: string;
}

export interface ContentSearchResult {
  query: string;
  terms: string[];
  tables_searched: string[];
  tables_skipped: string[];
  matches_by_table: Record<string, number>;
  /** Matches across all tables before the limit was applied */
  total_matches: number;
  results: ContentSearchHit[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUGGESTIONS AND RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export type SuggestionKind = 'EXTRACT_BY_KEY' | 'EXTRACT_BY_TITLE' | 'RETRY_NO_LIMIT';

export interface Suggestion {
  kind: SuggestionKind;
  rendered_instruction: string;
}

export interface TruncationReport {
  row_index: number;
  column: string;
  original_length: number;
  rendered_length: number;
}

export interface RunQueryResult {
  strategy: QueryIntent;
  limit: number | null;
  reason: string;
  detected_patterns: string[];
  statement_type: StatementType;
  columns: string[];
  row_count: number;
  changes: number;
  rows: ResultRow[];
  truncated: boolean;
  truncated_fields: TruncationReport[];
  suggestions: Suggestion[];
}

export interface ExtractedRecord {
  table: string;
  icon: string;
  key: string;
  title: string;
  content: string;
  content_length: number;
  safe_name: string;
  match_kind: MatchKind;
  modified_at: string | number | null;
}

export type ExtractResult =
  | ({ found: true; tables_tried: string[] } & ExtractedRecord)
  | {
      found: false;
      tables_tried: string[];
      tables_skipped: string[];
      strategies_tried: SearchStrategy[];
    };
