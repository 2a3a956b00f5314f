/**
 * RetrievalService - The two operations exposed by the retrieval core
 *
 * runQuery: classify, execute, truncate, suggest.
 * extract: search the registry tables and return the full record.
 * searchContent: rank records containing every word of a query.
 *
 * Holds no mutable state; the store and registry are passed in at
 * construction time.
 *
 * @module services/retrieval/service
 */

import type { ContentStore } from '../storage/database/index.js';
import { buildExtraction } from './content-extractor.js';
import { ContentSearch } from './content-search.js';
import { classifyQuery } from './query-intent.js';
import { SearchCoordinator } from './search-coordinator.js';
import type { SourceRegistry } from './source-registry.js';
import { generateSuggestions } from './suggestions.js';
import { characterLength, truncateRows } from './truncation.js';
import type {
  ContentSearchRequest,
  ContentSearchResult,
  ExtractResult,
  RunQueryResult,
  SearchRequest,
  TruncationReport,
} from './types.js';

export interface RetrievalOptions {
  /** Cap on per-record extraction suggestions (default: 10) */
  maxExtractSuggestions?: number;
  /** Bound on the title part of derived safe names (default: 50) */
  safeNameMaxLength?: number;
  /** Shortest key fragment used for prefix matching (default: 4) */
  minKeyPrefixLength?: number;
}

export class RetrievalService {
  private readonly coordinator: SearchCoordinator;
  private readonly contentSearch: ContentSearch;

  constructor(
    private readonly store: ContentStore,
    private readonly registry: SourceRegistry,
    private readonly options: RetrievalOptions = {}
  ) {
    this.coordinator = new SearchCoordinator(store, registry, {
      minKeyPrefixLength: options.minKeyPrefixLength,
    });
    this.contentSearch = new ContentSearch(store, registry);
  }

  /**
   * Execute a query and shorten long text values according to its intent.
   *
   * @param maxContentLength - undefined uses the strategy default; null or 0 disables truncation
   * @throws DatabaseError when storage rejects the query or is unavailable
   */
  async runQuery(queryText: string, maxContentLength?: number | null): Promise<RunQueryResult> {
    const policy = classifyQuery(queryText, {
      maxContentLength,
      contentFields: this.registry.contentFields(),
    });
    console.error(
      `[Retrieval] Query strategy ${policy.strategy}, limit ${policy.limit ?? 'none'}${policy.overridden ? ' (override)' : ''}`
    );

    const result = await this.store.execute(queryText);
    const truncatedRows = truncateRows(result.rows, policy);

    const reports: TruncationReport[] = [];
    truncatedRows.forEach((row, rowIndex) => {
      for (const [column, field] of Object.entries(row.truncated)) {
        reports.push({
          row_index: rowIndex,
          column,
          original_length: field.original_length,
          rendered_length: characterLength(field.rendered_value),
        });
      }
    });

    const suggestions =
      reports.length > 0
        ? generateSuggestions({
            query: queryText,
            rows: result.rows,
            truncated: truncatedRows,
            registry: this.registry,
            maxRecordSuggestions: this.options.maxExtractSuggestions,
          })
        : [];

    return {
      strategy: policy.strategy,
      limit: policy.limit,
      reason: policy.reason,
      detected_patterns: policy.detected_patterns,
      statement_type: result.statement_type,
      columns: result.columns,
      row_count: result.rows.length,
      changes: result.changes,
      rows: truncatedRows.map((row) => row.values),
      truncated: reports.length > 0,
      truncated_fields: reports,
      suggestions,
    };
  }

  /**
   * Find one record and return it untruncated, or a not-found outcome
   * listing the tables tried.
   *
   * @throws MCPError SOURCE_TABLE_UNKNOWN for an unconfigured table restriction
   * @throws DatabaseError on any storage fault
   */
  async extract(request: SearchRequest): Promise<ExtractResult> {
    const outcome = await this.coordinator.search(request);

    if (!outcome.found) {
      console.error(
        `[Retrieval] No match after trying ${outcome.tables_tried.join(', ') || 'no tables'}`
      );
      return outcome;
    }

    const record = buildExtraction(outcome.match, {
      safeNameMaxLength: this.options.safeNameMaxLength,
    });
    console.error(`[Retrieval] ${record.match_kind} match in ${record.table} (key ${record.key})`);
    return { found: true, tables_tried: outcome.tables_tried, ...record };
  }

  /**
   * Search titles and content of the source tables for every word of a query
   *
   * @throws MCPError SOURCE_TABLE_UNKNOWN for an unconfigured table filter
   * @throws DatabaseError on any storage fault
   */
  async searchContent(request: ContentSearchRequest): Promise<ContentSearchResult> {
    const result = await this.contentSearch.search(request);
    console.error(
      `[Retrieval] Content search "${request.query}": ${result.total_matches} match(es) in ${result.tables_searched.length} table(s)`
    );
    return result;
  }
}
