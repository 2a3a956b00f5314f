/**
 * Multi-Table Search Coordinator
 *
 * Walks the source registry in priority order looking for one record:
 * key lookup first (exact, then prefix), then title lookup (exact normalized,
 * then bidirectional containment). The first table with a hit wins and lower
 * priority tables are never consulted.
 *
 * Not finding anything is a normal outcome carrying the tables tried.
 * Storage faults propagate and abort the whole walk.
 *
 * All values are bound as parameters; identifiers come from the validated
 * registry and are quoted.
 *
 * @module services/retrieval/search-coordinator
 */

import {
  quoteIdentifier,
  type ContentStore,
  type ResultRow,
  type SqlValue,
} from '../storage/database/index.js';
import { sourceTableUnknownError, validationError } from '../../server/errors.js';
import type { SourceRegistry } from './source-registry.js';
import { characterLength } from './truncation.js';
import { asModifiedAt, asStoredValue, asText, compareStoredValues } from './values.js';
import type {
  MatchKind,
  MatchResult,
  SearchOutcome,
  SearchRequest,
  SearchStrategy,
  SourceTableDescriptor,
} from './types.js';

export interface SearchCoordinatorOptions {
  /** Keys shorter than this are only matched exactly (default: 4) */
  minKeyPrefixLength?: number;
}

const DEFAULT_MIN_KEY_PREFIX_LENGTH = 4;

/** Result column aliases, independent of the registry's column names */
const COL = {
  key: 'match_key',
  title: 'match_title',
  content: 'match_content',
  modified: 'match_modified',
} as const;

interface Candidate {
  row: ResultRow;
  key: SqlValue;
  modified: SqlValue;
}

interface TitleCandidate extends Candidate {
  kind: MatchKind;
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lowercase, collapse whitespace runs, trim
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/\s+/g, ' ').trim();
}

function toCandidate(row: ResultRow): Candidate {
  return { row, key: asStoredValue(row[COL.key]), modified: asStoredValue(row[COL.modified]) };
}

/**
 * Tie-break order for both phases: most recent first with missing timestamps
 * last, then key ascending. Both use SQLite's ordering of mixed values.
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  return compareStoredValues(b.modified, a.modified) || compareStoredValues(a.key, b.key);
}

function pickBest<T extends Candidate>(candidates: T[]): T | null {
  return candidates.length > 0 ? [...candidates].sort(compareCandidates)[0] : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COORDINATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class SearchCoordinator {
  private readonly minKeyPrefixLength: number;

  constructor(
    private readonly store: ContentStore,
    private readonly registry: SourceRegistry,
    options: SearchCoordinatorOptions = {}
  ) {
    this.minKeyPrefixLength = options.minKeyPrefixLength ?? DEFAULT_MIN_KEY_PREFIX_LENGTH;
  }

  /**
   * Find one record by key and/or title fragment.
   *
   * @throws MCPError SOURCE_TABLE_UNKNOWN if the restriction names no configured table
   * @throws MCPError VALIDATION_ERROR if neither key nor title is given
   * @throws DatabaseError on any storage fault
   */
  async search(request: SearchRequest): Promise<SearchOutcome> {
    const key = request.key?.trim() || null;
    const title = request.title ? normalizeTitle(request.title) : '';
    if (!key && !title) {
      throw validationError('Provide a key or a title fragment to search for');
    }

    const candidates = this.resolveTables(request.table ?? null);
    const available = new Set(await this.store.listTables());
    const tables = candidates.filter((table) => available.has(table.name));
    const skipped = candidates.filter((table) => !available.has(table.name)).map((t) => t.name);

    const tried: string[] = [];
    const strategies: SearchStrategy[] = [];
    const markTried = (name: string): void => {
      if (!tried.includes(name)) tried.push(name);
    };

    if (key) {
      strategies.push('key');
      for (const table of tables) {
        markTried(table.name);
        const match = await this.findByKey(table, key);
        if (match) {
          return { found: true, match, tables_tried: tried, strategies_tried: strategies };
        }
      }
    }

    if (title) {
      strategies.push('title');
      for (const table of tables) {
        markTried(table.name);
        const match = await this.findByTitle(table, title);
        if (match) {
          return { found: true, match, tables_tried: tried, strategies_tried: strategies };
        }
      }
    }

    return { found: false, tables_tried: tried, tables_skipped: skipped, strategies_tried: strategies };
  }

  private resolveTables(restriction: string | null): readonly SourceTableDescriptor[] {
    const name = restriction?.trim();
    if (!name) {
      return this.registry.tables;
    }
    const table = this.registry.get(name);
    if (!table) {
      throw sourceTableUnknownError(name, this.registry.names());
    }
    return [table];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // KEY LOOKUP
  // ─────────────────────────────────────────────────────────────────────────────

  private async findByKey(table: SourceTableDescriptor, key: string): Promise<MatchResult | null> {
    const k = quoteIdentifier(table.key_field);

    const exact = pickBest((await this.select(table, `${k} = ?`, [key])).map(toCandidate));
    if (exact) {
      return this.toMatch(table, exact.row, 'EXACT_KEY');
    }

    const length = characterLength(key);
    if (length < this.minKeyPrefixLength) {
      return null;
    }
    const prefix = pickBest(
      (await this.select(table, `substr(CAST(${k} AS TEXT), 1, ?) = ?`, [length, key])).map(toCandidate)
    );
    return prefix ? this.toMatch(table, prefix.row, 'PREFIX_KEY') : null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TITLE LOOKUP
  // ─────────────────────────────────────────────────────────────────────────────

  private async findByTitle(
    table: SourceTableDescriptor,
    fragment: string
  ): Promise<MatchResult | null> {
    const k = quoteIdentifier(table.key_field);
    const t = quoteIdentifier(table.title_field);
    const rows = await this.select(table, `${k} IS NOT NULL AND ${t} IS NOT NULL`, []);

    const exact: TitleCandidate[] = [];
    const fuzzy: TitleCandidate[] = [];
    for (const row of rows) {
      const rawTitle = row[COL.title];
      if (typeof rawTitle !== 'string') continue;

      const normalized = normalizeTitle(rawTitle);
      if (normalized.length === 0) continue;

      if (normalized === fragment) {
        exact.push({ ...toCandidate(row), kind: 'EXACT_TITLE' });
      } else if (normalized.includes(fragment) || fragment.includes(normalized)) {
        fuzzy.push({ ...toCandidate(row), kind: 'FUZZY_TITLE' });
      }
    }

    const best = pickBest(exact.length > 0 ? exact : fuzzy);
    return best ? this.toMatch(table, best.row, best.kind) : null;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SHARED
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Select every record matching a WHERE clause, with the match columns
   * aliased. Ordering is left to compareCandidates.
   */
  private async select(
    table: SourceTableDescriptor,
    where: string,
    params: SqlValue[]
  ): Promise<ResultRow[]> {
    const modifiedColumn = table.modified_field ? quoteIdentifier(table.modified_field) : 'NULL';
    const { rows } = await this.store.execute(
      `SELECT ${quoteIdentifier(table.key_field)} AS ${COL.key},
              ${quoteIdentifier(table.title_field)} AS ${COL.title},
              ${quoteIdentifier(table.content_field)} AS ${COL.content},
              ${modifiedColumn} AS ${COL.modified}
       FROM ${quoteIdentifier(table.name)}
       WHERE ${where}`,
      params
    );
    return rows;
  }

  private toMatch(table: SourceTableDescriptor, row: ResultRow, kind: MatchKind): MatchResult {
    return {
      table,
      key: asText(row[COL.key]),
      title: asText(row[COL.title]),
      content: asText(row[COL.content]),
      match_kind: kind,
      modified_at: asModifiedAt(row[COL.modified]),
    };
  }
}
