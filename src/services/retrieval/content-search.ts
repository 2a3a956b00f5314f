/**
 * Content Search - Word search over the titles and content of every source table
 *
 * Each configured table present in storage is searched in priority order with
 * one bound LIKE condition per word. Hits are scored (title words count double),
 * then ordered by score, table priority, recency and key. Each hit carries a
 * truncated snippet around the first matching word and a recall_extract
 * instruction for the full record.
 *
 * @module services/retrieval/content-search
 */

import { quoteIdentifier, type ContentStore, type SqlValue } from '../storage/database/index.js';
import { sourceTableUnknownError } from '../../server/errors.js';
import { escapeLikePattern } from '../../utils/validation.js';
import type { SourceRegistry } from './source-registry.js';
import { renderExtractInstruction } from './suggestions.js';
import { TRUNCATION_MARKER, characterLength, truncateText } from './truncation.js';
import type {
  ContentSearchHit,
  ContentSearchRequest,
  ContentSearchResult,
  SourceTableDescriptor,
} from './types.js';
import { asModifiedAt, asStoredValue, asText, compareStoredValues } from './values.js';

export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_SNIPPET_LENGTH = 150;

/** Share of the snippet shown before the first matching word */
const SNIPPET_LEAD = 0.25;

const WHITESPACE = /\s/;

interface RankedHit {
  hit: ContentSearchHit;
  rank: number;
  key: SqlValue;
  modified: SqlValue;
}

/**
 * Distinct lowercase words of a search query
 */
export function splitTerms(query: string): string[] {
  return [...new Set(query.toLowerCase().split(/\s+/).filter((term) => term.length > 0))];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Content window starting shortly before the first matching word, shortened
 * to `length` characters. A leading marker shows text was skipped.
 */
export function buildSnippet(content: string, terms: readonly string[], length: number): string {
  const chars = Array.from(content);
  let start = 0;

  const found = terms.length > 0 ? new RegExp(terms.map(escapeRegExp).join('|'), 'iu').exec(content) : null;
  if (found) {
    const position = characterLength(content.slice(0, found.index));
    start = Math.max(0, position - Math.floor(length * SNIPPET_LEAD));
    if (start > 0 && !WHITESPACE.test(chars[start - 1])) {
      // Skip the partial word the window opened in
      for (let i = start; i < position; i++) {
        if (WHITESPACE.test(chars[i])) {
          start = i + 1;
          break;
        }
      }
    }
  }

  const body = truncateText(chars.slice(start).join(''), length).rendered_value;
  return start > 0 ? TRUNCATION_MARKER + body : body;
}

function compareRanked(a: RankedHit, b: RankedHit): number {
  return (
    b.hit.score - a.hit.score ||
    a.rank - b.rank ||
    compareStoredValues(b.modified, a.modified) ||
    compareStoredValues(a.key, b.key)
  );
}

export class ContentSearch {
  constructor(
    private readonly store: ContentStore,
    private readonly registry: SourceRegistry
  ) {}

  /**
   * @throws MCPError SOURCE_TABLE_UNKNOWN if a requested table is not configured
   * @throws DatabaseError on any storage fault
   */
  async search(request: ContentSearchRequest): Promise<ContentSearchResult> {
    const terms = splitTerms(request.query);
    const limit = request.limit ?? DEFAULT_SEARCH_LIMIT;
    const snippetLength = request.snippetLength ?? DEFAULT_SNIPPET_LENGTH;

    const candidates = this.resolveTables(request.tables ?? null);
    const available = new Set(await this.store.listTables());
    const tables = candidates.filter((table) => available.has(table.name));

    const ranked: RankedHit[] = [];
    const matchesByTable: Record<string, number> = {};
    if (terms.length > 0) {
      for (const table of tables) {
        const hits = await this.searchTable(table, terms, snippetLength);
        matchesByTable[table.name] = hits.length;
        ranked.push(...hits);
      }
    }
    ranked.sort(compareRanked);

    return {
      query: request.query,
      terms,
      tables_searched: tables.map((t) => t.name),
      tables_skipped: candidates.filter((t) => !available.has(t.name)).map((t) => t.name),
      matches_by_table: matchesByTable,
      total_matches: ranked.length,
      results: ranked.slice(0, limit).map((entry) => entry.hit),
    };
  }

  private resolveTables(requested: readonly string[] | null): readonly SourceTableDescriptor[] {
    if (!requested || requested.length === 0) {
      return this.registry.tables;
    }
    const unknown = requested.find((name) => !this.registry.get(name));
    if (unknown !== undefined) {
      throw sourceTableUnknownError(unknown, this.registry.names());
    }
    const wanted = new Set(requested);
    return this.registry.tables.filter((table) => wanted.has(table.name));
  }

  private async searchTable(
    table: SourceTableDescriptor,
    terms: readonly string[],
    snippetLength: number
  ): Promise<RankedHit[]> {
    const k = quoteIdentifier(table.key_field);
    const t = quoteIdentifier(table.title_field);
    const c = quoteIdentifier(table.content_field);
    const modified = table.modified_field ? quoteIdentifier(table.modified_field) : 'NULL';

    const conditions = terms.map(() => `(${t} LIKE ? ESCAPE '\\' OR ${c} LIKE ? ESCAPE '\\')`);
    const params = terms.flatMap((term) => {
      const pattern = `%${escapeLikePattern(term)}%`;
      return [pattern, pattern];
    });

    const { rows } = await this.store.execute(
      `SELECT ${k} AS search_key, ${t} AS search_title, ${c} AS search_content, ${modified} AS search_modified
       FROM ${quoteIdentifier(table.name)}
       WHERE ${k} IS NOT NULL AND ${conditions.join(' AND ')}`,
      params
    );

    return rows.map((row) => {
      const key = asText(row.search_key);
      const title = asText(row.search_title);
      const content = asText(row.search_content);
      const lowerTitle = title.toLowerCase();
      const lowerContent = content.toLowerCase();

      let score = 0;
      const matchedIn = new Set<'title' | 'content'>();
      for (const term of terms) {
        if (lowerTitle.includes(term)) {
          score += 2;
          matchedIn.add('title');
        }
        if (lowerContent.includes(term)) {
          score += 1;
          matchedIn.add('content');
        }
      }

      return {
        hit: {
          table: table.name,
          icon: table.icon,
          key,
          title,
          snippet: buildSnippet(content, terms, snippetLength),
          content_length: characterLength(content),
          score,
          matched_in: (['title', 'content'] as const).filter((where) => matchedIn.has(where)),
          modified_at: asModifiedAt(row.search_modified),
          rendered_instruction: renderExtractInstruction({ key, table: table.name }),
        },
        rank: table.priority_rank,
        key: asStoredValue(row.search_key),
        modified: asStoredValue(row.search_modified),
      };
    });
  }
}
