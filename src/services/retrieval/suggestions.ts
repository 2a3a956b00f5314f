/**
 * Suggestion Generator - Follow-up instructions for truncated results
 *
 * Advisory only: suggestions are rendered text pointing at the extraction
 * and query tools, never executed.
 *
 * @module services/retrieval/suggestions
 */

import type { ResultRow } from '../storage/database/index.js';
import type { SourceRegistry } from './source-registry.js';
import type { SourceTableDescriptor, Suggestion, TruncatedRow } from './types.js';
import { asText } from './values.js';

export const DEFAULT_MAX_RECORD_SUGGESTIONS = 10;

const TABLE_REFERENCE = /\b(?:FROM|JOIN)\s+[`"[]?([A-Za-z_][A-Za-z0-9_]*)/gi;

/**
 * The first registry table named after FROM or JOIN in the query text
 */
export function inferSourceTable(
  query: string,
  registry: SourceRegistry
): SourceTableDescriptor | null {
  for (const match of query.matchAll(TABLE_REFERENCE)) {
    const table = registry.get(match[1]);
    if (table) {
      return table;
    }
  }
  return null;
}

interface RecordIdentity {
  key: string | null;
  title: string | null;
}

function firstPresent(row: ResultRow, columns: readonly string[]): string | null {
  for (const column of columns) {
    const value = row[column];
    if (value !== null && value !== undefined) {
      const text = asText(value).trim();
      if (text.length > 0) return text;
    }
  }
  return null;
}

/**
 * Key and title of the record a row came from. The inferred source table's
 * columns are preferred; otherwise any registry key or title column present in
 * the row is used, in priority order.
 */
function identifyRecord(
  row: ResultRow,
  source: SourceTableDescriptor | null,
  registry: SourceRegistry
): RecordIdentity {
  const keyColumns = [
    ...(source ? [source.key_field] : []),
    ...registry.tables.map((t) => t.key_field),
  ];
  const titleColumns = [
    ...(source ? [source.title_field] : []),
    ...registry.tables.map((t) => t.title_field),
  ];
  return { key: firstPresent(row, keyColumns), title: firstPresent(row, titleColumns) };
}

/**
 * Instruction text pointing at recall_extract with the given arguments
 */
export function renderExtractInstruction(args: Record<string, string>): string {
  return `Call recall_extract with ${JSON.stringify(args)} to read the full record`;
}

export interface SuggestionInput {
  query: string;
  /** Rows as returned by storage, before truncation */
  rows: readonly ResultRow[];
  truncated: readonly TruncatedRow[];
  registry: SourceRegistry;
  maxRecordSuggestions?: number;
}

/**
 * Build suggestions for a truncated result set: one extraction suggestion per
 * distinct truncated record, then a single retry suggestion.
 */
export function generateSuggestions(input: SuggestionInput): Suggestion[] {
  const max = input.maxRecordSuggestions ?? DEFAULT_MAX_RECORD_SUGGESTIONS;
  const source = inferSourceTable(input.query, input.registry);

  const suggestions: Suggestion[] = [];
  const seen = new Set<string>();
  let truncatedFields = 0;

  input.truncated.forEach((row, index) => {
    const fields = Object.keys(row.truncated).length;
    if (fields === 0) return;
    truncatedFields += fields;

    if (suggestions.length >= max) return;
    const original = input.rows[index] ?? row.values;
    const { key, title } = identifyRecord(original, source, input.registry);
    const table: Record<string, string> = source ? { table: source.name } : {};

    if (key !== null) {
      const identity = `key:${key}`;
      if (seen.has(identity)) return;
      seen.add(identity);
      suggestions.push({
        kind: 'EXTRACT_BY_KEY',
        rendered_instruction: renderExtractInstruction({ key, ...table }),
      });
    } else if (title !== null) {
      const identity = `title:${title}`;
      if (seen.has(identity)) return;
      seen.add(identity);
      suggestions.push({
        kind: 'EXTRACT_BY_TITLE',
        rendered_instruction: renderExtractInstruction({ title, ...table }),
      });
    }
  });

  if (truncatedFields > 0) {
    suggestions.push({
      kind: 'RETRY_NO_LIMIT',
      rendered_instruction:
        `${truncatedFields} field(s) were truncated. ` +
        'Re-run recall_sql_query with "max_content_length": null to return full values',
    });
  }

  return suggestions;
}
