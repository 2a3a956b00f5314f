/**
 * Truncation Engine - Boundary-aware shortening of long text values
 *
 * Lengths and cut points are measured in Unicode code points, so a cut never
 * lands inside a surrogate pair. When the limit leaves room, the cut moves back
 * to the nearest whitespace in the last fifth of the limit; otherwise it is a
 * hard cut at the limit. A "..." marker is appended to every shortened value.
 *
 * Pure functions: rows are copied, never mutated.
 *
 * @module services/retrieval/truncation
 */

import type { ResultRow } from '../storage/database/index.js';
import type { TruncatedField, TruncatedRow, TruncationPolicy } from './types.js';

export const TRUNCATION_MARKER = '...';

/** Word-boundary search only looks back to this fraction of the limit */
const WORD_BOUNDARY_WINDOW = 0.8;

/** Limits at or below this are always hard cuts */
const MIN_LIMIT_FOR_WORD_BOUNDARY = 20;

const WHITESPACE = /\s/;

/**
 * Length of a string in code points
 */
export function characterLength(value: string): number {
  let count = 0;
  for (const _ of value) {
    count++;
  }
  return count;
}

/**
 * Truncate one string value.
 *
 * A value already within limit + marker that ends with the marker is
 * returned as-is, which makes truncation idempotent. A stored value of that
 * shape cannot be told apart from a rendered one, so it is also kept whole
 * and reported as not truncated.
 */
export function truncateText(value: string, limit: number | null): TruncatedField {
  const chars = Array.from(value);
  const originalLength = chars.length;

  const unchanged: TruncatedField = {
    original_length: originalLength,
    rendered_value: value,
    was_truncated: false,
  };

  if (limit === null || limit <= 0 || originalLength <= limit) {
    return unchanged;
  }
  if (value.endsWith(TRUNCATION_MARKER) && originalLength <= limit + TRUNCATION_MARKER.length) {
    return unchanged;
  }

  let cut = limit;
  if (limit > MIN_LIMIT_FOR_WORD_BOUNDARY) {
    const floor = Math.floor(limit * WORD_BOUNDARY_WINDOW);
    // chars[i] is the first character dropped by a cut at i
    for (let i = limit; i > floor; i--) {
      if (WHITESPACE.test(chars[i])) {
        cut = i;
        break;
      }
    }
  }

  return {
    original_length: originalLength,
    rendered_value: chars.slice(0, cut).join('').trimEnd() + TRUNCATION_MARKER,
    was_truncated: true,
  };
}

/**
 * Apply a policy to one row. Non-string values pass through untouched.
 */
export function truncateRow(row: ResultRow, policy: Pick<TruncationPolicy, 'limit'>): TruncatedRow {
  const values: ResultRow = {};
  const truncated: Record<string, TruncatedField> = {};

  for (const [column, value] of Object.entries(row)) {
    if (typeof value !== 'string') {
      values[column] = value;
      continue;
    }
    const field = truncateText(value, policy.limit);
    values[column] = field.rendered_value;
    if (field.was_truncated) {
      truncated[column] = field;
    }
  }

  return { values, truncated };
}

/**
 * Apply a policy to every row of a result set
 */
export function truncateRows(
  rows: readonly ResultRow[],
  policy: Pick<TruncationPolicy, 'limit'>
): TruncatedRow[] {
  return rows.map((row) => truncateRow(row, policy));
}
