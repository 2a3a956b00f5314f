/**
 * Coercions from raw storage values
 *
 * @module services/retrieval/values
 */

import type { SqlValue } from '../storage/database/index.js';

/**
 * Text form of a stored value. null becomes "", blobs are read as UTF-8.
 */
export function asText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf-8');
  }
  return String(value);
}

/**
 * Timestamp column value, or null when absent or not a scalar
 */
export function asModifiedAt(value: unknown): string | number | null {
  if (typeof value === 'string' || typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return null;
}

/** SQLite storage classes in ascending sort order */
function storageClassRank(value: SqlValue): number {
  if (value === null) return 0;
  if (typeof value === 'number' || typeof value === 'bigint') return 1;
  if (typeof value === 'string') return 2;
  return 3;
}

/**
 * Ascending order of two stored values, the way SQLite orders a column:
 * NULL, then numbers by value, then text by UTF-8 bytes, then blobs.
 */
export function compareStoredValues(a: SqlValue, b: SqlValue): number {
  const rank = storageClassRank(a) - storageClassRank(b);
  if (rank !== 0) return rank;
  if (typeof a === 'string' && typeof b === 'string') {
    return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
  }
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) {
    return Buffer.compare(a, b);
  }
  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  return 0;
}

/**
 * Narrow a row value to a stored SQL value; anything else reads as NULL
 */
export function asStoredValue(value: unknown): SqlValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  return null;
}
