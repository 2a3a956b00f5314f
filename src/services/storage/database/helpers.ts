/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for path resolution, identifier quoting,
 * and statement classification.
 */

import { existsSync, statSync } from 'fs';
import { join, resolve } from 'path';
import type { ResultRow, StatementType } from './types.js';

/**
 * Location of the memory-bank database inside a project directory
 */
export const PROJECT_DATABASE_RELATIVE_PATH = join('memory-bank', 'context.db');

/**
 * Valid SQL identifier pattern for registry-supplied table and column names
 */
const VALID_IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check whether a name can be used as a table or column identifier
 */
export function isValidIdentifier(name: string): boolean {
  return VALID_IDENTIFIER_PATTERN.test(name);
}

/**
 * Quote a table or column name for interpolation into SQL text.
 *
 * Only identifiers are ever interpolated; values always go through
 * bound parameters.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Resolve a user-supplied path to a database file.
 *
 * A directory is treated as a project root and mapped to
 * `<dir>/memory-bank/context.db`.
 */
export function resolveDatabasePath(inputPath: string): string {
  const absolute = resolve(inputPath);
  if (existsSync(absolute) && statSync(absolute).isDirectory()) {
    return join(absolute, PROJECT_DATABASE_RELATIVE_PATH);
  }
  return absolute;
}

const STATEMENT_KEYWORDS: StatementType[] = [
  'SELECT',
  'WITH',
  'INSERT',
  'UPDATE',
  'DELETE',
  'CREATE',
  'DROP',
  'ALTER',
  'PRAGMA',
];

/**
 * Detect the statement type from its leading keyword
 */
export function detectStatementType(sql: string): StatementType {
  const keyword = sql
    .replace(/^(\s|--[^\n]*\n?|\/\*[\s\S]*?\*\/)+/, '')
    .split(/[\s(;]/, 1)[0]
    .toUpperCase();
  return STATEMENT_KEYWORDS.find((k) => k === keyword) ?? 'OTHER';
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Rows are read with safe integers on, so every INTEGER arrives as a bigint.
 * Values a double holds exactly go back to number; larger ones stay bigint.
 */
export function normalizeIntegers(row: ResultRow): ResultRow {
  for (const [column, value] of Object.entries(row)) {
    if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) {
      row[column] = Number(value);
    }
  }
  return row;
}
