/**
 * Database Module - Public API
 *
 * Re-exports all public types, classes, and functions from the database module.
 */

export type {
  ColumnInfo,
  ContentStore,
  OpenDatabaseOptions,
  QueryResult,
  ResultRow,
  SqlValue,
  StatementType,
  TableInfo,
} from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';

export { DatabaseService } from './service.js';

export {
  PROJECT_DATABASE_RELATIVE_PATH,
  detectStatementType,
  isValidIdentifier,
  normalizeIntegers,
  quoteIdentifier,
  resolveDatabasePath,
} from './helpers.js';
