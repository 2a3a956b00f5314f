/**
 * Type definitions for DatabaseService
 *
 * Contains the storage-facing contract consumed by the retrieval core,
 * the error type raised by the SQLite adapter, and result shapes.
 */

/**
 * A single row as returned by storage: column name to raw value.
 */
export type ResultRow = Record<string, unknown>;

/**
 * Values that may be bound to a prepared statement parameter.
 */
export type SqlValue = string | number | bigint | Buffer | null;

/**
 * Leading keyword of a statement, used for diagnostics only.
 */
export type StatementType =
  | 'SELECT'
  | 'WITH'
  | 'INSERT'
  | 'UPDATE'
  | 'DELETE'
  | 'CREATE'
  | 'DROP'
  | 'ALTER'
  | 'PRAGMA'
  | 'OTHER';

/**
 * Result of executing one statement
 */
export interface QueryResult {
  statement_type: StatementType;
  /** Column names in result order (empty for statements that return no data) */
  columns: string[];
  rows: ResultRow[];
  /** Rows changed by a write statement; 0 for reads */
  changes: number;
}

/**
 * Query/execute interface the retrieval core depends on.
 *
 * Every method may suspend; implementations must not hold locks across
 * the returned promise.
 */
export interface ContentStore {
  execute(sql: string, params?: readonly SqlValue[]): Promise<QueryResult>;
  /** Names of the tables and views storage can serve, in name order */
  listTables(): Promise<string[]>;
}

/**
 * Table listing entry
 */
export interface TableInfo {
  name: string;
  type: 'table' | 'view';
  row_count: number;
}

/**
 * Column listing entry, from PRAGMA table_info
 */
export interface ColumnInfo {
  name: string;
  type: string;
  not_null: boolean;
  primary_key: boolean;
}

/**
 * Options for opening a database file
 */
export interface OpenDatabaseOptions {
  /** Open the file read-only (default: true) */
  readOnly?: boolean;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  QUERY_REJECTED = 'QUERY_REJECTED',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}
