/**
 * DatabaseService class - the storage collaborator for the retrieval core
 *
 * Wraps one better-sqlite3 connection to a memory-bank database file and
 * exposes it through the ContentStore query/execute interface. All values are
 * passed as bound parameters; SQL text is only ever built from quoted
 * identifiers.
 */

import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import {
  detectStatementType,
  normalizeIntegers,
  quoteIdentifier,
  resolveDatabasePath,
} from './helpers.js';
import {
  DatabaseError,
  DatabaseErrorCode,
  type ColumnInfo,
  type ContentStore,
  type OpenDatabaseOptions,
  type QueryResult,
  type ResultRow,
  type SqlValue,
  type TableInfo,
} from './types.js';

/**
 * SQLite result codes that mean the file itself cannot be used,
 * as opposed to the statement being rejected.
 */
const UNAVAILABLE_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_CANTOPEN',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
  'SQLITE_IOERR',
  'SQLITE_FULL',
]);

function toDatabaseError(error: unknown, context: string): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Database.SqliteError &&
    [...UNAVAILABLE_CODES].some((prefix) => error.code.startsWith(prefix))
      ? DatabaseErrorCode.STORAGE_UNAVAILABLE
      : DatabaseErrorCode.QUERY_REJECTED;
  return new DatabaseError(`${context}: ${message}`, code, error);
}

/**
 * DatabaseService class for all storage access
 */
export class DatabaseService implements ContentStore {
  private db: Database.Database;
  private readonly path: string;
  private readonly readOnly: boolean;

  private constructor(db: Database.Database, path: string, readOnly: boolean) {
    this.db = db;
    this.path = path;
    this.readOnly = readOnly;
  }

  /**
   * Open an existing database file (or a project directory's memory-bank database)
   * @throws DatabaseError DATABASE_NOT_FOUND if the file does not exist
   * @throws DatabaseError STORAGE_UNAVAILABLE if SQLite cannot open it
   */
  static open(inputPath: string, options: OpenDatabaseOptions = {}): DatabaseService {
    const readOnly = options.readOnly ?? true;
    const dbPath = resolveDatabasePath(inputPath);

    if (!existsSync(dbPath)) {
      throw new DatabaseError(
        `Database not found at ${dbPath}`,
        DatabaseErrorCode.DATABASE_NOT_FOUND
      );
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath, { readonly: readOnly, fileMustExist: true });
    } catch (error) {
      throw new DatabaseError(
        `Failed to open database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        DatabaseErrorCode.STORAGE_UNAVAILABLE,
        error
      );
    }

    try {
      // Fails on files that are not SQLite databases
      db.prepare('SELECT COUNT(*) FROM sqlite_master').get();
    } catch (error) {
      db.close();
      throw new DatabaseError(
        `Failed to open database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        DatabaseErrorCode.STORAGE_UNAVAILABLE,
        error
      );
    }

    return new DatabaseService(db, dbPath, readOnly);
  }

  /**
   * Wrap an already-open connection (tests and embedding callers)
   */
  static fromConnection(db: Database.Database, readOnly = db.readonly): DatabaseService {
    return new DatabaseService(db, db.name, readOnly);
  }

  getPath(): string {
    return this.path;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ==================== CONTENT STORE ====================

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<QueryResult> {
    return this.executeSync(sql, params);
  }

  async listTables(): Promise<string[]> {
    return this.listTableInfo(false).map((t) => t.name);
  }

  // ==================== SYNCHRONOUS OPERATIONS ====================

  /**
   * Execute one statement and collect its rows and column names
   * @throws DatabaseError QUERY_REJECTED when SQLite rejects the statement
   */
  executeSync(sql: string, params: readonly SqlValue[] = []): QueryResult {
    this.requireOpen();
    if (!sql.trim()) {
      throw new DatabaseError('Empty query provided', DatabaseErrorCode.QUERY_REJECTED);
    }

    const statementType = detectStatementType(sql);
    try {
      const stmt = this.db.prepare<SqlValue[], ResultRow>(sql).safeIntegers(true);
      if (stmt.reader) {
        const columns = stmt.columns().map((c) => c.name);
        const rows = stmt.all(...params).map(normalizeIntegers);
        return { statement_type: statementType, columns, rows, changes: 0 };
      }
      const info = stmt.run(...params);
      return { statement_type: statementType, columns: [], rows: [], changes: info.changes };
    } catch (error) {
      throw toDatabaseError(error, 'Query failed');
    }
  }

  /**
   * List tables and views, optionally with row counts
   */
  listTableInfo(withCounts = true): TableInfo[] {
    this.requireOpen();
    let entries: Array<{ name: string; type: 'table' | 'view' }>;
    try {
      entries = this.db
        .prepare<[], { name: string; type: 'table' | 'view' }>(
          `SELECT name, type FROM sqlite_master
           WHERE type IN ('table', 'view') AND name NOT LIKE 'sqlite_%'
           ORDER BY name`
        )
        .all();
    } catch (error) {
      throw toDatabaseError(error, 'Failed to list tables');
    }

    return entries.map((entry) => ({
      name: entry.name,
      type: entry.type,
      row_count: withCounts ? this.countRows(entry.name) : 0,
    }));
  }

  /**
   * Columns of a table or view in declaration order
   */
  listColumns(table: string): ColumnInfo[] {
    this.requireOpen();
    try {
      return this.db
        .prepare<[string], { name: string; type: string; notnull: number; pk: number }>(
          'SELECT name, type, "notnull", pk FROM pragma_table_info(?) ORDER BY cid'
        )
        .all(table)
        .map((column) => ({
          name: column.name,
          type: column.type,
          not_null: column.notnull === 1,
          primary_key: column.pk > 0,
        }));
    } catch (error) {
      throw toDatabaseError(error, `Failed to list columns of ${table}`);
    }
  }

  countRows(table: string): number {
    this.requireOpen();
    try {
      const row = this.db
        .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`)
        .get();
      return row?.count ?? 0;
    } catch (error) {
      throw toDatabaseError(error, `Failed to count rows in ${table}`);
    }
  }

  private requireOpen(): void {
    if (!this.db.open) {
      throw new DatabaseError(
        `Database connection to ${this.path} is closed`,
        DatabaseErrorCode.STORAGE_UNAVAILABLE
      );
    }
  }
}
