/**
 * Shared test helpers for storage and retrieval tests
 *
 * Builds real memory-bank databases in temp directories. NO MOCKS: tests run
 * against better-sqlite3 files with the same tables the server searches.
 */

import Database from 'better-sqlite3';
import { mkdtempSync, mkdirSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../../../src/services/storage/database/index.js';

/** Prefix swept by tests/global-teardown.ts */
export const TEMP_DIR_PREFIX = 'recall-test-';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

const tempDirs: string[] = [];

export function createTempDir(label = 'db'): string {
  const dir = mkdtempSync(join(tmpdir(), `${TEMP_DIR_PREFIX}${label}-`));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDir(dir: string): void {
  try {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  } catch {
    // Ignore cleanup errors in tests
  }
}

/**
 * Remove every temp directory created by this module. Call from afterAll.
 */
export function cleanupAllTempDirs(): void {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) cleanupTempDir(dir);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY-BANK FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

const SCHEMA = `
  CREATE TABLE documents_v2 (
    uuid TEXT PRIMARY KEY,
    title TEXT,
    content TEXT,
    updated_at TEXT
  );
  CREATE TABLE discussions (
    uuid TEXT PRIMARY KEY,
    summary TEXT,
    content TEXT,
    updated_at TEXT
  );
  CREATE TABLE artifacts (
    uuid TEXT PRIMARY KEY,
    title TEXT,
    content TEXT,
    updated_at TEXT
  );
`;

export type SourceTableName = 'documents_v2' | 'discussions' | 'artifacts';

export interface RecordFixture {
  uuid?: string;
  title: string | null;
  content: string | null;
  updated_at?: string | null;
}

/**
 * Create <projectDir>/memory-bank/context.db with the three source tables.
 *
 * @param omit - Source tables to leave out of the schema
 * @returns Absolute path to the database file
 */
export function createMemoryBank(projectDir: string, omit: SourceTableName[] = []): string {
  const dir = join(projectDir, 'memory-bank');
  mkdirSync(dir, { recursive: true });
  const dbPath = join(dir, 'context.db');

  const db = new Database(dbPath);
  try {
    db.exec(SCHEMA);
    for (const table of omit) {
      db.exec(`DROP TABLE ${table}`);
    }
  } finally {
    db.close();
  }
  return dbPath;
}

/**
 * Insert records into a source table. Returns the keys in insertion order.
 */
export function insertRecords(
  dbPath: string,
  table: SourceTableName,
  records: RecordFixture[]
): string[] {
  const titleColumn = table === 'discussions' ? 'summary' : 'title';
  const db = new Database(dbPath);
  try {
    const stmt = db.prepare(
      `INSERT INTO ${table} (uuid, ${titleColumn}, content, updated_at) VALUES (?, ?, ?, ?)`
    );
    return records.map((record) => {
      const key = record.uuid ?? uuidv4();
      stmt.run(key, record.title, record.content, record.updated_at ?? null);
      return key;
    });
  } finally {
    db.close();
  }
}

/**
 * Temp project with a memory-bank database, opened through DatabaseService
 */
export function createTestStore(
  omit: SourceTableName[] = [],
  readOnly = true
): { dir: string; dbPath: string; store: DatabaseService } {
  const dir = createTempDir('store');
  const dbPath = createMemoryBank(dir, omit);
  return { dir, dbPath, store: DatabaseService.open(dbPath, { readOnly }) };
}

/**
 * Deterministic text of exactly `length` characters made of short words
 */
export function wordText(length: number, word = 'lorem'): string {
  let text = '';
  while (text.length < length) {
    text += (text.length === 0 ? '' : ' ') + word;
  }
  return text.slice(0, length);
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTEGER-KEYED SOURCE TABLE
// ═══════════════════════════════════════════════════════════════════════════════

/** Rowid past 2^53: a double cannot hold it */
export const BIG_KEY = 9007199254740993n;

/** Registry descriptor for the notes table */
export const NOTES_SOURCE = {
  name: 'notes',
  title_field: 'name',
  content_field: 'body',
  key_field: 'id',
  modified_field: 'updated_at',
  icon: '🗒️',
  priority_rank: 4,
};

export interface NoteFixture {
  id: bigint | number;
  name: string;
  body: string;
  updated_at?: string | number | null;
}

/**
 * Create notes(id INTEGER PRIMARY KEY, name, body, updated_at) and insert rows.
 * updated_at has no declared type, so numbers and text keep their storage class.
 */
export function createNotesTable(dbPath: string, notes: NoteFixture[]): void {
  const db = new Database(dbPath);
  try {
    db.exec('CREATE TABLE notes (id INTEGER PRIMARY KEY, name TEXT, body TEXT, updated_at)');
    const stmt = db.prepare('INSERT INTO notes (id, name, body, updated_at) VALUES (?, ?, ?, ?)');
    for (const note of notes) {
      stmt.run(note.id, note.name, note.body, note.updated_at ?? null);
    }
  } finally {
    db.close();
  }
}
