/**
 * MCP Server State Management
 *
 * Manages global server state: the open database, the source registry and
 * configuration.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { tmpdir } from 'os';
import { DatabaseService, resolveDatabasePath } from '../services/storage/database/index.js';
import { RetrievalService, SourceRegistry } from '../services/retrieval/index.js';
import { databaseNotSelectedError } from './errors.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  readOnly: true,
  maxExtractSuggestions: 10,
  safeNameMaxLength: 50,
  minKeyPrefixLength: 4,
  extractOutputDir: tmpdir(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 * Mutable state for current database and configuration
 */
export const state: ServerState = {
  currentDatabase: null,
  registry: SourceRegistry.default(),
  config: { ...defaultConfig },
};

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require a database to be open - FAIL FAST if not
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is open
 */
export function requireDatabase(): DatabaseService {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  return state.currentDatabase;
}

/**
 * Retrieval core bound to the open database, registry and current config
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is open
 */
export function getRetrievalService(): RetrievalService {
  const db = requireDatabase();
  return new RetrievalService(db, state.registry, {
    maxExtractSuggestions: state.config.maxExtractSuggestions,
    safeNameMaxLength: state.config.safeNameMaxLength,
    minKeyPrefixLength: state.config.minKeyPrefixLength,
  });
}

/**
 * Check if a database is currently open
 */
export function hasDatabase(): boolean {
  return state.currentDatabase !== null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open a database file (or a project directory) and make it current.
 *
 * A different database is opened before the old connection closes, so a
 * failed open leaves the previous database usable. Reopening the same file
 * closes the old connection first.
 *
 * @throws DatabaseError DATABASE_NOT_FOUND or STORAGE_UNAVAILABLE
 */
export function openDatabase(inputPath: string): DatabaseService {
  const oldDb = state.currentDatabase;
  const readOnly = state.config.readOnly;

  if (oldDb && oldDb.getPath() === resolveDatabasePath(inputPath)) {
    state.currentDatabase = null;
    oldDb.close();
    state.currentDatabase = DatabaseService.open(inputPath, { readOnly });
    return state.currentDatabase;
  }

  const newDb = DatabaseService.open(inputPath, { readOnly });
  if (oldDb) {
    oldDb.close();
  }
  state.currentDatabase = newDb;
  return newDb;
}

/**
 * Close the current database, if any
 */
export function clearDatabase(): void {
  if (state.currentDatabase) {
    state.currentDatabase.close();
    state.currentDatabase = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════════

export function getRegistry(): SourceRegistry {
  return state.registry;
}

/**
 * Replace the source registry. Only called during startup.
 */
export function setRegistry(registry: SourceRegistry): void {
  state.registry = registry;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearDatabase();
  state.registry = SourceRegistry.default();
  state.config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Close the database connection on process exit.
 */
process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(
        '[state] database close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.currentDatabase = null;
  }
});
