/**
 * Database MCP Tools
 *
 * Tools: recall_db_open, recall_db_tables
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/database
 */

import type { TableInfo } from '../services/storage/database/index.js';
import type { SourceRegistry } from '../services/retrieval/index.js';
import { getRegistry, openDatabase, requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, DatabaseOpenInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Which configured source tables the open database actually has
 */
function sourceCoverage(
  registry: SourceRegistry,
  tables: TableInfo[]
): { present: string[]; missing: string[] } {
  const names = new Set(tables.map((t) => t.name));
  return {
    present: registry.names().filter((name) => names.has(name)),
    missing: registry.names().filter((name) => !names.has(name)),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle recall_db_open - Open a database file or project directory
 */
export async function handleDatabaseOpen(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseOpenInput, params);
    const db = openDatabase(input.path);
    const tables = db.listTableInfo(false);
    const sources = sourceCoverage(getRegistry(), tables);

    console.error(
      `[Database] Opened ${db.getPath()} (${db.isReadOnly() ? 'read-only' : 'read-write'}), ` +
        `${sources.present.length}/${sources.present.length + sources.missing.length} source tables present`
    );

    return formatResponse(
      successResult({
        path: db.getPath(),
        read_only: db.isReadOnly(),
        tables: tables.map((t) => t.name),
        sources,
        next_steps: [
          { tool: 'recall_sql_query', description: 'Query the database with intent-aware truncation' },
          { tool: 'recall_extract', description: 'Read a full record by key or title' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle recall_db_tables - List tables with row counts, columns and source table coverage
 */
export async function handleDatabaseTables(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const db = requireDatabase();
    const registry = getRegistry();
    const tables = db.listTableInfo(true);
    const byName = new Map(tables.map((t) => [t.name, t]));

    return formatResponse(
      successResult({
        path: db.getPath(),
        read_only: db.isReadOnly(),
        tables: tables.map((table) => ({ ...table, columns: db.listColumns(table.name) })),
        sources: registry.tables.map((source) => ({
          ...source,
          present: byName.has(source.name),
          row_count: byName.get(source.name)?.row_count ?? null,
        })),
        coverage: sourceCoverage(registry, tables),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Database tools collection for MCP server registration
 */
export const databaseTools: Record<string, ToolDefinition> = {
  recall_db_open: {
    description:
      '[ESSENTIAL] Use first to open a memory-bank database. Accepts a SQLite file or a project directory containing memory-bank/context.db. Returns tables and which source tables are present.',
    inputSchema: DatabaseOpenInput.shape,
    handler: handleDatabaseOpen,
  },
  recall_db_tables: {
    description:
      '[STATUS] Use to list tables and views with row counts and columns, plus the configured source tables in search priority order.',
    inputSchema: {},
    handler: handleDatabaseTables,
  },
};
