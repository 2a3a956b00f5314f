/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { DatabaseService } from '../services/storage/database/index.js';
import type { SourceRegistry } from '../services/retrieval/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Open databases read-only; write statements are then rejected by storage (default: true) */
  readOnly: boolean;

  /** Maximum per-record extraction suggestions in a query response (default: 10) */
  maxExtractSuggestions: number;

  /** Maximum length of the title part of derived safe names (default: 50) */
  safeNameMaxLength: number;

  /** Shortest key fragment used for prefix matching (default: 4) */
  minKeyPrefixLength: number;

  /** Default directory for extraction files (default: OS temp dir) */
  extractOutputDir: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Currently open database */
  currentDatabase: DatabaseService | null;

  /** Source tables searched by extraction, fixed at startup */
  registry: SourceRegistry;

  /** Server configuration */
  config: ServerConfig;
}
