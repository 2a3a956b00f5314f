/**
 * Shared Startup Validation
 *
 * Builds the source registry and applies environment-driven config before
 * the transport connects.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { SourceRegistry } from '../services/retrieval/index.js';
import { configurationError, MCPError } from './errors.js';
import { getConfig, getRegistry, openDatabase, setRegistry, updateConfig } from './state.js';

export interface StartupSummary {
  sources: string[];
  readOnly: boolean;
  database: string | null;
  warnings: string[];
}

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw configurationError(`${name} must be true or false, got "${raw}"`, { [name]: raw });
}

/**
 * Validate startup configuration and apply environment overrides.
 *
 * FAIL FAST: an unusable source table configuration throws CONFIGURATION_ERROR
 * and the server must not start. A database that cannot be opened is only a
 * warning: another can be opened later with recall_db_open.
 */
export function validateStartupDependencies(env: NodeJS.ProcessEnv = process.env): StartupSummary {
  const warnings: string[] = [];

  const sourcesFile = env.RECALL_SOURCE_TABLES_FILE;
  if (sourcesFile) {
    setRegistry(SourceRegistry.fromFile(sourcesFile));
    console.error(`[Config] RECALL_SOURCE_TABLES_FILE=${sourcesFile}`);
  }

  if (env.RECALL_READ_ONLY !== undefined && env.RECALL_READ_ONLY !== '') {
    updateConfig({ readOnly: parseBoolean('RECALL_READ_ONLY', env.RECALL_READ_ONLY) });
    console.error(`[Config] RECALL_READ_ONLY=${env.RECALL_READ_ONLY}`);
  }

  if (env.RECALL_EXTRACT_DIR) {
    updateConfig({ extractOutputDir: env.RECALL_EXTRACT_DIR });
    console.error(`[Config] RECALL_EXTRACT_DIR=${env.RECALL_EXTRACT_DIR}`);
  }

  let database: string | null = null;
  if (env.RECALL_DATABASE_PATH) {
    try {
      database = openDatabase(env.RECALL_DATABASE_PATH).getPath();
      console.error(`[Config] RECALL_DATABASE_PATH=${database}`);
    } catch (error) {
      const mcpError = MCPError.fromUnknown(error);
      warnings.push(
        `RECALL_DATABASE_PATH could not be opened (${mcpError.category}): ${mcpError.message}. Use recall_db_open.`
      );
    }
  } else {
    warnings.push('RECALL_DATABASE_PATH is not set. Open a database with recall_db_open.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return { sources: getRegistry().names(), readOnly: getConfig().readOnly, database, warnings };
}
