/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * NO graceful degradation, NO fallbacks.
 *
 * @module server/errors
 */

import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Database errors
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'

  // Storage faults
  | 'QUERY_SYNTAX_ERROR'
  | 'STORAGE_UNAVAILABLE'

  // Retrieval errors
  | 'SOURCE_TABLE_UNKNOWN'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 *
 * DatabaseError is handled separately in fromUnknown() because its code
 * distinguishes a rejected statement from an unusable database file.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
};

const DATABASE_CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.STORAGE_UNAVAILABLE]: 'STORAGE_UNAVAILABLE',
  [DatabaseErrorCode.QUERY_REJECTED]: 'QUERY_SYNTAX_ERROR',
};

/**
 * Node fs error codes mapped to file system categories
 */
const FS_CODE_TO_CATEGORY: Record<string, ErrorCategory> = {
  ENOENT: 'PATH_NOT_FOUND',
  ENOTDIR: 'PATH_NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EROFS: 'PERMISSION_DENIED',
};

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof DatabaseError) {
      // Storage messages are surfaced verbatim so callers can fix their SQL
      return new MCPError(DATABASE_CODE_TO_CATEGORY[error.code], error.message, {
        originalName: error.name,
        errorCode: error.code,
      });
    }

    if (error instanceof Error) {
      const code = errorCode(error);
      const category =
        ERROR_NAME_TO_CATEGORY[error.name] ??
        (code ? FS_CODE_TO_CATEGORY[code] : undefined) ??
        defaultCategory;

      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'recall_truncation_help',
    hint: 'Check parameter types and required fields',
  },
  DATABASE_NOT_FOUND: {
    tool: 'recall_db_open',
    hint: 'Pass a path to an existing database file or a project directory containing memory-bank/context.db',
  },
  DATABASE_NOT_SELECTED: {
    tool: 'recall_db_open',
    hint: 'Open a database with recall_db_open before querying',
  },
  QUERY_SYNTAX_ERROR: {
    tool: 'recall_db_tables',
    hint: 'Storage rejected the statement; check table and column names with recall_db_tables',
  },
  STORAGE_UNAVAILABLE: {
    tool: 'recall_db_open',
    hint: 'The database file could not be used; reopen it or check that no other process holds a lock',
  },
  SOURCE_TABLE_UNKNOWN: {
    tool: 'recall_db_tables',
    hint: 'Use one of the configured source tables listed by recall_db_tables, or omit table',
  },
  PATH_NOT_FOUND: { tool: 'recall_extract', hint: 'Verify the output directory exists' },
  PERMISSION_DENIED: {
    tool: 'recall_extract',
    hint: 'Choose an output directory the server process can write to',
  },
  CONFIGURATION_ERROR: {
    tool: 'recall_db_tables',
    hint: 'Check RECALL_SOURCE_TABLES_FILE: every source table needs name, title_field, content_field, key_field and a unique priority_rank',
  },
  INTERNAL_ERROR: { tool: 'recall_db_tables', hint: 'Run recall_db_tables for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create database not selected error
 */
export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database open. Use recall_db_open with a database file or project directory first.'
  );
}

/**
 * Create unknown source table error
 */
export function sourceTableUnknownError(table: string, configured: string[]): MCPError {
  return new MCPError(
    'SOURCE_TABLE_UNKNOWN',
    `"${table}" is not a configured source table. Configured: ${configured.join(', ')}`,
    { table, configured }
  );
}

/**
 * Create configuration error for an invalid source registry or environment
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
