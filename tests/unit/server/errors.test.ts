/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests MCPError class, error factories, and error response formatting.
 * FAIL FAST: All errors should throw immediately with full context.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  MCPError,
  configurationError,
  databaseNotSelectedError,
  formatErrorResponse,
  getRecoveryHint,
  sourceTableUnknownError,
  validationError,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import { DatabaseError, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import { ValidationError } from '../../../src/utils/validation.js';

const ALL_CATEGORIES: ErrorCategory[] = [
  'VALIDATION_ERROR',
  'DATABASE_NOT_FOUND',
  'DATABASE_NOT_SELECTED',
  'QUERY_SYNTAX_ERROR',
  'STORAGE_UNAVAILABLE',
  'SOURCE_TABLE_UNKNOWN',
  'PATH_NOT_FOUND',
  'PERMISSION_DENIED',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
];

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCPError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError', () => {
  describe('constructor', () => {
    it('should create error with category, message and details', () => {
      const error = new MCPError('VALIDATION_ERROR', 'Invalid input', { field: 'key' });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('MCPError');
      expect(error.category).toBe('VALIDATION_ERROR');
      expect(error.message).toBe('Invalid input');
      expect(error.details).toEqual({ field: 'key' });
    });

    it('should have stack trace', () => {
      const error = new MCPError('INTERNAL_ERROR', 'Something failed');
      expect(error.stack).toContain('MCPError');
    });
  });

  describe('fromUnknown', () => {
    it('should return MCPError unchanged', () => {
      const original = validationError('bad');
      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it('should map rejected statements to QUERY_SYNTAX_ERROR with the storage message', () => {
      const error = MCPError.fromUnknown(
        new DatabaseError('Query failed: no such table: x', DatabaseErrorCode.QUERY_REJECTED)
      );
      expect(error.category).toBe('QUERY_SYNTAX_ERROR');
      expect(error.message).toBe('Query failed: no such table: x');
      expect(error.details).toEqual({ originalName: 'DatabaseError', errorCode: 'QUERY_REJECTED' });
    });

    it('should map unusable databases to STORAGE_UNAVAILABLE', () => {
      const error = MCPError.fromUnknown(
        new DatabaseError('locked', DatabaseErrorCode.STORAGE_UNAVAILABLE)
      );
      expect(error.category).toBe('STORAGE_UNAVAILABLE');
    });

    it('should map missing databases to DATABASE_NOT_FOUND', () => {
      const error = MCPError.fromUnknown(
        new DatabaseError('Database not found at /x', DatabaseErrorCode.DATABASE_NOT_FOUND)
      );
      expect(error.category).toBe('DATABASE_NOT_FOUND');
    });

    it('should map ValidationError and ZodError to VALIDATION_ERROR', () => {
      expect(MCPError.fromUnknown(new ValidationError('query: Required')).category).toBe(
        'VALIDATION_ERROR'
      );
      const zodError = z.string().safeParse(1);
      expect(zodError.success).toBe(false);
      if (!zodError.success) {
        expect(MCPError.fromUnknown(zodError.error).category).toBe('VALIDATION_ERROR');
      }
    });

    it('should map file system codes', () => {
      expect(MCPError.fromUnknown(fsError('ENOENT', 'no such file')).category).toBe(
        'PATH_NOT_FOUND'
      );
      expect(MCPError.fromUnknown(fsError('ENOTDIR', 'not a dir')).category).toBe(
        'PATH_NOT_FOUND'
      );
      const denied = MCPError.fromUnknown(fsError('EACCES', 'permission denied'));
      expect(denied.category).toBe('PERMISSION_DENIED');
      expect(denied.details?.errorCode).toBe('EACCES');
    });

    it('should fall back to the default category', () => {
      expect(MCPError.fromUnknown(new Error('boom')).category).toBe('INTERNAL_ERROR');
      expect(MCPError.fromUnknown(new Error('boom'), 'CONFIGURATION_ERROR').category).toBe(
        'CONFIGURATION_ERROR'
      );
    });

    it('should wrap non-Error values', () => {
      const error = MCPError.fromUnknown('plain string');
      expect(error.message).toBe('plain string');
      expect(error.details).toEqual({ originalValue: 'plain string' });
    });
  });

  describe('toJSON', () => {
    it('should serialize category, message and details', () => {
      const json = new MCPError('PATH_NOT_FOUND', 'missing', { path: '/x' }).toJSON();
      expect(json.name).toBe('MCPError');
      expect(json.category).toBe('PATH_NOT_FOUND');
      expect(json.message).toBe('missing');
      expect(json.details).toEqual({ path: '/x' });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS AND FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('getRecoveryHint', () => {
  it('should provide a recall tool and hint for every category', () => {
    for (const category of ALL_CATEGORIES) {
      const hint = getRecoveryHint(category);
      expect(hint.tool.startsWith('recall_'), category).toBe(true);
      expect(hint.hint.length, category).toBeGreaterThan(0);
    }
  });
});

describe('formatErrorResponse', () => {
  it('should include category, message, recovery and details', () => {
    const response = formatErrorResponse(databaseNotSelectedError());
    expect(response).toEqual({
      success: false,
      error: {
        category: 'DATABASE_NOT_SELECTED',
        message:
          'No database open. Use recall_db_open with a database file or project directory first.',
        recovery: {
          tool: 'recall_db_open',
          hint: 'Open a database with recall_db_open before querying',
        },
        details: undefined,
      },
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('error factories', () => {
  it('sourceTableUnknownError lists the configured tables', () => {
    const error = sourceTableUnknownError('users', ['documents_v2', 'discussions']);
    expect(error.category).toBe('SOURCE_TABLE_UNKNOWN');
    expect(error.message).toBe(
      '"users" is not a configured source table. Configured: documents_v2, discussions'
    );
    expect(error.details).toEqual({ table: 'users', configured: ['documents_v2', 'discussions'] });
  });

  it('configurationError carries details', () => {
    const error = configurationError('bad config', { file: 'x.json' });
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.details).toEqual({ file: 'x.json' });
  });
});
