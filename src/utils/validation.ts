/**
 * Content Recall MCP System - Zod Validation Schemas
 *
 * Input validation for all MCP tool inputs and for the source table
 * configuration file.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Render zod issues as "path: message; path: message"
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * SQL identifier used for registry-supplied table and column names
 */
export const SqlIdentifier = z
  .string()
  .regex(
    /^[A-Za-z_][A-Za-z0-9_]*$/,
    'Identifier must start with a letter or underscore and contain only letters, digits and underscores'
  );

/**
 * Explicit content length override.
 * null (or 0) disables truncation; omitted means "use the strategy default".
 */
export const MaxContentLength = z
  .number()
  .int('max_content_length must be an integer')
  .min(0, 'max_content_length must be 0 or greater')
  .nullable()
  .optional();

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for opening a database
 */
export const DatabaseOpenInput = z.object({
  path: z
    .string()
    .min(1, 'Path is required')
    .describe('Path to a SQLite database file, or a project directory containing memory-bank/context.db'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for running a SQL query with intent-aware truncation
 */
export const SqlQueryInput = z.object({
  query: z.string().trim().min(1, 'Query text is required').describe('SQL statement to execute'),
  max_content_length: MaxContentLength.describe(
    'Character limit for text values. Omit to let the query intent decide (400/80/150); null or 0 returns full content.'
  ),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONTENT SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for searching titles and content across the source tables
 */
export const ContentSearchInput = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search text is required')
    .describe('Words to find; every word must appear in the title or the content'),
  tables: z
    .array(z.string().trim().min(1))
    .min(1)
    .optional()
    .describe('Only search these configured source tables (default: all, in priority order)'),
  limit: z.number().int().min(1).max(100).default(20).describe('Maximum results to return'),
  snippet_length: z
    .number()
    .int()
    .min(20)
    .max(2000)
    .default(150)
    .describe('Character limit for each content snippet'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ExtractFields = {
  key: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Record identifier (full or shortened prefix); takes precedence over title'),
  title: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Title fragment, matched exactly first and then by containment'),
  table: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Restrict the search to one configured source table'),
  save_to_file: z
    .boolean()
    .optional()
    .describe('Also write the full record to <output_dir>/<safe_name>.md'),
  output_dir: z
    .string()
    .min(1)
    .optional()
    .describe('Directory for the written file (default: RECALL_EXTRACT_DIR or the OS temp dir); implies save_to_file'),
};

/**
 * Raw extraction shape, exposed as the tool's input schema
 */
export const ExtractInputShape = ExtractFields;

/**
 * Schema for extracting a full record
 */
export const ExtractInput = z
  .object(ExtractFields)
  .refine((input) => input.key !== undefined || input.title !== undefined, {
    message: 'Provide key or title (or both)',
    path: ['key'],
  });

// ═══════════════════════════════════════════════════════════════════════════════
// SQL HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Escape LIKE wildcards so user text matches literally. Use with ESCAPE '\\'.
 */
export function escapeLikePattern(pattern: string): string {
  return pattern.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}
