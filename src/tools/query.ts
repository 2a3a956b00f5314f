/**
 * Query MCP Tools
 *
 * Tools: recall_sql_query, recall_truncation_help
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/query
 */

import { DEFAULT_LIMITS, TRUNCATION_MARKER } from '../services/retrieval/index.js';
import { getRegistry, getRetrievalService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, SqlQueryInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle recall_sql_query - Execute SQL and truncate long text by query intent
 */
export async function handleSqlQuery(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SqlQueryInput, params);
    const result = await getRetrievalService().runQuery(input.query, input.max_content_length);
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle recall_truncation_help - Describe the truncation strategies
 */
export async function handleTruncationHelp(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const contentFields = getRegistry().contentFields();
    return formatResponse(
      successResult({
        strategies: [
          {
            strategy: 'CONTENT_FOCUSED',
            limit: DEFAULT_LIMITS.CONTENT_FOCUSED,
            applies_when: `The query selects or filters on a content column (${contentFields.join(', ')}), or selects summary from discussions`,
            example: "SELECT title, content FROM documents_v2 WHERE content LIKE '%deploy%'",
          },
          {
            strategy: 'OVERVIEW',
            limit: DEFAULT_LIMITS.OVERVIEW,
            applies_when: 'The query counts rows, reads the schema, selects * or has LIMIT 1 to 5',
            example: 'SELECT * FROM artifacts LIMIT 3',
          },
          {
            strategy: 'BALANCED',
            limit: DEFAULT_LIMITS.BALANCED,
            applies_when: 'No content or overview pattern matches',
            example: 'SELECT uuid, title FROM documents_v2 ORDER BY updated_at DESC',
          },
        ],
        override: {
          max_content_length:
            'Integer character limit for every text value. null or 0 returns full values.',
          example: { query: 'SELECT content FROM discussions', max_content_length: null },
        },
        marker: TRUNCATION_MARKER,
        rules: [
          'Lengths count characters, not bytes',
          'Cuts move back to the nearest whitespace in the last 20% of the limit when the limit is above 20',
          'Values already shortened to the same limit are left unchanged',
          'Truncated results carry recall_extract suggestions for the full records',
        ],
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
 * Query tools collection for MCP server registration
 */
export const queryTools: Record<string, ToolDefinition> = {
  recall_sql_query: {
    description:
      '[ESSENTIAL] Use to run SQL against the open database. Long text values are truncated by query intent (content 400, overview 80, otherwise 150 chars). Returns rows, truncation report and follow-up suggestions. Pass max_content_length: null for full values.',
    inputSchema: SqlQueryInput.shape,
    handler: handleSqlQuery,
  },
  recall_truncation_help: {
    description:
      '[HELP] Use to see how query results are truncated: strategies, default limits, examples and how to disable truncation.',
    inputSchema: {},
    handler: handleTruncationHelp,
  },
};
