/**
 * Content Search MCP Tools
 *
 * Tools: recall_search
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/search
 */

import { getRetrievalService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, ContentSearchInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle recall_search - Ranked word search across the source tables
 */
export async function handleContentSearch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ContentSearchInput, params);
    const result = await getRetrievalService().searchContent({
      query: input.query,
      tables: input.tables,
      limit: input.limit,
      snippetLength: input.snippet_length,
    });

    return formatResponse(
      successResult({
        ...result,
        next_steps:
          result.results.length > 0
            ? [{ tool: 'recall_extract', description: 'Read a full record by the key of a result' }]
            : [
                { tool: 'recall_db_tables', description: 'Check which source tables exist' },
                { tool: 'recall_sql_query', description: 'Query other columns with LIKE' },
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
 * Search tools collection for MCP server registration
 */
export const searchTools: Record<string, ToolDefinition> = {
  recall_search: {
    description:
      '[ESSENTIAL] Use to find records containing every word of a query in their title or content, across the source tables. Results are ranked (title words count double, then table priority, then recency) and carry a short snippet plus the recall_extract call for the full record.',
    inputSchema: ContentSearchInput.shape,
    handler: handleContentSearch,
  },
};
