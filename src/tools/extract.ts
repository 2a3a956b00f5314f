/**
 * Extraction MCP Tools
 *
 * Tools: recall_extract
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extract
 */

import { writeExtraction } from '../services/retrieval/index.js';
import { getConfig, getRetrievalService } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, ExtractInput, ExtractInputShape } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle recall_extract - Return one full record by key or title
 */
export async function handleExtract(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractInput, params);
    const result = await getRetrievalService().extract({
      key: input.key,
      title: input.title,
      table: input.table,
    });

    if (!result.found) {
      return formatResponse(
        successResult({
          ...result,
          next_steps: [
            { tool: 'recall_db_tables', description: 'Check which source tables exist' },
            { tool: 'recall_sql_query', description: 'Search titles with a LIKE query' },
          ],
        })
      );
    }

    const saveToFile = input.save_to_file === true || input.output_dir !== undefined;
    if (!saveToFile) {
      return formatResponse(successResult(result));
    }

    const file = await writeExtraction(result, input.output_dir ?? getConfig().extractOutputDir);
    console.error(`[Extract] Wrote ${file.bytes} bytes to ${file.file_path}`);
    return formatResponse(successResult({ ...result, file }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extraction tools collection for MCP server registration
 */
export const extractTools: Record<string, ToolDefinition> = {
  recall_extract: {
    description:
      '[ESSENTIAL] Use to read a complete, untruncated record. Searches source tables in priority order by key (exact, then prefix) and then by title (exact, then containment). Returns content, title, source table and a file-safe name, or the tables tried when nothing matches.',
    inputSchema: ExtractInputShape,
    handler: handleExtract,
  },
};
