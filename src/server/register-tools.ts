/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { databaseTools } from '../tools/database.js';
import { queryTools } from '../tools/query.js';
import { extractTools } from '../tools/extract.js';
import { searchTools } from '../tools/search.js';

/** All tool modules in registration order */
const allToolModules: Record<string, ToolDefinition>[] = [
  databaseTools,
  queryTools,
  extractTools,
  searchTools,
];

/**
 * Find the first tool name defined by more than one module
 */
export function findDuplicateToolName(
  modules: Record<string, ToolDefinition>[] = allToolModules
): string | null {
  const seen = new Set<string>();
  for (const toolModule of modules) {
    for (const name of Object.keys(toolModule)) {
      if (seen.has(name)) {
        return name;
      }
      seen.add(name);
    }
  }
  return null;
}

/**
 * Register all tools on the given MCP server instance.
 *
 * @param server - McpServer instance to register tools on
 * @returns Number of tools registered
 * @throws Exits process with code 1 if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  const duplicate = findDuplicateToolName();
  if (duplicate) {
    console.error(
      `[FATAL] Duplicate tool name detected: "${duplicate}". Each tool must have a unique name.`
    );
    process.exit(1);
  }

  let toolCount = 0;
  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
      toolCount++;
    }
  }

  return toolCount;
}

/**
 * Get total tool count without registering on a server instance.
 */
export function getToolCount(): number {
  let count = 0;
  for (const toolModule of allToolModules) {
    count += Object.keys(toolModule).length;
  }
  return count;
}
