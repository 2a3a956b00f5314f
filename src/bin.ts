#!/usr/bin/env node
/**
 * Content Recall MCP Server - CLI Entry Point
 *
 * bin entry point for global npm installation; imports and runs the server.
 *
 * Usage:
 *   content-recall-mcp                  # after npm install -g
 *   RECALL_DATABASE_PATH=./project content-recall-mcp
 *   node dist/bin.js                    # direct invocation
 *
 * @module bin
 */

import './index.js';
