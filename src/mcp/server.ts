/**
 * portcullis — MCP Server
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { registerQueryTool } from './tools/query.js';
import { registerScopeTool } from './tools/scope.js';
import { registerResources } from './resources.js';

/**
 * Create a fully configured MCP server over a portcullis database.
 *
 * @param db - The better-sqlite3 database instance
 * @param scopeFile - Scope document used by check_scope when none is given
 */
export function createMcpServer(db: Database.Database, scopeFile = 'scope.yaml'): McpServer {
  const server = new McpServer({
    name: 'portcullis',
    version: '0.1.0',
  });

  registerQueryTool(server, db);
  registerScopeTool(server, scopeFile);

  registerResources(server, db);

  return server;
}
