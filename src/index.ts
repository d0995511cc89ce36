/**
 * portcullis — MCP Server エントリポイント
 *
 * stdio トランスポートで LLM Agent と接続し、永続化された run を読み出す。
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { openDatabase } from './engine/orchestrator.js';
import { createMcpServer } from './mcp/server.js';

const config = loadConfig();
const db = openDatabase(config.outputDir);

const server = createMcpServer(db, config.scopeFile);
const transport = new StdioServerTransport();
await server.connect(transport);
