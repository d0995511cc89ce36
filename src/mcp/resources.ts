/**
 * portcullis — MCP Resources
 *
 * Read-only resources for browsing persisted runs.
 */

import { ResourceTemplate, type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { RunRecorder } from '../engine/run-recorder.js';

export function registerResources(server: McpServer, db: Database.Database): void {
  const recorder = new RunRecorder(db);

  // 1. portcullis://runs — run list, newest first
  server.resource(
    'runs',
    'portcullis://runs',
    { description: 'List of persisted runs (newest first)' },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: 'application/json',
          text: JSON.stringify(recorder.list(), null, 2),
        },
      ],
    }),
  );

  // 2. portcullis://runs/{id} — full run state with invocations
  server.resource(
    'run-detail',
    new ResourceTemplate('portcullis://runs/{id}', { list: undefined }),
    { description: 'Full run state: targets, phase history and every invocation' },
    async (uri, variables) => {
      const raw = variables['id'];
      const runId = Array.isArray(raw) ? (raw[0] ?? '') : (raw ?? '');
      const state = recorder.load(runId);
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(state ?? { error: `Run not found: ${runId}` }, null, 2),
          },
        ],
      };
    },
  );
}
