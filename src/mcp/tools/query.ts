/**
 * portcullis — MCP Query Tool
 *
 * Single read-only 'query' tool with an 'action' parameter over persisted
 * runs. Nothing here starts or mutates a run.
 *
 * Actions: list_runs, get_run, list_invocations, list_findings
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type Database from 'better-sqlite3';
import { z } from 'zod';
import { ArtifactStore } from '../../engine/artifact-store.js';
import { collectFindings } from '../../engine/orchestrator.js';
import { RunRecorder } from '../../engine/run-recorder.js';
import { severityAtLeast } from '../../engine/severity.js';
import { INVOCATION_STATUSES, SEVERITIES } from '../../types/entities.js';

function text(value: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(message: string): {
  content: Array<{ type: 'text'; text: string }>;
  isError: true;
} {
  return { content: [{ type: 'text', text: message }], isError: true };
}

export function registerQueryTool(server: McpServer, db: Database.Database): void {
  const recorder = new RunRecorder(db);
  const store = new ArtifactStore(db);

  server.tool(
    'query',
    'Query persisted portcullis runs. Actions: list_runs, get_run, list_invocations, list_findings',
    {
      action: z.enum(['list_runs', 'get_run', 'list_invocations', 'list_findings']),
      runId: z.string().optional().describe('Run ID (required except for list_runs)'),
      // list_invocations
      status: z.enum(INVOCATION_STATUSES).optional().describe('Invocation status filter'),
      // list_invocations / list_findings
      tool: z.string().optional().describe('Tool name filter'),
      // list_findings
      minSeverity: z
        .enum(SEVERITIES)
        .optional()
        .describe('Only findings at or above this severity (assets and paths are excluded)'),
    },
    async ({ action, runId, status, tool, minSeverity }) => {
      if (action === 'list_runs') {
        return text(recorder.list());
      }

      if (!runId) {
        return failure(`runId parameter required for ${action}`);
      }
      const state = recorder.load(runId);
      if (!state) {
        return failure(`Run not found: ${runId}`);
      }

      switch (action) {
        case 'get_run': {
          const { invocations, ...header } = state;
          const counts: Record<string, number> = {};
          for (const invocation of invocations) {
            counts[invocation.status] = (counts[invocation.status] ?? 0) + 1;
          }
          return text({ ...header, invocationCounts: counts });
        }
        case 'list_invocations':
          return text(recorder.listInvocations(runId, status, tool));
        case 'list_findings': {
          let findings = collectFindings(store, runId);
          if (tool) {
            findings = findings.filter((f) => f.tool === tool);
          }
          if (minSeverity) {
            findings = findings.filter((f) => severityAtLeast(f.severity, minSeverity));
          }
          return text(findings);
        }
      }
    },
  );
}
