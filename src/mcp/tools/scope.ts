/**
 * portcullis — MCP Scope Tool
 *
 * Dry-runs the scope gate: which of the given hosts a scope document admits.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { ScopeViolation, errorMessage } from '../../errors.js';
import {
  classifyHost,
  isInScope,
  loadScope,
  normalizeHost,
  parseScopeDocument,
  validate,
  type ScopeRule,
} from '../../engine/scope-gate.js';

interface ScopeVerdict {
  value: string;
  admitted: boolean;
  matchedRule?: string;
  reason?: string;
}

function verdictFor(value: string, rules: ScopeRule[]): ScopeVerdict {
  const host = normalizeHost(value);
  if (host === undefined) {
    return { value, admitted: false, reason: 'not a host, domain or URL' };
  }
  try {
    const [target] = validate([{ value: host, kind: classifyHost(host) }], rules);
    return { value, admitted: true, ...(target ? { matchedRule: target.matchedRule } : {}) };
  } catch (err) {
    if (err instanceof ScopeViolation) {
      return { value, admitted: false, reason: err.violations.join('; ') };
    }
    throw err;
  }
}

export function registerScopeTool(server: McpServer, defaultScopeFile: string): void {
  server.tool(
    'check_scope',
    'Check hosts, domains or URLs against a scope document before starting a run',
    {
      values: z.array(z.string()).min(1).describe('Hosts, domains or URLs to check'),
      scopeYaml: z
        .string()
        .optional()
        .describe('Inline scope YAML ({ allow: [...], deny: [...] }); defaults to the scope file'),
      scopeFile: z.string().optional().describe('Path of a scope YAML file'),
    },
    async ({ values, scopeYaml, scopeFile }) => {
      let rules: ScopeRule[];
      try {
        rules =
          scopeYaml !== undefined
            ? parseScopeDocument(scopeYaml)
            : loadScope(scopeFile ?? defaultScopeFile);
      } catch (err) {
        return { content: [{ type: 'text', text: errorMessage(err) }], isError: true };
      }

      const verdicts = values.map((v) => verdictFor(v, rules));
      const result = {
        admitted: verdicts.filter((v) => v.admitted).length,
        rejected: verdicts.filter((v) => !v.admitted).length,
        // discovered hosts are filtered with the same predicate
        inScope: values.filter((v) => isInScope(v, rules)),
        verdicts,
      };
      return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
    },
  );
}
