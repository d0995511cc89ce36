/**
 * portcullis — graphql-cop パーサー
 *
 * `<endpoint> :: <detail>` 形式の行を path として取り出す。
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';

export const graphqlCopParser: ToolParser = {
  key: 'graphql-cop',
  parse(raw: string): ParsedRecord[] {
    const counts = new Map<string, { endpoint: string; detail: string; occurrences: number }>();

    for (const line of raw.split('\n')) {
      const sep = line.indexOf('::');
      if (sep === -1) continue;
      const endpoint = line.slice(0, sep).trim();
      const detail = line.slice(sep + 2).trim();
      if (endpoint === '') continue;

      const key = `${endpoint}\0${detail}`;
      const existing = counts.get(key);
      if (existing) {
        existing.occurrences++;
      } else {
        counts.set(key, { endpoint, detail, occurrences: 1 });
      }
    }

    return [...counts.values()].map(({ endpoint, detail, occurrences }) => ({
      kind: 'path',
      asset: endpoint,
      title: `GraphQL exposure: ${detail}`,
      category: 'graphql',
      occurrences,
      evidence: { detail, technologies: ['graphql'] },
    }));
  },
};
