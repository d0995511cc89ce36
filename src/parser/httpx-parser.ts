/**
 * portcullis — httpx JSONL パーサー
 *
 * httpx は生きている HTTP サービス 1 件につき 1 行の JSON を出力する。
 * resolution フェーズでは asset、vulnerability フェーズ (httpx_paths) では
 * path として扱う。
 */

import type { FindingKind } from '../types/entities.js';
import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { compactEvidence, isRecord, isStringArray, optionalString, parseJsonLines } from './guards.js';

export function createHttpxParser(
  key: string,
  kind: Extract<FindingKind, 'asset' | 'path'>,
): ToolParser {
  return {
    key,
    parse(raw: string): ParsedRecord[] {
      const records: ParsedRecord[] = [];

      for (const entry of parseJsonLines(raw, key)) {
        if (!isRecord(entry)) continue;
        const url = optionalString(entry['url']);
        if (url === undefined) continue;

        records.push({
          kind,
          asset: url,
          title: optionalString(entry['title']) ?? 'Live HTTP Service',
          category: 'http-service',
          evidence: compactEvidence({
            statusCode: typeof entry['status_code'] === 'number' ? entry['status_code'] : undefined,
            technologies: isStringArray(entry['tech']) ? entry['tech'] : [],
            webserver: optionalString(entry['webserver']),
            cdn: typeof entry['cdn'] === 'boolean' ? entry['cdn'] : undefined,
            cdnName: optionalString(entry['cdn_name']),
          }),
        });
      }

      return records;
    },
  };
}

export const httpxParser = createHttpxParser('httpx', 'asset');
export const httpxPathsParser = createHttpxParser('httpx_paths', 'path');
