/**
 * portcullis — ffuf JSON output parser
 *
 * ffuf の `-of json` 出力から results[].url を path として取り出す。
 * 同一 URL は最初の結果を代表とし occurrences に加算する。
 */

import type { JsonObject } from '../types/entities.js';
import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { compactEvidence, isRecord, optionalString, parseJsonDocument } from './guards.js';

// ---------------------------------------------------------------------------
// 内部型: ffuf JSON 構造のバリデーション用
// ---------------------------------------------------------------------------

interface FfufResult {
  url: string;
  status?: number;
  length?: number;
  words?: number;
  lines?: number;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function validateFfufResults(raw: unknown): FfufResult[] {
  if (!isRecord(raw)) {
    throw new Error('ffuf JSON: root must be an object');
  }

  const results = raw['results'];
  if (results === undefined || results === null) {
    return [];
  }
  if (!Array.isArray(results)) {
    throw new Error('ffuf JSON: results must be an array');
  }

  const validated: FfufResult[] = [];
  for (const item of results) {
    if (!isRecord(item)) {
      throw new Error('ffuf JSON: each result must be an object');
    }
    const url = optionalString(item['url']);
    if (url === undefined) continue;
    validated.push({
      url,
      status: optionalNumber(item['status']),
      length: optionalNumber(item['length']),
      words: optionalNumber(item['words']),
      lines: optionalNumber(item['lines']),
    });
  }
  return validated;
}

// ---------------------------------------------------------------------------
// メインパーサー
// ---------------------------------------------------------------------------

export const ffufParser: ToolParser = {
  key: 'ffuf',
  parse(raw: string): ParsedRecord[] {
    if (raw.trim() === '') return [];

    const results = validateFfufResults(parseJsonDocument(raw, 'ffuf'));
    const byUrl = new Map<string, { evidence: JsonObject; occurrences: number }>();

    for (const result of results) {
      const existing = byUrl.get(result.url);
      if (existing) {
        existing.occurrences++;
        continue;
      }
      byUrl.set(result.url, {
        evidence: compactEvidence({
          statusCode: result.status,
          length: result.length,
          words: result.words,
          lines: result.lines,
        }),
        occurrences: 1,
      });
    }

    return [...byUrl].map(([url, { evidence, occurrences }]) => ({
      kind: 'path',
      asset: url,
      title: 'Discovered endpoint (ffuf)',
      category: 'content-discovery',
      occurrences,
      evidence,
    }));
  },
};
