/**
 * portcullis — Nuclei JSONL パーサー
 *
 * nuclei の JSONL 出力を解析する。各行は独立した JSON オブジェクト。
 * (asset, template-id) 単位で重複排除し、最も高い severity を残す。
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { severityRank, normalizeSeverity } from '../engine/severity.js';
import { isRecord, isStringArray, optionalString, parseJsonLines } from './guards.js';

// ============================================================
// nuclei finding の型定義（unknown から安全に取り出すための構造）
// ============================================================

interface NucleiFinding {
  templateId: string;
  asset: string;
  name: string;
  severity: string;
  tags: string[];
  matchedAt?: string;
  cveIds: string[];
}

function extractTags(value: unknown): string[] {
  if (isStringArray(value)) return value;
  // 古い nuclei はカンマ区切り文字列で出力する
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((t) => t.trim())
      .filter((t) => t !== '');
  }
  return [];
}

function toNucleiFinding(value: unknown): NucleiFinding | undefined {
  if (!isRecord(value)) return undefined;

  const templateId = optionalString(value['template-id']);
  const asset =
    optionalString(value['host']) ?? optionalString(value['matched-at']) ?? optionalString(value['url']);
  if (templateId === undefined || asset === undefined) return undefined;

  const info = isRecord(value['info']) ? value['info'] : {};
  const classification = isRecord(info['classification']) ? info['classification'] : {};

  return {
    templateId,
    asset,
    name: optionalString(info['name']) ?? 'Nuclei Finding',
    severity: optionalString(info['severity']) ?? 'info',
    tags: extractTags(info['tags']),
    matchedAt: optionalString(value['matched-at']),
    cveIds: isStringArray(classification['cve-id']) ? classification['cve-id'] : [],
  };
}

// ============================================================
// vulnType 推定
// ============================================================

/** タグ配列からカテゴリを推定する。優先度順に判定する。 */
function inferCategory(tags: string[]): string {
  const priorityTags = ['sqli', 'xss', 'rce', 'lfi', 'ssrf', 'cve', 'misconfig', 'exposure'] as const;
  for (const tag of priorityTags) {
    if (tags.includes(tag)) {
      return tag;
    }
  }
  return 'vulnerability';
}

// ============================================================
// メインパーサー
// ============================================================

interface Aggregate {
  finding: NucleiFinding;
  occurrences: number;
}

export const nucleiParser: ToolParser = {
  key: 'nuclei',
  parse(raw: string): ParsedRecord[] {
    const byKey = new Map<string, Aggregate>();

    for (const line of parseJsonLines(raw, 'nuclei')) {
      const finding = toNucleiFinding(line);
      if (finding === undefined) continue;

      const key = `${finding.asset}\0${finding.templateId}`;
      const existing = byKey.get(key);
      if (existing === undefined) {
        byKey.set(key, { finding, occurrences: 1 });
        continue;
      }

      existing.occurrences++;
      if (
        severityRank(normalizeSeverity(finding.severity)) >
        severityRank(normalizeSeverity(existing.finding.severity))
      ) {
        existing.finding = finding;
      }
    }

    return [...byKey.values()].map(({ finding, occurrences }) => ({
      kind: 'finding',
      asset: finding.asset,
      title: finding.name,
      category: inferCategory(finding.tags),
      severity: finding.severity,
      occurrences,
      evidence: {
        templateId: finding.templateId,
        tags: finding.tags,
        cveIds: finding.cveIds,
        ...(finding.matchedAt !== undefined ? { matchedAt: finding.matchedAt } : {}),
      },
    }));
  },
};
