/**
 * portcullis — MobSF JSON レポートパーサー
 *
 * Android / iOS 共通。以下のセクションから finding を抽出する。
 *   1. manifest_analysis.manifest_findings
 *   2. code_analysis.findings（主な情報源）
 *   3. network_security.network_findings
 *   4. certificate_analysis.certificate_findings（[severity, description, title] のタプル）
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { compactEvidence, isRecord, optionalString, parseJsonDocument } from './guards.js';

function severityLabel(value: unknown): string {
  return typeof value === 'string' && value.trim() !== '' ? value : 'info';
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function manifestFindings(report: Record<string, unknown>, asset: string): ParsedRecord[] {
  const manifest = report['manifest_analysis'];
  if (!isRecord(manifest)) return [];
  return records(manifest['manifest_findings']).map((item) => ({
    kind: 'finding',
    asset,
    title: optionalString(item['title']) ?? 'Manifest Issue',
    category: 'manifest',
    severity: severityLabel(item['severity']),
    evidence: compactEvidence({
      rule: optionalString(item['rule']),
      description: optionalString(item['description']),
      component: item['component'],
    }),
  }));
}

function codeFindings(report: Record<string, unknown>, asset: string): ParsedRecord[] {
  const code = report['code_analysis'];
  const findings = isRecord(code) ? code['findings'] : undefined;
  if (!isRecord(findings)) return [];

  const result: ParsedRecord[] = [];
  for (const [ruleId, block] of Object.entries(findings)) {
    if (!isRecord(block)) continue;
    const meta = isRecord(block['metadata']) ? block['metadata'] : {};
    const files = isRecord(block['files']) ? block['files'] : {};
    const fileCount = Object.keys(files).length;

    result.push({
      kind: 'finding',
      asset,
      title: optionalString(meta['description']) ?? ruleId,
      category: 'code',
      severity: severityLabel(meta['severity']),
      occurrences: Math.max(fileCount, 1),
      evidence: compactEvidence({
        rule: ruleId,
        cwe: meta['cwe'],
        owasp: meta['owasp-mobile'],
        masvs: meta['masvs'],
        cvss: meta['cvss'],
        references: meta['ref'],
        files,
      }),
    });
  }
  return result;
}

function networkFindings(report: Record<string, unknown>, asset: string): ParsedRecord[] {
  const network = report['network_security'];
  if (!isRecord(network)) return [];
  return records(network['network_findings']).map((item) => ({
    kind: 'finding',
    asset,
    title: 'Network Security Issue',
    category: 'network',
    severity: severityLabel(item['severity']),
    evidence: compactEvidence({
      description: optionalString(item['description']),
      scope: item['scope'],
    }),
  }));
}

function certificateFindings(report: Record<string, unknown>, asset: string): ParsedRecord[] {
  const certs = report['certificate_analysis'];
  if (!isRecord(certs)) return [];
  const tuples = certs['certificate_findings'];
  if (!Array.isArray(tuples)) return [];

  const result: ParsedRecord[] = [];
  for (const tuple of tuples) {
    if (!Array.isArray(tuple) || tuple.length < 3) continue;
    const [severity, description, title]: unknown[] = tuple;
    result.push({
      kind: 'finding',
      asset,
      title: optionalString(title) ?? 'Certificate Issue',
      category: 'certificate',
      severity: severityLabel(severity),
      evidence: compactEvidence({ description: optionalString(description) }),
    });
  }
  return result;
}

export const mobsfParser: ToolParser = {
  key: 'mobsf',
  parse(raw: string): ParsedRecord[] {
    const report = parseJsonDocument(raw, 'mobsf');
    if (!isRecord(report)) {
      throw new Error('mobsf JSON: root must be an object');
    }

    const asset =
      optionalString(report['package_name']) ??
      optionalString(report['bundle_id']) ??
      optionalString(report['app_name']) ??
      optionalString(report['file_name']) ??
      'mobile-app';

    return [
      ...manifestFindings(report, asset),
      ...codeFindings(report, asset),
      ...networkFindings(report, asset),
      ...certificateFindings(report, asset),
    ];
  },
};
