/**
 * portcullis — apktool パーサー
 *
 * apktool がデコードした AndroidManifest.xml を入力とする。
 * debuggable / cleartext は finding、export されたコンポーネントは asset。
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { summarizeManifest, type ManifestSummary } from './android-manifest.js';

const MANIFEST_ASSET = 'AndroidManifest.xml';

/** マニフェスト要約から共通のレコードを組み立てる（androguard と共有） */
export function manifestRecords(summary: ManifestSummary): ParsedRecord[] {
  const records: ParsedRecord[] = [];

  if (summary.debuggable) {
    records.push({
      kind: 'finding',
      asset: MANIFEST_ASSET,
      title: 'Application is debuggable',
      category: 'manifest',
      severity: 'medium',
    });
  }

  if (summary.usesCleartextTraffic) {
    records.push({
      kind: 'finding',
      asset: MANIFEST_ASSET,
      title: 'Cleartext traffic is permitted',
      category: 'manifest',
      severity: 'medium',
    });
  }

  for (const component of summary.exportedComponents) {
    records.push({
      kind: 'asset',
      asset: component.name,
      title: `Exported Android component (${component.tag})`,
      category: 'component',
      evidence: { component: component.tag, exported: true },
    });
  }

  return records;
}

export const apktoolParser: ToolParser = {
  key: 'apktool',
  parse(raw: string): ParsedRecord[] {
    if (raw.trim() === '') {
      throw new Error('apktool: AndroidManifest.xml is empty');
    }
    return manifestRecords(summarizeManifest(raw));
  },
};
