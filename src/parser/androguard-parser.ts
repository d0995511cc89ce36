/**
 * portcullis — androguard パーサー
 *
 * 入力は { axml: string, sign: string } 形式の JSON。
 * axml はマニフェスト解析、sign は署名チェックに使う。
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { manifestRecords } from './apktool-parser.js';
import { summarizeManifest } from './android-manifest.js';
import { isRecord, optionalString, parseJsonDocument } from './guards.js';

const DANGEROUS_PERMISSIONS = new Set([
  'android.permission.READ_SMS',
  'android.permission.SEND_SMS',
  'android.permission.READ_CONTACTS',
  'android.permission.WRITE_CONTACTS',
  'android.permission.RECORD_AUDIO',
  'android.permission.CAMERA',
  'android.permission.READ_EXTERNAL_STORAGE',
  'android.permission.WRITE_EXTERNAL_STORAGE',
]);

function signingRecords(sign: string): ParsedRecord[] {
  const records: ParsedRecord[] = [];
  for (const scheme of ['v1', 'v2'] as const) {
    if (sign.includes(`Is signed ${scheme}: False`)) {
      records.push({
        kind: 'finding',
        asset: 'APK',
        title: `APK is not ${scheme} signed`,
        category: 'signing',
        severity: 'low',
      });
    }
  }
  return records;
}

export const androguardParser: ToolParser = {
  key: 'androguard',
  parse(raw: string): ParsedRecord[] {
    const data = parseJsonDocument(raw, 'androguard');
    if (!isRecord(data)) {
      throw new Error('androguard JSON: root must be an object');
    }

    const records: ParsedRecord[] = [];

    const axml = optionalString(data['axml']);
    if (axml !== undefined) {
      const summary = summarizeManifest(axml);
      records.push(...manifestRecords(summary));
      for (const permission of summary.permissions) {
        if (!DANGEROUS_PERMISSIONS.has(permission)) continue;
        records.push({
          kind: 'finding',
          asset: permission,
          title: 'Dangerous Android permission requested',
          category: 'permission',
          severity: 'medium',
          evidence: { permission },
        });
      }
    }

    const sign = optionalString(data['sign']);
    if (sign !== undefined) {
      records.push(...signingRecords(sign));
    }

    return records;
  },
};
