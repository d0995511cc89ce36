/**
 * portcullis — jadx パーサー
 *
 * 入力は { urls: string[], strings: string[] } 形式の JSON。
 * - ハードコードされた http(s) URL → asset
 * - シークレットらしき文字列 → high の finding
 */

import type { ParsedRecord, ToolParser } from '../types/parser.js';
import { isRecord, parseJsonDocument } from './guards.js';

const FRAMEWORK_URL_PREFIXES = ['http://schemas.android.com', 'https://schemas.android.com'];

const SECRET_KEYWORDS = ['api_key', 'apikey', 'secret', 'token', 'access_key', 'auth', 'password'];

function isExternalUrl(value: string): boolean {
  if (!value.startsWith('http://') && !value.startsWith('https://')) return false;
  return !FRAMEWORK_URL_PREFIXES.some((prefix) => value.startsWith(prefix));
}

function looksLikeSecret(value: string): boolean {
  if (value.length < 8) return false;
  const lower = value.toLowerCase();
  if (lower.startsWith('kotlin.') || lower.startsWith('android.')) return false;
  return SECRET_KEYWORDS.some((keyword) => lower.includes(keyword));
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export const jadxParser: ToolParser = {
  key: 'jadx',
  parse(raw: string): ParsedRecord[] {
    const data = parseJsonDocument(raw, 'jadx');
    if (!isRecord(data)) {
      throw new Error('jadx JSON: root must be an object');
    }

    const urls = [...new Set(stringList(data['urls']).filter(isExternalUrl))];
    const secrets = [...new Set(stringList(data['strings']).filter(looksLikeSecret))];

    return [
      ...urls.map(
        (url): ParsedRecord => ({
          kind: 'asset',
          asset: url,
          title: 'Hardcoded URL in Android APK',
          category: 'url',
          evidence: { type: 'url' },
        }),
      ),
      ...secrets.map(
        (secret): ParsedRecord => ({
          kind: 'finding',
          asset: secret,
          title: 'Potential hardcoded secret in Android APK',
          category: 'secret',
          severity: 'high',
          evidence: { confidence: 'medium' },
        }),
      ),
    ];
  },
};
