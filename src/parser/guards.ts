/**
 * portcullis — パーサー共通ユーティリティ
 *
 * ツール出力は unknown として受け取り、型ガードで安全に取り出す。
 */

import type { JsonObject, JsonValue } from '../types/entities.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** 値を配列に正規化する。undefined/null は空配列を返す。 */
export function ensureArray<T>(value: T | T[] | undefined | null): T[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** 文字列なら返し、それ以外は undefined */
export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** evidence 用: JSON として表現できる値だけを残したオブジェクトを組み立てる */
export function compactEvidence(fields: Record<string, unknown>): JsonObject {
  const evidence: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && isJsonValue(value)) {
      evidence[key] = value;
    }
  }
  return evidence;
}

/**
 * JSON 文書全体をパースする。
 *
 * @throws Error 不正な JSON の場合（ツール名付きメッセージ）
 */
export function parseJsonDocument(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`${label}: invalid JSON (${detail})`, { cause: err });
  }
}

/**
 * JSONL をパースする。空行は無視し、不正な行は行番号付きでエラーにする。
 */
export function parseJsonLines(raw: string, label: string): unknown[] {
  const values: unknown[] = [];
  const lines = raw.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? '').trim();
    if (trimmed === '') continue;
    try {
      values.push(JSON.parse(trimmed));
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new Error(`${label}: invalid JSON on line ${i + 1} (${detail})`, { cause: err });
    }
  }
  return values;
}
