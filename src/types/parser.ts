/**
 * portcullis — Parser intermediate types
 *
 * パーサーはハッシュ・タイムスタンプを持たない中間表現を返す。
 * Normalizer が共通スキーマへの組み立てと ID 付与を担当する。
 */

import type { FindingKind, JsonObject } from './entities.js';

// ============================================================
// 中間表現
// ============================================================

/** ツール出力 1 件分の中間表現 */
export interface ParsedRecord {
  kind: FindingKind;
  asset: string;
  title: string;
  category: string;
  /** ツール固有の表記のまま（Normalizer が正規化する） */
  severity?: string;
  occurrences?: number;
  evidence?: JsonObject;
}

// ============================================================
// パーサー契約
// ============================================================

/** ツール別パーサーの唯一の能力: 生出力 → 中間表現 */
export interface ToolParser {
  readonly key: string;
  parse(raw: string): ParsedRecord[];
}
