/**
 * portcullis — Findings Normalizer
 *
 * ツール固有パーサーの中間表現（ParsedRecord）を共通の FindingRecord に変換する。
 * 同じ入力からは常に同じ出力を返す:
 *   - severity は共通ラダーに正規化
 *   - id = sha256(stableStringify({tool, kind, asset, title, category, severity, evidence}))
 *   - 同一 id は occurrences を合算してマージし、id 順に並べる
 */

import { InternalOrchestrationError, NormalizationError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { BUILTIN_PARSERS } from '../parser/index.js';
import type { FindingRecord } from '../types/entities.js';
import type { ParsedRecord, ToolParser } from '../types/parser.js';
import type { ToolDescriptor } from '../types/tool.js';
import { sha256, stableStringify } from './canonical.js';
import { normalizeSeverity } from './severity.js';

export function findingId(
  record: Pick<FindingRecord, 'tool' | 'kind' | 'asset' | 'title' | 'category' | 'severity' | 'evidence'>,
): string {
  return sha256(
    stableStringify({
      tool: record.tool,
      kind: record.kind,
      asset: record.asset,
      title: record.title,
      category: record.category,
      severity: record.severity,
      evidence: record.evidence,
    }),
  );
}

export class Normalizer {
  private readonly parsers = new Map<string, ToolParser>();
  private readonly log: Logger;

  constructor(parsers: Iterable<ToolParser> = BUILTIN_PARSERS, log: Logger = createLogger('normalizer')) {
    this.log = log;
    for (const parser of parsers) {
      this.register(parser);
    }
  }

  /** @throws InternalOrchestrationError on a duplicate key */
  register(parser: ToolParser): void {
    if (this.parsers.has(parser.key)) {
      throw new InternalOrchestrationError(`Parser already registered: ${parser.key}`);
    }
    this.parsers.set(parser.key, parser);
  }

  has(key: string): boolean {
    return this.parsers.has(key);
  }

  /**
   * 生出力を正規化する。
   *
   * @param sourceArtifactHash 生出力 blob の SHA-256（全レコードに記録される）
   * @throws NormalizationError パーサーが例外を投げた場合
   * @throws InternalOrchestrationError パーサーが未登録の場合
   */
  normalize(tool: ToolDescriptor, raw: string, sourceArtifactHash: string): FindingRecord[] {
    const parser = this.parsers.get(tool.parser);
    if (parser === undefined) {
      throw new InternalOrchestrationError(`No parser registered for key "${tool.parser}" (tool ${tool.name})`);
    }

    let parsed: ParsedRecord[];
    try {
      parsed = parser.parse(raw);
    } catch (err) {
      throw new NormalizationError(tool.name, errorMessage(err), { cause: err });
    }

    const merged = new Map<string, FindingRecord>();
    let undeclared = 0;
    let empty = 0;

    for (const record of parsed) {
      if (!tool.produces.includes(record.kind)) {
        undeclared++;
        continue;
      }
      const asset = record.asset.trim();
      const title = record.title.trim();
      if (asset === '' || title === '') {
        empty++;
        continue;
      }

      const base = {
        tool: tool.name,
        kind: record.kind,
        asset,
        title,
        category: record.category,
        severity: normalizeSeverity(record.severity),
        evidence: record.evidence ?? {},
      };
      const id = findingId(base);
      const occurrences =
        record.occurrences !== undefined && Number.isInteger(record.occurrences) && record.occurrences > 0
          ? record.occurrences
          : 1;

      const existing = merged.get(id);
      if (existing) {
        existing.occurrences += occurrences;
      } else {
        merged.set(id, { id, ...base, occurrences, sourceArtifactHash });
      }
    }

    if (undeclared > 0 || empty > 0) {
      this.log.warn('dropped records', {
        tool: tool.name,
        undeclared,
        empty,
        produces: tool.produces,
      });
    }

    return [...merged.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }
}
