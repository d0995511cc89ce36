import { describe, it, expect } from 'vitest';
import { Normalizer, findingId } from '../../src/engine/normalizer.js';
import { InternalOrchestrationError, NormalizationError } from '../../src/errors.js';
import { createLogger } from '../../src/logger.js';
import type { ParsedRecord, ToolParser } from '../../src/types/parser.js';
import { ToolDescriptorSchema } from '../../src/types/tool.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function stubParser(key: string, records: ParsedRecord[] | (() => ParsedRecord[])): ToolParser {
  return {
    key,
    parse: () => (typeof records === 'function' ? records() : records),
  };
}

function toolFor(parser: string, produces: Array<'asset' | 'path' | 'finding'> = ['asset', 'finding']) {
  return ToolDescriptorSchema.parse({
    name: 'scanner',
    version: '1.0.0',
    image: 'portcullis/scanner:1.0.0',
    consumes: ['asset'],
    produces,
    fanOut: 'batch',
    args: [],
    parser,
  });
}

const SOURCE = 's'.repeat(64);
const log = createLogger('test');

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('Normalizer', () => {
  it('共通スキーマへ変換し severity を正規化する', () => {
    const normalizer = new Normalizer(
      [
        stubParser('stub', [
          {
            kind: 'finding',
            asset: ' www.example.com ',
            title: 'Exposed .git directory',
            category: 'exposure',
            severity: 'HIGH',
            evidence: { templateId: 'git-config' },
          },
        ]),
      ],
      log,
    );

    const [record] = normalizer.normalize(toolFor('stub'), 'raw', SOURCE);

    expect(record).toEqual({
      id: findingId({
        tool: 'scanner',
        kind: 'finding',
        asset: 'www.example.com',
        title: 'Exposed .git directory',
        category: 'exposure',
        severity: 'high',
        evidence: { templateId: 'git-config' },
      }),
      tool: 'scanner',
      kind: 'finding',
      asset: 'www.example.com',
      title: 'Exposed .git directory',
      category: 'exposure',
      severity: 'high',
      occurrences: 1,
      evidence: { templateId: 'git-config' },
      sourceArtifactHash: SOURCE,
    });
  });

  it('同じ入力からは同じ出力を返す（冪等）', () => {
    const records: ParsedRecord[] = [
      { kind: 'asset', asset: 'b.example.com', title: 'Host', category: 'subdomain' },
      { kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'subdomain' },
    ];
    const normalizer = new Normalizer([stubParser('stub', records)], log);
    const reversed = new Normalizer([stubParser('stub', [...records].reverse())], log);

    const first = normalizer.normalize(toolFor('stub'), 'raw', SOURCE);
    const second = normalizer.normalize(toolFor('stub'), 'raw', SOURCE);

    expect(second).toEqual(first);
    expect(reversed.normalize(toolFor('stub'), 'raw', SOURCE)).toEqual(first);
    expect(first.map((r) => r.id)).toEqual([...first.map((r) => r.id)].sort());
  });

  it('同一 ID のレコードは occurrences を合算する', () => {
    const normalizer = new Normalizer(
      [
        stubParser('stub', [
          { kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'dns', occurrences: 2 },
          { kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'dns' },
          { kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'dns', occurrences: 0 },
        ]),
      ],
      log,
    );

    const result = normalizer.normalize(toolFor('stub'), 'raw', SOURCE);
    expect(result).toHaveLength(1);
    expect(result[0]?.occurrences).toBe(4);
  });

  it('宣言外の kind と空の asset / title は捨てられる', () => {
    const normalizer = new Normalizer(
      [
        stubParser('stub', [
          { kind: 'path', asset: 'https://a.example.com/x', title: 'URL', category: 'crawl' },
          { kind: 'asset', asset: '  ', title: 'Host', category: 'dns' },
          { kind: 'asset', asset: 'a.example.com', title: '', category: 'dns' },
          { kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'dns' },
        ]),
      ],
      log,
    );

    const result = normalizer.normalize(toolFor('stub', ['asset']), 'raw', SOURCE);
    expect(result.map((r) => r.asset)).toEqual(['a.example.com']);
  });

  it('asset / path は severity を持たない', () => {
    const normalizer = new Normalizer(
      [stubParser('stub', [{ kind: 'asset', asset: 'a.example.com', title: 'Host', category: 'dns' }])],
      log,
    );
    expect(normalizer.normalize(toolFor('stub'), 'raw', SOURCE)[0]?.severity).toBeNull();
  });

  it('パーサーの例外は NormalizationError になる', () => {
    const normalizer = new Normalizer(
      [
        stubParser('stub', () => {
          throw new Error('unexpected token');
        }),
      ],
      log,
    );

    expect(() => normalizer.normalize(toolFor('stub'), 'raw', SOURCE)).toThrow(NormalizationError);
    expect(() => normalizer.normalize(toolFor('stub'), 'raw', SOURCE)).toThrow(
      'scanner: unexpected token',
    );
  });

  it('未登録のパーサーと重複登録は内部エラー', () => {
    const normalizer = new Normalizer([stubParser('stub', [])], log);

    expect(() => normalizer.normalize(toolFor('missing'), 'raw', SOURCE)).toThrow(
      InternalOrchestrationError,
    );
    expect(() => normalizer.register(stubParser('stub', []))).toThrow(InternalOrchestrationError);
    expect(normalizer.has('stub')).toBe(true);
  });

  it('組み込みパーサーがデフォルトで登録される', () => {
    const normalizer = new Normalizer();
    for (const key of ['subfinder', 'httpx', 'nuclei', 'ffuf', 'apktool', 'mobsf']) {
      expect(normalizer.has(key)).toBe(true);
    }
  });
});
