import { describe, it, expect } from 'vitest';
import { ToolRegistry } from '../../src/engine/tool-registry.js';
import { Normalizer } from '../../src/engine/normalizer.js';
import { catalogFor } from '../../src/domains/index.js';
import { InternalOrchestrationError } from '../../src/errors.js';
import { DOMAINS, type DomainCatalog, type ToolDescriptorInput } from '../../src/types/tool.js';

function descriptor(name: string, overrides: Partial<ToolDescriptorInput> = {}): ToolDescriptorInput {
  return {
    name,
    version: '1.0.0',
    image: `portcullis/${name}:1.0.0`,
    consumes: ['target'],
    produces: ['asset'],
    fanOut: 'batch',
    args: ['{input.target}'],
    parser: 'subfinder',
    ...overrides,
  };
}

function catalog(tools: ToolDescriptorInput[], phases: DomainCatalog['phases']): DomainCatalog {
  return { domain: 'web', tools, phases };
}

describe('ToolRegistry', () => {
  it('組み込みカタログはすべて検証を通る', () => {
    const normalizer = new Normalizer();
    for (const domain of DOMAINS) {
      const registry = new ToolRegistry(catalogFor(domain), (key) => normalizer.has(key));
      expect(registry.domain).toBe(domain);
      expect(registry.plan().length).toBeGreaterThan(0);
    }
  });

  it('web の計画はフェーズ順に並ぶ', () => {
    const registry = new ToolRegistry(catalogFor('web'));
    const plan = registry.plan();

    expect(plan.map((p) => p.name)).toEqual(['discovery', 'resolution', 'enumeration', 'vulnerability']);
    expect(plan[1]?.tools.map((t) => t.name)).toEqual(['dnsx', 'httpx']);
    expect(registry.get('subfinder').hardDependency).toBe(true);
    expect(registry.get('dnsx').hardDependency).toBe(false);
  });

  it('デフォルト値が補われる', () => {
    const registry = new ToolRegistry(catalog([descriptor('a')], [{ name: 'p', tools: ['a'] }]));
    const tool = registry.get('a');

    expect(tool.mounts).toEqual([]);
    expect(tool.hardDependency).toBe(false);
    expect(tool.scopeFiltered).toBe(false);
    expect(Object.isFrozen(tool)).toBe(true);
  });

  it('不正な記述子は拒否される', () => {
    expect(
      () => new ToolRegistry(catalog([descriptor('a', { consumes: [] })], [{ name: 'p', tools: ['a'] }])),
    ).toThrow(InternalOrchestrationError);
    expect(
      () =>
        new ToolRegistry(
          catalog([descriptor('a', { args: ['-o', '{output}'] })], [{ name: 'p', tools: ['a'] }]),
        ),
    ).toThrow(/requires outputFile/);
    expect(
      () =>
        new ToolRegistry(
          catalog([descriptor('a', { outputFile: '../escape.txt' })], [{ name: 'p', tools: ['a'] }]),
        ),
    ).toThrow(/outputFile/);
  });

  it('重複・未知の参照は拒否される', () => {
    expect(
      () => new ToolRegistry(catalog([descriptor('a'), descriptor('a')], [{ name: 'p', tools: ['a'] }])),
    ).toThrow('Duplicate tool descriptor: a');
    expect(() => new ToolRegistry(catalog([descriptor('a')], [{ name: 'p', tools: ['b'] }]))).toThrow(
      'Phase p references unknown tool b',
    );
    expect(
      () =>
        new ToolRegistry(
          catalog([descriptor('a')], [
            { name: 'p', tools: ['a'] },
            { name: 'q', tools: ['a'] },
          ]),
        ),
    ).toThrow('Tool a is scheduled in more than one phase');
    expect(
      () =>
        new ToolRegistry(
          catalog([descriptor('a'), descriptor('b')], [
            { name: 'p', tools: ['a'] },
            { name: 'p', tools: ['b'] },
          ]),
        ),
    ).toThrow('Duplicate phase: p');
  });

  it('未登録のパーサーを参照すると拒否される', () => {
    expect(
      () =>
        new ToolRegistry(
          catalog([descriptor('a', { parser: 'nope' })], [{ name: 'p', tools: ['a'] }]),
          () => false,
        ),
    ).toThrow('Tool a references unknown parser "nope"');
  });

  it('未知のツールの取得は内部エラー', () => {
    const registry = new ToolRegistry(catalog([descriptor('a')], [{ name: 'p', tools: ['a'] }]));
    expect(() => registry.get('zzz')).toThrow(InternalOrchestrationError);
  });
});
