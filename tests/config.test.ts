import { describe, it, expect } from 'vitest';
import { loadConfig, withOverrides } from '../src/config.js';

describe('loadConfig', () => {
  it('環境変数が空ならデフォルト値を返す', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      outputDir: 'outputs',
      scopeFile: 'scope.yaml',
      concurrency: 4,
      timeoutMs: 600_000,
      dockerBin: 'docker',
      dockerNetwork: undefined,
      dockerMemory: undefined,
      dockerCpus: undefined,
      wordlistDir: 'wordlists',
    });
  });

  it('環境変数を読み取り数値へ変換する', () => {
    const config = loadConfig({
      PORTCULLIS_OUTPUT_DIR: '/tmp/out',
      PORTCULLIS_CONCURRENCY: '8',
      PORTCULLIS_TIMEOUT_MS: '30000',
      PORTCULLIS_DOCKER_NETWORK: ' scan-net ',
    });

    expect(config.outputDir).toBe('/tmp/out');
    expect(config.concurrency).toBe(8);
    expect(config.timeoutMs).toBe(30_000);
    expect(config.dockerNetwork).toBe('scan-net');
  });

  it('空文字の環境変数は未設定として扱う', () => {
    const config = loadConfig({ PORTCULLIS_CONCURRENCY: '' });
    expect(config.concurrency).toBe(4);
  });

  it('不正な値は環境変数名を含むエラーになる', () => {
    expect(() => loadConfig({ PORTCULLIS_CONCURRENCY: '0' })).toThrow(/PORTCULLIS_CONCURRENCY/);
    expect(() => loadConfig({ PORTCULLIS_TIMEOUT_MS: 'soon' })).toThrow(/PORTCULLIS_TIMEOUT_MS/);
  });
});

describe('withOverrides', () => {
  it('undefined の上書きは無視される', () => {
    const base = loadConfig({});
    const config = withOverrides(base, { outputDir: 'runs', concurrency: undefined });

    expect(config.outputDir).toBe('runs');
    expect(config.concurrency).toBe(4);
  });

  it('上書き後も再検証される', () => {
    const base = loadConfig({});
    expect(() => withOverrides(base, { concurrency: 100 })).toThrow(/PORTCULLIS_CONCURRENCY/);
  });
});
