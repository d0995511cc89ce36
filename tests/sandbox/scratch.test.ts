import fs from 'node:fs';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { createScratch, readOutputFile, removeScratch, type Scratch } from '../../src/sandbox/scratch.js';

const created: Scratch[] = [];

async function scratchFor(...args: Parameters<typeof createScratch>): Promise<Scratch> {
  const scratch = await createScratch(...args);
  created.push(scratch);
  return scratch;
}

afterEach(async () => {
  for (const scratch of created.splice(0)) {
    await removeScratch(scratch);
  }
});

describe('createScratch', () => {
  it('型ごとに 1 行 1 値のリストファイルを書く', async () => {
    const scratch = await scratchFor(
      ['asset'],
      [
        { type: 'asset', value: 'www.example.com' },
        { type: 'asset', value: 'api.example.com' },
      ],
    );

    expect(fs.readFileSync(path.join(scratch.inputDir, 'asset.txt'), 'utf8')).toBe(
      'www.example.com\napi.example.com\n',
    );
    expect(scratch.inputPaths.get('asset')).toBe('/work/input/asset.txt');
    expect(scratch.packages).toEqual([]);
    expect(fs.statSync(scratch.outputDir).isDirectory()).toBe(true);
  });

  it('入力のない型には空のリストを書く', async () => {
    const scratch = await scratchFor(['path'], []);

    expect(fs.readFileSync(path.join(scratch.inputDir, 'path.txt'), 'utf8')).toBe('');
    expect(scratch.inputPaths.get('path')).toBe('/work/input/path.txt');
  });

  it('パッケージが 1 つならコンテナ内のパッケージパスを使う', async () => {
    const scratch = await scratchFor(['target'], [{ type: 'target', value: 'app.apk', location: '/data/app.apk' }]);

    expect(scratch.packages).toEqual([{ host: '/data/app.apk', container: '/work/input/app.apk' }]);
    expect(scratch.inputPaths.get('target')).toBe('/work/input/app.apk');
    expect(fs.existsSync(path.join(scratch.inputDir, 'app.apk'))).toBe(true);
    expect(fs.readFileSync(path.join(scratch.inputDir, 'target.txt'), 'utf8')).toBe('/work/input/app.apk\n');
  });

  it('同名のパッケージは位置で区別し、リストファイルを渡す', async () => {
    const scratch = await scratchFor(
      ['target'],
      [
        { type: 'target', value: 'app.apk', location: '/a/app.apk' },
        { type: 'target', value: 'app.apk', location: '/b/app.apk' },
      ],
    );

    expect(scratch.packages.map((p) => p.container)).toEqual(['/work/input/app.apk', '/work/input/1-app.apk']);
    expect(scratch.inputPaths.get('target')).toBe('/work/input/target.txt');
  });
});

describe('readOutputFile / removeScratch', () => {
  it('出力ファイルがなければ undefined を返す', async () => {
    const scratch = await scratchFor(['asset'], []);

    expect(await readOutputFile(scratch, 'missing.json')).toBeUndefined();
    fs.writeFileSync(path.join(scratch.outputDir, 'out.json'), '[]');
    expect(await readOutputFile(scratch, 'out.json')).toBe('[]');
  });

  it('スクラッチディレクトリを丸ごと削除する', async () => {
    const scratch = await createScratch(['asset'], [{ type: 'asset', value: 'www.example.com' }]);

    await removeScratch(scratch);

    expect(fs.existsSync(scratch.root)).toBe(false);
  });
});
