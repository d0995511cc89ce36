import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, type Config } from '../../src/config.js';
import { DATABASE_FILE, exitCodeFor, generateRunId, openDatabase, runPipeline } from '../../src/engine/orchestrator.js';
import { RunRecorder } from '../../src/engine/run-recorder.js';
import { parseScopeRule, type TargetCandidate } from '../../src/engine/scope-gate.js';
import {
  InputError,
  InternalOrchestrationError,
  SandboxError,
  ScopeViolation,
} from '../../src/errors.js';
import { aborted, output, ScriptedSandbox, type ToolScript } from '../fakes.js';
import { makeInvocation, makeRun } from '../helpers.js';

const SCOPE = [parseScopeRule('allow', 'example.com'), parseScopeRule('allow', '*.example.com')];
const TARGETS: TargetCandidate[] = [{ value: 'example.com', kind: 'domain' }];

/** web カタログで発見物を返すツールだけをスクリプトする */
const WEB_SCRIPTS: Record<string, ToolScript> = {
  subfinder: () => output('www.example.com\n'),
  nuclei: () =>
    output(
      JSON.stringify({
        'template-id': 'git-config',
        host: 'https://www.example.com',
        info: { name: 'Git Config Disclosure', severity: 'medium', tags: ['exposure'] },
      }),
    ),
};

/** subfinder, dnsx, httpx, 7 enumeration tools, nuclei (httpx_paths has no paths) */
const WEB_INVOCATIONS = 11;

let tmpDir: string;
let config: Config;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'portcullis-orchestrator-'));
  config = loadConfig({ PORTCULLIS_OUTPUT_DIR: path.join(tmpDir, 'out') });
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

describe('exitCodeFor', () => {
  it('run の結果を終了コードに対応付ける', () => {
    expect(exitCodeFor('completed')).toBe(0);
    expect(exitCodeFor('completed_with_gaps')).toBe(0);
    expect(exitCodeFor('failed')).toBe(1);
    expect(exitCodeFor('cancelled')).toBe(130);
  });

  it('例外を終了コードに対応付ける', () => {
    expect(exitCodeFor(new ScopeViolation(['evil.org is not in allow list']))).toBe(2);
    expect(exitCodeFor(new InputError('Run not found: x'))).toBe(1);
    expect(exitCodeFor(new InternalOrchestrationError('boom'))).toBe(3);
    expect(exitCodeFor(new Error('unexpected'))).toBe(3);
  });
});

describe('generateRunId', () => {
  it('run_YYYYMMDD_HHMMSS_<4 hex> の形式で UTC 時刻を使う', () => {
    const id = generateRunId(new Date(Date.UTC(2026, 0, 2, 3, 4, 5)));
    expect(id).toMatch(/^run_20260102_030405_[0-9a-f]{4}$/);
  });
});

describe('runPipeline', () => {
  it('web run を最後まで実行し findings.json と meta.json を書く', async () => {
    const sandbox = new ScriptedSandbox(WEB_SCRIPTS);

    const state = await runPipeline({ domain: 'web', targets: TARGETS, scope: SCOPE, config, sandbox });

    expect(state.status).toBe('completed');
    expect(state.runDir).toBe(path.resolve(config.outputDir, state.runId));
    expect(state.targets).toEqual([{ value: 'example.com', kind: 'domain', matchedRule: 'example.com' }]);
    expect(sandbox.calls).toHaveLength(WEB_INVOCATIONS);
    expect(sandbox.toolCalls).not.toContain('httpx_paths');
    expect(fs.existsSync(path.join(config.outputDir, DATABASE_FILE))).toBe(true);

    const findings = readJson(path.join(state.runDir, 'normalized', 'findings.json'));
    expect(findings).toEqual([
      expect.objectContaining({
        tool: 'nuclei',
        kind: 'finding',
        asset: 'https://www.example.com',
        title: 'Git Config Disclosure',
        severity: 'medium',
      }),
    ]);

    const meta = readJson(path.join(state.runDir, 'meta.json'));
    expect(meta).toMatchObject({
      runId: state.runId,
      domain: 'web',
      status: 'completed',
      error: null,
      targets: ['example.com'],
      invocationCounts: { pending: 0, running: 0, succeeded: WEB_INVOCATIONS, failed: 0, skipped_cached: 0 },
    });
    expect(readJson(path.join(state.runDir, 'state.json'))).toMatchObject({ runId: state.runId, status: 'completed' });
  });

  it('スコープ違反は何も書き込まずに投げる', async () => {
    const sandbox = new ScriptedSandbox(WEB_SCRIPTS);

    await expect(
      runPipeline({
        domain: 'web',
        targets: [...TARGETS, { value: 'evil.org', kind: 'domain' }],
        scope: SCOPE,
        config,
        sandbox,
      }),
    ).rejects.toBeInstanceOf(ScopeViolation);

    expect(fs.existsSync(config.outputDir)).toBe(false);
    expect(sandbox.calls).toHaveLength(0);
  });

  it('ターゲットが空なら InputError', async () => {
    await expect(
      runPipeline({ domain: 'web', targets: [], scope: SCOPE, config, sandbox: new ScriptedSandbox({}) }),
    ).rejects.toThrow(new InputError('No targets given'));
  });

  it('存在しない run の再開は InputError', async () => {
    await expect(
      runPipeline({
        domain: 'web',
        scope: SCOPE,
        resume: 'run_20260101_000000_ffff',
        config,
        sandbox: new ScriptedSandbox({}),
      }),
    ).rejects.toThrow('Run not found: run_20260101_000000_ffff');
  });

  it('別ドメインの run は再開できない', async () => {
    const first = await runPipeline({
      domain: 'web',
      targets: TARGETS,
      scope: SCOPE,
      config,
      sandbox: new ScriptedSandbox(WEB_SCRIPTS),
    });

    await expect(
      runPipeline({ domain: 'android', scope: SCOPE, resume: first.runId, config, sandbox: new ScriptedSandbox({}) }),
    ).rejects.toThrow(`Run ${first.runId} is a web run, not android`);
  });

  it('同じターゲットの 2 回目の run はキャッシュから同一の findings を得る', async () => {
    const first = await runPipeline({
      domain: 'web',
      targets: TARGETS,
      scope: SCOPE,
      config,
      sandbox: new ScriptedSandbox(WEB_SCRIPTS),
    });
    const sandbox = new ScriptedSandbox(WEB_SCRIPTS);
    const second = await runPipeline({ domain: 'web', targets: TARGETS, scope: SCOPE, config, sandbox });

    expect(second.runId).not.toBe(first.runId);
    expect(sandbox.calls).toHaveLength(0);
    expect(second.invocations.every((inv) => inv.status === 'skipped_cached' && inv.cachedFrom === first.runId)).toBe(
      true,
    );
    expect(readJson(path.join(second.runDir, 'normalized', 'findings.json'))).toEqual(
      readJson(path.join(first.runDir, 'normalized', 'findings.json')),
    );
  });

  it('中断した run を再開すると完了済みの呼び出しは実行しない', async () => {
    const controller = new AbortController();
    const firstSandbox = new ScriptedSandbox({
      ...WEB_SCRIPTS,
      dnsx: async (req) => {
        await aborted(req.signal);
        throw new SandboxError('cancelled', 'dnsx cancelled');
      },
    });

    const running = runPipeline({
      domain: 'web',
      targets: TARGETS,
      scope: SCOPE,
      config,
      sandbox: firstSandbox,
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(firstSandbox.toolCalls).toEqual(['subfinder', 'dnsx', 'httpx']));
    controller.abort();
    const cancelled = await running;

    expect(cancelled.status).toBe('cancelled');
    expect(exitCodeFor(cancelled.status)).toBe(130);

    const sandbox = new ScriptedSandbox(WEB_SCRIPTS);
    const resumed = await runPipeline({ domain: 'web', scope: SCOPE, resume: cancelled.runId, config, sandbox });

    expect(resumed.runId).toBe(cancelled.runId);
    expect(resumed.status).toBe('completed');
    expect(sandbox.toolCalls[0]).toBe('dnsx');
    expect(sandbox.toolCalls).not.toContain('subfinder');
    expect(sandbox.toolCalls).not.toContain('httpx');
    expect(sandbox.calls).toHaveLength(WEB_INVOCATIONS - 2);

    const dnsx = resumed.invocations.filter((inv) => inv.tool === 'dnsx');
    expect(dnsx.map((inv) => [inv.attempt, inv.status, inv.failureKind])).toEqual([
      [1, 'failed', 'cancelled'],
      [2, 'succeeded', undefined],
    ]);
  });

  it('再開時に未完了の呼び出しを interrupted として記録する', async () => {
    const runId = 'run_20260101_000000_abcd';
    const db = openDatabase(config.outputDir);
    try {
      new RunRecorder(db).persist(
        makeRun({
          runId,
          runDir: path.join(config.outputDir, runId),
          currentPhase: 'discovery',
          phases: [{ name: 'discovery', status: 'running', startedAt: '2026-01-01T00:00:00.000Z', skipped: [] }],
          invocations: [makeInvocation({ runId, status: 'running' })],
        }),
      );
    } finally {
      db.close();
    }

    const sandbox = new ScriptedSandbox(WEB_SCRIPTS);
    const resumed = await runPipeline({ domain: 'web', scope: SCOPE, resume: runId, config, sandbox });

    const [interrupted] = resumed.invocations;
    expect(interrupted?.status).toBe('failed');
    expect(interrupted?.failureKind).toBe('interrupted');
    expect(sandbox.calls).toHaveLength(WEB_INVOCATIONS);
    expect(resumed.status).toBe('completed_with_gaps');
  });

  it('再開時に現在のスコープで検証し直す', async () => {
    const first = await runPipeline({
      domain: 'web',
      targets: TARGETS,
      scope: SCOPE,
      config,
      sandbox: new ScriptedSandbox(WEB_SCRIPTS),
    });

    await expect(
      runPipeline({
        domain: 'web',
        scope: [...SCOPE, parseScopeRule('deny', 'example.com')],
        resume: first.runId,
        config,
        sandbox: new ScriptedSandbox({}),
      }),
    ).rejects.toBeInstanceOf(ScopeViolation);
  });
});
