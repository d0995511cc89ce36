import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { RunRecorder, fp12 } from '../../src/engine/run-recorder.js';
import { ToolRegistry } from '../../src/engine/tool-registry.js';
import { catalogFor } from '../../src/domains/index.js';
import { InternalOrchestrationError } from '../../src/errors.js';
import type { Finding, RunState } from '../../src/types/entities.js';
import { createTestDb, makeInvocation, makeRecord, makeRun } from '../helpers.js';

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

describe('RunRecorder', () => {
  let db: InstanceType<typeof Database>;
  let recorder: RunRecorder;
  let dir: string;
  let state: RunState;

  beforeEach(() => {
    db = createTestDb();
    recorder = new RunRecorder(db);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portcullis-recorder-'));
    state = makeRun({ runDir: path.join(dir, 'run_20260101_000000_aaaa') });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persist → load で同じ状態が返る', () => {
    state.currentPhase = 'discovery';
    state.phases = [{ name: 'discovery', status: 'running', startedAt: '2026-01-01T00:00:01.000Z', skipped: [] }];
    state.invocations = [
      makeInvocation({ status: 'succeeded', outputHashes: ['o1'], finishedAt: '2026-01-01T00:00:05.000Z' }),
      makeInvocation({ tool: 'amass', fingerprint: 'e'.repeat(64), status: 'running' }),
    ];
    recorder.persist(state);

    const loaded = recorder.load(state.runId);
    expect(loaded).toEqual({
      ...state,
      // phase, tool 順
      invocations: [state.invocations[1], state.invocations[0]],
    });
  });

  it('state.json に同じ内容がミラーされる', () => {
    recorder.persist(state);
    expect(readJson(path.join(state.runDir, 'state.json'))).toEqual(state);
  });

  it('繰り返し persist しても終端の invocation は変わらない', () => {
    const inv = makeInvocation({ status: 'succeeded' });
    state.invocations = [inv];
    recorder.persist(state);

    inv.status = 'failed';
    recorder.persist(state);

    expect(recorder.load(state.runId)?.invocations[0]?.status).toBe('succeeded');
  });

  it('書き込みに失敗すると InternalOrchestrationError', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');
    state.runDir = path.join(blocker, 'run');

    expect(() => recorder.persist(state)).toThrow(InternalOrchestrationError);
  });

  it('list と listInvocations で絞り込める', () => {
    state.invocations = [
      makeInvocation({ status: 'failed', failureKind: 'timeout' }),
      makeInvocation({ tool: 'dnsx', fingerprint: 'e'.repeat(64), status: 'succeeded' }),
    ];
    recorder.persist(state);

    expect(recorder.list().map((r) => r.runId)).toEqual([state.runId]);
    expect(recorder.listInvocations(state.runId, 'failed').map((i) => i.tool)).toEqual(['subfinder']);
    expect(recorder.listInvocations(state.runId, undefined, 'dnsx')).toHaveLength(1);
    expect(recorder.load('run_missing')).toBeUndefined();
  });

  it('writeRaw は raw/<tool>/<fp12>.out と stderr を書き、2 回目以降の試行は番号付き', () => {
    const inv = makeInvocation({ fingerprint: '0123456789abcdef'.repeat(4) });
    const output = { rawOutput: 'a.example.com\n', stdout: '', stderr: 'warn\n', exitCode: 0, durationMs: 5 };

    expect(recorder.writeRaw(state, inv, output)).toBe('raw/subfinder/0123456789ab.out');
    expect(fs.readFileSync(path.join(state.runDir, 'raw/subfinder/0123456789ab.out'), 'utf8')).toBe(
      'a.example.com\n',
    );
    expect(fs.readFileSync(path.join(state.runDir, 'raw/subfinder/0123456789ab.stderr.log'), 'utf8')).toBe(
      'warn\n',
    );
    expect(recorder.writeRaw(state, { ...inv, attempt: 2 }, output)).toBe('raw/subfinder/0123456789ab.2.out');
  });

  it('writeNormalized と writeFindings は normalized/ に書く', () => {
    const inv = makeInvocation();
    const records = [makeRecord()];
    recorder.writeNormalized(state, inv, records);

    const findings: Finding[] = [
      { ...makeRecord({ id: 'b'.repeat(64), kind: 'finding' }), discoveredAt: '2026-01-01T00:00:00.000Z' },
      { ...makeRecord({ id: 'a'.repeat(64), kind: 'finding' }), discoveredAt: '2026-01-01T00:00:00.000Z' },
    ];
    recorder.writeFindings(state, findings);

    expect(readJson(path.join(state.runDir, `normalized/subfinder-${fp12(inv.fingerprint)}.json`))).toEqual(records);
    const written = readJson(path.join(state.runDir, 'normalized/findings.json'));
    expect(Array.isArray(written) ? written.map((f: { id: string }) => f.id) : []).toEqual([
      'a'.repeat(64),
      'b'.repeat(64),
    ]);
  });

  it('writeMeta はツール・件数・失敗理由を記録する', () => {
    state.status = 'completed_with_gaps';
    state.finishedAt = '2026-01-01T01:00:00.000Z';
    const failed = makeInvocation({
      status: 'failed',
      failureKind: 'non_zero_exit',
      error: 'exit code 1',
    });
    state.invocations = [failed];
    const registry = new ToolRegistry(catalogFor('ios'));

    recorder.writeMeta(state, registry);

    expect(readJson(path.join(state.runDir, 'meta.json'))).toEqual({
      runId: state.runId,
      domain: 'web',
      status: 'completed_with_gaps',
      startedAt: '2026-01-01T00:00:00.000Z',
      finishedAt: '2026-01-01T01:00:00.000Z',
      error: null,
      targets: ['example.com'],
      phases: [],
      tools: [{ name: 'mobsf', version: '4.2.9', image: 'portcullis/mobsf:4.2.9' }],
      invocationCounts: { pending: 0, running: 0, succeeded: 0, failed: 1, skipped_cached: 0 },
      invocations: [
        {
          id: failed.id,
          phase: 'discovery',
          tool: 'subfinder',
          attempt: 1,
          status: 'failed',
          failureKind: 'non_zero_exit',
          error: 'exit code 1',
          cachedFrom: null,
          fingerprint: 'f'.repeat(64),
        },
      ],
    });
  });
});
