/**
 * portcullis — Run State Recorder
 *
 * SQLite is the source of truth (runs + invocations tables); state.json is
 * a rewrite-on-every-persist mirror for humans and external tooling.
 *
 * <outputDir>/<runId>/
 *   meta.json
 *   state.json
 *   raw/<tool>/<fp12>.out, <fp12>.stderr.log
 *   normalized/<tool>-<fp12>.json
 *   normalized/findings.json
 */

import path from 'node:path';
import type Database from 'better-sqlite3';
import { InvocationRepository } from '../db/repository/invocation-repository.js';
import { RunRepository } from '../db/repository/run-repository.js';
import { InternalOrchestrationError, errorMessage, type SandboxOutput } from '../errors.js';
import type { Finding, FindingRecord, Invocation, InvocationStatus, RunState } from '../types/entities.js';
import type { RunSummary } from '../types/repository.js';
import { atomicWriteFileSync, atomicWriteJsonSync } from './atomic-write.js';
import type { ToolRegistry } from './tool-registry.js';

/** First 12 hex chars of a fingerprint, used in file names. */
export function fp12(fingerprint: string): string {
  return fingerprint.slice(0, 12);
}

function attemptSuffix(invocation: Invocation): string {
  return invocation.attempt > 1 ? `.${invocation.attempt}` : '';
}

export class RunRecorder {
  private readonly db: Database.Database;
  private readonly runs: RunRepository;
  private readonly invocations: InvocationRepository;

  constructor(db: Database.Database) {
    this.db = db;
    this.runs = new RunRepository(db);
    this.invocations = new InvocationRepository(db);
  }

  /**
   * Persist the run and its invocations in one transaction, then mirror the
   * state to state.json. Safe to call repeatedly.
   *
   * @throws InternalOrchestrationError when either write fails
   */
  persist(state: RunState): void {
    try {
      const write = this.db.transaction((s: RunState) => {
        const { invocations, ...header } = s;
        this.runs.upsert(header);
        for (const invocation of invocations) {
          this.invocations.upsert(invocation);
        }
      });
      write(state);
      atomicWriteJsonSync(path.join(state.runDir, 'state.json'), state);
    } catch (err) {
      throw new InternalOrchestrationError(`Failed to persist run ${state.runId}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  load(runId: string): RunState | undefined {
    const header = this.runs.findById(runId);
    if (header === undefined) return undefined;
    return { ...header, invocations: this.invocations.findByRun({ runId }) };
  }

  list(): RunSummary[] {
    return this.runs.list();
  }

  /** Invocations of a run, optionally narrowed. */
  listInvocations(runId: string, status?: InvocationStatus, tool?: string): Invocation[] {
    return this.invocations.findByRun({
      runId,
      ...(status !== undefined ? { status } : {}),
      ...(tool !== undefined ? { tool } : {}),
    });
  }

  /** Write raw output and stderr; returns the run-relative path of the raw file. */
  writeRaw(state: RunState, invocation: Invocation, output: SandboxOutput): string {
    const base = `${fp12(invocation.fingerprint)}${attemptSuffix(invocation)}`;
    const relative = path.posix.join('raw', invocation.tool, `${base}.out`);
    atomicWriteFileSync(path.join(state.runDir, relative), output.rawOutput);
    atomicWriteFileSync(path.join(state.runDir, 'raw', invocation.tool, `${base}.stderr.log`), output.stderr);
    return relative;
  }

  writeNormalized(state: RunState, invocation: Invocation, records: FindingRecord[]): void {
    const file = `${invocation.tool}-${fp12(invocation.fingerprint)}.json`;
    atomicWriteJsonSync(path.join(state.runDir, 'normalized', file), records);
  }

  writeFindings(state: RunState, findings: Finding[]): void {
    const sorted = [...findings].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    atomicWriteJsonSync(path.join(state.runDir, 'normalized', 'findings.json'), sorted);
  }

  writeMeta(state: RunState, registry: ToolRegistry): void {
    const counts: Record<InvocationStatus, number> = {
      pending: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      skipped_cached: 0,
    };
    for (const invocation of state.invocations) {
      counts[invocation.status]++;
    }

    atomicWriteJsonSync(path.join(state.runDir, 'meta.json'), {
      runId: state.runId,
      domain: state.domain,
      status: state.status,
      startedAt: state.startedAt,
      finishedAt: state.finishedAt ?? null,
      error: state.error ?? null,
      targets: state.targets.map((t) => t.value),
      phases: state.phases,
      tools: registry.list().map((t) => ({ name: t.name, version: t.version, image: t.image })),
      invocationCounts: counts,
      invocations: state.invocations.map((inv) => ({
        id: inv.id,
        phase: inv.phase,
        tool: inv.tool,
        attempt: inv.attempt,
        status: inv.status,
        failureKind: inv.failureKind ?? null,
        error: inv.error ?? null,
        cachedFrom: inv.cachedFrom ?? null,
        fingerprint: inv.fingerprint,
      })),
    });
  }
}
