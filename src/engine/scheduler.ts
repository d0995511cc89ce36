/**
 * portcullis — Phase Scheduler
 *
 * Runs a domain plan phase by phase. Within a phase, invocations run on a
 * bounded pool; the next phase starts only after every invocation of the
 * current one is terminal (the barrier).
 *
 * Per invocation:
 *   cache hit  → skipped_cached, outputs linked to this run
 *   cache miss → running → sandbox → raw blob → normalize → artifacts → succeeded
 *   any failure → failed + failureKind (recorded, never thrown)
 * Only internal errors (store, persistence, unknown parser) unwind the run.
 */

import crypto from 'node:crypto';
import {
  InternalOrchestrationError,
  NormalizationError,
  ResumeInconsistency,
  SandboxError,
  errorMessage,
  type SandboxErrorKind,
  type SandboxOutput,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { SandboxAdapter, SandboxInput } from '../sandbox/types.js';
import type {
  Artifact,
  FailureKind,
  FindingRecord,
  Invocation,
  PhaseRecord,
  RunState,
  SkippedTool,
} from '../types/entities.js';
import { TERMINAL_STATUSES } from '../types/entities.js';
import type { ToolDescriptor } from '../types/tool.js';
import { artifactValue, type ArtifactStore } from './artifact-store.js';
import { computeFingerprint, computeInputDigest, sortedUnique } from './canonical.js';
import type { Normalizer } from './normalizer.js';
import type { ResumeCache } from './resume-cache.js';
import type { RunRecorder } from './run-recorder.js';
import { isInScope, type ScopeRule } from './scope-gate.js';
import { Semaphore } from './semaphore.js';
import type { PlannedPhase } from './tool-registry.js';

export interface SchedulerOptions {
  store: ArtifactStore;
  cache: ResumeCache;
  sandbox: SandboxAdapter;
  normalizer: Normalizer;
  recorder: RunRecorder;
  /** Rules used to drop out-of-scope output of scope-filtered tools. */
  scope: ScopeRule[];
  concurrency: number;
  /** Used when a descriptor sets no timeout of its own. */
  defaultTimeoutMs: number;
  log?: Logger;
}

/** One invocation to dispatch, with the artifacts it receives. */
interface PlannedInvocation {
  tool: ToolDescriptor;
  inputs: Artifact[];
  invocation: Invocation;
}

function now(): string {
  return new Date().toISOString();
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Unique by canonical hash, keeping the lowest artifact hash. */
export function dedupeInputs(artifacts: Artifact[]): Artifact[] {
  const byCanonical = new Map<string, Artifact>();
  for (const artifact of artifacts) {
    const existing = byCanonical.get(artifact.canonicalHash);
    if (existing === undefined || artifact.hash < existing.hash) {
      byCanonical.set(artifact.canonicalHash, artifact);
    }
  }
  return [...byCanonical.values()].sort((a, b) => compareStrings(a.hash, b.hash));
}

function toSandboxInput(artifact: Artifact): SandboxInput {
  const location = artifact.type === 'target' ? artifact.content.location : undefined;
  return {
    type: artifact.type,
    value: artifactValue(artifact),
    ...(location !== undefined ? { location } : {}),
  };
}

export class PhaseScheduler {
  private readonly options: SchedulerOptions;
  private readonly log: Logger;

  constructor(options: SchedulerOptions) {
    this.options = options;
    this.log = options.log ?? createLogger('scheduler');
  }

  /**
   * Execute the plan against `state`, mutating and persisting it after every
   * transition. Phases already completed in `state` are skipped.
   *
   * @throws InternalOrchestrationError after recording the run as failed
   */
  async run(
    plan: PlannedPhase[],
    state: RunState,
    initialArtifacts: Artifact[],
    signal?: AbortSignal,
  ): Promise<RunState> {
    const { store, recorder } = this.options;
    const filtered = new Set(plan.flatMap((p) => p.tools).filter((t) => t.scopeFiltered).map((t) => t.name));
    for (const artifact of initialArtifacts) {
      store.link(state.runId, artifact.hash, 'seed');
    }

    for (const phase of plan) {
      const previous = state.phases.find((p) => p.name === phase.name);
      if (previous?.status === 'completed') {
        this.log.info('phase already completed', { runId: state.runId, phase: phase.name });
        continue;
      }
      if (signal?.aborted) {
        state.status = 'cancelled';
        break;
      }

      const record: PhaseRecord = { name: phase.name, status: 'running', startedAt: now(), skipped: [] };
      state.phases = [...state.phases.filter((p) => p.name !== phase.name), record];
      state.currentPhase = phase.name;
      recorder.persist(state);

      const outcome = await this.runPhase(phase, record, state, filtered, signal);
      record.finishedAt = now();
      record.status = outcome;
      recorder.persist(state);

      if (outcome === 'cancelled') {
        state.status = 'cancelled';
        break;
      }
      if (outcome === 'failed') {
        state.status = 'failed';
        break;
      }
    }

    if (state.status === 'running') {
      state.status = this.hasGaps(state) ? 'completed_with_gaps' : 'completed';
    }
    state.currentPhase = null;
    state.finishedAt = now();
    recorder.persist(state);
    this.log.info('run finished', { runId: state.runId, status: state.status });
    return state;
  }

  // ------------------------------------------------------------
  // phase
  // ------------------------------------------------------------

  private async runPhase(
    phase: PlannedPhase,
    record: PhaseRecord,
    state: RunState,
    filtered: ReadonlySet<string>,
    signal: AbortSignal | undefined,
  ): Promise<'completed' | 'failed' | 'cancelled'> {
    const log = this.log.child(phase.name, { runId: state.runId });
    const { planned, skipped } = this.planPhase(phase, state, filtered, log);
    record.skipped = skipped;
    for (const s of skipped) {
      log.info('tool skipped', { tool: s.tool, reason: s.reason });
    }

    for (const p of planned) {
      state.invocations.push(p.invocation);
    }
    this.options.recorder.persist(state);
    log.info('phase dispatch', { invocations: planned.length, skipped: skipped.length });

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const semaphore = new Semaphore(this.options.concurrency);
    let results: PromiseSettledResult<void>[];
    try {
      results = await Promise.allSettled(
        planned.map((p) =>
          semaphore.run(async () => {
            try {
              await this.execute(p, state, controller.signal, log);
            } catch (err) {
              controller.abort();
              throw err;
            }
          }),
        ),
      );
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    const internal = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (internal !== undefined) {
      this.abandon(planned, state, record);
      const err: unknown = internal.reason;
      throw err instanceof InternalOrchestrationError
        ? err
        : new InternalOrchestrationError(`Phase ${phase.name} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (signal?.aborted) return 'cancelled';

    const hardFailure = planned.find((p) => p.tool.hardDependency && p.invocation.status === 'failed');
    if (hardFailure !== undefined) {
      state.error = `Hard dependency ${hardFailure.tool.name} failed: ${hardFailure.invocation.error ?? hardFailure.invocation.failureKind ?? 'unknown'}`;
      log.error('hard dependency failed', { tool: hardFailure.tool.name });
      return 'failed';
    }
    return 'completed';
  }

  /** Record an internal failure: every unfinished invocation is cancelled, the run fails. */
  private abandon(planned: PlannedInvocation[], state: RunState, record: PhaseRecord): void {
    for (const p of planned) {
      if (!TERMINAL_STATUSES.has(p.invocation.status)) {
        this.fail(p.invocation, 'cancelled', 'aborted after internal error');
      }
    }
    record.status = 'failed';
    record.finishedAt = now();
    state.status = 'failed';
    state.currentPhase = null;
    state.finishedAt = now();
    state.error = 'internal orchestration error';
    this.options.recorder.persist(state);
  }

  /**
   * Eligibility and fan-out. Inputs are everything of the consumed types
   * linked to the run so far, less output of scope-filtered tools that the
   * current scope no longer admits (linked by an earlier session of a
   * resumed run).
   */
  private planPhase(
    phase: PlannedPhase,
    state: RunState,
    filtered: ReadonlySet<string>,
    log: Logger,
  ): { planned: PlannedInvocation[]; skipped: SkippedTool[] } {
    const planned: PlannedInvocation[] = [];
    const skipped: SkippedTool[] = [];

    for (const tool of phase.tools) {
      const inputsByType = tool.consumes.map((type) => {
        const linked = this.options.store.byRun(state.runId, type);
        const admitted = linked.filter((a) => this.admits(a, filtered));
        if (admitted.length < linked.length) {
          log.info('ignored out-of-scope input', { tool: tool.name, type, dropped: linked.length - admitted.length });
        }
        return dedupeInputs(admitted);
      });
      const emptyIndex = inputsByType.findIndex((inputs) => inputs.length === 0);
      if (emptyIndex !== -1) {
        skipped.push({ tool: tool.name, reason: `no ${tool.consumes[emptyIndex] ?? 'input'} artifacts available` });
        continue;
      }

      const inputSets: Artifact[][] =
        tool.fanOut === 'batch'
          ? [inputsByType.flat()]
          : (inputsByType[0] ?? []).map((primary) => [primary, ...inputsByType.slice(1).flat()]);

      for (const inputs of inputSets) {
        const invocation = this.prepare(tool, inputs, phase.name, state);
        if (invocation === undefined) {
          continue;
        }
        planned.push({ tool, inputs, invocation });
      }
    }

    planned.sort(
      (a, b) =>
        compareStrings(a.tool.name, b.tool.name) ||
        compareStrings(a.invocation.inputDigest, b.invocation.inputDigest),
    );
    return { planned, skipped };
  }

  private admits(artifact: Artifact, filtered: ReadonlySet<string>): boolean {
    if (artifact.type === 'target' || artifact.type === 'finding') return true;
    if (!filtered.has(artifact.content.tool)) return true;
    return isInScope(artifact.content.asset, this.options.scope);
  }

  /**
   * Build the pending record, or undefined when this run already holds a
   * successful result for the fingerprint whose outputs all still exist.
   */
  private prepare(
    tool: ToolDescriptor,
    inputs: Artifact[],
    phase: string,
    state: RunState,
  ): Invocation | undefined {
    const canonical = inputs.map((a) => a.canonicalHash);
    const fingerprint = computeFingerprint(tool, canonical);

    const prior = state.invocations.filter((inv) => inv.fingerprint === fingerprint);
    const successes = prior.filter((inv) => inv.status === 'succeeded' || inv.status === 'skipped_cached');
    if (successes.some((inv) => this.outputsIntact(inv))) {
      return undefined;
    }

    return {
      id: crypto.randomUUID(),
      runId: state.runId,
      phase,
      tool: tool.name,
      toolVersion: tool.version,
      fingerprint,
      inputDigest: computeInputDigest(canonical),
      inputHashes: sortedUnique(inputs.map((a) => a.hash)),
      attempt: prior.reduce((max, inv) => Math.max(max, inv.attempt), 0) + 1,
      status: 'pending',
      outputHashes: [],
      createdAt: now(),
    };
  }

  private outputsIntact(invocation: Invocation): boolean {
    try {
      this.options.cache.resolveOutputs(invocation);
      return true;
    } catch (err) {
      if (!(err instanceof ResumeInconsistency)) throw err;
      this.log.warn('prior result incomplete, re-planning', {
        tool: invocation.tool,
        fingerprint: err.fingerprint,
        missing: err.missing,
      });
      return false;
    }
  }

  /** A gap is a fingerprint whose latest attempt failed. */
  private hasGaps(state: RunState): boolean {
    const latest = new Map<string, Invocation>();
    for (const inv of state.invocations) {
      const seen = latest.get(inv.fingerprint);
      if (seen === undefined || inv.attempt >= seen.attempt) latest.set(inv.fingerprint, inv);
    }
    return [...latest.values()].some((inv) => inv.status === 'failed');
  }

  // ------------------------------------------------------------
  // invocation
  // ------------------------------------------------------------

  private async execute(
    planned: PlannedInvocation,
    state: RunState,
    signal: AbortSignal,
    phaseLog: Logger,
  ): Promise<void> {
    const { tool, invocation } = planned;
    const { cache, recorder, sandbox, store } = this.options;
    const log = phaseLog.child(tool.name, { invocationId: invocation.id });

    if (signal.aborted) {
      this.fail(invocation, 'cancelled', 'cancelled before dispatch');
      recorder.persist(state);
      return;
    }

    const hit = cache.lookup(invocation.fingerprint);
    if (hit !== undefined) {
      const outputs = tool.scopeFiltered
        ? hit.outputs.filter((a) => a.type === 'finding' || isInScope(artifactValue(a), this.options.scope))
        : hit.outputs;
      if (outputs.length < hit.outputs.length) {
        log.info('dropped out-of-scope output', { dropped: hit.outputs.length - outputs.length });
      }
      for (const artifact of outputs) {
        store.link(state.runId, artifact.hash, invocation.phase);
      }
      invocation.status = 'skipped_cached';
      invocation.cachedFrom = hit.source.runId;
      invocation.outputHashes = sortedUnique(outputs.map((a) => a.hash));
      if (hit.source.rawOutputHash !== undefined) invocation.rawOutputHash = hit.source.rawOutputHash;
      invocation.finishedAt = now();
      recorder.persist(state);
      log.info('cache hit', { cachedFrom: hit.source.runId, outputs: outputs.length });
      return;
    }

    invocation.status = 'running';
    invocation.startedAt = now();
    recorder.persist(state);
    log.info('invocation started', { inputs: planned.inputs.length });

    let output: SandboxOutput;
    try {
      output = await sandbox.execute({
        invocationId: invocation.id,
        tool,
        inputs: planned.inputs.map(toSandboxInput),
        timeoutMs: tool.timeoutMs ?? this.options.defaultTimeoutMs,
        signal,
      });
    } catch (err) {
      const kind: SandboxErrorKind = err instanceof SandboxError ? err.kind : 'resource_unavailable';
      if (err instanceof SandboxError) {
        if (err.output !== undefined) this.keepRaw(state, invocation, err.output);
        if (err.exitCode !== undefined) invocation.exitCode = err.exitCode;
      }
      this.fail(invocation, kind, errorMessage(err));
      recorder.persist(state);
      log.warn('invocation failed', { failureKind: kind, error: invocation.error });
      return;
    }

    const rawHash = this.keepRaw(state, invocation, output);
    if (output.exitCode !== null) invocation.exitCode = output.exitCode;

    let records: FindingRecord[];
    try {
      records = this.options.normalizer.normalize(tool, output.rawOutput, rawHash);
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err;
      this.fail(invocation, 'normalization', err.message);
      recorder.persist(state);
      log.warn('normalization failed', { error: err.message });
      return;
    }

    if (tool.scopeFiltered) {
      const before = records.length;
      records = records.filter((r) => r.kind === 'finding' || isInScope(r.asset, this.options.scope));
      if (records.length < before) {
        log.info('dropped out-of-scope output', { dropped: before - records.length });
      }
    }

    recorder.writeNormalized(state, invocation, records);
    const hashes: string[] = [];
    for (const record of records) {
      const artifact = store.put({ type: record.kind, content: record, producerFingerprint: invocation.fingerprint });
      store.link(state.runId, artifact.hash, invocation.phase);
      hashes.push(artifact.hash);
    }

    invocation.outputHashes = sortedUnique(hashes);
    invocation.status = 'succeeded';
    invocation.finishedAt = now();
    recorder.persist(state);
    log.info('invocation succeeded', { outputs: invocation.outputHashes.length, durationMs: output.durationMs });
  }

  /** Store the raw blob and its run-directory copy; returns the blob hash. */
  private keepRaw(state: RunState, invocation: Invocation, output: SandboxOutput): string {
    const hash = this.options.store.putRaw(output.rawOutput);
    invocation.rawOutputHash = hash;
    invocation.rawOutputPath = this.options.recorder.writeRaw(state, invocation, output);
    return hash;
  }

  private fail(invocation: Invocation, kind: FailureKind, message: string): void {
    invocation.status = 'failed';
    invocation.failureKind = kind;
    invocation.error = message;
    invocation.finishedAt = now();
  }
}
