/**
 * portcullis — Orchestrator
 *
 * Single entry point composing every component for one domain run:
 *   scope gate → database → run state → seed targets → phase plan → outputs
 */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Config } from '../config.js';
import { migrateDatabase } from '../db/migrate.js';
import { catalogFor } from '../domains/index.js';
import {
  InputError,
  InternalOrchestrationError,
  ScopeViolation,
  errorMessage,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { DockerSandbox } from '../sandbox/docker-sandbox.js';
import type { SandboxAdapter } from '../sandbox/types.js';
import type { Artifact, Finding, RunState, RunStatus } from '../types/entities.js';
import { TERMINAL_STATUSES } from '../types/entities.js';
import type { Domain } from '../types/tool.js';
import { ArtifactStore } from './artifact-store.js';
import { Normalizer } from './normalizer.js';
import { ResumeCache } from './resume-cache.js';
import { RunRecorder } from './run-recorder.js';
import { PhaseScheduler } from './scheduler.js';
import { validate, type ScopeRule, type TargetCandidate } from './scope-gate.js';
import { ToolRegistry } from './tool-registry.js';

export const DATABASE_FILE = 'portcullis.db';

/** Producer fingerprint of target artifacts. */
export const SEED_FINGERPRINT = 'seed';

export interface PipelineOptions {
  domain: Domain;
  /** Candidates for a new run. Ignored when resuming. */
  targets?: TargetCandidate[];
  scope: ScopeRule[];
  /** Run id to resume. */
  resume?: string;
  config: Config;
  /** Defaults to a DockerSandbox built from config. */
  sandbox?: SandboxAdapter;
  signal?: AbortSignal;
  /** Use this database instead of <outputDir>/portcullis.db (left open). */
  db?: Database.Database;
  normalizer?: Normalizer;
  log?: Logger;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** run_YYYYMMDD_HHMMSS_<4 hex>, UTC. */
export function generateRunId(date: Date = new Date()): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `run_${day}_${time}_${crypto.randomBytes(2).toString('hex')}`;
}

export function openDatabase(outputDir: string): Database.Database {
  fs.mkdirSync(outputDir, { recursive: true });
  const db = new Database(path.join(outputDir, DATABASE_FILE));
  db.pragma('journal_mode = WAL');
  migrateDatabase(db);
  return db;
}

/** Process exit code for a finished run or the error that ended it. */
export function exitCodeFor(outcome: RunStatus | Error): number {
  if (outcome instanceof ScopeViolation) return 2;
  if (outcome instanceof InputError) return 1;
  if (outcome instanceof Error) return 3;
  switch (outcome) {
    case 'completed':
    case 'completed_with_gaps':
      return 0;
    case 'failed':
      return 1;
    case 'cancelled':
      return 130;
    case 'running':
      return 3;
  }
}

/**
 * `finding` artifacts linked to a run, one per finding id, sorted by id.
 * Several invocations can report the same finding; the lowest artifact hash wins.
 */
export function collectFindings(store: ArtifactStore, runId: string): Finding[] {
  const byId = new Map<string, Finding>();
  for (const artifact of store.byRun(runId, 'finding')) {
    if (artifact.type === 'target' || byId.has(artifact.content.id)) continue;
    byId.set(artifact.content.id, { ...artifact.content, discoveredAt: artifact.createdAt });
  }
  return [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

function createState(
  options: PipelineOptions,
  targets: RunState['targets'],
): RunState {
  const runId = generateRunId();
  return {
    runId,
    domain: options.domain,
    targets,
    runDir: path.resolve(options.config.outputDir, runId),
    startedAt: new Date().toISOString(),
    currentPhase: null,
    phases: [],
    invocations: [],
    status: 'running',
  };
}

/** Prepare a persisted run for continuation. */
function reopenState(recorder: RunRecorder, options: PipelineOptions, runId: string): RunState {
  const state = recorder.load(runId);
  if (state === undefined) {
    throw new InputError(`Run not found: ${runId}`);
  }
  if (state.domain !== options.domain) {
    throw new InputError(`Run ${runId} is a ${state.domain} run, not ${options.domain}`);
  }
  // targets are immutable, but the scope may have tightened since
  validate(state.targets, options.scope);

  const interruptedAt = new Date().toISOString();
  for (const invocation of state.invocations) {
    if (TERMINAL_STATUSES.has(invocation.status)) continue;
    invocation.status = 'failed';
    invocation.failureKind = 'interrupted';
    invocation.error = 'interrupted before completion';
    invocation.finishedAt = interruptedAt;
  }
  state.status = 'running';
  delete state.finishedAt;
  delete state.error;
  return state;
}

/**
 * Execute (or resume) one domain run.
 *
 * @throws ScopeViolation before anything is written
 * @throws InputError for an unknown run id or domain mismatch
 * @throws InternalOrchestrationError when persistence fails
 */
export async function runPipeline(options: PipelineOptions): Promise<RunState> {
  const log = options.log ?? createLogger('orchestrator');
  const normalizer = options.normalizer ?? new Normalizer();
  const registry = new ToolRegistry(catalogFor(options.domain), (key) => normalizer.has(key));

  const admitted =
    options.resume === undefined ? validate(options.targets ?? [], options.scope) : undefined;
  if (admitted !== undefined && admitted.length === 0) {
    throw new InputError('No targets given');
  }

  const db = options.db ?? openDatabase(options.config.outputDir);
  try {
    const store = new ArtifactStore(db);
    const recorder = new RunRecorder(db);

    const state =
      options.resume !== undefined
        ? reopenState(recorder, options, options.resume)
        : createState(options, admitted ?? []);
    const runLog = log.child('run', { runId: state.runId });

    fs.mkdirSync(state.runDir, { recursive: true });
    recorder.persist(state);
    runLog.info(options.resume !== undefined ? 'run resumed' : 'run started', {
      domain: state.domain,
      targets: state.targets.length,
    });

    const seeds: Artifact[] = state.targets.map((target) =>
      store.put({ type: 'target', content: target, producerFingerprint: SEED_FINGERPRINT }),
    );

    const scheduler = new PhaseScheduler({
      store,
      cache: new ResumeCache(db, store, runLog.child('cache')),
      sandbox: options.sandbox ?? new DockerSandbox(options.config),
      normalizer,
      recorder,
      scope: options.scope,
      concurrency: options.config.concurrency,
      defaultTimeoutMs: options.config.timeoutMs,
      log: runLog.child('scheduler'),
    });

    try {
      await scheduler.run(registry.plan(), state, seeds, options.signal);
    } catch (err) {
      try {
        recorder.writeMeta(state, registry);
      } catch (metaErr) {
        runLog.error('failed to write meta.json', { error: errorMessage(metaErr) });
      }
      throw err instanceof InternalOrchestrationError
        ? err
        : new InternalOrchestrationError(errorMessage(err), { cause: err });
    }

    recorder.writeFindings(state, collectFindings(store, state.runId));
    recorder.writeMeta(state, registry);
    return state;
  } finally {
    if (options.db === undefined) {
      db.close();
    }
  }
}
