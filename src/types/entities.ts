/**
 * portcullis - Entity type definitions
 *
 * Runtime shapes shared by the engine, the repositories and the MCP layer.
 * Repository rows (snake_case) are mapped onto these camelCase entities.
 *
 * Conventions:
 *   All hashes      -> string (lowercase hex SHA-256)
 *   All IDs         -> string (UUID)
 *   All timestamps  -> string (ISO 8601)
 *   absent value    -> optional property (?)
 */

import type { Domain } from './tool.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================
// targets
// ============================================================

export type TargetKind = 'domain' | 'host' | 'app_package';

/** A validated scan target. Immutable once a run starts. */
export interface Target {
  value: string;
  kind: TargetKind;
  /** The allow rule that admitted this target. */
  matchedRule: string;
  /** Absolute path of an app package on the host. */
  location?: string;
  /** SHA-256 of an app package's bytes. */
  digest?: string;
}

// ============================================================
// findings
// ============================================================

export const SEVERITIES = ['info', 'low', 'medium', 'high', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type FindingKind = 'asset' | 'path' | 'finding';

/** A normalized record without its discovery timestamp (content-hashed). */
export interface FindingRecord {
  id: string;
  tool: string;
  kind: FindingKind;
  /** What the record is about: host, URL, component, permission... */
  asset: string;
  title: string;
  category: string;
  severity: Severity | null;
  occurrences: number;
  evidence: JsonObject;
  /** SHA-256 of the raw output blob the record was parsed from. */
  sourceArtifactHash: string;
}

/** A normalized, provenance-traceable security observation. */
export interface Finding extends FindingRecord {
  discoveredAt: string;
}

// ============================================================
// artifacts
// ============================================================

interface ArtifactBase {
  /** Store identity: content + producing fingerprint. */
  hash: string;
  /** What a consuming tool receives: type + value (+ digest). */
  canonicalHash: string;
  producerFingerprint: string;
  createdAt: string;
}

export interface TargetArtifact extends ArtifactBase {
  type: 'target';
  content: Target;
}

export interface RecordArtifact extends ArtifactBase {
  type: FindingKind;
  content: FindingRecord;
}

export type Artifact = TargetArtifact | RecordArtifact;

/** Artifact as accepted by the store (hashes and timestamp are derived). */
export type NewArtifact =
  | { type: 'target'; content: Target; producerFingerprint: string }
  | { type: FindingKind; content: FindingRecord; producerFingerprint: string };

// ============================================================
// invocations
// ============================================================

export const INVOCATION_STATUSES = [
  'pending',
  'running',
  'succeeded',
  'failed',
  'skipped_cached',
] as const;
export type InvocationStatus = (typeof INVOCATION_STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<InvocationStatus> = new Set([
  'succeeded',
  'failed',
  'skipped_cached',
]);

export type FailureKind =
  | 'timeout'
  | 'non_zero_exit'
  | 'resource_unavailable'
  | 'cancelled'
  | 'normalization'
  | 'interrupted';

/** One execution attempt of a tool against a specific input set. */
export interface Invocation {
  id: string;
  runId: string;
  phase: string;
  tool: string;
  toolVersion: string;
  fingerprint: string;
  /** Combination hash of the canonical inputs; the tie-break ordering key. */
  inputDigest: string;
  inputHashes: string[];
  attempt: number;
  status: InvocationStatus;
  failureKind?: FailureKind;
  error?: string;
  exitCode?: number;
  rawOutputHash?: string;
  rawOutputPath?: string;
  outputHashes: string[];
  /** Run id of the invocation whose result was reused. */
  cachedFrom?: string;
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
}

// ============================================================
// runs
// ============================================================

export type RunStatus = 'running' | 'completed' | 'completed_with_gaps' | 'failed' | 'cancelled';

export type PhaseStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface SkippedTool {
  tool: string;
  reason: string;
}

export interface PhaseRecord {
  name: string;
  status: PhaseStatus;
  startedAt?: string;
  finishedAt?: string;
  skipped: SkippedTool[];
}

/** Process-wide record for one orchestration run, passed explicitly. */
export interface RunState {
  runId: string;
  domain: Domain;
  targets: Target[];
  runDir: string;
  startedAt: string;
  finishedAt?: string;
  currentPhase: string | null;
  phases: PhaseRecord[];
  invocations: Invocation[];
  status: RunStatus;
  error?: string;
}
