/**
 * portcullis - Repository input / query type definitions
 */

import type { InvocationStatus, RunStatus } from './entities.js';
import type { Domain } from './tool.js';

// ============================================================
// raw outputs
// ============================================================

/** A raw tool output blob stored by content hash. */
export interface RawOutput {
  sha256: string;
  content: string;
  sizeBytes: number;
  createdAt: string;
}

// ============================================================
// query filters / summaries
// ============================================================

/** Filter for listing invocations of a run. */
export interface InvocationFilter {
  runId: string;
  status?: InvocationStatus;
  tool?: string;
}

/** Lightweight run listing row (no invocations). */
export interface RunSummary {
  runId: string;
  domain: Domain;
  status: RunStatus;
  currentPhase: string | null;
  startedAt: string;
  finishedAt?: string;
}
