/**
 * portcullis — Error taxonomy
 *
 * Fatal categories (ScopeViolation, InternalOrchestrationError) abort a run.
 * Per-invocation categories (SandboxError, NormalizationError) are recorded
 * on the Invocation and never unwind the run by themselves.
 */

import type { FailureKind } from './types/entities.js';

export type ErrorCode =
  | 'SCOPE_VIOLATION'
  | 'SANDBOX_ERROR'
  | 'NORMALIZATION_ERROR'
  | 'RESUME_INCONSISTENCY'
  | 'INTERNAL_ORCHESTRATION_ERROR'
  | 'INVALID_INPUT';

export class PortcullisError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PortcullisError';
    this.code = code;
  }
}

/** One or more targets fell outside scope. Raised before any execution. */
export class ScopeViolation extends PortcullisError {
  readonly violations: string[];

  constructor(violations: string[]) {
    super('SCOPE_VIOLATION', `Scope violation:\n${violations.join('\n')}`);
    this.name = 'ScopeViolation';
    this.violations = violations;
  }
}

export type SandboxErrorKind = Extract<
  FailureKind,
  'timeout' | 'non_zero_exit' | 'resource_unavailable' | 'cancelled'
>;

/** Whatever the sandbox captured, kept for evidence even on failure. */
export interface SandboxOutput {
  rawOutput: string;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  durationMs: number;
}

export class SandboxError extends PortcullisError {
  readonly kind: SandboxErrorKind;
  readonly exitCode?: number;
  readonly output?: SandboxOutput;

  constructor(
    kind: SandboxErrorKind,
    message: string,
    details: { exitCode?: number; output?: SandboxOutput; cause?: unknown } = {},
  ) {
    super('SANDBOX_ERROR', message, { cause: details.cause });
    this.name = 'SandboxError';
    this.kind = kind;
    if (details.exitCode !== undefined) this.exitCode = details.exitCode;
    if (details.output !== undefined) this.output = details.output;
  }
}

export class NormalizationError extends PortcullisError {
  readonly tool: string;

  constructor(tool: string, message: string, options?: { cause?: unknown }) {
    super('NORMALIZATION_ERROR', `${tool}: ${message}`, options);
    this.name = 'NormalizationError';
    this.tool = tool;
  }
}

/** A persisted fingerprint references artifacts the store no longer holds. */
export class ResumeInconsistency extends PortcullisError {
  readonly fingerprint: string;
  readonly missing: string[];

  constructor(fingerprint: string, missing: string[]) {
    super(
      'RESUME_INCONSISTENCY',
      `Fingerprint ${fingerprint} references ${missing.length} missing artifact(s)`,
    );
    this.name = 'ResumeInconsistency';
    this.fingerprint = fingerprint;
    this.missing = missing;
  }
}

export class InternalOrchestrationError extends PortcullisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTERNAL_ORCHESTRATION_ERROR', message, options);
    this.name = 'InternalOrchestrationError';
  }
}

/** Unusable user input: targets file, package, scope file or run id. */
export class InputError extends PortcullisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
    this.name = 'InputError';
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
