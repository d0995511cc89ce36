/**
 * portcullis — Execution sandbox contract
 *
 * The scheduler only knows this interface; DockerSandbox is the production
 * implementation and tests substitute scripted fakes.
 */

import type { SandboxOutput } from '../errors.js';
import type { ArtifactType, ToolDescriptor } from '../types/tool.js';

/** One input value handed to a tool. */
export interface SandboxInput {
  type: ArtifactType;
  value: string;
  /** Host path of an app package, bind-mounted read-only. */
  location?: string;
}

export interface SandboxRequest {
  invocationId: string;
  tool: ToolDescriptor;
  inputs: SandboxInput[];
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SandboxAdapter {
  /**
   * Run one invocation to completion.
   *
   * @throws SandboxError for timeout, non-zero exit, an unavailable runtime or cancellation
   */
  execute(request: SandboxRequest): Promise<SandboxOutput>;
}
