/**
 * portcullis — Docker sandbox
 *
 * docker run --rm --name portcullis-<invocation id>
 *   --security-opt no-new-privileges [--network] [--memory] [--cpus]
 *   -v <scratch>/input:/work/input:ro -v <scratch>/output:/work/output
 *   [-v <package>:/work/input/<name>:ro] [-v <wordlists>:/work/wordlists:ro] [mounts]
 *   <image> <expanded args>
 *
 * Killing the docker client does not stop the container, so a timed-out or
 * cancelled run is followed by `docker rm -f`.
 */

import path from 'node:path';
import { execa, ExecaError } from 'execa';
import type { Config } from '../config.js';
import { SandboxError, errorMessage, type SandboxOutput } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { ToolDescriptor } from '../types/tool.js';
import {
  CONTAINER_OUTPUT_DIR,
  CONTAINER_WORDLIST_DIR,
  createScratch,
  readOutputFile,
  removeScratch,
  type Scratch,
} from './scratch.js';
import type { SandboxAdapter, SandboxRequest } from './types.js';

// ============================================================
// Command runner (injectable)
// ============================================================

export interface CommandResult {
  /** undefined when the process never ran or was killed. */
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
  failed: boolean;
  /** Short description when the command could not run or was killed. */
  message?: string;
}

export interface CommandOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandOptions,
) => Promise<CommandResult>;

/** Default runner: execa without rejection, outcome read from the result. */
export const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    reject: false,
    stripFinalNewline: false,
    ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
    ...(options.signal !== undefined ? { cancelSignal: options.signal } : {}),
  });
  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    isCanceled: result.isCanceled,
    failed: result.failed,
    ...(result instanceof ExecaError ? { message: result.shortMessage } : {}),
  };
};

// ============================================================
// Argument assembly
// ============================================================

export type DockerSettings = Pick<
  Config,
  'dockerBin' | 'dockerNetwork' | 'dockerMemory' | 'dockerCpus' | 'wordlistDir'
>;

/** docker exits 125 when `docker run` itself fails (daemon, image, flags). */
const DOCKER_RUN_FAILURE = 125;

export function containerName(invocationId: string): string {
  return `portcullis-${invocationId}`;
}

/** Expand `{input.<type>}`, `{output}`, `{outputDir}` and `{wordlists}`. */
export function expandArgs(tool: ToolDescriptor, scratch: Pick<Scratch, 'inputPaths'>): string[] {
  return tool.args.map((arg) =>
    arg
      .replace(/\{input\.([a-z]+)\}/g, (match: string, type: string) => {
        for (const [known, value] of scratch.inputPaths) {
          if (known === type) return value;
        }
        return match;
      })
      .replaceAll('{outputDir}', CONTAINER_OUTPUT_DIR)
      .replaceAll('{output}', `${CONTAINER_OUTPUT_DIR}/${tool.outputFile ?? ''}`)
      .replaceAll('{wordlists}', CONTAINER_WORDLIST_DIR),
  );
}

function usesWordlists(tool: ToolDescriptor): boolean {
  return tool.args.some((a) => a.includes('{wordlists}'));
}

export function buildDockerArgs(
  request: Pick<SandboxRequest, 'invocationId' | 'tool'>,
  scratch: Pick<Scratch, 'inputDir' | 'outputDir' | 'packages' | 'inputPaths'>,
  settings: DockerSettings,
): string[] {
  const { tool } = request;
  const wordlistHost = path.resolve(settings.wordlistDir);

  const args = [
    'run',
    '--rm',
    '--name',
    containerName(request.invocationId),
    '--security-opt',
    'no-new-privileges',
  ];
  if (settings.dockerNetwork !== undefined) args.push('--network', settings.dockerNetwork);
  if (settings.dockerMemory !== undefined) args.push('--memory', settings.dockerMemory);
  if (settings.dockerCpus !== undefined) args.push('--cpus', settings.dockerCpus);

  args.push('-v', `${scratch.inputDir}:/work/input:ro`);
  args.push('-v', `${scratch.outputDir}:${CONTAINER_OUTPUT_DIR}`);
  for (const pkg of scratch.packages) {
    args.push('-v', `${pkg.host}:${pkg.container}:ro`);
  }
  if (usesWordlists(tool)) {
    args.push('-v', `${wordlistHost}:${CONTAINER_WORDLIST_DIR}:ro`);
  }
  for (const mount of tool.mounts) {
    const host = path.resolve(mount.host.replaceAll('{wordlists}', wordlistHost));
    args.push('-v', `${host}:${mount.container}:ro`);
  }

  args.push(tool.image, ...expandArgs(tool, scratch));
  return args;
}

// ============================================================
// Sandbox
// ============================================================

export class DockerSandbox implements SandboxAdapter {
  private readonly settings: DockerSettings;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(
    settings: DockerSettings,
    runner: CommandRunner = execaRunner,
    log: Logger = createLogger('sandbox'),
  ) {
    this.settings = settings;
    this.runner = runner;
    this.log = log;
  }

  async execute(request: SandboxRequest): Promise<SandboxOutput> {
    const { tool, signal } = request;
    if (signal?.aborted) {
      throw new SandboxError('cancelled', `${tool.name}: cancelled before start`);
    }

    const scratch = await createScratch(tool.consumes, request.inputs);
    try {
      const args = buildDockerArgs(request, scratch, this.settings);
      this.log.debug('docker run', { tool: tool.name, invocationId: request.invocationId, args });

      const started = Date.now();
      const result = await this.runner(this.settings.dockerBin, args, {
        timeoutMs: request.timeoutMs,
        ...(signal !== undefined ? { signal } : {}),
      });

      const fileOutput =
        tool.outputFile !== undefined ? await readOutputFile(scratch, tool.outputFile) : undefined;
      const output: SandboxOutput = {
        rawOutput: fileOutput ?? result.stdout,
        stdout: result.stdout,
        stderr: result.stderr,
        exitCode: result.exitCode ?? null,
        durationMs: Date.now() - started,
      };

      return await this.classify(request, result, output);
    } finally {
      await removeScratch(scratch);
    }
  }

  /** Map a runner result onto a sandbox outcome. */
  private async classify(
    request: SandboxRequest,
    result: CommandResult,
    output: SandboxOutput,
  ): Promise<SandboxOutput> {
    const name = request.tool.name;

    if (result.timedOut) {
      await this.removeContainer(request.invocationId);
      throw new SandboxError('timeout', `${name}: timed out after ${request.timeoutMs}ms`, { output });
    }
    if (result.isCanceled || request.signal?.aborted === true) {
      await this.removeContainer(request.invocationId);
      throw new SandboxError('cancelled', `${name}: cancelled`, { output });
    }
    if (result.exitCode === undefined) {
      throw new SandboxError(
        'resource_unavailable',
        `${name}: ${this.settings.dockerBin} did not complete: ${result.message ?? 'no exit code'}`,
        { output },
      );
    }
    if (result.exitCode === DOCKER_RUN_FAILURE) {
      throw new SandboxError(
        'resource_unavailable',
        `${name}: docker run failed: ${lastLine(result.stderr)}`,
        { exitCode: result.exitCode, output },
      );
    }
    if (result.exitCode !== 0) {
      throw new SandboxError('non_zero_exit', `${name}: exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        output,
      });
    }
    return output;
  }

  private async removeContainer(invocationId: string): Promise<void> {
    const container = containerName(invocationId);
    try {
      const result = await this.runner(this.settings.dockerBin, ['rm', '-f', container], {
        timeoutMs: 30_000,
      });
      if (result.exitCode !== 0) {
        this.log.warn('container removal failed', { container, stderr: lastLine(result.stderr) });
      }
    } catch (err) {
      this.log.warn('container removal failed', { container, error: errorMessage(err) });
    }
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}
