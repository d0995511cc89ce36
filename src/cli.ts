/**
 * portcullis — CLI エントリポイント
 *
 *   portcullis web <targets-file>   [--scope] [--resume] [--output] [--concurrency] [--timeout]
 *   portcullis android <apk>        (same options)
 *   portcullis ios <ipa>            (same options)
 *   portcullis show <run-id>        [--output]
 *
 * 終了コードは exitCodeFor() に従う。SIGINT は実行中の run を中断する。
 */

import type { Type } from 'cmd-ts';
import { command, option, optional, positional, run, string, subcommands } from 'cmd-ts';
import { loadConfig, withOverrides, type Config } from './config.js';
import { InputError, PortcullisError, ScopeViolation, errorMessage } from './errors.js';
import { RunRecorder } from './engine/run-recorder.js';
import { exitCodeFor, openDatabase, runPipeline } from './engine/orchestrator.js';
import { loadScope } from './engine/scope-gate.js';
import { resolveTargets } from './engine/targets.js';
import { createLogger } from './logger.js';
import type { RunState } from './types/entities.js';
import type { Domain } from './types/tool.js';

const log = createLogger('cli');

const PositiveInt: Type<string, number> = {
  async from(str) {
    const value = Number(str);
    if (!Number.isInteger(value) || value < 1) {
      throw new Error(`expected a positive integer, got "${str}"`);
    }
    return value;
  },
};

interface RunArgs {
  input: string | undefined;
  scope: string | undefined;
  resume: string | undefined;
  output: string | undefined;
  concurrency: number | undefined;
  timeout: number | undefined;
}

function resolveConfig(overrides: Partial<Config>): Config {
  try {
    return withOverrides(loadConfig(), overrides);
  } catch (err) {
    throw new InputError(errorMessage(err), { cause: err });
  }
}

function printSummary(state: RunState): void {
  const counts = new Map<string, number>();
  for (const invocation of state.invocations) {
    counts.set(invocation.status, (counts.get(invocation.status) ?? 0) + 1);
  }
  const lines = [
    `run:     ${state.runId}`,
    `domain:  ${state.domain}`,
    `status:  ${state.status}`,
    `started: ${state.startedAt}`,
    `output:  ${state.runDir}`,
  ];
  if (state.finishedAt) lines.push(`ended:   ${state.finishedAt}`);
  if (state.error) lines.push(`error:   ${state.error}`);
  lines.push(`targets: ${state.targets.map((t) => t.value).join(', ')}`);
  for (const phase of state.phases) {
    lines.push(`phase ${phase.name}: ${phase.status}`);
    for (const skipped of phase.skipped) {
      lines.push(`  skipped ${skipped.tool}: ${skipped.reason}`);
    }
  }
  lines.push(
    `invocations: ${[...counts.entries()].map(([status, n]) => `${status}=${n}`).join(' ') || 'none'}`,
  );
  for (const invocation of state.invocations) {
    if (invocation.status !== 'failed') continue;
    lines.push(
      `  failed ${invocation.tool} (${invocation.failureKind ?? 'unknown'}): ${invocation.error ?? ''}`,
    );
  }
  process.stdout.write(lines.join('\n') + '\n');
}

async function runDomain(domain: Domain, args: RunArgs): Promise<number> {
  const config = resolveConfig({
    outputDir: args.output,
    scopeFile: args.scope,
    concurrency: args.concurrency,
    timeoutMs: args.timeout !== undefined ? args.timeout * 1000 : undefined,
  });

  if (args.input === undefined && args.resume === undefined) {
    throw new InputError(`${domain}: a target argument or --resume <run-id> is required`);
  }

  const scope = loadScope(config.scopeFile);
  const targets =
    args.resume === undefined && args.input !== undefined
      ? await resolveTargets(domain, args.input)
      : undefined;

  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('SIGINT received, cancelling run');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const state = await runPipeline({
      domain,
      scope,
      config,
      signal: controller.signal,
      ...(targets !== undefined ? { targets } : {}),
      ...(args.resume !== undefined ? { resume: args.resume } : {}),
    });
    printSummary(state);
    return exitCodeFor(state.status);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

function domainCommand(domain: Domain, inputName: string, description: string) {
  return command({
    name: domain,
    description,
    args: {
      input: positional({ type: optional(string), displayName: inputName }),
      scope: option({ long: 'scope', type: optional(string), description: 'Scope YAML file' }),
      resume: option({ long: 'resume', type: optional(string), description: 'Run ID to resume' }),
      output: option({ long: 'output', type: optional(string), description: 'Output directory' }),
      concurrency: option({
        long: 'concurrency',
        type: optional(PositiveInt),
        description: 'Parallel invocations per phase',
      }),
      timeout: option({
        long: 'timeout',
        type: optional(PositiveInt),
        description: 'Default per-invocation timeout in seconds',
      }),
    },
    handler: async (args) => {
      process.exitCode = await runDomain(domain, args);
    },
  });
}

const showCmd = command({
  name: 'show',
  description: 'Print a summary of a persisted run',
  args: {
    runId: positional({ type: string, displayName: 'run-id' }),
    output: option({ long: 'output', type: optional(string), description: 'Output directory' }),
  },
  handler: async (args) => {
    const config = resolveConfig({ outputDir: args.output });
    const db = openDatabase(config.outputDir);
    try {
      const state = new RunRecorder(db).load(args.runId);
      if (!state) {
        throw new InputError(`Run not found: ${args.runId}`);
      }
      printSummary(state);
    } finally {
      db.close();
    }
  },
});

const app = subcommands({
  name: 'portcullis',
  description: 'Deterministic, resumable orchestration of containerised security tools',
  cmds: {
    web: domainCommand('web', 'targets-file', 'Scan the web targets listed in a file'),
    android: domainCommand('android', 'apk', 'Analyse an Android package'),
    ios: domainCommand('ios', 'ipa', 'Analyse an iOS package'),
    show: showCmd,
  },
});

run(app, process.argv.slice(2)).catch((error: unknown) => {
  if (error instanceof ScopeViolation) {
    for (const violation of error.violations) {
      log.error('scope violation', { violation });
    }
  } else if (error instanceof PortcullisError) {
    log.error(error.message, { code: error.code });
  } else {
    log.error(errorMessage(error));
  }
  process.exitCode = exitCodeFor(error instanceof Error ? error : new Error(String(error)));
});
