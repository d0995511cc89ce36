/**
 * portcullis — Configuration
 *
 * Environment variables parsed once through a Zod schema. CLI flags are
 * applied on top with `withOverrides()`.
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

export const ConfigSchema = z.object({
  outputDir: z.string().min(1).default('outputs'),
  scopeFile: z.string().min(1).default('scope.yaml'),
  concurrency: z.coerce.number().int().min(1).max(64).default(4),
  timeoutMs: z.coerce.number().int().min(1000).default(600_000),
  dockerBin: z.string().min(1).default('docker'),
  dockerNetwork: optionalString,
  dockerMemory: optionalString,
  dockerCpus: optionalString,
  wordlistDir: z.string().min(1).default('wordlists'),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Environment variable → config key. */
const ENV_KEYS: Record<keyof Config, string> = {
  outputDir: 'PORTCULLIS_OUTPUT_DIR',
  scopeFile: 'PORTCULLIS_SCOPE_FILE',
  concurrency: 'PORTCULLIS_CONCURRENCY',
  timeoutMs: 'PORTCULLIS_TIMEOUT_MS',
  dockerBin: 'PORTCULLIS_DOCKER_BIN',
  dockerNetwork: 'PORTCULLIS_DOCKER_NETWORK',
  dockerMemory: 'PORTCULLIS_DOCKER_MEMORY',
  dockerCpus: 'PORTCULLIS_DOCKER_CPUS',
  wordlistDir: 'PORTCULLIS_WORDLIST_DIR',
};

function isConfigKey(key: unknown): key is keyof Config {
  return typeof key === 'string' && key in ENV_KEYS;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const key = issue.path[0];
      const label = isConfigKey(key) ? ENV_KEYS[key] : String(key);
      return `${label}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Load configuration from environment variables.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string | undefined> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Apply CLI overrides (undefined values are ignored) and re-validate. */
export function withOverrides(base: Config, overrides: Partial<Config>): Config {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
