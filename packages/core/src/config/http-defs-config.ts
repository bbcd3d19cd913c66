import { z } from 'zod';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export const HttpDefsConfigSchema = z.object({
  /** Minimum level for the package's diagnostic logger. */
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type HttpDefsConfig = z.infer<typeof HttpDefsConfigSchema>;
export type HttpDefsConfigInput = z.input<typeof HttpDefsConfigSchema>;

export const DEFAULT_CONFIG: HttpDefsConfig = HttpDefsConfigSchema.parse({});

type Env = Record<string, string | undefined>;

/**
 * Validate a partial configuration and fill in defaults.
 * Throws a `ZodError` for invalid values.
 */
export function loadConfig(overrides: HttpDefsConfigInput = {}): HttpDefsConfig {
  return HttpDefsConfigSchema.parse(overrides);
}

function readEnv(env: Env): Record<string, string | undefined> {
  return { logLevel: env.HTTP_DEFS_LOG_LEVEL || undefined };
}

/**
 * Read configuration from environment variables (`HTTP_DEFS_LOG_LEVEL` →
 * `logLevel`). Unset or empty variables fall back to the schema defaults.
 * Throws a `ZodError` for invalid values.
 */
export function loadConfigFromEnv(env: Env = process.env): HttpDefsConfig {
  return HttpDefsConfigSchema.parse(readEnv(env));
}

/**
 * Like `loadConfigFromEnv`, but an invalid environment yields
 * `DEFAULT_CONFIG` instead of throwing.
 */
export function resolveConfigFromEnv(env: Env = process.env): HttpDefsConfig {
  const parsed = HttpDefsConfigSchema.safeParse(readEnv(env));
  return parsed.success ? parsed.data : DEFAULT_CONFIG;
}

let runtimeConfig: HttpDefsConfig | undefined;

/**
 * Environment configuration, read once per process. Never throws: the
 * parsers consult it on their failure path.
 */
export function getRuntimeConfig(): HttpDefsConfig {
  if (!runtimeConfig) {
    runtimeConfig = resolveConfigFromEnv();
  }
  return runtimeConfig;
}
