/**
 * colbridge — configuration
 *
 * The bridge computes none of its settings; everything arrives from the
 * embedding application, either as an object (parseConfig) or from
 * COLBRIDGE_* environment variables (loadConfig).
 */

import { z, ZodError } from 'zod';
import {
  DEFAULT_ARTIFACT_EXTENSION,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_STORE_ROOT,
} from './constants';
import { MAX_OFFSET_MINUTES } from './timezone';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid colbridge configuration: ${issues.join('; ')}`);
    this.name   = 'ConfigError';
    this.issues = issues;
  }
}

// ─── Schema ───────────────────────────────────────────────────────────────────

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

export const BridgeConfigSchema = z.object({
  /** Directory artifacts are published into. */
  storeRoot: z.string().min(1).default(DEFAULT_STORE_ROOT),
  /** Maximum rows per container batch. */
  chunkSize: z.number().int().positive().max(0xffffffff).default(DEFAULT_CHUNK_SIZE),
  /** Log a timing line for every bridged request. */
  verbose: z.boolean().default(false),
  /** File extension of published artifacts, without the dot. */
  extension: z.string().regex(/^[A-Za-z0-9]+$/).default(DEFAULT_ARTIFACT_EXTENSION),
  digest: z.enum(['sha1', 'sha256', 'sha512']).default('sha256'),
  /** Prefix for reference URLs; `file:` URLs are produced when absent. */
  urlPrefix: z.string().min(1).optional(),
  /** Fixed local offset for naive timestamps; the process offset when absent. */
  localOffsetMinutes: z.number().int().min(-MAX_OFFSET_MINUTES).max(MAX_OFFSET_MINUTES).optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;

/** Environment variables and the config key each one feeds. */
const ENV_KEYS = {
  COLBRIDGE_STORE_ROOT:   'storeRoot',
  COLBRIDGE_CHUNK_SIZE:   'chunkSize',
  COLBRIDGE_VERBOSE:      'verbose',
  COLBRIDGE_EXTENSION:    'extension',
  COLBRIDGE_DIGEST:       'digest',
  COLBRIDGE_URL_PREFIX:   'urlPrefix',
  COLBRIDGE_LOCAL_OFFSET: 'localOffsetMinutes',
  COLBRIDGE_LOG_LEVEL:    'logLevel',
} as const;

const EnvSchema = z.object({
  storeRoot:          z.string().optional(),
  chunkSize:          z.coerce.number().optional(),
  verbose:            booleanString.optional(),
  extension:          z.string().optional(),
  digest:             z.string().optional(),
  urlPrefix:          z.string().optional(),
  localOffsetMinutes: z.coerce.number().optional(),
  logLevel:           z.string().optional(),
});

// ─── Parsing ──────────────────────────────────────────────────────────────────

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a configuration object, filling defaults.
 *
 * @throws ConfigError listing every invalid key.
 */
export function parseConfig(input: unknown = {}): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Build a configuration from COLBRIDGE_* environment variables. Unset and
 * empty variables fall back to defaults; `overrides` win over the environment.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: BridgeConfigInput = {},
): BridgeConfig {
  const raw: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') raw[configKey] = value;
  }

  const fromEnv = EnvSchema.safeParse(raw);
  if (!fromEnv.success) {
    throw new ConfigError(formatIssues(fromEnv.error));
  }

  const merged: Record<string, unknown> = { ...overrides };
  for (const [key, value] of Object.entries(fromEnv.data)) {
    if (value !== undefined && !(key in overrides)) merged[key] = value;
  }
  return parseConfig(merged);
}
