/**
 * Configuration loading for the hookline CLI.
 *
 * Layers, later wins:
 *   1. built-in defaults
 *   2. `hookline.config.json` in the working directory, with `${VAR}`
 *      references resolved from the environment
 *   3. environment variables (LEMON_SQUEEZY_API_KEY, APP_URL, ...)
 *
 * The merged object is validated with zod. Empty strings count as unset.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigValidationError, HooklineError } from '../core/index.js';
import type { HooklineConfig } from '../core/index.js';
import { LOG_LEVELS } from '../observability/index.js';
import { LEMON_SQUEEZY_API } from '../webhooks/index.js';
import { NGROK_API_URL } from '../tunnels/index.js';

export const CONFIG_FILE_NAME = 'hookline.config.json';

/** Environment variable → config key. */
const ENV_OVERRIDES = {
  LEMON_SQUEEZY_API_KEY: 'apiKey',
  LEMON_SQUEEZY_STORE: 'storeId',
  LEMON_SQUEEZY_SIGNING_SECRET: 'signingSecret',
  LEMON_SQUEEZY_PATH: 'path',
  APP_URL: 'appUrl',
  APP_ENV: 'environment',
  HOOKLINE_LOG_LEVEL: 'logLevel',
} as const satisfies Record<string, keyof HooklineConfig>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** The config file exists but could not be read as a JSON object. */
export class ConfigLoadError extends HooklineError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'CONFIG_LOAD', { path });
    this.name = 'ConfigLoadError';
    this.path = path;
  }
}

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const optionalString = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value === '' ? undefined : value),
  z.string().optional(),
);

const configSchema = z.object({
  apiKey: optionalString,
  storeId: optionalString,
  signingSecret: optionalString,
  path: z.string().min(1, 'must not be empty'),
  appUrl: z.string().url('must be a valid URL'),
  environment: z.string().min(1, 'must not be empty'),
  apiBaseUrl: z.string().url('must be a valid URL'),
  ngrokApiUrl: z.string().url('must be a valid URL'),
  logLevel: z.enum(LOG_LEVELS),
});

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): HooklineConfig {
  return {
    path: 'lemon-squeezy',
    appUrl: 'http://localhost:8000',
    environment: 'local',
    apiBaseUrl: LEMON_SQUEEZY_API,
    ngrokApiUrl: NGROK_API_URL,
    logLevel: 'info',
  };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): HooklineConfig {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  const filePath = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(filePath)) {
    merged = deepMerge(merged, readConfigFile(filePath, env));
  }

  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return parsed.data;
}

function readConfigFile(filePath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`Failed to parse ${CONFIG_FILE_NAME}: ${reason}`, filePath);
  }

  const resolved = resolveEnvVars(raw, env);
  if (!isPlainObject(resolved)) {
    throw new ConfigLoadError(`${CONFIG_FILE_NAME} must contain a JSON object.`, filePath);
  }
  return resolved;
}

/** Replace `${VAR}` in every string; unknown variables become ''. */
export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, resolveEnvVars(v, env)]));
  }
  return value;
}

/** Objects merge recursively; arrays and scalars replace; empty strings are skipped. */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === '' || value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
