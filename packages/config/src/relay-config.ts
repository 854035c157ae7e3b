/**
 * Relay configuration loading.
 *
 * Precedence, lowest first: defaults, config file, environment, explicit
 * overrides (CLI flags). The merged object is validated once with
 * {@link RelayConfigSchema}; any failure is a {@link ConfigError}.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '@decision-relay/utils/errors';
import { RelayConfigSchema, type RelayConfig } from './schemas.js';

export const DEFAULT_CONNECTION_CONFIG = {
  maxFrameBytes: 1024 * 1024,
  heartbeatMs: 30_000,
} as const;

export const DEFAULT_RECONNECT_CONFIG = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: 0.2,
} as const;

export const DEFAULT_QUEUE_CONFIG = {
  driver: 'jsonl',
  path: path.join('.decision-relay', 'queue.jsonl'),
  retryIntervalMs: 5000,
  maxAgeMs: 24 * 60 * 60 * 1000,
  maxAttempts: 100,
  compactThreshold: 1000,
} as const;

export const DEFAULT_MULTIPLEXER_CONFIG = {
  timeoutMs: 8000,
  fallback: 'no_action',
  diagnosticsTtlMs: 60_000,
} as const;

/** Everything except the auth token, which has no default */
export const DEFAULT_RELAY_CONFIG: Omit<RelayConfig, 'authToken'> = {
  host: '127.0.0.1',
  port: 8765,
  connection: { ...DEFAULT_CONNECTION_CONFIG },
  upstream: {
    mode: 'listen',
    host: '127.0.0.1',
    port: 8000,
    reconnect: { ...DEFAULT_RECONNECT_CONFIG },
  },
  queue: { ...DEFAULT_QUEUE_CONFIG },
  multiplexer: { ...DEFAULT_MULTIPLEXER_CONFIG },
};

export const CONFIG_FILE_NAME = 'decision-relay.json';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type RelayConfigOverrides = DeepPartial<RelayConfig>;

export interface LoadRelayConfigOptions {
  /** Explicit file; when set the search paths are skipped and the file must exist */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: RelayConfigOverrides;
  cwd?: string;
}

export interface LoadedRelayConfig {
  config: RelayConfig;
  /** File the config was read from, if any */
  source?: string;
}

/**
 * Possible locations for the config file (in order of precedence)
 */
export function getConfigSearchPaths(cwd: string = process.cwd()): string[] {
  return [
    path.join(cwd, CONFIG_FILE_NAME),
    path.join(os.homedir(), '.config', 'decision-relay', 'config.json'),
    path.join('/etc', 'decision-relay', 'config.json'),
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(over)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return out;
}

function readConfigFile(file: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`);
  }
  return parsed;
}

function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value === '') return undefined;
  const n = Number(value);
  // Keep the raw string so validation reports it
  return Number.isFinite(n) ? n : value;
}

/**
 * Map DECISION_RELAY_* variables onto the config shape.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const upstream: Record<string, unknown> = {
    host: env.DECISION_RELAY_UPSTREAM_HOST || undefined,
    port: envNumber(env.DECISION_RELAY_UPSTREAM_PORT),
  };
  if (env.DECISION_RELAY_UPSTREAM_URL) {
    upstream.url = env.DECISION_RELAY_UPSTREAM_URL;
    upstream.mode = 'connect';
  }
  return {
    authToken: env.DECISION_RELAY_AUTH_TOKEN || undefined,
    host: env.DECISION_RELAY_HOST || undefined,
    port: envNumber(env.DECISION_RELAY_PORT),
    upstream,
    queue: { path: env.DECISION_RELAY_QUEUE_PATH || undefined },
  };
}

export function findConfigFile(cwd?: string): string | undefined {
  return getConfigSearchPaths(cwd).find(candidate => fs.existsSync(candidate));
}

export function loadRelayConfig(options: LoadRelayConfigOptions = {}): LoadedRelayConfig {
  const env = options.env ?? process.env;
  const source = options.configPath ?? findConfigFile(options.cwd);

  let merged: Record<string, unknown> = { ...DEFAULT_RELAY_CONFIG };
  if (source) {
    merged = deepMerge(merged, readConfigFile(source));
  }
  merged = deepMerge(merged, configFromEnv(env));
  if (options.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError('Invalid relay config', issues);
  }
  if (result.data.upstream.mode === 'connect' && !result.data.upstream.url) {
    result.data.upstream.url = `ws://${result.data.upstream.host}:${result.data.upstream.port}`;
  }
  return { config: result.data, source };
}

/** Config safe to print: the shared secret is masked */
export function redactConfig(config: RelayConfig): RelayConfig {
  return { ...config, authToken: '***' };
}
