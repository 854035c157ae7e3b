/**
 * decision-relay command tree.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import {
  DEFAULT_QUEUE_CONFIG,
  jsonSchemas,
  loadRelayConfig,
  redactConfig,
  type LoadedRelayConfig,
  type RelayConfigOverrides,
} from '@decision-relay/config';
import { RelayServer } from '@decision-relay/daemon/server';
import { relayLog as log } from '@decision-relay/utils/logger';
import { drainQueue, listQueue } from './commands/queue.js';
import { consoleOutput, type CliOutput } from './output.js';

export const VERSION = '0.1.0';

/** Flags shared by every command that resolves the relay config */
export interface ConfigFlags {
  config?: string;
  host?: string;
  port?: number;
  authToken?: string;
  maxFrameBytes?: number;
  heartbeatMs?: number;
  upstreamMode?: 'listen' | 'connect';
  upstreamHost?: string;
  upstreamPort?: number;
  upstreamUrl?: string;
  reconnectInitialMs?: number;
  reconnectMaxMs?: number;
  queueDriver?: 'jsonl' | 'memory';
  queuePath?: string;
  queueRetryMs?: number;
  queueMaxAgeMs?: number;
  queueMaxAttempts?: number;
  decisionTimeoutMs?: number;
  fallback?: 'no_action' | 'first_action';
}

export interface CliContext {
  out: CliOutput;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Called once the server is up; the CLI entry wires signals here */
  onStarted?: (server: RelayServer) => void;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function withConfigOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (skips the default search paths)')
    .option('--host <host>', 'Client endpoint host')
    .option('-p, --port <port>', 'Client endpoint port', parseInteger)
    .option('--auth-token <token>', 'Shared secret clients must present')
    .option('--max-frame-bytes <bytes>', 'Largest accepted frame', parseInteger)
    .option('--heartbeat-ms <ms>', 'Client ping interval', parseInteger)
    .addOption(new Option('--upstream-mode <mode>', 'Listen for the backend or dial it').choices(['listen', 'connect']))
    .option('--upstream-host <host>', 'Upstream endpoint host')
    .option('--upstream-port <port>', 'Upstream endpoint port', parseInteger)
    .option('--upstream-url <url>', 'Backend URL to dial (implies --upstream-mode connect)')
    .option('--reconnect-initial-ms <ms>', 'First reconnect delay', parseInteger)
    .option('--reconnect-max-ms <ms>', 'Reconnect delay cap', parseInteger)
    .addOption(new Option('--queue-driver <driver>', 'Durable queue backend').choices(['jsonl', 'memory']))
    .option('--queue-path <path>', 'Durable queue log file')
    .option('--queue-retry-ms <ms>', 'Retry loop interval', parseInteger)
    .option('--queue-max-age-ms <ms>', 'Drop queued messages older than this', parseInteger)
    .option('--queue-max-attempts <n>', 'Drop queued messages after this many failed sends', parseInteger)
    .option('--decision-timeout-ms <ms>', 'Deadline for integration replies', parseInteger)
    .addOption(new Option('--fallback <policy>', 'Answer sent when no integration replies').choices(['no_action', 'first_action']));
}

/**
 * Translate command-line flags into config overrides. Unset flags are left out
 * so lower-priority sources still apply.
 */
export function flagsToOverrides(flags: ConfigFlags): RelayConfigOverrides {
  const overrides: RelayConfigOverrides = {};
  if (flags.host !== undefined) overrides.host = flags.host;
  if (flags.port !== undefined) overrides.port = flags.port;
  if (flags.authToken !== undefined) overrides.authToken = flags.authToken;

  if (flags.maxFrameBytes !== undefined || flags.heartbeatMs !== undefined) {
    overrides.connection = {};
    if (flags.maxFrameBytes !== undefined) overrides.connection.maxFrameBytes = flags.maxFrameBytes;
    if (flags.heartbeatMs !== undefined) overrides.connection.heartbeatMs = flags.heartbeatMs;
  }

  const upstream: NonNullable<RelayConfigOverrides['upstream']> = {};
  if (flags.upstreamUrl !== undefined) {
    upstream.url = flags.upstreamUrl;
    upstream.mode = 'connect';
  }
  if (flags.upstreamMode !== undefined) upstream.mode = flags.upstreamMode;
  if (flags.upstreamHost !== undefined) upstream.host = flags.upstreamHost;
  if (flags.upstreamPort !== undefined) upstream.port = flags.upstreamPort;
  if (flags.reconnectInitialMs !== undefined || flags.reconnectMaxMs !== undefined) {
    upstream.reconnect = {};
    if (flags.reconnectInitialMs !== undefined) upstream.reconnect.initialDelayMs = flags.reconnectInitialMs;
    if (flags.reconnectMaxMs !== undefined) upstream.reconnect.maxDelayMs = flags.reconnectMaxMs;
  }
  if (Object.keys(upstream).length > 0) overrides.upstream = upstream;

  const queue: NonNullable<RelayConfigOverrides['queue']> = {};
  if (flags.queueDriver !== undefined) queue.driver = flags.queueDriver;
  if (flags.queuePath !== undefined) queue.path = flags.queuePath;
  if (flags.queueRetryMs !== undefined) queue.retryIntervalMs = flags.queueRetryMs;
  if (flags.queueMaxAgeMs !== undefined) queue.maxAgeMs = flags.queueMaxAgeMs;
  if (flags.queueMaxAttempts !== undefined) queue.maxAttempts = flags.queueMaxAttempts;
  if (Object.keys(queue).length > 0) overrides.queue = queue;

  if (flags.decisionTimeoutMs !== undefined || flags.fallback !== undefined) {
    overrides.multiplexer = {};
    if (flags.decisionTimeoutMs !== undefined) overrides.multiplexer.timeoutMs = flags.decisionTimeoutMs;
    if (flags.fallback !== undefined) overrides.multiplexer.fallback = flags.fallback;
  }

  return overrides;
}

function resolveConfig(flags: ConfigFlags, ctx: CliContext): LoadedRelayConfig {
  return loadRelayConfig({
    configPath: flags.config,
    env: ctx.env,
    cwd: ctx.cwd,
    overrides: flagsToOverrides(flags),
  });
}

export function createProgram(ctx: Partial<CliContext> = {}): Command {
  const context: CliContext = {
    out: ctx.out ?? consoleOutput,
    env: ctx.env ?? process.env,
    cwd: ctx.cwd ?? process.cwd(),
    onStarted: ctx.onStarted,
  };
  const { out } = context;

  const program = new Command();
  program
    .name('decision-relay')
    .description('Relay between decision-making integrations and a single upstream backend')
    .version(VERSION);

  withConfigOptions(
    program
      .command('start')
      .description('Start the relay'),
  ).action(async (flags: ConfigFlags) => {
    const { config, source } = resolveConfig(flags, context);
    const server = new RelayServer(config);
    await server.start();
    log.info('Ready', { config: source ?? 'defaults', port: server.port });
    context.onStarted?.(server);
  });

  withConfigOptions(
    program
      .command('config')
      .description('Print the resolved configuration (auth token redacted)')
      .option('--schema', 'Print the JSON schema of the config file instead'),
  ).action((flags: ConfigFlags & { schema?: boolean }) => {
    if (flags.schema) {
      out.log(JSON.stringify(jsonSchemas.relay, null, 2));
      return;
    }
    const { config, source } = resolveConfig(flags, context);
    out.error(`Config source: ${source ?? 'defaults'}`);
    out.log(JSON.stringify(redactConfig(config), null, 2));
  });

  const queue = program
    .command('queue')
    .description('Inspect the durable queue log');

  queue
    .command('list')
    .description('List pending messages as JSON lines')
    .option('--path <path>', 'Queue log file', DEFAULT_QUEUE_CONFIG.path)
    .option('--target <target>', 'Only this target, e.g. integration:spotify')
    .action(async (options: { path: string; target?: string }) => {
      await listQueue(options, out);
    });

  queue
    .command('drain')
    .description('Print and remove every pending message for a target (relay must be stopped)')
    .argument('<target>', 'Target key, e.g. integration:spotify or upstream:backend')
    .option('--path <path>', 'Queue log file', DEFAULT_QUEUE_CONFIG.path)
    .action(async (target: string, options: { path: string }) => {
      await drainQueue(target, options, out);
    });

  return program;
}
