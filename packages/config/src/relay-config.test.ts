import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@decision-relay/utils/errors';
import {
  DEFAULT_RELAY_CONFIG,
  configFromEnv,
  deepMerge,
  getConfigSearchPaths,
  loadRelayConfig,
  redactConfig,
} from './relay-config.js';

describe('relay-config defaults', () => {
  it('exposes listening defaults', () => {
    expect(DEFAULT_RELAY_CONFIG.host).toBe('127.0.0.1');
    expect(DEFAULT_RELAY_CONFIG.port).toBe(8765);
    expect(DEFAULT_RELAY_CONFIG.upstream.port).toBe(8000);
    expect(DEFAULT_RELAY_CONFIG.upstream.mode).toBe('listen');
  });

  it('exposes queue and multiplexer defaults', () => {
    expect(DEFAULT_RELAY_CONFIG.queue.retryIntervalMs).toBe(5000);
    expect(DEFAULT_RELAY_CONFIG.queue.maxAgeMs).toBe(86_400_000);
    expect(DEFAULT_RELAY_CONFIG.queue.maxAttempts).toBe(100);
    expect(DEFAULT_RELAY_CONFIG.multiplexer).toEqual({ timeoutMs: 8000, fallback: 'no_action', diagnosticsTtlMs: 60_000 });
  });
});

describe('deepMerge', () => {
  it('merges nested objects and skips undefined', () => {
    const merged = deepMerge({ a: 1, nested: { x: 1, y: 2 } }, { a: undefined, nested: { y: 3 } });
    expect(merged).toEqual({ a: 1, nested: { x: 1, y: 3 } });
  });

  it('replaces arrays wholesale', () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });
});

describe('configFromEnv', () => {
  it('switches to connect mode when an upstream URL is given', () => {
    const fromEnv = configFromEnv({ DECISION_RELAY_UPSTREAM_URL: 'ws://backend.local:9000' });
    expect(fromEnv.upstream).toEqual({ host: undefined, port: undefined, url: 'ws://backend.local:9000', mode: 'connect' });
  });

  it('parses numeric ports', () => {
    expect(configFromEnv({ DECISION_RELAY_PORT: '9100' }).port).toBe(9100);
  });
});

describe('getConfigSearchPaths', () => {
  it('checks the working directory first', () => {
    expect(getConfigSearchPaths('/srv/relay')[0]).toBe(path.join('/srv/relay', 'decision-relay.json'));
    expect(getConfigSearchPaths('/srv/relay')[2]).toBe(path.join('/etc', 'decision-relay', 'config.json'));
  });
});

describe('loadRelayConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'decision-relay-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('requires an auth token', () => {
    expect(() => loadRelayConfig({ env: {}, cwd: dir })).toThrow(ConfigError);
    expect(() => loadRelayConfig({ env: {}, cwd: dir })).toThrow(/authToken/);
  });

  it('layers file, environment and overrides', () => {
    const file = path.join(dir, 'relay.json');
    fs.writeFileSync(file, JSON.stringify({ authToken: 'file-secret', port: 9001, multiplexer: { timeoutMs: 2000 } }));

    const { config, source } = loadRelayConfig({
      configPath: file,
      env: { DECISION_RELAY_PORT: '9002', DECISION_RELAY_QUEUE_PATH: '/var/lib/relay/q.jsonl' },
      overrides: { authToken: 'test-secret' },
    });

    expect(source).toBe(file);
    expect(config.authToken).toBe('test-secret');
    expect(config.port).toBe(9002);
    expect(config.queue.path).toBe('/var/lib/relay/q.jsonl');
    expect(config.multiplexer.timeoutMs).toBe(2000);
    expect(config.multiplexer.fallback).toBe('no_action');
  });

  it('finds decision-relay.json in the working directory', () => {
    fs.writeFileSync(path.join(dir, 'decision-relay.json'), JSON.stringify({ authToken: 'test-secret' }));

    const { source } = loadRelayConfig({ env: {}, cwd: dir });

    expect(source).toBe(path.join(dir, 'decision-relay.json'));
  });

  it('derives the upstream URL in connect mode', () => {
    const { config } = loadRelayConfig({
      env: { DECISION_RELAY_AUTH_TOKEN: 'test-secret' },
      cwd: dir,
      overrides: { upstream: { mode: 'connect', host: 'backend', port: 7000 } },
    });

    expect(config.upstream.url).toBe('ws://backend:7000');
  });

  it('rejects a non-numeric port from the environment', () => {
    expect(() =>
      loadRelayConfig({ env: { DECISION_RELAY_AUTH_TOKEN: 'test-secret', DECISION_RELAY_PORT: 'eighty' }, cwd: dir }),
    ).toThrow(/port/);
  });

  it('rejects invalid JSON files', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ authToken: ');

    expect(() => loadRelayConfig({ configPath: file, env: {} })).toThrow(/not valid JSON/);
  });

  it('rejects a missing explicit file', () => {
    expect(() => loadRelayConfig({ configPath: path.join(dir, 'missing.json'), env: {} })).toThrow(/Cannot read config file/);
  });
});

describe('redactConfig', () => {
  it('masks the token', () => {
    const { config } = loadRelayConfig({ env: { DECISION_RELAY_AUTH_TOKEN: 'test-secret' }, cwd: fs.mkdtempSync(path.join(os.tmpdir(), 'dr-')) });
    expect(redactConfig(config).authToken).toBe('***');
    expect(config.authToken).toBe('test-secret');
  });
});
