import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createProgram, flagsToOverrides } from './program.js';
import type { CliOutput } from './output.js';

class CapturedOutput implements CliOutput {
  readonly stdout: string[] = [];
  readonly stderr: string[] = [];

  log(line: string): void {
    this.stdout.push(line);
  }

  error(line: string): void {
    this.stderr.push(line);
  }
}

describe('flagsToOverrides', () => {
  it('leaves unset flags out', () => {
    expect(flagsToOverrides({})).toEqual({});
  });

  it('nests flags under their config sections', () => {
    expect(flagsToOverrides({
      port: 9000,
      heartbeatMs: 500,
      upstreamUrl: 'ws://backend.test:9000',
      reconnectMaxMs: 10_000,
      queueMaxAttempts: 5,
      fallback: 'first_action',
    })).toEqual({
      port: 9000,
      connection: { heartbeatMs: 500 },
      upstream: { url: 'ws://backend.test:9000', mode: 'connect', reconnect: { maxDelayMs: 10_000 } },
      queue: { maxAttempts: 5 },
      multiplexer: { fallback: 'first_action' },
    });
  });

  it('lets an explicit mode win over the one implied by a url', () => {
    expect(flagsToOverrides({ upstreamUrl: 'ws://backend.test', upstreamMode: 'listen' }).upstream?.mode).toBe('listen');
  });
});

describe('config command', () => {
  let dir: string;
  let out: CapturedOutput;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'decision-relay-cli-'));
    out = new CapturedOutput();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const run = (...args: string[]): Promise<unknown> =>
    createProgram({ out, env: {}, cwd: dir }).parseAsync(['node', 'decision-relay', ...args]);

  it('prints the merged config with the token redacted', async () => {
    const file = path.join(dir, 'relay.json');
    fs.writeFileSync(file, JSON.stringify({ authToken: 'test-secret', port: 9100, queue: { maxAttempts: 7 } }));

    await run('config', '--config', file, '--port', '9200');

    expect(out.stderr).toEqual([`Config source: ${file}`]);
    const printed: unknown = JSON.parse(out.stdout.join('\n'));
    expect(printed).toMatchObject({
      port: 9200,
      authToken: '***',
      queue: { maxAttempts: 7, driver: 'jsonl' },
      upstream: { mode: 'listen', port: 8000 },
    });
  });

  it('fails without an auth token', async () => {
    const file = path.join(dir, 'relay.json');
    fs.writeFileSync(file, JSON.stringify({ port: 9100 }));
    await expect(run('config', '--config', file)).rejects.toThrow('Invalid relay config');
  });

  it('prints the config file schema', async () => {
    await run('config', '--schema');
    const schema: unknown = JSON.parse(out.stdout.join('\n'));
    expect(schema).toMatchObject({ $id: 'DecisionRelayConfig', type: 'object' });
  });
});
