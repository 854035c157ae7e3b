import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { JsonlQueueStore } from '@decision-relay/storage/jsonl-queue-store';
import type { QueueEntry } from '@decision-relay/storage/queue-store';
import { QueueLockedError } from '@decision-relay/utils/errors';
import type { CliOutput } from '../output.js';
import { drainQueue, listQueue } from './queue.js';

const ENQUEUED_AT = Date.UTC(2026, 0, 1);

const entry = (id: string, seq: number, target: string, payload: unknown): QueueEntry => ({
  id,
  seq,
  target,
  message: { event: 'custom_event', payload },
  enqueuedAt: ENQUEUED_AT,
  attempts: 0,
});

describe('queue commands', () => {
  let dir: string;
  let logPath: string;
  let stdout: string[];
  let stderr: string[];
  let out: CliOutput;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'decision-relay-queue-'));
    logPath = path.join(dir, 'queue.jsonl');
    stdout = [];
    stderr = [];
    out = { log: (line) => stdout.push(line), error: (line) => stderr.push(line) };

    const store = new JsonlQueueStore({ filePath: logPath });
    await store.init();
    await store.append(entry('q1', 0, 'integration:spotify', { n: 1 }));
    await store.append(entry('q2', 1, 'upstream:backend', { n: 2 }));
    await store.append(entry('q3', 2, 'integration:spotify', { n: 3 }));
    await store.close();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lists pending entries as JSON lines', async () => {
    await expect(listQueue({ path: logPath, target: 'integration:spotify' }, out)).resolves.toBe(2);
    expect(stdout).toEqual([
      '{"id":"q1","seq":0,"target":"integration:spotify","event":"custom_event","attempts":0,"enqueuedAt":"2026-01-01T00:00:00.000Z"}',
      '{"id":"q3","seq":2,"target":"integration:spotify","event":"custom_event","attempts":0,"enqueuedAt":"2026-01-01T00:00:00.000Z"}',
    ]);
    expect(stderr).toEqual([`2 pending in ${logPath}`]);
  });

  it('drains one target and leaves the rest', async () => {
    await expect(drainQueue('integration:spotify', { path: logPath }, out)).resolves.toBe(2);
    expect(stdout).toEqual([
      '{"event":"custom_event","payload":{"n":1}}',
      '{"event":"custom_event","payload":{"n":3}}',
    ]);

    const store = new JsonlQueueStore({ filePath: logPath });
    await store.init();
    expect(store.pending().map(e => e.id)).toEqual(['q2']);
    await store.close();
  });

  it('lists without disturbing a log the relay still has open', async () => {
    const relay = new JsonlQueueStore({ filePath: logPath });
    await relay.init();
    await relay.ack(['q1']);

    await expect(listQueue({ path: logPath }, out)).resolves.toBe(2);

    await relay.append(entry('q4', 3, 'integration:spotify', { n: 4 }));
    await relay.close();

    const reopened = new JsonlQueueStore({ filePath: logPath });
    await reopened.init();
    expect(reopened.pending().map(e => e.id)).toEqual(['q2', 'q3', 'q4']);
    await reopened.close();
  });

  it('refuses to drain while the relay holds the log', async () => {
    const relay = new JsonlQueueStore({ filePath: logPath });
    await relay.init();
    try {
      await expect(drainQueue('integration:spotify', { path: logPath }, out)).rejects.toThrow(QueueLockedError);
      expect(stdout).toEqual([]);
      expect(relay.pending('integration:spotify').map(e => e.id)).toEqual(['q1', 'q3']);
    } finally {
      await relay.close();
    }
  });

  it('rejects a malformed target', async () => {
    await expect(drainQueue('spotify', { path: logPath }, out)).rejects.toThrow(
      'Invalid target "spotify": expected <integration|watcher|upstream>:<name>',
    );
  });
});
