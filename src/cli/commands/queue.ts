import path from 'node:path';
import { parseTargetKey } from '@decision-relay/storage/queue-store';
import { JsonlQueueStore } from '@decision-relay/storage/jsonl-queue-store';
import type { CliOutput } from '../output.js';

export interface QueueListOptions {
  path: string;
  target?: string;
}

/**
 * Listing reads the log without locking it. Draining takes the writer lock
 * and fails with QueueLockedError while a relay has the log open.
 */
async function openStore(filePath: string, readOnly: boolean): Promise<JsonlQueueStore> {
  const store = new JsonlQueueStore({ filePath: path.resolve(filePath), readOnly });
  await store.init();
  return store;
}

function assertTarget(target: string): void {
  if (!parseTargetKey(target)) {
    throw new Error(`Invalid target "${target}": expected <integration|watcher|upstream>:<name>`);
  }
}

/**
 * Print pending entries, one JSON object per line.
 * @returns number of entries listed
 */
export async function listQueue(options: QueueListOptions, out: CliOutput): Promise<number> {
  if (options.target) assertTarget(options.target);
  const store = await openStore(options.path, true);
  try {
    const entries = store.pending(options.target);
    for (const entry of entries) {
      out.log(JSON.stringify({
        id: entry.id,
        seq: entry.seq,
        target: entry.target,
        event: entry.message.event,
        attempts: entry.attempts,
        enqueuedAt: new Date(entry.enqueuedAt).toISOString(),
      }));
    }
    out.error(`${entries.length} pending in ${options.path}`);
    return entries.length;
  } finally {
    await store.close();
  }
}

/**
 * Print the queued messages for one target and remove them from the log.
 * @returns number of messages drained
 */
export async function drainQueue(target: string, options: { path: string }, out: CliOutput): Promise<number> {
  assertTarget(target);
  const store = await openStore(options.path, false);
  try {
    const entries = store.pending(target);
    for (const entry of entries) {
      out.log(JSON.stringify(entry.message));
    }
    await store.drop(entries.map(e => e.id), 'manual');
    out.error(`Drained ${entries.length} message(s) for ${target}`);
    return entries.length;
  } finally {
    await store.close();
  }
}
