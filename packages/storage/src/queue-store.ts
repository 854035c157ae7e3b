import path from 'node:path';
import type { Envelope, TargetRole } from '@decision-relay/protocol/types';

/**
 * Identity of a delivery target. Keyed as "<role>:<name>"; the upstream
 * backend is "upstream:backend".
 */
export interface TargetRef {
  role: TargetRole;
  name: string;
}

const TARGET_ROLES: readonly TargetRole[] = ['integration', 'watcher', 'upstream'];

export function targetKey(target: TargetRef): string {
  return `${target.role}:${target.name}`;
}

export function parseTargetKey(key: string): TargetRef | undefined {
  const idx = key.indexOf(':');
  if (idx <= 0 || idx === key.length - 1) return undefined;
  const role = key.slice(0, idx);
  const match = TARGET_ROLES.find(r => r === role);
  return match ? { role: match, name: key.slice(idx + 1) } : undefined;
}

export interface QueueEntry {
  id: string;
  /** Store-wide sequence; orders entries for the same target */
  seq: number;
  target: string;
  message: Envelope;
  enqueuedAt: number;
  attempts: number;
}

export type DropReason = 'expired' | 'max_attempts' | 'manual';

/**
 * Lightweight storage health report for the daemon/CLI.
 * - persistent: true when entries survive restarts
 * - driver: backing implementation identifier
 */
export interface QueueStoreHealth {
  persistent: boolean;
  driver: 'jsonl' | 'memory';
  entries: number;
  error?: string;
}

/**
 * Ordered, append-only store of undelivered messages.
 * Mutations resolve only once they are durable for persistent drivers.
 */
export interface QueueStore {
  init(): Promise<void>;
  close(): Promise<void>;
  append(entry: QueueEntry): Promise<void>;
  /** Removes delivered entries */
  ack(ids: string[]): Promise<void>;
  recordAttempt(ids: string[]): Promise<void>;
  drop(ids: string[], reason: DropReason): Promise<void>;
  /** Pending entries in FIFO order, optionally for one target */
  pending(target?: string): QueueEntry[];
  targets(): string[];
  size(): number;
  /** Next free sequence number */
  nextSeq(): number;
  healthCheck(): Promise<QueueStoreHealth>;
}

export function sortBySeq(entries: Iterable<QueueEntry>): QueueEntry[] {
  return Array.from(entries).sort((a, b) => a.seq - b.seq);
}

/**
 * In-memory store. Loses everything on restart.
 */
export class MemoryQueueStore implements QueueStore {
  private entries = new Map<string, QueueEntry>();
  private seq = 0;
  private reason?: string;

  constructor(options: { reason?: string } = {}) {
    this.reason = options.reason;
  }

  async init(): Promise<void> {
    // nothing to load
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  async append(entry: QueueEntry): Promise<void> {
    if (this.entries.has(entry.id)) return;
    this.entries.set(entry.id, { ...entry });
    this.seq = Math.max(this.seq, entry.seq + 1);
  }

  async ack(ids: string[]): Promise<void> {
    for (const id of ids) this.entries.delete(id);
  }

  async recordAttempt(ids: string[]): Promise<void> {
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) entry.attempts += 1;
    }
  }

  async drop(ids: string[], _reason: DropReason): Promise<void> {
    for (const id of ids) this.entries.delete(id);
  }

  pending(target?: string): QueueEntry[] {
    const all = sortBySeq(this.entries.values());
    return target === undefined ? all : all.filter(e => e.target === target);
  }

  targets(): string[] {
    return Array.from(new Set(this.pending().map(e => e.target)));
  }

  size(): number {
    return this.entries.size;
  }

  nextSeq(): number {
    return this.seq;
  }

  async healthCheck(): Promise<QueueStoreHealth> {
    return { persistent: false, driver: 'memory', entries: this.entries.size, error: this.reason };
  }
}

export interface QueueStoreConfig {
  driver: 'jsonl' | 'memory';
  /** Log file path for the jsonl driver */
  path: string;
  compactThreshold?: number;
}

/**
 * Create and initialise a queue store. A jsonl store that cannot open its
 * log throws; it never degrades to memory.
 */
export async function createQueueStore(config: QueueStoreConfig): Promise<QueueStore> {
  switch (config.driver) {
    case 'memory': {
      const store = new MemoryQueueStore({ reason: 'memory driver selected' });
      await store.init();
      return store;
    }
    case 'jsonl':
    default: {
      const { JsonlQueueStore } = await import('./jsonl-queue-store.js');
      const store = new JsonlQueueStore({
        filePath: path.resolve(config.path),
        compactThreshold: config.compactThreshold,
      });
      await store.init();
      return store;
    }
  }
}
