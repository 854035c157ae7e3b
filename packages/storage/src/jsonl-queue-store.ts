import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { validateEnvelope } from '@decision-relay/protocol/schemas';
import { QueueLockedError } from '@decision-relay/utils/errors';
import { createLogger } from '@decision-relay/utils/logger';
import {
  sortBySeq,
  type DropReason,
  type QueueEntry,
  type QueueStore,
  type QueueStoreHealth,
} from './queue-store.js';

const log = createLogger('queue-store');

export const QUEUE_LOG_VERSION = 1;

const DEFAULT_COMPACT_THRESHOLD = 1000;

const EnqueueRecordSchema = z.object({
  v: z.literal(QUEUE_LOG_VERSION),
  op: z.literal('enqueue'),
  id: z.string().min(1),
  seq: z.number().int().nonnegative(),
  target: z.string().min(1),
  message: z.unknown(),
  ts: z.number(),
  attempts: z.number().int().nonnegative().default(0),
});

const AckRecordSchema = z.object({
  v: z.literal(QUEUE_LOG_VERSION),
  op: z.literal('ack'),
  id: z.string().min(1),
  ts: z.number(),
});

const AttemptRecordSchema = z.object({
  v: z.literal(QUEUE_LOG_VERSION),
  op: z.literal('attempt'),
  id: z.string().min(1),
  ts: z.number(),
});

const DropRecordSchema = z.object({
  v: z.literal(QUEUE_LOG_VERSION),
  op: z.literal('drop'),
  id: z.string().min(1),
  reason: z.enum(['expired', 'max_attempts', 'manual']),
  ts: z.number(),
});

export const QueueLogRecordSchema = z.discriminatedUnion('op', [
  EnqueueRecordSchema,
  AckRecordSchema,
  AttemptRecordSchema,
  DropRecordSchema,
]);

export type QueueLogRecord = z.infer<typeof QueueLogRecordSchema>;

export interface JsonlQueueStoreOptions {
  /** Log file, e.g. /var/lib/decision-relay/queue.jsonl */
  filePath: string;
  /** Dead records tolerated before the log is rewritten (default: 1000) */
  compactThreshold?: number;
  /**
   * Replay without taking the lock or touching the file. Every write
   * rejects. Safe to use beside a running relay.
   */
  readOnly?: boolean;
}

export interface ReplayStats {
  records: number;
  skipped: number;
  tornTail: boolean;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive, owned by someone else
    return isErrno(err, 'EPERM');
  }
}

/**
 * Append-only JSONL log of queue operations. Every append is fsync'd
 * before the returned promise resolves. The log is replayed on init and
 * rewritten (tmp file + rename) when dead records pile up.
 *
 * A writable store holds `<log>.lock` (the owner's pid) until close, so a
 * second writer cannot rename the log out from under the first.
 */
export class JsonlQueueStore implements QueueStore {
  private filePath: string;
  private lockPath: string;
  private compactThreshold: number;
  private readOnly: boolean;
  private handle?: fs.promises.FileHandle;
  private hasLock = false;
  // A failed append that could not be cut back out; rewrite before writing again
  private needsRewrite = false;
  // Serialize writes so lines never interleave and compaction sees a quiet file
  private writeChain: Promise<void> = Promise.resolve();

  private entries = new Map<string, QueueEntry>();
  private seq = 0;
  private deadRecords = 0;
  private lastReplay: ReplayStats = { records: 0, skipped: 0, tornTail: false };

  constructor(options: JsonlQueueStoreOptions) {
    this.filePath = options.filePath;
    this.lockPath = `${options.filePath}.lock`;
    this.compactThreshold = options.compactThreshold ?? DEFAULT_COMPACT_THRESHOLD;
    this.readOnly = options.readOnly ?? false;
  }

  async init(): Promise<void> {
    if (this.readOnly) {
      await this.loadFromDisk();
      log.debug('Queue log read', { path: this.filePath, pending: this.entries.size });
      return;
    }

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await this.acquireLock();
    try {
      await this.loadFromDisk();

      // Rewrite on open so a torn tail or stale acks never survive a restart
      if (this.deadRecords > 0 || this.lastReplay.skipped > 0) {
        await this.enqueueWrite(() => this.rewriteLog());
      } else {
        this.handle = await fs.promises.open(this.filePath, 'a');
      }
    } catch (err) {
      await this.releaseLock();
      throw err;
    }

    log.info('Queue log opened', {
      path: this.filePath,
      pending: this.entries.size,
      records: this.lastReplay.records,
      skipped: this.lastReplay.skipped,
    });
  }

  async close(): Promise<void> {
    await this.writeChain;
    if (this.handle) {
      await this.handle.close();
      this.handle = undefined;
    }
    await this.releaseLock();
    this.entries.clear();
  }

  get replayStats(): ReplayStats {
    return { ...this.lastReplay };
  }

  async append(entry: QueueEntry): Promise<void> {
    if (this.entries.has(entry.id)) return;
    await this.appendRecords([{
      v: QUEUE_LOG_VERSION,
      op: 'enqueue',
      id: entry.id,
      seq: entry.seq,
      target: entry.target,
      message: entry.message,
      ts: entry.enqueuedAt,
      attempts: entry.attempts,
    }]);
    this.entries.set(entry.id, { ...entry });
    this.seq = Math.max(this.seq, entry.seq + 1);
  }

  async ack(ids: string[]): Promise<void> {
    const live = ids.filter(id => this.entries.has(id));
    if (live.length === 0) return;
    const ts = Date.now();
    await this.appendRecords(live.map((id): QueueLogRecord => ({ v: QUEUE_LOG_VERSION, op: 'ack', id, ts })));
    for (const id of live) this.entries.delete(id);
    // enqueue + ack are both dead now
    this.deadRecords += live.length * 2;
    await this.maybeCompact();
  }

  async recordAttempt(ids: string[]): Promise<void> {
    const live = ids.filter(id => this.entries.has(id));
    if (live.length === 0) return;
    const ts = Date.now();
    await this.appendRecords(live.map((id): QueueLogRecord => ({ v: QUEUE_LOG_VERSION, op: 'attempt', id, ts })));
    for (const id of live) {
      const entry = this.entries.get(id);
      if (entry) entry.attempts += 1;
    }
    this.deadRecords += live.length;
    await this.maybeCompact();
  }

  async drop(ids: string[], reason: DropReason): Promise<void> {
    const live = ids.filter(id => this.entries.has(id));
    if (live.length === 0) return;
    const ts = Date.now();
    await this.appendRecords(live.map((id): QueueLogRecord => ({ v: QUEUE_LOG_VERSION, op: 'drop', id, reason, ts })));
    for (const id of live) this.entries.delete(id);
    this.deadRecords += live.length * 2;
    await this.maybeCompact();
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
    const result: QueueStoreHealth = { persistent: true, driver: 'jsonl', entries: this.entries.size };
    try {
      await fs.promises.access(path.dirname(this.filePath), fs.constants.R_OK | fs.constants.W_OK);
    } catch (err) {
      result.persistent = false;
      result.error = err instanceof Error ? err.message : String(err);
    }
    return result;
  }

  // ============ Internal Helpers ============

  private async loadFromDisk(): Promise<void> {
    this.entries.clear();
    this.deadRecords = 0;
    this.seq = 0;
    this.lastReplay = { records: 0, skipped: 0, tornTail: false };

    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return;
      throw err;
    }

    const lines = content.split('\n');
    // A file that does not end in a newline was cut off mid-append
    const lastIndex = content.endsWith('\n') ? -1 : lines.length - 1;

    lines.forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) return;
      const record = this.parseRecord(trimmed);
      if (!record) {
        this.lastReplay.skipped++;
        if (index === lastIndex) {
          this.lastReplay.tornTail = true;
          log.warn('Skipping torn trailing record', { path: this.filePath });
        } else {
          log.warn('Skipping unreadable queue record', { path: this.filePath, line: index + 1 });
        }
        return;
      }
      this.lastReplay.records++;
      this.applyRecord(record);
    });
  }

  private parseRecord(line: string): QueueLogRecord | undefined {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return undefined;
    }
    const parsed = QueueLogRecordSchema.safeParse(json);
    return parsed.success ? parsed.data : undefined;
  }

  private applyRecord(record: QueueLogRecord): void {
    switch (record.op) {
      case 'enqueue': {
        const message = validateEnvelope(record.message);
        if (!message.ok) {
          log.warn('Skipping queued message with invalid envelope', { id: record.id, detail: message.detail });
          this.deadRecords++;
          return;
        }
        if (this.entries.has(record.id)) {
          this.deadRecords++;
          return;
        }
        this.entries.set(record.id, {
          id: record.id,
          seq: record.seq,
          target: record.target,
          message: message.value,
          enqueuedAt: record.ts,
          attempts: record.attempts,
        });
        this.seq = Math.max(this.seq, record.seq + 1);
        break;
      }

      case 'attempt': {
        const entry = this.entries.get(record.id);
        if (entry) entry.attempts += 1;
        this.deadRecords++;
        break;
      }

      case 'ack':
      case 'drop': {
        // enqueue + this record
        this.deadRecords += this.entries.delete(record.id) ? 2 : 1;
        break;
      }
    }
  }

  private async appendRecords(records: QueueLogRecord[]): Promise<void> {
    if (this.readOnly) {
      throw new Error(`Queue log ${this.filePath} is open read-only`);
    }
    const data = records.map(r => JSON.stringify(r)).join('\n') + '\n';
    await this.enqueueWrite(async () => {
      if (this.needsRewrite) {
        await this.rewriteLog();
        this.needsRewrite = false;
      }
      const handle = await this.openHandle();
      const { size } = await handle.stat();
      try {
        await this.writeData(handle, data);
      } catch (err) {
        await this.discardPartialWrite(handle, size);
        throw err;
      }
    });
  }

  protected async writeData(handle: fs.promises.FileHandle, data: string): Promise<void> {
    await handle.appendFile(data, 'utf-8');
    await handle.datasync();
  }

  /**
   * Cut a failed append back to where it started, so the next record does
   * not land on the end of a half-written line.
   */
  private async discardPartialWrite(handle: fs.promises.FileHandle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
      await handle.datasync();
    } catch (err) {
      this.needsRewrite = true;
      log.error('Could not discard a failed append, log will be rewritten', {
        path: this.filePath,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async acquireLock(retry = true): Promise<void> {
    try {
      const lock = await fs.promises.open(this.lockPath, 'wx');
      try {
        await lock.writeFile(`${process.pid}\n`, 'utf-8');
      } finally {
        await lock.close();
      }
      this.hasLock = true;
    } catch (err) {
      if (!isErrno(err, 'EEXIST')) throw err;
      const owner = await this.readLockOwner();
      if (owner !== undefined && processAlive(owner)) {
        throw new QueueLockedError(this.filePath, owner);
      }
      if (!retry) throw err;
      log.warn('Removing stale queue lock', { path: this.lockPath, pid: owner });
      await fs.promises.rm(this.lockPath, { force: true });
      await this.acquireLock(false);
    }
  }

  private async readLockOwner(): Promise<number | undefined> {
    try {
      const pid = Number.parseInt(await fs.promises.readFile(this.lockPath, 'utf-8'), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : undefined;
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return undefined;
      throw err;
    }
  }

  private async releaseLock(): Promise<void> {
    if (!this.hasLock) return;
    this.hasLock = false;
    await fs.promises.rm(this.lockPath, { force: true });
  }

  private async openHandle(): Promise<fs.promises.FileHandle> {
    if (!this.handle) {
      this.handle = await fs.promises.open(this.filePath, 'a');
    }
    return this.handle;
  }

  private async maybeCompact(): Promise<void> {
    if (this.deadRecords < this.compactThreshold) return;
    await this.enqueueWrite(() => this.rewriteLog());
  }

  /**
   * Rewrite the log with only live entries. The new file is fsync'd before
   * it replaces the old one, so a crash leaves one complete log or the other.
   */
  private async rewriteLog(): Promise<void> {
    const records: QueueLogRecord[] = sortBySeq(this.entries.values()).map((entry): QueueLogRecord => ({
      v: QUEUE_LOG_VERSION,
      op: 'enqueue',
      id: entry.id,
      seq: entry.seq,
      target: entry.target,
      message: entry.message,
      ts: entry.enqueuedAt,
      attempts: entry.attempts,
    }));
    const content = records.map(r => JSON.stringify(r)).join('\n');
    const tmpPath = `${this.filePath}.tmp`;

    if (this.handle) {
      await this.handle.close();
      this.handle = undefined;
    }

    const tmp = await fs.promises.open(tmpPath, 'w');
    try {
      await tmp.writeFile(content ? `${content}\n` : '', 'utf-8');
      await tmp.sync();
    } finally {
      await tmp.close();
    }
    await fs.promises.rename(tmpPath, this.filePath);

    this.deadRecords = 0;
    this.handle = await fs.promises.open(this.filePath, 'a');
    log.debug('Queue log compacted', { path: this.filePath, entries: records.length });
  }

  /**
   * Serialize writes; keep chain alive even if a single write fails.
   */
  private async enqueueWrite(fn: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(fn);
    this.writeChain = run.then(() => undefined, () => undefined);
    return run;
  }
}
