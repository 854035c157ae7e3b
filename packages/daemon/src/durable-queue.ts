/**
 * Durable queue of undeliverable messages.
 *
 * Every operation on a target runs on that target's promise chain, so the
 * check "anything pending?", the durable append, and the ordered flush never
 * interleave for the same target. Targets are independent of each other.
 */

import {
  generateEntryId,
  type DeliveryStatus,
  type Envelope,
} from '@decision-relay/protocol';
import type { DropReason, QueueEntry, QueueStore } from '@decision-relay/storage/queue-store';
import { PersistenceError } from '@decision-relay/utils/errors';
import { queueLog as log } from '@decision-relay/utils/logger';

export interface QueueDeliverer {
  isReachable(target: string): boolean;
  /** Synchronous hand-off to the target's transport */
  send(target: string, message: Envelope): boolean;
}

export interface DurableQueueOptions {
  retryIntervalMs: number;
  maxAgeMs: number;
  maxAttempts: number;
}

export const DEFAULT_DURABLE_QUEUE_OPTIONS: DurableQueueOptions = {
  retryIntervalMs: 5000,
  maxAgeMs: 24 * 60 * 60 * 1000,
  maxAttempts: 100,
};

export interface FlushResult {
  delivered: number;
  remaining: number;
  dropped: number;
}

export class DurableQueue {
  private store: QueueStore;
  private deliverer: QueueDeliverer;
  private options: DurableQueueOptions;
  private chains: Map<string, Promise<void>> = new Map();
  private retryTimer?: NodeJS.Timeout;
  private tickInFlight?: Promise<void>;
  private seq: number;

  constructor(config: {
    store: QueueStore;
    deliverer: QueueDeliverer;
    options?: Partial<DurableQueueOptions>;
  }) {
    this.store = config.store;
    this.deliverer = config.deliverer;
    this.options = { ...DEFAULT_DURABLE_QUEUE_OPTIONS, ...config.options };
    this.seq = this.store.nextSeq();
  }

  start(): void {
    if (this.retryTimer) return;
    this.retryTimer = setInterval(() => {
      this.retryTick().catch(err => {
        log.error('Retry tick failed', { error: String(err) });
      });
    }, this.options.retryIntervalMs);
    this.retryTimer.unref();
  }

  async stop(): Promise<void> {
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = undefined;
    }
    await Promise.all(Array.from(this.chains.values()));
  }

  /**
   * Append a message durably. Rejects with PersistenceError if the write fails;
   * nothing is kept in that case.
   */
  enqueue(target: string, message: Envelope): Promise<QueueEntry> {
    return this.runExclusive(target, () => this.append(target, message));
  }

  /**
   * Send now if the target is reachable and has nothing queued ahead,
   * otherwise queue behind what is already pending.
   */
  submit(target: string, message: Envelope): Promise<DeliveryStatus> {
    return this.runExclusive(target, async () => {
      const backlog = this.store.pending(target).length > 0;
      if (!backlog && this.deliverer.isReachable(target) && this.deliverer.send(target, message)) {
        return 'sent';
      }
      await this.append(target, message);
      if (backlog && this.deliverer.isReachable(target)) {
        this.scheduleFlush(target);
      }
      return 'queued';
    });
  }

  /**
   * Remove and return everything pending for a target, in order.
   */
  drain(target: string): Promise<Envelope[]> {
    return this.runExclusive(target, async () => {
      const entries = this.store.pending(target);
      if (entries.length === 0) return [];
      await this.persist(target, () => this.store.ack(entries.map(e => e.id)));
      return entries.map(e => e.message);
    });
  }

  /**
   * Deliver pending entries in order, stopping at the first that cannot be sent.
   */
  flush(target: string): Promise<FlushResult> {
    return this.runExclusive(target, () => this.flushNow(target));
  }

  /**
   * One pass of the retry loop over every target with pending entries.
   * Targets are flushed independently; one failing target does not stop others.
   */
  retryTick(): Promise<void> {
    if (this.tickInFlight) return this.tickInFlight;
    const run = async (): Promise<void> => {
      const targets = this.store.targets();
      await Promise.all(targets.map(async target => {
        try {
          if (this.deliverer.isReachable(target)) {
            await this.flush(target);
          } else {
            await this.runExclusive(target, async () => {
              await this.applyRetention(target);
            });
          }
        } catch (err) {
          log.error('Retry failed for target', { target, error: String(err) });
        }
      }));
    };
    this.tickInFlight = run().finally(() => {
      this.tickInFlight = undefined;
    });
    return this.tickInFlight;
  }

  peek(target: string): QueueEntry[] {
    return this.store.pending(target);
  }

  hasPending(target: string): boolean {
    return this.store.pending(target).length > 0;
  }

  targets(): string[] {
    return this.store.targets();
  }

  get size(): number {
    return this.store.size();
  }

  // ============ Internal Helpers ============

  private async append(target: string, message: Envelope): Promise<QueueEntry> {
    const seq = Math.max(this.seq, this.store.nextSeq());
    this.seq = seq + 1;
    const entry: QueueEntry = {
      id: generateEntryId(),
      seq,
      target,
      message,
      enqueuedAt: Date.now(),
      attempts: 0,
    };
    await this.persist(target, () => this.store.append(entry));
    log.debug(`Queued ${message.event} for ${target}`, { id: entry.id, pending: this.store.pending(target).length });
    return entry;
  }

  private async flushNow(target: string): Promise<FlushResult> {
    const dropped = await this.applyRetention(target);
    const entries = this.store.pending(target);
    const delivered: string[] = [];
    let failed: QueueEntry | undefined;

    for (const entry of entries) {
      if (!this.deliverer.isReachable(target) || !this.deliverer.send(target, entry.message)) {
        failed = entry;
        break;
      }
      delivered.push(entry.id);
    }

    if (delivered.length > 0) {
      // At-least-once: a failed ack means these may be delivered again later
      await this.persist(target, () => this.store.ack(delivered));
      log.info(`Flushed ${delivered.length} queued message(s) to ${target}`);
    }
    if (failed) {
      const failedId = failed.id;
      await this.persist(target, () => this.store.recordAttempt([failedId]));
    }

    return {
      delivered: delivered.length,
      remaining: entries.length - delivered.length,
      dropped,
    };
  }

  private async applyRetention(target: string): Promise<number> {
    const now = Date.now();
    const expired: string[] = [];
    const exhausted: string[] = [];
    for (const entry of this.store.pending(target)) {
      if (now - entry.enqueuedAt > this.options.maxAgeMs) {
        expired.push(entry.id);
      } else if (entry.attempts >= this.options.maxAttempts) {
        exhausted.push(entry.id);
      }
    }
    await this.dropEntries(target, expired, 'expired');
    await this.dropEntries(target, exhausted, 'max_attempts');
    return expired.length + exhausted.length;
  }

  private async dropEntries(target: string, ids: string[], reason: DropReason): Promise<void> {
    if (ids.length === 0) return;
    await this.persist(target, () => this.store.drop(ids, reason));
    log.warn(`Dropped ${ids.length} queued message(s) for ${target}`, { reason });
  }

  private async persist(target: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      const error = new PersistenceError(target, err);
      log.error(error.message, { target });
      throw error;
    }
  }

  private scheduleFlush(target: string): void {
    this.flush(target).catch(err => {
      log.error('Flush failed', { target, error: String(err) });
    });
  }

  /** Targets with work queued or running */
  get busyTargets(): number {
    return this.chains.size;
  }

  /**
   * Serialize work per target; keep the chain alive even if one step fails.
   * A target's entry goes away once its last task settles.
   */
  private runExclusive<T>(target: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(target) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail: Promise<void> = run
      .then(() => undefined, () => undefined)
      .finally(() => {
        if (this.chains.get(target) === tail) this.chains.delete(target);
      });
    this.chains.set(target, tail);
    return run;
  }
}
