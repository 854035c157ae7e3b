import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Envelope } from '@decision-relay/protocol';
import { MemoryQueueStore, type QueueEntry } from '@decision-relay/storage/queue-store';
import { PersistenceError } from '@decision-relay/utils/errors';
import { DurableQueue } from './durable-queue.js';
import { FakeDeliverer, flushMicrotasks } from './__fixtures__/fakes.js';

const SPOTIFY = 'integration:spotify';
const DISCORD = 'integration:discord';

const msg = (n: number): Envelope => ({ event: 'custom_event', payload: { n } });

class FailingStore extends MemoryQueueStore {
  override async append(_entry: QueueEntry): Promise<void> {
    throw new Error('disk full');
  }
}

describe('DurableQueue', () => {
  let store: MemoryQueueStore;
  let deliverer: FakeDeliverer;
  let queue: DurableQueue;

  beforeEach(() => {
    store = new MemoryQueueStore();
    deliverer = new FakeDeliverer();
    queue = new DurableQueue({ store, deliverer });
  });

  afterEach(async () => {
    await queue.stop();
    vi.useRealTimers();
  });

  it('sends directly to a reachable target', async () => {
    deliverer.reachable.add(SPOTIFY);
    await expect(queue.submit(SPOTIFY, msg(1))).resolves.toBe('sent');
    expect(deliverer.delivered).toEqual([{ target: SPOTIFY, message: msg(1) }]);
    expect(queue.size).toBe(0);
  });

  it('queues for an unreachable target', async () => {
    await expect(queue.submit(SPOTIFY, msg(1))).resolves.toBe('queued');
    expect(queue.peek(SPOTIFY).map(e => e.message)).toEqual([msg(1)]);
    expect(queue.hasPending(SPOTIFY)).toBe(true);
    expect(queue.targets()).toEqual([SPOTIFY]);
  });

  it('queues when the transport refuses the frame', async () => {
    deliverer.reachable.add(SPOTIFY);
    deliverer.refusing = true;
    await expect(queue.submit(SPOTIFY, msg(1))).resolves.toBe('queued');
    expect(queue.size).toBe(1);
  });

  it('flushes in enqueue order', async () => {
    await queue.submit(SPOTIFY, msg(1));
    await queue.submit(SPOTIFY, msg(2));
    await queue.submit(SPOTIFY, msg(3));

    deliverer.reachable.add(SPOTIFY);
    const result = await queue.flush(SPOTIFY);

    expect(result).toEqual({ delivered: 3, remaining: 0, dropped: 0 });
    expect(deliverer.delivered.map(d => d.message)).toEqual([msg(1), msg(2), msg(3)]);
    expect(queue.size).toBe(0);
  });

  it('never lets a new message overtake a backlog', async () => {
    await queue.submit(SPOTIFY, msg(1));
    deliverer.reachable.add(SPOTIFY);

    await expect(queue.submit(SPOTIFY, msg(2))).resolves.toBe('queued');
    await flushMicrotasks();

    expect(deliverer.delivered.map(d => d.message)).toEqual([msg(1), msg(2)]);
    expect(queue.size).toBe(0);
  });

  it('keeps targets independent', async () => {
    await queue.submit(SPOTIFY, msg(1));
    deliverer.reachable.add(DISCORD);
    await expect(queue.submit(DISCORD, msg(2))).resolves.toBe('sent');
    expect(queue.peek(SPOTIFY)).toHaveLength(1);
  });

  it('counts a failed send as an attempt and stops the flush there', async () => {
    await queue.submit(SPOTIFY, msg(1));
    await queue.submit(SPOTIFY, msg(2));
    deliverer.reachable.add(SPOTIFY);
    deliverer.refusing = true;

    const result = await queue.flush(SPOTIFY);

    expect(result).toEqual({ delivered: 0, remaining: 2, dropped: 0 });
    expect(queue.peek(SPOTIFY).map(e => e.attempts)).toEqual([1, 0]);
  });

  it('drops entries that exhausted their attempts', async () => {
    queue = new DurableQueue({ store, deliverer, options: { maxAttempts: 2 } });
    await queue.submit(SPOTIFY, msg(1));
    deliverer.reachable.add(SPOTIFY);
    deliverer.refusing = true;

    await queue.flush(SPOTIFY);
    await queue.flush(SPOTIFY);
    const result = await queue.flush(SPOTIFY);

    expect(result).toEqual({ delivered: 0, remaining: 0, dropped: 1 });
    expect(queue.size).toBe(0);
  });

  it('expires old entries on the retry tick even while the target is away', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    queue = new DurableQueue({ store, deliverer, options: { maxAgeMs: 60_000 } });

    await queue.submit(SPOTIFY, msg(1));
    vi.setSystemTime(new Date('2026-01-01T00:01:00.001Z'));
    await queue.retryTick();

    expect(queue.size).toBe(0);
  });

  it('retries on an interval once started', async () => {
    vi.useFakeTimers();
    queue = new DurableQueue({ store, deliverer, options: { retryIntervalMs: 1000 } });
    queue.start();

    await queue.submit(SPOTIFY, msg(1));
    deliverer.reachable.add(SPOTIFY);
    await vi.advanceTimersByTimeAsync(1000);
    await flushMicrotasks();

    expect(deliverer.delivered.map(d => d.message)).toEqual([msg(1)]);
  });

  it('isolates a failing target during the retry tick', async () => {
    await queue.submit(SPOTIFY, msg(1));
    await queue.submit(DISCORD, msg(2));
    const failing = new FakeDeliverer();
    failing.isReachable = (target: string): boolean => {
      if (target === SPOTIFY) throw new Error('lookup failed');
      return true;
    };
    queue = new DurableQueue({ store, deliverer: failing });

    await queue.retryTick();

    expect(failing.delivered).toEqual([{ target: DISCORD, message: msg(2) }]);
    expect(queue.peek(SPOTIFY)).toHaveLength(1);
  });

  it('forgets a target once its work has settled', async () => {
    deliverer.reachable.add(SPOTIFY);
    const sent = queue.submit(SPOTIFY, msg(1));
    const queued = queue.submit(DISCORD, msg(2));
    expect(queue.busyTargets).toBe(2);

    await Promise.all([sent, queued]);
    await flushMicrotasks();
    expect(queue.busyTargets).toBe(0);

    await queue.flush(DISCORD);
    await flushMicrotasks();
    expect(queue.busyTargets).toBe(0);
    expect(queue.size).toBe(1);
  });

  it('drains a target', async () => {
    await queue.submit(SPOTIFY, msg(1));
    await queue.submit(SPOTIFY, msg(2));
    await expect(queue.drain(SPOTIFY)).resolves.toEqual([msg(1), msg(2)]);
    expect(queue.size).toBe(0);
    await expect(queue.drain(SPOTIFY)).resolves.toEqual([]);
  });

  it('reports a failed durable write instead of pretending to queue', async () => {
    queue = new DurableQueue({ store: new FailingStore(), deliverer });

    const submitted = queue.submit(SPOTIFY, msg(1));
    await expect(submitted).rejects.toBeInstanceOf(PersistenceError);
    await expect(queue.enqueue(SPOTIFY, msg(2))).rejects.toThrow(
      'Durable write failed for integration:spotify: disk full',
    );
  });

  it('continues with the next operation after a failed one', async () => {
    const failing = new FailingStore();
    queue = new DurableQueue({ store: failing, deliverer });
    await expect(queue.submit(SPOTIFY, msg(1))).rejects.toThrow(PersistenceError);

    deliverer.reachable.add(SPOTIFY);
    await expect(queue.submit(SPOTIFY, msg(2))).resolves.toBe('sent');
  });
});
