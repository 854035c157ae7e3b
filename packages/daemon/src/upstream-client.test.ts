import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { UpstreamClient, type DialedSocket } from './upstream-client.js';
import type { UpstreamState } from './upstream-link.js';

class FakeSocket extends EventEmitter implements DialedSocket {
  readyState = 0;
  readonly sent: string[] = [];

  constructor(readonly url: string) {
    super();
  }

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.readyState = 3;
    this.emit('close');
  }

  terminate(): void {
    this.close();
  }

  open(): void {
    this.readyState = 1;
    this.emit('open');
  }
}

describe('UpstreamClient', () => {
  let sockets: FakeSocket[];
  let states: UpstreamState[];

  const create = (random: () => number = () => 0.5): UpstreamClient => {
    const client = new UpstreamClient({
      url: 'ws://backend.test:8000',
      reconnect: { initialDelayMs: 1000, maxDelayMs: 4000, multiplier: 2, jitter: 0.2 },
      socketFactory: (url) => {
        const socket = new FakeSocket(url);
        sockets.push(socket);
        return socket;
      },
      random,
    });
    client.onStateChange = (state) => states.push(state);
    return client;
  };

  const latest = (): FakeSocket => {
    const socket = sockets[sockets.length - 1];
    if (!socket) throw new Error('no socket dialed');
    return socket;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    sockets = [];
    states = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('dials the configured url and becomes active on open', async () => {
    const client = create();
    await client.start();

    expect(sockets.map(s => s.url)).toEqual(['ws://backend.test:8000']);
    expect(client.state).toBe('CONNECTING');

    latest().open();
    expect(client.isConnected()).toBe(true);
    expect(states).toEqual(['CONNECTING', 'ACTIVE']);
    await client.stop();
  });

  it('only sends while active', async () => {
    const client = create();
    await client.start();
    expect(client.send({ event: 'custom_event', payload: {} })).toBe(false);

    latest().open();
    expect(client.send({ event: 'custom_event', payload: { n: 1 } })).toBe(true);
    expect(latest().sent).toEqual(['{"event":"custom_event","payload":{"n":1}}']);
    await client.stop();
  });

  it('passes text frames on and drops binary ones', async () => {
    const client = create();
    const frames: string[] = [];
    client.onFrame = (raw) => frames.push(raw);
    await client.start();
    latest().open();

    latest().emit('message', Buffer.from('{"event":"context_update","payload":{}}'), false);
    latest().emit('message', Buffer.from([0x01, 0x02]), true);

    expect(frames).toEqual(['{"event":"context_update","payload":{}}']);
    await client.stop();
  });

  it('backs off exponentially up to the cap', async () => {
    const client = create();
    await client.start();

    latest().close();
    expect(client.state).toBe('RECONNECTING');
    expect(client.attempts).toBe(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(sockets).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(2);

    latest().close();
    await vi.advanceTimersByTimeAsync(1999);
    expect(sockets).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(3);

    latest().close();
    await vi.advanceTimersByTimeAsync(4000);
    expect(sockets).toHaveLength(4);

    latest().close();
    await vi.advanceTimersByTimeAsync(3999);
    expect(sockets).toHaveLength(4);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(5);
    expect(client.attempts).toBe(4);

    latest().open();
    expect(client.attempts).toBe(0);
    expect(client.state).toBe('ACTIVE');
    await client.stop();
  });

  it('applies jitter to the delay', async () => {
    const client = create(() => 0);
    await client.start();
    latest().close();

    await vi.advanceTimersByTimeAsync(799);
    expect(sockets).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(sockets).toHaveLength(2);
    await client.stop();
  });

  it('reconnects after an established connection drops', async () => {
    const client = create();
    await client.start();
    latest().open();
    latest().close();

    expect(states).toEqual(['CONNECTING', 'ACTIVE', 'RECONNECTING']);
    await vi.advanceTimersByTimeAsync(1000);
    latest().open();
    expect(states).toEqual(['CONNECTING', 'ACTIVE', 'RECONNECTING', 'CONNECTING', 'ACTIVE']);
    await client.stop();
  });

  it('keeps retrying when dialing throws', async () => {
    let calls = 0;
    const client = new UpstreamClient({
      url: 'ws://backend.test:8000',
      reconnect: { initialDelayMs: 100, jitter: 0 },
      socketFactory: () => {
        calls++;
        throw new Error('bad url');
      },
    });
    await client.start();
    await vi.advanceTimersByTimeAsync(100);
    expect(calls).toBe(2);
    expect(client.state).toBe('RECONNECTING');
    await client.stop();
  });

  it('stops reconnecting once stopped', async () => {
    const client = create();
    await client.start();
    latest().close();
    await client.stop();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(sockets).toHaveLength(1);
    expect(client.state).toBe('DISCONNECTED');
  });
});
