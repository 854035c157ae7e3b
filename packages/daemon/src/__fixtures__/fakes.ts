/**
 * In-process stand-ins for sockets and the upstream backend.
 */

import type { Envelope } from '@decision-relay/protocol';
import type { ClientTransport } from '../connection.js';
import type { QueueDeliverer } from '../durable-queue.js';
import type { UpstreamLink, UpstreamState } from '../upstream-link.js';

export const TEST_SECRET = 'test-secret';

export class FakeTransport implements ClientTransport {
  readonly sent: string[] = [];
  closedWith?: { code?: number; reason?: string };
  terminated = false;
  pings = 0;
  /** Set to false to make every send fail */
  accepting = true;

  constructor(readonly remoteAddress: string = '127.0.0.1') {}

  send(data: string): boolean {
    if (!this.accepting || this.closedWith || this.terminated) return false;
    this.sent.push(data);
    return true;
  }

  close(code?: number, reason?: string): void {
    this.closedWith = { code, reason };
  }

  terminate(): void {
    this.terminated = true;
  }

  ping(): void {
    this.pings++;
  }

  frames(): unknown[] {
    return this.sent.map((raw): unknown => JSON.parse(raw));
  }

  clear(): void {
    this.sent.length = 0;
  }
}

export class FakeUpstream implements UpstreamLink {
  state: UpstreamState = 'ACTIVE';
  readonly sent: Envelope[] = [];
  started = false;

  onFrame?: (raw: string) => void;
  onStateChange?: (state: UpstreamState) => void;

  async start(): Promise<void> {
    this.started = true;
  }

  async stop(): Promise<void> {
    this.started = false;
    this.state = 'DISCONNECTED';
  }

  send(envelope: Envelope): boolean {
    if (this.state !== 'ACTIVE') return false;
    this.sent.push(envelope);
    return true;
  }

  isConnected(): boolean {
    return this.state === 'ACTIVE';
  }

  connect(): void {
    this.state = 'ACTIVE';
    this.onStateChange?.('ACTIVE');
  }

  disconnect(): void {
    this.state = 'DISCONNECTED';
    this.onStateChange?.('DISCONNECTED');
  }

  /** Deliver a frame as if the backend had sent it */
  emit(frame: unknown): void {
    this.onFrame?.(JSON.stringify(frame));
  }
}

export class FakeDeliverer implements QueueDeliverer {
  readonly reachable = new Set<string>();
  readonly delivered: Array<{ target: string; message: Envelope }> = [];
  refusing = false;

  isReachable(target: string): boolean {
    return this.reachable.has(target);
  }

  send(target: string, message: Envelope): boolean {
    if (this.refusing) return false;
    this.delivered.push({ target, message });
    return true;
  }
}

/** Let queued promise chains run to completion */
export async function flushMicrotasks(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
