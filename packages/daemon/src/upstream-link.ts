import type { Envelope } from '@decision-relay/protocol';

export type UpstreamState = 'DISCONNECTED' | 'CONNECTING' | 'ACTIVE' | 'RECONNECTING';

/**
 * The single channel to the upstream backend. The router only sees this
 * interface; whether the relay listens or dials out is a configuration choice.
 */
export interface UpstreamLink {
  readonly state: UpstreamState;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** False when no backend is connected; the caller queues instead */
  send(envelope: Envelope): boolean;
  isConnected(): boolean;
  /** Raw text frame received from the backend */
  onFrame?: (raw: string) => void;
  onStateChange?: (state: UpstreamState) => void;
}

/**
 * Normalise a ws message payload (string, Buffer, Buffer[] or ArrayBuffer)
 * to text.
 */
export function frameToString(data: unknown): string | undefined {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  if (Array.isArray(data) && data.every((chunk): chunk is Buffer => Buffer.isBuffer(chunk))) {
    return Buffer.concat(data).toString('utf8');
  }
  return undefined;
}
