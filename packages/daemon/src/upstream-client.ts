/**
 * Upstream client (connect mode): the relay dials the backend.
 *
 * Reconnect is an explicit state machine:
 *
 *   DISCONNECTED -> CONNECTING -> ACTIVE
 *                       ^           |
 *                       |           v
 *                       +---- RECONNECTING  (exponential backoff with jitter)
 */

import type { EventEmitter } from 'node:events';
import { WebSocket } from 'ws';
import type { Envelope } from '@decision-relay/protocol';
import { upstreamLog as log } from '@decision-relay/utils/logger';
import { frameToString, type UpstreamLink, type UpstreamState } from './upstream-link.js';

/** The subset of a ws client socket the upstream client relies on */
export interface DialedSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  terminate(): void;
}

export type SocketFactory = (url: string) => DialedSocket;

export interface ReconnectOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** 0.2 means each delay is scaled by a random factor in [0.8, 1.2] */
  jitter: number;
}

export const DEFAULT_RECONNECT_OPTIONS: ReconnectOptions = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: 0.2,
};

const OPEN = 1;

export class UpstreamClient implements UpstreamLink {
  private url: string;
  private reconnect: ReconnectOptions;
  private createSocket: SocketFactory;
  private random: () => number;
  private socket?: DialedSocket;
  private _state: UpstreamState = 'DISCONNECTED';
  private stopped = true;
  private reconnectAttempts = 0;
  private reconnectDelay: number;
  private reconnectTimer?: NodeJS.Timeout;

  onFrame?: (raw: string) => void;
  onStateChange?: (state: UpstreamState) => void;

  constructor(options: {
    url: string;
    reconnect?: Partial<ReconnectOptions>;
    socketFactory?: SocketFactory;
    /** Source of jitter; Math.random by default */
    random?: () => number;
  }) {
    this.url = options.url;
    this.reconnect = { ...DEFAULT_RECONNECT_OPTIONS, ...options.reconnect };
    this.createSocket = options.socketFactory ?? ((url) => new WebSocket(url));
    this.random = options.random ?? Math.random;
    this.reconnectDelay = this.reconnect.initialDelayMs;
  }

  get state(): UpstreamState {
    return this._state;
  }

  get attempts(): number {
    return this.reconnectAttempts;
  }

  async start(): Promise<void> {
    if (!this.stopped) return;
    this.stopped = false;
    this.connect();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    const socket = this.socket;
    this.socket = undefined;
    socket?.close();
    this.setState('DISCONNECTED');
  }

  send(envelope: Envelope): boolean {
    if (this._state !== 'ACTIVE' || !this.socket || this.socket.readyState !== OPEN) return false;
    this.socket.send(JSON.stringify(envelope));
    return true;
  }

  isConnected(): boolean {
    return this._state === 'ACTIVE';
  }

  private connect(): void {
    this.setState('CONNECTING');
    let socket: DialedSocket;
    try {
      socket = this.createSocket(this.url);
    } catch (err) {
      log.error('Cannot dial upstream', { url: this.url, error: err instanceof Error ? err.message : String(err) });
      this.scheduleReconnect();
      return;
    }
    this.socket = socket;

    socket.on('open', () => {
      if (this.socket !== socket) return;
      log.info('Connected to upstream', { url: this.url, attempts: this.reconnectAttempts });
      this.reconnectAttempts = 0;
      this.reconnectDelay = this.reconnect.initialDelayMs;
      this.setState('ACTIVE');
    });

    socket.on('message', (data: unknown, isBinary: unknown) => {
      if (this.socket !== socket) return;
      const text = isBinary === true ? undefined : frameToString(data);
      if (text === undefined) {
        log.warn('Binary frame from upstream dropped');
        return;
      }
      this.onFrame?.(text);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.handleDisconnect();
    });

    socket.on('error', (err: unknown) => {
      // 'close' follows; reconnect is handled there
      log.warn('Upstream socket error', { url: this.url, error: err instanceof Error ? err.message : String(err) });
    });
  }

  private handleDisconnect(): void {
    this.socket = undefined;
    if (this.stopped) {
      this.setState('DISCONNECTED');
      return;
    }
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    this.setState('RECONNECTING');
    this.reconnectAttempts++;

    const { jitter, maxDelayMs, multiplier } = this.reconnect;
    const factor = 1 + (this.random() * 2 - 1) * jitter;
    const delay = Math.min(this.reconnectDelay * factor, maxDelayMs);
    this.reconnectDelay = Math.min(this.reconnectDelay * multiplier, maxDelayMs);

    log.info(`Reconnecting to upstream in ${Math.round(delay)}ms`, { attempt: this.reconnectAttempts });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (!this.stopped) this.connect();
    }, delay);
  }

  private setState(state: UpstreamState): void {
    if (this._state === state) return;
    this._state = state;
    this.onStateChange?.(state);
  }
}
