/**
 * Upstream endpoint (listen mode): the backend dials in.
 *
 * Only one backend connection is active at a time; a newer connection
 * supersedes the older one, mirroring client registration.
 */

import type { IncomingMessage } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { Envelope } from '@decision-relay/protocol';
import { upstreamLog as log } from '@decision-relay/utils/logger';
import { CLOSE_SUPERSEDED, WsTransport, type ClientTransport } from './connection.js';
import { frameToString, type UpstreamLink, type UpstreamState } from './upstream-link.js';

export interface UpstreamEndpointOptions {
  host: string;
  port: number;
  maxFrameBytes?: number;
}

/** Hooks the socket layer calls for an attached backend */
export interface UpstreamPeerHandle {
  receive(raw: string): void;
  closed(): void;
}

export class UpstreamEndpoint implements UpstreamLink {
  private options: UpstreamEndpointOptions;
  private wss?: WebSocketServer;
  private current?: ClientTransport;
  private _state: UpstreamState = 'DISCONNECTED';

  onFrame?: (raw: string) => void;
  onStateChange?: (state: UpstreamState) => void;

  constructor(options: UpstreamEndpointOptions) {
    this.options = options;
  }

  get state(): UpstreamState {
    return this._state;
  }

  /** Bound port once listening (useful with port 0) */
  get port(): number | undefined {
    const address = this.wss?.address();
    return typeof address === 'object' && address !== null ? address.port : undefined;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        host: this.options.host,
        port: this.options.port,
        maxPayload: this.options.maxFrameBytes,
      });
      this.wss = wss;
      wss.once('listening', () => {
        log.info('Upstream endpoint listening', { url: `ws://${this.options.host}:${this.port ?? this.options.port}` });
        resolve();
      });
      wss.once('error', reject);
      wss.on('connection', (ws: WebSocket, req: IncomingMessage) => this.handleSocket(ws, req));
    });
  }

  async stop(): Promise<void> {
    this.current?.close(1001, 'relay shutting down');
    this.current = undefined;
    this.setState('DISCONNECTED');
    const wss = this.wss;
    this.wss = undefined;
    if (!wss) return;
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  }

  send(envelope: Envelope): boolean {
    if (!this.current || this._state !== 'ACTIVE') return false;
    return this.current.send(JSON.stringify(envelope));
  }

  isConnected(): boolean {
    return this._state === 'ACTIVE';
  }

  /**
   * Make a transport the active backend connection.
   */
  attach(transport: ClientTransport): UpstreamPeerHandle {
    const previous = this.current;
    this.current = transport;
    if (previous) {
      log.warn('New upstream connection supersedes the previous one', { remoteAddress: transport.remoteAddress });
      previous.close(CLOSE_SUPERSEDED, 'superseded');
    }
    // A reconnect while already ACTIVE still counts as a fresh connection
    if (this._state === 'ACTIVE') {
      this.onStateChange?.('ACTIVE');
    } else {
      this.setState('ACTIVE');
    }

    return {
      receive: (raw) => {
        if (this.current !== transport) return;
        this.onFrame?.(raw);
      },
      closed: () => {
        if (this.current !== transport) return;
        this.current = undefined;
        log.warn('Upstream disconnected');
        this.setState('DISCONNECTED');
      },
    };
  }

  private handleSocket(ws: WebSocket, req: IncomingMessage): void {
    const handle = this.attach(new WsTransport(ws, req.socket.remoteAddress));
    ws.on('message', (data, isBinary) => {
      const text = isBinary ? undefined : frameToString(data);
      if (text === undefined) {
        log.warn('Binary frame from upstream dropped');
        return;
      }
      handle.receive(text);
    });
    ws.on('close', () => handle.closed());
    ws.on('error', (err) => log.warn('Upstream socket error', { error: err.message }));
  }

  private setState(state: UpstreamState): void {
    if (this._state === state) return;
    this._state = state;
    this.onStateChange?.(state);
  }
}
