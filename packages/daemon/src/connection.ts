/**
 * Client connection wrapper.
 *
 * One ClientConnection exists per accepted socket. It owns the transport and
 * tracks the registration lifecycle:
 *
 *   UNAUTHENTICATED -> ACTIVE -> STALE (superseded by a newer registration)
 *                            \-> CLOSED (socket gone)
 */

import { WebSocket } from 'ws';
import {
  generateConnectionId,
  type ClientRole,
  type OutboundFrame,
} from '@decision-relay/protocol';
import { connectionLog as log } from '@decision-relay/utils/logger';

export type ConnectionState = 'UNAUTHENTICATED' | 'ACTIVE' | 'STALE' | 'CLOSED';

/** Close code sent to a connection replaced by a newer registration */
export const CLOSE_SUPERSEDED = 4000;

/**
 * Minimal message-oriented transport. The relay only ever writes whole JSON
 * text frames; tests substitute an in-memory implementation.
 */
export interface ClientTransport {
  readonly remoteAddress?: string;
  /** Returns false if the frame could not be handed to the socket */
  send(data: string): boolean;
  close(code?: number, reason?: string): void;
  /** Drop without a close handshake */
  terminate(): void;
  ping(): void;
}

export class WsTransport implements ClientTransport {
  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress?: string,
  ) {}

  send(data: string): boolean {
    if (this.ws.readyState !== WebSocket.OPEN) return false;
    this.ws.send(data, (err) => {
      if (err) {
        log.warn('Socket write failed', { remoteAddress: this.remoteAddress, error: err.message });
      }
    });
    return true;
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }

  terminate(): void {
    this.ws.terminate();
  }

  ping(): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.ping();
    }
  }
}

export class ClientConnection {
  readonly id: string;
  private _state: ConnectionState = 'UNAUTHENTICATED';
  private _role?: ClientRole;
  private _name?: string;
  private _lastActivity: number;
  /** Cleared on each heartbeat ping, set again by a pong or any frame */
  private alive = true;

  constructor(
    private readonly transport: ClientTransport,
    options: { id?: string; now?: number } = {},
  ) {
    this.id = options.id ?? generateConnectionId();
    this._lastActivity = options.now ?? Date.now();
  }

  get state(): ConnectionState {
    return this._state;
  }

  get role(): ClientRole | undefined {
    return this._role;
  }

  get name(): string | undefined {
    return this._name;
  }

  get remoteAddress(): string | undefined {
    return this.transport.remoteAddress;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  get isAuthenticated(): boolean {
    return this._state === 'ACTIVE';
  }

  /** "<role>:<name>" once registered */
  get key(): string | undefined {
    return this._role && this._name ? `${this._role}:${this._name}` : undefined;
  }

  /**
   * Promote to ACTIVE. Only valid from UNAUTHENTICATED.
   */
  authenticate(role: ClientRole, name: string): boolean {
    if (this._state !== 'UNAUTHENTICATED') return false;
    this._role = role;
    this._name = name;
    this._state = 'ACTIVE';
    return true;
  }

  /**
   * Mark as replaced by a newer registration and close the socket.
   */
  supersede(): void {
    if (this._state !== 'ACTIVE') return;
    this._state = 'STALE';
    log.info('Connection superseded', { id: this.id, key: this.key });
    this.transport.close(CLOSE_SUPERSEDED, 'superseded');
  }

  touch(now: number = Date.now()): void {
    this._lastActivity = now;
    this.alive = true;
  }

  send(frame: OutboundFrame): boolean {
    if (this._state === 'CLOSED' || this._state === 'STALE') return false;
    return this.transport.send(JSON.stringify(frame));
  }

  sendError(error: string): boolean {
    return this.send({ error });
  }

  markPong(): void {
    this.alive = true;
  }

  /**
   * Heartbeat check. Terminates a client that has not answered since the
   * previous ping, otherwise pings it again.
   * @returns false if the client was terminated
   */
  heartbeat(): boolean {
    if (this._state === 'CLOSED') return false;
    if (!this.alive) {
      log.info('Client unresponsive, terminating', { id: this.id, key: this.key });
      this.transport.terminate();
      return false;
    }
    this.alive = false;
    this.transport.ping();
    return true;
  }

  close(code?: number, reason?: string): void {
    if (this._state === 'CLOSED') return;
    this.transport.close(code, reason);
  }

  /** Called once the underlying socket reports close */
  markClosed(): void {
    this._state = 'CLOSED';
  }
}
