/**
 * Decision relay server.
 * Composes the client endpoint, upstream link, registry, durable queue,
 * decision multiplexer and router; owns their lifecycle.
 */

import type { IncomingMessage } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import type { RelayConfig } from '@decision-relay/config/schemas';
import { ERRORS } from '@decision-relay/protocol';
import { createQueueStore, type QueueStore } from '@decision-relay/storage/queue-store';
import { relayLog as log } from '@decision-relay/utils/logger';
import { SharedSecretAuthenticator } from './auth.js';
import { ClientConnection, WsTransport, type ClientTransport } from './connection.js';
import { ConnectionRegistry } from './registry.js';
import { Router } from './router.js';
import { UpstreamClient } from './upstream-client.js';
import { UpstreamEndpoint } from './upstream-endpoint.js';
import { frameToString, type UpstreamLink, type UpstreamState } from './upstream-link.js';

/** Hooks the socket layer calls for one accepted client */
export interface ClientHandle {
  readonly connection: ClientConnection;
  receive(raw: string): void;
  /** Binary frames are not part of the protocol */
  receiveBinary(): void;
  pong(): void;
  closed(): void;
  /** Resolves once every frame received so far has been handled */
  idle(): Promise<void>;
}

export interface RelayServerDeps {
  store?: QueueStore;
  upstream?: UpstreamLink;
}

export interface StartOptions {
  /** Bind the client WebSocket endpoint (default: true) */
  listen?: boolean;
}

export function createUpstreamLink(config: RelayConfig): UpstreamLink {
  const { upstream, connection } = config;
  if (upstream.mode === 'connect') {
    return new UpstreamClient({
      url: upstream.url ?? `ws://${upstream.host}:${upstream.port}`,
      reconnect: upstream.reconnect,
    });
  }
  return new UpstreamEndpoint({ host: upstream.host, port: upstream.port, maxFrameBytes: connection.maxFrameBytes });
}

export class RelayServer {
  private config: RelayConfig;
  private deps: RelayServerDeps;
  private wss?: WebSocketServer;
  private heartbeatTimer?: NodeJS.Timeout;
  private clients: Set<ClientConnection> = new Set();
  private running = false;

  private store?: QueueStore;
  private upstreamLink?: UpstreamLink;
  private _registry?: ConnectionRegistry;
  private _router?: Router;

  constructor(config: RelayConfig, deps: RelayServerDeps = {}) {
    this.config = config;
    this.deps = deps;
  }

  get router(): Router {
    if (!this._router) throw new Error('RelayServer not started');
    return this._router;
  }

  get registry(): ConnectionRegistry {
    if (!this._registry) throw new Error('RelayServer not started');
    return this._registry;
  }

  get upstream(): UpstreamLink {
    if (!this.upstreamLink) throw new Error('RelayServer not started');
    return this.upstreamLink;
  }

  /** Bound client port once listening (useful with port 0) */
  get port(): number | undefined {
    const address = this.wss?.address();
    return typeof address === 'object' && address !== null ? address.port : undefined;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(options: StartOptions = {}): Promise<void> {
    if (this.running) return;
    const listen = options.listen ?? true;

    const store = this.deps.store ?? await createQueueStore({
      driver: this.config.queue.driver,
      path: this.config.queue.path,
      compactThreshold: this.config.queue.compactThreshold,
    });
    this.store = store;

    try {
      const upstream = this.deps.upstream ?? createUpstreamLink(this.config);
      this.upstreamLink = upstream;

      const registry = new ConnectionRegistry({
        authenticator: new SharedSecretAuthenticator(this.config.authToken),
      });
      this._registry = registry;

      const router = new Router({
        registry,
        store,
        upstream,
        queue: {
          retryIntervalMs: this.config.queue.retryIntervalMs,
          maxAgeMs: this.config.queue.maxAgeMs,
          maxAttempts: this.config.queue.maxAttempts,
        },
        decision: {
          timeoutMs: this.config.multiplexer.timeoutMs,
          fallback: this.config.multiplexer.fallback,
          diagnosticsTtlMs: this.config.multiplexer.diagnosticsTtlMs,
        },
      });
      this._router = router;

      // Frames from the backend are handled strictly in arrival order
      let upstreamChain: Promise<void> = Promise.resolve();
      upstream.onFrame = (raw) => {
        upstreamChain = upstreamChain
          .then(() => router.handleUpstreamFrame(raw))
          .catch(err => log.error('Upstream frame handling failed', { error: String(err) }));
      };
      upstream.onStateChange = (state: UpstreamState) => {
        log.info(`Upstream ${state.toLowerCase()}`);
        if (state === 'ACTIVE') {
          router.handleUpstreamConnected().catch(err => {
            log.error('Failed to flush upstream queue', { error: String(err) });
          });
        }
      };

      router.start();
      await upstream.start();
      if (listen) {
        await this.listen();
      }
    } catch (err) {
      log.error('Relay failed to start', { error: err instanceof Error ? err.message : String(err) });
      await this.teardown();
      throw err;
    }

    this.heartbeatTimer = setInterval(() => this.heartbeat(), this.config.connection.heartbeatMs);
    this.heartbeatTimer.unref();

    this.running = true;
    log.info('Relay started', {
      clients: listen ? `ws://${this.config.host}:${this.port ?? this.config.port}` : 'not listening',
      upstreamMode: this.config.upstream.mode,
      queued: store.size(),
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    log.info('Stopping relay');

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }

    for (const connection of this.clients) {
      connection.close(1001, 'relay shutting down');
    }
    this.clients.clear();
    this._registry?.clear();

    await this.teardown();
    log.info('Relay stopped');
  }

  /** Release whatever start() got as far as opening */
  private async teardown(): Promise<void> {
    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    await this._router?.stop();
    await this.upstreamLink?.stop();
    // Only close a store this server opened
    if (!this.deps.store) {
      await this.store?.close();
    }
    this._router = undefined;
    this._registry = undefined;
    this.upstreamLink = undefined;
    this.store = undefined;
  }

  /**
   * Accept a client transport. Frames from one client are handled one at a
   * time, in the order received. Replies to pending decisions skip the line:
   * arbitration is decided by arrival, not by when earlier frames finish.
   */
  acceptClient(transport: ClientTransport): ClientHandle {
    const router = this.router;
    const connection = new ClientConnection(transport);
    this.clients.add(connection);
    log.debug('Client connected', { id: connection.id, remoteAddress: transport.remoteAddress });

    let chain: Promise<void> = Promise.resolve();
    const enqueue = (task: () => Promise<void> | void): void => {
      chain = chain
        .then(task)
        .catch(err => log.error('Client frame handling failed', { id: connection.id, error: String(err) }));
    };

    return {
      connection,
      receive: (raw) => {
        if (router.takeDecisionReply(connection, raw)) return;
        enqueue(() => router.handleClientFrame(connection, raw));
      },
      receiveBinary: () => enqueue(() => {
        log.warn('Binary frame dropped', { id: connection.id, from: connection.key });
        connection.sendError(ERRORS.MALFORMED_FRAME);
      }),
      pong: () => connection.markPong(),
      closed: () => {
        this.clients.delete(connection);
        enqueue(() => router.handleClientClose(connection));
      },
      idle: () => chain,
    };
  }

  private listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        host: this.config.host,
        port: this.config.port,
        // Oversized frames close the socket with 1009
        maxPayload: this.config.connection.maxFrameBytes,
      });
      this.wss = wss;
      wss.once('listening', () => resolve());
      wss.once('error', reject);
      wss.on('connection', (ws: WebSocket, req: IncomingMessage) => this.handleSocket(ws, req));
    });
  }

  private handleSocket(ws: WebSocket, req: IncomingMessage): void {
    const handle = this.acceptClient(new WsTransport(ws, req.socket.remoteAddress));
    ws.on('message', (data, isBinary) => {
      const text = isBinary ? undefined : frameToString(data);
      if (text === undefined) {
        handle.receiveBinary();
        return;
      }
      handle.receive(text);
    });
    ws.on('pong', () => handle.pong());
    ws.on('close', () => handle.closed());
    ws.on('error', (err) => {
      log.warn('Client socket error', { id: handle.connection.id, error: err.message });
    });
  }

  private heartbeat(): void {
    for (const connection of this.clients) {
      connection.heartbeat();
    }
  }
}
