/**
 * Message router for the decision relay.
 *
 * Every inbound frame passes through here. Unauthenticated connections may
 * only register; authenticated frames are dispatched through an explicit
 * "<origin>:<event>" handler table built in the constructor.
 */

import {
  EVENTS,
  ERRORS,
  UPSTREAM_NAME,
  decodeEnvelope,
  looksLikeRegistration,
  validateExecuteAction,
  validateRegisterActions,
  type ClientRole,
  type DeliveryStatus,
  type DeliveryStatusPayload,
  type Envelope,
  type IntegrationStatusPayload,
  type RegisteredPayload,
} from '@decision-relay/protocol';
import { parseTargetKey, targetKey, type QueueStore } from '@decision-relay/storage/queue-store';
import { AuthError, ProtocolError, RoutingError } from '@decision-relay/utils/errors';
import { routerLog as log } from '@decision-relay/utils/logger';
import { ActionRegistry } from './action-registry.js';
import type { ClientConnection } from './connection.js';
import {
  DecisionMultiplexer,
  type MultiplexerOptions,
} from './decision-multiplexer.js';
import { DurableQueue, type DurableQueueOptions, type QueueDeliverer } from './durable-queue.js';
import type { ConnectionRegistry } from './registry.js';

/** What the router needs from the upstream link */
export interface UpstreamSink {
  send(envelope: Envelope): boolean;
  isConnected(): boolean;
}

export type Origin = ClientRole | 'upstream';

/** Context of a dispatched frame; `connection` is absent for upstream frames */
export interface RouteContext {
  origin: Origin;
  envelope: Envelope;
  connection?: ClientConnection;
}

type Handler = (ctx: RouteContext) => Promise<void> | void;

export const UPSTREAM_TARGET = targetKey({ role: 'upstream', name: UPSTREAM_NAME });

/** Watchers address any event at an integration; one handler covers them all */
const WATCHER_ANY_EVENT = 'watcher:*';

/** How long an execute_action waits for its action_result before it is forgotten */
const EXECUTION_TTL_MS = 10 * 60 * 1000;

interface PendingExecution {
  integration: string;
  startedAt: number;
}

export class Router implements QueueDeliverer {
  private registry: ConnectionRegistry;
  private upstream: UpstreamSink;
  private queue: DurableQueue;
  private multiplexer: DecisionMultiplexer;
  private actions: ActionRegistry;
  private handlers: Map<string, Handler> = new Map();
  /** execute_action correlation ids awaiting an action_result */
  private executions: Map<string, PendingExecution> = new Map();

  constructor(options: {
    registry: ConnectionRegistry;
    store: QueueStore;
    upstream: UpstreamSink;
    actions?: ActionRegistry;
    queue?: Partial<DurableQueueOptions>;
    decision?: Partial<MultiplexerOptions>;
  }) {
    this.registry = options.registry;
    this.upstream = options.upstream;
    this.actions = options.actions ?? new ActionRegistry();
    this.queue = new DurableQueue({
      store: options.store,
      deliverer: this,
      options: options.queue,
    });
    this.multiplexer = new DecisionMultiplexer({
      broadcast: (envelope) => this.broadcastDecision(envelope),
      forward: (envelope) => this.forwardUpstream(envelope),
      options: options.decision,
    });

    this.on('upstream', EVENTS.CHOOSE_ACTION, ({ envelope }) => {
      this.multiplexer.request(envelope);
    });
    this.on('upstream', EVENTS.CONTEXT_UPDATE, ({ envelope }) =>
      this.fanOut(['integration', 'watcher'], envelope));
    this.on('upstream', EVENTS.EXECUTE_ACTION, (ctx) => this.handleExecuteAction(ctx));
    this.on('upstream', EVENTS.CUSTOM_EVENT, ({ envelope }) =>
      envelope.target
        ? this.deliverToIntegration(envelope.target, envelope).then(() => undefined)
        : this.fanOut(['integration'], envelope));

    this.on('integration', EVENTS.ACTION_RESULT, (ctx) => this.handleActionResult(ctx));
    this.on('integration', EVENTS.INTEGRATION_LOG, (ctx) =>
      this.fanOut(['watcher'], this.stamp(ctx)));
    this.on('integration', EVENTS.REGISTER_ACTIONS, (ctx) => this.handleRegisterActions(ctx));
    this.on('integration', EVENTS.CUSTOM_EVENT, async (ctx) => {
      const envelope = this.stamp(ctx);
      if (envelope.target) {
        await this.deliverToIntegration(envelope.target, envelope);
      } else {
        await this.toUpstream(envelope);
      }
    });

    this.handlers.set(WATCHER_ANY_EVENT, (ctx) => this.handleWatcherCommand(ctx));
  }

  get decisions(): DecisionMultiplexer {
    return this.multiplexer;
  }

  get durableQueue(): DurableQueue {
    return this.queue;
  }

  get actionRegistry(): ActionRegistry {
    return this.actions;
  }

  start(): void {
    this.queue.start();
  }

  async stop(): Promise<void> {
    this.multiplexer.stop();
    await this.queue.stop();
  }

  // ============ Inbound ============

  /**
   * Handle one text frame from a downstream client.
   */
  async handleClientFrame(connection: ClientConnection, raw: string): Promise<void> {
    this.registry.touch(connection);

    if (!connection.isAuthenticated) {
      await this.handleUnauthenticated(connection, raw);
      return;
    }

    const decoded = decodeEnvelope(raw);
    if (!decoded.ok) {
      const error = new ProtocolError(ERRORS.MALFORMED_FRAME);
      log.warn(error.message, { from: connection.key, reason: decoded.reason, detail: decoded.detail });
      connection.sendError(ERRORS.MALFORMED_FRAME);
      return;
    }

    const role = connection.role;
    if (!role) return;
    await this.dispatch({ origin: role, envelope: decoded.value, connection });
  }

  /**
   * Settle a pending decision the moment a reply arrives, ahead of any
   * earlier frames from the same client still waiting on a durable write.
   * @returns true when the frame was consumed as a decision reply
   */
  takeDecisionReply(connection: ClientConnection, raw: string): boolean {
    const name = connection.name;
    if (!connection.isAuthenticated || connection.role !== 'integration' || !name) return false;

    const decoded = decodeEnvelope(raw);
    if (!decoded.ok || decoded.value.event !== EVENTS.ACTION_RESULT) return false;
    const cid = decoded.value.correlation_id;
    if (!cid || this.executions.has(cid) || !this.multiplexer.getRequest(cid)) return false;

    this.registry.touch(connection);
    this.multiplexer.handleReply(name, decoded.value);
    return true;
  }

  /**
   * Handle one text frame from the upstream backend.
   */
  async handleUpstreamFrame(raw: string): Promise<void> {
    const decoded = decodeEnvelope(raw);
    if (!decoded.ok) {
      log.warn('Malformed frame from upstream dropped', { reason: decoded.reason, detail: decoded.detail });
      return;
    }
    await this.dispatch({ origin: 'upstream', envelope: decoded.value });
  }

  /**
   * Socket of a client closed.
   */
  handleClientClose(connection: ClientConnection): void {
    const { role, name } = connection;
    const wasAuthenticated = connection.isAuthenticated;
    connection.markClosed();
    if (!role || !name || !wasAuthenticated) return;
    if (this.registry.deregister(name, role, connection)) {
      this.notifyStatus({ name, role, status: 'offline' });
    }
  }

  /** The upstream link became active: deliver what piled up while it was away */
  async handleUpstreamConnected(): Promise<void> {
    log.info('Upstream connected');
    await this.queue.flush(UPSTREAM_TARGET);
  }

  // ============ QueueDeliverer ============

  isReachable(target: string): boolean {
    if (target === UPSTREAM_TARGET) return this.upstream.isConnected();
    const ref = parseTargetKey(target);
    if (!ref || ref.role === 'upstream') return false;
    return this.registry.lookup(ref.role, ref.name)?.isAuthenticated ?? false;
  }

  send(target: string, message: Envelope): boolean {
    if (target === UPSTREAM_TARGET) return this.upstream.send(message);
    const ref = parseTargetKey(target);
    if (!ref || ref.role === 'upstream') return false;
    return this.registry.lookup(ref.role, ref.name)?.send(message) ?? false;
  }

  // ============ Dispatch ============

  private on(origin: Origin, event: string, handler: Handler): void {
    this.handlers.set(`${origin}:${event}`, handler);
  }

  private async dispatch(ctx: RouteContext): Promise<void> {
    const handler = this.handlers.get(`${ctx.origin}:${ctx.envelope.event}`)
      ?? (ctx.origin === 'watcher' ? this.handlers.get(WATCHER_ANY_EVENT) : undefined);

    if (!handler) {
      log.info(`No handler for ${ctx.origin}:${ctx.envelope.event}, dropped`, { from: ctx.connection?.key });
      return;
    }

    try {
      await handler(ctx);
    } catch (err) {
      // One failed delivery never takes the connection down
      log.error(`Handler for ${ctx.origin}:${ctx.envelope.event} failed`, {
        from: ctx.connection?.key,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async handleUnauthenticated(connection: ClientConnection, raw: string): Promise<void> {
    let frame: unknown;
    try {
      frame = JSON.parse(raw);
    } catch {
      connection.sendError(ERRORS.REGISTRATION_NOT_JSON);
      return;
    }

    if (!looksLikeRegistration(frame)) {
      const error = new AuthError(ERRORS.NOT_AUTHENTICATED);
      log.warn(`Frame before registration rejected: ${error.message}`, { id: connection.id });
      connection.sendError(ERRORS.NOT_AUTHENTICATED);
      return;
    }

    const result = this.registry.register(connection, frame);
    if (result.status === 'rejected') {
      connection.sendError(result.error);
      return;
    }

    const registered: Envelope<RegisteredPayload> = {
      event: EVENTS.REGISTERED,
      payload: { type: result.role, name: result.name },
    };
    connection.send(registered);
    this.notifyStatus({ name: result.name, role: result.role, status: 'online' }, connection);

    const key = targetKey({ role: result.role, name: result.name });
    if (this.queue.hasPending(key)) {
      await this.queue.flush(key);
    }
  }

  // ============ Handlers ============

  private async handleActionResult({ envelope, connection }: RouteContext): Promise<void> {
    const name = connection?.name;
    if (!name) return;

    const cid = envelope.correlation_id;
    const execution = cid ? this.executions.get(cid) : undefined;
    if (cid && execution && execution.integration === name) {
      this.executions.delete(cid);
      await this.toUpstream({ event: EVENTS.ACTION_RESULT, payload: envelope.payload, correlation_id: cid });
      return;
    }

    this.multiplexer.handleReply(name, envelope);
  }

  private async handleExecuteAction({ envelope }: RouteContext): Promise<void> {
    const parsed = validateExecuteAction(envelope.payload);
    if (!parsed.ok) {
      log.warn('Malformed execute_action from upstream', { detail: parsed.detail });
      await this.toUpstream({
        event: EVENTS.ACTION_RESULT,
        payload: { status: 'error', error: ERRORS.MALFORMED_FRAME },
        correlation_id: envelope.correlation_id,
      });
      return;
    }

    const { action, data } = parsed.value;
    const owner = this.actions.resolveOwner(action);
    if (!owner) {
      const error = new RoutingError(action, 'no integration registered this action');
      log.warn(error.message);
      await this.toUpstream({
        event: EVENTS.ACTION_RESULT,
        payload: { status: 'error', action, error: 'unknown action' },
        correlation_id: envelope.correlation_id,
      });
      return;
    }

    if (envelope.correlation_id) {
      this.pruneExecutions();
      this.executions.set(envelope.correlation_id, { integration: owner.integration, startedAt: Date.now() });
    }
    const payload = data === undefined ? { action: owner.action } : { action: owner.action, data };
    await this.deliverToIntegration(owner.integration, {
      event: EVENTS.EXECUTE_ACTION,
      payload,
      correlation_id: envelope.correlation_id,
    });
  }

  private async handleRegisterActions(ctx: RouteContext): Promise<void> {
    const name = ctx.connection?.name;
    if (!name) return;
    const parsed = validateRegisterActions(ctx.envelope.payload);
    if (!parsed.ok) {
      log.warn('Malformed register_actions dropped', { from: name, detail: parsed.detail });
      ctx.connection?.sendError(ERRORS.MALFORMED_FRAME);
      return;
    }
    this.actions.register(name, parsed.value.actions);
    log.info(`${name} registered ${parsed.value.actions.length} action(s)`);
    await this.toUpstream({ event: EVENTS.REGISTER_ACTIONS, payload: parsed.value, from: name });
  }

  private async handleWatcherCommand(ctx: RouteContext): Promise<void> {
    const watcher = ctx.connection;
    if (!watcher) return;
    const target = ctx.envelope.target;
    if (!target) {
      log.warn(`Watcher ${watcher.name ?? watcher.id} sent ${ctx.envelope.event} without a target`);
      watcher.sendError(ERRORS.INVALID_TARGET);
      return;
    }

    let status: DeliveryStatus;
    try {
      status = await this.deliverToIntegration(target, this.stamp(ctx));
    } catch (err) {
      watcher.sendError(ERRORS.DELIVERY_FAILED);
      throw err;
    }
    const reply: Envelope<DeliveryStatusPayload> = {
      event: EVENTS.DELIVERY_STATUS,
      payload: { target, status },
      correlation_id: ctx.envelope.correlation_id,
    };
    watcher.send(reply);
  }

  // ============ Outbound ============

  private broadcastDecision(envelope: Envelope): string[] {
    const reached: string[] = [];
    for (const connection of this.registry.all('integration')) {
      if (connection.name && connection.send(envelope)) {
        reached.push(connection.name);
      }
    }
    return reached;
  }

  private forwardUpstream(envelope: Envelope): void {
    this.toUpstream(envelope).catch(err => {
      log.error('Failed to forward decision upstream', {
        correlationId: envelope.correlation_id,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  private toUpstream(envelope: Envelope): Promise<DeliveryStatus> {
    return this.queue.submit(UPSTREAM_TARGET, envelope);
  }

  private deliverToIntegration(name: string, envelope: Envelope): Promise<DeliveryStatus> {
    return this.queue.submit(targetKey({ role: 'integration', name }), envelope);
  }

  /**
   * Send to every live connection of the given roles. A registered connection
   * whose socket refuses the frame gets it queued instead.
   */
  private async fanOut(roles: ClientRole[], envelope: Envelope, except?: ClientConnection): Promise<void> {
    const queued: Array<Promise<DeliveryStatus>> = [];
    for (const role of roles) {
      for (const connection of this.registry.all(role)) {
        if (connection === except || !connection.name) continue;
        queued.push(this.queue.submit(targetKey({ role, name: connection.name }), envelope));
      }
    }
    const results = await Promise.allSettled(queued);
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error(`Fan-out of ${envelope.event} failed for one target`, { error: String(result.reason) });
      }
    }
  }

  private notifyStatus(status: IntegrationStatusPayload, except?: ClientConnection): void {
    this.fanOut(['watcher'], { event: EVENTS.INTEGRATION_STATUS, payload: status }, except).catch(err => {
      log.error('Failed to broadcast status', { error: String(err) });
    });
  }

  /** Copy of the envelope with the sender's name in `from` */
  private stamp({ envelope, connection }: RouteContext): Envelope {
    return connection?.name ? { ...envelope, from: connection.name } : envelope;
  }

  private pruneExecutions(): void {
    const cutoff = Date.now() - EXECUTION_TTL_MS;
    for (const [id, execution] of this.executions) {
      if (execution.startedAt < cutoff) this.executions.delete(id);
    }
  }
}
