/**
 * Decision multiplexer.
 *
 * Broadcasts an upstream decision request to every registered integration
 * and forwards exactly one answer upstream: the first structurally valid
 * reply by arrival, or the configured fallback once the deadline passes.
 */

import {
  ERRORS,
  EVENTS,
  generateCorrelationId,
  validateActionResult,
  type ActionResultPayload,
  type Envelope,
} from '@decision-relay/protocol';
import { ArbitrationTimeoutError } from '@decision-relay/utils/errors';
import { muxLog as log } from '@decision-relay/utils/logger';

export type DecisionState = 'pending' | 'resolved' | 'timed_out';

export interface DecisionRequest {
  correlationId: string;
  payload: unknown;
  broadcastTo: ReadonlySet<string>;
  startedAt: number;
  deadline: number;
  state: DecisionState;
  /** Integration whose reply won; undefined when the fallback was used */
  winner?: string;
  resolution?: ActionResultPayload;
}

/**
 * Picks the answer sent upstream when no integration replies in time.
 */
export type FallbackPolicy = (request: DecisionRequest) => ActionResultPayload;

export type FallbackPolicyName = 'no_action' | 'first_action';

function firstActionName(payload: unknown): string | undefined {
  if (typeof payload !== 'object' || payload === null || !('actions' in payload)) return undefined;
  const { actions } = payload;
  if (!Array.isArray(actions) || actions.length === 0) return undefined;
  const first: unknown = actions[0];
  if (typeof first === 'string') return first;
  if (typeof first === 'object' && first !== null && 'name' in first && typeof first.name === 'string') {
    return first.name;
  }
  return undefined;
}

export const FALLBACK_POLICIES: Record<FallbackPolicyName, FallbackPolicy> = {
  no_action: () => ({ status: 'no_action' }),
  first_action: (request) => {
    const action = firstActionName(request.payload);
    return action ? { status: 'ok', action, fallback: true } : { status: 'no_action' };
  },
};

export type ReplyOutcome = 'accepted' | 'late' | 'unknown' | 'not_broadcast' | 'invalid';

export interface DiscardedReply {
  from: string;
  payload: unknown;
  receivedAt: number;
  outcome: Exclude<ReplyOutcome, 'accepted'>;
}

export interface DecisionDiagnostics {
  correlationId: string;
  state: Exclude<DecisionState, 'pending'>;
  winner?: string;
  resolvedAt: number;
  discarded: DiscardedReply[];
}

export interface MultiplexerOptions {
  timeoutMs: number;
  fallback: FallbackPolicyName | FallbackPolicy;
  /** How long resolved requests stay around to explain late replies */
  diagnosticsTtlMs: number;
}

export const DEFAULT_MULTIPLEXER_OPTIONS: MultiplexerOptions = {
  timeoutMs: 8000,
  fallback: 'no_action',
  diagnosticsTtlMs: 60_000,
};

interface PendingDecision {
  request: DecisionRequest;
  timer?: NodeJS.Timeout;
  discarded: DiscardedReply[];
}

export class DecisionMultiplexer {
  private options: MultiplexerOptions;
  private fallback: FallbackPolicy;
  private pending: Map<string, PendingDecision> = new Map();
  private diagnostics: Map<string, DecisionDiagnostics> = new Map();
  /** Sends the request to every live integration; returns the names reached */
  private broadcast: (envelope: Envelope) => string[];
  /** Hands the single answer to the upstream path */
  private forward: (envelope: Envelope) => void;

  constructor(config: {
    broadcast: (envelope: Envelope) => string[];
    forward: (envelope: Envelope) => void;
    options?: Partial<MultiplexerOptions>;
  }) {
    this.options = { ...DEFAULT_MULTIPLEXER_OPTIONS, ...config.options };
    this.fallback = typeof this.options.fallback === 'function'
      ? this.options.fallback
      : FALLBACK_POLICIES[this.options.fallback];
    this.broadcast = config.broadcast;
    this.forward = config.forward;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Start arbitration for an upstream decision request. A request reusing an
   * id that is still pending is answered with an error under that id instead.
   * @returns the correlation id used on the wire
   */
  request(envelope: Envelope): string {
    const requested = envelope.correlation_id;
    if (requested && this.pending.has(requested)) {
      log.warn(`Correlation id ${requested} already pending, request rejected`);
      this.forward({
        event: EVENTS.ACTION_RESULT,
        payload: { status: 'error', error: ERRORS.DUPLICATE_CORRELATION_ID },
        correlation_id: requested,
      });
      return requested;
    }

    const correlationId = requested || generateCorrelationId();
    const now = Date.now();

    const reached = this.broadcast({
      event: envelope.event,
      payload: envelope.payload,
      correlation_id: correlationId,
    });

    const request: DecisionRequest = {
      correlationId,
      payload: envelope.payload,
      broadcastTo: new Set(reached),
      startedAt: now,
      deadline: now + this.options.timeoutMs,
      state: 'pending',
    };
    const entry: PendingDecision = { request, discarded: [] };
    this.pending.set(correlationId, entry);

    if (reached.length === 0) {
      log.warn('No integrations registered, answering with fallback', { correlationId });
      this.resolveWithFallback(entry);
      return correlationId;
    }

    entry.timer = setTimeout(() => this.handleDeadline(correlationId), this.options.timeoutMs);
    log.debug(`Decision ${correlationId} broadcast`, { integrations: reached });
    return correlationId;
  }

  /**
   * Offer a reply from an integration. Only the first valid one is forwarded.
   */
  handleReply(from: string, envelope: Envelope): ReplyOutcome {
    const correlationId = envelope.correlation_id;
    const now = Date.now();

    if (!correlationId) {
      log.warn('Reply without correlation id dropped', { from });
      return 'unknown';
    }

    const entry = this.pending.get(correlationId);
    if (!entry) {
      const resolved = this.getDiagnostics(correlationId);
      if (resolved) {
        resolved.discarded.push({ from, payload: envelope.payload, receivedAt: now, outcome: 'late' });
        log.info(`Late reply for ${correlationId} discarded`, { from, winner: resolved.winner });
        return 'late';
      }
      log.warn(`Reply for unknown correlation id ${correlationId} dropped`, { from });
      return 'unknown';
    }

    if (!entry.request.broadcastTo.has(from)) {
      entry.discarded.push({ from, payload: envelope.payload, receivedAt: now, outcome: 'not_broadcast' });
      log.warn(`Reply for ${correlationId} from ${from}, which was not asked`);
      return 'not_broadcast';
    }

    const validated = validateActionResult(envelope.payload);
    if (!validated.ok) {
      entry.discarded.push({ from, payload: envelope.payload, receivedAt: now, outcome: 'invalid' });
      log.warn(`Invalid reply for ${correlationId} dropped`, { from, detail: validated.detail });
      return 'invalid';
    }

    this.settle(entry, 'resolved', validated.value, from);
    log.info(`Decision ${correlationId} resolved by ${from}`, { elapsedMs: now - entry.request.startedAt });
    return 'accepted';
  }

  getDiagnostics(correlationId: string): DecisionDiagnostics | undefined {
    this.pruneDiagnostics();
    return this.diagnostics.get(correlationId);
  }

  getRequest(correlationId: string): DecisionRequest | undefined {
    return this.pending.get(correlationId)?.request;
  }

  /**
   * Cancel every pending request without answering upstream.
   */
  stop(): void {
    for (const entry of this.pending.values()) {
      if (entry.timer) clearTimeout(entry.timer);
    }
    this.pending.clear();
    this.diagnostics.clear();
  }

  // ============ Internal Helpers ============

  private handleDeadline(correlationId: string): void {
    const entry = this.pending.get(correlationId);
    if (!entry || entry.request.state !== 'pending') return;
    const timeout = new ArbitrationTimeoutError(correlationId, this.options.timeoutMs);
    log.warn(timeout.message, { code: timeout.code, broadcastTo: Array.from(entry.request.broadcastTo) });
    this.resolveWithFallback(entry);
  }

  private resolveWithFallback(entry: PendingDecision): void {
    this.settle(entry, 'timed_out', this.fallback(entry.request));
  }

  private settle(
    entry: PendingDecision,
    state: Exclude<DecisionState, 'pending'>,
    resolution: ActionResultPayload,
    winner?: string,
  ): void {
    const { request } = entry;
    // resolved at most once
    if (request.state !== 'pending') return;
    if (entry.timer) clearTimeout(entry.timer);
    request.state = state;
    request.resolution = resolution;
    request.winner = winner;
    this.pending.delete(request.correlationId);

    this.pruneDiagnostics();
    this.diagnostics.set(request.correlationId, {
      correlationId: request.correlationId,
      state,
      winner,
      resolvedAt: Date.now(),
      discarded: entry.discarded,
    });

    this.forward({
      event: EVENTS.ACTION_RESULT,
      payload: resolution,
      correlation_id: request.correlationId,
    });
  }

  private pruneDiagnostics(): void {
    const cutoff = Date.now() - this.options.diagnosticsTtlMs;
    for (const [id, diag] of this.diagnostics) {
      if (diag.resolvedAt < cutoff) this.diagnostics.delete(id);
    }
  }
}
