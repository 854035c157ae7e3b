/**
 * Decision Relay Protocol Types
 * @decision-relay/protocol
 *
 * These types define the wire protocol spoken between the relay, its
 * downstream clients (integrations and watchers) and the upstream backend.
 * Every frame is a single JSON text message.
 */

export const PROTOCOL_VERSION = 1;

/**
 * Roles a downstream client can register as.
 * Watchers observe; they are never the target of decision requests.
 */
export type ClientRole = 'integration' | 'watcher';

export const CLIENT_ROLES: readonly ClientRole[] = ['integration', 'watcher'];

/**
 * Everything the relay can address. The upstream backend is a single
 * target named {@link UPSTREAM_NAME}.
 */
export type TargetRole = ClientRole | 'upstream';

export const UPSTREAM_NAME = 'backend';

/**
 * Reference event catalogue.
 */
export type EventName =
  // upstream -> integrations, exactly one reply expected
  | 'choose_action'
  // integration -> upstream, reply to choose_action
  | 'action_result'
  // upstream -> integrations, fire-and-forget
  | 'context_update'
  // integration -> watchers, fire-and-forget
  | 'integration_log'
  // relay -> watchers, liveness
  | 'integration_status'
  // bidirectional, unconstrained payload
  | 'custom_event'
  // integration -> upstream, action announcement
  | 'register_actions'
  // upstream -> owning integration
  | 'execute_action'
  // relay -> watcher, result of a targeted command
  | 'delivery_status'
  // relay -> client, registration accepted
  | 'registered';

export const EVENTS = {
  CHOOSE_ACTION: 'choose_action',
  ACTION_RESULT: 'action_result',
  CONTEXT_UPDATE: 'context_update',
  INTEGRATION_LOG: 'integration_log',
  INTEGRATION_STATUS: 'integration_status',
  CUSTOM_EVENT: 'custom_event',
  REGISTER_ACTIONS: 'register_actions',
  EXECUTE_ACTION: 'execute_action',
  DELIVERY_STATUS: 'delivery_status',
  REGISTERED: 'registered',
} as const satisfies Record<string, EventName>;

/**
 * Event envelope (either direction).
 * `event` is kept as a plain string: unknown events are legal on the wire
 * and are logged and dropped by the router.
 */
export interface Envelope<T = unknown> {
  event: string;
  payload: T;
  /** Links a decision request to its reply */
  correlation_id?: string;
  /** Name of the integration the message is addressed to */
  target?: string;
  /** Name of the originating client, stamped by the relay */
  from?: string;
}

/**
 * First frame every downstream client must send.
 */
export interface RegistrationFrame {
  type: ClientRole;
  name: string;
  auth_token: string;
}

export interface ErrorFrame {
  error: string;
}

/** Anything the relay writes to a socket */
export type OutboundFrame = Envelope | ErrorFrame;

// =============================================================================
// Payloads
// =============================================================================

export interface ActionDescriptor {
  name: string;
  description?: string;
  schema?: Record<string, unknown>;
}

/**
 * Decision request. Only `actions` is interpreted by the relay (for the
 * first-action fallback); everything else passes through untouched.
 */
export interface ChooseActionPayload {
  context?: unknown;
  query?: string;
  state?: unknown;
  actions?: ActionDescriptor[];
  [key: string]: unknown;
}

export type ActionResultStatus = 'ok' | 'error' | 'no_action';

export interface ActionResultPayload {
  status: ActionResultStatus;
  action?: string;
  data?: unknown;
  error?: string;
  [key: string]: unknown;
}

export interface RegisterActionsPayload {
  actions: ActionDescriptor[];
}

export interface ExecuteActionPayload {
  action: string;
  data?: unknown;
}

export type ClientStatus = 'online' | 'offline';

export interface IntegrationStatusPayload {
  name: string;
  role: ClientRole;
  status: ClientStatus;
}

export type DeliveryStatus = 'sent' | 'queued';

export interface DeliveryStatusPayload {
  target: string;
  status: DeliveryStatus;
}

export interface RegisteredPayload {
  type: ClientRole;
  name: string;
}

// =============================================================================
// Error strings (wire contract)
// =============================================================================

export const ERRORS = {
  INVALID_TOKEN: 'invalid auth token',
  REGISTRATION_NOT_JSON: 'registration must be JSON',
  MALFORMED_REGISTRATION: 'malformed registration',
  NOT_AUTHENTICATED: 'not authenticated',
  MALFORMED_FRAME: 'malformed frame',
  INVALID_TARGET: 'invalid target',
  DELIVERY_FAILED: 'delivery failed',
  DUPLICATE_CORRELATION_ID: 'duplicate correlation id',
} as const;

export function isErrorFrame(frame: OutboundFrame): frame is ErrorFrame {
  return 'error' in frame;
}
