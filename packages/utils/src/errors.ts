/**
 * Error Types for decision-relay
 *
 * Single source of truth for typed error classes. Each carries a stable
 * `code` so log lines and tests can match on it without string parsing.
 */

export type RelayErrorCode =
  | 'RELAY_ERROR'
  | 'AUTH_FAILED'
  | 'PROTOCOL_VIOLATION'
  | 'ROUTING_FAILED'
  | 'ARBITRATION_TIMEOUT'
  | 'PERSISTENCE_FAILED'
  | 'QUEUE_LOCKED'
  | 'CONFIG_INVALID';

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(message: string, code: RelayErrorCode = 'RELAY_ERROR', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
  }
}

/** Wrong shared secret, or a non-registration frame before registering */
export class AuthError extends RelayError {
  constructor(message: string) {
    super(message, 'AUTH_FAILED');
    this.name = 'AuthError';
  }
}

/** Frame that is not JSON, has the wrong shape, or is too large */
export class ProtocolError extends RelayError {
  constructor(message: string) {
    super(message, 'PROTOCOL_VIOLATION');
    this.name = 'ProtocolError';
  }
}

export class RoutingError extends RelayError {
  readonly target: string;

  constructor(target: string, reason: string) {
    super(`Cannot route to ${target}: ${reason}`, 'ROUTING_FAILED');
    this.name = 'RoutingError';
    this.target = target;
  }
}

export class ArbitrationTimeoutError extends RelayError {
  readonly correlationId: string;
  readonly timeoutMs: number;

  constructor(correlationId: string, timeoutMs: number) {
    super(`No valid reply for ${correlationId} within ${timeoutMs}ms`, 'ARBITRATION_TIMEOUT');
    this.name = 'ArbitrationTimeoutError';
    this.correlationId = correlationId;
    this.timeoutMs = timeoutMs;
  }
}

export class PersistenceError extends RelayError {
  readonly target: string;

  constructor(target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Durable write failed for ${target}: ${reason}`, 'PERSISTENCE_FAILED', { cause });
    this.name = 'PersistenceError';
    this.target = target;
  }
}

/** Another live process holds the queue log open for writing */
export class QueueLockedError extends RelayError {
  readonly path: string;
  readonly pid: number;

  constructor(path: string, pid: number) {
    super(`Queue log ${path} is in use by process ${pid}`, 'QUEUE_LOCKED');
    this.name = 'QueueLockedError';
    this.path = path;
    this.pid = pid;
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
