/**
 * Authentication for downstream clients.
 *
 * A single shared secret, compared in constant time. Failed attempts are
 * counted per remote address and logged; nothing is locked out.
 */

import crypto from 'node:crypto';
import { connectionLog as log } from '@decision-relay/utils/logger';

/**
 * Constant-time token comparison. Both values are hashed first so that
 * timingSafeEqual always sees equal-length buffers and the length of the
 * secret is not observable.
 */
export function tokensMatch(presented: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(presented, 'utf8').digest();
  const b = crypto.createHash('sha256').update(expected, 'utf8').digest();
  return crypto.timingSafeEqual(a, b);
}

export interface AuthFailure {
  count: number;
  lastAt: number;
}

const UNKNOWN_ADDRESS = 'unknown';

/** Failure records for an address are forgotten after an hour without new failures */
export const FAILURE_RETENTION_MS = 60 * 60 * 1000;

export class SharedSecretAuthenticator {
  private readonly secret: string;
  private failures: Map<string, AuthFailure> = new Map();

  constructor(secret: string) {
    if (!secret) {
      throw new Error('Shared secret must not be empty');
    }
    this.secret = secret;
  }

  /**
   * Check a presented token. Records and logs the failure if it does not match.
   */
  verify(token: string, remoteAddress?: string): boolean {
    if (tokensMatch(token, this.secret)) {
      return true;
    }
    this.pruneFailures();
    const address = remoteAddress ?? UNKNOWN_ADDRESS;
    const failure = this.failures.get(address) ?? { count: 0, lastAt: 0 };
    failure.count++;
    failure.lastAt = Date.now();
    this.failures.set(address, failure);
    log.warn('Authentication failed', { remoteAddress: address, attempts: failure.count });
    return false;
  }

  failureCount(remoteAddress?: string): number {
    this.pruneFailures();
    return this.failures.get(remoteAddress ?? UNKNOWN_ADDRESS)?.count ?? 0;
  }

  /** Snapshot of failed attempts per address */
  failureReport(): Record<string, AuthFailure> {
    this.pruneFailures();
    return Object.fromEntries(Array.from(this.failures, ([address, f]) => [address, { ...f }]));
  }

  private pruneFailures(): void {
    const cutoff = Date.now() - FAILURE_RETENTION_MS;
    for (const [address, failure] of this.failures) {
      if (failure.lastAt < cutoff) this.failures.delete(address);
    }
  }
}
