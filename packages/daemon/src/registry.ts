/**
 * Connection registry: (role, name) -> authenticated connection.
 *
 * At most one live connection per (role, name). A newer registration with a
 * colliding name supersedes the existing entry, whose socket is closed.
 */

import {
  CLIENT_ROLES,
  ERRORS,
  validateRegistration,
  type ClientRole,
} from '@decision-relay/protocol';
import { connectionLog as log } from '@decision-relay/utils/logger';
import type { SharedSecretAuthenticator } from './auth.js';
import type { ClientConnection } from './connection.js';

export type RegistrationRejection = 'invalid_token' | 'malformed';

export type RegistrationResult =
  | { status: 'accepted'; role: ClientRole; name: string; superseded?: ClientConnection }
  | { status: 'rejected'; reason: RegistrationRejection; error: string };

export class ConnectionRegistry {
  private authenticator: SharedSecretAuthenticator;
  private entries: Record<ClientRole, Map<string, ClientConnection>> = {
    integration: new Map(),
    watcher: new Map(),
  };

  constructor(options: { authenticator: SharedSecretAuthenticator }) {
    this.authenticator = options.authenticator;
  }

  /**
   * Validate and admit a connection from its registration frame.
   * A rejected connection stays UNAUTHENTICATED and may try again.
   */
  register(connection: ClientConnection, frame: unknown): RegistrationResult {
    const parsed = validateRegistration(frame);
    if (!parsed.ok) {
      log.warn('Malformed registration', { id: connection.id, detail: parsed.detail });
      return { status: 'rejected', reason: 'malformed', error: ERRORS.MALFORMED_REGISTRATION };
    }

    const { type: role, name, auth_token } = parsed.value;
    if (!this.authenticator.verify(auth_token, connection.remoteAddress)) {
      return { status: 'rejected', reason: 'invalid_token', error: ERRORS.INVALID_TOKEN };
    }

    if (!connection.authenticate(role, name)) {
      log.warn('Registration on a connection that is not pending', { id: connection.id, state: connection.state });
      return { status: 'rejected', reason: 'malformed', error: ERRORS.MALFORMED_REGISTRATION };
    }

    const existing = this.entries[role].get(name);
    let superseded: ClientConnection | undefined;
    if (existing && existing !== connection) {
      existing.supersede();
      superseded = existing;
    }
    this.entries[role].set(name, connection);

    log.info(`${role} registered: ${name}`, { id: connection.id, superseded: superseded?.id });
    return { status: 'accepted', role, name, superseded };
  }

  lookup(role: ClientRole, name: string): ClientConnection | undefined {
    return this.entries[role].get(name);
  }

  /**
   * Remove an entry. With a connection given, only removes it if it is still
   * the current entry, so a superseded socket closing late leaves its
   * replacement in place.
   */
  deregister(name: string, role: ClientRole, connection?: ClientConnection): boolean {
    const current = this.entries[role].get(name);
    if (!current) return false;
    if (connection && current !== connection) return false;
    this.entries[role].delete(name);
    log.info(`${role} deregistered: ${name}`, { id: current.id });
    return true;
  }

  list(role: ClientRole): string[] {
    return Array.from(this.entries[role].keys());
  }

  count(role?: ClientRole): number {
    if (role) return this.entries[role].size;
    return CLIENT_ROLES.reduce((sum, r) => sum + this.entries[r].size, 0);
  }

  all(role?: ClientRole): ClientConnection[] {
    const roles = role ? [role] : CLIENT_ROLES;
    return roles.flatMap(r => Array.from(this.entries[r].values()));
  }

  touch(connection: ClientConnection, now: number = Date.now()): void {
    connection.touch(now);
  }

  clear(): void {
    for (const role of CLIENT_ROLES) {
      this.entries[role].clear();
    }
  }
}
