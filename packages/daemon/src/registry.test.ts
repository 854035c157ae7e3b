import { describe, it, expect, beforeEach } from 'vitest';
import { SharedSecretAuthenticator } from './auth.js';
import { ClientConnection } from './connection.js';
import { ConnectionRegistry } from './registry.js';
import { FakeTransport, TEST_SECRET } from './__fixtures__/fakes.js';

function newConnection(): { connection: ClientConnection; transport: FakeTransport } {
  const transport = new FakeTransport();
  return { connection: new ClientConnection(transport), transport };
}

describe('ConnectionRegistry', () => {
  let registry: ConnectionRegistry;

  beforeEach(() => {
    registry = new ConnectionRegistry({ authenticator: new SharedSecretAuthenticator(TEST_SECRET) });
  });

  it('admits a valid registration', () => {
    const { connection } = newConnection();
    const result = registry.register(connection, { type: 'integration', name: 'spotify', auth_token: TEST_SECRET });

    expect(result).toEqual({ status: 'accepted', role: 'integration', name: 'spotify', superseded: undefined });
    expect(registry.lookup('integration', 'spotify')).toBe(connection);
    expect(registry.list('integration')).toEqual(['spotify']);
  });

  it('trims names', () => {
    const { connection } = newConnection();
    registry.register(connection, { type: 'watcher', name: '  console ', auth_token: TEST_SECRET });
    expect(registry.lookup('watcher', 'console')).toBe(connection);
  });

  it('rejects a wrong token and leaves the connection pending', () => {
    const { connection } = newConnection();
    const result = registry.register(connection, { type: 'integration', name: 'spotify', auth_token: 'wrong' });

    expect(result).toEqual({ status: 'rejected', reason: 'invalid_token', error: 'invalid auth token' });
    expect(connection.state).toBe('UNAUTHENTICATED');
    expect(registry.count()).toBe(0);
  });

  it('rejects malformed frames', () => {
    const { connection } = newConnection();
    expect(registry.register(connection, { type: 'admin', name: 'x', auth_token: TEST_SECRET })).toMatchObject({
      status: 'rejected',
      reason: 'malformed',
      error: 'malformed registration',
    });
    expect(registry.register(connection, { type: 'integration', name: '', auth_token: TEST_SECRET })).toMatchObject({
      reason: 'malformed',
    });
    expect(registry.register(connection, 'integration')).toMatchObject({ reason: 'malformed' });
  });

  it('keeps roles in separate namespaces', () => {
    const a = newConnection();
    const b = newConnection();
    registry.register(a.connection, { type: 'integration', name: 'shared', auth_token: TEST_SECRET });
    registry.register(b.connection, { type: 'watcher', name: 'shared', auth_token: TEST_SECRET });

    expect(registry.lookup('integration', 'shared')).toBe(a.connection);
    expect(registry.lookup('watcher', 'shared')).toBe(b.connection);
    expect(registry.count()).toBe(2);
    expect(registry.count('watcher')).toBe(1);
  });

  it('supersedes an older connection with the same name', () => {
    const first = newConnection();
    const second = newConnection();
    registry.register(first.connection, { type: 'integration', name: 'spotify', auth_token: TEST_SECRET });
    const result = registry.register(second.connection, { type: 'integration', name: 'spotify', auth_token: TEST_SECRET });

    expect(result).toMatchObject({ status: 'accepted', superseded: first.connection });
    expect(first.connection.state).toBe('STALE');
    expect(first.transport.closedWith?.code).toBe(4000);
    expect(registry.lookup('integration', 'spotify')).toBe(second.connection);
    expect(registry.all('integration')).toEqual([second.connection]);
  });

  it('does not let a superseded connection deregister its replacement', () => {
    const first = newConnection();
    const second = newConnection();
    registry.register(first.connection, { type: 'integration', name: 'spotify', auth_token: TEST_SECRET });
    registry.register(second.connection, { type: 'integration', name: 'spotify', auth_token: TEST_SECRET });

    expect(registry.deregister('spotify', 'integration', first.connection)).toBe(false);
    expect(registry.lookup('integration', 'spotify')).toBe(second.connection);

    expect(registry.deregister('spotify', 'integration', second.connection)).toBe(true);
    expect(registry.lookup('integration', 'spotify')).toBeUndefined();
  });
});
