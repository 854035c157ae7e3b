/**
 * @decision-relay/daemon
 *
 * Relay server: client registration, routing, durable queueing and
 * decision arbitration between downstream clients and one upstream backend.
 */

// Core server
export * from './server.js';
export * from './router.js';
export * from './connection.js';
export * from './registry.js';
export * from './auth.js';

// Delivery
export * from './durable-queue.js';
export * from './decision-multiplexer.js';
export * from './action-registry.js';

// Upstream
export * from './upstream-link.js';
export * from './upstream-endpoint.js';
export * from './upstream-client.js';
