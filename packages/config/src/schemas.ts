import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const withId = <T extends object>(schema: T, id: string): T & { $id: string } => ({ ...schema, $id: id });

// Client-facing WebSocket endpoint (integrations and watchers)
export const ConnectionConfigSchema = z.object({
  maxFrameBytes: z.number().int().positive(),
  heartbeatMs: z.number().int().positive(),
});

export const ReconnectConfigSchema = z.object({
  initialDelayMs: z.number().int().positive(),
  maxDelayMs: z.number().int().positive(),
  multiplier: z.number().min(1),
  jitter: z.number().min(0).max(1),
});

/**
 * listen: the backend dials in to host:port.
 * connect: the relay dials out to url (or ws://host:port).
 */
export const UpstreamConfigSchema = z.object({
  mode: z.enum(['listen', 'connect']),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  url: z.string().url().optional(),
  reconnect: ReconnectConfigSchema,
});

export const QueueConfigSchema = z.object({
  /** memory keeps nothing across restarts; for tests and throwaway runs */
  driver: z.enum(['jsonl', 'memory']),
  path: z.string().min(1),
  retryIntervalMs: z.number().int().positive(),
  maxAgeMs: z.number().int().positive(),
  maxAttempts: z.number().int().positive(),
  /** Dead log records tolerated before the log is rewritten */
  compactThreshold: z.number().int().positive(),
});

export const FallbackPolicySchema = z.enum(['no_action', 'first_action']);

export const MultiplexerConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  fallback: FallbackPolicySchema,
  diagnosticsTtlMs: z.number().int().nonnegative(),
});

export const RelayConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  authToken: z.string().min(1, 'authToken is required'),
  connection: ConnectionConfigSchema,
  upstream: UpstreamConfigSchema,
  queue: QueueConfigSchema,
  multiplexer: MultiplexerConfigSchema,
});

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type ReconnectConfig = z.infer<typeof ReconnectConfigSchema>;
export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;
export type QueueConfig = z.infer<typeof QueueConfigSchema>;
export type FallbackPolicyName = z.infer<typeof FallbackPolicySchema>;
export type MultiplexerConfig = z.infer<typeof MultiplexerConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export const jsonSchemas = {
  relay: withId(zodToJsonSchema(RelayConfigSchema, { target: 'jsonSchema7' }), 'DecisionRelayConfig'),
  connection: withId(zodToJsonSchema(ConnectionConfigSchema, { target: 'jsonSchema7' }), 'DecisionRelayConnectionConfig'),
  upstream: withId(zodToJsonSchema(UpstreamConfigSchema, { target: 'jsonSchema7' }), 'DecisionRelayUpstreamConfig'),
  queue: withId(zodToJsonSchema(QueueConfigSchema, { target: 'jsonSchema7' }), 'DecisionRelayQueueConfig'),
  multiplexer: withId(zodToJsonSchema(MultiplexerConfigSchema, { target: 'jsonSchema7' }), 'DecisionRelayMultiplexerConfig'),
};
