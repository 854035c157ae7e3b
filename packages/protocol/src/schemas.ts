import { z } from 'zod';
import type {
  ActionResultPayload,
  Envelope,
  ExecuteActionPayload,
  RegisterActionsPayload,
  RegistrationFrame,
} from './types.js';

export const ClientRoleSchema = z.enum(['integration', 'watcher']);

export const RegistrationFrameSchema = z.object({
  type: ClientRoleSchema,
  name: z.string().trim().min(1).max(128),
  auth_token: z.string(),
});

export const EnvelopeSchema = z.object({
  event: z.string().min(1),
  payload: z.unknown(),
  correlation_id: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  from: z.string().optional(),
});

export const ActionDescriptorSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    schema: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ActionResultPayloadSchema = z
  .object({
    status: z.enum(['ok', 'error', 'no_action']),
    action: z.string().optional(),
    data: z.unknown().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export const RegisterActionsPayloadSchema = z.object({
  actions: z.array(ActionDescriptorSchema),
});

export const ExecuteActionPayloadSchema = z.object({
  action: z.string().min(1),
  data: z.unknown().optional(),
});

/**
 * Result of decoding a raw text frame.
 * Decoding never throws: malformed input is reported, not raised.
 */
export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'not_json' | 'invalid'; detail: string };

function decodeJson(raw: string): { ok: true; value: unknown } | { ok: false; detail: string } {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, detail: err instanceof Error ? err.message : String(err) };
  }
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, raw: string): DecodeResult<z.output<S>> {
  const json = decodeJson(raw);
  if (!json.ok) {
    return { ok: false, reason: 'not_json', detail: json.detail };
  }
  return validateWith(schema, json.value);
}

function validateWith<S extends z.ZodTypeAny>(schema: S, value: unknown): DecodeResult<z.output<S>> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: 'invalid', detail: parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ') };
  }
  return { ok: true, value: parsed.data };
}

export function decodeRegistration(raw: string): DecodeResult<RegistrationFrame> {
  return decodeWith(RegistrationFrameSchema, raw);
}

export function validateRegistration(value: unknown): DecodeResult<RegistrationFrame> {
  return validateWith(RegistrationFrameSchema, value);
}

export function decodeEnvelope(raw: string): DecodeResult<Envelope> {
  const json = decodeJson(raw);
  if (!json.ok) {
    return { ok: false, reason: 'not_json', detail: json.detail };
  }
  return validateEnvelope(json.value);
}

export function validateEnvelope(value: unknown): DecodeResult<Envelope> {
  const validated = validateWith(EnvelopeSchema, value);
  if (!validated.ok) return validated;
  // z.unknown() infers an optional key; the wire contract always has one
  const { event, payload, correlation_id, target, from } = validated.value;
  const envelope: Envelope = { event, payload };
  if (correlation_id !== undefined) envelope.correlation_id = correlation_id;
  if (target !== undefined) envelope.target = target;
  if (from !== undefined) envelope.from = from;
  return { ok: true, value: envelope };
}

export function validateActionResult(payload: unknown): DecodeResult<ActionResultPayload> {
  return validateWith(ActionResultPayloadSchema, payload);
}

export function validateRegisterActions(payload: unknown): DecodeResult<RegisterActionsPayload> {
  return validateWith(RegisterActionsPayloadSchema, payload);
}

export function validateExecuteAction(payload: unknown): DecodeResult<ExecuteActionPayload> {
  return validateWith(ExecuteActionPayloadSchema, payload);
}

/**
 * Registration frames are recognised by shape, not by event name:
 * they carry `type` and no `event`.
 */
export function looksLikeRegistration(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'type' in value && !('event' in value);
}
