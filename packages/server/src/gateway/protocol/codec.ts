// packages/server/src/gateway/protocol/codec.ts
import type { DecodeFailure, DecodeResult, Message } from '@blockbridge/types';
import { MESSAGE_TYPES } from '@blockbridge/types';
import { MessageSchema } from './schema.js';

const MESSAGE_TYPE_SET: ReadonlySet<string> = new Set(MESSAGE_TYPES);

/** Envelope keys in wire order */
const ENVELOPE_KEYS = ['type', 'serverId', 'correlationId', 'timestamp', 'payload'] as const;

/**
 * Encode one message as a single JSON text frame.
 *
 * Output is canonical: envelope keys in fixed order, payload keys sorted at every depth,
 * undefined members omitted. Equal messages always encode to equal strings.
 */
export function encode(message: Message): string {
  const ordered: Record<string, unknown> = {};
  for (const key of ENVELOPE_KEYS) {
    const value = message[key];
    if (value !== undefined) {
      ordered[key] = key === 'payload' ? canonicalize(value) : value;
    }
  }
  return JSON.stringify(ordered);
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = canonicalize(member);
      }
    }
    return sorted;
  }
  return value;
}

/** Decode one frame; failures are values, never thrown */
export function decode(frame: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(frame);
  } catch {
    return failure('invalid_json', 'Frame is not valid JSON');
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return failure('not_an_object', 'Frame is not a JSON object');
  }

  const type: unknown = Reflect.get(raw, 'type');
  if (typeof type !== 'string') {
    return failure('not_an_object', 'Frame has no string "type" field');
  }
  if (!MESSAGE_TYPE_SET.has(type)) {
    return failure('unknown_type', `Unknown message type: ${type}`, type);
  }

  const parsed = MessageSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'message';
    return failure('invalid_message', `Invalid ${type}: ${where}: ${issue?.message ?? 'invalid'}`, type);
  }

  return { ok: true, message: parsed.data };
}

function failure(reason: DecodeFailure, message: string, type?: string): DecodeResult {
  return { ok: false, error: { code: 'MALFORMED_MESSAGE', reason, message, type } };
}

export function isMessageType(value: string): value is Message['type'] {
  return MESSAGE_TYPE_SET.has(value);
}
