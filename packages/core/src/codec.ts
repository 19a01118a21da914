import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { DecodeError } from './errors';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export type EnvelopeSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DecodeError };

export function encodeEnvelope(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function safeDecodeEnvelope<T>(
  schema: EnvelopeSchema<T>,
  data: Uint8Array,
  label: string,
): DecodeResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(data));
  } catch (error) {
    return { ok: false, error: new DecodeError(label, 'payload is not valid JSON', { cause: error }) };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: new DecodeError(label, describeIssues(result.error), { cause: result.error }) };
  }

  return { ok: true, value: result.data };
}

/** `path: message` for every issue, joined with '; '. */
export function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function decodeEnvelope<T>(schema: EnvelopeSchema<T>, data: Uint8Array, label: string): T {
  const result = safeDecodeEnvelope(schema, data, label);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/** First `maxBytes` of a payload as text, for log lines about undecodable messages. */
export function previewPayload(data: Uint8Array, maxBytes = 100): string {
  const slice = data.subarray(0, maxBytes);
  const text = decoder.decode(slice);
  return data.length > maxBytes ? `${text}…` : text;
}
