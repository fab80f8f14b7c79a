/**
 * Response envelope decoding.
 *
 * Every JSON response from the API has the form
 * `{ success: boolean, error: string | null, data: object | list | string | null }`.
 * The decoder unwraps `data` when the service reports success, raises the
 * vendor message when it does not, and checks the payload against the
 * structural shape the calling operation expects. It never looks at HTTP
 * status codes; those have already been handled by the transport.
 */
import { z } from 'zod';
import { RemoteOperationError, ShapeMismatchError } from './errors.js';

export type PayloadShape = 'object' | 'list' | 'string' | 'none';

export interface PayloadByShape {
  object: Record<string, unknown>;
  list: unknown[];
  string: string;
  none: null;
}

export type Payload<S extends PayloadShape> = PayloadByShape[S];

export interface Envelope {
  success: boolean;
  error?: string | null;
  data?: unknown;
}

const envelopeSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  data: z.unknown(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural category of a decoded `data` value, or `undefined` for JSON
 * values that have none (numbers, booleans).
 */
export function classifyPayload(data: unknown): PayloadShape | undefined {
  if (data === null || data === undefined) return 'none';
  if (Array.isArray(data)) return 'list';
  if (typeof data === 'string') return 'string';
  if (isRecord(data)) return 'object';
  return undefined;
}

function matchesShape<S extends PayloadShape>(
  data: unknown,
  accepted: readonly S[],
): data is Payload<S> {
  const shape = classifyPayload(data);
  return shape !== undefined && accepted.some((s) => s === shape);
}

/**
 * Unwraps a parsed response body.
 *
 * @param accepted - one or more shapes the operation can receive; opaque
 *   acknowledgements pass `'string', 'none'`
 * @returns the body's `data` value itself (not a copy); absent `data` is `null`
 * @throws RemoteOperationError when `success` is false
 * @throws ShapeMismatchError when the body is not an envelope or the payload
 *   has a shape the operation does not accept
 */
export function decodeEnvelope<S extends PayloadShape>(
  body: unknown,
  ...accepted: [S, ...S[]]
): Payload<S> {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new ShapeMismatchError(['envelope'], describeValue(body));
  }

  const envelope = parsed.data;
  if (!envelope.success) {
    // success:false without a message breaks the wire contract
    if (envelope.error === null || envelope.error === undefined) {
      throw new ShapeMismatchError(['envelope'], 'failure without error message');
    }
    throw new RemoteOperationError(envelope.error);
  }

  const data = envelope.data === undefined ? null : envelope.data;
  if (!matchesShape(data, accepted)) {
    throw new ShapeMismatchError(accepted, describeValue(data));
  }
  return data;
}

/** Shape name for error messages; non-shapes are reported by their JSON type. */
export function describeValue(value: unknown): string {
  const shape = classifyPayload(value);
  if (shape !== undefined) return shape;
  return typeof value;
}
