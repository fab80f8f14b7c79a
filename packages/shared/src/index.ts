/**
 * @exakit/shared
 * Envelope decoding, record schemas and error types for the exaroton API.
 * Pure transformations only: nothing in this package performs I/O.
 */

export {
  ClientError,
  RemoteOperationError,
  ShapeMismatchError,
  ValidationError,
  TransportError,
  isClientError,
  type ClientErrorCode,
  type TransportErrorCode,
  type Violation,
} from './errors.js';

export {
  decodeEnvelope,
  classifyPayload,
  describeValue,
  type Envelope,
  type Payload,
  type PayloadByShape,
  type PayloadShape,
} from './envelope.js';

export { parseRecord, parseRecords, nullable, deepFreeze, toViolations, type DeepReadonly } from './validation.js';

export * from './models/index.js';
