/**
 * Error kinds raised between the wire and the caller.
 *
 * RemoteOperationError, ShapeMismatchError and ValidationError come from the
 * decoding core and are never conflated; TransportError belongs to the HTTP
 * layer and is raised before any envelope is inspected.
 */

export type ClientErrorCode =
  | 'REMOTE_OPERATION_FAILED'
  | 'SHAPE_MISMATCH'
  | 'VALIDATION_ERROR'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'INVALID_BODY';

export type TransportErrorCode = Extract<
  ClientErrorCode,
  'HTTP_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT' | 'INVALID_BODY'
>;

export class ClientError extends Error {
  constructor(
    public readonly code: ClientErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

/** The service answered `success: false`. */
export class RemoteOperationError extends ClientError {
  constructor(public readonly remoteMessage: string) {
    super('REMOTE_OPERATION_FAILED', remoteMessage);
    this.name = 'RemoteOperationError';
  }
}

/**
 * The service reported success but the payload is not of the structural
 * category the operation expects (or the body is not an envelope at all).
 */
export class ShapeMismatchError extends ClientError {
  constructor(
    public readonly expected: readonly string[],
    public readonly actual: string,
  ) {
    super(
      'SHAPE_MISMATCH',
      `Expected payload of shape ${expected.join(' | ')}, received ${actual}`,
      { expected: [...expected], actual },
    );
    this.name = 'ShapeMismatchError';
  }
}

export interface Violation {
  readonly path: string;
  readonly code: string;
  readonly message: string;
}

export class ValidationError extends ClientError {
  constructor(
    public readonly record: string,
    public readonly violations: readonly Violation[],
  ) {
    const fields = violations.map((v) => v.path || '(root)').join(', ');
    super('VALIDATION_ERROR', `Invalid ${record}: ${fields}`, { record, violations: [...violations] });
    this.name = 'ValidationError';
  }

  /** Dotted paths of every violating field, in report order. */
  get fields(): string[] {
    return this.violations.map((v) => v.path);
  }
}

export class TransportError extends ClientError {
  constructor(
    code: TransportErrorCode,
    message: string,
    public readonly status?: number,
  ) {
    super(code, message, status !== undefined ? { status } : undefined);
    this.name = 'TransportError';
  }

  static http(status: number, method: string, path: string): TransportError {
    return new TransportError('HTTP_ERROR', `${method} ${path} failed with HTTP ${status}`, status);
  }

  static timeout(method: string, path: string, timeoutMs: number): TransportError {
    return new TransportError('TIMEOUT', `${method} ${path} timed out after ${timeoutMs}ms`);
  }

  static network(method: string, path: string, cause: unknown): TransportError {
    const reason = cause instanceof Error ? cause.message : 'Unknown error';
    return new TransportError('NETWORK_ERROR', `Failed to reach ${method} ${path}: ${reason}`);
  }

  static invalidBody(method: string, path: string, status: number): TransportError {
    return new TransportError('INVALID_BODY', `${method} ${path} returned a body that is not JSON`, status);
  }
}

export function isClientError(err: unknown): err is ClientError {
  return err instanceof ClientError;
}
