/**
 * Structured error classes for the reconnecting socket.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  INVALID_CONFIG: 'INVALID_CONFIG',
  INVALID_URL: 'INVALID_URL',
  BLOCKED_PORT: 'BLOCKED_PORT',
  CONNECTION_DROPPED: 'CONNECTION_DROPPED',
  BACKOFF_EXHAUSTED: 'BACKOFF_EXHAUSTED',
  ENCODE_FAILED: 'ENCODE_FAILED',
  DECODE_FAILED: 'DECODE_FAILED',
  NOT_CONNECTED: 'NOT_CONNECTED',
  TRANSPORT_SEND_FAILED: 'TRANSPORT_SEND_FAILED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
export abstract class SocketError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Errors that can never be fixed by retrying. Thrown synchronously from the
 * first open and end the socket when a reconnect hits one.
 */
export abstract class FatalError extends SocketError {}

/**
 * Thrown when the builder configuration is out of range.
 */
export class InvalidConfigError extends FatalError {
  readonly code = 'INVALID_CONFIG' as const;

  constructor(message: string) {
    super(`Invalid config: ${message}`);
  }
}

/**
 * Thrown when the target URL cannot be used for a WebSocket connection.
 */
export class InvalidUrlError extends FatalError {
  readonly code = 'INVALID_URL' as const;
  readonly url: string;

  constructor(url: string, detail: string, cause?: unknown) {
    super(`Invalid WebSocket URL "${url}": ${detail}`, cause);
    this.url = url;
  }
}

/**
 * Thrown when the target URL points at a port the transport refuses to dial.
 */
export class BlockedPortError extends FatalError {
  readonly code = 'BLOCKED_PORT' as const;
  readonly port: number;

  constructor(port: number) {
    super(`Port ${port} is blocked`);
    this.port = port;
  }
}

/**
 * A connection ended without the caller asking for it.
 */
export class ConnectionDroppedError extends SocketError {
  readonly code = 'CONNECTION_DROPPED' as const;
  readonly closeCode: number;
  readonly reason: string;
  readonly wasClean: boolean;

  constructor(closeCode: number, reason: string, wasClean: boolean, cause?: unknown) {
    super(`Connection dropped (code: ${closeCode}${reason ? `, reason: ${reason}` : ''})`, cause);
    this.closeCode = closeCode;
    this.reason = reason;
    this.wasClean = wasClean;
  }
}

/**
 * The backoff policy refused another reconnect attempt.
 */
export class BackoffExhaustedError extends SocketError {
  readonly code = 'BACKOFF_EXHAUSTED' as const;
  readonly retries: number;

  constructor(retries: number, cause?: unknown) {
    super(`Gave up after ${retries} reconnect attempts`, cause);
    this.retries = retries;
  }
}

/**
 * The codec could not turn an outbound item into a frame.
 */
export class EncodeError extends SocketError {
  readonly code = 'ENCODE_FAILED' as const;

  constructor(cause: unknown) {
    super(`Failed to encode outbound item: ${describe(cause)}`, cause);
  }
}

/**
 * The codec could not turn an inbound frame into an item.
 */
export class DecodeError extends SocketError {
  readonly code = 'DECODE_FAILED' as const;
  readonly frame: string | Uint8Array;

  constructor(frame: string | Uint8Array, cause: unknown) {
    super(`Failed to decode inbound frame: ${describe(cause)}`, cause);
    this.frame = frame;
  }
}

/**
 * Thrown by `send` while the socket is not open. Retry once it is.
 */
export class NotConnectedError extends SocketError {
  readonly code = 'NOT_CONNECTED' as const;

  constructor(message = 'Socket is not connected') {
    super(message);
  }
}

/**
 * The transport refused a frame.
 */
export class TransportSendError extends SocketError {
  readonly code = 'TRANSPORT_SEND_FAILED' as const;

  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}

/**
 * Union of the errors `send` can throw.
 */
export type SendError = NotConnectedError | EncodeError | TransportSendError;

/**
 * Normalize anything thrown into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
