/**
 * Core type definitions for the reconnecting socket.
 */

import type { BackoffPolicy } from './backoff.ts';
import type { DecodeError } from './errors.ts';
import type { ConnectionState } from './state.ts';
import type { Transport } from './transports/Transport.ts';

/**
 * One WebSocket message: text frames are strings, binary frames bytes.
 */
export type Frame = string | Uint8Array;

/**
 * Converts outbound items to frames and inbound frames to items.
 *
 * Both directions throw on failure. The socket reports the failure for that
 * item only; the connection is not affected.
 */
export interface Codec<I, O> {
  encode(item: I): Frame;
  decode(frame: Frame): O;
}

/**
 * Backoff schedule parameters.
 */
export interface BackoffConfig {
  /** Delay before the first reconnect attempt. Must be > 0. */
  minDelayMs: number;
  /** Upper bound for any delay. */
  maxDelayMs: number;
  /** Reconnect attempts allowed in a row before giving up. `Infinity` for no limit. */
  maxRetries: number;
  /** Fraction (0-1) of each delay added as random jitter. */
  jitter: number;
}

/**
 * Why a connection ended.
 * - `closed`: the transport reported a close, before or after opening.
 * - `open-failed`: `Transport.open` threw while reconnecting.
 */
export type DropCause =
  | {
      kind: 'closed';
      code: number;
      reason: string;
      wasClean: boolean;
      /** Whether the connection reached `open` before closing. */
      opened: boolean;
      /** Last transport error seen on the connection, if any. */
      error?: Error;
    }
  | { kind: 'open-failed'; error: Error };

/**
 * Decides whether a drop ends the socket instead of triggering a reconnect.
 */
export type FatalPredicate = (cause: DropCause) => boolean;

/**
 * Fully resolved socket configuration. Frozen once the socket opens.
 */
export interface SocketConfig<I, O> {
  readonly url: string;
  readonly backoff: Readonly<BackoffConfig>;
  /**
   * How long a reconnected socket has to stay open before the attempt counter
   * resets. 0 resets as soon as it opens.
   */
  readonly stableTimeoutMs: number;
  readonly codec: Codec<I, O>;
  readonly transport: Transport;
  readonly backoffPolicy: BackoffPolicy;
  readonly fatalCloseCodes: readonly number[];
  /** Overrides the default classification built from `fatalCloseCodes`. */
  readonly isFatal?: FatalPredicate;
  /** Force diagnostic logging on or off. Unset follows the `DEBUG` env var. */
  readonly logging?: boolean;
}

/**
 * A decoded message or a frame the codec rejected.
 */
export type MessageEvent<O> =
  | { type: 'message'; data: O }
  | { type: 'decode-error'; error: DecodeError };

/**
 * A connection state transition.
 */
export interface StateEvent {
  type: 'state';
  state: ConnectionState;
}

/**
 * Everything the socket can produce.
 */
export type SocketEvent<O> = MessageEvent<O> | StateEvent;

/**
 * Picks which events reach the consumer. Returning `undefined` drops one.
 */
export type EventSelector<O, E> = (event: SocketEvent<O>) => E | undefined;
