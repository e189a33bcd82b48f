/**
 * Generic client-side transport interface.
 *
 * A transport dials one physical connection per `open` call. Reconnecting is
 * the socket's job; a connection that closes is never reused.
 */

import type { Frame } from '../types.ts';

/**
 * Close notification for a single connection.
 */
export interface TransportCloseEvent {
  code: number;
  reason: string;
  wasClean: boolean;
}

/**
 * One physical connection.
 */
export interface TransportConnection {
  /**
   * Whether frames can be sent right now.
   */
  readonly open: boolean;

  /**
   * Send a frame. Throws `TransportSendError` if the connection refuses it.
   */
  send(frame: Frame): void;

  /**
   * Start the closing handshake. Calling it again is a no-op.
   */
  close(code?: number, reason?: string): void;

  /**
   * Register lifecycle callbacks.
   *
   * `onClose` fires exactly once, including when the connection fails before
   * opening. `onError` may fire before it.
   */
  onOpen(cb: () => void): void;
  onMessage(cb: (frame: Frame) => void): void;
  onError(cb: (err: Error) => void): void;
  onClose(cb: (event: TransportCloseEvent) => void): void;
}

export interface Transport {
  /**
   * Start connecting to `url`. Throws a `FatalError` synchronously when the
   * URL can never work; every other failure is reported through `onClose`.
   */
  open(url: string): TransportConnection;
}
