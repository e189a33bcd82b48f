/**
 * Outbound path: encodes caller items and forwards them to whichever
 * connection is currently open.
 *
 * Nothing is buffered. Items sent while no connection is open are rejected
 * with `NotConnectedError` and never replayed on a later connection.
 */

import type { Debugger } from 'debug';
import { EncodeError, NotConnectedError, TransportSendError, toError } from '../errors.ts';
import type { TransportConnection } from '../transports/Transport.ts';
import type { Codec, Frame } from '../types.ts';

export class OutboundGateway<I> {
  private _codec: Codec<I, unknown>;
  private _log: Debugger;
  private _connection: TransportConnection | null = null;
  private _sent = 0;

  constructor(codec: Codec<I, unknown>, log: Debugger) {
    this._codec = codec;
    this._log = log;
  }

  /** Whether a connection is attached and open. */
  get ready(): boolean {
    return this._connection !== null && this._connection.open;
  }

  /** Frames handed to the transport so far, across all connections. */
  get sentCount(): number {
    return this._sent;
  }

  /**
   * Route sends to `connection` until the next `detach`.
   */
  attach(connection: TransportConnection): void {
    this._connection = connection;
  }

  detach(): void {
    this._connection = null;
  }

  /**
   * Encode `item` and send it on the current connection.
   *
   * @throws EncodeError if the codec rejects the item (the socket is untouched)
   * @throws NotConnectedError if no connection is open
   * @throws TransportSendError if the connection refuses the frame
   */
  send(item: I): void {
    let frame: Frame;
    try {
      frame = this._codec.encode(item);
    } catch (err) {
      const error = new EncodeError(err);
      this._log('encode failed: %s', error.message);
      throw error;
    }

    const connection = this._connection;
    if (!connection || !connection.open) {
      this._log('Cannot send, not connected');
      throw new NotConnectedError();
    }

    try {
      connection.send(frame);
    } catch (err) {
      if (err instanceof TransportSendError) throw err;
      throw new TransportSendError(toError(err).message, err);
    }
    this._sent++;
  }

  /**
   * A handle other producers can hold on to. It stays valid across
   * reconnects and always targets the current connection.
   */
  sender(): SocketSender<I> {
    return new SocketSender(this);
  }
}

/**
 * Send-only handle to a socket.
 */
export class SocketSender<I> {
  private _gateway: OutboundGateway<I>;

  constructor(gateway: OutboundGateway<I>) {
    this._gateway = gateway;
  }

  /** Whether a `send` right now would reach an open connection. */
  get ready(): boolean {
    return this._gateway.ready;
  }

  send(item: I): void {
    this._gateway.send(item);
  }
}
