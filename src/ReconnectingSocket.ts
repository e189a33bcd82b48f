/**
 * ReconnectingSocket - one logical connection over many physical ones.
 *
 * Owns the reconnect state machine. The first connection is opened by the
 * builder; after that every drop is classified, the backoff policy decides the
 * delay, and a new connection replaces the old one. Inbound events go through
 * the multiplexer, outbound items through the gateway.
 */

import type { Debugger } from 'debug';
import {
  BackoffExhaustedError,
  ConnectionDroppedError,
  DecodeError,
  FatalError,
  toError,
} from './errors.ts';
import { NORMAL_CLOSURE } from './constants.ts';
import { OutboundGateway, SocketSender } from './gateway/OutboundGateway.ts';
import { createLogger } from './logger.ts';
import { EventMultiplexer } from './mux/EventMultiplexer.ts';
import { ConnectionState, formatState, isTerminal } from './state.ts';
import type { TransportCloseEvent, TransportConnection } from './transports/Transport.ts';
import type { DropCause, EventSelector, Frame, SocketConfig } from './types.ts';

/**
 * Default drop classification: a reopen that hit a `FatalError`, or a close
 * code listed in `fatalCloseCodes`.
 */
export function defaultIsFatal(fatalCloseCodes: readonly number[]): (cause: DropCause) => boolean {
  return (cause) => {
    if (cause.kind === 'open-failed') return cause.error instanceof FatalError;
    return fatalCloseCodes.includes(cause.code);
  };
}

export class ReconnectingSocket<I, O, E> implements AsyncIterable<E> {
  private _config: SocketConfig<I, O>;
  private _log: Debugger;
  private _isFatal: (cause: DropCause) => boolean;
  private _mux: EventMultiplexer<O, E>;
  private _gateway: OutboundGateway<I>;

  private _state: ConnectionState = ConnectionState.connecting();
  private _connection: TransportConnection | null = null;
  /** Bumped whenever a connection is replaced; stale callbacks compare against it. */
  private _generation = 0;
  private _attempt = 0;
  private _reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private _stableTimer: ReturnType<typeof setTimeout> | null = null;

  /**
   * Use `SocketBuilder` instead. Opens the first connection synchronously and
   * throws whatever `Transport.open` throws.
   */
  constructor(config: SocketConfig<I, O>, select: EventSelector<O, E>) {
    this._config = config;
    this._log = createLogger('socket', config.logging);
    this._isFatal = config.isFatal ?? defaultIsFatal(config.fatalCloseCodes);
    this._mux = new EventMultiplexer(select, createLogger('socket:mux', config.logging), () =>
      this.close('iteration stopped')
    );
    this._gateway = new OutboundGateway(
      config.codec,
      createLogger('socket:gateway', config.logging)
    );

    this._log('Opening reconnecting socket to %s', config.url);
    this._mux.pushState(this._state);
    this._attach(config.transport.open(config.url));
  }

  get url(): string {
    return this._config.url;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /**
   * Reconnect attempts since the last stable connection.
   */
  get attempt(): number {
    return this._attempt;
  }

  /**
   * Encode `item` and send it on the open connection.
   *
   * @throws NotConnectedError unless the state is `open`
   * @throws EncodeError if the codec rejects the item
   * @throws TransportSendError if the transport refuses the frame
   */
  send(item: I): void {
    this._gateway.send(item);
  }

  /**
   * Get a send-only handle for other producers.
   */
  sender(): SocketSender<I> {
    return this._gateway.sender();
  }

  /**
   * Wait for the next event. Resolves `done` once the socket is closed or
   * failed and every queued event has been consumed.
   */
  next(): Promise<IteratorResult<E, undefined>> {
    return this._mux.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<E, undefined> {
    return this._mux;
  }

  /**
   * Permanently close the socket. Cancels any pending reconnect and closes
   * the active connection. Calling it again is a no-op.
   */
  close(reason = 'closed by caller', code: number = NORMAL_CLOSURE): void {
    if (isTerminal(this._state)) return;

    this._log('Closing socket: %s', reason);
    this._clearTimers();
    this._gateway.detach();
    const connection = this._release();
    this._transition(ConnectionState.closed(reason));
    this._mux.end();
    connection?.close(code, reason);
  }

  /**
   * Close the active connection and go through the normal reconnect path, as
   * if it had dropped. Does nothing unless the socket is `connecting` or
   * `open`.
   */
  dropConnection(reason = 'connection dropped by caller'): void {
    if (this._state.kind !== 'connecting' && this._state.kind !== 'open') return;

    const connection = this._release();
    const opened = this._state.kind === 'open';
    this._gateway.detach();
    this._clearStableTimer();
    connection?.close(NORMAL_CLOSURE, reason);

    this._log('Dropping connection: %s', reason);
    this._scheduleReconnect(new ConnectionDroppedError(NORMAL_CLOSURE, reason, true), opened);
  }

  private _attach(connection: TransportConnection): void {
    const generation = ++this._generation;
    this._connection = connection;
    let opened = false;
    let lastError: Error | undefined;

    const current = (): boolean => generation === this._generation;

    connection.onOpen(() => {
      if (!current()) return;
      opened = true;
      this._handleOpen(connection);
    });

    connection.onMessage((frame) => {
      if (!current()) {
        this._log('discarding frame from replaced connection');
        return;
      }
      this._handleFrame(frame);
    });

    connection.onError((err) => {
      if (!current()) return;
      this._log('transport error: %o', err);
      lastError = err;
    });

    connection.onClose((event: TransportCloseEvent) => {
      if (!current()) return;
      this._release();
      this._handleDrop({ kind: 'closed', ...event, opened, error: lastError });
    });
  }

  /**
   * Forget the active connection so its callbacks are ignored from now on.
   */
  private _release(): TransportConnection | null {
    const connection = this._connection;
    this._connection = null;
    this._generation++;
    return connection;
  }

  private _handleOpen(connection: TransportConnection): void {
    this._gateway.attach(connection);

    if (this._attempt > 0 && this._config.stableTimeoutMs > 0) {
      this._stableTimer = setTimeout(() => {
        this._stableTimer = null;
        this._log('connection stable, resetting attempt counter');
        this._attempt = 0;
      }, this._config.stableTimeoutMs);
    } else {
      this._attempt = 0;
    }

    this._transition(ConnectionState.open());
  }

  private _handleFrame(frame: Frame): void {
    let data: O;
    try {
      data = this._config.codec.decode(frame);
    } catch (err) {
      const error = new DecodeError(frame, err);
      this._log('%s', error.message);
      this._mux.pushMessage({ type: 'decode-error', error });
      return;
    }
    this._mux.pushMessage({ type: 'message', data });
  }

  private _handleDrop(cause: DropCause): void {
    this._gateway.detach();
    this._clearStableTimer();

    const error =
      cause.kind === 'open-failed'
        ? cause.error
        : new ConnectionDroppedError(cause.code, cause.reason, cause.wasClean, cause.error);

    if (this._isFatal(cause)) {
      this._fail(error);
      return;
    }

    this._scheduleReconnect(error, cause.kind === 'closed' && cause.opened);
  }

  private _scheduleReconnect(lastError: Error, wasOpen: boolean): void {
    this._attempt++;
    const delayMs = this._config.backoffPolicy.next(this._attempt, this._config.backoff);

    if (delayMs === null) {
      this._log('retries exceeded (%d)', this._attempt - 1);
      this._fail(new BackoffExhaustedError(this._attempt - 1, lastError));
      return;
    }

    this._log(
      'Backoff retry: %d, delay: %dms (%s)',
      this._attempt,
      delayMs,
      wasOpen ? 'dropped' : 'connect failed'
    );
    this._transition(ConnectionState.reconnecting(this._attempt, delayMs));
    this._reconnectTimer = setTimeout(() => {
      this._reconnectTimer = null;
      this._reconnect();
    }, delayMs);
  }

  private _reconnect(): void {
    if (isTerminal(this._state)) return;

    this._log('Reconnecting (attempt %d)', this._attempt);
    this._transition(ConnectionState.connecting());

    let connection: TransportConnection;
    try {
      connection = this._config.transport.open(this._config.url);
    } catch (err) {
      const error = toError(err);
      this._log('open failed: %o', error);
      this._handleDrop({ kind: 'open-failed', error });
      return;
    }
    this._attach(connection);
  }

  private _fail(error: Error): void {
    this._clearTimers();
    this._gateway.detach();
    const connection = this._release();
    this._transition(ConnectionState.failed(error));
    this._mux.end();
    connection?.close();
  }

  private _transition(state: ConnectionState): void {
    this._log('state %s -> %s', formatState(this._state), formatState(state));
    this._state = state;
    this._mux.pushState(state);
  }

  private _clearStableTimer(): void {
    if (this._stableTimer) {
      clearTimeout(this._stableTimer);
      this._stableTimer = null;
    }
  }

  private _clearTimers(): void {
    this._clearStableTimer();
    if (this._reconnectTimer) {
      clearTimeout(this._reconnectTimer);
      this._reconnectTimer = null;
    }
  }
}
