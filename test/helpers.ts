/**
 * Test utilities: an in-process transport and timing helpers.
 */

import { WebSocketServer } from 'ws';
import { TransportSendError } from '../src/errors.ts';
import type { ReconnectingSocket } from '../src/ReconnectingSocket.ts';
import type { ConnectionState } from '../src/state.ts';
import type { Transport, TransportCloseEvent, TransportConnection } from '../src/transports/Transport.ts';
import type { Frame, SocketEvent } from '../src/types.ts';

/**
 * A connection driven by the test. Nothing happens until the test calls
 * `accept`, `receive`, `fail` or `drop`.
 */
export class FakeConnection implements TransportConnection {
  readonly url: string;
  readonly sent: Frame[] = [];
  /** Arguments of the first `close` call, if any. */
  closedWith: { code: number | undefined; reason: string | undefined } | null = null;

  private _open = false;
  private _finished = false;
  private _onOpen: (() => void)[] = [];
  private _onMessage: ((frame: Frame) => void)[] = [];
  private _onError: ((err: Error) => void)[] = [];
  private _onClose: ((event: TransportCloseEvent) => void)[] = [];

  constructor(url: string) {
    this.url = url;
  }

  get open(): boolean {
    return this._open;
  }

  onOpen(cb: () => void): void {
    this._onOpen.push(cb);
  }
  onMessage(cb: (frame: Frame) => void): void {
    this._onMessage.push(cb);
  }
  onError(cb: (err: Error) => void): void {
    this._onError.push(cb);
  }
  onClose(cb: (event: TransportCloseEvent) => void): void {
    this._onClose.push(cb);
  }

  send(frame: Frame): void {
    if (!this._open) {
      throw new TransportSendError('fake connection is not open');
    }
    this.sent.push(frame);
  }

  close(code?: number, reason?: string): void {
    if (this.closedWith) return;
    this.closedWith = { code, reason };
    this._open = false;
    this._finished = true;
  }

  /** Complete the handshake. */
  accept(): void {
    if (this._finished) return;
    this._open = true;
    for (const cb of this._onOpen) cb();
  }

  /** Deliver a frame from the peer. */
  receive(frame: Frame): void {
    for (const cb of this._onMessage) cb(frame);
  }

  /** Report a transport error followed by an abnormal close. */
  fail(err: Error): void {
    for (const cb of this._onError) cb(err);
    this.drop(1006);
  }

  /** Close from the peer side. */
  drop(code = 1006, reason = ''): void {
    if (this._finished) return;
    this._open = false;
    this._finished = true;
    for (const cb of this._onClose) cb({ code, reason, wasClean: code !== 1006 });
  }
}

/**
 * What a `FakeTransport` does with each new connection.
 * - `manual`: nothing, the test drives it
 * - `accept`: opens on the next microtask
 * - `refuse`: closes with 1006 on the next microtask
 */
export type FakeBehavior = 'manual' | 'accept' | 'refuse';

export class FakeTransport implements Transport {
  readonly connections: FakeConnection[] = [];
  behavior: FakeBehavior;
  /** Thrown from the next `open` calls while set. */
  openError: Error | null = null;

  constructor(behavior: FakeBehavior = 'manual') {
    this.behavior = behavior;
  }

  open(url: string): TransportConnection {
    if (this.openError) throw this.openError;

    const connection = new FakeConnection(url);
    this.connections.push(connection);

    if (this.behavior === 'accept') {
      queueMicrotask(() => connection.accept());
    } else if (this.behavior === 'refuse') {
      queueMicrotask(() => connection.drop(1006));
    }
    return connection;
  }

  /** The most recent connection. */
  get last(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error('No connection opened yet');
    return connection;
  }
}

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 2000,
  pollInterval = 2
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * Consume a socket in the background, recording every event.
 *
 * `done` resolves once the event sequence ends.
 */
export function record<I, O>(socket: ReconnectingSocket<I, O, SocketEvent<O>>) {
  const events: SocketEvent<O>[] = [];
  const done = (async () => {
    for await (const event of socket) {
      events.push(event);
    }
  })();

  return {
    events,
    done,
    states: (): ConnectionState[] =>
      events.flatMap((event) => (event.type === 'state' ? [event.state] : [])),
    kinds: (): string[] =>
      events.flatMap((event) => (event.type === 'state' ? [event.state.kind] : [])),
    messages: (): O[] => events.flatMap((event) => (event.type === 'message' ? [event.data] : [])),
  };
}

/**
 * Current state kind, widened to `string` so assertions don't narrow it.
 */
export function stateOf(socket: { readonly state: ConnectionState }): string {
  return socket.state.kind;
}

/**
 * A local `ws` server that echoes every frame back with its original type.
 */
export interface EchoServer {
  readonly port: number;
  readonly url: string;
  /** Frames received so far, as text. */
  readonly received: string[];
  /** Client connections the server still holds. */
  readonly clientCount: number;
  /** Kill every client connection without a close frame. */
  dropClients(): void;
  close(): Promise<void>;
}

export async function startEchoServer(): Promise<EchoServer> {
  const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await new Promise<void>((resolve, reject) => {
    server.once('listening', resolve);
    server.once('error', reject);
  });

  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
  const port = address.port;
  const received: string[] = [];

  server.on('connection', (ws) => {
    ws.on('message', (data, isBinary) => {
      received.push(data.toString());
      ws.send(data, { binary: isBinary });
    });
  });

  const dropClients = () => {
    for (const client of server.clients) client.terminate();
  };

  return {
    port,
    url: `ws://127.0.0.1:${port}`,
    received,
    get clientCount() {
      return server.clients.size;
    },
    dropClients,
    close: () => {
      dropClients();
      return new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
    },
  };
}

/**
 * A loopback port with nothing listening on it.
 */
export async function unusedPort(): Promise<number> {
  const server = await startEchoServer();
  await server.close();
  return server.port;
}
