/**
 * Client transport using the `ws` package.
 *
 * Each `open` creates a fresh `WebSocket`. Reconnect scheduling lives in the
 * socket, so this transport only deals with raw frames of one connection.
 */

import { WebSocket } from 'ws';
import type { ClientOptions, RawData } from 'ws';
import createDebug from 'debug';
import { BlockedPortError, InvalidUrlError, TransportSendError, toError } from '../errors.ts';
import type { Frame } from '../types.ts';
import type { Transport, TransportCloseEvent, TransportConnection } from './Transport.ts';

const debug = createDebug('reconnecting-ws:ws-transport');

const ALLOWED_PROTOCOLS = new Set(['ws:', 'wss:', 'http:', 'https:']);

/** Close code `ws` reports when the connection ended without a close frame. */
const ABNORMAL_CLOSURE = 1006;

export interface WsTransportOptions {
  /** Subprotocols offered during the handshake. */
  protocols?: string | string[];
  /** Milliseconds allowed for the opening handshake. */
  handshakeTimeout?: number;
  /** Extra headers sent with the upgrade request. */
  headers?: Record<string, string>;
  /** Ports that are never dialled. Opening one throws `BlockedPortError`. */
  blockedPorts?: readonly number[];
}

/**
 * Check that `url` can be dialled, throwing the matching `FatalError` if not.
 */
export function parseSocketUrl(url: string, blockedPorts: readonly number[] = []): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    throw new InvalidUrlError(url, 'not an absolute URL', err);
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(url, `unsupported protocol "${parsed.protocol}"`);
  }
  if (parsed.hash) {
    throw new InvalidUrlError(url, 'fragments are not allowed');
  }

  const port = parsed.port
    ? parseInt(parsed.port, 10)
    : parsed.protocol === 'wss:' || parsed.protocol === 'https:'
      ? 443
      : 80;
  if (blockedPorts.includes(port)) {
    throw new BlockedPortError(port);
  }

  return parsed;
}

function toFrame(data: RawData, isBinary: boolean): Frame {
  if (!isBinary) return data.toString();
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

export class WsTransport implements Transport {
  private _options: WsTransportOptions;

  constructor(options: WsTransportOptions = {}) {
    this._options = options;
  }

  open(url: string): TransportConnection {
    const target = parseSocketUrl(url, this._options.blockedPorts);

    const clientOptions: ClientOptions = {};
    if (this._options.handshakeTimeout !== undefined) {
      clientOptions.handshakeTimeout = this._options.handshakeTimeout;
    }
    if (this._options.headers) {
      clientOptions.headers = this._options.headers;
    }

    debug('Connecting to %s', target.href);
    let ws: WebSocket;
    try {
      ws = new WebSocket(target, this._options.protocols, clientOptions);
    } catch (err) {
      throw new InvalidUrlError(url, toError(err).message, err);
    }
    return new WsConnection(ws, target.href);
  }
}

class WsConnection implements TransportConnection {
  private _ws: WebSocket;
  private _url: string;
  private _closeRequested = false;

  constructor(ws: WebSocket, url: string) {
    this._ws = ws;
    this._url = url;

    this._ws.on('open', () => debug('Connected to %s', this._url));
    this._ws.on('close', (code) => debug('Disconnected from %s (code: %d)', this._url, code));
    this._ws.on('error', (err) => debug('WebSocket error on %s: %o', this._url, err));
  }

  get open(): boolean {
    return this._ws.readyState === WebSocket.OPEN;
  }

  onOpen(cb: () => void): void {
    this._ws.on('open', cb);
  }

  onMessage(cb: (frame: Frame) => void): void {
    this._ws.on('message', (data: RawData, isBinary: boolean) => cb(toFrame(data, isBinary)));
  }

  onError(cb: (err: Error) => void): void {
    this._ws.on('error', (err) => cb(toError(err)));
  }

  onClose(cb: (event: TransportCloseEvent) => void): void {
    this._ws.on('close', (code: number, reason: Buffer) => {
      cb({ code, reason: reason.toString(), wasClean: code !== ABNORMAL_CLOSURE });
    });
  }

  send(frame: Frame): void {
    if (this._ws.readyState !== WebSocket.OPEN) {
      throw new TransportSendError(`Cannot send on ${this._url}, socket is not open`);
    }
    this._ws.send(frame, (err) => {
      // Write failures also tear the socket down, which reports the drop.
      if (err) debug('Send failed on %s: %o', this._url, err);
    });
  }

  close(code?: number, reason?: string): void {
    if (this._closeRequested) return;

    if (this._ws.readyState === WebSocket.CLOSED) {
      this._closeRequested = true;
      return;
    }
    if (this._ws.readyState === WebSocket.CONNECTING) {
      // No close frame can be sent before the handshake completes.
      this._ws.terminate();
      this._closeRequested = true;
      return;
    }

    try {
      this._ws.close(code, reason);
    } catch (err) {
      // Rejected close code or a reason over 123 bytes: drop the socket instead.
      debug('Close frame rejected on %s, terminating: %s', this._url, toError(err).message);
      this._ws.terminate();
    }
    this._closeRequested = true;
  }
}
