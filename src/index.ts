/**
 * reconnecting-ws: a WebSocket client that survives drops.
 *
 * ## Public API
 * - `SocketBuilder` configures and opens a `ReconnectingSocket`
 * - `ReconnectingSocket` is both a sender (`send`, `sender()`) and an async
 *   iterable of inbound events that ends once the socket is closed or failed
 * - `WsTransport` (default) dials with the `ws` package; any `Transport` works
 * - `textCodec`, `binaryCodec` and `jsonCodec` convert items to frames
 *
 * ## Example
 * ```ts
 * import { SocketBuilder, jsonCodec } from 'reconnecting-ws';
 * import { Type, type Static } from 'typebox';
 *
 * const Tick = Type.Object({ symbol: Type.String(), price: Type.Number() });
 * type Tick = Static<typeof Tick>;
 *
 * const socket = SocketBuilder.create('wss://example.com/ticks', jsonCodec<{ subscribe: string }, Tick>(Tick))
 *   .backoff({ minDelayMs: 200, maxDelayMs: 10_000, maxRetries: 20, jitter: 0.3 })
 *   .open();
 *
 * for await (const event of socket) {
 *   switch (event.type) {
 *     case 'state':
 *       if (event.state.kind === 'open') socket.send({ subscribe: 'ACME' });
 *       break;
 *     case 'message':
 *       console.log(event.data.symbol, event.data.price);
 *       break;
 *     case 'decode-error':
 *       console.warn(event.error.message);
 *       break;
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// Runtime exports
export { SocketBuilder, validateConfig } from './SocketBuilder.ts';
export { ReconnectingSocket, defaultIsFatal } from './ReconnectingSocket.ts';
export { SocketSender } from './gateway/OutboundGateway.ts';
export { ExponentialBackoff } from './backoff.ts';
export { WsTransport, parseSocketUrl } from './transports/WsTransport.ts';
export { textCodec, binaryCodec, jsonCodec } from './codecs.ts';
export { compileSchema, SchemaMismatchError } from './validation.ts';
export { ConnectionState, isTerminal, formatState } from './state.ts';
export {
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_BACKOFF_MIN_MS,
  DEFAULT_JITTER,
  DEFAULT_MAX_RETRIES,
  DEFAULT_STABLE_TIMEOUT_MS,
} from './constants.ts';
export {
  ErrorCode,
  SocketError,
  FatalError,
  InvalidConfigError,
  InvalidUrlError,
  BlockedPortError,
  ConnectionDroppedError,
  BackoffExhaustedError,
  EncodeError,
  DecodeError,
  NotConnectedError,
  TransportSendError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';

// Type-only exports
export type {
  Frame,
  Codec,
  BackoffConfig,
  DropCause,
  FatalPredicate,
  SocketConfig,
  MessageEvent,
  StateEvent,
  SocketEvent,
  EventSelector,
} from './types.ts';
export type { ConnectionStateKind } from './state.ts';
export type { ErrorCodeType, SendError } from './errors.ts';
export type { BackoffPolicy, RandomSource } from './backoff.ts';
export type { CompiledValidator } from './validation.ts';
export type { Transport, TransportConnection, TransportCloseEvent } from './transports/Transport.ts';
export type { WsTransportOptions } from './transports/WsTransport.ts';
