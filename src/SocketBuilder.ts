/**
 * SocketBuilder - configuration surface for `ReconnectingSocket`.
 *
 * Setters return a new builder, so a configured builder can be reused to open
 * several sockets.
 */

import { ExponentialBackoff } from './backoff.ts';
import type { BackoffPolicy } from './backoff.ts';
import {
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_BACKOFF_MIN_MS,
  DEFAULT_JITTER,
  DEFAULT_MAX_RETRIES,
  DEFAULT_STABLE_TIMEOUT_MS,
  MAX_TIMER_MS,
} from './constants.ts';
import { InvalidConfigError } from './errors.ts';
import { allEvents, messageEvents } from './mux/EventMultiplexer.ts';
import { ReconnectingSocket } from './ReconnectingSocket.ts';
import type { Transport } from './transports/Transport.ts';
import { WsTransport } from './transports/WsTransport.ts';
import type {
  BackoffConfig,
  Codec,
  EventSelector,
  FatalPredicate,
  MessageEvent,
  SocketConfig,
  SocketEvent,
} from './types.ts';

/**
 * Check every numeric setting, throwing `InvalidConfigError` on the first
 * one out of range.
 */
export function validateConfig<I, O>(config: SocketConfig<I, O>): void {
  const { minDelayMs, maxDelayMs, maxRetries, jitter } = config.backoff;

  if (typeof config.url !== 'string' || config.url.trim() === '') {
    throw new InvalidConfigError('url must be a non-empty string');
  }
  if (!Number.isFinite(minDelayMs) || minDelayMs <= 0) {
    throw new InvalidConfigError('minDelayMs must be > 0');
  }
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < minDelayMs) {
    throw new InvalidConfigError('maxDelayMs must be >= minDelayMs');
  }
  if (maxDelayMs > MAX_TIMER_MS) {
    throw new InvalidConfigError(`maxDelayMs must be <= ${MAX_TIMER_MS}`);
  }
  if (maxRetries !== Number.POSITIVE_INFINITY && (!Number.isInteger(maxRetries) || maxRetries <= 0)) {
    throw new InvalidConfigError('maxRetries must be a positive integer or Infinity');
  }
  if (!Number.isFinite(jitter) || jitter < 0 || jitter > 1) {
    throw new InvalidConfigError('jitter must be between 0 and 1');
  }
  if (
    !Number.isFinite(config.stableTimeoutMs) ||
    config.stableTimeoutMs < 0 ||
    config.stableTimeoutMs > MAX_TIMER_MS
  ) {
    throw new InvalidConfigError(`stableTimeoutMs must be between 0 and ${MAX_TIMER_MS}`);
  }
}

/**
 * Builder for `ReconnectingSocket`.
 *
 * @example
 * ```typescript
 * const socket = SocketBuilder.create('wss://example.com/feed', jsonCodec<Command>())
 *   .backoff({ minDelayMs: 250, maxRetries: 10 })
 *   .open();
 *
 * socket.send({ type: 'subscribe', channel: 'ticks' });
 *
 * for await (const event of socket) {
 *   if (event.type === 'message') handle(event.data);
 *   if (event.type === 'state') console.log('state', event.state.kind);
 * }
 * ```
 */
export class SocketBuilder<I, O, E> {
  private _config: SocketConfig<I, O>;
  private _select: EventSelector<O, E>;

  private constructor(config: SocketConfig<I, O>, select: EventSelector<O, E>) {
    this._config = config;
    this._select = select;
  }

  /**
   * Start a builder with default settings. The socket yields messages,
   * decode errors and state changes.
   */
  static create<I, O>(url: string, codec: Codec<I, O>): SocketBuilder<I, O, SocketEvent<O>> {
    return new SocketBuilder<I, O, SocketEvent<O>>(
      {
        url,
        codec,
        backoff: {
          minDelayMs: DEFAULT_BACKOFF_MIN_MS,
          maxDelayMs: DEFAULT_BACKOFF_MAX_MS,
          maxRetries: DEFAULT_MAX_RETRIES,
          jitter: DEFAULT_JITTER,
        },
        stableTimeoutMs: DEFAULT_STABLE_TIMEOUT_MS,
        transport: new WsTransport(),
        backoffPolicy: new ExponentialBackoff(),
        fatalCloseCodes: [],
      },
      allEvents
    );
  }

  /** The configuration `open()` would use. */
  get config(): SocketConfig<I, O> {
    return this._config;
  }

  url(url: string): SocketBuilder<I, O, E> {
    return this._with({ url });
  }

  backoff(backoff: Partial<BackoffConfig>): SocketBuilder<I, O, E> {
    return this._with({ backoff: { ...this._config.backoff, ...backoff } });
  }

  minDelay(minDelayMs: number): SocketBuilder<I, O, E> {
    return this.backoff({ minDelayMs });
  }

  maxDelay(maxDelayMs: number): SocketBuilder<I, O, E> {
    return this.backoff({ maxDelayMs });
  }

  maxRetries(maxRetries: number): SocketBuilder<I, O, E> {
    return this.backoff({ maxRetries });
  }

  jitter(jitter: number): SocketBuilder<I, O, E> {
    return this.backoff({ jitter });
  }

  /**
   * How long a reconnected socket must stay open before the attempt counter
   * resets to 0.
   */
  stableTimeout(stableTimeoutMs: number): SocketBuilder<I, O, E> {
    return this._with({ stableTimeoutMs });
  }

  transport(transport: Transport): SocketBuilder<I, O, E> {
    return this._with({ transport });
  }

  backoffPolicy(backoffPolicy: BackoffPolicy): SocketBuilder<I, O, E> {
    return this._with({ backoffPolicy });
  }

  /** Close codes that end the socket instead of triggering a reconnect. */
  fatalCloseCodes(codes: readonly number[]): SocketBuilder<I, O, E> {
    return this._with({ fatalCloseCodes: [...codes] });
  }

  /** Replace the drop classification entirely. */
  isFatal(isFatal: FatalPredicate): SocketBuilder<I, O, E> {
    return this._with({ isFatal });
  }

  logging(enabled: boolean): SocketBuilder<I, O, E> {
    return this._with({ logging: enabled });
  }

  /** Yield state changes alongside messages. This is the default. */
  withStateEvents(): SocketBuilder<I, O, SocketEvent<O>> {
    return new SocketBuilder<I, O, SocketEvent<O>>(this._config, allEvents);
  }

  /** Yield messages and decode errors only. */
  messagesOnly(): SocketBuilder<I, O, MessageEvent<O>> {
    return new SocketBuilder<I, O, MessageEvent<O>>(this._config, messageEvents);
  }

  /**
   * Validate the configuration and open the first connection.
   *
   * Errors thrown here are fatal (invalid config, invalid URL, blocked port)
   * and are never retried. Later failures only show up as state changes.
   */
  open(): ReconnectingSocket<I, O, E> {
    validateConfig(this._config);
    const config: SocketConfig<I, O> = Object.freeze({
      ...this._config,
      backoff: Object.freeze({ ...this._config.backoff }),
      fatalCloseCodes: Object.freeze([...this._config.fatalCloseCodes]),
    });
    return new ReconnectingSocket(config, this._select);
  }

  private _with(patch: Partial<SocketConfig<I, O>>): SocketBuilder<I, O, E> {
    return new SocketBuilder<I, O, E>({ ...this._config, ...patch }, this._select);
  }
}
