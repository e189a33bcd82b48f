/**
 * Merges inbound messages and state transitions into one ordered sequence.
 *
 * Both sources push into a single FIFO as they happen, so consumers see
 * events in arrival order. The selector chosen at construction decides which
 * events are kept.
 */

import type { Debugger } from 'debug';
import type { ConnectionState } from '../state.ts';
import type { EventSelector, MessageEvent, SocketEvent } from '../types.ts';

/**
 * Keeps every event.
 */
export function allEvents<O>(event: SocketEvent<O>): SocketEvent<O> {
  return event;
}

/**
 * Keeps messages and decode errors, drops state changes.
 */
export function messageEvents<O>(event: SocketEvent<O>): MessageEvent<O> | undefined {
  return event.type === 'state' ? undefined : event;
}

export class EventMultiplexer<O, E> implements AsyncIterableIterator<E> {
  private _select: EventSelector<O, E>;
  private _log: Debugger;
  private _onReturn: () => void;

  /** Events produced before anyone asked for them. */
  private _queue: E[] = [];
  /** `next()` calls waiting for an event, oldest first. */
  private _waiting: ((result: IteratorResult<E, undefined>) => void)[] = [];
  private _ended = false;

  /**
   * @param onReturn - Called when the consumer stops iterating early
   */
  constructor(select: EventSelector<O, E>, log: Debugger, onReturn: () => void) {
    this._select = select;
    this._log = log;
    this._onReturn = onReturn;
  }

  get ended(): boolean {
    return this._ended;
  }

  /** Number of events waiting to be consumed. */
  get pending(): number {
    return this._queue.length;
  }

  pushMessage(event: MessageEvent<O>): void {
    this._push(event);
  }

  pushState(state: ConnectionState): void {
    this._push({ type: 'state', state });
  }

  /**
   * No events are accepted after this. Queued events are still delivered.
   */
  end(): void {
    if (this._ended) return;
    this._ended = true;
    this._log('sequence ended (%d queued)', this._queue.length);

    for (const resolve of this._waiting.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  next(): Promise<IteratorResult<E, undefined>> {
    const queued = this._queue.shift();
    if (queued !== undefined) {
      return Promise.resolve({ value: queued, done: false });
    }
    if (this._ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this._waiting.push(resolve);
    });
  }

  return(): Promise<IteratorResult<E, undefined>> {
    this._onReturn();
    this.end();
    this._queue = [];
    return Promise.resolve({ value: undefined, done: true });
  }

  private _push(event: SocketEvent<O>): void {
    if (this._ended) {
      this._log('dropping %s event after end', event.type);
      return;
    }

    const selected = this._select(event);
    if (selected === undefined) return;

    const resolve = this._waiting.shift();
    if (resolve) {
      resolve({ value: selected, done: false });
    } else {
      this._queue.push(selected);
    }
  }
}
