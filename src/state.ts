/**
 * Connection state of a reconnecting socket.
 *
 * `closed` and `failed` are terminal. `closed` is only entered when the caller
 * closes the socket; `failed` when a drop is fatal or the backoff runs out.
 */

export type ConnectionState =
  | { readonly kind: 'connecting' }
  | { readonly kind: 'open' }
  | {
      readonly kind: 'reconnecting';
      readonly attempt: number;
      readonly delayMs: number;
      /** Epoch milliseconds at which the next attempt is due. */
      readonly delayUntil: number;
    }
  | { readonly kind: 'closed'; readonly reason: string }
  | { readonly kind: 'failed'; readonly error: Error };

export type ConnectionStateKind = ConnectionState['kind'];

export const ConnectionState = {
  connecting: (): ConnectionState => ({ kind: 'connecting' }),
  open: (): ConnectionState => ({ kind: 'open' }),
  reconnecting: (attempt: number, delayMs: number, now = Date.now()): ConnectionState => ({
    kind: 'reconnecting',
    attempt,
    delayMs,
    delayUntil: now + delayMs,
  }),
  closed: (reason: string): ConnectionState => ({ kind: 'closed', reason }),
  failed: (error: Error): ConnectionState => ({ kind: 'failed', error }),
} as const;

export function isTerminal(state: ConnectionState): boolean {
  return state.kind === 'closed' || state.kind === 'failed';
}

/**
 * Short form for log lines, e.g. `reconnecting(2, 400ms)`.
 */
export function formatState(state: ConnectionState): string {
  switch (state.kind) {
    case 'reconnecting':
      return `reconnecting(${state.attempt}, ${state.delayMs}ms)`;
    case 'closed':
      return `closed(${state.reason})`;
    case 'failed':
      return `failed(${state.error.message})`;
    default:
      return state.kind;
  }
}
