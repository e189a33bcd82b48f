/**
 * Builder defaults.
 */

/** Delay before the first reconnect attempt. Must be > 0. */
export const DEFAULT_BACKOFF_MIN_MS = 100;

/** Upper bound for any reconnect delay. */
export const DEFAULT_BACKOFF_MAX_MS = 60_000;

/** Reconnect attempts allowed in a row. The socket fails once they are used up. */
export const DEFAULT_MAX_RETRIES = Number.POSITIVE_INFINITY;

/** Fraction of each delay added as random jitter. */
export const DEFAULT_JITTER = 0;

/** How long a reconnected socket must stay up before the attempt counter resets. */
export const DEFAULT_STABLE_TIMEOUT_MS = 0;

/** Largest delay `setTimeout` accepts without overflowing. */
export const MAX_TIMER_MS = 0x7fff_ffff;

/** Close code sent when the caller closes the socket. */
export const NORMAL_CLOSURE = 1000;
