/**
 * Backoff policies for spacing out reconnect attempts.
 */

import type { BackoffConfig } from './types.ts';

/**
 * Source of uniformly distributed numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Computes the delay before a reconnect attempt.
 */
export interface BackoffPolicy {
  /**
   * @param attempt - 1-based attempt number since the last stable connection
   * @returns Delay in milliseconds, or `null` once the retry budget is spent
   */
  next(attempt: number, config: Readonly<BackoffConfig>): number | null;
}

/**
 * Doubles the delay on every attempt, starting at `minDelayMs` and capped at
 * `maxDelayMs`. Jitter only ever lengthens a delay.
 */
export class ExponentialBackoff implements BackoffPolicy {
  private readonly _random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this._random = random;
  }

  next(attempt: number, config: Readonly<BackoffConfig>): number | null {
    if (attempt > config.maxRetries) return null;

    const exponent = Math.max(0, attempt - 1);
    const baseDelay = Math.min(config.minDelayMs * Math.pow(2, exponent), config.maxDelayMs);
    const jitter = baseDelay * config.jitter * this._random();
    return Math.round(Math.min(baseDelay + jitter, config.maxDelayMs));
  }
}
