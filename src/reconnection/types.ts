/**
 * Reconnection strategy contract.
 *
 * @module
 */

import type { ReconnectionStrategyType } from '../config/types.js';

export type { ReconnectionStrategyType };

/**
 * Maps a 1-based attempt number to a wait before that attempt.
 *
 * Implementations may keep state; `reset()` is called whenever a
 * reconnection campaign ends (success, explicit connect or disconnect).
 */
export interface ReconnectionStrategy {
  readonly type: ReconnectionStrategyType;
  /** Delay in ms before attempt `attempt`. */
  delay(attempt: number): number;
  shouldRetry(attempt: number, maxAttempts: number): boolean;
  reset(): void;
}

export interface ExponentialBackoffOptions {
  /** Delay before the first attempt (default: 1000) */
  initialDelayMs?: number;
  /** Cap applied before jitter (default: 300000) */
  maxDelayMs?: number;
  /** Growth factor per attempt (default: 2) */
  multiplier?: number;
  /** Jitter amplitude in [0, 1] (default: 0.1) */
  randomizationFactor?: number;
  /** Uniform source in [0, 1) (default: Math.random) */
  random?: () => number;
}

export interface LinearBackoffOptions {
  /** Delay before the first attempt (default: 1000) */
  initialDelayMs?: number;
  /** Added per attempt (default: 1000) */
  incrementMs?: number;
  /** Cap (default: 300000) */
  maxDelayMs?: number;
}

export interface FixedDelayOptions {
  /** Constant delay (default: 5000) */
  delayMs?: number;
}

/** Tagged options accepted by `createReconnectionStrategy()`. */
export type ReconnectionStrategyOptions =
  | ({ type: 'exponential' } & ExponentialBackoffOptions)
  | ({ type: 'linear' } & LinearBackoffOptions)
  | ({ type: 'fixed' } & FixedDelayOptions & { initialDelayMs?: number })
  | { type: 'none' };
