/**
 * Backoff algorithms and the strategy factory.
 *
 * @module
 */

import type { StreamConfig } from '../config/types.js';
import type {
  ExponentialBackoffOptions,
  FixedDelayOptions,
  LinearBackoffOptions,
  ReconnectionStrategy,
  ReconnectionStrategyOptions,
} from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_INITIAL_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 300_000;
export const DEFAULT_MULTIPLIER = 2;
export const DEFAULT_INCREMENT_MS = 1_000;
export const DEFAULT_RANDOMIZATION_FACTOR = 0.1;
export const DEFAULT_FIXED_DELAY_MS = 5_000;

function normalizeAttempt(attempt: number): number {
  return Number.isFinite(attempt) && attempt >= 1 ? Math.floor(attempt) : 1;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// ============================================================================
// Strategies
// ============================================================================

/**
 * `clamp(initial * multiplier^(attempt-1), 0, max)`, then jittered by
 * `±randomizationFactor`. The result never exceeds `max * (1 + factor)`.
 */
export class ExponentialBackoffStrategy implements ReconnectionStrategy {
  readonly type = 'exponential';
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  readonly randomizationFactor: number;
  private readonly random: () => number;

  constructor(options: ExponentialBackoffOptions = {}) {
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.multiplier = options.multiplier ?? DEFAULT_MULTIPLIER;
    this.randomizationFactor = options.randomizationFactor ?? DEFAULT_RANDOMIZATION_FACTOR;
    this.random = options.random ?? Math.random;
  }

  delay(attempt: number): number {
    const n = normalizeAttempt(attempt);
    const base = clamp(this.initialDelayMs * this.multiplier ** (n - 1), 0, this.maxDelayMs);
    const jitter = 1 + this.randomizationFactor * (2 * this.random() - 1);
    return Math.round(base * jitter);
  }

  shouldRetry(attempt: number, maxAttempts: number): boolean {
    return attempt <= maxAttempts;
  }

  reset(): void {}
}

/** `clamp(initial + increment * (attempt-1), 0, max)`; no jitter. */
export class LinearBackoffStrategy implements ReconnectionStrategy {
  readonly type = 'linear';
  readonly initialDelayMs: number;
  readonly incrementMs: number;
  readonly maxDelayMs: number;

  constructor(options: LinearBackoffOptions = {}) {
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.incrementMs = options.incrementMs ?? DEFAULT_INCREMENT_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  }

  delay(attempt: number): number {
    const n = normalizeAttempt(attempt);
    return clamp(this.initialDelayMs + this.incrementMs * (n - 1), 0, this.maxDelayMs);
  }

  shouldRetry(attempt: number, maxAttempts: number): boolean {
    return attempt <= maxAttempts;
  }

  reset(): void {}
}

export class FixedDelayStrategy implements ReconnectionStrategy {
  readonly type = 'fixed';
  readonly delayMs: number;

  constructor(options: FixedDelayOptions = {}) {
    this.delayMs = Math.max(0, options.delayMs ?? DEFAULT_FIXED_DELAY_MS);
  }

  delay(_attempt: number): number {
    return this.delayMs;
  }

  shouldRetry(attempt: number, maxAttempts: number): boolean {
    return attempt <= maxAttempts;
  }

  reset(): void {}
}

/** Never retries. */
export class NoReconnectionStrategy implements ReconnectionStrategy {
  readonly type = 'none';

  delay(_attempt: number): number {
    return 0;
  }

  shouldRetry(_attempt: number, _maxAttempts: number): boolean {
    return false;
  }

  reset(): void {}
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build a strategy from its type tag. Omitted parameters take the defaults
 * exported above.
 *
 * @example
 * ```typescript
 * const strategy = createReconnectionStrategy({ type: 'linear', incrementMs: 2_000 });
 * strategy.delay(3); // 5000
 * ```
 */
export function createReconnectionStrategy(options: ReconnectionStrategyOptions): ReconnectionStrategy {
  switch (options.type) {
    case 'exponential':
      return new ExponentialBackoffStrategy(options);
    case 'linear':
      return new LinearBackoffStrategy(options);
    case 'fixed':
      return new FixedDelayStrategy({ delayMs: options.delayMs ?? options.initialDelayMs });
    case 'none':
      return new NoReconnectionStrategy();
  }
}

/** Strategy described by a config; `none` when reconnection is disabled. */
export function strategyFromConfig(config: StreamConfig): ReconnectionStrategy {
  if (!config.enableReconnection) {
    return new NoReconnectionStrategy();
  }
  switch (config.reconnectionStrategy) {
    case 'exponential':
      return new ExponentialBackoffStrategy({
        initialDelayMs: config.initialReconnectionDelayMs,
        maxDelayMs: config.maxReconnectionDelayMs,
        multiplier: config.backoffMultiplier,
        randomizationFactor: config.randomizationFactor,
      });
    case 'linear':
      return new LinearBackoffStrategy({
        initialDelayMs: config.initialReconnectionDelayMs,
        incrementMs: config.reconnectionIncrementMs,
        maxDelayMs: config.maxReconnectionDelayMs,
      });
    case 'fixed':
      return new FixedDelayStrategy({ delayMs: config.initialReconnectionDelayMs });
    case 'none':
      return new NoReconnectionStrategy();
  }
}
