/**
 * Reconnection module.
 *
 * @module
 */

export type {
  ReconnectionStrategy,
  ReconnectionStrategyOptions,
  ExponentialBackoffOptions,
  LinearBackoffOptions,
  FixedDelayOptions,
} from './types.js';

export {
  ExponentialBackoffStrategy,
  LinearBackoffStrategy,
  FixedDelayStrategy,
  NoReconnectionStrategy,
  createReconnectionStrategy,
  strategyFromConfig,
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MULTIPLIER,
  DEFAULT_INCREMENT_MS,
  DEFAULT_RANDOMIZATION_FACTOR,
  DEFAULT_FIXED_DELAY_MS,
} from './strategy.js';
