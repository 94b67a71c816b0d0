/**
 * Configuration module.
 *
 * @module
 */

export type {
  ReconnectionStrategyType,
  StreamConfig,
  StreamConfigInput,
  StreamConfigOverrides,
  StreamConfigJSON,
} from './types.js';
export { RECONNECTION_STRATEGY_TYPES } from './types.js';

export {
  DEFAULT_STREAM_CONFIG,
  MAX_TIMER_DELAY_MS,
  validateStreamConfig,
  createStreamConfig,
  withConfigOverrides,
  productionConfig,
  aggressiveConfig,
  testingConfig,
  configToJSON,
  configFromJSON,
  configsEqual,
} from './config.js';
