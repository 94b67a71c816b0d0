/**
 * Stream configuration: defaults, validation, presets and JSON round trip.
 *
 * @module
 */

import { ValidationError } from '../types/errors.js';
import { isRecord, isStringArray, isStringRecord } from '../utils/type-guards.js';
import {
  requireBoolean,
  requireIntRange,
  requireNonEmptyString,
  requireNumberAtLeast,
  requireNumberInRange,
  requireOneOf,
  validationResult,
  type ValidationResult,
} from '../utils/validation.js';
import {
  RECONNECTION_STRATEGY_TYPES,
  type StreamConfig,
  type StreamConfigInput,
  type StreamConfigJSON,
  type StreamConfigOverrides,
} from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_STREAM_CONFIG: Readonly<Omit<StreamConfig, 'url'>> = Object.freeze({
  connectionTimeoutMs: 30_000,
  enableReconnection: true,
  maxReconnectionAttempts: 10,
  initialReconnectionDelayMs: 1_000,
  maxReconnectionDelayMs: 300_000,
  backoffMultiplier: 2,
  reconnectionStrategy: 'exponential',
  reconnectionIncrementMs: 1_000,
  randomizationFactor: 0.1,
  enableMessageQueue: true,
  maxQueueSize: 1_000,
  drainBatchSize: 50,
  heartbeatIntervalMs: 30_000,
  enableHeartbeat: true,
  headers: Object.freeze({}),
  protocols: Object.freeze([]),
});

const VALID_STRATEGIES: ReadonlySet<string> = new Set<string>(RECONNECTION_STRATEGY_TYPES);
const URL_PATTERN = /^wss?:\/\/\S+$/i;

// ============================================================================
// Validation
// ============================================================================

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Check a complete config object, reporting every problem at once.
 */
export function validateStreamConfig(obj: unknown): ValidationResult {
  if (!isRecord(obj)) {
    return validationResult(['Config must be a non-null object']);
  }

  const errors: string[] = [];

  requireNonEmptyString(obj.url, 'url', errors);
  if (typeof obj.url === 'string' && obj.url.trim().length > 0 && !URL_PATTERN.test(obj.url)) {
    errors.push('url must start with ws:// or wss://');
  }

  requireNumberInRange(obj.connectionTimeoutMs, 'connectionTimeoutMs', 1, MAX_TIMER_DELAY_MS, errors);
  requireBoolean(obj.enableReconnection, 'enableReconnection', errors);
  requireIntRange(
    obj.maxReconnectionAttempts,
    'maxReconnectionAttempts',
    0,
    Number.MAX_SAFE_INTEGER,
    errors,
  );
  requireNumberInRange(obj.initialReconnectionDelayMs, 'initialReconnectionDelayMs', 0, MAX_TIMER_DELAY_MS, errors);
  requireNumberInRange(obj.maxReconnectionDelayMs, 'maxReconnectionDelayMs', 0, MAX_TIMER_DELAY_MS, errors);
  if (
    typeof obj.initialReconnectionDelayMs === 'number' &&
    typeof obj.maxReconnectionDelayMs === 'number' &&
    obj.maxReconnectionDelayMs < obj.initialReconnectionDelayMs
  ) {
    errors.push('maxReconnectionDelayMs must be >= initialReconnectionDelayMs');
  }
  requireNumberAtLeast(obj.backoffMultiplier, 'backoffMultiplier', 1, errors);
  requireOneOf(obj.reconnectionStrategy, 'reconnectionStrategy', VALID_STRATEGIES, errors);
  requireNumberAtLeast(obj.reconnectionIncrementMs, 'reconnectionIncrementMs', 0, errors);
  if (
    typeof obj.randomizationFactor !== 'number' ||
    !Number.isFinite(obj.randomizationFactor) ||
    obj.randomizationFactor < 0 ||
    obj.randomizationFactor > 1
  ) {
    errors.push('randomizationFactor must be a number between 0 and 1');
  }
  requireBoolean(obj.enableMessageQueue, 'enableMessageQueue', errors);
  requireIntRange(obj.maxQueueSize, 'maxQueueSize', 0, Number.MAX_SAFE_INTEGER, errors);
  requireIntRange(obj.drainBatchSize, 'drainBatchSize', 1, Number.MAX_SAFE_INTEGER, errors);
  requireNumberInRange(obj.heartbeatIntervalMs, 'heartbeatIntervalMs', 0, MAX_TIMER_DELAY_MS, errors);
  requireBoolean(obj.enableHeartbeat, 'enableHeartbeat', errors);
  if (
    obj.enableHeartbeat === true &&
    typeof obj.heartbeatIntervalMs === 'number' &&
    obj.heartbeatIntervalMs <= 0
  ) {
    errors.push('heartbeatIntervalMs must be > 0 when enableHeartbeat is true');
  }
  if (!isStringRecord(obj.headers)) {
    errors.push('headers must be an object of string values');
  }
  if (!isStringArray(obj.protocols)) {
    errors.push('protocols must be an array of strings');
  }

  return validationResult(errors);
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Fill in defaults, validate and freeze.
 *
 * @throws ValidationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = createStreamConfig({ url: 'wss://feed.example.com', maxQueueSize: 200 });
 * ```
 */
export function createStreamConfig(input: StreamConfigInput): StreamConfig {
  return buildConfig(input.url, input, DEFAULT_STREAM_CONFIG);
}

/**
 * Return a new config with `overrides` applied. The original is untouched;
 * the result is validated like any other config.
 */
export function withConfigOverrides(
  config: StreamConfig,
  overrides: StreamConfigOverrides,
): StreamConfig {
  return buildConfig(overrides.url ?? config.url, overrides, config);
}

function buildConfig(
  url: string,
  input: Partial<Omit<StreamConfig, 'url'>>,
  base: Readonly<Omit<StreamConfig, 'url'>>,
): StreamConfig {
  const config: StreamConfig = {
    url,
    connectionTimeoutMs: input.connectionTimeoutMs ?? base.connectionTimeoutMs,
    enableReconnection: input.enableReconnection ?? base.enableReconnection,
    maxReconnectionAttempts: input.maxReconnectionAttempts ?? base.maxReconnectionAttempts,
    initialReconnectionDelayMs: input.initialReconnectionDelayMs ?? base.initialReconnectionDelayMs,
    maxReconnectionDelayMs: input.maxReconnectionDelayMs ?? base.maxReconnectionDelayMs,
    backoffMultiplier: input.backoffMultiplier ?? base.backoffMultiplier,
    reconnectionStrategy: input.reconnectionStrategy ?? base.reconnectionStrategy,
    reconnectionIncrementMs: input.reconnectionIncrementMs ?? base.reconnectionIncrementMs,
    randomizationFactor: input.randomizationFactor ?? base.randomizationFactor,
    enableMessageQueue: input.enableMessageQueue ?? base.enableMessageQueue,
    maxQueueSize: input.maxQueueSize ?? base.maxQueueSize,
    drainBatchSize: input.drainBatchSize ?? base.drainBatchSize,
    heartbeatIntervalMs: input.heartbeatIntervalMs ?? base.heartbeatIntervalMs,
    enableHeartbeat: input.enableHeartbeat ?? base.enableHeartbeat,
    headers: Object.freeze({ ...(input.headers ?? base.headers) }),
    protocols: Object.freeze([...(input.protocols ?? base.protocols)]),
  };

  const result = validateStreamConfig(config);
  if (!result.valid) {
    throw new ValidationError(`Invalid stream config: ${result.errors.join('; ')}`);
  }
  return Object.freeze(config);
}

// ============================================================================
// Presets
// ============================================================================

/** Defaults tuned for long-lived production streams. */
export function productionConfig(url: string): StreamConfig {
  return createStreamConfig({
    url,
    connectionTimeoutMs: 30_000,
    enableReconnection: true,
    maxReconnectionAttempts: 10,
    initialReconnectionDelayMs: 1_000,
    maxReconnectionDelayMs: 300_000,
    backoffMultiplier: 2,
    enableMessageQueue: true,
    maxQueueSize: 1_000,
    heartbeatIntervalMs: 30_000,
    enableHeartbeat: true,
  });
}

/** Fast, persistent reconnection for flaky networks. */
export function aggressiveConfig(url: string): StreamConfig {
  return createStreamConfig({
    url,
    connectionTimeoutMs: 15_000,
    enableReconnection: true,
    maxReconnectionAttempts: 20,
    initialReconnectionDelayMs: 500,
    maxReconnectionDelayMs: 120_000,
    backoffMultiplier: 1.5,
    enableMessageQueue: true,
    maxQueueSize: 2_000,
    heartbeatIntervalMs: 15_000,
    enableHeartbeat: true,
  });
}

/** No reconnection, no queue, no heartbeat. */
export function testingConfig(url: string): StreamConfig {
  return createStreamConfig({
    url,
    connectionTimeoutMs: 5_000,
    enableReconnection: false,
    maxReconnectionAttempts: 0,
    initialReconnectionDelayMs: 0,
    maxReconnectionDelayMs: 0,
    backoffMultiplier: 1,
    enableMessageQueue: false,
    maxQueueSize: 0,
    heartbeatIntervalMs: 0,
    enableHeartbeat: false,
  });
}

// ============================================================================
// JSON
// ============================================================================

export function configToJSON(config: StreamConfig): StreamConfigJSON {
  return {
    url: config.url,
    connectionTimeoutMs: config.connectionTimeoutMs,
    enableReconnection: config.enableReconnection,
    maxReconnectionAttempts: config.maxReconnectionAttempts,
    initialReconnectionDelayMs: config.initialReconnectionDelayMs,
    maxReconnectionDelayMs: config.maxReconnectionDelayMs,
    backoffMultiplier: config.backoffMultiplier,
    reconnectionStrategy: config.reconnectionStrategy,
    reconnectionIncrementMs: config.reconnectionIncrementMs,
    randomizationFactor: config.randomizationFactor,
    enableMessageQueue: config.enableMessageQueue,
    maxQueueSize: config.maxQueueSize,
    drainBatchSize: config.drainBatchSize,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    enableHeartbeat: config.enableHeartbeat,
    headers: { ...config.headers },
    protocols: [...config.protocols],
  };
}

/**
 * Decode a config from its JSON form. Missing optional fields take their
 * defaults; present fields must be well-formed.
 *
 * @throws ValidationError when `url` is missing or any field is invalid
 */
export function configFromJSON(json: unknown): StreamConfig {
  if (!isRecord(json)) {
    throw new ValidationError('Invalid stream config: Config must be a non-null object');
  }
  if (typeof json.url !== 'string') {
    throw new ValidationError('Invalid stream config: url must be a non-empty string');
  }

  const merged: Record<string, unknown> = { ...DEFAULT_STREAM_CONFIG, ...json };
  const result = validateStreamConfig(merged);
  if (!result.valid) {
    throw new ValidationError(`Invalid stream config: ${result.errors.join('; ')}`);
  }

  return createStreamConfig({
    url: json.url,
    connectionTimeoutMs: numberField(json.connectionTimeoutMs),
    enableReconnection: booleanField(json.enableReconnection),
    maxReconnectionAttempts: numberField(json.maxReconnectionAttempts),
    initialReconnectionDelayMs: numberField(json.initialReconnectionDelayMs),
    maxReconnectionDelayMs: numberField(json.maxReconnectionDelayMs),
    backoffMultiplier: numberField(json.backoffMultiplier),
    reconnectionStrategy: strategyField(json.reconnectionStrategy),
    reconnectionIncrementMs: numberField(json.reconnectionIncrementMs),
    randomizationFactor: numberField(json.randomizationFactor),
    enableMessageQueue: booleanField(json.enableMessageQueue),
    maxQueueSize: numberField(json.maxQueueSize),
    drainBatchSize: numberField(json.drainBatchSize),
    heartbeatIntervalMs: numberField(json.heartbeatIntervalMs),
    enableHeartbeat: booleanField(json.enableHeartbeat),
    headers: isStringRecord(json.headers) ? json.headers : undefined,
    protocols: isStringArray(json.protocols) ? json.protocols : undefined,
  });
}

/** Field-by-field equality; header key order is ignored. */
export function configsEqual(a: StreamConfig, b: StreamConfig): boolean {
  const aHeaders = Object.keys(a.headers);
  return (
    a.url === b.url &&
    a.connectionTimeoutMs === b.connectionTimeoutMs &&
    a.enableReconnection === b.enableReconnection &&
    a.maxReconnectionAttempts === b.maxReconnectionAttempts &&
    a.initialReconnectionDelayMs === b.initialReconnectionDelayMs &&
    a.maxReconnectionDelayMs === b.maxReconnectionDelayMs &&
    a.backoffMultiplier === b.backoffMultiplier &&
    a.reconnectionStrategy === b.reconnectionStrategy &&
    a.reconnectionIncrementMs === b.reconnectionIncrementMs &&
    a.randomizationFactor === b.randomizationFactor &&
    a.enableMessageQueue === b.enableMessageQueue &&
    a.maxQueueSize === b.maxQueueSize &&
    a.drainBatchSize === b.drainBatchSize &&
    a.heartbeatIntervalMs === b.heartbeatIntervalMs &&
    a.enableHeartbeat === b.enableHeartbeat &&
    aHeaders.length === Object.keys(b.headers).length &&
    aHeaders.every((key) => a.headers[key] === b.headers[key]) &&
    a.protocols.length === b.protocols.length &&
    a.protocols.every((protocol, i) => protocol === b.protocols[i])
  );
}

// ============================================================================
// Helpers
// ============================================================================

function numberField(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function booleanField(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function strategyField(value: unknown): StreamConfig['reconnectionStrategy'] | undefined {
  return RECONNECTION_STRATEGY_TYPES.find((type) => type === value);
}
