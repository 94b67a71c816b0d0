/**
 * Stream client configuration types.
 *
 * @module
 */

/** Backoff algorithm selected by {@link StreamConfig.reconnectionStrategy}. */
export type ReconnectionStrategyType = 'exponential' | 'linear' | 'fixed' | 'none';

export const RECONNECTION_STRATEGY_TYPES: readonly ReconnectionStrategyType[] = [
  'exponential',
  'linear',
  'fixed',
  'none',
];

/**
 * Immutable client configuration. Build with `createStreamConfig()`; the
 * returned object is frozen.
 */
export interface StreamConfig {
  /** Endpoint address, `ws://` or `wss://` */
  readonly url: string;
  /** Time allowed for a single open attempt (default: 30000) */
  readonly connectionTimeoutMs: number;
  /** Reconnect automatically after an unexpected close or failure (default: true) */
  readonly enableReconnection: boolean;
  /** Hard ceiling on attempts per reconnection campaign (default: 10) */
  readonly maxReconnectionAttempts: number;
  /** Delay before the first reconnection attempt (default: 1000) */
  readonly initialReconnectionDelayMs: number;
  /** Upper bound on any reconnection delay (default: 300000) */
  readonly maxReconnectionDelayMs: number;
  /** Exponential growth factor (default: 2) */
  readonly backoffMultiplier: number;
  /** Backoff algorithm (default: 'exponential') */
  readonly reconnectionStrategy: ReconnectionStrategyType;
  /** Step added per attempt by the linear strategy (default: 1000) */
  readonly reconnectionIncrementMs: number;
  /** Jitter applied by the exponential strategy, 0..1 (default: 0.1) */
  readonly randomizationFactor: number;
  /** Queue messages while disconnected (default: true) */
  readonly enableMessageQueue: boolean;
  /** Queue capacity (default: 1000) */
  readonly maxQueueSize: number;
  /** Messages sent per drain batch before yielding (default: 50) */
  readonly drainBatchSize: number;
  /** Ping interval (default: 30000) */
  readonly heartbeatIntervalMs: number;
  /** Send periodic pings while connected (default: true) */
  readonly enableHeartbeat: boolean;
  /** Upgrade request headers; dropped by transports without header support */
  readonly headers: Readonly<Record<string, string>>;
  /** Requested subprotocols */
  readonly protocols: readonly string[];
}

/** Input to `createStreamConfig()`: everything but `url` is optional. */
export type StreamConfigInput = { readonly url: string } & Partial<Omit<StreamConfig, 'url'>>;

/** Partial replacement applied by `withConfigOverrides()`. */
export type StreamConfigOverrides = Partial<StreamConfig>;

/** Plain JSON form produced by `configToJSON()`. */
export interface StreamConfigJSON {
  url: string;
  connectionTimeoutMs: number;
  enableReconnection: boolean;
  maxReconnectionAttempts: number;
  initialReconnectionDelayMs: number;
  maxReconnectionDelayMs: number;
  backoffMultiplier: number;
  reconnectionStrategy: ReconnectionStrategyType;
  reconnectionIncrementMs: number;
  randomizationFactor: number;
  enableMessageQueue: boolean;
  maxQueueSize: number;
  drainBatchSize: number;
  heartbeatIntervalMs: number;
  enableHeartbeat: boolean;
  headers: Record<string, string>;
  protocols: string[];
}
