/**
 * StreamManager state, event and statistics types.
 *
 * @module
 */

import type { StreamConfig, StreamConfigJSON, ReconnectionStrategyType } from '../config/types.js';
import type { ConnectionEvent, ConnectionState, ConnectionStatistics } from '../connection/types.js';
import type { Transport } from '../connection/transport.js';
import type { StreamMessage } from '../message/message.js';
import type { MessageQueue } from '../queue/message-queue.js';
import type { QueueStatistics } from '../queue/types.js';
import type { ReconnectionStrategy } from '../reconnection/types.js';
import type { StreamError } from '../types/errors.js';
import type { Logger } from '../utils/logger.js';
import type { ReconnectionFailedError } from './errors.js';

/**
 * Derived from the current connection's state plus the reconnection flag.
 */
export type ManagerState = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'disconnected';

export interface ManagerStateSnapshot {
  state: ManagerState;
  /** State of the current connection; null before the first connect. */
  connectionState: ConnectionState | null;
  isReconnecting: boolean;
  reconnectAttempt: number;
  timestamp: number;
}

export type ManagerEvent =
  | { readonly type: 'connecting'; readonly timestamp: number }
  | { readonly type: 'connected'; readonly timestamp: number }
  | { readonly type: 'disconnected'; readonly timestamp: number; readonly reason: string }
  | { readonly type: 'connectionFailed'; readonly timestamp: number; readonly reason: string }
  | { readonly type: 'reconnecting'; readonly timestamp: number; readonly attempt: number; readonly delayMs: number }
  | {
      readonly type: 'reconnectionFailed';
      readonly timestamp: number;
      readonly reason: string;
      readonly attempts: number;
      readonly error: ReconnectionFailedError;
    }
  | { readonly type: 'messageSent'; readonly timestamp: number; readonly message: StreamMessage }
  | {
      readonly type: 'messageQueued';
      readonly timestamp: number;
      readonly message: StreamMessage;
      readonly queueSize: number;
    }
  | { readonly type: 'error'; readonly timestamp: number; readonly error: StreamError; readonly messageId?: string }
  /** Events of the underlying connection, relayed as-is. */
  | { readonly type: 'connectionEvent'; readonly timestamp: number; readonly event: ConnectionEvent };

export type ManagerEventType = ManagerEvent['type'];

export interface ManagerStatistics {
  state: ManagerState;
  connectionState: ConnectionState | null;
  isConnected: boolean;
  isReconnecting: boolean;
  reconnectAttempt: number;
  maxReconnectionAttempts: number;
  reconnectionStrategy: ReconnectionStrategyType;
  queue: QueueStatistics;
  /** Null before the first connect. */
  connection: ConnectionStatistics | null;
  config: StreamConfigJSON;
  timestamp: number;
}

export interface StreamManagerOptions {
  config: StreamConfig;
  /** Default: `WsTransport` */
  transport?: Transport;
  logger?: Logger;
  /** Default: `strategyFromConfig(config)` */
  reconnectionStrategy?: ReconnectionStrategy;
  /** Default: a queue sized by `config.maxQueueSize` */
  messageQueue?: MessageQueue;
}
