/**
 * Connection state machine and event types.
 *
 * @module
 */

import type { StreamConfig } from '../config/types.js';
import type { StreamMessage } from '../message/message.js';
import type { Logger } from '../utils/logger.js';
import type { Transport } from './transport.js';

// ============================================================================
// State
// ============================================================================

export type ConnectionState =
  | 'initial'
  | 'connecting'
  | 'connected'
  | 'closing'
  | 'closed'
  | 'failed'
  | 'reconnecting'
  | 'suspended';

const ACTIVE_STATES: ReadonlySet<ConnectionState> = new Set<ConnectionState>([
  'connecting',
  'connected',
  'reconnecting',
]);

const TERMINAL_STATES: ReadonlySet<ConnectionState> = new Set<ConnectionState>(['closed', 'failed']);

const STATE_LABELS: Record<ConnectionState, string> = {
  initial: 'Initial',
  connecting: 'Connecting',
  connected: 'Connected',
  closing: 'Closing',
  closed: 'Closed',
  failed: 'Failed',
  reconnecting: 'Reconnecting',
  suspended: 'Suspended',
};

/** Connecting, connected, or reconnecting. */
export function isActiveState(state: ConnectionState): boolean {
  return ACTIVE_STATES.has(state);
}

/** Closed or failed. */
export function isTerminalState(state: ConnectionState): boolean {
  return TERMINAL_STATES.has(state);
}

export function canSendInState(state: ConnectionState): boolean {
  return state === 'connected';
}

export function describeState(state: ConnectionState): string {
  return STATE_LABELS[state];
}

// ============================================================================
// Events
// ============================================================================

export type ConnectionEvent =
  | { readonly type: 'connected'; readonly timestamp: number }
  | { readonly type: 'disconnected'; readonly timestamp: number; readonly code?: number; readonly reason?: string }
  | { readonly type: 'connectionFailed'; readonly timestamp: number; readonly reason: string }
  | { readonly type: 'messageSent'; readonly timestamp: number; readonly message: StreamMessage }
  | { readonly type: 'messageReceived'; readonly timestamp: number; readonly message: StreamMessage }
  | { readonly type: 'error'; readonly timestamp: number; readonly error: string };

export type ConnectionEventType = ConnectionEvent['type'];

// ============================================================================
// Statistics
// ============================================================================

export interface ConnectionStatistics {
  state: ConnectionState;
  lastStateChangeAt: number;
  messagesSent: number;
  messagesReceived: number;
  errorsCount: number;
  pingsSent: number;
  pongsReceived: number;
  connectionStartedAt: number | null;
  connectionDurationMs: number | null;
  lastMessageAt: number | null;
  timeSinceLastMessageMs: number | null;
  lastPingAt: number | null;
  lastPongAt: number | null;
  heartbeatLatencyMs: number | null;
  /** Pongs received as a percentage of pings sent; null before the first ping. */
  heartbeatHealth: number | null;
}

// ============================================================================
// Options
// ============================================================================

export interface StreamConnectionOptions {
  config: StreamConfig;
  transport: Transport;
  logger?: Logger;
}
