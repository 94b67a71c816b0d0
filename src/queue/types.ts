/**
 * MessageQueue types.
 *
 * @module
 */

import type { MessageKind, StreamMessageJSON } from '../message/types.js';

export interface MessageQueueOptions {
  /** Capacity (default: 1000) */
  maxSize?: number;
  /** Keep entries sorted by priority (default: true) */
  enablePriority?: boolean;
  /** Reject a second message with an id already queued (default: true) */
  enableDeduplication?: boolean;
}

export type EnqueueRejection = 'full' | 'duplicate';

export type EnqueueResult = { accepted: true } | { accepted: false; reason: EnqueueRejection };

export interface QueueStatistics {
  size: number;
  maxSize: number;
  utilizationPercent: number;
  isEmpty: boolean;
  isFull: boolean;
  retryableCount: number;
  ackRequiredCount: number;
  byKind: Record<MessageKind, number>;
  enablePriority: boolean;
  enableDeduplication: boolean;
}

/** Persisted queue: options plus messages in queue order. */
export interface MessageQueueJSON {
  maxSize: number;
  enablePriority: boolean;
  enableDeduplication: boolean;
  messages: StreamMessageJSON[];
}
