/**
 * Outbound message queue.
 *
 * @module
 */

export type {
  MessageQueueOptions,
  EnqueueResult,
  EnqueueRejection,
  QueueStatistics,
  MessageQueueJSON,
} from './types.js';
export { MessageQueue, compareMessagePriority, DEFAULT_MAX_QUEUE_SIZE } from './message-queue.js';
export { QueueFullError, DuplicateMessageError } from './errors.js';
