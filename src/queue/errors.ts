/**
 * Error classes for MessageQueue rejections.
 *
 * The queue reports rejections as return values; these classes are the
 * payloads the manager attaches to its `error` events.
 *
 * @module
 */

import { StreamError, StreamErrorCodes } from '../types/errors.js';

export class QueueFullError extends StreamError {
  public readonly maxSize: number;

  constructor(maxSize: number) {
    super(`Message queue is full (max ${maxSize})`, StreamErrorCodes.QUEUE_FULL);
    this.name = 'QueueFullError';
    this.maxSize = maxSize;
  }
}

export class DuplicateMessageError extends StreamError {
  public readonly messageId: string;

  constructor(messageId: string) {
    super(`Message ${messageId} is already queued`, StreamErrorCodes.DUPLICATE_MESSAGE);
    this.name = 'DuplicateMessageError';
    this.messageId = messageId;
  }
}
