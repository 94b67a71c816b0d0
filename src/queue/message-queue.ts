/**
 * Bounded outbound message queue with priority ordering, deduplication by
 * id, and retry bookkeeping.
 *
 * @module
 */

import { StreamMessage } from '../message/message.js';
import type { MessageKind } from '../message/types.js';
import { ValidationError } from '../types/errors.js';
import { isRecord } from '../utils/type-guards.js';
import type {
  EnqueueResult,
  MessageQueueJSON,
  MessageQueueOptions,
  QueueStatistics,
} from './types.js';

export const DEFAULT_MAX_QUEUE_SIZE = 1_000;

interface QueueEntry {
  message: StreamMessage;
  /** Insertion sequence; final tiebreak so equal keys keep arrival order. */
  seq: number;
}

/**
 * Priority order: control messages, then ack-required, then lower
 * `retryCount`, then earlier `createdAt`. Returns 0 for equal keys.
 */
export function compareMessagePriority(a: StreamMessage, b: StreamMessage): number {
  return (
    Number(b.isControl) - Number(a.isControl) ||
    Number(b.requiresAck) - Number(a.requiresAck) ||
    a.retryCount - b.retryCount ||
    a.createdAt - b.createdAt
  );
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  return compareMessagePriority(a.message, b.message) || a.seq - b.seq;
}

export class MessageQueue {
  readonly maxSize: number;
  readonly enablePriority: boolean;
  readonly enableDeduplication: boolean;

  private entries: QueueEntry[] = [];
  private readonly ids = new Set<string>();
  private nextSeq = 0;

  constructor(options: MessageQueueOptions = {}) {
    const maxSize = options.maxSize ?? DEFAULT_MAX_QUEUE_SIZE;
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new ValidationError(`maxSize must be a non-negative integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.enablePriority = options.enablePriority ?? true;
    this.enableDeduplication = options.enableDeduplication ?? true;
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get isFull(): boolean {
    return this.entries.length >= this.maxSize;
  }

  /** Snapshot in dequeue order. */
  get messages(): readonly StreamMessage[] {
    return this.entries.map((entry) => entry.message);
  }

  get retryableMessages(): readonly StreamMessage[] {
    return this.messages.filter((message) => message.canRetry);
  }

  get ackRequiredMessages(): readonly StreamMessage[] {
    return this.messages.filter((message) => message.requiresAck);
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /** Add a message, reporting why it was rejected if it was. */
  tryEnqueue(message: StreamMessage): EnqueueResult {
    if (this.isFull) {
      return { accepted: false, reason: 'full' };
    }
    if (this.enableDeduplication && this.ids.has(message.id)) {
      return { accepted: false, reason: 'duplicate' };
    }

    this.entries.push({ message, seq: this.nextSeq++ });
    if (this.enableDeduplication) this.ids.add(message.id);
    this.sort();
    return { accepted: true };
  }

  /** `tryEnqueue` reduced to a boolean. */
  enqueue(message: StreamMessage): boolean {
    return this.tryEnqueue(message).accepted;
  }

  /** Remove and return the head entry. */
  dequeue(): StreamMessage | undefined {
    const entry = this.entries.shift();
    if (!entry) return undefined;
    this.ids.delete(entry.message.id);
    return entry.message;
  }

  peek(): StreamMessage | undefined {
    return this.entries[0]?.message;
  }

  /** Remove the first entry with this id. */
  remove(id: string): boolean {
    const index = this.entries.findIndex((entry) => entry.message.id === id);
    if (index === -1) return false;
    this.entries.splice(index, 1);
    if (!this.entries.some((entry) => entry.message.id === id)) {
      this.ids.delete(id);
    }
    return true;
  }

  clear(): void {
    this.entries = [];
    this.ids.clear();
  }

  has(id: string): boolean {
    return this.enableDeduplication
      ? this.ids.has(id)
      : this.entries.some((entry) => entry.message.id === id);
  }

  /**
   * Replace the entry with its `withRetry()` copy. Returns false when the id
   * is not queued or the message has no retries left.
   */
  updateRetryCount(id: string): boolean {
    const entry = this.entries.find((candidate) => candidate.message.id === id);
    if (!entry || !entry.message.canRetry) return false;
    entry.message = entry.message.withRetry();
    this.sort();
    return true;
  }

  // --------------------------------------------------------------------------
  // Statistics
  // --------------------------------------------------------------------------

  getStatistics(): QueueStatistics {
    const byKind: Record<MessageKind, number> = { text: 0, binary: 0, json: 0, ping: 0, pong: 0 };
    let retryableCount = 0;
    let ackRequiredCount = 0;
    for (const { message } of this.entries) {
      byKind[message.kind]++;
      if (message.canRetry) retryableCount++;
      if (message.requiresAck) ackRequiredCount++;
    }

    return {
      size: this.size,
      maxSize: this.maxSize,
      utilizationPercent: this.maxSize === 0 ? 100 : (this.size / this.maxSize) * 100,
      isEmpty: this.isEmpty,
      isFull: this.isFull,
      retryableCount,
      ackRequiredCount,
      byKind,
      enablePriority: this.enablePriority,
      enableDeduplication: this.enableDeduplication,
    };
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  toJSON(): MessageQueueJSON {
    return {
      maxSize: this.maxSize,
      enablePriority: this.enablePriority,
      enableDeduplication: this.enableDeduplication,
      messages: this.entries.map((entry) => entry.message.toJSON()),
    };
  }

  /**
   * Rebuild a queue from `toJSON()` output. Missing options take their
   * defaults.
   *
   * @throws ValidationError on malformed input, or when the messages do not
   *   fit the decoded capacity or deduplication setting
   */
  static fromJSON(json: unknown): MessageQueue {
    if (!isRecord(json)) {
      throw new ValidationError('Queue JSON must be a non-null object');
    }
    if (!Array.isArray(json.messages)) {
      throw new ValidationError('Queue JSON messages must be an array');
    }

    const queue = new MessageQueue({
      maxSize: optionalNumber(json.maxSize, 'maxSize'),
      enablePriority: optionalBoolean(json.enablePriority, 'enablePriority'),
      enableDeduplication: optionalBoolean(json.enableDeduplication, 'enableDeduplication'),
    });

    for (const raw of json.messages) {
      const message = StreamMessage.fromJSON(raw);
      const result = queue.tryEnqueue(message);
      if (!result.accepted) {
        throw new ValidationError(
          result.reason === 'full'
            ? `Queue JSON holds more than maxSize (${queue.maxSize}) messages`
            : `Queue JSON contains duplicate message id ${message.id}`,
        );
      }
    }
    return queue;
  }

  private sort(): void {
    if (this.enablePriority) {
      this.entries.sort(compareEntries);
    }
  }
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new ValidationError(`Queue JSON ${field} must be a number`);
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ValidationError(`Queue JSON ${field} must be a boolean`);
  return value;
}
