import { describe, it, expect } from 'vitest';
import { MessageQueue, compareMessagePriority } from './message-queue.js';
import { DuplicateMessageError, QueueFullError } from './errors.js';
import { StreamMessage } from '../message/message.js';
import { StreamErrorCodes, ValidationError } from '../types/errors.js';

const T0 = Date.parse('2026-05-01T00:00:00.000Z');

function text(id: string, createdAt = T0, extra: { requiresAck?: boolean; maxRetries?: number } = {}) {
  return StreamMessage.text(`body-${id}`, { id, createdAt, ...extra });
}

function ids(queue: MessageQueue): string[] {
  return queue.messages.map((m) => m.id);
}

describe('MessageQueue', () => {
  describe('capacity and deduplication', () => {
    it('rejects beyond maxSize and leaves size unchanged', () => {
      const queue = new MessageQueue({ maxSize: 2 });
      expect(queue.enqueue(text('a'))).toBe(true);
      expect(queue.enqueue(text('b'))).toBe(true);
      expect(queue.isFull).toBe(true);

      expect(queue.tryEnqueue(text('c'))).toEqual({ accepted: false, reason: 'full' });
      expect(queue.size).toBe(2);
    });

    it('rejects a duplicate id under deduplication', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('dup'));
      expect(queue.tryEnqueue(text('dup'))).toEqual({ accepted: false, reason: 'duplicate' });
      expect(queue.size).toBe(1);
    });

    it('accepts a duplicate id when deduplication is off', () => {
      const queue = new MessageQueue({ enableDeduplication: false });
      queue.enqueue(text('dup'));
      expect(queue.enqueue(text('dup'))).toBe(true);
      expect(queue.size).toBe(2);
    });

    it('allows an id again once it has been dequeued', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('again'));
      queue.dequeue();
      expect(queue.enqueue(text('again'))).toBe(true);
    });

    it('a zero-capacity queue accepts nothing', () => {
      const queue = new MessageQueue({ maxSize: 0 });
      expect(queue.tryEnqueue(text('x'))).toEqual({ accepted: false, reason: 'full' });
    });

    it('rejects a negative maxSize', () => {
      expect(() => new MessageQueue({ maxSize: -1 })).toThrow(ValidationError);
    });
  });

  describe('priority ordering', () => {
    const control = () => StreamMessage.ping({ id: 'control', createdAt: T0 + 30 });
    const ack = () => text('ack', T0 + 20, { requiresAck: true });
    const plain = () => text('plain', T0 + 10);

    it.each([
      ['control, ack, plain', [control, ack, plain]],
      ['plain, ack, control', [plain, ack, control]],
      ['ack, plain, control', [ack, plain, control]],
      ['plain, control, ack', [plain, control, ack]],
    ])('dequeues control -> ack -> plain when enqueued as %s', (_label, order) => {
      const queue = new MessageQueue();
      for (const make of order) queue.enqueue(make());

      expect([queue.dequeue()?.id, queue.dequeue()?.id, queue.dequeue()?.id]).toEqual(['control', 'ack', 'plain']);
      expect(queue.dequeue()).toBeUndefined();
    });

    it('puts lower retryCount first, then earlier createdAt', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('late', T0 + 100));
      queue.enqueue(text('retried', T0).withRetry());
      queue.enqueue(text('early', T0 + 50));

      expect(ids(queue)).toEqual(['early', 'late', 'retried']);
    });

    it('keeps insertion order for equal keys', () => {
      const queue = new MessageQueue();
      for (const id of ['first', 'second', 'third']) queue.enqueue(text(id, T0));
      expect(ids(queue)).toEqual(['first', 'second', 'third']);
    });

    it('keeps FIFO order when priority is disabled', () => {
      const queue = new MessageQueue({ enablePriority: false });
      queue.enqueue(text('plain'));
      queue.enqueue(StreamMessage.ping({ id: 'control' }));
      expect(ids(queue)).toEqual(['plain', 'control']);
    });

    it('compareMessagePriority returns 0 for equal keys', () => {
      expect(compareMessagePriority(text('a', T0), text('b', T0))).toBe(0);
    });
  });

  describe('lookup and removal', () => {
    it('peek returns the head without removing it', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('head'));
      expect(queue.peek()?.id).toBe('head');
      expect(queue.size).toBe(1);
    });

    it('remove deletes by id and frees the id', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('a'));
      queue.enqueue(text('b'));

      expect(queue.remove('a')).toBe(true);
      expect(queue.remove('missing')).toBe(false);
      expect(queue.has('a')).toBe(false);
      expect(ids(queue)).toEqual(['b']);
    });

    it('returns binary payloads as they were when queued', () => {
      const queue = new MessageQueue();
      const buffer = new Uint8Array([1, 2, 3]);
      queue.enqueue(StreamMessage.binary(buffer, { id: 'bin', createdAt: T0 }));
      buffer[0] = 99;

      expect(queue.dequeue()?.payload).toEqual({ kind: 'binary', bytes: new Uint8Array([1, 2, 3]) });
    });

    it('clear empties the queue', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('a'));
      queue.clear();
      expect(queue.isEmpty).toBe(true);
      expect(queue.has('a')).toBe(false);
    });

    it('messages is a copy', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('a'));
      const snapshot = queue.messages;
      queue.clear();
      expect(snapshot).toHaveLength(1);
    });

    it('filters retryable and ack-required entries', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('no-retries', T0, { maxRetries: 0 }));
      queue.enqueue(text('acked', T0, { requiresAck: true }));

      expect(queue.retryableMessages.map((m) => m.id)).toEqual(['acked']);
      expect(queue.ackRequiredMessages.map((m) => m.id)).toEqual(['acked']);
    });
  });

  describe('updateRetryCount', () => {
    it('bumps the counter and re-sorts', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('a', T0));
      queue.enqueue(text('b', T0 + 1));

      expect(queue.updateRetryCount('a')).toBe(true);
      expect(ids(queue)).toEqual(['b', 'a']);
      expect(queue.messages[1].retryCount).toBe(1);
    });

    it('returns false once retries are exhausted', () => {
      const queue = new MessageQueue();
      queue.enqueue(text('once', T0, { maxRetries: 1 }));
      expect(queue.updateRetryCount('once')).toBe(true);
      expect(queue.updateRetryCount('once')).toBe(false);
      expect(queue.peek()?.retryCount).toBe(1);
    });

    it('returns false for an unknown id', () => {
      expect(new MessageQueue().updateRetryCount('ghost')).toBe(false);
    });
  });

  describe('statistics', () => {
    it('computes utilization and a per-kind breakdown', () => {
      const queue = new MessageQueue({ maxSize: 8 });
      queue.enqueue(text('t1'));
      queue.enqueue(StreamMessage.json({ a: 1 }, { id: 'j1', requiresAck: true }));
      queue.enqueue(StreamMessage.pong({ id: 'p1' }));
      queue.enqueue(text('t2', T0, { maxRetries: 0 }));

      expect(queue.getStatistics()).toEqual({
        size: 4,
        maxSize: 8,
        utilizationPercent: 50,
        isEmpty: false,
        isFull: false,
        retryableCount: 3,
        ackRequiredCount: 1,
        byKind: { text: 2, binary: 0, json: 1, ping: 0, pong: 1 },
        enablePriority: true,
        enableDeduplication: true,
      });
    });
  });

  describe('persistence', () => {
    it('round-trips options and messages in queue order', () => {
      const queue = new MessageQueue({ maxSize: 5, enablePriority: false });
      queue.enqueue(text('x', T0));
      queue.enqueue(StreamMessage.binary(new Uint8Array([5, 6]), { id: 'y', createdAt: T0 }));

      const restored = MessageQueue.fromJSON(JSON.parse(JSON.stringify(queue)));

      expect(restored.maxSize).toBe(5);
      expect(restored.enablePriority).toBe(false);
      expect(ids(restored)).toEqual(['x', 'y']);
      expect(restored.messages[1].equals(queue.messages[1])).toBe(true);
    });

    it('fills missing options with defaults', () => {
      const restored = MessageQueue.fromJSON({ messages: [] });
      expect(restored.maxSize).toBe(1_000);
      expect(restored.enableDeduplication).toBe(true);
    });

    it('rejects more messages than maxSize', () => {
      const json = { maxSize: 1, messages: [text('a').toJSON(), text('b').toJSON()] };
      expect(() => MessageQueue.fromJSON(json)).toThrow('Queue JSON holds more than maxSize (1) messages');
    });

    it('rejects a missing messages array', () => {
      expect(() => MessageQueue.fromJSON({ maxSize: 3 })).toThrow('Queue JSON messages must be an array');
    });
  });
});

describe('queue errors', () => {
  it('QueueFullError', () => {
    const err = new QueueFullError(10);
    expect(err.name).toBe('QueueFullError');
    expect(err.code).toBe(StreamErrorCodes.QUEUE_FULL);
    expect(err.message).toBe('Message queue is full (max 10)');
  });

  it('DuplicateMessageError', () => {
    const err = new DuplicateMessageError('m-7');
    expect(err.code).toBe(StreamErrorCodes.DUPLICATE_MESSAGE);
    expect(err.messageId).toBe('m-7');
  });
});
