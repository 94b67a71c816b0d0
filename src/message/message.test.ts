import { describe, it, expect } from 'vitest';
import { StreamMessage, DEFAULT_MAX_RETRIES } from './message.js';
import { StreamErrorCodes, ValidationError } from '../types/errors.js';

const CREATED_AT = Date.parse('2026-03-01T10:00:00.000Z');

describe('StreamMessage', () => {
  describe('factories', () => {
    it('creates a text message with defaults', () => {
      const msg = StreamMessage.text('hello');
      expect(msg.kind).toBe('text');
      expect(msg.payload).toEqual({ kind: 'text', text: 'hello' });
      expect(msg.requiresAck).toBe(false);
      expect(msg.retryCount).toBe(0);
      expect(msg.maxRetries).toBe(DEFAULT_MAX_RETRIES);
      expect(msg.id.length).toBeGreaterThan(0);
    });

    it('generates distinct ids', () => {
      expect(StreamMessage.text('a').id).not.toBe(StreamMessage.text('a').id);
    });

    it('keeps a supplied id and creation time', () => {
      const msg = StreamMessage.binary(new Uint8Array([1, 2]), { id: 'bin-1', createdAt: CREATED_AT });
      expect(msg.id).toBe('bin-1');
      expect(msg.createdAt).toBe(CREATED_AT);
      expect(msg.isBinary).toBe(true);
    });

    it('copies binary payloads so later writes to the source buffer do not leak in', () => {
      const buffer = new Uint8Array([1, 2, 3]);
      const msg = StreamMessage.binary(buffer, { id: 'bin-2', createdAt: CREATED_AT });
      buffer[0] = 99;

      expect(msg.payload).toEqual({ kind: 'binary', bytes: new Uint8Array([1, 2, 3]) });
    });

    it('tags ping and pong as control messages', () => {
      const ping = StreamMessage.ping();
      const pong = StreamMessage.pong();
      expect(ping.kind).toBe('ping');
      expect(pong.kind).toBe('pong');
      expect(ping.isControl).toBe(true);
      expect(pong.isControl).toBe(true);
      expect(ping.requiresAck).toBe(false);
    });

    it('json factory marks requiresAck when asked', () => {
      const msg = StreamMessage.json({ op: 'subscribe' }, { requiresAck: true });
      expect(msg.isJson).toBe(true);
      expect(msg.requiresAck).toBe(true);
    });
  });

  describe('invariants', () => {
    it('rejects retryCount above maxRetries', () => {
      expect(
        () => new StreamMessage({ payload: { kind: 'text', text: 'x' }, retryCount: 2, maxRetries: 1 }),
      ).toThrow(ValidationError);
    });

    it('rejects a negative maxRetries', () => {
      expect(() => StreamMessage.text('x', { maxRetries: -1 })).toThrow(ValidationError);
    });

    it('rejects an empty id', () => {
      expect(() => StreamMessage.text('x', { id: '' })).toThrow('Message id must be a non-empty string');
    });
  });

  describe('withRetry', () => {
    it('returns a copy with retryCount + 1 and leaves the original untouched', () => {
      const original = StreamMessage.text('retry me', { id: 'r-1', createdAt: CREATED_AT, maxRetries: 2 });
      const retried = original.withRetry();

      expect(retried).not.toBe(original);
      expect(retried.retryCount).toBe(1);
      expect(original.retryCount).toBe(0);
      expect(retried.id).toBe('r-1');
      expect(retried.createdAt).toBe(CREATED_AT);
      expect(retried.payload).toBe(original.payload);
    });

    it('canRetry turns false at the ceiling and withRetry then throws', () => {
      const msg = StreamMessage.text('x', { maxRetries: 1 }).withRetry();
      expect(msg.canRetry).toBe(false);
      expect(() => msg.withRetry()).toThrow(ValidationError);
      expect(() => msg.withRetry()).toThrow(
        expect.objectContaining({ code: StreamErrorCodes.VALIDATION_ERROR }),
      );
    });

    it('a message with maxRetries 0 can never retry', () => {
      expect(StreamMessage.text('x', { maxRetries: 0 }).canRetry).toBe(false);
    });
  });

  describe('interchange form', () => {
    it('encodes every field', () => {
      const msg = StreamMessage.text('hi', { id: 't-1', createdAt: CREATED_AT, requiresAck: true });
      expect(msg.toJSON()).toEqual({
        id: 't-1',
        kind: 'text',
        data: 'hi',
        createdAt: '2026-03-01T10:00:00.000Z',
        requiresAck: true,
        retryCount: 0,
        maxRetries: 3,
      });
    });

    it('encodes binary payloads as base64', () => {
      const msg = StreamMessage.binary(new Uint8Array([104, 105]), { id: 'b-1', createdAt: CREATED_AT });
      expect(msg.toJSON().data).toBe('aGk=');
    });

    it.each([
      ['text', StreamMessage.text('plain text', { id: 'm-text', createdAt: CREATED_AT, requiresAck: true })],
      ['binary', StreamMessage.binary(new Uint8Array([0, 127, 255]), { id: 'm-bin', createdAt: CREATED_AT })],
      ['json', StreamMessage.json({ a: 1, nested: { list: [true, null, 'x'] } }, { id: 'm-json', createdAt: CREATED_AT })],
      ['ping', StreamMessage.ping({ id: 'm-ping', createdAt: CREATED_AT })],
    ])('round-trips a %s message', (_kind, msg) => {
      const decoded = StreamMessage.fromJSON(JSON.parse(JSON.stringify(msg)));
      expect(decoded.equals(msg)).toBe(true);
      expect(decoded.kind).toBe(msg.kind);
    });

    it('round-trips the retry counter', () => {
      const msg = StreamMessage.text('x', { id: 'm-r', createdAt: CREATED_AT, maxRetries: 5 }).withRetry().withRetry();
      const decoded = StreamMessage.fromJSON(msg.toJSON());
      expect(decoded.retryCount).toBe(2);
      expect(decoded.maxRetries).toBe(5);
    });

    it('falls back to defaults for missing optional fields', () => {
      const decoded = StreamMessage.fromJSON({ id: 'min-1', kind: 'text', data: 'hello' });
      expect(decoded.requiresAck).toBe(false);
      expect(decoded.retryCount).toBe(0);
      expect(decoded.maxRetries).toBe(3);
      expect(Number.isFinite(decoded.createdAt)).toBe(true);
    });

    it('rejects an unknown kind', () => {
      expect(() => StreamMessage.fromJSON({ id: 'x', kind: 'video', data: '' })).toThrow(
        'Message JSON kind must be one of: text, binary, json, ping, pong',
      );
    });

    it('rejects json data that is not a document', () => {
      expect(() => StreamMessage.fromJSON({ id: 'x', kind: 'json', data: 42 })).toThrow(ValidationError);
    });

    it('rejects a malformed createdAt', () => {
      expect(() =>
        StreamMessage.fromJSON({ id: 'x', kind: 'text', data: 'a', createdAt: 'yesterday' }),
      ).toThrow('Message JSON createdAt must be an ISO-8601 string');
    });

    it('rejects a non-object', () => {
      expect(() => StreamMessage.fromJSON('nope')).toThrow('Message JSON must be a non-null object');
    });
  });

  describe('equals', () => {
    it('ignores JSON key order', () => {
      const a = StreamMessage.json({ x: 1, y: 2 }, { id: 'e', createdAt: CREATED_AT });
      const b = StreamMessage.json({ y: 2, x: 1 }, { id: 'e', createdAt: CREATED_AT });
      expect(a.equals(b)).toBe(true);
    });

    it('detects differing bytes', () => {
      const a = StreamMessage.binary(new Uint8Array([1, 2]), { id: 'e', createdAt: CREATED_AT });
      const b = StreamMessage.binary(new Uint8Array([1, 3]), { id: 'e', createdAt: CREATED_AT });
      expect(a.equals(b)).toBe(false);
    });
  });
});
