/**
 * Immutable outbound/inbound message value.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../types/errors.js';
import { isRecord } from '../utils/type-guards.js';
import {
  MESSAGE_KINDS,
  isJsonDocument,
  jsonEquals,
  type ControlToken,
  type JsonDocument,
  type JsonValue,
  type MessageInit,
  type MessageKind,
  type MessageOptions,
  type MessagePayload,
  type StreamMessageJSON,
} from './types.js';

/** Retry ceiling applied when none is given. */
export const DEFAULT_MAX_RETRIES = 3;

const VALID_KINDS: ReadonlySet<string> = new Set<string>(MESSAGE_KINDS);

/**
 * A single message travelling over the stream.
 *
 * Instances never change; {@link StreamMessage.withRetry} returns a copy with
 * the retry counter bumped.
 *
 * @example
 * ```typescript
 * const order = StreamMessage.json({ op: 'subscribe', channel: 'trades' }, { requiresAck: true });
 * await manager.send(order);
 * ```
 */
export class StreamMessage {
  readonly id: string;
  readonly payload: MessagePayload;
  /** Creation time in epoch ms. */
  readonly createdAt: number;
  readonly requiresAck: boolean;
  readonly retryCount: number;
  readonly maxRetries: number;

  constructor(init: MessageInit) {
    const id = init.id ?? randomUUID();
    const createdAt = init.createdAt ?? Date.now();
    const retryCount = init.retryCount ?? 0;
    const maxRetries = init.maxRetries ?? DEFAULT_MAX_RETRIES;

    if (id.length === 0) {
      throw new ValidationError('Message id must be a non-empty string');
    }
    if (!Number.isFinite(createdAt)) {
      throw new ValidationError('Message createdAt must be a finite timestamp');
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ValidationError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }
    if (!Number.isInteger(retryCount) || retryCount < 0 || retryCount > maxRetries) {
      throw new ValidationError(
        `retryCount must be an integer between 0 and maxRetries (${maxRetries}), got ${retryCount}`,
      );
    }

    this.id = id;
    // Binary payloads are copied so the caller can reuse its buffer.
    this.payload =
      init.payload.kind === 'binary'
        ? { kind: 'binary', bytes: new Uint8Array(init.payload.bytes) }
        : init.payload;
    this.createdAt = createdAt;
    this.requiresAck = init.payload.kind === 'control' ? false : init.requiresAck ?? false;
    this.retryCount = retryCount;
    this.maxRetries = maxRetries;
  }

  // --------------------------------------------------------------------------
  // Factories
  // --------------------------------------------------------------------------

  static text(text: string, options: MessageOptions = {}): StreamMessage {
    return new StreamMessage({ ...options, payload: { kind: 'text', text } });
  }

  static binary(bytes: Uint8Array, options: MessageOptions = {}): StreamMessage {
    return new StreamMessage({ ...options, payload: { kind: 'binary', bytes } });
  }

  static json(value: JsonDocument, options: MessageOptions = {}): StreamMessage {
    return new StreamMessage({ ...options, payload: { kind: 'json', value } });
  }

  static ping(options: Omit<MessageOptions, 'requiresAck'> = {}): StreamMessage {
    return StreamMessage.control('ping', options);
  }

  static pong(options: Omit<MessageOptions, 'requiresAck'> = {}): StreamMessage {
    return StreamMessage.control('pong', options);
  }

  static control(token: ControlToken, options: Omit<MessageOptions, 'requiresAck'> = {}): StreamMessage {
    return new StreamMessage({ ...options, payload: { kind: 'control', token } });
  }

  // --------------------------------------------------------------------------
  // Derived
  // --------------------------------------------------------------------------

  get kind(): MessageKind {
    return this.payload.kind === 'control' ? this.payload.token : this.payload.kind;
  }

  get canRetry(): boolean {
    return this.retryCount < this.maxRetries;
  }

  get isControl(): boolean {
    return this.payload.kind === 'control';
  }

  get isText(): boolean {
    return this.payload.kind === 'text';
  }

  get isBinary(): boolean {
    return this.payload.kind === 'binary';
  }

  get isJson(): boolean {
    return this.payload.kind === 'json';
  }

  /** Copy of this message with `retryCount + 1`. */
  withRetry(): StreamMessage {
    if (!this.canRetry) {
      throw new ValidationError(
        `Message ${this.id} has exhausted its retries (${this.retryCount}/${this.maxRetries})`,
      );
    }
    return new StreamMessage({
      id: this.id,
      payload: this.payload,
      createdAt: this.createdAt,
      requiresAck: this.requiresAck,
      retryCount: this.retryCount + 1,
      maxRetries: this.maxRetries,
    });
  }

  equals(other: StreamMessage): boolean {
    return (
      this.id === other.id &&
      this.createdAt === other.createdAt &&
      this.requiresAck === other.requiresAck &&
      this.retryCount === other.retryCount &&
      this.maxRetries === other.maxRetries &&
      payloadEquals(this.payload, other.payload)
    );
  }

  toString(): string {
    return `StreamMessage(id: ${this.id}, kind: ${this.kind}, retry: ${this.retryCount}/${this.maxRetries})`;
  }

  // --------------------------------------------------------------------------
  // Interchange form
  // --------------------------------------------------------------------------

  toJSON(): StreamMessageJSON {
    return {
      id: this.id,
      kind: this.kind,
      data: payloadData(this.payload),
      createdAt: new Date(this.createdAt).toISOString(),
      requiresAck: this.requiresAck,
      retryCount: this.retryCount,
      maxRetries: this.maxRetries,
    };
  }

  /**
   * Decode the interchange form. `requiresAck`, `retryCount`, `maxRetries`
   * and `createdAt` fall back to their defaults when absent.
   *
   * @throws ValidationError when a required field is missing or malformed
   */
  static fromJSON(json: unknown): StreamMessage {
    if (!isRecord(json)) {
      throw new ValidationError('Message JSON must be a non-null object');
    }
    if (typeof json.id !== 'string' || json.id.length === 0) {
      throw new ValidationError('Message JSON id must be a non-empty string');
    }
    if (typeof json.kind !== 'string' || !VALID_KINDS.has(json.kind)) {
      throw new ValidationError(`Message JSON kind must be one of: ${MESSAGE_KINDS.join(', ')}`);
    }

    let createdAt: number | undefined;
    if (json.createdAt !== undefined) {
      createdAt = typeof json.createdAt === 'string' ? Date.parse(json.createdAt) : Number.NaN;
      if (Number.isNaN(createdAt)) {
        throw new ValidationError('Message JSON createdAt must be an ISO-8601 string');
      }
    }

    return new StreamMessage({
      id: json.id,
      payload: decodePayload(json.kind, json.data),
      createdAt,
      requiresAck: optional(json.requiresAck, 'boolean', 'requiresAck'),
      retryCount: optional(json.retryCount, 'number', 'retryCount'),
      maxRetries: optional(json.maxRetries, 'number', 'maxRetries'),
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function payloadData(payload: MessagePayload): JsonValue {
  switch (payload.kind) {
    case 'text':
      return payload.text;
    case 'binary':
      return Buffer.from(payload.bytes).toString('base64');
    case 'json':
      return payload.value;
    case 'control':
      return payload.token;
  }
}

function decodePayload(kind: string, data: unknown): MessagePayload {
  switch (kind) {
    case 'text':
      if (typeof data !== 'string') throw new ValidationError('text message data must be a string');
      return { kind: 'text', text: data };
    case 'binary':
      if (typeof data !== 'string') {
        throw new ValidationError('binary message data must be a base64 string');
      }
      return { kind: 'binary', bytes: new Uint8Array(Buffer.from(data, 'base64')) };
    case 'json':
      if (!isJsonDocument(data)) {
        throw new ValidationError('json message data must be a JSON object or array');
      }
      return { kind: 'json', value: data };
    case 'ping':
    case 'pong':
      return { kind: 'control', token: kind };
    default:
      throw new ValidationError(`Unknown message kind: ${kind}`);
  }
}

function optional(value: unknown, type: 'boolean', field: string): boolean | undefined;
function optional(value: unknown, type: 'number', field: string): number | undefined;
function optional(value: unknown, type: 'boolean' | 'number', field: string): boolean | number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean' && type === 'boolean') return value;
  if (typeof value === 'number' && type === 'number') return value;
  throw new ValidationError(`Message JSON ${field} must be a ${type}`);
}

function payloadEquals(a: MessagePayload, b: MessagePayload): boolean {
  switch (a.kind) {
    case 'text':
      return b.kind === 'text' && a.text === b.text;
    case 'binary':
      return b.kind === 'binary' && bytesEqual(a.bytes, b.bytes);
    case 'json':
      return b.kind === 'json' && jsonEquals(a.value, b.value);
    case 'control':
      return b.kind === 'control' && a.token === b.token;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
