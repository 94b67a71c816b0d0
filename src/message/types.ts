/**
 * Message payload types.
 *
 * @module
 */

// ============================================================================
// JSON documents
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Structured payload body: a JSON object or array. */
export type JsonDocument = JsonObject | JsonValue[];

// ============================================================================
// Payload
// ============================================================================

/** Literal tokens carried by heartbeat control frames. */
export type ControlToken = 'ping' | 'pong';

export type MessagePayload =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'binary'; readonly bytes: Uint8Array }
  | { readonly kind: 'json'; readonly value: JsonDocument }
  | { readonly kind: 'control'; readonly token: ControlToken };

/** Flat message kind tag; control payloads are split into ping and pong. */
export type MessageKind = 'text' | 'binary' | 'json' | ControlToken;

export const MESSAGE_KINDS: readonly MessageKind[] = ['text', 'binary', 'json', 'ping', 'pong'];

/** Options shared by the message factories. */
export interface MessageOptions {
  /** Explicit id; a UUID is generated when omitted. */
  readonly id?: string;
  /** Creation time in epoch ms (default: now). */
  readonly createdAt?: number;
  readonly requiresAck?: boolean;
  readonly maxRetries?: number;
}

export interface MessageInit extends MessageOptions {
  readonly payload: MessagePayload;
  readonly retryCount?: number;
}

/** Interchange form produced by `StreamMessage.toJSON()`. */
export interface StreamMessageJSON {
  id: string;
  kind: MessageKind;
  /** Text, base64 bytes, JSON document, or control token. */
  data: JsonValue;
  /** ISO-8601 creation time. */
  createdAt: string;
  requiresAck: boolean;
  retryCount: number;
  maxRetries: number;
}

// ============================================================================
// Guards
// ============================================================================

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

export function isJsonDocument(value: unknown): value is JsonDocument {
  return typeof value === 'object' && value !== null && isJsonValue(value);
}

/** Structural equality for JSON values; object key order is ignored. */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => jsonEquals(item, b[i]));
  }
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => key in b && jsonEquals(a[key], b[key]));
}
