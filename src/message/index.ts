/**
 * Message module: the immutable message value and its wire codec.
 *
 * @module
 */

export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  JsonDocument,
  ControlToken,
  MessagePayload,
  MessageKind,
  MessageOptions,
  MessageInit,
  StreamMessageJSON,
} from './types.js';
export { MESSAGE_KINDS, isJsonValue, isJsonDocument, jsonEquals } from './types.js';

export { StreamMessage, DEFAULT_MAX_RETRIES } from './message.js';

export { encodeFrame, decodeFrame } from './codec.js';
export type { Frame } from './codec.js';
