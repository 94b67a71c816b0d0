/**
 * Wire codec between {@link StreamMessage} and transport frames.
 *
 * @module
 */

import { StreamMessage } from './message.js';
import { isJsonDocument } from './types.js';

/** A single transport frame: text or raw bytes. */
export type Frame = string | Uint8Array;

/**
 * Encode a message for the wire. Structured payloads always go through
 * `JSON.stringify`; control messages become their literal token.
 */
export function encodeFrame(message: StreamMessage): Frame {
  const { payload } = message;
  switch (payload.kind) {
    case 'text':
      return payload.text;
    case 'binary':
      return payload.bytes;
    case 'json':
      return JSON.stringify(payload.value);
    case 'control':
      return payload.token;
  }
}

/**
 * Decode an inbound frame. Never throws: text that looks like JSON but
 * fails to parse stays a text message.
 */
export function decodeFrame(frame: Frame): StreamMessage {
  if (typeof frame !== 'string') {
    return StreamMessage.binary(frame);
  }

  if (frame === 'ping' || frame === 'pong') {
    return StreamMessage.control(frame);
  }

  const trimmed = frame.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const parsed = tryParseJson(trimmed);
    if (isJsonDocument(parsed)) {
      return StreamMessage.json(parsed);
    }
  }

  return StreamMessage.text(frame);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
