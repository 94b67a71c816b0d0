/**
 * Error classes for StreamConnection and transports.
 *
 * @module
 */

import { StreamError, StreamErrorCodes } from '../types/errors.js';
import type { ConnectionState } from './types.js';

/**
 * The transport could not be opened, timed out, or failed while connected.
 */
export class ConnectionFailedError extends StreamError {
  public readonly reason: string;

  constructor(reason: string, cause?: unknown) {
    super(`Connection failed: ${reason}`, StreamErrorCodes.CONNECTION_FAILED, { cause });
    this.name = 'ConnectionFailedError';
    this.reason = reason;
  }
}

/**
 * An operation that needs an open connection was attempted in another state.
 */
export class NotConnectedError extends StreamError {
  public readonly state: ConnectionState;

  constructor(state: ConnectionState) {
    super(`Not connected (state: ${state})`, StreamErrorCodes.NOT_CONNECTED);
    this.name = 'NotConnectedError';
    this.state = state;
  }
}

/**
 * The transport rejected an outbound frame.
 */
export class MessageSendFailedError extends StreamError {
  public readonly reason: string;
  public readonly messageId?: string;

  constructor(reason: string, messageId?: string, cause?: unknown) {
    super(
      messageId ? `Failed to send message ${messageId}: ${reason}` : `Failed to send message: ${reason}`,
      StreamErrorCodes.MESSAGE_SEND_FAILED,
      { cause },
    );
    this.name = 'MessageSendFailedError';
    this.reason = reason;
    this.messageId = messageId;
  }
}

/**
 * A timed operation did not finish in time.
 */
export class StreamTimeoutError extends StreamError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, StreamErrorCodes.TIMEOUT);
    this.name = 'StreamTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Failure inside a transport implementation (missing package, socket error).
 */
export class TransportError extends StreamError {
  constructor(message: string, cause?: unknown) {
    super(message, StreamErrorCodes.TRANSPORT_ERROR, { cause });
    this.name = 'TransportError';
  }
}
