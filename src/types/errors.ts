/**
 * Error types and utilities for wirestream
 *
 * Every error raised by the client derives from {@link StreamError} and
 * carries a string code from {@link StreamErrorCodes}. Module-specific
 * subclasses live beside their module (`connection/errors.ts`, ...).
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * String error codes for stream client errors.
 */
export const StreamErrorCodes = {
  /** Transport could not be opened, timed out or failed while connected */
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  /** Operation requires an open connection */
  NOT_CONNECTED: 'NOT_CONNECTED',
  /** Transport rejected an outbound frame */
  MESSAGE_SEND_FAILED: 'MESSAGE_SEND_FAILED',
  /** Reconnection campaign gave up */
  RECONNECTION_FAILED: 'RECONNECTION_FAILED',
  /** A timed operation did not complete */
  TIMEOUT: 'TIMEOUT',
  /** Outbound queue is at capacity */
  QUEUE_FULL: 'QUEUE_FULL',
  /** A message with the same id is already queued */
  DUPLICATE_MESSAGE: 'DUPLICATE_MESSAGE',
  /** Transport implementation failure (missing package, socket error) */
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  /** Input validation failed */
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

/** Union type of all stream error code values */
export type StreamErrorCode = (typeof StreamErrorCodes)[keyof typeof StreamErrorCodes];

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all wirestream errors.
 *
 * @example
 * ```typescript
 * try {
 *   await connection.send(message);
 * } catch (err) {
 *   if (isStreamError(err) && err.code === StreamErrorCodes.NOT_CONNECTED) {
 *     queue.enqueue(message);
 *   }
 * }
 * ```
 */
export class StreamError extends Error {
  /** The error code identifying this error type */
  public readonly code: StreamErrorCode;

  constructor(message: string, code: StreamErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
    this.code = code;
    // Using this.constructor hides subclass constructors from the stack.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when input (a config, a decoded message) is malformed.
 */
export class ValidationError extends StreamError {
  constructor(message: string) {
    super(message, StreamErrorCodes.VALIDATION_ERROR);
    this.name = 'ValidationError';
  }
}

/**
 * Type guard to check if an error is a StreamError.
 */
export function isStreamError(error: unknown): error is StreamError {
  return error instanceof StreamError;
}
