/**
 * Error classes for StreamManager.
 *
 * @module
 */

import { StreamError, StreamErrorCodes } from '../types/errors.js';

/**
 * A reconnection campaign ran out of attempts.
 */
export class ReconnectionFailedError extends StreamError {
  public readonly reason: string;
  public readonly attempts: number;

  constructor(reason: string, attempts: number) {
    super(`Reconnection failed after ${attempts} attempt(s): ${reason}`, StreamErrorCodes.RECONNECTION_FAILED);
    this.name = 'ReconnectionFailedError';
    this.reason = reason;
    this.attempts = attempts;
  }
}
