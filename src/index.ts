/**
 * wirestream - resilient bidirectional message streams
 *
 * Main entry point. Re-exports the manager, the connection state machine,
 * reconnection strategies, the message queue and their supporting types.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Errors
export { StreamError, StreamErrorCodes, ValidationError, isStreamError } from './types/errors.js';
export type { StreamErrorCode } from './types/errors.js';

// Messages
export * from './message/index.js';

// Configuration
export * from './config/index.js';

// Connection
export * from './connection/index.js';

// Reconnection
export * from './reconnection/index.js';

// Queue
export * from './queue/index.js';

// Manager
export * from './manager/index.js';

// Utilities
export { createLogger, scopeLogger, parseLogLevel, silentLogger, Broadcast } from './utils/index.js';
export type { Logger, LogLevel, Listener, ValidationResult } from './utils/index.js';
