/**
 * Utility exports for wirestream
 * @module
 */

export { createLogger, scopeLogger, parseLogLevel, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export { Broadcast } from './broadcast.js';
export type { Listener } from './broadcast.js';

export { toErrorMessage, toError } from './async.js';

export { ensureLazyModule } from './lazy-import.js';

export { isRecord, isStringArray, isStringRecord } from './type-guards.js';

export { validationResult } from './validation.js';
export type { ValidationResult } from './validation.js';
