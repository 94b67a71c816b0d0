/**
 * Stream manager: connection lifecycle, reconnection and queue draining.
 *
 * @module
 */

export type {
  ManagerState,
  ManagerStateSnapshot,
  ManagerEvent,
  ManagerEventType,
  ManagerStatistics,
  StreamManagerOptions,
} from './types.js';
export { StreamManager } from './manager.js';
export { ReconnectionFailedError } from './errors.js';
