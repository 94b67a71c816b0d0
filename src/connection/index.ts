/**
 * Connection module: transport contract, state machine and heartbeat.
 *
 * @module
 */

export type {
  ConnectionState,
  ConnectionEvent,
  ConnectionEventType,
  ConnectionStatistics,
  StreamConnectionOptions,
} from './types.js';
export { isActiveState, isTerminalState, canSendInState, describeState } from './types.js';

export type {
  Transport,
  TransportSession,
  TransportHandlers,
  TransportOpenOptions,
} from './transport.js';

export {
  ConnectionFailedError,
  NotConnectedError,
  MessageSendFailedError,
  StreamTimeoutError,
  TransportError,
} from './errors.js';

export { StreamConnection, HEARTBEAT_TIMEOUT_MESSAGE } from './connection.js';
export { WsTransport } from './ws-transport.js';
