/**
 * StreamConnection: one transport session, its state machine and heartbeat.
 *
 * A connection never reconnects by itself. Once it reaches `closed` or
 * `failed` it stays there until `connect()` is called again; recovery is
 * the manager's job.
 *
 * @module
 */

import type { StreamConfig } from '../config/types.js';
import { decodeFrame, encodeFrame, type Frame } from '../message/codec.js';
import { StreamMessage } from '../message/message.js';
import type { JsonDocument, MessageOptions } from '../message/types.js';
import { Broadcast } from '../utils/broadcast.js';
import { toErrorMessage } from '../utils/async.js';
import { scopeLogger, silentLogger, type Logger } from '../utils/logger.js';
import {
  ConnectionFailedError,
  MessageSendFailedError,
  NotConnectedError,
  StreamTimeoutError,
} from './errors.js';
import type { Transport, TransportHandlers, TransportOpenOptions, TransportSession } from './transport.js';
import {
  canSendInState,
  isTerminalState,
  type ConnectionEvent,
  type ConnectionState,
  type ConnectionStatistics,
  type StreamConnectionOptions,
} from './types.js';

export const HEARTBEAT_TIMEOUT_MESSAGE = 'Heartbeat timeout - no pong received';

export class StreamConnection {
  /** Every state transition, in order. */
  readonly stateChanges: Broadcast<ConnectionState>;
  /** Inbound non-control messages. */
  readonly messages: Broadcast<StreamMessage>;
  readonly events: Broadcast<ConnectionEvent>;

  private readonly config: StreamConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;

  private _state: ConnectionState = 'initial';
  private lastStateChangeAt = Date.now();
  private session: TransportSession | null = null;
  /** Bumped on every connect/teardown; stale transport callbacks compare against it. */
  private generation = 0;
  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private abortOpen: ((reason: Error) => void) | null = null;
  private sendChain: Promise<void> = Promise.resolve();
  private disposed = false;

  private messagesSent = 0;
  private messagesReceived = 0;
  private errorsCount = 0;
  private pingsSent = 0;
  private pongsReceived = 0;
  private connectionStartedAt: number | null = null;
  private lastMessageAt: number | null = null;
  private lastPingAt: number | null = null;
  private lastPongAt: number | null = null;
  private heartbeatLatencyMs: number | null = null;

  constructor(options: StreamConnectionOptions) {
    this.config = options.config;
    this.transport = options.transport;
    this.logger = scopeLogger(options.logger ?? silentLogger, 'connection');
    this.stateChanges = new Broadcast<ConnectionState>('connection.stateChanges', this.logger);
    this.messages = new Broadcast<StreamMessage>('connection.messages', this.logger);
    this.events = new Broadcast<ConnectionEvent>('connection.events', this.logger);
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  get canSend(): boolean {
    return canSendInState(this._state);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Open a transport session. Resolves once connected; a no-op while
   * connecting or connected.
   *
   * @throws ConnectionFailedError on open failure or timeout
   */
  async connect(): Promise<void> {
    if (this.disposed) {
      throw new ConnectionFailedError('connection has been disposed');
    }
    if (this._state === 'connecting' || this._state === 'connected') return;

    const generation = ++this.generation;
    this.setState('connecting');

    const { url, connectionTimeoutMs } = this.config;
    this.logger.debug(`Connecting to ${url}`);

    let session: TransportSession;
    try {
      session = await this.openWithTimeout(generation, url, this.openOptions(), connectionTimeoutMs);
    } catch (err) {
      if (!this.isCurrent(generation)) {
        throw new ConnectionFailedError('connection attempt was superseded', err);
      }
      const reason = toErrorMessage(err);
      this.logger.warn(`Connection to ${url} failed: ${reason}`);
      this.setState('failed');
      this.publishEvent({ type: 'connectionFailed', timestamp: Date.now(), reason });
      throw new ConnectionFailedError(reason, err);
    }

    if (!this.isCurrent(generation)) {
      this.closeSession(session);
      throw new ConnectionFailedError('connection attempt was superseded');
    }

    this.session = session;
    this.connectionStartedAt = Date.now();
    if (this.config.enableHeartbeat) {
      this.startHeartbeat();
    }
    this.setState('connected');
    this.logger.info(`Connected to ${url}`);
    this.publishEvent({ type: 'connected', timestamp: Date.now() });
  }

  /** Close the session. A no-op once closed or failed. */
  async disconnect(): Promise<void> {
    if (isTerminalState(this._state)) return;

    this.setState('closing');
    this.generation++;
    this.clearTimers();
    this.abortOpen?.(new ConnectionFailedError('disconnected while connecting'));

    const session = this.session;
    this.session = null;
    if (session) {
      try {
        await session.close(1000, 'client disconnect');
      } catch (err) {
        this.logger.warn(`Error closing session: ${toErrorMessage(err)}`);
      }
    }

    this.connectionStartedAt = null;
    this.setState('closed');
    this.publishEvent({ type: 'disconnected', timestamp: Date.now(), reason: 'client disconnect' });
  }

  /**
   * Disconnect and release every resource. Safe to call more than once;
   * transport callbacks arriving afterwards are dropped.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    try {
      await this.disconnect();
    } finally {
      this.disposed = true;
      this.clearTimers();
      this.stateChanges.close();
      this.messages.close();
      this.events.close();
    }
  }

  // --------------------------------------------------------------------------
  // Sending
  // --------------------------------------------------------------------------

  /**
   * Hand a message to the transport. Sends run one at a time in call order.
   *
   * @throws NotConnectedError unless connected
   * @throws MessageSendFailedError when the transport rejects the frame
   */
  send(message: StreamMessage): Promise<void> {
    const task = this.sendChain.then(() => this.sendNow(message));
    this.sendChain = task.then(
      () => undefined,
      () => undefined,
    );
    return task;
  }

  sendText(text: string, options?: MessageOptions): Promise<void> {
    return this.send(StreamMessage.text(text, options));
  }

  sendBinary(bytes: Uint8Array, options?: MessageOptions): Promise<void> {
    return this.send(StreamMessage.binary(bytes, options));
  }

  sendJson(value: JsonDocument, options?: MessageOptions): Promise<void> {
    return this.send(StreamMessage.json(value, options));
  }

  sendPing(): Promise<void> {
    return this.send(StreamMessage.ping());
  }

  sendPong(): Promise<void> {
    return this.send(StreamMessage.pong());
  }

  private async sendNow(message: StreamMessage): Promise<void> {
    const session = this.session;
    if (!canSendInState(this._state) || session === null) {
      throw new NotConnectedError(this._state);
    }

    try {
      await session.send(encodeFrame(message));
    } catch (err) {
      this.errorsCount++;
      throw new MessageSendFailedError(toErrorMessage(err), message.id, err);
    }

    const now = Date.now();
    this.messagesSent++;
    this.lastMessageAt = now;
    if (message.kind === 'ping') {
      this.pingsSent++;
      this.lastPingAt = now;
    }
    this.publishEvent({ type: 'messageSent', timestamp: now, message });
  }

  // --------------------------------------------------------------------------
  // Statistics
  // --------------------------------------------------------------------------

  getStatistics(): ConnectionStatistics {
    const now = Date.now();
    return {
      state: this._state,
      lastStateChangeAt: this.lastStateChangeAt,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      errorsCount: this.errorsCount,
      pingsSent: this.pingsSent,
      pongsReceived: this.pongsReceived,
      connectionStartedAt: this.connectionStartedAt,
      connectionDurationMs: this.connectionStartedAt === null ? null : now - this.connectionStartedAt,
      lastMessageAt: this.lastMessageAt,
      timeSinceLastMessageMs: this.lastMessageAt === null ? null : now - this.lastMessageAt,
      lastPingAt: this.lastPingAt,
      lastPongAt: this.lastPongAt,
      heartbeatLatencyMs: this.heartbeatLatencyMs,
      heartbeatHealth: this.pingsSent === 0 ? null : (this.pongsReceived / this.pingsSent) * 100,
    };
  }

  // --------------------------------------------------------------------------
  // Transport plumbing
  // --------------------------------------------------------------------------

  private openOptions(): TransportOpenOptions {
    const { protocols, headers } = this.config;
    if (this.transport.supportsHeaders) {
      return { protocols, headers };
    }
    const dropped = Object.keys(headers).length;
    if (dropped > 0) {
      this.logger.debug(`Transport does not support custom headers; dropping ${dropped} header(s)`);
    }
    return { protocols };
  }

  private openWithTimeout(
    generation: number,
    url: string,
    options: TransportOpenOptions,
    timeoutMs: number,
  ): Promise<TransportSession> {
    const handlers = this.createHandlers(generation);

    const controller = new AbortController();
    const attemptOptions: TransportOpenOptions = {
      ...options,
      signal: controller.signal,
      handshakeTimeoutMs: timeoutMs,
    };

    return new Promise<TransportSession>((resolve, reject) => {
      let settled = false;
      const fail = (err: unknown) => {
        if (settled) return;
        settled = true;
        this.clearConnectTimer();
        this.abortOpen = null;
        controller.abort();
        reject(err);
      };
      this.abortOpen = fail;

      this.connectTimer = setTimeout(() => {
        this.connectTimer = null;
        fail(new StreamTimeoutError('Connection', timeoutMs));
      }, timeoutMs);

      void Promise.resolve()
        .then(() => this.transport.open(url, attemptOptions, handlers))
        .then(
          (session) => {
            if (settled) {
              // Opened after the timeout fired or the attempt was aborted.
              this.closeSession(session);
              return;
            }
            settled = true;
            this.clearConnectTimer();
            this.abortOpen = null;
            resolve(session);
          },
          fail,
        );
    });
  }

  private createHandlers(generation: number): TransportHandlers {
    return {
      onFrame: (frame) => {
        if (this.isCurrent(generation)) this.handleFrame(frame);
      },
      onClose: (code, reason) => {
        if (this.isCurrent(generation)) this.handleTransportClose(code, reason);
      },
      onError: (error) => {
        if (this.isCurrent(generation)) this.handleTransportError(error);
      },
    };
  }

  private handleFrame(frame: Frame): void {
    if (this._state !== 'connected') {
      this.logger.debug(`Dropping frame received in state ${this._state}`);
      return;
    }

    const message = decodeFrame(frame);
    const now = Date.now();
    this.messagesReceived++;
    this.lastMessageAt = now;

    switch (message.kind) {
      case 'ping':
        void this.sendPong().catch((err: unknown) => {
          this.logger.warn(`Failed to answer ping: ${toErrorMessage(err)}`);
        });
        return;
      case 'pong':
        this.pongsReceived++;
        this.lastPongAt = now;
        if (this.lastPingAt !== null) {
          this.heartbeatLatencyMs = now - this.lastPingAt;
        }
        return;
      default:
        this.messages.publish(message);
        this.publishEvent({ type: 'messageReceived', timestamp: now, message });
    }
  }

  private handleTransportClose(code?: number, reason?: string): void {
    if (this._state !== 'connected') return;

    this.logger.info(`Transport closed (code: ${code ?? 'none'}, reason: ${reason || 'none'})`);
    this.generation++;
    this.clearTimers();
    this.session = null;
    this.connectionStartedAt = null;
    this.setState('closed');
    this.publishEvent({ type: 'disconnected', timestamp: Date.now(), code, reason });
  }

  private handleTransportError(error: Error): void {
    if (this._state !== 'connected') {
      this.logger.debug(`Transport error in state ${this._state}: ${error.message}`);
      return;
    }

    this.logger.error(`Transport error: ${error.message}`);
    this.errorsCount++;
    const now = Date.now();
    this.publishEvent({ type: 'error', timestamp: now, error: error.message });

    this.generation++;
    this.clearTimers();
    const session = this.session;
    this.session = null;
    this.connectionStartedAt = null;
    this.setState('failed');
    this.publishEvent({ type: 'connectionFailed', timestamp: now, reason: error.message });
    if (session) this.closeSession(session);
  }

  // --------------------------------------------------------------------------
  // Heartbeat
  // --------------------------------------------------------------------------

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.heartbeatTick(), this.config.heartbeatIntervalMs);
  }

  private heartbeatTick(): void {
    if (this.disposed || this._state !== 'connected') return;

    const now = Date.now();
    const limit = this.config.heartbeatIntervalMs * 2;
    if (
      this.lastPingAt !== null &&
      this.lastPongAt !== null &&
      now - this.lastPingAt > limit &&
      now - this.lastPongAt > limit
    ) {
      this.logger.warn(HEARTBEAT_TIMEOUT_MESSAGE);
      this.errorsCount++;
      this.publishEvent({ type: 'error', timestamp: now, error: HEARTBEAT_TIMEOUT_MESSAGE });
    }

    void this.sendPing().catch((err: unknown) => {
      this.logger.warn(`Heartbeat ping failed: ${toErrorMessage(err)}`);
    });
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private setState(state: ConnectionState): void {
    if (this._state === state) return;
    this.logger.debug(`State ${this._state} -> ${state}`);
    this._state = state;
    this.lastStateChangeAt = Date.now();
    this.stateChanges.publish(state);
  }

  private publishEvent(event: ConnectionEvent): void {
    this.events.publish(event);
  }

  private isCurrent(generation: number): boolean {
    return !this.disposed && generation === this.generation;
  }

  private clearConnectTimer(): void {
    if (this.connectTimer !== null) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearConnectTimer();
    this.stopHeartbeat();
  }

  private closeSession(session: TransportSession): void {
    void Promise.resolve()
      .then(() => session.close())
      .catch((err: unknown) => {
        this.logger.warn(`Error closing session: ${toErrorMessage(err)}`);
      });
  }
}
