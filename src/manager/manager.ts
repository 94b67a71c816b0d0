/**
 * StreamManager: owns one connection at a time and keeps it alive.
 *
 * Submitted messages go straight to the connection when it is up and into
 * the {@link MessageQueue} otherwise. Unexpected closes and failed connects
 * start a reconnection campaign driven by the {@link ReconnectionStrategy};
 * every successful connect drains the queue in priority order.
 *
 * @module
 */

import { configToJSON } from '../config/config.js';
import type { StreamConfig } from '../config/types.js';
import { StreamConnection } from '../connection/connection.js';
import { ConnectionFailedError, MessageSendFailedError } from '../connection/errors.js';
import type { Transport } from '../connection/transport.js';
import { isActiveState, type ConnectionEvent, type ConnectionState } from '../connection/types.js';
import { WsTransport } from '../connection/ws-transport.js';
import { StreamMessage } from '../message/message.js';
import type { JsonDocument, MessageOptions } from '../message/types.js';
import { DuplicateMessageError, QueueFullError } from '../queue/errors.js';
import { MessageQueue } from '../queue/message-queue.js';
import type { MessageQueueJSON } from '../queue/types.js';
import { strategyFromConfig } from '../reconnection/strategy.js';
import type { ReconnectionStrategy } from '../reconnection/types.js';
import type { StreamError } from '../types/errors.js';
import { toErrorMessage } from '../utils/async.js';
import { Broadcast } from '../utils/broadcast.js';
import { scopeLogger, silentLogger, type Logger } from '../utils/logger.js';
import { ReconnectionFailedError } from './errors.js';
import type {
  ManagerEvent,
  ManagerState,
  ManagerStateSnapshot,
  ManagerStatistics,
  StreamManagerOptions,
} from './types.js';

const MAX_ATTEMPTS_REASON = 'max attempts reached';

/**
 * @example
 * ```typescript
 * const manager = new StreamManager({ config: productionConfig('wss://feed.example.com/v1') });
 * manager.messages.subscribe((msg) => console.log(msg.kind));
 * await manager.connect();
 * await manager.sendJson({ op: 'subscribe', channel: 'trades' });
 * ```
 */
export class StreamManager {
  readonly stateChanges: Broadcast<ManagerStateSnapshot>;
  readonly events: Broadcast<ManagerEvent>;
  /** Raw connection states, relayed across reconnections. */
  readonly connectionStates: Broadcast<ConnectionState>;
  /** Inbound messages from whichever connection is current. */
  readonly messages: Broadcast<StreamMessage>;

  readonly config: StreamConfig;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private readonly strategy: ReconnectionStrategy;
  private readonly queue: MessageQueue;

  private connection: StreamConnection | null = null;
  private connectionSubscriptions: (() => void)[] = [];
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private drainHandle: ReturnType<typeof setImmediate> | null = null;
  private draining = false;
  private drainToken = 0;
  private reconnectAttempt = 0;
  private isReconnecting = false;
  private reconnectionExhausted = false;
  private connectInFlight = false;
  private intentionalClose = false;
  private disposed = false;
  private lastSnapshotKey = '';

  constructor(options: StreamManagerOptions) {
    this.config = options.config;
    this.transport = options.transport ?? new WsTransport();
    this.logger = options.logger ?? silentLogger;
    this.strategy = options.reconnectionStrategy ?? strategyFromConfig(options.config);
    this.queue = options.messageQueue ?? new MessageQueue({ maxSize: options.config.maxQueueSize });

    const channelLogger = scopeLogger(this.logger, 'manager');
    this.stateChanges = new Broadcast<ManagerStateSnapshot>('manager.stateChanges', channelLogger);
    this.events = new Broadcast<ManagerEvent>('manager.events', channelLogger);
    this.connectionStates = new Broadcast<ConnectionState>('manager.connectionStates', channelLogger);
    this.messages = new Broadcast<StreamMessage>('manager.messages', channelLogger);
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get state(): ManagerState {
    if (this.isReconnecting) return 'reconnecting';
    switch (this.connection?.state) {
      case undefined:
      case 'initial':
        return 'idle';
      case 'connecting':
        return 'connecting';
      case 'connected':
        return 'connected';
      case 'reconnecting':
        return 'reconnecting';
      default:
        return 'disconnected';
    }
  }

  get connectionState(): ConnectionState | null {
    return this.connection?.state ?? null;
  }

  get isConnected(): boolean {
    return this.connection?.isConnected ?? false;
  }

  get currentReconnectAttempt(): number {
    return this.reconnectAttempt;
  }

  get queueSize(): number {
    return this.queue.size;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /**
   * Connect, starting a fresh reconnection campaign. Resolves once the
   * first attempt settles; failures are reported through `events`, never
   * by rejecting.
   */
  async connect(): Promise<void> {
    if (this.disposed) {
      throw new ConnectionFailedError('manager has been disposed');
    }
    if (this.connectInFlight) return;
    if (this.connection && isActiveState(this.connection.state)) return;

    this.cancelReconnectTimer();
    this.strategy.reset();
    this.reconnectAttempt = 0;
    this.isReconnecting = false;
    this.reconnectionExhausted = false;
    this.intentionalClose = false;

    await this.establish();
  }

  /** Stop reconnecting and close the current connection. */
  async disconnect(): Promise<void> {
    if (this.disposed) return;
    this.intentionalClose = true;
    this.cancelReconnectTimer();
    this.stopDrain();
    this.strategy.reset();
    this.reconnectAttempt = 0;
    this.isReconnecting = false;

    const connection = this.connection;
    if (connection) {
      await connection.disconnect();
      this.unsubscribeConnection();
      await connection.dispose();
    }

    this.logger.info('Disconnected');
    this.publishEvent({ type: 'disconnected', timestamp: Date.now(), reason: 'client disconnect' });
    this.publishState();
  }

  /**
   * Cancel timers, dispose the connection and close every channel. Safe to
   * call more than once.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.cancelReconnectTimer();
    this.stopDrain();
    this.disposed = true;

    try {
      await this.teardownConnection();
    } finally {
      this.stateChanges.close();
      this.events.close();
      this.connectionStates.close();
      this.messages.close();
    }
  }

  // --------------------------------------------------------------------------
  // Sending
  // --------------------------------------------------------------------------

  /**
   * Deliver now if connected, otherwise queue. Resolves true when the
   * message was sent or queued; rejections are published as `error` events.
   */
  async send(message: StreamMessage): Promise<boolean> {
    if (this.disposed) return false;

    const connection = this.connection;
    if (connection?.canSend) {
      try {
        await connection.send(message);
        this.publishEvent({ type: 'messageSent', timestamp: Date.now(), message });
        return true;
      } catch (err) {
        this.logger.debug(`Immediate send of ${message.id} failed, queuing: ${toErrorMessage(err)}`);
      }
    }

    const queued = this.enqueue(message);
    if (queued && this.isConnected) this.startDrain();
    return queued;
  }

  sendText(text: string, options?: MessageOptions): Promise<boolean> {
    return this.send(StreamMessage.text(text, options));
  }

  sendBinary(bytes: Uint8Array, options?: MessageOptions): Promise<boolean> {
    return this.send(StreamMessage.binary(bytes, options));
  }

  sendJson(value: JsonDocument, options?: MessageOptions): Promise<boolean> {
    return this.send(StreamMessage.json(value, options));
  }

  sendPing(): Promise<boolean> {
    return this.send(StreamMessage.ping());
  }

  sendPong(): Promise<boolean> {
    return this.send(StreamMessage.pong());
  }

  private enqueue(message: StreamMessage): boolean {
    if (!this.config.enableMessageQueue) {
      this.logger.debug(`Queue disabled; message ${message.id} not sent`);
      return false;
    }

    if (!this.offerToQueue(message)) return false;
    this.publishEvent({ type: 'messageQueued', timestamp: Date.now(), message, queueSize: this.queue.size });
    return true;
  }

  // --------------------------------------------------------------------------
  // Queue persistence
  // --------------------------------------------------------------------------

  exportQueue(): MessageQueueJSON {
    return this.queue.toJSON();
  }

  /**
   * Add persisted messages to the queue. Returns how many were accepted;
   * each rejection is published as an `error` event.
   */
  importQueue(json: unknown): number {
    const restored = MessageQueue.fromJSON(json);
    let accepted = 0;
    for (const message of restored.messages) {
      if (this.enqueue(message)) accepted++;
    }
    if (this.isConnected) this.startDrain();
    return accepted;
  }

  // --------------------------------------------------------------------------
  // Statistics
  // --------------------------------------------------------------------------

  getStatistics(): ManagerStatistics {
    return {
      state: this.state,
      connectionState: this.connectionState,
      isConnected: this.isConnected,
      isReconnecting: this.isReconnecting,
      reconnectAttempt: this.reconnectAttempt,
      maxReconnectionAttempts: this.config.maxReconnectionAttempts,
      reconnectionStrategy: this.strategy.type,
      queue: this.queue.getStatistics(),
      connection: this.connection?.getStatistics() ?? null,
      config: configToJSON(this.config),
      timestamp: Date.now(),
    };
  }

  // --------------------------------------------------------------------------
  // Connection management
  // --------------------------------------------------------------------------

  private async establish(): Promise<void> {
    await this.teardownConnection();
    if (this.disposed) return;

    const connection = new StreamConnection({
      config: this.config,
      transport: this.transport,
      logger: this.logger,
    });
    this.connection = connection;
    this.subscribeConnection(connection);

    this.publishEvent({ type: 'connecting', timestamp: Date.now() });
    this.connectInFlight = true;
    try {
      await connection.connect();
    } catch (err) {
      this.connectInFlight = false;
      if (this.disposed || this.intentionalClose || connection !== this.connection) return;

      const reason = err instanceof ConnectionFailedError ? err.reason : toErrorMessage(err);
      this.logger.warn(`Connect failed: ${reason}`);
      this.publishEvent({ type: 'connectionFailed', timestamp: Date.now(), reason });
      if (this.config.enableReconnection) {
        this.scheduleReconnect();
      } else {
        this.publishState();
      }
      return;
    }
    this.connectInFlight = false;
    if (this.disposed || connection !== this.connection) return;

    this.reconnectAttempt = 0;
    this.isReconnecting = false;
    this.strategy.reset();
    this.publishEvent({ type: 'connected', timestamp: Date.now() });
    this.publishState();
    this.startDrain();
  }

  private subscribeConnection(connection: StreamConnection): void {
    this.connectionSubscriptions = [
      connection.stateChanges.subscribe((state) => this.handleConnectionState(connection, state)),
      connection.events.subscribe((event) => this.relayConnectionEvent(event)),
      connection.messages.subscribe((message) => {
        this.messages.publish(message);
      }),
    ];
  }

  private unsubscribeConnection(): void {
    for (const unsubscribe of this.connectionSubscriptions) unsubscribe();
    this.connectionSubscriptions = [];
  }

  private async teardownConnection(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.unsubscribeConnection();
    await connection.dispose();
  }

  private handleConnectionState(connection: StreamConnection, state: ConnectionState): void {
    this.connectionStates.publish(state);
    this.publishState();

    if (state !== 'closed' && state !== 'failed') return;
    if (this.disposed || this.intentionalClose || this.connectInFlight || connection !== this.connection) return;

    this.stopDrain();
    const reason = state === 'failed' ? 'connection failed' : 'connection lost';
    this.logger.warn(`Connection ${state} unexpectedly`);
    this.publishEvent({ type: 'disconnected', timestamp: Date.now(), reason });
    if (this.config.enableReconnection) {
      this.scheduleReconnect();
    }
  }

  private relayConnectionEvent(event: ConnectionEvent): void {
    this.events.publish({ type: 'connectionEvent', timestamp: event.timestamp, event });
  }

  // --------------------------------------------------------------------------
  // Reconnection
  // --------------------------------------------------------------------------

  private scheduleReconnect(): void {
    if (this.disposed || this.reconnectTimer !== null || this.reconnectionExhausted) return;

    const attempt = ++this.reconnectAttempt;
    if (!this.strategy.shouldRetry(attempt, this.config.maxReconnectionAttempts)) {
      const attempts = attempt - 1;
      this.isReconnecting = false;
      this.reconnectionExhausted = true;
      const error = new ReconnectionFailedError(MAX_ATTEMPTS_REASON, attempts);
      this.logger.error(error.message);
      this.publishEvent({
        type: 'reconnectionFailed',
        timestamp: Date.now(),
        reason: MAX_ATTEMPTS_REASON,
        attempts,
        error,
      });
      this.publishState();
      return;
    }

    const delayMs = this.strategy.delay(attempt);
    this.isReconnecting = true;
    this.logger.info(`Reconnecting in ${delayMs}ms (attempt ${attempt}/${this.config.maxReconnectionAttempts})`);
    this.publishEvent({ type: 'reconnecting', timestamp: Date.now(), attempt, delayMs });
    this.publishState();

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.disposed || !this.isReconnecting) return;
      void this.establish().catch((err: unknown) => {
        this.logger.error(`Reconnection attempt ${attempt} failed: ${toErrorMessage(err)}`);
      });
    }, delayMs);
  }

  private cancelReconnectTimer(): void {
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // --------------------------------------------------------------------------
  // Queue draining
  // --------------------------------------------------------------------------

  private startDrain(): void {
    if (this.draining || this.queue.isEmpty) return;
    this.draining = true;
    this.runDrainBatch(++this.drainToken);
  }

  private runDrainBatch(token: number): void {
    this.drainHandle = null;
    void this.drainBatch(token).then(
      (more) => {
        if (token !== this.drainToken) return;
        if (more && !this.disposed) {
          this.drainHandle = setImmediate(() => this.runDrainBatch(token));
        } else {
          this.draining = false;
        }
      },
      (err: unknown) => {
        if (token === this.drainToken) this.draining = false;
        this.logger.error(`Queue drain failed: ${toErrorMessage(err)}`);
      },
    );
  }

  /** Send up to `drainBatchSize` messages. Resolves true if another batch should follow. */
  private async drainBatch(token: number): Promise<boolean> {
    const connection = this.connection;
    let sent = 0;

    while (sent < this.config.drainBatchSize) {
      if (
        token !== this.drainToken ||
        this.disposed ||
        !connection ||
        connection !== this.connection ||
        !connection.canSend
      ) {
        return false;
      }
      const message = this.queue.dequeue();
      if (!message) return false;

      try {
        await connection.send(message);
        this.publishEvent({ type: 'messageSent', timestamp: Date.now(), message });
      } catch (err) {
        if (!connection.canSend) {
          // Connection went away mid-drain; keep the message for the next connect.
          this.offerToQueue(message);
          return false;
        }
        this.handleDrainFailure(message, err);
      }
      sent++;
    }

    return !this.queue.isEmpty;
  }

  private handleDrainFailure(message: StreamMessage, err: unknown): void {
    const reason = toErrorMessage(err);
    if (message.canRetry) {
      const retry = message.withRetry();
      if (this.offerToQueue(retry)) {
        this.logger.debug(`Requeued ${message.id} (retry ${retry.retryCount}/${retry.maxRetries})`);
      }
      return;
    }

    const error = err instanceof MessageSendFailedError ? err : new MessageSendFailedError(reason, message.id, err);
    this.logger.warn(`Dropping message ${message.id} after ${message.retryCount} retries: ${reason}`);
    this.publishEvent({ type: 'error', timestamp: Date.now(), error, messageId: message.id });
  }

  /** Add to the queue; a rejection is published as an `error` event. */
  private offerToQueue(message: StreamMessage): boolean {
    const result = this.queue.tryEnqueue(message);
    if (result.accepted) return true;

    const error: StreamError =
      result.reason === 'full' ? new QueueFullError(this.queue.maxSize) : new DuplicateMessageError(message.id);
    this.logger.warn(`Dropping message ${message.id}: ${error.message}`);
    this.publishEvent({ type: 'error', timestamp: Date.now(), error, messageId: message.id });
    return false;
  }

  private stopDrain(): void {
    this.drainToken++;
    if (this.drainHandle !== null) {
      clearImmediate(this.drainHandle);
      this.drainHandle = null;
    }
    this.draining = false;
  }

  // --------------------------------------------------------------------------
  // Publishing
  // --------------------------------------------------------------------------

  private publishEvent(event: ManagerEvent): void {
    this.events.publish(event);
  }

  private publishState(): void {
    const snapshot: ManagerStateSnapshot = {
      state: this.state,
      connectionState: this.connectionState,
      isReconnecting: this.isReconnecting,
      reconnectAttempt: this.reconnectAttempt,
      timestamp: Date.now(),
    };
    const key = `${snapshot.state}|${snapshot.connectionState}|${snapshot.isReconnecting}|${snapshot.reconnectAttempt}`;
    if (key === this.lastSnapshotKey) return;
    this.lastSnapshotKey = key;
    this.stateChanges.publish(snapshot);
  }
}
