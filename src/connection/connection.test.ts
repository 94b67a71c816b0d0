import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StreamConnection, HEARTBEAT_TIMEOUT_MESSAGE } from './connection.js';
import { ConnectionFailedError, MessageSendFailedError, NotConnectedError, StreamTimeoutError } from './errors.js';
import type { ConnectionEvent, ConnectionState } from './types.js';
import { createStreamConfig } from '../config/config.js';
import type { StreamConfigInput } from '../config/types.js';
import { StreamMessage } from '../message/message.js';
import { StreamErrorCodes } from '../types/errors.js';
import { FakeTransport, flushMicrotasks, type FakeSession } from '../test-utils/index.js';

const URL = 'ws://localhost:9300/feed';

function makeConfig(overrides: Partial<StreamConfigInput> = {}) {
  return createStreamConfig({ url: URL, enableHeartbeat: false, ...overrides });
}

interface Harness {
  connection: StreamConnection;
  transport: FakeTransport;
  states: ConnectionState[];
  events: ConnectionEvent[];
  received: StreamMessage[];
}

function setup(overrides: Partial<StreamConfigInput> = {}, transport = new FakeTransport()): Harness {
  const connection = new StreamConnection({ config: makeConfig(overrides), transport });
  const states: ConnectionState[] = [];
  const events: ConnectionEvent[] = [];
  const received: StreamMessage[] = [];
  connection.stateChanges.subscribe((s) => states.push(s));
  connection.events.subscribe((e) => events.push(e));
  connection.messages.subscribe((m) => received.push(m));
  return { connection, transport, states, events, received };
}

function sessionOf(transport: FakeTransport): FakeSession {
  const session = transport.lastSession;
  if (!session) throw new Error('no session opened');
  return session;
}

describe('StreamConnection', () => {
  beforeEach(() => {
    vi.useRealTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('starts in the initial state', () => {
      const { connection } = setup();
      expect(connection.state).toBe('initial');
      expect(connection.canSend).toBe(false);
    });

    it('transitions connecting -> connected and emits connected', async () => {
      const { connection, states, events } = setup();
      await connection.connect();

      expect(states).toEqual(['connecting', 'connected']);
      expect(events.map((e) => e.type)).toEqual(['connected']);
      expect(connection.isConnected).toBe(true);
    });

    it('is a no-op while connected', async () => {
      const { connection, transport } = setup();
      await connection.connect();
      await connection.connect();
      expect(transport.openCount).toBe(1);
    });

    it('passes url, protocols and headers to the transport', async () => {
      const { connection, transport } = setup({
        protocols: ['feed.v1'],
        headers: { 'x-api-key': 'test-secret' },
      });
      await connection.connect();

      const session = sessionOf(transport);
      expect(session.url).toBe(URL);
      expect(session.options).toMatchObject({
        protocols: ['feed.v1'],
        headers: { 'x-api-key': 'test-secret' },
        handshakeTimeoutMs: 30_000,
      });
      expect(session.options.signal?.aborted).toBe(false);
    });

    it('drops headers for transports without header support', async () => {
      const { connection, transport } = setup(
        { headers: { 'x-api-key': 'test-secret' } },
        new FakeTransport(false),
      );
      await connection.connect();
      const { options } = sessionOf(transport);
      expect(options.protocols).toEqual([]);
      expect(options.headers).toBeUndefined();
    });

    it('fails with ConnectionFailedError when open is rejected', async () => {
      const transport = new FakeTransport();
      transport.behaviors = ['fail'];
      const { connection, states, events } = setup({}, transport);

      const err = await connection.connect().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConnectionFailedError);
      expect(err).toMatchObject({ reason: 'connection refused', code: StreamErrorCodes.CONNECTION_FAILED });
      expect(connection.state).toBe('failed');
      expect(states).toEqual(['connecting', 'failed']);
      expect(events).toEqual([{ type: 'connectionFailed', timestamp: expect.any(Number), reason: 'connection refused' }]);
    });

    it('fails after connectionTimeoutMs and closes a late session', async () => {
      vi.useFakeTimers();
      const transport = new FakeTransport();
      transport.behaviors = ['hang'];
      const { connection } = setup({ connectionTimeoutMs: 1_000 }, transport);

      const outcome = connection.connect().catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(1_000);
      const err = await outcome;

      expect(err).toBeInstanceOf(ConnectionFailedError);
      expect(err).toMatchObject({ reason: 'Connection timed out after 1000ms' });
      expect(err instanceof ConnectionFailedError && err.cause).toBeInstanceOf(StreamTimeoutError);
      expect(connection.state).toBe('failed');
      expect(sessionOf(transport).options.signal?.aborted).toBe(true);

      const late = transport.completePendingOpen();
      await flushMicrotasks();
      expect(late?.closed).toBe(true);
      expect(connection.state).toBe('failed');
    });

    it('never leaves failed or closed on its own', async () => {
      vi.useFakeTimers();
      const transport = new FakeTransport();
      transport.behaviors = ['fail'];
      const { connection } = setup({}, transport);

      await connection.connect().catch(() => undefined);
      await vi.advanceTimersByTimeAsync(120_000);

      expect(connection.state).toBe('failed');
      expect(transport.openCount).toBe(1);
    });

    it('rejects once disposed', async () => {
      const { connection } = setup();
      await connection.dispose();
      await expect(connection.connect()).rejects.toThrow('Connection failed: connection has been disposed');
    });
  });

  describe('disconnect', () => {
    it('closes the session and emits disconnected', async () => {
      const { connection, transport, states, events } = setup();
      await connection.connect();
      await connection.disconnect();

      expect(sessionOf(transport).closeCode).toBe(1000);
      expect(states).toEqual(['connecting', 'connected', 'closing', 'closed']);
      expect(events.map((e) => e.type)).toEqual(['connected', 'disconnected']);
    });

    it('is a no-op once closed', async () => {
      const { connection, events } = setup();
      await connection.connect();
      await connection.disconnect();
      await connection.disconnect();
      expect(events.filter((e) => e.type === 'disconnected')).toHaveLength(1);
    });

    it('aborts an in-flight connect', async () => {
      const transport = new FakeTransport();
      transport.behaviors = ['hang'];
      const { connection, events } = setup({}, transport);

      const outcome = connection.connect().catch((e: unknown) => e);
      await flushMicrotasks();
      await connection.disconnect();

      expect(await outcome).toBeInstanceOf(ConnectionFailedError);
      expect(sessionOf(transport).options.signal?.aborted).toBe(true);
      expect(connection.state).toBe('closed');
      expect(events.some((e) => e.type === 'connectionFailed')).toBe(false);
    });
  });

  describe('send', () => {
    it('rejects with NotConnectedError before connecting', async () => {
      const { connection } = setup();
      const err = await connection.sendText('early').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotConnectedError);
      expect(err).toMatchObject({ state: 'initial' });
    });

    it('encodes each payload kind', async () => {
      const { connection, transport } = setup();
      await connection.connect();

      await connection.sendText('hello');
      await connection.sendJson({ op: 'subscribe', channel: 'trades' });
      await connection.sendBinary(new Uint8Array([1, 2, 3]));
      await connection.sendPing();

      expect(sessionOf(transport).sent).toEqual([
        'hello',
        '{"op":"subscribe","channel":"trades"}',
        new Uint8Array([1, 2, 3]),
        'ping',
      ]);
    });

    it('updates counters and emits messageSent', async () => {
      const { connection, events } = setup();
      await connection.connect();
      const message = StreamMessage.text('counted');
      await connection.send(message);

      expect(connection.getStatistics().messagesSent).toBe(1);
      expect(events[events.length - 1]).toEqual({ type: 'messageSent', timestamp: expect.any(Number), message });
    });

    it('wraps transport failures in MessageSendFailedError', async () => {
      const { connection, transport } = setup();
      await connection.connect();
      sessionOf(transport).sendError = new Error('socket buffer full');

      const err = await connection.sendText('x', { id: 'm-1' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MessageSendFailedError);
      expect(err).toMatchObject({ messageId: 'm-1', message: 'Failed to send message m-1: socket buffer full' });
      expect(connection.getStatistics().errorsCount).toBe(1);
    });

    it('keeps working after a failed send', async () => {
      const { connection, transport } = setup();
      await connection.connect();
      const session = sessionOf(transport);
      session.sendError = new Error('boom');
      await connection.sendText('lost').catch(() => undefined);
      session.sendError = null;

      await connection.sendText('delivered');
      expect(session.sent).toEqual(['delivered']);
    });

    it('delivers concurrent sends in call order', async () => {
      const { connection, transport } = setup();
      await connection.connect();

      await Promise.all([connection.sendText('a'), connection.sendText('b'), connection.sendText('c')]);
      expect(sessionOf(transport).sent).toEqual(['a', 'b', 'c']);
    });
  });

  describe('inbound frames', () => {
    it('publishes structured and text messages', async () => {
      const { connection, transport, received, events } = setup();
      await connection.connect();
      const session = sessionOf(transport);

      session.receive('{"type":"tick","price":101}');
      session.receive('plain words');

      expect(received.map((m) => m.payload)).toEqual([
        { kind: 'json', value: { type: 'tick', price: 101 } },
        { kind: 'text', text: 'plain words' },
      ]);
      expect(events.filter((e) => e.type === 'messageReceived')).toHaveLength(2);
      expect(connection.getStatistics().messagesReceived).toBe(2);
    });

    it('answers ping with pong and does not surface it', async () => {
      const { connection, transport, received } = setup();
      await connection.connect();
      const session = sessionOf(transport);

      session.receive('ping');
      await flushMicrotasks();

      expect(session.sent).toEqual(['pong']);
      expect(received).toEqual([]);
    });

    it('records pong latency against the last ping', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_700_000_000_000);
      const { connection, transport, received } = setup();
      await connection.connect();

      await connection.sendPing();
      vi.setSystemTime(1_700_000_000_250);
      sessionOf(transport).receive('pong');

      const stats = connection.getStatistics();
      expect(stats.pingsSent).toBe(1);
      expect(stats.pongsReceived).toBe(1);
      expect(stats.lastPongAt).toBe(1_700_000_000_250);
      expect(stats.heartbeatLatencyMs).toBe(250);
      expect(stats.heartbeatHealth).toBe(100);
      expect(received).toEqual([]);
    });

    it('ignores frames from a session that is no longer current', async () => {
      const { connection, transport, received } = setup();
      await connection.connect();
      const session = sessionOf(transport);
      await connection.disconnect();

      session.receive('late');
      expect(received).toEqual([]);
    });
  });

  describe('transport termination', () => {
    it('moves to closed when the remote end drops', async () => {
      const { connection, transport, events } = setup();
      await connection.connect();
      sessionOf(transport).drop(1006, 'abnormal closure');

      expect(connection.state).toBe('closed');
      expect(events[events.length - 1]).toEqual({
        type: 'disconnected',
        timestamp: expect.any(Number),
        code: 1006,
        reason: 'abnormal closure',
      });
    });

    it('moves to failed on a transport error and closes the session', async () => {
      const { connection, transport, events } = setup();
      await connection.connect();
      const session = sessionOf(transport);
      session.fail(new Error('ECONNRESET'));
      await flushMicrotasks();

      expect(connection.state).toBe('failed');
      expect(events.slice(1).map((e) => e.type)).toEqual(['error', 'connectionFailed']);
      expect(events[1]).toMatchObject({ error: 'ECONNRESET' });
      expect(events[2]).toMatchObject({ reason: 'ECONNRESET' });
      expect(session.closed).toBe(true);
      expect(connection.getStatistics().errorsCount).toBe(1);
    });
  });

  describe('heartbeat', () => {
    it('sends a ping every interval while connected', async () => {
      vi.useFakeTimers();
      const { connection, transport } = setup({ enableHeartbeat: true, heartbeatIntervalMs: 1_000 });
      await connection.connect();

      await vi.advanceTimersByTimeAsync(3_000);

      expect(sessionOf(transport).sent).toEqual(['ping', 'ping', 'ping']);
      expect(connection.getStatistics().pingsSent).toBe(3);
      await connection.dispose();
    });

    it('signals a timeout without dropping the connection', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_700_000_000_000);
      const { connection, transport, events } = setup({ enableHeartbeat: true, heartbeatIntervalMs: 1_000 });
      await connection.connect();
      const session = sessionOf(transport);

      await vi.advanceTimersByTimeAsync(1_000);
      session.receive('pong');
      session.sendError = new Error('write after end');

      await vi.advanceTimersByTimeAsync(2_000);
      expect(events.filter((e) => e.type === 'error')).toEqual([]);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(events.filter((e) => e.type === 'error')).toEqual([
        { type: 'error', timestamp: 1_700_000_004_000, error: HEARTBEAT_TIMEOUT_MESSAGE },
      ]);
      expect(connection.state).toBe('connected');
      await connection.dispose();
    });

    it('stops pinging after disconnect', async () => {
      vi.useFakeTimers();
      const { connection, transport } = setup({ enableHeartbeat: true, heartbeatIntervalMs: 1_000 });
      await connection.connect();
      await connection.disconnect();

      await vi.advanceTimersByTimeAsync(5_000);
      expect(sessionOf(transport).sent).toEqual([]);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe('statistics', () => {
    it('reports nulls before any traffic', () => {
      const { connection } = setup();
      expect(connection.getStatistics()).toMatchObject({
        state: 'initial',
        messagesSent: 0,
        messagesReceived: 0,
        errorsCount: 0,
        connectionStartedAt: null,
        connectionDurationMs: null,
        lastMessageAt: null,
        heartbeatLatencyMs: null,
        heartbeatHealth: null,
      });
    });

    it('tracks connection duration', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(1_700_000_000_000);
      const { connection } = setup();
      await connection.connect();
      vi.setSystemTime(1_700_000_005_000);

      expect(connection.getStatistics()).toMatchObject({
        connectionStartedAt: 1_700_000_000_000,
        connectionDurationMs: 5_000,
      });
    });
  });

  describe('dispose', () => {
    it('closes every channel and is idempotent', async () => {
      const { connection } = setup();
      await connection.connect();

      await connection.dispose();
      await connection.dispose();

      expect(connection.stateChanges.closed).toBe(true);
      expect(connection.messages.closed).toBe(true);
      expect(connection.events.closed).toBe(true);
      expect(connection.state).toBe('closed');
    });
  });
});
