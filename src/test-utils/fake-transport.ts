/**
 * In-process {@link Transport} for tests. Every `open()` creates a
 * {@link FakeSession}; tests decide when it opens, fails, or drops.
 */

import type { Frame } from '../message/codec.js';
import type {
  Transport,
  TransportHandlers,
  TransportOpenOptions,
  TransportSession,
} from '../connection/transport.js';

export type OpenBehavior = 'open' | 'fail' | 'hang';

export class FakeSession implements TransportSession {
  readonly sent: Frame[] = [];
  closed = false;
  closeCode: number | undefined;
  /** When set, the next sends throw this error. */
  sendError: Error | null = null;

  constructor(
    readonly url: string,
    readonly options: TransportOpenOptions,
    private readonly handlers: TransportHandlers,
  ) {}

  send(frame: Frame): void {
    if (this.sendError) throw this.sendError;
    if (this.closed) throw new Error('session closed');
    this.sent.push(frame);
  }

  close(code?: number): void {
    this.closed = true;
    this.closeCode = code;
  }

  /** Text frames sent so far. */
  get sentText(): string[] {
    return this.sent.filter((frame): frame is string => typeof frame === 'string');
  }

  receive(frame: Frame): void {
    this.handlers.onFrame(frame);
  }

  /** Simulate the remote end closing the socket. */
  drop(code = 1006, reason = 'abnormal closure'): void {
    this.closed = true;
    this.handlers.onClose(code, reason);
  }

  fail(error: Error): void {
    this.handlers.onError(error);
  }
}

interface PendingOpen {
  session: FakeSession;
  resolve: (session: FakeSession) => void;
  reject: (err: Error) => void;
}

export class FakeTransport implements Transport {
  readonly sessions: FakeSession[] = [];
  /** How the next `open()` calls behave; the last entry repeats. */
  behaviors: OpenBehavior[] = ['open'];
  openError = new Error('connection refused');
  openCount = 0;
  private readonly pending: PendingOpen[] = [];

  constructor(readonly supportsHeaders = true) {}

  get lastSession(): FakeSession | undefined {
    return this.sessions[this.sessions.length - 1];
  }

  open(url: string, options: TransportOpenOptions, handlers: TransportHandlers): Promise<TransportSession> {
    const behavior = this.behaviors.length > 1 ? this.behaviors.shift() : this.behaviors[0];
    this.openCount++;
    const session = new FakeSession(url, options, handlers);
    this.sessions.push(session);

    switch (behavior) {
      case 'fail':
        return Promise.reject(this.openError);
      case 'hang':
        return new Promise<FakeSession>((resolve, reject) => {
          this.pending.push({ session, resolve, reject });
        });
      default:
        return Promise.resolve(session);
    }
  }

  /** Complete the oldest `hang` open. */
  completePendingOpen(): FakeSession | undefined {
    const next = this.pending.shift();
    next?.resolve(next.session);
    return next?.session;
  }

  /** Reject the oldest `hang` open. */
  failPendingOpen(err: Error = this.openError): void {
    this.pending.shift()?.reject(err);
  }
}
