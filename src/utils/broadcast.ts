/**
 * Fan-out channel used for every observable stream in the client.
 *
 * Each subscriber sees every published value exactly once and in
 * publication order. A value published from inside a listener is queued
 * and dispatched after the current value has reached all subscribers,
 * so re-entrant publishes never overtake earlier ones.
 *
 * Values can be consumed with callbacks (`subscribe`) or with
 * `for await (const v of channel)`; each async iterator owns an
 * unbounded buffer and finishes when the channel closes.
 *
 * @module
 */

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { toErrorMessage } from './async.js';

export type Listener<T> = (value: T) => void;

export class Broadcast<T> implements AsyncIterable<T> {
  private readonly listeners = new Set<Listener<T>>();
  private readonly pending: T[] = [];
  private readonly wakers = new Set<() => void>();
  private dispatching = false;
  private _closed = false;

  constructor(
    private readonly name: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  get closed(): boolean {
    return this._closed;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Register a listener. Returns an unsubscribe function; subscribing to a
   * closed channel is a no-op.
   */
  subscribe(listener: Listener<T>): () => void {
    if (this._closed) return () => {};
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Publish a value. Returns false when the channel is already closed. */
  publish(value: T): boolean {
    if (this._closed) return false;
    this.pending.push(value);
    if (this.dispatching) return true;

    this.dispatching = true;
    try {
      while (this.pending.length > 0) {
        const [next] = this.pending.splice(0, 1);
        for (const listener of [...this.listeners]) {
          // Skip listeners unsubscribed earlier in this dispatch.
          if (this.listeners.has(listener)) this.deliver(listener, next);
        }
      }
    } finally {
      this.dispatching = false;
    }
    return true;
  }

  /** Close the channel. Idempotent; wakes and ends all async iterators. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.listeners.clear();
    for (const wake of this.wakers) wake();
    this.wakers.clear();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    const buffer: T[] = [];
    let wake: (() => void) | null = null;
    const unsubscribe = this.subscribe((value) => {
      buffer.push(value);
      wake?.();
    });

    try {
      for (;;) {
        while (buffer.length === 0) {
          if (this._closed) return;
          await new Promise<void>((resolve) => {
            const waker = () => {
              this.wakers.delete(waker);
              wake = null;
              resolve();
            };
            wake = waker;
            this.wakers.add(waker);
          });
        }
        const [next] = buffer.splice(0, 1);
        yield next;
      }
    } finally {
      unsubscribe();
    }
  }

  private deliver(listener: Listener<T>, value: T): void {
    try {
      listener(value);
    } catch (err) {
      this.logger.warn(`${this.name} listener threw: ${toErrorMessage(err)}`);
    }
  }
}
