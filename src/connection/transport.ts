/**
 * Transport contract consumed by {@link StreamConnection}.
 *
 * A transport opens one session per connection attempt and pushes inbound
 * frames and termination back through {@link TransportHandlers}.
 *
 * @module
 */

import type { Frame } from '../message/codec.js';

export interface TransportOpenOptions {
  readonly protocols?: readonly string[];
  /** Only passed when the transport reports `supportsHeaders`. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Aborted when the attempt times out or is cancelled; the transport must release its socket. */
  readonly signal?: AbortSignal;
  /** Upper bound for the opening handshake. */
  readonly handshakeTimeoutMs?: number;
}

export interface TransportHandlers {
  onFrame(frame: Frame): void;
  onClose(code?: number, reason?: string): void;
  onError(error: Error): void;
}

export interface TransportSession {
  send(frame: Frame): void | Promise<void>;
  close(code?: number, reason?: string): void | Promise<void>;
}

export interface Transport {
  /** Whether `open()` can attach custom upgrade headers. */
  readonly supportsHeaders: boolean;
  /** Resolves once the session is open; rejects if it never opens. */
  open(url: string, options: TransportOpenOptions, handlers: TransportHandlers): Promise<TransportSession>;
}
