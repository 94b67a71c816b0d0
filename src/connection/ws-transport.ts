/**
 * Default {@link Transport} over the `ws` package.
 *
 * `ws` is loaded lazily via `ensureLazyModule` on the first `open()`.
 *
 * @module
 */

import type WebSocket from 'ws';
import { ensureLazyModule } from '../utils/lazy-import.js';
import { toError, toErrorMessage } from '../utils/async.js';
import type { Frame } from '../message/codec.js';
import { TransportError } from './errors.js';
import type {
  Transport,
  TransportHandlers,
  TransportOpenOptions,
  TransportSession,
} from './transport.js';

type WebSocketConstructor = typeof WebSocket;

export class WsTransport implements Transport {
  readonly supportsHeaders = true;

  private ctor: WebSocketConstructor | null = null;

  async open(
    url: string,
    options: TransportOpenOptions,
    handlers: TransportHandlers,
  ): Promise<TransportSession> {
    const { signal } = options;
    const WebSocketImpl = await this.loadWebSocket();
    if (signal?.aborted) {
      throw new TransportError(`Opening ${url} was aborted`);
    }

    const socketOptions: WebSocket.ClientOptions = { headers: { ...options.headers } };
    if (options.handshakeTimeoutMs !== undefined) {
      socketOptions.handshakeTimeout = options.handshakeTimeoutMs;
    }
    const socket = new WebSocketImpl(url, [...(options.protocols ?? [])], socketOptions);

    return new Promise<TransportSession>((resolve, reject) => {
      let opened = false;

      const onAbort = () => {
        if (opened) return;
        socket.terminate();
        reject(new TransportError(`Opening ${url} was aborted`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.on('open', () => {
        opened = true;
        signal?.removeEventListener('abort', onAbort);
        resolve(new WsSession(socket));
      });

      socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
        handlers.onFrame(toFrame(data, isBinary));
      });

      socket.on('close', (code: number, reason: Buffer) => {
        if (!opened) {
          signal?.removeEventListener('abort', onAbort);
          reject(new TransportError(`Socket closed before opening (code ${code})`));
          return;
        }
        handlers.onClose(code, reason.toString('utf8'));
      });

      socket.on('error', (err: Error) => {
        if (!opened) {
          signal?.removeEventListener('abort', onAbort);
          reject(new TransportError(`Failed to open ${url}: ${err.message}`, err));
          return;
        }
        handlers.onError(err);
      });
    });
  }

  private async loadWebSocket(): Promise<WebSocketConstructor> {
    if (this.ctor) return this.ctor;
    this.ctor = await ensureLazyModule(
      'ws',
      () => import('ws'),
      (msg, cause) => new TransportError(msg, cause),
      (mod) => mod.default,
    );
    return this.ctor;
  }
}

class WsSession implements TransportSession {
  constructor(private readonly socket: WebSocket) {}

  send(frame: Frame): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.socket.send(frame, (err?: Error) => {
        if (err) {
          reject(new TransportError(`Socket send failed: ${toErrorMessage(err)}`, toError(err)));
          return;
        }
        resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }
}

function toFrame(data: WebSocket.RawData, isBinary: boolean): Frame {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : Buffer.isBuffer(data)
      ? data
      : Buffer.from(data);
  return isBinary ? new Uint8Array(buffer) : buffer.toString('utf8');
}
