import WebSocket from 'ws';

import { StreamSyncError } from '../errors';
import type { MessageSourcePort, MessageStream, ReceiveResult } from '../ports';

/** The slice of a `ws` socket this adapter relies on. */
export interface SocketLike {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'pong', listener: () => void): unknown;
  close(code?: number, reason?: string): void;
  terminate(): void;
  ping(): void;
  pause(): void;
  resume(): void;
}

export type SocketFactory = (uri: string, options: { handshakeTimeout: number }) => SocketLike;

export type WebSocketSourceOptions = {
  createSocket?: SocketFactory;
  /** How long `connect` waits for the socket to open. */
  openTimeoutMs?: number;
  /** A socket that has not answered the previous ping by the next one is terminated. */
  pingIntervalMs?: number;
  /** Buffered frames at which the socket is paused; it resumes once half of them are consumed. */
  highWaterMark?: number;
};

const NORMAL_CLOSURE = 1000;
const DEFAULT_OPEN_TIMEOUT_MS = 10_000;
const DEFAULT_PING_INTERVAL_MS = 30_000;
const DEFAULT_HIGH_WATER_MARK = 1000;

function decodeFrame(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

type Waiter = {
  resolve: (result: ReceiveResult) => void;
  reject: (err: Error) => void;
};

/**
 * Turns the socket's push events into the pull-style `receive()` the connector
 * loop expects. Frames that arrive between receives are buffered in order, and
 * the socket is paused while the buffer is at its high-water mark.
 */
class WebSocketStream implements MessageStream {
  private readonly frames: string[] = [];
  private readonly lowWaterMark: number;
  private waiter: Waiter | null = null;
  private closedWith: { code: number; reason: string } | null = null;
  private failure: Error | null = null;
  private paused = false;
  private alive = true;
  private heartbeat: NodeJS.Timeout | null = null;

  constructor(
    private readonly socket: SocketLike,
    private readonly highWaterMark: number,
  ) {
    this.lowWaterMark = Math.floor(highWaterMark / 2);
    socket.on('message', (data) => {
      this.alive = true;
      this.push(decodeFrame(data));
    });
    socket.on('pong', () => {
      this.alive = true;
    });
    socket.on('error', (err) => this.fail(err));
    socket.on('close', (code, reason) => this.end(code, reason.toString('utf8')));
  }

  /** Pings every interval; a socket still silent since the last ping is terminated and reads as closed. */
  startHeartbeat(intervalMs: number): void {
    this.heartbeat = setInterval(() => {
      if (!this.alive) {
        this.stopHeartbeat();
        this.socket.terminate();
        return;
      }
      this.alive = false;
      this.socket.ping();
    }, intervalMs);
  }

  receive(): Promise<ReceiveResult> {
    const frame = this.frames.shift();
    if (frame !== undefined) {
      if (this.paused && this.frames.length <= this.lowWaterMark) {
        this.paused = false;
        this.socket.resume();
      }
      return Promise.resolve({ type: 'message', data: frame });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.closedWith) return Promise.resolve({ type: 'closed', ...this.closedWith });
    if (this.waiter) return Promise.reject(new Error('receive() is already pending'));

    return new Promise<ReceiveResult>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  async close(): Promise<void> {
    this.stopHeartbeat();
    if (this.closedWith) return;
    // a paused socket would never read the server's close frame
    if (this.paused) {
      this.paused = false;
      this.socket.resume();
    }
    this.socket.close(NORMAL_CLOSURE, 'session complete');
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  private takeWaiter(): Waiter | null {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }

  private push(frame: string): void {
    const waiter = this.takeWaiter();
    if (waiter) {
      waiter.resolve({ type: 'message', data: frame });
    } else {
      this.frames.push(frame);
      if (!this.paused && this.frames.length >= this.highWaterMark) {
        this.paused = true;
        this.socket.pause();
      }
    }
  }

  private fail(err: Error): void {
    this.stopHeartbeat();
    this.failure = err;
    this.takeWaiter()?.reject(err);
  }

  private end(code: number, reason: string): void {
    this.stopHeartbeat();
    this.closedWith = { code, reason };
    this.takeWaiter()?.resolve({ type: 'closed', code, reason });
  }
}

export class WebSocketSource implements MessageSourcePort {
  private readonly createSocket: SocketFactory;
  private readonly openTimeoutMs: number;
  private readonly pingIntervalMs: number;
  private readonly highWaterMark: number;

  constructor(options: WebSocketSourceOptions = {}) {
    this.createSocket = options.createSocket ?? ((uri, socketOptions) => new WebSocket(uri, socketOptions));
    this.openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;
  }

  connect(uri: string): Promise<MessageStream> {
    return new Promise<MessageStream>((resolve, reject) => {
      const socket = this.createSocket(uri, { handshakeTimeout: this.openTimeoutMs });
      const stream = new WebSocketStream(socket, this.highWaterMark);
      let settled = false;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(openTimer);
        return true;
      };

      const openTimer = setTimeout(() => {
        if (!settle()) return;
        socket.terminate();
        reject(new StreamSyncError('CONNECT_ERROR', `timed out opening ${uri} after ${this.openTimeoutMs}ms`, {
          details: { timeoutMs: this.openTimeoutMs },
        }));
      }, this.openTimeoutMs);

      socket.on('open', () => {
        if (!settle()) return;
        stream.startHeartbeat(this.pingIntervalMs);
        resolve(stream);
      });
      socket.on('error', (err) => {
        if (!settle()) return;
        reject(new StreamSyncError('CONNECT_ERROR', `failed to open ${uri}: ${err.message}`, { cause: err }));
      });
      socket.on('close', (code) => {
        if (!settle()) return;
        reject(new StreamSyncError('CONNECT_ERROR', `connection to ${uri} closed before opening`, {
          details: { code },
        }));
      });
    });
  }
}
