/**
 * Test Purpose:
 * - Verifies the WebSocket adapter turns socket events into ordered, pull-style receives.
 *
 * Assumptions:
 * - An EventEmitter stands in for the `ws` socket; events are emitted by hand, and terminating it emits the
 *   abnormal close a real socket reports.
 * - Fake timers drive the open timeout and the ping interval.
 *
 * Expected Outcome & Rationale:
 * - Frames are delivered in arrival order whether they come before or after a receive, a remote close is
 *   reported as a value, and failures before the socket opens surface as CONNECT_ERROR.
 * - The socket is paused while too many frames are buffered, and a socket that stops answering pings is
 *   terminated so the session sees it as closed instead of waiting forever.
 */
import { EventEmitter } from 'node:events';
import { afterEach, describe, it, expect, vi } from 'vitest';

import { isStreamSyncError } from '../errors';
import { WebSocketSource, type WebSocketSourceOptions } from './websocketSource';

class FakeSocket extends EventEmitter {
  public closeCalls: Array<[number | undefined, string | undefined]> = [];
  public pings = 0;
  public pauses = 0;
  public resumes = 0;
  public terminations = 0;

  close(code?: number, reason?: string): void {
    this.closeCalls.push([code, reason]);
  }

  ping(): void {
    this.pings += 1;
  }

  pause(): void {
    this.pauses += 1;
  }

  resume(): void {
    this.resumes += 1;
  }

  terminate(): void {
    this.terminations += 1;
    this.emit('close', 1006, Buffer.from(''));
  }
}

const URI = 'wss://jetstream1.us-east.bsky.network/subscribe?wantedCollections=app.bsky.feed.post';

async function openStream(options: Omit<WebSocketSourceOptions, 'createSocket'> = {}) {
  const socket = new FakeSocket();
  const uris: string[] = [];
  const handshakeTimeouts: number[] = [];
  const source = new WebSocketSource({
    ...options,
    createSocket: (uri, socketOptions) => {
      uris.push(uri);
      handshakeTimeouts.push(socketOptions.handshakeTimeout);
      return socket;
    },
  });
  const pending = source.connect(URI);
  socket.emit('open');
  const stream = await pending;
  return { socket, stream, uris, handshakeTimeouts };
}

describe('WebSocketSource', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('connects to the given uri once the socket opens', async () => {
    const { uris, handshakeTimeouts, stream } = await openStream({ openTimeoutMs: 2500 });

    expect(uris).toEqual([URI]);
    expect(handshakeTimeouts).toEqual([2500]);
    await stream.close();
  });

  it('buffers frames that arrive before receive is called', async () => {
    const { socket, stream } = await openStream();

    socket.emit('message', Buffer.from('{"n":1}'));
    socket.emit('message', [Buffer.from('{"n":'), Buffer.from('2}')]);

    await expect(stream.receive()).resolves.toEqual({ type: 'message', data: '{"n":1}' });
    await expect(stream.receive()).resolves.toEqual({ type: 'message', data: '{"n":2}' });
    await stream.close();
  });

  it('resolves a pending receive when the next frame arrives', async () => {
    const { socket, stream } = await openStream();

    const pending = stream.receive();
    socket.emit('message', Buffer.from('{"n":3}'));

    await expect(pending).resolves.toEqual({ type: 'message', data: '{"n":3}' });
    await stream.close();
  });

  it('reports a remote close after draining buffered frames', async () => {
    const { socket, stream } = await openStream();

    socket.emit('message', Buffer.from('last'));
    socket.emit('close', 1006, Buffer.from('going away'));

    await expect(stream.receive()).resolves.toEqual({ type: 'message', data: 'last' });
    await expect(stream.receive()).resolves.toEqual({ type: 'closed', code: 1006, reason: 'going away' });
    await expect(stream.receive()).resolves.toEqual({ type: 'closed', code: 1006, reason: 'going away' });
  });

  it('rejects a pending receive when the socket errors', async () => {
    const { socket, stream } = await openStream();

    const pending = stream.receive();
    socket.emit('error', new Error('socket reset'));

    await expect(pending).rejects.toThrow('socket reset');
  });

  it('closes the socket with a normal closure code', async () => {
    const { socket, stream } = await openStream();

    await stream.close();

    expect(socket.closeCalls).toEqual([[1000, 'session complete']]);
  });

  it('rejects with CONNECT_ERROR when the socket fails before opening', async () => {
    const socket = new FakeSocket();
    const source = new WebSocketSource({ createSocket: () => socket });

    const pending = source.connect(URI);
    socket.emit('error', new Error('getaddrinfo ENOTFOUND'));

    const err = await pending.catch((caught: unknown) => caught);
    expect(isStreamSyncError(err) && err.code).toBe('CONNECT_ERROR');
  });

  it('rejects with CONNECT_ERROR when the socket closes before opening', async () => {
    const socket = new FakeSocket();
    const source = new WebSocketSource({ createSocket: () => socket });

    const pending = source.connect(URI);
    socket.emit('close', 1002, Buffer.from(''));

    const err = await pending.catch((caught: unknown) => caught);
    expect(isStreamSyncError(err) && err.code).toBe('CONNECT_ERROR');
  });

  it('fails with CONNECT_ERROR and terminates the socket when it never opens', async () => {
    vi.useFakeTimers();
    const socket = new FakeSocket();
    const source = new WebSocketSource({ createSocket: () => socket, openTimeoutMs: 1000 });

    const pending = source.connect(URI).catch((caught: unknown) => caught);
    await vi.advanceTimersByTimeAsync(1000);
    const err = await pending;

    expect(isStreamSyncError(err) && err.code).toBe('CONNECT_ERROR');
    expect(isStreamSyncError(err) && err.details).toEqual({ timeoutMs: 1000 });
    expect(socket.terminations).toBe(1);
  });

  it('pauses the socket at the high-water mark and resumes at half of it', async () => {
    const { socket, stream } = await openStream({ highWaterMark: 4 });

    for (const n of [1, 2, 3, 4]) {
      socket.emit('message', Buffer.from(`{"n":${n}}`));
    }
    expect(socket.pauses).toBe(1);

    await stream.receive();
    expect(socket.resumes).toBe(0);
    await stream.receive();
    expect(socket.resumes).toBe(1);
    await expect(stream.receive()).resolves.toEqual({ type: 'message', data: '{"n":3}' });
    expect(socket.pauses).toBe(1);
    await stream.close();
  });

  it('resumes a paused socket before closing it', async () => {
    const { socket, stream } = await openStream({ highWaterMark: 1 });

    socket.emit('message', Buffer.from('{"n":1}'));
    await stream.close();

    expect(socket.pauses).toBe(1);
    expect(socket.resumes).toBe(1);
    expect(socket.closeCalls).toEqual([[1000, 'session complete']]);
  });

  it('terminates a socket that stops answering pings and reports it as closed', async () => {
    vi.useFakeTimers();
    const { socket, stream } = await openStream({ pingIntervalMs: 1000 });

    const pending = stream.receive();
    await vi.advanceTimersByTimeAsync(1000);
    expect(socket.pings).toBe(1);
    await vi.advanceTimersByTimeAsync(1000);

    expect(socket.terminations).toBe(1);
    await expect(pending).resolves.toEqual({ type: 'closed', code: 1006, reason: '' });
  });

  it('keeps a socket that answers its pings', async () => {
    vi.useFakeTimers();
    const { socket, stream } = await openStream({ pingIntervalMs: 1000 });

    for (let tick = 0; tick < 3; tick += 1) {
      await vi.advanceTimersByTimeAsync(1000);
      socket.emit('pong');
    }

    expect(socket.pings).toBe(3);
    expect(socket.terminations).toBe(0);
    await stream.close();
    await vi.advanceTimersByTimeAsync(5000);
    expect(socket.pings).toBe(3);
  });
});
