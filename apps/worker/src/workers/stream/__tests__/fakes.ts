// In-memory stand-ins for the stream ports, shared by the engine's tests.
import type { BatchMetadata, ChunkReport, SerializedRecord } from '@jetstream-sync/types';

import type {
  ClockPort,
  LoggerPort,
  MessageSourcePort,
  MessageStream,
  QueuePort,
  ReceiveResult,
  ReportSinkPort,
} from '../ports';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export class TestLogger implements LoggerPort {
  public logs: Array<{ level: LogLevel; event: string; payload?: Record<string, unknown> }> = [];

  debug(event: string, payload?: Record<string, unknown>): void {
    this.logs.push({ level: 'debug', event, payload });
  }
  info(event: string, payload?: Record<string, unknown>): void {
    this.logs.push({ level: 'info', event, payload });
  }
  warn(event: string, payload?: Record<string, unknown>): void {
    this.logs.push({ level: 'warn', event, payload });
  }
  error(event: string, payload?: Record<string, unknown>): void {
    this.logs.push({ level: 'error', event, payload });
  }

  events(level?: LogLevel): string[] {
    return this.logs.filter((entry) => !level || entry.level === level).map((entry) => entry.event);
  }
}

/** Advances by `stepMs` on every read after the first. */
export class SteppingClock implements ClockPort {
  private calls = 0;

  constructor(private readonly start: Date, private readonly stepMs = 0) {}

  now(): Date {
    const value = new Date(this.start.getTime() + this.calls * this.stepMs);
    this.calls += 1;
    return value;
  }
}

export class FakeQueue implements QueuePort {
  public appends: Array<{ items: SerializedRecord[]; metadata: BatchMetadata }> = [];
  public attempts = 0;
  private failuresLeft: number;

  constructor(options: { failTimes?: number } = {}) {
    this.failuresLeft = options.failTimes ?? 0;
  }

  async append(items: SerializedRecord[], metadata: BatchMetadata): Promise<void> {
    this.attempts += 1;
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error('queue unavailable');
    }
    this.appends.push({ items: [...items], metadata });
  }

  async length(): Promise<number> {
    return this.appends.length;
  }

  sizes(): number[] {
    return this.appends.map((entry) => entry.items.length);
  }
}

export type ScriptStep = string | Error | { closed: true };

/** Replays a fixed script of frames, then reports a remote close. */
export class ScriptedStream implements MessageStream {
  public closed = false;
  public receives = 0;
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async receive(): Promise<ReceiveResult> {
    this.receives += 1;
    const step = this.steps.shift();
    if (step === undefined || (typeof step === 'object' && !(step instanceof Error))) {
      return { type: 'closed', code: 1000, reason: 'script exhausted' };
    }
    if (step instanceof Error) {
      throw step;
    }
    return { type: 'message', data: step };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeSource implements MessageSourcePort {
  public uris: string[] = [];

  constructor(private readonly stream: MessageStream | Error) {}

  async connect(uri: string): Promise<MessageStream> {
    this.uris.push(uri);
    if (this.stream instanceof Error) {
      throw this.stream;
    }
    return this.stream;
  }
}

export class MemoryReportSink implements ReportSinkPort {
  public rows: ChunkReport[] = [];
  public closed = false;

  async append(row: ChunkReport): Promise<void> {
    this.rows.push(row);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function commitMessage(cursor: number | string, collection = 'app.bsky.feed.post', did = 'did:plc:alpha'): string {
  return JSON.stringify({
    did,
    time_us: String(cursor),
    kind: 'commit',
    commit: { collection, operation: 'create', rkey: `rk${cursor}`, record: { text: 'test post' } },
  });
}
