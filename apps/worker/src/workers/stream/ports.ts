// Relative path: apps/worker/src/workers/stream/ports.ts
// Ports define the narrow I/O boundary for the streaming engine. The connector,
// batch writer and backfill orchestrator only talk to these interfaces, so
// sessions run against fakes in tests without sockets, Redis or real time.
import type {
  BatchMetadata,
  ChunkReport,
  SerializedRecord,
} from '@jetstream-sync/types';

export interface ClockPort {
  now(): Date;
}

export interface LoggerPort {
  debug(event: string, payload?: Record<string, unknown>): void;
  info(event: string, payload?: Record<string, unknown>): void;
  warn(event: string, payload?: Record<string, unknown>): void;
  error(event: string, payload?: Record<string, unknown>): void;
}

/** Durable queue the batch writer hands records to. */
export interface QueuePort {
  append(items: SerializedRecord[], metadata: BatchMetadata): Promise<void>;
  length(): Promise<number>;
}

export type ReceiveResult =
  | { type: 'message'; data: string }
  | { type: 'closed'; code: number; reason: string };

/** One open subscription. `receive` is the only call that waits on the network. */
export interface MessageStream {
  receive(): Promise<ReceiveResult>;
  close(): Promise<void>;
}

export interface MessageSourcePort {
  connect(uri: string): Promise<MessageStream>;
}

/** Append-only sink for backfill chunk rows. */
export interface ReportSinkPort {
  append(row: ChunkReport): Promise<void>;
  close(): Promise<void>;
}
