// Relative path: apps/worker/src/workers/stream/errors.ts
// Domain error types for the streaming engine. Only the codes listed as fatal
// ever escape a session; the rest are attached to log entries.
export type StreamSyncErrorCode =
  | 'CONFIG_ERROR'
  | 'CURSOR_FORMAT_ERROR'
  | 'CONNECT_ERROR'
  | 'DECODE_ERROR'
  | 'QUEUE_ERROR'
  | 'IO_ERROR';

export type StreamSyncErrorOptions = {
  cause?: unknown;
  details?: Record<string, unknown>;
};

/**
 * StreamSyncError enriches Error with a `code`, optional `cause`, and `details`
 * map so callers can reliably branch on error category and include context.
 */
export class StreamSyncError extends Error {
  readonly code: StreamSyncErrorCode;
  readonly cause?: unknown;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: StreamSyncErrorCode, message: string, options: StreamSyncErrorOptions = {}) {
    super(message);
    this.name = 'StreamSyncError';
    this.code = code;
    this.cause = options.cause;
    this.details = options.details ?? undefined;
  }
}

/** Type guard for StreamSyncError */
export function isStreamSyncError(err: unknown): err is StreamSyncError {
  return err instanceof StreamSyncError;
}

/** Flattens any thrown value into loggable fields. */
export function describeError(err: unknown): { name: string; message: string; code?: string } {
  if (isStreamSyncError(err)) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'Error', message: String(err) };
}
