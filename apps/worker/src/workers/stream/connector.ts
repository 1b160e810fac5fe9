import { CursorFormatError, cursorToDate, parseCursor, timestampToCursor } from '@jetstream-sync/cursor';
import type { SessionStats, StopReason } from '@jetstream-sync/types';

import { BatchWriter } from './batchWriter';
import { createSessionContext, extractRecord, type SessionContext } from './core/extract';
import { evaluateStopCondition } from './core/stopConditions';
import { buildSubscribeUri } from './core/uri';
import { StreamSyncError, describeError, isStreamSyncError } from './errors';
import type {
  ClockPort,
  LoggerPort,
  MessageSourcePort,
  MessageStream,
  QueuePort,
  ReceiveResult,
} from './ports';

export type ListenParams = {
  instance: string;
  wantedCollections: readonly string[];
  wantedIdentities?: readonly string[];
  /** Resume point; mutually exclusive with `startTimestamp`. */
  startCursor?: string | number;
  startTimestamp?: string;
  /** Stop once a stored record reaches this bound; mutually exclusive with `endCursor`. */
  endTimestamp?: string;
  endCursor?: string | number;
  targetCount: number;
  maxTimeSeconds: number;
};

export type StreamConnectorDependencies = {
  source: MessageSourcePort;
  queue: QueuePort;
  clock: ClockPort;
  logger: LoggerPort;
  batchSize: number;
  /** Log progress each time this many more records have been stored. */
  progressEvery?: number;
};

type Bounds = {
  startCursor?: number;
  endCursor?: number;
};

type SessionState = {
  messagesReceived: number;
  recordsStored: number;
  latestCursor: number | null;
  currentDate: string | null;
  endCursorReached: boolean;
  lastProgressAt: number;
};

type SessionScope = {
  stream: MessageStream;
  writer: BatchWriter;
  context: SessionContext;
  state: SessionState;
  params: ListenParams;
  bounds: Bounds;
  startedAt: Date;
};

const DEFAULT_PROGRESS_EVERY = 100;
const DECODE_PREVIEW_CHARS = 200;

function toCursor(label: string, value: string | number): number {
  try {
    return parseCursor(value);
  } catch (err) {
    throw new StreamSyncError('CURSOR_FORMAT_ERROR', `${label}: ${describeError(err).message}`, { cause: err });
  }
}

function fromTimestamp(label: string, value: string): number {
  try {
    return timestampToCursor(value);
  } catch (err) {
    if (err instanceof CursorFormatError) {
      throw new StreamSyncError('CURSOR_FORMAT_ERROR', `${label}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/** Resolves the start/end bounds once, before connecting. */
export function resolveBounds(params: ListenParams): Bounds {
  if (params.startCursor !== undefined && params.startTimestamp !== undefined) {
    throw new StreamSyncError('CONFIG_ERROR', 'startCursor and startTimestamp are mutually exclusive');
  }
  if (params.endCursor !== undefined && params.endTimestamp !== undefined) {
    throw new StreamSyncError('CONFIG_ERROR', 'endCursor and endTimestamp are mutually exclusive');
  }

  const bounds: Bounds = {};
  if (params.startCursor !== undefined) bounds.startCursor = toCursor('startCursor', params.startCursor);
  if (params.startTimestamp !== undefined) bounds.startCursor = fromTimestamp('startTimestamp', params.startTimestamp);
  if (params.endCursor !== undefined) bounds.endCursor = toCursor('endCursor', params.endCursor);
  if (params.endTimestamp !== undefined) bounds.endCursor = fromTimestamp('endTimestamp', params.endTimestamp);
  return bounds;
}

function validateBudgets(params: ListenParams): void {
  if (!Number.isInteger(params.targetCount) || params.targetCount < 1) {
    throw new StreamSyncError('CONFIG_ERROR', 'targetCount must be an integer >= 1', {
      details: { targetCount: params.targetCount },
    });
  }
  if (!Number.isFinite(params.maxTimeSeconds) || params.maxTimeSeconds <= 0) {
    throw new StreamSyncError('CONFIG_ERROR', 'maxTimeSeconds must be > 0', {
      details: { maxTimeSeconds: params.maxTimeSeconds },
    });
  }
}

/** Reads `time_us` off any decoded frame, accepted by the extractor or not. */
function peekCursor(decoded: unknown): number | null {
  if (typeof decoded !== 'object' || decoded === null || !('time_us' in decoded)) return null;
  const value = decoded.time_us;
  if (typeof value === 'number') return Number.isSafeInteger(value) && value >= 0 ? value : null;
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Runs one subscription session: connect, then receive → decode → extract →
 * stage until a stop condition holds, then flush what is left and report.
 *
 * Only configuration problems and a failed connection are thrown. Once
 * connected, every failure ends in a returned SessionStats.
 */
export class StreamConnector {
  constructor(private readonly deps: StreamConnectorDependencies) {}

  async listen(params: ListenParams): Promise<SessionStats> {
    const { source, queue, clock, logger, batchSize } = this.deps;

    validateBudgets(params);
    const bounds = resolveBounds(params);
    const uri = buildSubscribeUri(params.instance, {
      wantedCollections: params.wantedCollections,
      wantedIdentities: params.wantedIdentities,
      cursor: bounds.startCursor,
    });

    const context = createSessionContext();
    const writer = new BatchWriter({ queue, clock, logger, context, batchSize });

    logger.info('stream.connect', {
      uri,
      targetCount: params.targetCount,
      maxTimeSeconds: params.maxTimeSeconds,
      endCursor: bounds.endCursor ?? null,
    });
    const startedAt = clock.now();

    let stream: MessageStream;
    try {
      stream = await source.connect(uri);
    } catch (err) {
      if (isStreamSyncError(err)) throw err;
      throw new StreamSyncError('CONNECT_ERROR', `failed to connect to ${params.instance}`, {
        cause: err,
        details: { uri },
      });
    }

    const scope: SessionScope = {
      stream,
      writer,
      context,
      params,
      bounds,
      startedAt,
      state: {
        messagesReceived: 0,
        recordsStored: 0,
        latestCursor: null,
        currentDate: bounds.startCursor !== undefined ? cursorToDate(bounds.startCursor) : null,
        endCursorReached: false,
        lastProgressAt: 0,
      },
    };

    let stopReason: StopReason;
    try {
      stopReason = await this.consume(scope);
    } catch (err) {
      logger.error('stream.session_failed', describeError(err));
      stopReason = 'error';
    }

    return this.finalize(scope, stopReason);
  }

  private elapsedSeconds(startedAt: Date): number {
    return (this.deps.clock.now().getTime() - startedAt.getTime()) / 1000;
  }

  private async consume(scope: SessionScope): Promise<StopReason> {
    const { logger } = this.deps;
    const { stream, state, params } = scope;

    while (true) {
      const budgetStop = evaluateStopCondition({
        recordsStored: state.recordsStored,
        targetCount: params.targetCount,
        elapsedSeconds: this.elapsedSeconds(scope.startedAt),
        maxTimeSeconds: params.maxTimeSeconds,
        endCursorReached: state.endCursorReached,
      });
      if (budgetStop) return budgetStop;

      this.logProgress(scope);

      let received: ReceiveResult;
      try {
        received = await stream.receive();
      } catch (err) {
        logger.error('stream.receive_failed', describeError(err));
        return 'error';
      }

      if (received.type === 'closed') {
        logger.warn('stream.connection_closed', { code: received.code, reason: received.reason });
        return 'connection_closed';
      }

      state.messagesReceived += 1;
      try {
        await this.handleMessage(scope, received.data);
      } catch (err) {
        logger.error('stream.message.failed', {
          messagesReceived: state.messagesReceived,
          ...describeError(err),
        });
      }
    }
  }

  private async handleMessage(scope: SessionScope, data: string): Promise<void> {
    const { clock, logger } = this.deps;
    const { state, bounds, writer, context } = scope;

    let decoded: unknown;
    try {
      decoded = JSON.parse(data);
    } catch {
      logger.warn('stream.message.decode_failed', { preview: data.slice(0, DECODE_PREVIEW_CHARS) });
      return;
    }

    const cursor = peekCursor(decoded);
    if (cursor !== null) {
      state.latestCursor = cursor;
      this.trackDate(state, cursor);
    }

    const result = extractRecord(decoded, context, clock.now());
    if (!result.ok) {
      logger.debug('stream.message.rejected', { reason: result.reason, cursor });
      return;
    }

    await writer.stage(result.record);
    state.recordsStored += 1;

    if (bounds.endCursor !== undefined && result.record.cursor >= bounds.endCursor) {
      state.endCursorReached = true;
      logger.info('stream.end_cursor_reached', {
        cursor: result.record.cursor,
        endCursor: bounds.endCursor,
      });
    }
  }

  private trackDate(state: SessionState, cursor: number): void {
    const date = cursorToDate(cursor);
    if (date === state.currentDate) return;
    if (state.currentDate !== null) {
      this.deps.logger.info('stream.date_change', { from: state.currentDate, to: date });
    }
    state.currentDate = date;
  }

  private logProgress(scope: SessionScope): void {
    const { state, params } = scope;
    const every = this.deps.progressEvery ?? DEFAULT_PROGRESS_EVERY;
    if (state.recordsStored === 0 || state.recordsStored % every !== 0) return;
    if (state.recordsStored === state.lastProgressAt) return;

    state.lastProgressAt = state.recordsStored;
    this.deps.logger.info('stream.progress', {
      recordsStored: state.recordsStored,
      targetCount: params.targetCount,
      percent: Math.round((state.recordsStored / params.targetCount) * 1000) / 10,
      elapsedSeconds: this.elapsedSeconds(scope.startedAt),
      currentDate: state.currentDate,
    });
  }

  private async finalize(scope: SessionScope, stopReason: StopReason): Promise<SessionStats> {
    const { queue, logger } = this.deps;
    const { stream, writer, context, state, params } = scope;

    const flush = await writer.flushRemaining();

    try {
      await stream.close();
    } catch (err) {
      logger.warn('stream.close_failed', describeError(err));
    }

    let queueLength: number | null = null;
    try {
      queueLength = await queue.length();
    } catch (err) {
      logger.warn('queue.length_failed', describeError(err));
    }

    const totalTimeSeconds = this.elapsedSeconds(scope.startedAt);
    const stats: SessionStats = {
      messagesReceived: state.messagesReceived,
      recordsStored: state.recordsStored,
      collections: [...context.collectionsSeen],
      totalTimeSeconds,
      recordsPerSecond: totalTimeSeconds > 0 ? state.recordsStored / totalTimeSeconds : 0,
      latestCursor: state.latestCursor,
      currentDate: state.currentDate,
      targetReached: state.recordsStored >= params.targetCount,
      endCursorReached: state.endCursorReached,
      stopReason,
      batchesFlushed: writer.batchesFlushed,
      flushFailures: writer.flushFailures,
      unflushedRecords: flush.status === 'failed' ? writer.pendingCount : 0,
      queueLength,
    };

    logger.info('stream.completed', stats);
    return stats;
  }
}
