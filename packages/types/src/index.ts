// Common types shared across the monorepo

export type RecordKind = 'commit' | 'identity' | 'account';

type RecordBase = {
  /** Repository identity (DID) the event belongs to. */
  sourceIdentity: string;
  /** Microseconds since epoch, as assigned by the source. */
  cursor: number;
  /** ISO timestamp stamped when the record was extracted. */
  processedAt: string;
};

export type CommitRecord = RecordBase & {
  kind: 'commit';
  collection: string;
  commit: Record<string, unknown>;
};

export type IdentityRecord = RecordBase & {
  kind: 'identity';
  identity: Record<string, unknown>;
};

export type AccountRecord = RecordBase & {
  kind: 'account';
  account: Record<string, unknown>;
};

export type StreamRecord = CommitRecord | IdentityRecord | AccountRecord;

/** Queue item shape; mirrors the inbound wire names so consumers can read either. */
export type SerializedRecord = {
  did: string;
  time_us: string;
  kind: RecordKind;
  collection?: string;
  commit?: Record<string, unknown>;
  identity?: Record<string, unknown>;
  account?: Record<string, unknown>;
  processed_at: string;
};

export type BatchMetadata = {
  flushTime: string;
  batchSize: number;
  collections: string[];
};

export type StopReason =
  | 'target_count'
  | 'max_time'
  | 'end_cursor'
  | 'connection_closed'
  | 'error';

export type SessionStats = {
  messagesReceived: number;
  recordsStored: number;
  collections: string[];
  totalTimeSeconds: number;
  recordsPerSecond: number;
  latestCursor: number | null;
  currentDate: string | null;
  targetReached: boolean;
  endCursorReached: boolean;
  stopReason: StopReason;
  batchesFlushed: number;
  flushFailures: number;
  /** Records still pending when the final flush failed; stored but not on the queue. */
  unflushedRecords: number;
  queueLength: number | null;
};

export type ChunkStatus = 'SUCCESS' | 'DRY_RUN' | `ERROR: ${string}`;

export type ChunkReport = {
  chunkId: number;
  startTime: string;
  endTime: string;
  durationSeconds: number;
  identityCount: number;
  identities: string;
  collections: string;
  /** The start timestamp, or the start cursor when the run resumes from one; empty when unbounded. */
  startTimestamp: string;
  endTimestamp: string;
  targetCount: number;
  maxTime: number;
  queueName: string;
  recordsStored: number;
  latestCursor: string;
  currentDate: string;
  endCursorReached: boolean;
  status: ChunkStatus;
};
