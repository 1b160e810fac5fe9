import { z } from 'zod';

import type { RecordKind, SerializedRecord, StreamRecord } from '@jetstream-sync/types';

// Minimal envelope every event must carry; kind-specific payloads are checked per case
const envelopeSchema = z.object({
  did: z.string().min(1),
  time_us: z.union([
    z.string().regex(/^\d+$/),
    z.number().int().nonnegative(),
  ]),
  kind: z.string(),
  commit: z.unknown().optional(),
  identity: z.unknown().optional(),
  account: z.unknown().optional(),
});

const payloadSchema = z.record(z.unknown());

const KNOWN_KINDS: readonly RecordKind[] = ['commit', 'identity', 'account'];

/**
 * Per-session state shared between the extractor and the batch writer.
 * Built fresh for every session; never shared across sessions.
 */
export type SessionContext = {
  collectionsSeen: Set<string>;
};

export function createSessionContext(): SessionContext {
  return { collectionsSeen: new Set<string>() };
}

export type RejectReason = 'not_an_object' | 'missing_fields' | 'unknown_kind' | 'invalid_payload';

export type ExtractResult =
  | { ok: true; record: StreamRecord }
  | { ok: false; reason: RejectReason };

function isKnownKind(kind: string): kind is RecordKind {
  return KNOWN_KINDS.some((known) => known === kind);
}

function readPayload(value: unknown): Record<string, unknown> | null {
  if (value === undefined) return {};
  const parsed = payloadSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Projects a decoded message onto a typed record. Rejections are returned, not
 * thrown. A commit with a non-empty collection is registered in `context`.
 */
export function extractRecord(raw: unknown, context: SessionContext, processedAt: Date): ExtractResult {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, reason: 'not_an_object' };
  }

  const envelope = envelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return { ok: false, reason: 'missing_fields' };
  }

  const { did, time_us: timeUs, kind } = envelope.data;
  const message = envelope.data;
  const cursor = Number(timeUs);
  if (!Number.isSafeInteger(cursor)) {
    return { ok: false, reason: 'missing_fields' };
  }
  if (!isKnownKind(kind)) {
    return { ok: false, reason: 'unknown_kind' };
  }

  const base = { sourceIdentity: did, cursor, processedAt: processedAt.toISOString() };

  switch (kind) {
    case 'commit': {
      const commit = readPayload(message.commit);
      if (!commit) return { ok: false, reason: 'invalid_payload' };
      const collection = typeof commit.collection === 'string' ? commit.collection : '';
      if (collection) {
        context.collectionsSeen.add(collection);
      }
      return { ok: true, record: { ...base, kind, collection, commit } };
    }
    case 'identity': {
      const identity = readPayload(message.identity);
      if (!identity) return { ok: false, reason: 'invalid_payload' };
      return { ok: true, record: { ...base, kind, identity } };
    }
    case 'account': {
      const account = readPayload(message.account);
      if (!account) return { ok: false, reason: 'invalid_payload' };
      return { ok: true, record: { ...base, kind, account } };
    }
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

export function serializeRecord(record: StreamRecord): SerializedRecord {
  const base = {
    did: record.sourceIdentity,
    time_us: String(record.cursor),
    kind: record.kind,
    processed_at: record.processedAt,
  };
  switch (record.kind) {
    case 'commit':
      return { ...base, collection: record.collection, commit: record.commit };
    case 'identity':
      return { ...base, identity: record.identity };
    case 'account':
      return { ...base, account: record.account };
  }
}
