/**
 * Cursor and time helpers. A cursor is an integer count of microseconds since
 * the Unix epoch; every timestamp accepted here is interpreted as UTC.
 */

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})-(\d{2}):(\d{2}):(\d{2})$/;
const DIGITS = /^\d+$/;

export const TIMESTAMP_FORMATS = ['YYYY-MM-DD', 'YYYY-MM-DD-HH:MM:SS'] as const;

export class CursorFormatError extends Error {
  readonly code = 'CURSOR_FORMAT_ERROR';
  readonly value: unknown;

  constructor(message: string, value: unknown) {
    super(message);
    this.name = 'CursorFormatError';
    this.value = value;
  }
}

/**
 * Parses a cursor supplied as a digit string or a non-negative safe integer.
 */
export function parseCursor(value: string | number): number {
  if (typeof value === 'number') {
    if (Number.isSafeInteger(value) && value >= 0) return value;
    throw new CursorFormatError(`cursor must be a non-negative integer, received ${value}`, value);
  }

  const trimmed = value.trim();
  if (!DIGITS.test(trimmed)) {
    throw new CursorFormatError(`cursor must contain only digits, received "${value}"`, value);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new CursorFormatError(`cursor is out of range: "${value}"`, value);
  }
  return parsed;
}

function toUtcMillis(timestamp: string): number | null {
  const match = DATE_TIME.exec(timestamp) ?? DATE_ONLY.exec(timestamp);
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const millis = Date.UTC(year, month - 1, day, hours, minutes, seconds);
  const check = new Date(millis);
  // Date.UTC rolls 2023-02-30 over into March; reject instead
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return millis;
}

export function isValidTimestamp(timestamp: string): boolean {
  return toUtcMillis(timestamp) !== null;
}

/**
 * Converts `YYYY-MM-DD` (midnight) or `YYYY-MM-DD-HH:MM:SS` into a cursor.
 */
export function timestampToCursor(timestamp: string): number {
  const millis = toUtcMillis(timestamp.trim());
  if (millis === null) {
    throw new CursorFormatError(
      `timestamp must use ${TIMESTAMP_FORMATS.join(' or ')} format, received "${timestamp}"`,
      timestamp,
    );
  }
  return millis * 1000;
}

/** UTC calendar day (`YYYY-MM-DD`) a cursor falls on. */
export function cursorToDate(cursor: number): string {
  return new Date(Math.floor(cursor / 1000)).toISOString().slice(0, 10);
}
