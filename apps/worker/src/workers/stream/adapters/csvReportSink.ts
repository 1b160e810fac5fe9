import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import type { ChunkReport } from '@jetstream-sync/types';

import { StreamSyncError } from '../errors';
import type { ClockPort, ReportSinkPort } from '../ports';

export const REPORT_COLUMNS: ReadonlyArray<{ key: keyof ChunkReport; header: string }> = [
  { key: 'chunkId', header: 'chunk_id' },
  { key: 'startTime', header: 'start_time' },
  { key: 'endTime', header: 'end_time' },
  { key: 'durationSeconds', header: 'duration_seconds' },
  { key: 'identityCount', header: 'identity_count' },
  { key: 'identities', header: 'identities' },
  { key: 'collections', header: 'collections' },
  { key: 'startTimestamp', header: 'start_timestamp' },
  { key: 'endTimestamp', header: 'end_timestamp' },
  { key: 'targetCount', header: 'target_count' },
  { key: 'maxTime', header: 'max_time' },
  { key: 'queueName', header: 'queue_name' },
  { key: 'recordsStored', header: 'records_stored' },
  { key: 'latestCursor', header: 'latest_cursor' },
  { key: 'currentDate', header: 'current_date' },
  { key: 'endCursorReached', header: 'end_cursor_reached' },
  { key: 'status', header: 'status' },
];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `backfill_sync_report_YYYYMMDD_HHMMSS.csv`, in UTC. */
export function reportFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `backfill_sync_report_${date}_${time}.csv`;
}

export function formatReportRow(row: ChunkReport): string {
  return stringify([row], {
    columns: REPORT_COLUMNS.map((column) => column.key),
    cast: { boolean: (value) => String(value) },
  });
}

/**
 * Append-only CSV report. The header is written on creation and every row is
 * appended to disk as soon as it is handed over, so a crash mid-run keeps the
 * rows of every chunk that finished.
 */
export class CsvReportSink implements ReportSinkPort {
  private constructor(readonly filePath: string) {}

  static async create(options: { outputDir: string; clock: ClockPort }): Promise<CsvReportSink> {
    const filePath = path.join(options.outputDir, reportFileName(options.clock.now()));
    try {
      await mkdir(options.outputDir, { recursive: true });
      await writeFile(filePath, stringify([REPORT_COLUMNS.map((column) => column.header)]), 'utf8');
    } catch (err) {
      throw new StreamSyncError('IO_ERROR', `cannot create report ${filePath}`, { cause: err });
    }
    return new CsvReportSink(filePath);
  }

  async append(row: ChunkReport): Promise<void> {
    try {
      await appendFile(this.filePath, formatReportRow(row), 'utf8');
    } catch (err) {
      throw new StreamSyncError('IO_ERROR', `cannot append chunk ${row.chunkId} to ${this.filePath}`, {
        cause: err,
      });
    }
  }

  async close(): Promise<void> {
    // rows are already on disk
  }
}
