/**
 * Test Purpose:
 * - Checks the JSON line format and level filtering of the console logger.
 *
 * Assumptions:
 * - A capturing writer replaces the console.
 *
 * Expected Outcome & Rationale:
 * - Entries below the minimum level are dropped; the rest serialize level, event and payload on one line.
 */
import { describe, it, expect } from 'vitest';

import { ConsoleLogger, type LogLevel } from './logger';

function capture(minLevel?: LogLevel) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new ConsoleLogger(minLevel, (level, line) => lines.push([level, line]));
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  it('serializes level, event and payload fields', () => {
    const { logger, lines } = capture();

    logger.info('batch.flushed', { size: 2, collections: ['app.bsky.feed.post'] });

    expect(lines).toEqual([
      ['info', '{"level":"info","event":"batch.flushed","size":2,"collections":["app.bsky.feed.post"]}'],
    ]);
  });

  it('drops entries below the minimum level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('stream.message.rejected');
    logger.info('stream.progress');
    logger.warn('stream.connection_closed', { code: 1006 });
    logger.error('stream.receive_failed');

    expect(lines.map(([level]) => level)).toEqual(['warn', 'error']);
  });

  it('defaults to info', () => {
    const { logger, lines } = capture();

    logger.debug('stream.message.rejected');

    expect(lines).toEqual([]);
  });
});
