import { readFile } from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';

import { StreamSyncError } from '../errors';

/**
 * Reads the identity column of a CSV file. Blank cells are skipped, repeats
 * keep their first position, and anything that is not a `did:` is rejected.
 */
export async function loadIdentities(filePath: string, column: string): Promise<string[]> {
  let csvText: string;
  try {
    csvText = await readFile(filePath, 'utf8');
  } catch (err) {
    throw new StreamSyncError('IO_ERROR', `cannot read identities file ${filePath}`, { cause: err });
  }

  const records: Array<Record<string, string>> = parseCsv(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  const first = records[0];
  if (first && !(column in first)) {
    throw new StreamSyncError('CONFIG_ERROR', `column "${column}" not found in ${filePath}`, {
      details: { columns: Object.keys(first) },
    });
  }

  const seen = new Set<string>();
  for (const [index, record] of records.entries()) {
    const value = record[column] ?? '';
    if (value === '') continue;
    if (!value.startsWith('did:')) {
      throw new StreamSyncError('CONFIG_ERROR', `row ${index + 2} of ${filePath} is not a did: identifier`, {
        details: { value },
      });
    }
    seen.add(value);
  }
  return [...seen];
}
