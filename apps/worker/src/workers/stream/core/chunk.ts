import { StreamSyncError } from '../errors';

/** Splits `items` into ordered chunks of `size`; only the last may be shorter. */
export function chunkList<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new StreamSyncError('CONFIG_ERROR', 'chunk size must be an integer >= 1', { details: { size } });
  }
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}
