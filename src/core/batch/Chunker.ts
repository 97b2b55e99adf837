import { ChunkPlan } from '../entities/WorkItem.js';
import { InvalidChunkSizeError } from '../errors.js';

export const DEFAULT_MAX_ITEMS_PER_BATCH = 30;

function assertChunkSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new InvalidChunkSizeError(maxSize);
  }
}

/**
 * Split items into consecutive chunks of at most `maxSize`.
 * Order is preserved; only the last chunk may be shorter.
 */
export function split<T>(items: readonly T[], maxSize: number): T[][] {
  assertChunkSize(maxSize);

  const chunks: T[][] = [];
  let current: T[] = [];
  for (const item of items) {
    current.push(item);
    if (current.length >= maxSize) {
      chunks.push(current);
      current = [];
    }
  }
  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

/**
 * Preview of what split() would produce
 */
export function plan(items: readonly unknown[], maxSize: number): ChunkPlan {
  assertChunkSize(maxSize);

  const totalItems = items.length;
  const totalChunks = Math.ceil(totalItems / maxSize);
  const chunkSizes: number[] = [];
  for (let i = 0; i < totalChunks; i++) {
    chunkSizes.push(Math.min(maxSize, totalItems - i * maxSize));
  }
  return { totalItems, totalChunks, chunkSizes };
}
