import { DEFAULT_MAX_ITEMS_PER_BATCH, plan, split } from '../src/core/batch/Chunker.js';
import { InvalidChunkSizeError } from '../src/core/errors.js';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe('Chunker', () => {
  describe('split', () => {
    test('should split into full chunks plus a short last chunk', () => {
      const chunks = split(range(65), 30);

      expect(chunks.map((chunk) => chunk.length)).toEqual([30, 30, 5]);
      expect(chunks[1][0]).toBe(30);
      expect(chunks[2]).toEqual([60, 61, 62, 63, 64]);
    });

    test('should reproduce the input when chunks are concatenated', () => {
      const items = range(47);
      expect(split(items, 10).flat()).toEqual(items);
    });

    test('should return a single chunk at exactly the limit', () => {
      expect(split(range(30), 30)).toEqual([range(30)]);
    });

    test('should put one item past the limit in its own chunk', () => {
      const chunks = split(range(31), 30);

      expect(chunks.map((chunk) => chunk.length)).toEqual([30, 1]);
      expect(chunks[1]).toEqual([30]);
    });

    test('should split an exact multiple of the limit into full chunks', () => {
      expect(split(range(60), 30).map((chunk) => chunk.length)).toEqual([30, 30]);
    });

    test('should return no chunks for no items', () => {
      expect(split([], 30)).toEqual([]);
    });

    test('should allow a chunk size of one', () => {
      expect(split(['a', 'b', 'c'], 1)).toEqual([['a'], ['b'], ['c']]);
    });

    test('should reject sizes that are not positive integers', () => {
      expect(() => split(range(3), 0)).toThrow(InvalidChunkSizeError);
      expect(() => split(range(3), -5)).toThrow(InvalidChunkSizeError);
      expect(() => split(range(3), 2.5)).toThrow('Chunk size must be a positive integer, got 2.5');
    });
  });

  describe('plan', () => {
    test('should describe the split without producing it', () => {
      expect(plan(range(65), 30)).toEqual({ totalItems: 65, totalChunks: 3, chunkSizes: [30, 30, 5] });
    });

    test('should agree with split', () => {
      const items = range(101);
      const preview = plan(items, 25);
      expect(preview.chunkSizes).toEqual(split(items, 25).map((chunk) => chunk.length));
    });

    test('should handle an empty input', () => {
      expect(plan([], DEFAULT_MAX_ITEMS_PER_BATCH)).toEqual({ totalItems: 0, totalChunks: 0, chunkSizes: [] });
    });

    test('should reject an invalid size', () => {
      expect(() => plan(range(3), 0)).toThrow(InvalidChunkSizeError);
    });
  });
});
