import { ZodError } from 'zod';
import { loadConfig, parseArgs } from '../src/config.js';

const ARGV = ['node', 'index.js'];

describe('parseArgs', () => {
  test('should read values and bare flags', () => {
    expect(parseArgs([...ARGV, '--db-path', 'tmp/test.db', '--debug', '--model', 'gpt-4o'])).toEqual({
      'db-path': 'tmp/test.db',
      debug: true,
      model: 'gpt-4o',
    });
  });

  test('should ignore positional arguments', () => {
    expect(parseArgs([...ARGV, 'stray'])).toEqual({});
  });
});

describe('loadConfig', () => {
  test('should apply defaults', () => {
    const config = loadConfig(ARGV, {});

    expect(config.batch).toEqual({ maxItemsPerBatch: 30, concurrency: 4, databasePath: 'data/batch.db' });
    expect(config.openai).toEqual({
      apiKey: undefined,
      baseUrl: 'https://api.openai.com/v1',
      model: 'gpt-4o-mini',
      endpoint: '/v1/chat/completions',
      completionWindow: '24h',
    });
    expect(config.retry).toEqual({ maxAttempts: 4, initialDelayMs: 1000, maxDelayMs: 8000, timeoutMs: 60000 });
    expect(config.server.debug).toBe(false);
  });

  test('should read the environment', () => {
    const config = loadConfig(ARGV, {
      BATCH_MAX_ITEMS: '50',
      BATCH_CONCURRENCY: '8',
      OPENAI_API_KEY: 'test-secret',
      BATCH_ENDPOINT: '/v1/embeddings',
      DEBUG: 'true',
    });

    expect(config.batch.maxItemsPerBatch).toBe(50);
    expect(config.batch.concurrency).toBe(8);
    expect(config.openai.apiKey).toBe('test-secret');
    expect(config.openai.endpoint).toBe('/v1/embeddings');
    expect(config.server.debug).toBe(true);
  });

  test('should prefer CLI arguments over the environment', () => {
    const config = loadConfig([...ARGV, '--max-items-per-batch', '10'], { BATCH_MAX_ITEMS: '50' });

    expect(config.batch.maxItemsPerBatch).toBe(10);
  });

  test('should reject a non-positive batch size', () => {
    expect(() => loadConfig(ARGV, { BATCH_MAX_ITEMS: '0' })).toThrow(ZodError);
  });

  test('should reject an unsupported endpoint', () => {
    expect(() => loadConfig(ARGV, { BATCH_ENDPOINT: '/v1/images' })).toThrow(ZodError);
  });

  test('should reject a batch size that is not a number', () => {
    expect(() => loadConfig([...ARGV, '--max-items-per-batch', 'many'], {})).toThrow(ZodError);
  });
});
