import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export type BatchEndpoint = '/v1/chat/completions' | '/v1/embeddings' | '/v1/completions';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  batch: {
    maxItemsPerBatch: number;
    concurrency: number;
    databasePath: string;
  };
  openai: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    endpoint: BatchEndpoint;
    completionWindow: '24h';
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    timeoutMs: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  batch: z.object({
    maxItemsPerBatch: z.number().int().min(1, 'Batches need at least 1 item').max(50000),
    concurrency: z.number().int().min(1).max(32),
    databasePath: z.string().min(1, 'Database path must not be empty'),
  }),
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url('Invalid OpenAI base URL'),
    model: z.string().min(1, 'Model must not be empty'),
    endpoint: z.enum(['/v1/chat/completions', '/v1/embeddings', '/v1/completions']),
    completionWindow: z.literal('24h'),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(100).max(10000),
    maxDelayMs: z.number().int().min(1000).max(120000),
    timeoutMs: z.number().int().min(1000).max(600000),
  }),
});

type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --max-items-per-batch 30 --db-path data/batch.db --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments and environment.
 * Throws a ZodError when validation fails.
 */
export function loadConfig(argv: string[] = process.argv, env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliArgs[cliKey];
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return parseInt(cliValue, 10);
    const envValue = env[envKey];
    return envValue ? parseInt(envValue, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'batch-orchestrator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    batch: {
      maxItemsPerBatch: getNumber('max-items-per-batch', 'BATCH_MAX_ITEMS', 30),
      concurrency: getNumber('batch-concurrency', 'BATCH_CONCURRENCY', 4),
      databasePath: getString('db-path', 'BATCH_DB_PATH', 'data/batch.db'),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      baseUrl: getString('openai-base-url', 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      model: getString('model', 'BATCH_MODEL', 'gpt-4o-mini'),
      endpoint: getString('endpoint', 'BATCH_ENDPOINT', '/v1/chat/completions'),
      completionWindow: getString('completion-window', 'BATCH_COMPLETION_WINDOW', '24h'),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 4),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
      timeoutMs: getNumber('retry-timeout', 'RETRY_TIMEOUT_MS', 60000),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from environment variables or CLI arguments.
 * Prints every validation problem and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Batch size must be a positive integer (provider limit, default 30)');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║           Batch Group Orchestrator - Configuration               ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`📦 Batches: up to ${config.batch.maxItemsPerBatch} items each | ${config.batch.concurrency} concurrent provider calls`);
  console.error(`💾 Store: ${config.batch.databasePath}`);
  console.error(`🤖 Provider: ${config.openai.baseUrl} (${config.openai.model}, ${config.openai.endpoint})`);
  if (!config.openai.apiKey) {
    console.error('   ⚠️  OPENAI_API_KEY is not set; provider calls will fail');
  }
  console.error(
    `⚙️  Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms, timeout ${config.retry.timeoutMs}ms)`
  );

  console.error('\n' + '─'.repeat(68));
}
