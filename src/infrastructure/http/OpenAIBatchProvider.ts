import OpenAI, { toFile } from 'openai';
import { z } from 'zod';
import { BatchEndpoint } from '../../config.js';
import { ItemError } from '../../core/entities/Job.js';
import {
  IBatchProvider,
  ProviderPollResult,
  ProviderRequest,
  ProviderResultEntry,
} from '../../core/interfaces/IBatchProvider.js';
import { InvalidWorkItemError } from '../../core/errors.js';
import {
  CircuitBreaker,
  CircuitState,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  RetryLog,
  isRetryableError,
  withRetry,
} from '../../utils/retry.js';

export interface OpenAIBatchProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  endpoint: BatchEndpoint;
  completionWindow?: '24h';
  retryConfig?: RetryConfig;
  circuitBreaker?: CircuitBreaker;
  log?: (message: string) => void;
}

const payloadSchema = z.record(z.unknown());

const outputLineSchema = z.object({
  custom_id: z.string(),
  response: z
    .object({
      status_code: z.number(),
      body: z.unknown(),
    })
    .nullish(),
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
});

const errorBodySchema = z.object({
  error: z.object({
    code: z.string().nullish(),
    message: z.string(),
  }),
});

/**
 * One JSONL request line for the Batch API
 */
export function toBatchLine(request: ProviderRequest, model: string, endpoint: BatchEndpoint): string {
  const payload = payloadSchema.safeParse(request.payload);
  if (!payload.success) {
    throw new InvalidWorkItemError(`Payload for ${request.correlationKey} must be a JSON object`);
  }
  return JSON.stringify({
    custom_id: request.correlationKey,
    method: 'POST',
    url: endpoint,
    body: { model, ...payload.data },
  });
}

function lineError(line: z.infer<typeof outputLineSchema>): ItemError | null {
  if (line.error) {
    return {
      code: line.error.code ?? 'request_failed',
      message: line.error.message ?? 'Request failed',
    };
  }
  if (!line.response) {
    return { code: 'no_response', message: 'Batch output line has neither response nor error' };
  }
  if (line.response.status_code >= 400) {
    const body = errorBodySchema.safeParse(line.response.body);
    return {
      code: body.success && body.data.error.code ? body.data.error.code : `http_${line.response.status_code}`,
      message: body.success ? body.data.error.message : `Request failed with status ${line.response.status_code}`,
    };
  }
  return null;
}

/**
 * Parse an output or error file. Blank lines are skipped; any other line that is not
 * a valid result line fails the whole download.
 */
export function parseBatchOutput(text: string): ProviderResultEntry[] {
  const entries: ProviderResultEntry[] = [];
  const lines = text.split('\n');

  lines.forEach((raw, index) => {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      throw new Error(`Batch output line ${index + 1} is not valid JSON`);
    }
    const parsed = outputLineSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Batch output line ${index + 1} has an unexpected shape: ${parsed.error.issues[0]?.message}`);
    }

    const line = parsed.data;
    const error = lineError(line);
    if (error) {
      entries.push({ correlationKey: line.custom_id, ok: false, error });
    } else {
      entries.push({ correlationKey: line.custom_id, ok: true, result: line.response?.body ?? null });
    }
  });

  return entries;
}

/**
 * Status, counts and batch-level errors from a retrieved batch
 */
export function toPollResult(batch: Pick<OpenAI.Batch, 'status' | 'request_counts' | 'errors'>): ProviderPollResult {
  const result: ProviderPollResult = {
    status: batch.status,
    completedCount: batch.request_counts?.completed ?? 0,
    failedCount: batch.request_counts?.failed ?? 0,
  };

  if (batch.status === 'failed') {
    result.errors = (batch.errors?.data ?? []).map((error) => ({
      code: error.code ?? 'batch_failed',
      message: error.line ? `line ${error.line}: ${error.message ?? 'invalid request'}` : (error.message ?? 'Batch failed'),
    }));
  } else if (batch.status === 'expired') {
    result.errors = [{ code: 'expired', message: 'Batch expired before the completion window closed' }];
  }
  return result;
}

/**
 * Retry on rate limits, conflicts, timeouts, server errors and network failures
 */
export function isRetryableProviderError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    return error.status === 408 || error.status === 409 || error.status === 429 || error.status >= 500;
  }
  return isRetryableError(error);
}

/**
 * IBatchProvider backed by the OpenAI Batch API
 */
export class OpenAIBatchProvider implements IBatchProvider {
  readonly name = 'openai';

  private client: OpenAI | null = null;
  private apiKey?: string;
  private baseUrl?: string;
  private model: string;
  private endpoint: BatchEndpoint;
  private completionWindow: '24h';
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;
  private log: (message: string) => void;

  constructor(options: OpenAIBatchProviderOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.model = options.model;
    this.endpoint = options.endpoint;
    this.completionWindow = options.completionWindow ?? '24h';
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.retryConfig = {
      ...(options.retryConfig ?? DEFAULT_RETRY_CONFIG),
      shouldRetry: isRetryableProviderError,
    };
    this.log = options.log ?? ((message) => console.error(message));
  }

  async submit(requests: ProviderRequest[]): Promise<string> {
    const jsonl = requests.map((request) => toBatchLine(request, this.model, this.endpoint)).join('\n') + '\n';

    const file = await this.call('upload input file', async () =>
      this.getClient().files.create({
        file: await toFile(Buffer.from(jsonl, 'utf-8'), 'batch-input.jsonl'),
        purpose: 'batch',
      })
    );

    const batch = await this.call('create batch', () =>
      this.getClient().batches.create({
        input_file_id: file.id,
        endpoint: this.endpoint,
        completion_window: this.completionWindow,
      })
    );

    this.log(`[OpenAIBatchProvider] Submitted ${requests.length} requests as batch ${batch.id}`);
    return batch.id;
  }

  async poll(remoteId: string): Promise<ProviderPollResult> {
    const batch = await this.call('retrieve batch', () => this.getClient().batches.retrieve(remoteId));
    return toPollResult(batch);
  }

  async download(remoteId: string): Promise<ProviderResultEntry[]> {
    const batch = await this.call('retrieve batch', () => this.getClient().batches.retrieve(remoteId));

    const entries: ProviderResultEntry[] = [];
    for (const fileId of [batch.output_file_id, batch.error_file_id]) {
      if (!fileId) continue;
      const text = await this.call('download results', async () => {
        const response = await this.getClient().files.content(fileId);
        return response.text();
      });
      entries.push(...parseBatchOutput(text));
    }
    return entries;
  }

  async cancel(remoteId: string): Promise<{ status: string }> {
    const batch = await this.call('cancel batch', () => this.getClient().batches.cancel(remoteId));
    return { status: batch.status };
  }

  getCircuitBreakerState(): CircuitState {
    return this.circuitBreaker.getState();
  }

  /**
   * Created on first use so the server can start without an API key
   */
  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new Error('OPENAI_API_KEY is not configured');
      }
      // Retries are handled by call(), not by the SDK
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseUrl, maxRetries: 0 });
    }
    return this.client;
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.circuitBreaker.execute(() =>
      withRetry(fn, this.retryConfig, (entry: RetryLog) => {
        if (!entry.success && entry.nextRetryInMs !== undefined) {
          this.log(
            `[OpenAIBatchProvider] ${operation} attempt ${entry.attempt} failed: ${entry.error}; retrying in ${entry.nextRetryInMs}ms`
          );
        }
      })
    );
  }
}
