import { randomUUID } from 'crypto';
import {
  BatchJobRecord,
  ItemError,
  ItemResult,
  ItemResultMap,
  JobStatus,
  JobSummary,
  isTerminalStatus,
  putResult,
} from '../entities/Job.js';
import { ItemIdentity, WorkItem } from '../entities/WorkItem.js';
import {
  IBatchProvider,
  ProviderPollResult,
  ProviderRequest,
  ProviderResultEntry,
} from '../interfaces/IBatchProvider.js';
import { IBatchStore } from '../interfaces/IBatchStore.js';
import {
  CancelError,
  CollectionError,
  MalformedKeyError,
  NotReadyError,
  PollError,
  SubmissionError,
} from '../errors.js';
import { decodeKey, keyForItem } from './CorrelationCodec.js';

/**
 * Provider status vocabulary -> local state machine.
 * Anything not listed is treated as in_progress.
 */
const PROVIDER_STATUS_MAP = new Map<string, JobStatus>([
  ['queued', 'submitted'],
  ['pending', 'submitted'],
  ['submitted', 'submitted'],
  ['validating', 'validating'],
  ['in_progress', 'in_progress'],
  ['running', 'in_progress'],
  ['cancelling', 'in_progress'],
  ['finalizing', 'finalizing'],
  ['completed', 'completed'],
  ['succeeded', 'completed'],
  ['ended', 'completed'],
  ['failed', 'failed'],
  ['expired', 'failed'],
  ['cancelled', 'cancelled'],
  ['canceled', 'cancelled'],
]);

export function mapProviderStatus(status: string): JobStatus {
  return PROVIDER_STATUS_MAP.get(status.trim().toLowerCase()) ?? 'in_progress';
}

/**
 * One chunk's lifecycle against the remote provider.
 *
 * Every transition is written to the store before the in-memory record changes,
 * so a failed write leaves the job in its last persisted state. A job must not be
 * driven by two routines at once; callers serialize access per job.
 */
export class BatchJob {
  private state: BatchJobRecord;

  constructor(
    record: BatchJobRecord,
    private store: IBatchStore
  ) {
    this.state = record;
  }

  /**
   * New job in `created` state. Not persisted until the caller saves it.
   */
  static create(
    groupId: string,
    chunkIndex: number,
    chunk: WorkItem[],
    store: IBatchStore,
    attempt: number = 1
  ): BatchJob {
    return new BatchJob(
      {
        id: randomUUID(),
        groupId,
        chunkIndex,
        attempt,
        remoteId: null,
        status: 'created',
        itemCount: chunk.length,
        completedCount: 0,
        failedCount: 0,
        createdAt: new Date(),
        chunk: [...chunk],
        errors: [],
        collected: false,
      },
      store
    );
  }

  get record(): Readonly<BatchJobRecord> {
    return this.state;
  }

  get id(): string {
    return this.state.id;
  }

  get status(): JobStatus {
    return this.state.status;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.state.status);
  }

  summary(): JobSummary {
    const lastError = this.state.errors[this.state.errors.length - 1];
    return {
      jobId: this.state.id,
      chunkIndex: this.state.chunkIndex,
      attempt: this.state.attempt,
      status: this.state.status,
      remoteId: this.state.remoteId,
      itemCount: this.state.itemCount,
      completedCount: this.state.completedCount,
      failedCount: this.state.failedCount,
      collected: this.state.collected,
      lastError: lastError?.message,
    };
  }

  buildSubmission(): ProviderRequest[] {
    return this.state.chunk.map((item) => ({
      correlationKey: keyForItem(item),
      payload: item.payload,
    }));
  }

  async submit(provider: IBatchProvider): Promise<this> {
    if (this.state.status !== 'created') {
      return this;
    }

    let remoteId: string;
    try {
      remoteId = await provider.submit(this.buildSubmission());
    } catch (error) {
      throw new SubmissionError(this.state.id, this.state.itemCount, error);
    }

    this.commit({
      ...this.state,
      status: 'submitted',
      remoteId,
      remoteStatus: undefined,
      submittedAt: new Date(),
    });
    return this;
  }

  async refresh(provider: IBatchProvider): Promise<this> {
    if (this.isTerminal || this.state.remoteId === null) {
      return this;
    }

    const remoteId = this.state.remoteId;
    let polled: ProviderPollResult;
    try {
      polled = await provider.poll(remoteId);
    } catch (error) {
      throw new PollError(this.state.id, remoteId, error);
    }

    const status = mapProviderStatus(polled.status);
    const unchanged =
      status === this.state.status &&
      polled.status === this.state.remoteStatus &&
      polled.completedCount === this.state.completedCount &&
      polled.failedCount === this.state.failedCount &&
      !polled.errors?.length;
    if (unchanged) {
      return this;
    }

    const now = new Date();
    this.commit({
      ...this.state,
      status,
      remoteStatus: polled.status,
      completedCount: polled.completedCount,
      failedCount: polled.failedCount,
      completedAt: isTerminalStatus(status) ? now : undefined,
      errors: [
        ...this.state.errors,
        ...(polled.errors ?? []).map((error) => ({ ...error, timestamp: now })),
      ],
    });
    return this;
  }

  /**
   * Download and decode results. Cached after the first successful call.
   */
  async collect(provider: IBatchProvider): Promise<ItemResultMap> {
    if (this.state.status !== 'completed' || this.state.remoteId === null) {
      throw new NotReadyError(this.state.id, this.state.status);
    }
    if (this.state.collected && this.state.results) {
      return this.state.results;
    }

    let entries: ProviderResultEntry[];
    try {
      entries = await provider.download(this.state.remoteId);
    } catch (error) {
      throw new CollectionError(this.state.id, error);
    }

    const expected = new Map(this.state.chunk.map((item) => [keyForItem(item), item]));
    const seen = new Map<string, ItemResult>();
    const unresolved: ItemResult[] = [];

    for (const entry of entries) {
      const key = entry.correlationKey;
      let identity: ItemIdentity;
      try {
        identity = decodeKey(key);
      } catch (error) {
        if (!(error instanceof MalformedKeyError)) throw error;
        unresolved.push({ outcome: 'unresolved', key, error: { code: 'malformed_key', message: error.message } });
        continue;
      }

      if (!expected.has(key)) {
        unresolved.push({
          outcome: 'unresolved',
          key,
          error: { code: 'unknown_item', message: `Result for ${key} does not belong to job ${this.state.id}` },
        });
        continue;
      }

      seen.set(
        key,
        entry.ok
          ? { outcome: 'succeeded', key, item: identity, result: entry.result }
          : { outcome: 'failed', key, item: identity, error: entry.error }
      );
    }

    // Chunk order first, then anything the provider echoed that we could not place
    const results: ItemResultMap = {};
    for (const [key, item] of expected) {
      const missing: ItemError = { code: 'missing_result', message: 'Provider returned no result for this item' };
      putResult(
        results,
        seen.get(key) ?? {
          outcome: 'failed',
          key,
          item: { namespace: item.namespace, collection: item.collection, itemId: item.itemId, processor: item.processor },
          error: missing,
        }
      );
    }
    for (const entry of unresolved) {
      if (!Object.hasOwn(results, entry.key)) {
        putResult(results, entry);
      }
    }

    this.commit({ ...this.state, results, collected: true });
    return results;
  }

  /**
   * Advisory cancel: a terminal status reported by the provider wins.
   */
  async cancel(provider: IBatchProvider): Promise<this> {
    if (this.isTerminal) {
      return this;
    }

    const now = new Date();
    if (this.state.remoteId === null) {
      this.commit({ ...this.state, status: 'cancelled', completedAt: now });
      return this;
    }

    let reported: { status: string };
    try {
      reported = await provider.cancel(this.state.remoteId);
    } catch (error) {
      throw new CancelError(this.state.id, error);
    }

    const mapped = mapProviderStatus(reported.status);
    if (mapped === 'completed' || mapped === 'failed') {
      // Finished before the cancel landed; settle with the final counts and errors
      return this.refresh(provider);
    }
    this.commit({ ...this.state, status: 'cancelled', remoteStatus: reported.status, completedAt: now });
    return this;
  }

  /**
   * Record a rejected submission as a terminal failure
   */
  markFailed(code: string, message: string): this {
    if (this.state.status !== 'created') {
      return this;
    }
    const now = new Date();
    this.commit({
      ...this.state,
      status: 'failed',
      completedAt: now,
      errors: [...this.state.errors, { code, message, timestamp: now }],
    });
    return this;
  }

  private commit(next: BatchJobRecord): void {
    this.store.saveJob(next);
    this.state = next;
  }
}
