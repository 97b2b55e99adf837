import { randomUUID } from 'crypto';
import pLimit from 'p-limit';
import { BatchGroup } from '../../core/batch/BatchGroup.js';
import { BatchJob } from '../../core/batch/BatchJob.js';
import { DEFAULT_MAX_ITEMS_PER_BATCH, plan, split } from '../../core/batch/Chunker.js';
import { keyForItem } from '../../core/batch/CorrelationCodec.js';
import {
  BatchGroupRecord,
  GroupProgress,
  GroupResult,
  GroupSummary,
  JobIssue,
  PendingJob,
} from '../../core/entities/Group.js';
import { ItemResultMap, putResult } from '../../core/entities/Job.js';
import { ChunkPlan, WorkItem } from '../../core/entities/WorkItem.js';
import {
  ActiveGroupError,
  AmbiguousGroupIdError,
  DuplicateItemError,
  EmptyGroupError,
  GroupNotFoundError,
  InvalidWorkItemError,
} from '../../core/errors.js';
import { IBatchProvider } from '../../core/interfaces/IBatchProvider.js';
import { IBatchStore } from '../../core/interfaces/IBatchStore.js';

export interface CoordinatorOptions {
  maxItemsPerBatch?: number;
  /**
   * Upper bound on concurrent provider calls within one group operation
   */
  concurrency?: number;
  log?: (message: string) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Presents the jobs created from one split as a single logical operation.
 *
 * Job-level failures are contained and reported on the group; only operations that
 * cannot start at all (bad input, unknown group) throw.
 */
export class GroupCoordinator {
  private maxItemsPerBatch: number;
  private concurrency: number;
  private log: (message: string) => void;

  constructor(
    private provider: IBatchProvider,
    private store: IBatchStore,
    options: CoordinatorOptions = {}
  ) {
    this.maxItemsPerBatch = options.maxItemsPerBatch ?? DEFAULT_MAX_ITEMS_PER_BATCH;
    this.concurrency = options.concurrency ?? 4;
    this.log = options.log ?? ((message) => console.error(message));
  }

  /**
   * Preview how items would be split without submitting anything
   */
  plan(items: readonly WorkItem[], maxItemsPerBatch: number = this.maxItemsPerBatch): ChunkPlan {
    return plan(items, maxItemsPerBatch);
  }

  async createGroup(
    items: readonly WorkItem[],
    processor: string,
    maxItemsPerBatch: number = this.maxItemsPerBatch
  ): Promise<BatchGroup> {
    const chunks = split(items, maxItemsPerBatch);
    if (chunks.length === 0) {
      throw new EmptyGroupError();
    }
    this.validateItems(items, processor);

    const now = new Date();
    const groupId = randomUUID();
    const jobs = chunks.map((chunk, index) => BatchJob.create(groupId, index, chunk, this.store));
    const record: BatchGroupRecord = {
      id: groupId,
      processor,
      totalItems: items.length,
      maxItemsPerBatch,
      isSplit: chunks.length > 1,
      jobIds: jobs.map((job) => job.id),
      createdAt: now,
      updatedAt: now,
    };

    // Group and jobs are stored before any provider call
    this.store.saveGroup(record, jobs.map((job) => ({ ...job.record })));
    this.log(
      `[GroupCoordinator] Created group ${groupId}: ${items.length} items in ${chunks.length} batch(es) of up to ${maxItemsPerBatch}`
    );

    const group = new BatchGroup(record, jobs);
    await this.submitJobs(group, jobs);
    return group;
  }

  /**
   * Load a group by full id or unique id prefix
   */
  getGroup(groupId: string): BatchGroup {
    const record = this.resolveGroup(groupId);
    const jobs = record.jobIds.map((jobId) => {
      const job = this.store.loadJob(jobId);
      if (!job) {
        throw new Error(`Group ${record.id} references missing job ${jobId}`);
      }
      return new BatchJob(job, this.store);
    });
    return new BatchGroup(record, jobs);
  }

  /**
   * Current progress without contacting the provider
   */
  getProgress(group: BatchGroup): GroupProgress {
    return group.progress();
  }

  async refreshGroup(group: BatchGroup): Promise<GroupProgress> {
    const issues: JobIssue[] = [];
    const limit = pLimit(this.concurrency);

    await Promise.all(
      group.jobs
        .filter((job) => !job.isTerminal)
        .map((job) =>
          limit(async () => {
            try {
              const before = job.status;
              await job.refresh(this.provider);
              if (job.status !== before) {
                this.log(`[GroupCoordinator] Job ${job.id} ${before} → ${job.status}`);
              }
            } catch (error) {
              issues.push(this.issue(job, 'refresh', error));
            }
          })
        )
    );

    return group.progress(this.ordered(issues));
  }

  async collectGroup(group: BatchGroup): Promise<GroupResult> {
    const issues: JobIssue[] = [];
    const collected = new Map<string, ItemResultMap>();
    const limit = pLimit(this.concurrency);

    await Promise.all(
      group.jobsWithStatus('completed').map((job) =>
        limit(async () => {
          try {
            collected.set(job.id, await job.collect(this.provider));
          } catch (error) {
            issues.push(this.issue(job, 'collect', error));
          }
        })
      )
    );

    // Merge in chunk order regardless of completion order
    const results: ItemResultMap = {};
    const pending: PendingJob[] = [];
    const stopped: PendingJob[] = [];
    for (const job of group.jobs) {
      const jobResults = collected.get(job.id);
      if (jobResults) {
        Object.values(jobResults).forEach((entry) => putResult(results, entry));
      } else if (job.status !== 'completed') {
        const entry: PendingJob = {
          jobId: job.id,
          chunkIndex: job.record.chunkIndex,
          status: job.status,
          itemCount: job.record.itemCount,
        };
        (job.isTerminal ? stopped : pending).push(entry);
      }
    }

    const entries = Object.values(results);
    return {
      groupId: group.id,
      processor: group.record.processor,
      status: group.status,
      results,
      pending,
      stopped,
      issues: this.ordered(issues),
      counts: {
        succeeded: entries.filter((entry) => entry.outcome === 'succeeded').length,
        failed: entries.filter((entry) => entry.outcome === 'failed').length,
        unresolved: entries.filter((entry) => entry.outcome === 'unresolved').length,
        pendingItems: pending.reduce((sum, job) => sum + job.itemCount, 0),
        stoppedItems: stopped.reduce((sum, job) => sum + job.itemCount, 0),
      },
    };
  }

  /**
   * Replace every failed job with a fresh job over the same chunk and submit it.
   * Completed and in-flight jobs are left alone.
   */
  async retryFailed(group: BatchGroup): Promise<BatchGroup> {
    const failed = group.jobsWithStatus('failed');
    if (failed.length === 0) {
      return group;
    }

    const replacements = failed.map((job) =>
      BatchJob.create(group.id, job.record.chunkIndex, job.record.chunk, this.store, job.record.attempt + 1)
    );
    const replaced = new Map(failed.map((job, index) => [job.id, replacements[index]]));
    const jobs = group.jobs.map((job) => replaced.get(job.id) ?? job);
    const record: BatchGroupRecord = {
      ...group.record,
      jobIds: jobs.map((job) => job.id),
      updatedAt: new Date(),
    };

    this.store.saveGroup(record, replacements.map((job) => ({ ...job.record })));
    for (const job of failed) {
      this.store.deleteJob(job.id);
    }
    group.record = record;
    group.jobs = jobs;

    this.log(`[GroupCoordinator] Retrying ${failed.length} failed batch(es) in group ${group.id}`);
    await this.submitJobs(group, replacements);
    return group;
  }

  async cancelGroup(group: BatchGroup): Promise<GroupProgress> {
    const issues: JobIssue[] = [];
    const limit = pLimit(this.concurrency);

    await Promise.all(
      group.jobs
        .filter((job) => !job.isTerminal)
        .map((job) =>
          limit(async () => {
            try {
              await job.cancel(this.provider);
            } catch (error) {
              issues.push(this.issue(job, 'cancel', error));
            }
          })
        )
    );

    this.log(`[GroupCoordinator] Cancel requested for group ${group.id} (status: ${group.status})`);
    return group.progress(this.ordered(issues));
  }

  /**
   * Group summaries, newest first
   */
  listGroups(): GroupSummary[] {
    return this.store
      .listGroups()
      .map((record) => this.getGroup(record.id).summary())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Pick up every group left active by a previous process: submit jobs that never
   * reached the provider, then poll the rest.
   */
  async resumeActiveGroups(): Promise<GroupProgress[]> {
    const active = this.store.listActiveGroups();
    if (active.length > 0) {
      this.log(`[GroupCoordinator] Resuming ${active.length} active group(s)`);
    }

    const reports: GroupProgress[] = [];
    for (const record of active) {
      const group = this.getGroup(record.id);
      const unsubmitted = group.jobsWithStatus('created');
      const submitIssues = await this.submitJobs(group, unsubmitted);
      const progress = await this.refreshGroup(group);
      reports.push({ ...progress, issues: this.ordered([...submitIssues, ...progress.issues]) });
    }
    return reports;
  }

  /**
   * Delete a group and its jobs. Active groups need `force`.
   */
  removeGroup(groupId: string, force: boolean = false): boolean {
    const group = this.getGroup(groupId);
    if (group.isActive && !force) {
      throw new ActiveGroupError(group.id, group.status);
    }
    const removed = this.store.deleteGroup(group.id);
    if (removed) {
      this.log(`[GroupCoordinator] Removed group ${group.id}`);
    }
    return removed;
  }

  private async submitJobs(group: BatchGroup, jobs: BatchJob[]): Promise<JobIssue[]> {
    const issues: JobIssue[] = [];
    const limit = pLimit(this.concurrency);

    await Promise.all(
      jobs.map((job) =>
        limit(async () => {
          try {
            await job.submit(this.provider);
          } catch (error) {
            issues.push(this.issue(job, 'submit', error));
            job.markFailed('submission_failed', errorMessage(error));
          }
        })
      )
    );

    const submitted = jobs.filter((job) => job.status === 'submitted').length;
    this.log(`[GroupCoordinator] Group ${group.id}: ${submitted}/${jobs.length} batch(es) submitted`);
    return issues;
  }

  private validateItems(items: readonly WorkItem[], processor: string): void {
    const seen = new Set<string>();
    for (const item of items) {
      if (item.processor !== processor) {
        throw new InvalidWorkItemError(
          `Work item ${item.namespace}/${item.collection}/${item.itemId} uses processor '${item.processor}', expected '${processor}'`
        );
      }
      const key = keyForItem(item);
      if (seen.has(key)) {
        throw new DuplicateItemError(key);
      }
      seen.add(key);
    }
  }

  private resolveGroup(groupId: string): BatchGroupRecord {
    const exact = this.store.loadGroup(groupId);
    if (exact) {
      return exact;
    }

    const matches = this.store.listGroups().filter((group) => group.id.startsWith(groupId));
    if (groupId.length === 0 || matches.length === 0) {
      throw new GroupNotFoundError(groupId);
    }
    if (matches.length > 1) {
      throw new AmbiguousGroupIdError(groupId, matches.map((group) => group.id));
    }
    return matches[0];
  }

  private issue(job: BatchJob, operation: JobIssue['operation'], error: unknown): JobIssue {
    const message = errorMessage(error);
    this.log(`[GroupCoordinator] ✗ ${operation} failed for job ${job.id}: ${message}`);
    return { jobId: job.id, chunkIndex: job.record.chunkIndex, operation, message };
  }

  /**
   * Issues sorted by chunk order so reports do not depend on completion order
   */
  private ordered(issues: JobIssue[]): JobIssue[] {
    return [...issues].sort((a, b) => a.chunkIndex - b.chunkIndex || a.operation.localeCompare(b.operation));
  }
}
