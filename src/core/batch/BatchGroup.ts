import { BatchGroupRecord, GroupProgress, GroupStatus, GroupSummary, JobIssue } from '../entities/Group.js';
import { JobStatus, isTerminalStatus } from '../entities/Job.js';
import { BatchJob } from './BatchJob.js';

/**
 * Aggregate status from the current per-job states
 */
export function deriveGroupStatus(statuses: readonly JobStatus[]): GroupStatus {
  const terminal = statuses.filter(isTerminalStatus);

  if (terminal.length === 0) return 'submitted';
  if (terminal.length < statuses.length) return 'partial';

  if (statuses.every((s) => s === 'completed')) return 'completed';
  if (statuses.every((s) => s === 'failed')) return 'failed';
  if (statuses.includes('failed')) return 'partial_failure';
  return 'cancelled';
}

/**
 * A group record together with its jobs in chunk order.
 * Status is never stored; it is recomputed from the jobs on every read.
 */
export class BatchGroup {
  constructor(
    public record: BatchGroupRecord,
    public jobs: BatchJob[]
  ) {}

  get id(): string {
    return this.record.id;
  }

  get status(): GroupStatus {
    return deriveGroupStatus(this.jobs.map((job) => job.status));
  }

  get isActive(): boolean {
    return this.jobs.some((job) => !job.isTerminal);
  }

  jobsWithStatus(status: JobStatus): BatchJob[] {
    return this.jobs.filter((job) => job.status === status);
  }

  progress(issues: JobIssue[] = []): GroupProgress {
    const completed = this.jobsWithStatus('completed');
    const failed = this.jobsWithStatus('failed');

    return {
      groupId: this.record.id,
      processor: this.record.processor,
      status: this.status,
      isSplit: this.record.isSplit,
      totalBatches: this.jobs.length,
      completedBatches: completed.length,
      failedBatches: failed.length,
      cancelledBatches: this.jobsWithStatus('cancelled').length,
      activeBatches: this.jobs.filter((job) => !isTerminalStatus(job.status)).length,
      totalItems: this.record.totalItems,
      completedItems: completed.reduce((sum, job) => sum + job.record.completedCount, 0),
      failedItems: this.jobs.reduce((sum, job) => sum + job.record.failedCount, 0),
      jobs: this.jobs.map((job) => job.summary()),
      issues,
    };
  }

  summary(): GroupSummary {
    const progress = this.progress();
    return {
      groupId: this.record.id,
      processor: this.record.processor,
      status: progress.status,
      isSplit: this.record.isSplit,
      totalBatches: progress.totalBatches,
      totalItems: progress.totalItems,
      completedItems: progress.completedItems,
      failedItems: progress.failedItems,
      createdAt: this.record.createdAt,
      updatedAt: this.record.updatedAt,
    };
  }
}
