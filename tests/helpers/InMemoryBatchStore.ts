import { BatchGroupRecord } from '../../src/core/entities/Group.js';
import { BatchJobRecord, isTerminalStatus } from '../../src/core/entities/Job.js';
import { IBatchStore } from '../../src/core/interfaces/IBatchStore.js';

/**
 * Map-backed store. Records are cloned on the way in and out.
 */
export class InMemoryBatchStore implements IBatchStore {
  private groups = new Map<string, BatchGroupRecord>();
  private jobs = new Map<string, BatchJobRecord>();

  /** When set, every save throws */
  failSaves = false;
  saveJobCalls = 0;

  saveGroup(group: BatchGroupRecord, jobs: BatchJobRecord[] = []): void {
    this.checkWritable();
    this.groups.set(group.id, structuredClone(group));
    for (const job of jobs) {
      this.jobs.set(job.id, structuredClone(job));
    }
  }

  loadGroup(groupId: string): BatchGroupRecord | null {
    const group = this.groups.get(groupId);
    return group ? structuredClone(group) : null;
  }

  listGroups(): BatchGroupRecord[] {
    return [...this.groups.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((group) => structuredClone(group));
  }

  listActiveGroups(): BatchGroupRecord[] {
    return [...this.groups.values()]
      .filter((group) =>
        [...this.jobs.values()].some((job) => job.groupId === group.id && !isTerminalStatus(job.status))
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((group) => structuredClone(group));
  }

  deleteGroup(groupId: string): boolean {
    for (const [id, job] of this.jobs) {
      if (job.groupId === groupId) this.jobs.delete(id);
    }
    return this.groups.delete(groupId);
  }

  saveJob(job: BatchJobRecord): void {
    this.checkWritable();
    this.saveJobCalls++;
    this.jobs.set(job.id, structuredClone(job));
  }

  loadJob(jobId: string): BatchJobRecord | null {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  deleteJob(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  private checkWritable(): void {
    if (this.failSaves) {
      throw new Error('disk full');
    }
  }
}
