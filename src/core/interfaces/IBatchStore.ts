import { BatchGroupRecord } from '../entities/Group.js';
import { BatchJobRecord } from '../entities/Job.js';

/**
 * Interface for job and group persistence.
 * Each save must be atomic for the record(s) it is given.
 */
export interface IBatchStore {
  /**
   * Save a group, optionally together with its jobs in one transaction
   */
  saveGroup(group: BatchGroupRecord, jobs?: BatchJobRecord[]): void;

  loadGroup(groupId: string): BatchGroupRecord | null;

  listGroups(): BatchGroupRecord[];

  /**
   * Groups that still have at least one non-terminal job
   */
  listActiveGroups(): BatchGroupRecord[];

  deleteGroup(groupId: string): boolean;

  saveJob(job: BatchJobRecord): void;

  loadJob(jobId: string): BatchJobRecord | null;

  deleteJob(jobId: string): boolean;
}
