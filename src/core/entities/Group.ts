import { ItemResultMap, JobStatus, JobSummary } from './Job.js';

/**
 * Group domain entities: the logical multi-job operation
 */
export type GroupStatus =
  | 'submitted'
  | 'partial'
  | 'completed'
  | 'partial_failure'
  | 'failed'
  | 'cancelled';

export interface BatchGroupRecord {
  id: string;
  processor: string;
  totalItems: number;
  maxItemsPerBatch: number;
  isSplit: boolean;
  jobIds: string[]; // chunk order
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A job-level problem that was contained instead of thrown
 */
export interface JobIssue {
  jobId: string;
  chunkIndex: number;
  operation: 'submit' | 'refresh' | 'collect' | 'cancel';
  message: string;
}

export interface GroupProgress {
  groupId: string;
  processor: string;
  status: GroupStatus;
  isSplit: boolean;
  totalBatches: number;
  completedBatches: number;
  failedBatches: number;
  cancelledBatches: number;
  activeBatches: number;
  totalItems: number;
  completedItems: number;
  failedItems: number;
  jobs: JobSummary[];
  issues: JobIssue[];
}

export interface PendingJob {
  jobId: string;
  chunkIndex: number;
  status: JobStatus;
  itemCount: number;
}

export interface GroupResult {
  groupId: string;
  processor: string;
  status: GroupStatus;
  results: ItemResultMap;
  /** Jobs still running at the provider */
  pending: PendingJob[];
  /** Failed or cancelled jobs; their items only return through retryFailed */
  stopped: PendingJob[];
  issues: JobIssue[];
  counts: {
    succeeded: number;
    failed: number;
    unresolved: number;
    pendingItems: number;
    stoppedItems: number;
  };
}

export interface GroupSummary {
  groupId: string;
  processor: string;
  status: GroupStatus;
  isSplit: boolean;
  totalBatches: number;
  totalItems: number;
  completedItems: number;
  failedItems: number;
  createdAt: Date;
  updatedAt: Date;
}
