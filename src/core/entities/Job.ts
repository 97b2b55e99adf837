import { ItemIdentity, WorkItem } from './WorkItem.js';

/**
 * Batch job domain entity: one chunk's lifecycle against the provider
 */
export type JobStatus =
  | 'created'
  | 'submitted'
  | 'validating'
  | 'in_progress'
  | 'finalizing'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export interface JobError {
  code: string;
  message: string;
  timestamp: Date;
}

export interface ItemError {
  code: string;
  message: string;
}

export type ItemResult =
  | { outcome: 'succeeded'; key: string; item: ItemIdentity; result: unknown }
  | { outcome: 'failed'; key: string; item: ItemIdentity; error: ItemError }
  | { outcome: 'unresolved'; key: string; error: ItemError };

export type ItemResultMap = Record<string, ItemResult>;

/**
 * Add an entry as an own property, so keys such as `__proto__` or `toString` are kept.
 */
export function putResult(results: ItemResultMap, result: ItemResult): void {
  Object.defineProperty(results, result.key, {
    value: result,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export interface BatchJobRecord {
  id: string;
  groupId: string;
  chunkIndex: number;
  attempt: number;
  remoteId: string | null;
  status: JobStatus;
  remoteStatus?: string; // last raw status string reported by the provider
  itemCount: number;
  completedCount: number;
  failedCount: number;
  createdAt: Date;
  submittedAt?: Date;
  completedAt?: Date;
  chunk: WorkItem[];
  errors: JobError[];
  results?: ItemResultMap;
  collected: boolean;
}

export interface JobSummary {
  jobId: string;
  chunkIndex: number;
  attempt: number;
  status: JobStatus;
  remoteId: string | null;
  itemCount: number;
  completedCount: number;
  failedCount: number;
  collected: boolean;
  lastError?: string;
}
