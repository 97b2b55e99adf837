import { JobStatus } from './entities/Job.js';

/**
 * Base class for every error raised by the batch orchestrator
 */
export class BatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Provider rejected the submission or the network failed. The job stays `created`.
 */
export class SubmissionError extends BatchError {
  readonly jobId: string;
  readonly chunkSize: number;

  constructor(jobId: string, chunkSize: number, cause: unknown) {
    super(`Failed to submit job ${jobId} (${chunkSize} items): ${describeCause(cause)}`, { cause });
    this.jobId = jobId;
    this.chunkSize = chunkSize;
  }
}

/**
 * Reading remote status failed. The job keeps its last known state.
 */
export class PollError extends BatchError {
  readonly jobId: string;
  readonly remoteId: string;

  constructor(jobId: string, remoteId: string, cause: unknown) {
    super(`Failed to poll job ${jobId} (remote ${remoteId}): ${describeCause(cause)}`, { cause });
    this.jobId = jobId;
    this.remoteId = remoteId;
  }
}

export class CollectionError extends BatchError {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    super(`Failed to download results for job ${jobId}: ${describeCause(cause)}`, { cause });
    this.jobId = jobId;
  }
}

export class CancelError extends BatchError {
  readonly jobId: string;

  constructor(jobId: string, cause: unknown) {
    super(`Failed to cancel job ${jobId}: ${describeCause(cause)}`, { cause });
    this.jobId = jobId;
  }
}

export class NotReadyError extends BatchError {
  readonly jobId: string;
  readonly status: JobStatus;

  constructor(jobId: string, status: JobStatus) {
    super(`Job ${jobId} is not completed (status: ${status})`);
    this.jobId = jobId;
    this.status = status;
  }
}

export class MalformedKeyError extends BatchError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Malformed correlation key "${key}": ${reason}`);
    this.key = key;
  }
}

export class InvalidChunkSizeError extends BatchError {
  readonly maxSize: number;

  constructor(maxSize: number) {
    super(`Chunk size must be a positive integer, got ${maxSize}`);
    this.maxSize = maxSize;
  }
}

export class InvalidWorkItemError extends BatchError {}

export class DuplicateItemError extends BatchError {
  readonly key: string;

  constructor(key: string) {
    super(`Work item ${key} appears more than once in the group`);
    this.key = key;
  }
}

export class EmptyGroupError extends BatchError {
  constructor() {
    super('No work items to process');
  }
}

export class GroupNotFoundError extends BatchError {
  constructor(groupId: string) {
    super(`No batch group found matching '${groupId}'`);
  }
}

export class AmbiguousGroupIdError extends BatchError {
  readonly matches: string[];

  constructor(prefix: string, matches: string[]) {
    const shown = matches.slice(0, 3).join(', ');
    const extra = matches.length > 3 ? ` and ${matches.length - 3} more` : '';
    super(`Multiple batch groups match '${prefix}': ${shown}${extra}`);
    this.matches = matches;
  }
}

export class ActiveGroupError extends BatchError {
  constructor(groupId: string, status: string) {
    super(`Group ${groupId} is still active (status: ${status}); cancel it first or force removal`);
  }
}
