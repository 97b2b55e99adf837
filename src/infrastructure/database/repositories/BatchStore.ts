import Database from 'better-sqlite3';
import { z } from 'zod';
import { IBatchStore } from '../../../core/interfaces/IBatchStore.js';
import { BatchGroupRecord } from '../../../core/entities/Group.js';
import { BatchJobRecord, ItemResultMap, JobStatus, putResult } from '../../../core/entities/Job.js';

interface GroupRow {
  id: string;
  processor: string;
  total_items: number;
  max_items_per_batch: number;
  is_split: number;
  job_ids: string;
  created_at: string;
  updated_at: string;
}

interface JobRow {
  id: string;
  group_id: string;
  chunk_index: number;
  attempt: number;
  remote_id: string | null;
  status: string;
  remote_status: string | null;
  item_count: number;
  completed_count: number;
  failed_count: number;
  created_at: string;
  submitted_at: string | null;
  completed_at: string | null;
  chunk: string;
  errors: string;
  results: string | null;
  collected: number;
}

// JSON columns are validated on the way out of the database
const jobStatusSchema = z.enum([
  'created',
  'submitted',
  'validating',
  'in_progress',
  'finalizing',
  'completed',
  'failed',
  'cancelled',
]);

const identitySchema = z.object({
  namespace: z.string(),
  collection: z.string(),
  itemId: z.string(),
  processor: z.string(),
});

const itemErrorSchema = z.object({ code: z.string(), message: z.string() });

// z.unknown() keys come out optional; the transforms restore the required shape
const chunkSchema = z.array(
  identitySchema
    .extend({ payload: z.unknown() })
    .transform(({ payload, ...identity }) => ({ ...identity, payload }))
);

const jobErrorsSchema = z.array(itemErrorSchema.extend({ timestamp: z.coerce.date() }));

const itemResultSchema = z.union([
  z
    .object({ outcome: z.literal('succeeded'), key: z.string(), item: identitySchema, result: z.unknown() })
    .transform(({ result, ...rest }) => ({ ...rest, result })),
  z.object({ outcome: z.literal('failed'), key: z.string(), item: identitySchema, error: itemErrorSchema }),
  z.object({ outcome: z.literal('unresolved'), key: z.string(), error: itemErrorSchema }),
]);

// Stored as a list; every entry carries its own key
const resultsSchema = z.array(itemResultSchema);

const jobIdsSchema = z.array(z.string());

const TERMINAL_SQL = `('completed', 'failed', 'cancelled')`;

/**
 * SQLite implementation of the job/group store
 */
export class BatchStore implements IBatchStore {
  private upsertGroup: Database.Statement<[GroupRow]>;
  private upsertJob: Database.Statement<[JobRow]>;

  constructor(private db: Database.Database) {
    this.upsertGroup = db.prepare<[GroupRow]>(`
      INSERT INTO batch_groups (id, processor, total_items, max_items_per_batch, is_split, job_ids, created_at, updated_at)
      VALUES (@id, @processor, @total_items, @max_items_per_batch, @is_split, @job_ids, @created_at, @updated_at)
      ON CONFLICT(id) DO UPDATE SET
        processor = excluded.processor,
        total_items = excluded.total_items,
        max_items_per_batch = excluded.max_items_per_batch,
        is_split = excluded.is_split,
        job_ids = excluded.job_ids,
        updated_at = excluded.updated_at
    `);
    this.upsertJob = db.prepare<[JobRow]>(`
      INSERT INTO batch_jobs (
        id, group_id, chunk_index, attempt, remote_id, status, remote_status, item_count,
        completed_count, failed_count, created_at, submitted_at, completed_at, chunk, errors, results, collected
      )
      VALUES (
        @id, @group_id, @chunk_index, @attempt, @remote_id, @status, @remote_status, @item_count,
        @completed_count, @failed_count, @created_at, @submitted_at, @completed_at, @chunk, @errors, @results, @collected
      )
      ON CONFLICT(id) DO UPDATE SET
        attempt = excluded.attempt,
        remote_id = excluded.remote_id,
        status = excluded.status,
        remote_status = excluded.remote_status,
        completed_count = excluded.completed_count,
        failed_count = excluded.failed_count,
        submitted_at = excluded.submitted_at,
        completed_at = excluded.completed_at,
        errors = excluded.errors,
        results = excluded.results,
        collected = excluded.collected
    `);
  }

  saveGroup(group: BatchGroupRecord, jobs: BatchJobRecord[] = []): void {
    const save = this.db.transaction(() => {
      this.upsertGroup.run(toGroupRow(group));
      for (const job of jobs) {
        this.upsertJob.run(toJobRow(job));
      }
    });
    save();
  }

  loadGroup(groupId: string): BatchGroupRecord | null {
    const row = this.db.prepare<[string], GroupRow>('SELECT * FROM batch_groups WHERE id = ?').get(groupId);
    return row ? fromGroupRow(row) : null;
  }

  listGroups(): BatchGroupRecord[] {
    return this.db
      .prepare<[], GroupRow>('SELECT * FROM batch_groups ORDER BY created_at DESC')
      .all()
      .map(fromGroupRow);
  }

  listActiveGroups(): BatchGroupRecord[] {
    return this.db
      .prepare<[], GroupRow>(
        `SELECT * FROM batch_groups g
         WHERE EXISTS (
           SELECT 1 FROM batch_jobs j WHERE j.group_id = g.id AND j.status NOT IN ${TERMINAL_SQL}
         )
         ORDER BY g.created_at ASC`
      )
      .all()
      .map(fromGroupRow);
  }

  deleteGroup(groupId: string): boolean {
    const remove = this.db.transaction((id: string) => {
      this.db.prepare('DELETE FROM batch_jobs WHERE group_id = ?').run(id);
      return this.db.prepare('DELETE FROM batch_groups WHERE id = ?').run(id).changes;
    });
    return remove(groupId) > 0;
  }

  saveJob(job: BatchJobRecord): void {
    this.upsertJob.run(toJobRow(job));
  }

  loadJob(jobId: string): BatchJobRecord | null {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM batch_jobs WHERE id = ?').get(jobId);
    return row ? fromJobRow(row) : null;
  }

  deleteJob(jobId: string): boolean {
    return this.db.prepare('DELETE FROM batch_jobs WHERE id = ?').run(jobId).changes > 0;
  }
}

function toGroupRow(group: BatchGroupRecord): GroupRow {
  return {
    id: group.id,
    processor: group.processor,
    total_items: group.totalItems,
    max_items_per_batch: group.maxItemsPerBatch,
    is_split: group.isSplit ? 1 : 0,
    job_ids: JSON.stringify(group.jobIds),
    created_at: group.createdAt.toISOString(),
    updated_at: group.updatedAt.toISOString(),
  };
}

function fromGroupRow(row: GroupRow): BatchGroupRecord {
  return {
    id: row.id,
    processor: row.processor,
    totalItems: row.total_items,
    maxItemsPerBatch: row.max_items_per_batch,
    isSplit: row.is_split === 1,
    jobIds: jobIdsSchema.parse(JSON.parse(row.job_ids)),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toJobRow(job: BatchJobRecord): JobRow {
  return {
    id: job.id,
    group_id: job.groupId,
    chunk_index: job.chunkIndex,
    attempt: job.attempt,
    remote_id: job.remoteId,
    status: job.status,
    remote_status: job.remoteStatus ?? null,
    item_count: job.itemCount,
    completed_count: job.completedCount,
    failed_count: job.failedCount,
    created_at: job.createdAt.toISOString(),
    submitted_at: job.submittedAt ? job.submittedAt.toISOString() : null,
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    chunk: JSON.stringify(job.chunk),
    errors: JSON.stringify(job.errors),
    results: job.results ? JSON.stringify(Object.values(job.results)) : null,
    collected: job.collected ? 1 : 0,
  };
}

function fromJobRow(row: JobRow): BatchJobRecord {
  const status: JobStatus = jobStatusSchema.parse(row.status);
  const results: ItemResultMap | undefined = row.results ? toResultMap(row.results) : undefined;

  return {
    id: row.id,
    groupId: row.group_id,
    chunkIndex: row.chunk_index,
    attempt: row.attempt,
    remoteId: row.remote_id,
    status,
    remoteStatus: row.remote_status ?? undefined,
    itemCount: row.item_count,
    completedCount: row.completed_count,
    failedCount: row.failed_count,
    createdAt: new Date(row.created_at),
    submittedAt: row.submitted_at ? new Date(row.submitted_at) : undefined,
    completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
    chunk: chunkSchema.parse(JSON.parse(row.chunk)),
    errors: jobErrorsSchema.parse(JSON.parse(row.errors)),
    results,
    collected: row.collected === 1,
  };
}

function toResultMap(json: string): ItemResultMap {
  const results: ItemResultMap = {};
  for (const entry of resultsSchema.parse(JSON.parse(json))) {
    putResult(results, entry);
  }
  return results;
}
