import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { GroupCoordinator } from '../../application/services/GroupCoordinator.js';
import { GroupProgress, GroupResult, GroupStatus, GroupSummary, JobIssue, PendingJob } from '../../core/entities/Group.js';
import { WorkItem } from '../../core/entities/WorkItem.js';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

const workItemSchema = z.object({
  namespace: z.string().min(1).describe('Namespace the item belongs to'),
  collection: z.string().min(1).describe('Collection within the namespace'),
  item_id: z.string().min(1).describe('Item id, unique within the collection'),
  payload: z.record(z.unknown()).describe('Request body forwarded to the provider (model is filled in when absent)'),
});

const itemsShape = {
  processor: z.string().min(1).describe('Name of the processing step; part of every correlation key'),
  items: z.array(workItemSchema).min(1).describe('Work items to process'),
  max_items_per_batch: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Maximum items per provider batch (defaults to the server setting)'),
};

const groupIdShape = {
  group_id: z.string().min(1).describe('Batch group id or a unique prefix of it'),
};

const removeShape = {
  ...groupIdShape,
  force: z.boolean().optional().describe('Remove even if batches are still running'),
};

type ItemsInput = z.infer<z.ZodObject<typeof itemsShape>>;
type GroupIdInput = z.infer<z.ZodObject<typeof groupIdShape>>;
type RemoveInput = z.infer<z.ZodObject<typeof removeShape>>;

const STATUS_EMOJI: Record<GroupStatus, string> = {
  submitted: '📤',
  partial: '🔄',
  completed: '✅',
  failed: '❌',
  partial_failure: '⚠️',
  cancelled: '⛔',
};

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

async function respond(action: string, fn: () => ToolResult | Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await fn();
  } catch (error) {
    return {
      isError: true,
      content: [
        {
          type: 'text',
          text: `Error ${action}: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }
}

function toWorkItems(input: ItemsInput): WorkItem[] {
  return input.items.map((item) => ({
    namespace: item.namespace,
    collection: item.collection,
    itemId: item.item_id,
    processor: input.processor,
    payload: item.payload,
  }));
}

function formatIssues(issues: JobIssue[]): string {
  if (issues.length === 0) return '';
  const lines = issues.map(
    (issue) => `- [${issue.operation}] batch ${issue.chunkIndex + 1} (${issue.jobId}): ${issue.message}`
  );
  return `\n\n## Issues\n${lines.join('\n')}`;
}

export function formatProgress(progress: GroupProgress): string {
  const rows = progress.jobs.map(
    (job) =>
      `| ${job.chunkIndex + 1} | ${job.jobId} | ${job.attempt} | ${job.status} | ${job.itemCount} | ${job.completedCount} | ${job.failedCount} | ${job.lastError ?? ''} |`
  );

  return `# ${STATUS_EMOJI[progress.status]} Batch Group ${progress.groupId}

## Status
- **Status**: ${progress.status}
- **Processor**: ${progress.processor}
- **Batches**: ${progress.completedBatches}/${progress.totalBatches} completed, ${progress.failedBatches} failed, ${progress.cancelledBatches} cancelled, ${progress.activeBatches} active
- **Items**: ${progress.completedItems}/${progress.totalItems} completed, ${progress.failedItems} failed

## Batches
| # | Job | Attempt | Status | Items | Completed | Failed | Last error |
|---|-----|---------|--------|-------|-----------|--------|------------|
${rows.join('\n')}${formatIssues(progress.issues)}`;
}

export function formatResult(result: GroupResult): string {
  const describeJob = (job: PendingJob) =>
    `- batch ${job.chunkIndex + 1} (${job.jobId}): ${job.status}, ${job.itemCount} items`;
  const pending = result.pending.map(describeJob);
  const stopped = result.stopped.map(describeJob);

  return `# ${STATUS_EMOJI[result.status]} Results for Batch Group ${result.groupId}

## Summary
- **Status**: ${result.status}
- **Succeeded**: ${result.counts.succeeded}
- **Failed**: ${result.counts.failed}
- **Unresolved**: ${result.counts.unresolved}
- **Pending items**: ${result.counts.pendingItems}
- **Stopped items**: ${result.counts.stoppedItems}
${pending.length > 0 ? `\n## Pending Batches\n${pending.join('\n')}\n` : ''}${
    stopped.length > 0 ? `\n## Stopped Batches\n${stopped.join('\n')}\n` : ''
  }
## Results
\`\`\`json
${JSON.stringify(result.results, null, 2)}
\`\`\`${formatIssues(result.issues)}`;
}

function formatSummaries(groups: GroupSummary[]): string {
  if (groups.length === 0) {
    return '# Batch Groups\n\nNo batch groups found';
  }
  const rows = groups.map(
    (group) =>
      `| ${group.groupId} | ${group.processor} | ${group.status} | ${group.totalBatches} | ${group.completedItems}/${group.totalItems} | ${group.failedItems} | ${group.createdAt.toISOString()} |`
  );
  return `# Batch Groups

| Group | Processor | Status | Batches | Completed | Failed | Created |
|-------|-----------|--------|---------|-----------|--------|---------|
${rows.join('\n')}`;
}

/**
 * Tool handlers, independent of the MCP server so they can be called directly
 */
export function createBatchToolHandlers(coordinator: GroupCoordinator) {
  return {
    planGroup: (input: ItemsInput) =>
      respond('planning batch group', () => {
        const plan = coordinator.plan(toWorkItems(input), input.max_items_per_batch);
        const sizes = plan.chunkSizes.map((size, index) => `${index + 1}. ${size} items`);
        return text(`# Batch Plan

- **Items**: ${plan.totalItems}
- **Batches**: ${plan.totalChunks}
- **Split**: ${plan.totalChunks > 1 ? 'yes' : 'no'}

## Batch sizes
${sizes.join('\n')}`);
      }),

    createGroup: (input: ItemsInput) =>
      respond('creating batch group', async () => {
        const group = await coordinator.createGroup(
          toWorkItems(input),
          input.processor,
          input.max_items_per_batch
        );
        return text(formatProgress(group.progress()));
      }),

    groupStatus: (input: GroupIdInput) =>
      respond('checking batch group', async () => {
        const group = coordinator.getGroup(input.group_id);
        return text(formatProgress(await coordinator.refreshGroup(group)));
      }),

    collectGroup: (input: GroupIdInput) =>
      respond('collecting batch group', async () => {
        const group = coordinator.getGroup(input.group_id);
        await coordinator.refreshGroup(group);
        return text(formatResult(await coordinator.collectGroup(group)));
      }),

    retryFailed: (input: GroupIdInput) =>
      respond('retrying failed batches', async () => {
        const group = coordinator.getGroup(input.group_id);
        const failedBefore = group.jobsWithStatus('failed').length;
        if (failedBefore === 0) {
          return text(`No failed batches to retry in group ${group.id}`);
        }
        await coordinator.retryFailed(group);
        return text(formatProgress(group.progress()));
      }),

    cancelGroup: (input: GroupIdInput) =>
      respond('cancelling batch group', async () => {
        const group = coordinator.getGroup(input.group_id);
        return text(formatProgress(await coordinator.cancelGroup(group)));
      }),

    listGroups: () => respond('listing batch groups', () => text(formatSummaries(coordinator.listGroups()))),

    removeGroup: (input: RemoveInput) =>
      respond('removing batch group', () => {
        const group = coordinator.getGroup(input.group_id);
        coordinator.removeGroup(group.id, input.force ?? false);
        return text(`Removed batch group ${group.id}`);
      }),
  };
}

export type BatchToolHandlers = ReturnType<typeof createBatchToolHandlers>;

/**
 * Register all batch group tools
 */
export function registerBatchTools(server: McpServer, coordinator: GroupCoordinator) {
  const handlers = createBatchToolHandlers(coordinator);

  server.tool(
    'plan-batch-group',
    'Preview how work items would be split into provider batches without submitting anything',
    itemsShape,
    async (input) => handlers.planGroup(input)
  );

  server.tool(
    'create-batch-group',
    'Split work items into batches, submit them to the provider and track them as one group',
    itemsShape,
    async (input) => handlers.createGroup(input)
  );

  server.tool(
    'batch-group-status',
    'Poll the provider for every active batch in a group and report aggregate progress',
    groupIdShape,
    async (input) => handlers.groupStatus(input)
  );

  server.tool(
    'collect-batch-group',
    'Download and merge results from every completed batch in a group',
    groupIdShape,
    async (input) => handlers.collectGroup(input)
  );

  server.tool(
    'retry-failed-batches',
    'Resubmit the chunks of failed batches in a group; completed batches are left alone',
    groupIdShape,
    async (input) => handlers.retryFailed(input)
  );

  server.tool(
    'cancel-batch-group',
    'Request cancellation of every batch in a group that has not finished',
    groupIdShape,
    async (input) => handlers.cancelGroup(input)
  );

  server.tool('list-batch-groups', 'List all batch groups, newest first', {}, async () => handlers.listGroups());

  server.tool(
    'remove-batch-group',
    'Delete a batch group and its batch records',
    removeShape,
    async (input) => handlers.removeGroup(input)
  );
}
