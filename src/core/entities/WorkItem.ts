/**
 * Work item domain entities
 */
export interface ItemIdentity {
  namespace: string; // e.g. GitHub org
  collection: string; // e.g. repository
  itemId: string; // e.g. issue number
  processor: string;
}

/**
 * One unit of work forwarded to the batch provider.
 * The payload is opaque to the orchestrator.
 */
export interface WorkItem extends ItemIdentity {
  payload: unknown;
}

export interface ChunkPlan {
  totalItems: number;
  totalChunks: number;
  chunkSizes: number[];
}
