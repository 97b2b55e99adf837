import { ItemError } from '../entities/Job.js';

export interface ProviderRequest {
  correlationKey: string;
  payload: unknown;
}

export interface ProviderPollResult {
  status: string;
  completedCount: number;
  failedCount: number;
  errors?: ItemError[];
}

export type ProviderResultEntry =
  | { correlationKey: string; ok: true; result: unknown }
  | { correlationKey: string; ok: false; error: ItemError };

/**
 * Interface for a remote asynchronous batch API.
 * Status strings are provider-specific; BatchJob maps them onto the local state machine.
 */
export interface IBatchProvider {
  readonly name: string;

  /**
   * Submit one chunk and return the provider's batch id
   */
  submit(requests: ProviderRequest[]): Promise<string>;

  poll(remoteId: string): Promise<ProviderPollResult>;

  download(remoteId: string): Promise<ProviderResultEntry[]>;

  cancel(remoteId: string): Promise<{ status: string }>;
}
