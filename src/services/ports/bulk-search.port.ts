import type { BulkSearchJob, DateFilter } from '../../types/purge.types';

export const DEFAULT_MAX_WAIT_MINUTES = 10;
export const EXTENDED_MAX_WAIT_MINUTES = 120;

export interface BulkSearchBackendPort {
  readonly kind: 'bulk-search';
  createAndRun(mailbox: string, filter: DateFilter): Promise<BulkSearchJob>;
  /** Never throws on timeout; returns the job in its last observed status. */
  pollUntilDone(job: BulkSearchJob, maxWaitMinutes: number): Promise<BulkSearchJob>;
  purge(job: BulkSearchJob): Promise<number>;
  discard(job: BulkSearchJob): Promise<void>;
}
