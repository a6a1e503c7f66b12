// Domain types shared by the deletion engine and both backends.

export type DateFilter =
  | { readonly mode: 'cutoff'; readonly cutoff: Date }
  | { readonly mode: 'range'; readonly start: Date; readonly end: Date };

export type BackendKind = 'remote-mail' | 'bulk-search';

export type MessageBatch = readonly string[];

export interface BatchOutcome {
  succeeded: number;
  failed: number;
  throttled: boolean;
  // Ids rejected with 429/503; only these are resubmitted on retry
  throttledIds: string[];
  // Refused for permission or quota; final, never resubmitted
  denied: number;
}

export interface DeletionTally {
  deleted: number;
  failed: number;
}

export type BulkSearchStatus = 'Pending' | 'Running' | 'Completed' | 'Failed';

export interface BulkSearchJob {
  id: string;
  name: string;
  mailbox: string;
  query: string;
  status: BulkSearchStatus;
  itemCount: number;
  totalSizeBytes: number;
}

export interface MailFolder {
  id: string;
  displayName: string;
  path: string;
  totalItemCount: number;
  sizeBytes: number | null;
}

export type ProcessingMode = 'delete' | 'dry-run' | 'check-only';

export type DeletionState =
  | 'Idle'
  | 'Counting'
  | 'AwaitingConfirmation'
  | 'Deleting'
  | 'Done';

/** Why a target reached Done. */
export type CompletionReason =
  | 'no-matches'
  | 'check-only'
  | 'dry-run'
  | 'declined'
  | 'completed'
  | 'aborted';

export interface FolderRunResult {
  mailbox: string;
  folder: MailFolder;
  matchCount: number;
  reason: CompletionReason;
  tally: DeletionTally;
}

export type BulkRunReason = CompletionReason | 'timed-out' | 'search-failed';

export interface BulkRunResult {
  mailbox: string;
  jobName: string;
  matchCount: number;
  reason: BulkRunReason;
  // Items accepted for purge, not confirmed deleted
  itemCount: number;
}
