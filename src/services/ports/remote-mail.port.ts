import type { BatchOutcome, DateFilter, MailFolder, MessageBatch } from '../../types/purge.types';

// Hard per-request ceiling of the multi-operation delete call
export const MAX_DELETE_BATCH_SIZE = 20;
export const MAX_FETCH_PAGE_SIZE = 200;

/** Ids fetched per page for a caller supplied base size: 4x the base, capped at 200. */
export function fetchPageSize(baseSize: number): number {
  return Math.min(Math.max(1, Math.floor(baseSize)) * 4, MAX_FETCH_PAGE_SIZE);
}

export interface RemoteMailBackendPort {
  readonly kind: 'remote-mail';
  listFolders(mailbox: string): Promise<MailFolder[]>;
  resolveFolder(mailbox: string, folder: string): Promise<MailFolder>;
  countMatching(mailbox: string, folder: MailFolder, filter: DateFilter): Promise<number>;
  fetchIdPage(mailbox: string, folder: MailFolder, filter: DateFilter, baseSize: number): Promise<string[]>;
  deleteBatch(mailbox: string, ids: MessageBatch): Promise<BatchOutcome>;
}
