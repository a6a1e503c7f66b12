import type {
  BatchOutcome,
  BulkRunReason,
  BulkRunResult,
  BulkSearchJob,
  DateFilter,
  DeletionState,
  DeletionTally,
  FolderRunResult,
  MailFolder,
  MessageBatch,
  ProcessingMode,
} from '../types/purge.types';
import { AuthError, QuotaOrPermissionError, ThrottleError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { BulkSearchBackendPort } from './ports/bulk-search.port';
import type { ConfirmationGatePort } from './ports/confirmation.port';
import { MAX_DELETE_BATCH_SIZE, fetchPageSize, type RemoteMailBackendPort } from './ports/remote-mail.port';
import { ConfirmationToken, requestConfirmation } from './confirmation.service';
import { describeFilter } from './date-filter.service';
import type { RetryService } from './retry.service';
import type { RunContext } from './run-context';

const BULK_BACKEND_HINT = 'Consider --backend bulk-search for this mailbox';

export type MailBackend = RemoteMailBackendPort | BulkSearchBackendPort;

export interface DeletionEngineOptions {
  mode: ProcessingMode;
  // Fetch pages are 4x this size, capped at 200
  baseBatchSize: number;
  batchPauseMs: number;
  maxWaitMinutes: number;
}

export interface DeletionRequest {
  mailbox: string;
  filter: DateFilter;
  // Remote-mail backend only; processed one at a time in order
  folders: MailFolder[];
}

export type DeletionRunResult =
  | { backend: 'remote-mail'; folders: FolderRunResult[] }
  | { backend: 'bulk-search'; mailbox: BulkRunResult };

/** Splits ids into consecutive batches of at most `size`, preserving order. */
export function partitionBatches(ids: readonly string[], size: number = MAX_DELETE_BATCH_SIZE): string[][] {
  const batchSize = Math.min(Math.max(1, size), MAX_DELETE_BATCH_SIZE);
  const batches: string[][] = [];
  for (let i = 0; i < ids.length; i += batchSize) {
    batches.push(ids.slice(i, i + batchSize));
  }
  return batches;
}

// Upper bound on page fetches in case the server keeps returning stale matches
export function pageFetchCeiling(matchCount: number, pageSize: number): number {
  return Math.ceil(matchCount / pageSize) * 2 + 2;
}

export class DeletionEngine {
  private currentState: DeletionState = 'Idle';

  constructor(
    private readonly backend: MailBackend,
    private readonly gate: ConfirmationGatePort,
    private readonly context: RunContext,
    private readonly retry: RetryService,
    private readonly options: DeletionEngineOptions
  ) {}

  get state(): DeletionState {
    return this.currentState;
  }

  async run(request: DeletionRequest): Promise<DeletionRunResult> {
    if (this.backend.kind === 'bulk-search') {
      const result = await this.processMailbox(this.backend, request.mailbox, request.filter);
      return { backend: 'bulk-search', mailbox: result };
    }

    const folders: FolderRunResult[] = [];
    for (const folder of request.folders) {
      folders.push(await this.processFolder(this.backend, request.mailbox, folder, request.filter));
    }
    return { backend: 'remote-mail', folders };
  }

  async processFolder(
    backend: RemoteMailBackendPort,
    mailbox: string,
    folder: MailFolder,
    filter: DateFilter
  ): Promise<FolderRunResult> {
    const target = { mailbox, folder: folder.path };
    const tally: DeletionTally = { deleted: 0, failed: 0 };
    const finish = (reason: FolderRunResult['reason'], matchCount: number): FolderRunResult => {
      this.transition('Done', target);
      const incomplete = reason === 'aborted' || tally.failed > 0 ? 1 : 0;
      this.context.record({
        targets: 1,
        matched: matchCount,
        deleted: tally.deleted,
        failed: tally.failed,
        incompleteTargets: incomplete,
      });
      return { mailbox, folder, matchCount, reason, tally };
    };

    this.transition('Counting', target);
    let matchCount: number;
    try {
      matchCount = await backend.countMatching(mailbox, folder, filter);
    } catch (error) {
      if (error instanceof AuthError) throw error;
      await this.context.log('ERROR', `Failed to count messages in ${folder.path}: ${errorMessage(error)}`, target);
      return finish('aborted', 0);
    }
    await this.context.log('INFO', `Found ${matchCount} messages ${describeFilter(filter)} in ${folder.path}`, {
      ...target,
      matchCount,
    });

    if (matchCount === 0) {
      await this.context.log('INFO', `Nothing to delete in ${folder.path}`, target);
      return finish('no-matches', 0);
    }
    if (this.options.mode === 'check-only') {
      await this.context.log('INFO', `Check only: ${matchCount} messages match in ${folder.path}; no deletion attempted`, target);
      return finish('check-only', matchCount);
    }
    if (this.options.mode === 'dry-run') {
      await this.context.log('INFO', `Dry run: would delete ${matchCount} messages from ${folder.path}`, {
        ...target,
        wouldDelete: matchCount,
      });
      return finish('dry-run', matchCount);
    }

    this.transition('AwaitingConfirmation', target);
    const confirmed = await this.confirm(
      ConfirmationToken.Yes,
      `About to delete ${matchCount} messages from ${mailbox} / ${folder.path} (${describeFilter(filter)}).`,
      target
    );
    if (!confirmed) return finish('declined', matchCount);

    this.transition('Deleting', target);
    const aborted = await this.deleteLoop(backend, mailbox, folder, filter, matchCount, tally);

    const level = tally.failed === 0 && !aborted ? 'SUCCESS' : 'WARNING';
    await this.context.log(level, `Finished ${folder.path}: deleted ${tally.deleted}, failed ${tally.failed} of ${matchCount}`, {
      ...target,
      deleted: tally.deleted,
      failed: tally.failed,
      aborted,
    });
    return finish(aborted ? 'aborted' : 'completed', matchCount);
  }

  async processMailbox(backend: BulkSearchBackendPort, mailbox: string, filter: DateFilter): Promise<BulkRunResult> {
    const target = { mailbox };
    this.transition('Counting', target);

    let job: BulkSearchJob;
    try {
      job = await backend.createAndRun(mailbox, filter);
    } catch (error) {
      await this.context.log('ERROR', `Failed to start bulk search for ${mailbox}: ${errorMessage(error)}`, target);
      throw error;
    }
    await this.context.log('INFO', `Started bulk search ${job.name}`, { ...target, job: job.name, query: job.query });

    let result: BulkRunResult | undefined;
    try {
      result = await this.driveBulkJob(backend, job);
      return result;
    } finally {
      await this.discardJob(backend, job);
      this.transition('Done', target);
      this.context.record({
        targets: 1,
        matched: result?.matchCount ?? 0,
        acceptedForPurge: result?.itemCount ?? 0,
        incompleteTargets: !result || isIncomplete(result.reason) ? 1 : 0,
      });
    }
  }

  private async driveBulkJob(backend: BulkSearchBackendPort, created: BulkSearchJob): Promise<BulkRunResult> {
    const target = { mailbox: created.mailbox, job: created.name };
    const done = (reason: BulkRunReason, matchCount: number, itemCount: number = 0): BulkRunResult => ({
      mailbox: created.mailbox,
      jobName: created.name,
      matchCount,
      reason,
      itemCount,
    });

    const job = await backend.pollUntilDone(created, this.options.maxWaitMinutes);
    if (job.status === 'Failed') {
      await this.context.log('ERROR', `Bulk search ${job.name} failed on the remote service`, target);
      return done('search-failed', 0);
    }
    if (job.status !== 'Completed') {
      await this.context.log(
        'WARNING',
        `Bulk search ${job.name} still ${job.status} after ${this.options.maxWaitMinutes} minutes; treating as incomplete`,
        { ...target, status: job.status }
      );
      return done('timed-out', 0);
    }
    await this.context.log('INFO', `Bulk search ${job.name} found ${job.itemCount} items (${job.totalSizeBytes} bytes)`, {
      ...target,
      itemCount: job.itemCount,
      totalSizeBytes: job.totalSizeBytes,
    });

    if (job.itemCount === 0) {
      await this.context.log('INFO', `Nothing to purge for ${job.mailbox}`, target);
      return done('no-matches', 0);
    }
    if (this.options.mode === 'check-only') {
      await this.context.log('INFO', `Check only: ${job.itemCount} items match; no purge created`, target);
      return done('check-only', job.itemCount);
    }
    if (this.options.mode === 'dry-run') {
      await this.context.log('INFO', `Dry run: would purge ${job.itemCount} items from ${job.mailbox}`, {
        ...target,
        wouldDelete: job.itemCount,
      });
      return done('dry-run', job.itemCount);
    }

    this.transition('AwaitingConfirmation', { mailbox: job.mailbox });
    const confirmed = await this.confirm(
      ConfirmationToken.Delete,
      `About to PERMANENTLY purge ${job.itemCount} items from ${job.mailbox}. This cannot be undone.`,
      target
    );
    if (!confirmed) return done('declined', job.itemCount);

    this.transition('Deleting', { mailbox: job.mailbox });
    const accepted = await backend.purge(job);
    await this.context.log('SUCCESS', `Purge submitted for ${accepted} items from ${job.mailbox}; completion is asynchronous`, {
      ...target,
      itemCount: accepted,
    });
    return done('completed', job.itemCount, accepted);
  }

  private async discardJob(backend: BulkSearchBackendPort, job: BulkSearchJob): Promise<void> {
    try {
      await backend.discard(job);
      await this.context.log('INFO', `Discarded bulk search ${job.name}`, { mailbox: job.mailbox, job: job.name });
    } catch (error) {
      // Reported, and counted as an incomplete target by the caller's tally
      await this.context.log('ERROR', `Failed to discard bulk search ${job.name}: ${errorMessage(error)}`, {
        mailbox: job.mailbox,
        job: job.name,
      });
      this.context.record({ incompleteTargets: 1 });
    }
  }

  /** Returns true when the loop stopped early because of an error or the page ceiling. */
  private async deleteLoop(
    backend: RemoteMailBackendPort,
    mailbox: string,
    folder: MailFolder,
    filter: DateFilter,
    matchCount: number,
    tally: DeletionTally
  ): Promise<boolean> {
    const target = { mailbox, folder: folder.path };
    const pageSize = fetchPageSize(this.options.baseBatchSize);
    const ceiling = pageFetchCeiling(matchCount, pageSize);
    let pages = 0;

    while (tally.deleted + tally.failed < matchCount) {
      if (pages >= ceiling) {
        await this.context.log('WARNING', `Stopped ${folder.path} after ${pages} pages without reaching the confirmed count`, target);
        return true;
      }

      let ids: string[];
      try {
        ids = await backend.fetchIdPage(mailbox, folder, filter, this.options.baseBatchSize);
        pages++;
      } catch (error) {
        if (error instanceof AuthError) throw error;
        await this.context.log('ERROR', `Failed to fetch messages from ${folder.path}; stopping this folder: ${errorMessage(error)}`, target);
        return true;
      }

      if (ids.length === 0) {
        await this.context.log('INFO', `No further matching messages returned for ${folder.path}`, target);
        return false;
      }

      // Never go beyond the count the operator confirmed
      const remaining = matchCount - (tally.deleted + tally.failed);
      const pageIds = ids.slice(0, remaining);
      await this.context.log('INFO', `Fetched page ${pages} with ${pageIds.length} messages from ${folder.path}`, {
        ...target,
        page: pages,
        size: pageIds.length,
      });

      for (const batch of partitionBatches(pageIds)) {
        const result = await this.deleteWithRetry(backend, mailbox, batch, target);
        tally.deleted += result.deleted;
        tally.failed += result.failed;
        await this.context.clock.sleep(this.options.batchPauseMs);
      }

      const processed = tally.deleted + tally.failed;
      const percent = Math.min(100, Math.floor((processed / matchCount) * 100));
      await this.context.log('INFO', `Progress ${folder.path}: ${percent}% (${tally.deleted} deleted, ${tally.failed} failed of ${matchCount})`, {
        ...target,
        percent,
        deleted: tally.deleted,
        failed: tally.failed,
      });
    }
    return false;
  }

  /**
   * Deletes one batch, resubmitting throttled items with exponential backoff.
   * Non-throttle failures are final; permission or quota errors fail the whole batch.
   */
  private async deleteWithRetry(
    backend: RemoteMailBackendPort,
    mailbox: string,
    batch: MessageBatch,
    target: Record<string, string>
  ): Promise<DeletionTally> {
    const tally: DeletionTally = { deleted: 0, failed: 0 };
    let pending: MessageBatch = batch;

    for (let attempt = 1; attempt <= this.retry.maxAttempts; attempt++) {
      let outcome: BatchOutcome;
      try {
        outcome = await backend.deleteBatch(mailbox, pending);
      } catch (error) {
        if (error instanceof AuthError) throw error;
        if (error instanceof ThrottleError) {
          outcome = { succeeded: 0, failed: pending.length, throttled: true, throttledIds: [...pending], denied: 0 };
        } else if (error instanceof QuotaOrPermissionError) {
          tally.failed += pending.length;
          await this.context.log(
            'ERROR',
            `Batch of ${pending.length} rejected (${errorMessage(error)}); counting as failed. ${BULK_BACKEND_HINT}`,
            { ...target, size: pending.length }
          );
          return tally;
        } else {
          tally.failed += pending.length;
          await this.context.log('ERROR', `Batch of ${pending.length} failed: ${errorMessage(error)}`, {
            ...target,
            size: pending.length,
          });
          return tally;
        }
      }

      tally.deleted += outcome.succeeded;
      tally.failed += outcome.failed - outcome.throttledIds.length;
      if (outcome.denied > 0) {
        await this.context.log(
          'WARNING',
          `${outcome.denied} of ${pending.length} items refused for permission or quota; counting as failed. ${BULK_BACKEND_HINT}`,
          { ...target, denied: outcome.denied, attempt }
        );
      }

      if (!outcome.throttled || outcome.throttledIds.length === 0) {
        await this.context.log(
          outcome.failed === 0 ? 'SUCCESS' : 'WARNING',
          `Batch deleted ${outcome.succeeded} of ${pending.length}${outcome.failed ? `, ${outcome.failed} failed` : ''}`,
          { ...target, succeeded: outcome.succeeded, failed: outcome.failed, attempt }
        );
        return tally;
      }

      pending = outcome.throttledIds;
      if (attempt >= this.retry.maxAttempts) {
        tally.failed += pending.length;
        await this.context.log('ERROR', `Batch still throttled after ${attempt} attempts; ${pending.length} items counted as failed`, {
          ...target,
          failed: pending.length,
          attempt,
        });
        return tally;
      }

      const delay = this.retry.delayFor(attempt);
      await this.context.log('WARNING', `Throttled: ${pending.length} items will be retried in ${delay / 1000}s`, {
        ...target,
        throttled: pending.length,
        attempt,
        delayMs: delay,
      });
      await this.retry.wait(attempt);
    }
    return tally;
  }

  private async confirm(token: ConfirmationToken, message: string, target: Record<string, string>): Promise<boolean> {
    await this.context.log('INFO', `Confirmation requested (${token})`, target);
    const { confirmed } = await requestConfirmation(this.gate, token, message);
    if (confirmed) {
      await this.context.log('INFO', 'Operator confirmed', target);
    } else {
      await this.context.log('WARNING', 'Operator declined; skipping this target', target);
    }
    return confirmed;
  }

  private transition(next: DeletionState, target: Record<string, string>): void {
    logger.debug('deletion-engine.transition', { from: this.currentState, to: next, ...target });
    this.currentState = next;
  }
}

function isIncomplete(reason: BulkRunReason): boolean {
  return reason === 'timed-out' || reason === 'search-failed' || reason === 'aborted';
}
