import { z } from 'zod';
import { formatFilterInstant } from '../../services/date-filter.service';
import type { BulkSearchBackendPort } from '../../services/ports/bulk-search.port';
import type { ClockPort } from '../../services/ports/clock.port';
import type { BulkSearchJob, BulkSearchStatus, DateFilter } from '../../types/purge.types';
import { RemoteApiError, ThrottleError, TransientNetworkError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { parseSize } from '../../utils/size-parser';
import type { GraphClient } from './graph.client';

const searchSchema = z.object({ id: z.string() }).passthrough();

const estimateOperationSchema = z
  .object({
    status: z.string(),
    indexedItemCount: z.coerce.number().int().nonnegative().optional(),
    indexedItemsSize: z.unknown().optional(),
  })
  .passthrough();

interface EDiscoverySearchDeps {
  graph: GraphClient;
  caseId: string;
  clock: ClockPort;
  pollIntervalMs: number;
}

/** KQL content query for the bulk search. */
export function toSearchQuery(filter: DateFilter): string {
  if (filter.mode === 'cutoff') {
    return `kind:email AND received<${formatFilterInstant(filter.cutoff)}`;
  }
  return `kind:email AND received>=${formatFilterInstant(filter.start)} AND received<=${formatFilterInstant(filter.end)}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Unique per run: derived from the mailbox and the creation time. */
export function buildJobName(mailbox: string, at: Date): string {
  const stamp =
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `-${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `purge-${mailbox.replace(/[^A-Za-z0-9.-]/g, '_')}-${stamp}`;
}

export function mapOperationStatus(status: string): BulkSearchStatus {
  switch (status) {
    case 'succeeded':
    case 'partiallySucceeded':
      return 'Completed';
    case 'running':
      return 'Running';
    case 'failed':
      return 'Failed';
    default:
      // notStarted, submissionSucceeded and anything newer than this client
      return 'Pending';
  }
}

export class EDiscoverySearchAdapter implements BulkSearchBackendPort {
  readonly kind = 'bulk-search' as const;

  constructor(private readonly deps: EDiscoverySearchDeps) {}

  private get casePath(): string {
    return `/security/cases/ediscoveryCases/${encodeURIComponent(this.deps.caseId)}`;
  }

  private searchPath(job: Pick<BulkSearchJob, 'id'>): string {
    return `${this.casePath}/searches/${encodeURIComponent(job.id)}`;
  }

  async createAndRun(mailbox: string, filter: DateFilter): Promise<BulkSearchJob> {
    const name = buildJobName(mailbox, new Date(this.deps.clock.now()));
    const query = toSearchQuery(filter);

    const created = await this.deps.graph.request({
      method: 'POST',
      url: `${this.casePath}/searches`,
      data: { displayName: name, description: `Mailbox purge for ${mailbox}`, contentQuery: query },
    });
    const search = searchSchema.parse(created.data);
    const job: BulkSearchJob = {
      id: search.id,
      name,
      mailbox,
      query,
      status: 'Pending',
      itemCount: 0,
      totalSizeBytes: 0,
    };

    try {
      await this.deps.graph.request({
        method: 'POST',
        url: `${this.searchPath(job)}/additionalSources`,
        data: {
          '@odata.type': 'microsoft.graph.security.userSource',
          email: mailbox,
          includedSources: 'mailbox',
        },
      });
      await this.deps.graph.request({ method: 'POST', url: `${this.searchPath(job)}/estimateStatistics` });
    } catch (error) {
      // The search exists remotely but was never started; remove it before surfacing the error
      try {
        await this.discard(job);
      } catch (discardError) {
        logger.error('ediscovery.discard_after_start_failure_failed', { job: name, error: errorMessage(discardError) });
      }
      throw error;
    }

    logger.info('ediscovery.search_started', { job: name, searchId: job.id });
    return job;
  }

  async refresh(job: BulkSearchJob): Promise<BulkSearchJob> {
    const response = await this.deps.graph.request(
      { method: 'GET', url: `${this.searchPath(job)}/lastEstimateStatisticsOperation` },
      { acceptStatus: [404] }
    );
    // No estimate operation recorded yet
    if (response.status === 404) return { ...job, status: 'Pending' };

    const operation = estimateOperationSchema.parse(response.data);
    const size = parseSize(operation.indexedItemsSize ?? 0);
    if (size.kind === 'unparseable') {
      logger.warn('ediscovery.size_unparseable', { job: job.name, raw: String(size.raw) });
    }
    return {
      ...job,
      status: mapOperationStatus(operation.status),
      itemCount: operation.indexedItemCount ?? 0,
      totalSizeBytes: size.kind === 'bytes' ? size.bytes : 0,
    };
  }

  async pollUntilDone(job: BulkSearchJob, maxWaitMinutes: number): Promise<BulkSearchJob> {
    const deadline = this.deps.clock.now() + maxWaitMinutes * 60_000;
    let current = job;

    for (;;) {
      try {
        current = await this.refresh(current);
      } catch (error) {
        if (!(error instanceof TransientNetworkError || error instanceof ThrottleError)) throw error;
        logger.warn('ediscovery.poll_error', { job: job.name, error: errorMessage(error) });
      }
      logger.debug('ediscovery.poll', { job: job.name, status: current.status, itemCount: current.itemCount });
      if (current.status === 'Completed' || current.status === 'Failed') return current;

      const remaining = deadline - this.deps.clock.now();
      if (remaining <= 0) return current;
      await this.deps.clock.sleep(Math.min(this.deps.pollIntervalMs, remaining));
    }
  }

  async purge(job: BulkSearchJob): Promise<number> {
    if (job.status !== 'Completed') {
      throw new RemoteApiError(`Cannot purge ${job.name}: search is ${job.status}`);
    }
    await this.deps.graph.request({
      method: 'POST',
      url: `${this.searchPath(job)}/purgeData`,
      data: { purgeType: 'hardDelete', purgeAreas: 'mailboxes' },
    });
    return job.itemCount;
  }

  async discard(job: BulkSearchJob): Promise<void> {
    // Already gone counts as discarded
    await this.deps.graph.request({ method: 'DELETE', url: this.searchPath(job) }, { acceptStatus: [404] });
  }
}
