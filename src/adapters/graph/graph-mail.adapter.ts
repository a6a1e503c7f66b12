import { z } from 'zod';
import { formatFilterInstant } from '../../services/date-filter.service';
import type { RemoteMailBackendPort } from '../../services/ports/remote-mail.port';
import { MAX_DELETE_BATCH_SIZE, fetchPageSize } from '../../services/ports/remote-mail.port';
import type { BatchOutcome, DateFilter, MailFolder, MessageBatch } from '../../types/purge.types';
import { AuthError, ValidationError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { parseSize } from '../../utils/size-parser';
import type { GraphClient } from './graph.client';
import { isPermissionOrQuota, isThrottleStatus } from './graph.errors';

export const WELL_KNOWN_FOLDERS = [
  'inbox',
  'sentitems',
  'deleteditems',
  'drafts',
  'junkemail',
  'archive',
  'outbox',
  'conversationhistory',
  'recoverableitemsdeletions',
  'clutter',
] as const;

const FOLDER_PAGE_SIZE = 100;
const COUNT_PAGE_SIZE = 200;

const mailFolderSchema = z
  .object({
    id: z.string(),
    displayName: z.string().default(''),
    childFolderCount: z.number().int().nonnegative().default(0),
    totalItemCount: z.number().int().nonnegative().default(0),
    sizeInBytes: z.unknown().optional(),
  })
  .passthrough();

type GraphMailFolder = z.infer<typeof mailFolderSchema>;

const collectionSchema = <T extends z.ZodTypeAny>(item: T) =>
  z.object({ value: z.array(item) }).passthrough();

const messageIdSchema = z.object({ id: z.string() }).passthrough();

const batchResponseSchema = z.object({
  responses: z.array(
    z
      .object({
        id: z.string(),
        status: z.number().int(),
        body: z.unknown().optional(),
      })
      .passthrough()
  ),
});

/** `$filter` expression for the message date predicate. */
export function toGraphFilterExpression(filter: DateFilter): string {
  if (filter.mode === 'cutoff') {
    return `receivedDateTime lt ${formatFilterInstant(filter.cutoff)}`;
  }
  return `receivedDateTime ge ${formatFilterInstant(filter.start)} and receivedDateTime le ${formatFilterInstant(filter.end)}`;
}

function userPath(mailbox: string): string {
  return `/users/${encodeURIComponent(mailbox)}`;
}

function toMailFolder(raw: GraphMailFolder, parentPath: string | null): MailFolder {
  const size = parseSize(raw.sizeInBytes);
  if (size.kind === 'unparseable' && raw.sizeInBytes !== undefined) {
    logger.debug('graph-mail.folder_size_unparseable', { folderId: raw.id });
  }
  return {
    id: raw.id,
    displayName: raw.displayName,
    path: parentPath ? `${parentPath}/${raw.displayName}` : raw.displayName,
    totalItemCount: raw.totalItemCount,
    sizeBytes: size.kind === 'bytes' ? size.bytes : null,
  };
}

export class GraphMailAdapter implements RemoteMailBackendPort {
  readonly kind = 'remote-mail' as const;

  constructor(private readonly graph: GraphClient) {}

  async listFolders(mailbox: string): Promise<MailFolder[]> {
    const folders: MailFolder[] = [];
    await this.collectFolders(mailbox, `${userPath(mailbox)}/mailFolders`, null, folders);
    return folders;
  }

  async resolveFolder(mailbox: string, folder: string): Promise<MailFolder> {
    const wanted = folder.trim();
    const lowered = wanted.toLowerCase();

    if (WELL_KNOWN_FOLDERS.some((name) => name === lowered)) {
      const response = await this.graph.request({
        method: 'GET',
        url: `${userPath(mailbox)}/mailFolders/${lowered}`,
      });
      const parsed = mailFolderSchema.safeParse(response.data);
      if (!parsed.success) throw new Error(`Unexpected folder payload for ${lowered}`);
      return toMailFolder(parsed.data, null);
    }

    const all = await this.listFolders(mailbox);
    const byId = all.find((f) => f.id === wanted);
    if (byId) return byId;
    const byPath = all.find((f) => f.path.toLowerCase() === lowered);
    if (byPath) return byPath;
    const byName = all.filter((f) => f.displayName.toLowerCase() === lowered);
    if (byName.length === 1) return byName[0];
    if (byName.length > 1) {
      throw new ValidationError(`Folder name "${wanted}" is ambiguous in ${mailbox}`, byName.map((f) => `Use the full path: ${f.path}`));
    }
    throw new ValidationError(`Folder "${wanted}" was not found in ${mailbox}`, [
      `Use a well-known name (${WELL_KNOWN_FOLDERS.join(', ')}), a folder id, or a path such as Inbox/Projects`,
    ]);
  }

  async countMatching(mailbox: string, folder: MailFolder, filter: DateFilter): Promise<number> {
    const expression = toGraphFilterExpression(filter);
    try {
      const response = await this.graph.request({
        method: 'GET',
        url: `${userPath(mailbox)}/mailFolders/${encodeURIComponent(folder.id)}/messages/$count`,
        params: { $filter: expression },
        headers: { ConsistencyLevel: 'eventual' },
      });
      const count = z.coerce.number().int().nonnegative().safeParse(response.data);
      if (count.success) return count.data;
      throw new Error('count endpoint returned a non-numeric body');
    } catch (error) {
      if (error instanceof AuthError) throw error;
      logger.warn('graph-mail.count_fallback', { folder: folder.path, error: errorMessage(error) });
    }

    let total = 0;
    await this.graph.forEachPage(
      {
        method: 'GET',
        url: `${userPath(mailbox)}/mailFolders/${encodeURIComponent(folder.id)}/messages`,
        params: { $filter: expression, $select: 'id', $top: COUNT_PAGE_SIZE },
      },
      (body) => {
        total += collectionSchema(messageIdSchema).parse(body).value.length;
      }
    );
    return total;
  }

  async fetchIdPage(mailbox: string, folder: MailFolder, filter: DateFilter, baseSize: number): Promise<string[]> {
    // No paging token: each call re-evaluates the filter against what is left
    const response = await this.graph.request({
      method: 'GET',
      url: `${userPath(mailbox)}/mailFolders/${encodeURIComponent(folder.id)}/messages`,
      params: {
        $filter: toGraphFilterExpression(filter),
        $select: 'id',
        $top: fetchPageSize(baseSize),
      },
    });
    return collectionSchema(messageIdSchema).parse(response.data).value.map((m) => m.id);
  }

  async deleteBatch(mailbox: string, ids: MessageBatch): Promise<BatchOutcome> {
    if (ids.length > MAX_DELETE_BATCH_SIZE) {
      throw new RangeError(`A delete batch holds at most ${MAX_DELETE_BATCH_SIZE} ids, got ${ids.length}`);
    }
    if (ids.length === 0) return { succeeded: 0, failed: 0, throttled: false, throttledIds: [], denied: 0 };

    const requests = ids.map((id, index) => ({
      id: String(index + 1),
      method: 'DELETE',
      url: `${userPath(mailbox)}/messages/${encodeURIComponent(id)}`,
    }));

    // The outer call never retries here; the engine owns throttle handling for batches
    const response = await this.graph.request(
      { method: 'POST', url: '/$batch', data: { requests }, headers: { 'Content-Type': 'application/json' } },
      { retryThrottled: false }
    );
    const parsed = batchResponseSchema.parse(response.data);
    const replyById = new Map(parsed.responses.map((r) => [r.id, r]));

    const outcome: BatchOutcome = { succeeded: 0, failed: 0, throttled: false, throttledIds: [], denied: 0 };
    ids.forEach((messageId, index) => {
      const reply = replyById.get(String(index + 1));
      if (reply && reply.status >= 200 && reply.status < 300) {
        outcome.succeeded++;
        return;
      }
      outcome.failed++;
      if (!reply) return;
      if (isThrottleStatus(reply.status)) {
        outcome.throttled = true;
        outcome.throttledIds.push(messageId);
      } else if (isPermissionOrQuota(reply.status, reply.body)) {
        outcome.denied++;
      }
    });
    logger.debug('graph-mail.batch', {
      size: ids.length,
      succeeded: outcome.succeeded,
      failed: outcome.failed,
      throttled: outcome.throttledIds.length,
      denied: outcome.denied,
    });
    return outcome;
  }

  private async collectFolders(mailbox: string, url: string, parentPath: string | null, into: MailFolder[]): Promise<void> {
    const level: GraphMailFolder[] = [];
    await this.graph.forEachPage(
      { method: 'GET', url, params: { $top: FOLDER_PAGE_SIZE, includeHiddenFolders: 'true' } },
      (body) => {
        level.push(...collectionSchema(mailFolderSchema).parse(body).value);
      }
    );
    for (const raw of level) {
      const folder = toMailFolder(raw, parentPath);
      into.push(folder);
      if (raw.childFolderCount > 0) {
        await this.collectFolders(
          mailbox,
          `${userPath(mailbox)}/mailFolders/${encodeURIComponent(raw.id)}/childFolders`,
          folder.path,
          into
        );
      }
    }
  }
}
