import type { AxiosRequestConfig } from 'axios';
import type { HttpRequester, HttpResponseLike } from '../../adapters/graph/graph.client';
import type { PurgeConfig } from '../../config/purge.config';
import type { AccessTokenProvider } from '../../services/ports/access-token.port';
import type { BulkSearchBackendPort } from '../../services/ports/bulk-search.port';
import type { ClockPort } from '../../services/ports/clock.port';
import type { ConfirmationGatePort } from '../../services/ports/confirmation.port';
import { fetchPageSize, type RemoteMailBackendPort } from '../../services/ports/remote-mail.port';
import type {
  BatchOutcome,
  BulkSearchJob,
  BulkSearchStatus,
  DateFilter,
  MailFolder,
  MessageBatch,
} from '../../types/purge.types';

/** Virtual time: `sleep` returns at once and moves `now` forward. */
export class FakeClock implements ClockPort {
  readonly sleeps: number[] = [];

  constructor(private current: number = Date.parse('2024-06-01T12:00:00.000Z')) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class ScriptedGate implements ConfirmationGatePort {
  readonly prompts: string[] = [];

  constructor(private readonly answers: string[]) {}

  async prompt(message: string): Promise<string> {
    this.prompts.push(message);
    return this.answers.shift() ?? '';
  }
}

export const staticTokens: AccessTokenProvider = {
  getAccessToken: async () => 'test-token',
};

export function makeFolder(overrides: Partial<MailFolder> = {}): MailFolder {
  return {
    id: 'folder-inbox',
    displayName: 'Inbox',
    path: 'Inbox',
    totalItemCount: 0,
    sizeBytes: 0,
    ...overrides,
  };
}

export function makeIds(count: number, prefix: string = 'msg'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}-${i + 1}`);
}

export function testConfig(overrides: Partial<PurgeConfig> = {}): PurgeConfig {
  return {
    credentials: { tenantId: 'test-tenant', clientId: 'test-client', clientSecret: 'test-secret' },
    ediscoveryCaseId: 'case-1',
    graphBaseUrl: 'https://graph.test/v1.0',
    authorityUrl: 'https://login.test',
    requestTimeoutMs: 1000,
    batchPauseMs: 200,
    maxAttempts: 3,
    backoffBaseSeconds: 2,
    pollIntervalMs: 30000,
    auditLogDir: './logs',
    ...overrides,
  };
}

export type BatchBehavior = 'ok' | 'throttle-all' | 'fail-all' | { throttle: string[] } | { deny: string[] } | Error;

/**
 * In-memory mailbox: each folder holds the ids currently matching the filter.
 * Successful deletes remove ids, so re-fetching shrinks like the real service.
 */
export class FakeRemoteMailBackend implements RemoteMailBackendPort {
  readonly kind = 'remote-mail' as const;
  readonly deleteCalls: string[][] = [];
  readonly fetchCalls: number[] = [];
  readonly countCalls: string[] = [];
  countError?: Error;
  fetchError?: Error;
  // Consumed one per deleteBatch call; 'ok' once exhausted
  batchScript: BatchBehavior[] = [];
  private readonly remaining = new Map<string, string[]>();

  constructor(
    private readonly folders: MailFolder[] = [makeFolder()],
    matches: Record<string, string[]> = {}
  ) {
    for (const folder of folders) this.remaining.set(folder.id, [...(matches[folder.id] ?? [])]);
  }

  remainingIn(folderId: string): string[] {
    return [...(this.remaining.get(folderId) ?? [])];
  }

  async listFolders(): Promise<MailFolder[]> {
    return [...this.folders];
  }

  async resolveFolder(_mailbox: string, name: string): Promise<MailFolder> {
    const found = this.folders.find((f) => f.id === name || f.path.toLowerCase() === name.toLowerCase());
    if (!found) throw new Error(`no folder ${name}`);
    return found;
  }

  async countMatching(_mailbox: string, folder: MailFolder): Promise<number> {
    this.countCalls.push(folder.id);
    if (this.countError) throw this.countError;
    return this.remainingIn(folder.id).length;
  }

  async fetchIdPage(_mailbox: string, folder: MailFolder, _filter: DateFilter, baseSize: number): Promise<string[]> {
    this.fetchCalls.push(baseSize);
    if (this.fetchError) throw this.fetchError;
    return this.remainingIn(folder.id).slice(0, fetchPageSize(baseSize));
  }

  async deleteBatch(_mailbox: string, ids: MessageBatch): Promise<BatchOutcome> {
    this.deleteCalls.push([...ids]);
    const behavior = this.batchScript.shift() ?? 'ok';
    if (behavior instanceof Error) throw behavior;
    if (behavior === 'fail-all') {
      return { succeeded: 0, failed: ids.length, throttled: false, throttledIds: [], denied: 0 };
    }
    if (typeof behavior === 'object' && 'deny' in behavior) {
      const allowed = ids.filter((id) => !behavior.deny.includes(id));
      this.removeIds(allowed);
      const denied = ids.length - allowed.length;
      return { succeeded: allowed.length, failed: denied, throttled: false, throttledIds: [], denied };
    }
    const throttled = behavior === 'throttle-all' ? [...ids] : behavior === 'ok' ? [] : ids.filter((id) => behavior.throttle.includes(id));
    const succeeded = ids.filter((id) => !throttled.includes(id));
    this.removeIds(succeeded);
    return {
      succeeded: succeeded.length,
      failed: throttled.length,
      throttled: throttled.length > 0,
      throttledIds: throttled,
      denied: 0,
    };
  }

  private removeIds(ids: string[]): void {
    for (const [folderId, list] of this.remaining) {
      this.remaining.set(
        folderId,
        list.filter((id) => !ids.includes(id))
      );
    }
  }
}

export interface FakeBulkScenario {
  finalStatus?: BulkSearchStatus;
  itemCount?: number;
  totalSizeBytes?: number;
  createError?: Error;
  pollError?: Error;
  purgeError?: Error;
  discardError?: Error;
}

export class FakeBulkSearchBackend implements BulkSearchBackendPort {
  readonly kind = 'bulk-search' as const;
  readonly calls: string[] = [];
  readonly pollWaits: number[] = [];

  constructor(private readonly scenario: FakeBulkScenario = {}) {}

  async createAndRun(mailbox: string): Promise<BulkSearchJob> {
    this.calls.push('create');
    if (this.scenario.createError) throw this.scenario.createError;
    return {
      id: 'search-1',
      name: `purge-${mailbox}`,
      mailbox,
      query: 'kind:email',
      status: 'Pending',
      itemCount: 0,
      totalSizeBytes: 0,
    };
  }

  async pollUntilDone(job: BulkSearchJob, maxWaitMinutes: number): Promise<BulkSearchJob> {
    this.calls.push('poll');
    this.pollWaits.push(maxWaitMinutes);
    if (this.scenario.pollError) throw this.scenario.pollError;
    return {
      ...job,
      status: this.scenario.finalStatus ?? 'Completed',
      itemCount: this.scenario.itemCount ?? 0,
      totalSizeBytes: this.scenario.totalSizeBytes ?? 0,
    };
  }

  async purge(job: BulkSearchJob): Promise<number> {
    this.calls.push('purge');
    if (this.scenario.purgeError) throw this.scenario.purgeError;
    return job.itemCount;
  }

  async discard(): Promise<void> {
    this.calls.push('discard');
    if (this.scenario.discardError) throw this.scenario.discardError;
  }
}

export function jsonResponse(status: number, data: unknown, headers: Record<string, string> = {}): HttpResponseLike {
  return { status, data, headers };
}

type Responder = HttpResponseLike | Error | ((config: AxiosRequestConfig) => HttpResponseLike);

interface Route {
  method: string;
  url: string | RegExp;
  responses: Responder[];
}

/**
 * Routes requests by method and url. Each route answers with its queued
 * responses in order and repeats the last one once the queue runs dry.
 */
export class FakeHttpRequester implements HttpRequester {
  readonly calls: AxiosRequestConfig[] = [];
  private readonly routes: Route[] = [];

  on(method: string, url: string | RegExp, ...responses: Responder[]): this {
    this.routes.push({ method: method.toUpperCase(), url, responses });
    return this;
  }

  callsTo(method: string, url: string | RegExp): AxiosRequestConfig[] {
    return this.calls.filter((c) => String(c.method).toUpperCase() === method.toUpperCase() && matches(url, c.url ?? ''));
  }

  async request(config: AxiosRequestConfig): Promise<HttpResponseLike> {
    this.calls.push(config);
    const method = String(config.method ?? 'GET').toUpperCase();
    const route = this.routes.find((r) => r.method === method && matches(r.url, config.url ?? ''));
    if (!route || route.responses.length === 0) {
      return jsonResponse(404, { error: { code: 'NotFound', message: `no route for ${method} ${config.url}` } });
    }
    const next = route.responses.length > 1 ? route.responses.shift() : route.responses[0];
    if (next === undefined) return jsonResponse(500, null);
    if (next instanceof Error) throw next;
    return typeof next === 'function' ? next(config) : next;
  }
}

function matches(pattern: string | RegExp, url: string): boolean {
  return typeof pattern === 'string' ? url === pattern : pattern.test(url);
}
