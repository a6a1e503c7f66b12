import { describe, it, expect } from '@jest/globals';
import type { AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { GraphMailAdapter, toGraphFilterExpression } from '../../../adapters/graph/graph-mail.adapter';
import { GraphClient } from '../../../adapters/graph/graph.client';
import type { DateFilter } from '../../../types/purge.types';
import { AuthError, ThrottleError, ValidationError } from '../../../utils/errors';
import { FakeHttpRequester, jsonResponse, makeFolder, makeIds, staticTokens } from '../../utils/test-helpers';

const USER = '/users/user%40example.com';
const inbox = makeFolder({ id: 'inbox-id' });
const cutoff: DateFilter = { mode: 'cutoff', cutoff: new Date('2023-01-01T00:00:00.000Z') };

const batchRequestSchema = z.object({
  requests: z.array(z.object({ id: z.string(), method: z.string(), url: z.string() })),
});

function createAdapter(http: FakeHttpRequester): GraphMailAdapter {
  return new GraphMailAdapter(new GraphClient({ baseUrl: 'https://graph.test/v1.0', timeoutMs: 1000, tokens: staticTokens, http }));
}

function batchReply(statuses: Record<string, number>) {
  return (config: AxiosRequestConfig) => {
    const { requests } = batchRequestSchema.parse(config.data);
    return jsonResponse(200, {
      responses: requests.filter((r) => statuses[r.id] !== undefined).map((r) => ({ id: r.id, status: statuses[r.id] })),
    });
  };
}

function folderHttp(): FakeHttpRequester {
  return new FakeHttpRequester()
    .on(
      'GET',
      `${USER}/mailFolders`,
      jsonResponse(200, {
        value: [
          { id: 'f1', displayName: 'Inbox', childFolderCount: 1, totalItemCount: 10, sizeInBytes: 2048 },
          { id: 'f2', displayName: 'Archive', childFolderCount: 0, totalItemCount: 3 },
          { id: 'f4', displayName: 'Reports', childFolderCount: 1, totalItemCount: 0, sizeInBytes: 0 },
        ],
      })
    )
    .on(
      'GET',
      `${USER}/mailFolders/f1/childFolders`,
      jsonResponse(200, {
        value: [{ id: 'f3', displayName: 'Projects', childFolderCount: 0, totalItemCount: 2, sizeInBytes: '1 KB' }],
      })
    )
    .on(
      'GET',
      `${USER}/mailFolders/f4/childFolders`,
      jsonResponse(200, { value: [{ id: 'f5', displayName: 'Projects', totalItemCount: 1, sizeInBytes: '(512 bytes)' }] })
    );
}

describe('toGraphFilterExpression', () => {
  it('builds a strict less-than for cutoff mode', () => {
    expect(toGraphFilterExpression(cutoff)).toBe('receivedDateTime lt 2023-01-01T00:00:00Z');
  });

  it('builds an inclusive window for range mode', () => {
    expect(
      toGraphFilterExpression({
        mode: 'range',
        start: new Date('2023-01-01T00:00:00.000Z'),
        end: new Date('2023-12-31T23:59:59.000Z'),
      })
    ).toBe('receivedDateTime ge 2023-01-01T00:00:00Z and receivedDateTime le 2023-12-31T23:59:59Z');
  });
});

describe('GraphMailAdapter', () => {
  describe('countMatching', () => {
    it('uses the count endpoint with eventual consistency', async () => {
      const http = new FakeHttpRequester().on('GET', `${USER}/mailFolders/inbox-id/messages/$count`, jsonResponse(200, '45'));
      const count = await createAdapter(http).countMatching('user@example.com', inbox, cutoff);

      expect(count).toBe(45);
      expect(http.calls[0].params).toEqual({ $filter: 'receivedDateTime lt 2023-01-01T00:00:00Z' });
      expect(http.calls[0].headers).toEqual({ Authorization: 'Bearer test-token', ConsistencyLevel: 'eventual' });
    });

    it('falls back to counting id pages when the count call fails', async () => {
      const http = new FakeHttpRequester()
        .on('GET', `${USER}/mailFolders/inbox-id/messages/$count`, jsonResponse(400, { error: { code: 'BadRequest' } }))
        .on(
          'GET',
          `${USER}/mailFolders/inbox-id/messages`,
          jsonResponse(200, { value: [{ id: 'a' }, { id: 'b' }], '@odata.nextLink': 'https://graph.test/v1.0/page-2' })
        )
        .on('GET', 'https://graph.test/v1.0/page-2', jsonResponse(200, { value: [{ id: 'c' }] }));

      const count = await createAdapter(http).countMatching('user@example.com', inbox, cutoff);

      expect(count).toBe(3);
      expect(http.callsTo('GET', `${USER}/mailFolders/inbox-id/messages`)[0].params).toEqual({
        $filter: 'receivedDateTime lt 2023-01-01T00:00:00Z',
        $select: 'id',
        $top: 200,
      });
    });

    it('does not fall back on an auth failure', async () => {
      const http = new FakeHttpRequester().on('GET', `${USER}/mailFolders/inbox-id/messages/$count`, jsonResponse(401, null));
      await expect(createAdapter(http).countMatching('user@example.com', inbox, cutoff)).rejects.toBeInstanceOf(AuthError);
      expect(http.calls).toHaveLength(1);
    });
  });

  describe('fetchIdPage', () => {
    it('requests ids only, four times the base size', async () => {
      const http = new FakeHttpRequester().on(
        'GET',
        `${USER}/mailFolders/inbox-id/messages`,
        jsonResponse(200, { value: [{ id: 'm1' }, { id: 'm2' }] })
      );

      const ids = await createAdapter(http).fetchIdPage('user@example.com', inbox, cutoff, 10);

      expect(ids).toEqual(['m1', 'm2']);
      expect(http.calls[0].params).toEqual({ $filter: 'receivedDateTime lt 2023-01-01T00:00:00Z', $select: 'id', $top: 40 });
    });

    it('caps the page at 200 ids', async () => {
      const http = new FakeHttpRequester().on('GET', `${USER}/mailFolders/inbox-id/messages`, jsonResponse(200, { value: [] }));
      await createAdapter(http).fetchIdPage('user@example.com', inbox, cutoff, 500);
      expect(http.calls[0].params).toEqual(expect.objectContaining({ $top: 200 }));
    });
  });

  describe('deleteBatch', () => {
    it('sends one DELETE sub-request per id', async () => {
      const http = new FakeHttpRequester().on('POST', '/$batch', batchReply({ '1': 204, '2': 204 }));

      const outcome = await createAdapter(http).deleteBatch('user@example.com', ['id-1', 'id-2']);

      expect(outcome).toEqual({ succeeded: 2, failed: 0, throttled: false, throttledIds: [], denied: 0 });
      expect(batchRequestSchema.parse(http.calls[0].data).requests).toEqual([
        { id: '1', method: 'DELETE', url: `${USER}/messages/id-1` },
        { id: '2', method: 'DELETE', url: `${USER}/messages/id-2` },
      ]);
    });

    it('judges each sub-response on its own status', async () => {
      const http = new FakeHttpRequester().on('POST', '/$batch', batchReply({ '1': 204, '2': 429, '3': 404, '4': 503 }));

      const outcome = await createAdapter(http).deleteBatch('user@example.com', ['a', 'b', 'c', 'd', 'e']);

      // 'e' has no sub-response at all
      expect(outcome).toEqual({ succeeded: 1, failed: 4, throttled: true, throttledIds: ['b', 'd'], denied: 0 });
    });

    it('counts permission and quota refusals among the failures', async () => {
      const http = new FakeHttpRequester().on('POST', '/$batch', () =>
        jsonResponse(200, {
          responses: [
            { id: '1', status: 403, body: { error: { code: 'ErrorAccessDenied' } } },
            { id: '2', status: 507, body: { error: { code: 'ErrorQuotaExceeded', message: 'Mailbox quota exceeded' } } },
            { id: '3', status: 404, body: { error: { code: 'ErrorItemNotFound' } } },
          ],
        })
      );

      const outcome = await createAdapter(http).deleteBatch('user@example.com', ['a', 'b', 'c']);

      expect(outcome).toEqual({ succeeded: 0, failed: 3, throttled: false, throttledIds: [], denied: 2 });
    });

    it('rejects more than 20 ids without calling the API', async () => {
      const http = new FakeHttpRequester();
      await expect(createAdapter(http).deleteBatch('user@example.com', makeIds(21))).rejects.toBeInstanceOf(RangeError);
      expect(http.calls).toHaveLength(0);
    });

    it('surfaces a throttled batch call as a ThrottleError', async () => {
      const http = new FakeHttpRequester().on('POST', '/$batch', jsonResponse(429, null, { 'retry-after': '2' }));
      await expect(createAdapter(http).deleteBatch('user@example.com', ['a'])).rejects.toBeInstanceOf(ThrottleError);
    });
  });

  describe('folders', () => {
    it('enumerates folders depth first with paths and parsed sizes', async () => {
      const folders = await createAdapter(folderHttp()).listFolders('user@example.com');

      expect(folders).toEqual([
        { id: 'f1', displayName: 'Inbox', path: 'Inbox', totalItemCount: 10, sizeBytes: 2048 },
        { id: 'f3', displayName: 'Projects', path: 'Inbox/Projects', totalItemCount: 2, sizeBytes: 1024 },
        { id: 'f2', displayName: 'Archive', path: 'Archive', totalItemCount: 3, sizeBytes: null },
        { id: 'f4', displayName: 'Reports', path: 'Reports', totalItemCount: 0, sizeBytes: 0 },
        { id: 'f5', displayName: 'Projects', path: 'Reports/Projects', totalItemCount: 1, sizeBytes: 512 },
      ]);
    });

    it('resolves well-known names directly', async () => {
      const http = new FakeHttpRequester().on(
        'GET',
        `${USER}/mailFolders/inbox`,
        jsonResponse(200, { id: 'AAMk-inbox', displayName: 'Inbox', totalItemCount: 5 })
      );

      const folder = await createAdapter(http).resolveFolder('user@example.com', 'Inbox');

      expect(folder).toEqual({ id: 'AAMk-inbox', displayName: 'Inbox', path: 'Inbox', totalItemCount: 5, sizeBytes: null });
    });

    it('resolves ids and paths case-insensitively', async () => {
      const adapter = createAdapter(folderHttp());
      await expect(adapter.resolveFolder('user@example.com', 'f2')).resolves.toEqual(expect.objectContaining({ path: 'Archive' }));
      await expect(adapter.resolveFolder('user@example.com', 'reports/projects')).resolves.toEqual(
        expect.objectContaining({ id: 'f5' })
      );
    });

    it('refuses an ambiguous display name and lists the candidate paths', async () => {
      const failure = await createAdapter(folderHttp())
        .resolveFolder('user@example.com', 'projects')
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ValidationError);
      expect(failure instanceof ValidationError && failure.details).toEqual([
        'Use the full path: Inbox/Projects',
        'Use the full path: Reports/Projects',
      ]);
    });

    it('reports a folder that does not exist', async () => {
      await expect(createAdapter(folderHttp()).resolveFolder('user@example.com', 'Missing')).rejects.toThrow(
        'Folder "Missing" was not found in user@example.com'
      );
    });
  });
});
