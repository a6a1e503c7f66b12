import axios, { type AxiosRequestConfig } from 'axios';
import type { AccessTokenProvider } from '../../services/ports/access-token.port';
import type { RetryService } from '../../services/retry.service';
import { TransientNetworkError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { mapGraphError } from './graph.errors';

export interface HttpResponseLike {
  status: number;
  data: unknown;
  headers: unknown;
}

export interface HttpRequester {
  request(config: AxiosRequestConfig): Promise<HttpResponseLike>;
}

export type GraphMethod = 'GET' | 'POST' | 'DELETE' | 'PATCH';

export interface GraphRequest {
  method: GraphMethod;
  url: string;
  params?: Record<string, string | number | boolean>;
  data?: unknown;
  headers?: Record<string, string>;
}

export interface GraphRequestOptions {
  retryThrottled?: boolean;
  acceptStatus?: number[];
}

export interface GraphClientDeps {
  baseUrl: string;
  timeoutMs: number;
  tokens: AccessTokenProvider;
  http?: HttpRequester;
  // Applied to throttled non-batch calls; omitted means a single attempt
  retry?: RetryService;
}

function headerValue(headers: unknown, name: string): unknown {
  if (!headers || typeof headers !== 'object') return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value;
  }
  return undefined;
}

export class GraphClient {
  private readonly http: HttpRequester;

  constructor(private readonly deps: GraphClientDeps) {
    this.http = deps.http ?? axios.create({ baseURL: deps.baseUrl, timeout: deps.timeoutMs });
  }

  /** Sends the request and returns the response whatever its status. */
  async send(request: GraphRequest): Promise<HttpResponseLike> {
    const token = await this.deps.tokens.getAccessToken();
    const config: AxiosRequestConfig = {
      method: request.method,
      url: request.url,
      baseURL: this.deps.baseUrl,
      timeout: this.deps.timeoutMs,
      params: request.params,
      data: request.data,
      headers: { Authorization: `Bearer ${token}`, ...request.headers },
      validateStatus: () => true,
    };

    try {
      const response = await this.http.request(config);
      logger.debug('graph.request', { method: request.method, endpoint: request.url, status: response.status });
      return response;
    } catch (error) {
      // validateStatus accepts every status, so only transport failures land here
      throw new TransientNetworkError(`${request.method} ${request.url} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Sends the request and throws the mapped error for any non-2xx status
   * outside `acceptStatus`.
   */
  async request(request: GraphRequest, options: GraphRequestOptions = {}): Promise<HttpResponseLike> {
    const accepted = options.acceptStatus ?? [];
    const attempt = async () => {
      const response = await this.send(request);
      if ((response.status >= 200 && response.status < 300) || accepted.includes(response.status)) return response;
      logger.warn('graph.request.error', { method: request.method, endpoint: request.url, status: response.status });
      throw mapGraphError(response.status, response.data, headerValue(response.headers, 'retry-after'), `${request.method} ${request.url}`);
    };

    const retry = this.deps.retry;
    if (retry && options.retryThrottled !== false) {
      return retry.withRetry(attempt, `${request.method} ${request.url}`);
    }
    return attempt();
  }

  /** Follows `@odata.nextLink` until exhausted, handing each page body to `onPage`. */
  async forEachPage(first: GraphRequest, onPage: (body: unknown) => void, maxPages: number = 1000): Promise<void> {
    let next: GraphRequest | undefined = first;
    let pages = 0;
    while (next && pages < maxPages) {
      const response = await this.request(next);
      pages++;
      onPage(response.data);
      const link = nextLinkOf(response.data);
      // nextLink is absolute and already carries the query string
      next = link ? { method: 'GET', url: link, headers: first.headers } : undefined;
    }
  }
}

function nextLinkOf(body: unknown): string | undefined {
  if (!body || typeof body !== 'object') return undefined;
  const link = Object.entries(body).find(([key]) => key === '@odata.nextLink')?.[1];
  return typeof link === 'string' && link.length > 0 ? link : undefined;
}
