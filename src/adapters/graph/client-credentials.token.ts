import axios from 'axios';
import { z } from 'zod';
import type { GraphCredentials } from '../../config/purge.config';
import type { AccessTokenProvider } from '../../services/ports/access-token.port';
import type { ClockPort } from '../../services/ports/clock.port';
import { AuthError, TransientNetworkError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { HttpRequester, HttpResponseLike } from './graph.client';
import { readGraphError } from './graph.errors';

const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';
// Refresh slightly before the service-side expiry
const EXPIRY_SKEW_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive(),
});

const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

interface ClientCredentialsDeps {
  credentials: GraphCredentials;
  authorityUrl: string;
  clock: ClockPort;
  timeoutMs: number;
  http?: HttpRequester;
}

/** App-only token for the Graph API, cached until shortly before expiry. */
export class ClientCredentialsTokenProvider implements AccessTokenProvider {
  private readonly http: HttpRequester;
  private cached: { token: string; expiresAt: number } | null = null;

  constructor(private readonly deps: ClientCredentialsDeps) {
    this.http = deps.http ?? axios.create({ timeout: deps.timeoutMs });
  }

  async getAccessToken(): Promise<string> {
    const now = this.deps.clock.now();
    if (this.cached && this.cached.expiresAt > now) return this.cached.token;

    const { tenantId, clientId, clientSecret } = this.deps.credentials;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
      scope: GRAPH_DEFAULT_SCOPE,
    });

    let response: HttpResponseLike;
    try {
      response = await this.http.request({
        method: 'POST',
        url: `${this.deps.authorityUrl}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`,
        data: body.toString(),
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: this.deps.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new TransientNetworkError(`Token request failed: ${errorMessage(error)}`);
    }

    if (response.status < 200 || response.status >= 300) {
      const oauth = oauthErrorSchema.safeParse(response.data);
      const reason = oauth.success
        ? `${oauth.data.error}${oauth.data.error_description ? `: ${oauth.data.error_description}` : ''}`
        : readGraphError(response.data).message ?? `status ${response.status}`;
      if (response.status >= 500) throw new TransientNetworkError(`Token endpoint unavailable (${reason})`, response.status);
      throw new AuthError(`Token request rejected (${reason})`);
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AuthError('Token endpoint returned an unexpected payload');
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: now + parsed.data.expires_in * 1000 - EXPIRY_SKEW_MS,
    };
    logger.debug('graph.token.acquired', { expiresInSeconds: parsed.data.expires_in });
    return this.cached.token;
  }
}
