// OAuth2 client-credentials token for the flight-offer API, cached until shortly before expiry.
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '@/services/logger';
import { AuthFailureError } from '@/utils/errors';
import { describeHttpError } from '@/services/flights/http-error';

const log = logger.getSubLogger({ name: 'amadeus-auth' });

/** Refresh this long before the upstream expiry to avoid racing it. */
const EXPIRY_SKEW_MS = 60_000;
const TOKEN_TIMEOUT_MS = 10_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().nonnegative().default(1799),
});

export interface TokenProvider {
  getToken(): Promise<string>;
  invalidate(): void;
}

export interface AmadeusCredentials {
  baseUrl: string;
  clientId?: string;
  clientSecret?: string;
}

export class AmadeusTokenProvider implements TokenProvider {
  private cached: { token: string; expiresAt: number } | null = null;
  private pending: Promise<string> | null = null;
  /** Bumped by `invalidate()`; a request started under an older value is not cached. */
  private generation = 0;

  constructor(
    private readonly http: AxiosInstance,
    private readonly credentials: AmadeusCredentials,
    private readonly now: () => number = Date.now,
  ) {}

  async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt) {
      return this.cached.token;
    }
    // Concurrent callers share one token request.
    if (!this.pending) {
      const request: Promise<string> = this.requestToken(this.generation).finally(() => {
        if (this.pending === request) this.pending = null;
      });
      this.pending = request;
    }
    return this.pending;
  }

  invalidate(): void {
    this.generation++;
    this.cached = null;
    this.pending = null;
  }

  private async requestToken(generation: number): Promise<string> {
    const { baseUrl, clientId, clientSecret } = this.credentials;
    if (!clientId || !clientSecret) {
      throw new AuthFailureError('Flight API credentials are not configured');
    }

    let body: unknown;
    try {
      const res = await this.http.post(
        `${baseUrl}/v1/security/oauth2/token`,
        new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
        }).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: TOKEN_TIMEOUT_MS,
        },
      );
      body = res.data;
    } catch (err) {
      log.error('amadeus-auth:token_request_failed', { error: describeHttpError(err) });
      throw new AuthFailureError(`Token request failed: ${describeHttpError(err)}`, { cause: err });
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.error('amadeus-auth:token_response_invalid');
      throw new AuthFailureError('Token response did not contain an access token');
    }

    const lifetimeMs = Math.max(0, parsed.data.expires_in * 1000 - EXPIRY_SKEW_MS);
    if (generation === this.generation) {
      this.cached = { token: parsed.data.access_token, expiresAt: this.now() + lifetimeMs };
    }
    log.info('amadeus-auth:token_acquired', { expiresInSeconds: parsed.data.expires_in });
    return parsed.data.access_token;
  }
}
