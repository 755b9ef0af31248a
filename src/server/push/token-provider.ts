import { z } from 'zod';
import { CredentialError, describeCause } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Clock } from '../relay/wait.js';
import type { Credential, FetchLike } from '../types.js';

export interface TokenProviderOptions {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  scope: string;
  marginSeconds: number;
  clock: Clock;
  fetch: FetchLike;
  logger: Logger;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  // number or numeric string
  expires_in: z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
});

/**
 * Client-credential token for the push channel. One instance per process; the cached
 * credential is swapped whole, and concurrent callers during a refresh share one exchange.
 */
export class TokenProvider {
  private current?: Credential;
  private inflight?: Promise<Credential>;
  private readonly logger: Logger;

  constructor(private readonly opts: TokenProviderOptions) {
    this.logger = opts.logger.child({ module: 'token-provider' });
  }

  async getToken(): Promise<Credential> {
    const cached = this.current;
    if (cached && this.opts.clock.now() < cached.expiresAt) return cached;
    if (!this.inflight) {
      this.inflight = this.exchange().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.current = undefined;
  }

  private async exchange(): Promise<Credential> {
    if (!this.opts.clientId || !this.opts.clientSecret) {
      throw new CredentialError('push credentials are not configured');
    }

    this.logger.info({ endpoint: this.opts.tokenEndpoint }, 'requesting push access token');
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.opts.clientId,
      client_secret: this.opts.clientSecret,
      scope: this.opts.scope
    });

    let res: Response;
    try {
      res = await this.opts.fetch(this.opts.tokenEndpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString()
      });
    } catch (error) {
      throw new CredentialError(`token request failed: ${describeCause(error)}`, { cause: error });
    }

    const text = await res.text();
    if (!res.ok) {
      this.logger.error({ status: res.status, body: text }, 'token request rejected');
      throw new CredentialError(`token endpoint returned ${res.status}: ${text}`);
    }

    let parsed: z.infer<typeof tokenResponseSchema>;
    try {
      parsed = tokenResponseSchema.parse(JSON.parse(text));
    } catch (error) {
      throw new CredentialError('token endpoint returned a malformed body', { cause: error });
    }

    const lifetimeMs = Math.max(0, parsed.expires_in - this.opts.marginSeconds) * 1000;
    const credential: Credential = { token: parsed.access_token, expiresAt: this.opts.clock.now() + lifetimeMs };
    this.current = credential;
    this.logger.info({ expiresAt: new Date(credential.expiresAt).toISOString() }, 'push access token acquired');
    return credential;
  }
}
