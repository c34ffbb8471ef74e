import { z } from "zod";

import type { OidcCredentials } from "../core/config.js";
import { TokenRequestError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export interface AccessTokenSource {
  /** Resolves to null when requests go out unauthenticated. */
  getToken(): Promise<string | null>;
  /** Drops the cached token, but only if it is still `token`. */
  invalidate(token: string): void;
}

type OidcTokenProviderOptions = {
  fetch?: typeof fetch;
  now?: () => number;
  timeoutMs?: number;
  refreshMarginMs?: number;
};

type CachedToken = {
  token: string;
  expiresAt: number;
};

const DEFAULT_EXPIRES_IN_SECONDS = 300;
const DEFAULT_REFRESH_MARGIN_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 30_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
  token_type: z.string().optional(),
});

export const noAuthentication: AccessTokenSource = {
  getToken: async () => null,
  invalidate: () => undefined,
};

// =============================================================================
// CLIENT-CREDENTIALS PROVIDER
// =============================================================================

/**
 * Client-credentials tokens with an in-memory cache. At most one token request
 * is in flight; concurrent callers share its result.
 */
export class OidcTokenProvider implements AccessTokenSource {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly timeoutMs: number;
  private readonly refreshMarginMs: number;
  private cached: CachedToken | null = null;
  private inflight: Promise<string> | null = null;

  constructor(
    private readonly credentials: OidcCredentials,
    options: OidcTokenProviderOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
  }

  async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt - this.refreshMarginMs) {
      return this.cached.token;
    }

    if (!this.inflight) {
      this.inflight = this.requestToken().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  invalidate(token: string): void {
    if (this.cached?.token === token) {
      this.cached = null;
    }
  }

  private async requestToken(): Promise<string> {
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(this.credentials.tokenUrl, {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TokenRequestError(`Token request to ${this.credentials.tokenUrl} failed`, undefined, err);
    }

    if (!response.ok) {
      throw new TokenRequestError(
        `Token endpoint responded with status ${response.status}`,
        response.status,
      );
    }

    const parsed = TokenResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new TokenRequestError("Token endpoint returned no usable access_token", response.status);
    }

    const expiresInMs = (parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000;
    this.cached = { token: parsed.data.access_token, expiresAt: this.now() + expiresInMs };
    return parsed.data.access_token;
  }
}
