/*
Purpose: deliver SBOM documents to the archive with auth refresh and bounded retries.
Assumptions: one document per request; the archive deduplicates by content and answers 409 for repeats.
Usage: await new ArchiveClient({ baseUrl, tokens, maxAttempts: 5 }).upload(document).
*/

import { TokenRequestError } from "../core/errors.js";
import type { FailureReason } from "../core/outcome.js";
import { delay } from "../core/utils.js";
import type { SbomDocument } from "../producer/sbom-producer.js";

import type { AccessTokenSource } from "./oidc-token-provider.js";

// =============================================================================
// TYPES
// =============================================================================

export type DeliveryResult =
  | { status: "delivered"; urn?: string; alreadyPresent: boolean; attempts: number }
  | {
      status: "failed";
      reason: Exclude<FailureReason, "produce">;
      detail: string;
      attempts: number;
    };

export interface SbomArchive {
  upload(document: SbomDocument): Promise<DeliveryResult>;
}

export type ArchiveClientOptions = {
  baseUrl: string;
  tokens: AccessTokenSource;
  maxAttempts?: number;
  timeoutMs?: number;
  labels?: Record<string, string>;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
};

export type RetryEvent = {
  releaseId: string;
  attempt: number;
  delayMs: number;
  detail: string;
};

type AttemptResult =
  | { kind: "delivered"; urn?: string; alreadyPresent: boolean }
  | { kind: "unauthorized"; token: string | null; detail: string }
  | { kind: "transient"; detail: string }
  | { kind: "fatal"; reason: "non-retryable" | "auth"; detail: string };

const UPLOAD_PATH = "api/v2/sbom";
const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_TIMEOUT_MS = 30_000;
const BACKOFF_BASE_MS = 500;
const BACKOFF_CAP_MS = 30_000;
const RETRIABLE_STATUS_CODES = new Set([408, 429]);

// =============================================================================
// CLIENT
// =============================================================================

export class ArchiveClient implements SbomArchive {
  private readonly uploadUrl: URL;
  private readonly tokens: AccessTokenSource;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry?: (event: RetryEvent) => void;

  constructor(options: ArchiveClientOptions) {
    this.uploadUrl = buildUploadUrl(options.baseUrl, options.labels ?? {});
    this.tokens = options.tokens;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  async upload(document: SbomDocument): Promise<DeliveryResult> {
    let attempts = 0;
    let transientAttempts = 0;
    let authRetried = false;

    for (;;) {
      attempts += 1;
      const result = await this.attempt(document);

      if (result.kind === "delivered") {
        return {
          status: "delivered",
          urn: result.urn,
          alreadyPresent: result.alreadyPresent,
          attempts,
        };
      }
      if (result.kind === "fatal") {
        return { status: "failed", reason: result.reason, detail: result.detail, attempts };
      }

      if (result.kind === "unauthorized") {
        if (authRetried) {
          return { status: "failed", reason: "auth", detail: result.detail, attempts };
        }
        authRetried = true;
        if (result.token) this.tokens.invalidate(result.token);
        continue;
      }

      transientAttempts += 1;
      if (transientAttempts >= this.maxAttempts) {
        return { status: "failed", reason: "transient", detail: result.detail, attempts };
      }
      const delayMs = this.backoffMs(transientAttempts);
      this.onRetry?.({
        releaseId: document.releaseId,
        attempt: transientAttempts,
        delayMs,
        detail: result.detail,
      });
      await this.sleep(delayMs);
    }
  }

  private async attempt(document: SbomDocument): Promise<AttemptResult> {
    let token: string | null;
    try {
      token = await this.tokens.getToken();
    } catch (err) {
      return classifyTokenFailure(err);
    }

    const headers: Record<string, string> = { "content-type": "application/json" };
    if (token) headers.authorization = `Bearer ${token}`;

    let response: Response;
    try {
      response = await this.fetchImpl(this.uploadUrl, {
        method: "POST",
        headers,
        body: document.content,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      return { kind: "transient", detail: describeNetworkError(err) };
    }

    const status = response.status;
    if (response.ok) {
      return { kind: "delivered", urn: await readUrn(response), alreadyPresent: false };
    }

    const detail = `Archive responded with status ${status}${await readErrorBody(response)}`;
    if (status === 409) {
      return { kind: "delivered", alreadyPresent: true };
    }
    if (status === 401 || status === 403) {
      return { kind: "unauthorized", token, detail };
    }
    if (RETRIABLE_STATUS_CODES.has(status) || status >= 500) {
      return { kind: "transient", detail };
    }
    return { kind: "fatal", reason: "non-retryable", detail };
  }

  // Full jitter: uniform in [0, min(cap, base * 2^(n-1))).
  private backoffMs(retry: number): number {
    const ceiling = Math.min(BACKOFF_CAP_MS, BACKOFF_BASE_MS * 2 ** (retry - 1));
    return Math.floor(this.random() * ceiling);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function buildUploadUrl(baseUrl: string, labels: Record<string, string>): URL {
  const url = new URL(UPLOAD_PATH, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(labels).sort(([a], [b]) => a.localeCompare(b))) {
    url.searchParams.set(`labels.${key}`, value);
  }
  return url;
}

function classifyTokenFailure(error: unknown): AttemptResult {
  const detail = error instanceof Error ? error.message : String(error);
  const status = error instanceof TokenRequestError ? error.status : undefined;
  if (status !== undefined && status >= 400 && status < 500) {
    return { kind: "fatal", reason: "auth", detail };
  }
  return { kind: "transient", detail };
}

async function readUrn(response: Response): Promise<string | undefined> {
  const body: unknown = await response.json().catch(() => null);
  if (body && typeof body === "object" && "id" in body && typeof body.id === "string" && body.id) {
    return `urn:uuid:${body.id}`;
  }
  return undefined;
}

async function readErrorBody(response: Response): Promise<string> {
  const text = (await response.text().catch(() => "")).trim();
  return text ? `: ${text.slice(0, 500)}` : "";
}

function describeNetworkError(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return `Archive request timed out: ${error.message}`;
    }
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return `Archive request failed: ${error.message}${cause}`;
  }
  return `Archive request failed: ${String(error)}`;
}
