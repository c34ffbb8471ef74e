/*
Purpose: resolve CLI flags and environment variables into one frozen RegenerationRequest.
Assumptions: secrets only come from the environment; flags carry everything else.
Usage: resolveRegenerationRequest(rawInput, process.env) once at startup.
*/

import path from "node:path";

import { z, type ZodIssue } from "zod";

import { ConfigError } from "./errors.js";
import { ReleaseKindSchema, type ReleaseId, type ReleaseKind } from "./release.js";

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_TPA_ATTEMPTS = 5;
export const DEFAULT_TPA_TIMEOUT_MS = 30_000;
export const DEFAULT_LEDGER_PREFIX = "retry-ledger/";
export const DEFAULT_S3_REGION = "us-east-1";

export const ENV = {
  tokenUrl: "SBOM_REGEN_TPA_SSO_TOKEN_URL",
  clientId: "SBOM_REGEN_TPA_SSO_ACCOUNT",
  clientSecret: "SBOM_REGEN_TPA_SSO_TOKEN",
  authDisable: "SBOM_REGEN_TPA_AUTH_DISABLE",
  producerCommand: "SBOM_REGEN_PRODUCER_COMMAND",
} as const;

// =============================================================================
// TYPES
// =============================================================================

export type ReleaseSelection =
  | { mode: "explicit-list"; releaseIds: ReleaseId[] }
  | { mode: "outage-window"; since: Date; until: Date }
  | { mode: "release-id"; releaseIds: ReleaseId[] };

export type SelectionMode = ReleaseSelection["mode"];

export type OidcCredentials = {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
};

export type ArchiveSettings = {
  baseUrl: string;
  auth: OidcCredentials | null;
  maxAttempts: number;
  timeoutMs: number;
  labels: Record<string, string>;
};

export type StorageSettings = {
  bucket: string;
  endpoint?: string;
  region: string;
  credentials?: { accessKeyId: string; secretAccessKey: string; sessionToken?: string };
  ledgerPrefix: string;
};

export type RegenerationRequest = Readonly<{
  kind: ReleaseKind;
  selection: ReleaseSelection;
  archive: ArchiveSettings;
  storage: StorageSettings;
  producerCommand: string[];
  outputDir: string;
  reportPath: string;
  concurrency: number;
  dryRun: boolean;
}>;

// =============================================================================
// RAW INPUT SCHEMA
// =============================================================================

const isoTimestamp = z
  .string()
  .trim()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Expected an ISO-8601 timestamp" })
  .transform((value) => new Date(value));

const releaseIdList = z.array(z.string().trim().min(1)).min(1, {
  message: "At least one release id is required",
});

const SelectionSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("explicit-list"), releaseIds: releaseIdList }),
  z.object({ mode: z.literal("outage-window"), since: isoTimestamp, until: isoTimestamp }),
  z.object({ mode: z.literal("release-id"), releaseIds: releaseIdList }),
]);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const RawRequestSchema = z
  .object({
    kind: ReleaseKindSchema,
    selection: SelectionSchema,
    tpaBaseUrl: z.string().url(),
    s3BucketUrl: z.string().url(),
    producerCommand: z.string().trim().min(1).optional(),
    outputDir: z.string().trim().min(1),
    reportPath: z.string().trim().min(1).optional(),
    concurrency: positiveInt(DEFAULT_CONCURRENCY),
    tpaRetries: positiveInt(DEFAULT_TPA_ATTEMPTS),
    tpaTimeoutMs: positiveInt(DEFAULT_TPA_TIMEOUT_MS),
    ledgerPrefix: z.string().trim().min(1).default(DEFAULT_LEDGER_PREFIX),
    labels: z.array(z.string()).default([]),
    dryRun: z.boolean().default(false),
  })
  .strict()
  .superRefine((value, ctx) => {
    const { selection } = value;
    if (selection.mode === "outage-window" && selection.since.getTime() >= selection.until.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "--since must be earlier than --until",
        path: ["selection", "since"],
      });
    }
  });

export type RawRequestInput = z.input<typeof RawRequestSchema>;

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveRegenerationRequest(
  input: RawRequestInput,
  env: NodeJS.ProcessEnv = process.env,
): RegenerationRequest {
  const parsed = RawRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid regeneration arguments:\n${formatConfigIssues(parsed.error.issues).join("\n")}`,
      parsed.error,
    );
  }

  const raw = parsed.data;
  const producerCommand = splitCommand(raw.producerCommand ?? env[ENV.producerCommand] ?? "");
  if (producerCommand.length === 0) {
    throw new ConfigError(
      `A producer command is required. Pass --producer-command or set ${ENV.producerCommand}.`,
    );
  }

  const outputDir = path.resolve(raw.outputDir);
  const request: RegenerationRequest = {
    kind: raw.kind,
    selection: raw.selection,
    archive: {
      baseUrl: raw.tpaBaseUrl,
      auth: resolveOidcCredentials(env),
      maxAttempts: raw.tpaRetries,
      timeoutMs: raw.tpaTimeoutMs,
      labels: parseLabels(raw.labels),
    },
    storage: {
      ...parseS3BucketUrl(raw.s3BucketUrl),
      region: env.AWS_REGION?.trim() || DEFAULT_S3_REGION,
      credentials: resolveAwsCredentials(env),
      ledgerPrefix: raw.ledgerPrefix.endsWith("/") ? raw.ledgerPrefix : `${raw.ledgerPrefix}/`,
    },
    producerCommand,
    outputDir,
    reportPath: path.resolve(raw.reportPath ?? path.join(outputDir, `${raw.kind}_report.json`)),
    concurrency: raw.concurrency,
    dryRun: raw.dryRun,
  };

  return Object.freeze(request);
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

/**
 * Split `https://<bucket>.s3.<region>.amazonaws.com` into bucket and endpoint.
 * `s3://<bucket>` selects the default AWS endpoint.
 */
export function parseS3BucketUrl(url: string): { bucket: string; endpoint?: string } {
  if (url.startsWith("s3://")) {
    const bucket = url.slice("s3://".length).replace(/\/+$/, "");
    if (!bucket) throw new ConfigError(`Bucket name missing from S3 URL: ${url}`);
    return { bucket };
  }

  const match = /\/\/(.+?)\.s3/.exec(url);
  if (!match) {
    throw new ConfigError(
      `Could not determine the bucket name from ${url}. Expected https://<bucket>.s3.<region>.amazonaws.com.`,
    );
  }

  const bucket = match[1];
  return { bucket, endpoint: url.replace(`${bucket}.`, "") };
}

export function parseLabels(entries: string[]): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    const key = separator > 0 ? entry.slice(0, separator).trim() : "";
    if (!key) {
      throw new ConfigError(`Invalid label "${entry}". Expected key=value.`);
    }
    labels[key] = entry.slice(separator + 1).trim();
  }
  return labels;
}

export function splitCommand(command: string): string[] {
  return command
    .trim()
    .split(/\s+/)
    .filter((part) => part.length > 0);
}

function resolveOidcCredentials(env: NodeJS.ProcessEnv): OidcCredentials | null {
  if ((env[ENV.authDisable] ?? "false").trim().toLowerCase() === "true") {
    return null;
  }

  const tokenUrl = env[ENV.tokenUrl]?.trim();
  const clientId = env[ENV.clientId]?.trim();
  const clientSecret = env[ENV.clientSecret]?.trim();
  const missing = [
    tokenUrl ? null : ENV.tokenUrl,
    clientId ? null : ENV.clientId,
    clientSecret ? null : ENV.clientSecret,
  ].filter((name): name is NonNullable<typeof name> => name !== null);

  if (!tokenUrl || !clientId || !clientSecret) {
    throw new ConfigError(
      `Missing archive credentials: ${missing.join(", ")}. Set ${ENV.authDisable}=true to upload without authentication.`,
    );
  }

  return { tokenUrl, clientId, clientSecret };
}

function resolveAwsCredentials(env: NodeJS.ProcessEnv): StorageSettings["credentials"] {
  const accessKeyId = env.AWS_ACCESS_KEY_ID?.trim();
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY?.trim();
  if (!accessKeyId || !secretAccessKey) {
    return undefined;
  }

  const sessionToken = env.AWS_SESSION_TOKEN?.trim();
  return sessionToken ? { accessKeyId, secretAccessKey, sessionToken } : { accessKeyId, secretAccessKey };
}
