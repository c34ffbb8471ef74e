/**
 * RunContext + composition root for regeneration runs.
 * Purpose: centralize the resolved request and injected ports to avoid module singletons.
 * Assumptions: ports are thin adapters over the storage, producer and upload modules.
 * Usage: buildRunContext({ request, signal }) and pass the context to runRegeneration.
 */

import path from "node:path";

import type { RegenerationRequest } from "../../core/config.js";
import { JsonlLogger, logRunEvent } from "../../core/logger.js";
import { defaultRunId, isoNow } from "../../core/utils.js";
import { S3RetryLedger } from "../../ledger/s3-retry-ledger.js";
import { CommandSbomProducer } from "../../producer/command-sbom-producer.js";
import { S3ReleaseSource } from "../../sources/release-source.js";
import { S3ObjectBucket, createS3Client, type ObjectBucket } from "../../storage/object-bucket.js";
import { ArchiveClient } from "../../upload/archive-client.js";
import { OidcTokenProvider, noAuthentication } from "../../upload/oidc-token-provider.js";

import type { Clock, LogSink, RegenerationPorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunContext = {
  request: RegenerationRequest;
  runId: string;
  ports: RegenerationPorts;
  logger: JsonlLogger;
  signal?: AbortSignal;
};

export type BuildRunContextInput = {
  request: RegenerationRequest;
  runId?: string;
  signal?: AbortSignal;
  echo?: (line: string) => void;
  ports?: Partial<RegenerationPorts>;
};

export function runLogPath(outputDir: string, runId: string): string {
  return path.join(outputDir, "logs", `regenerate-${runId}.jsonl`);
}

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createJsonlLogSink(echo?: (line: string) => void): LogSink {
  return {
    createRunLogger: (logPath, runId) => new JsonlLogger(logPath, { runId, echo }),
    logRunEvent,
  };
}

export const systemClock: Clock = {
  now: () => new Date(),
  isoNow,
};

export type DefaultPortsInput = {
  logger: JsonlLogger;
  logSink: LogSink;
  clock: Clock;
  bucket?: ObjectBucket;
};

export function createDefaultPorts(
  request: RegenerationRequest,
  input: DefaultPortsInput,
): RegenerationPorts {
  const bucket =
    input.bucket ?? new S3ObjectBucket(createS3Client(request.storage), request.storage.bucket);
  const { archive } = request;
  const { clock, logger, logSink } = input;

  return {
    releaseSource: new S3ReleaseSource(bucket),
    ledger: new S3RetryLedger(bucket, {
      prefix: request.storage.ledgerPrefix,
      now: () => clock.now(),
      onInvalidRecord: (key, reason) =>
        logSink.logRunEvent(logger, "ledger.record_invalid", { key, reason }),
    }),
    producer: new CommandSbomProducer({
      bucket,
      command: request.producerCommand,
      outputDir: request.outputDir,
    }),
    archive: new ArchiveClient({
      baseUrl: archive.baseUrl,
      tokens: archive.auth
        ? new OidcTokenProvider(archive.auth, { timeoutMs: archive.timeoutMs })
        : noAuthentication,
      maxAttempts: archive.maxAttempts,
      timeoutMs: archive.timeoutMs,
      labels: archive.labels,
      onRetry: (event) =>
        logSink.logRunEvent(logger, "upload.retry", {
          release_id: event.releaseId,
          attempt: event.attempt,
          delay_ms: event.delayMs,
          detail: event.detail,
        }),
    }),
    logSink,
    clock,
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildRunContext(input: BuildRunContextInput): RunContext {
  const runId = input.runId ?? defaultRunId();
  const logSink = input.ports?.logSink ?? createJsonlLogSink(input.echo);
  const clock = input.ports?.clock ?? systemClock;
  const logger = logSink.createRunLogger(runLogPath(input.request.outputDir, runId), runId);

  const ports: RegenerationPorts = {
    ...createDefaultPorts(input.request, { logger, logSink, clock }),
    ...input.ports,
  };

  return {
    request: input.request,
    runId,
    ports,
    logger,
    signal: input.signal,
  };
}
