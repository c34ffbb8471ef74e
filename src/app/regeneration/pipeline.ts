/**
 * Regeneration pipeline.
 * Purpose: drive one run from candidate population to the published report.
 * Assumptions: per-release failures become outcomes; only source, ledger and config failures end the run.
 * Usage: const result = await runRegeneration(buildRunContext({ request, signal })).
 */

import { runBoundedPool } from "../../core/bounded-pool.js";
import type { JsonObject } from "../../core/logger.js";
import type { FailedOutcome, FailureReason, UploadOutcome } from "../../core/outcome.js";
import type { ReleaseId } from "../../core/release.js";
import type { SbomDocument } from "../../producer/sbom-producer.js";
import {
  ReportAggregator,
  writeReport,
  type RegenerationReport,
  type ReportMetadata,
} from "../../report/report.js";

import type { RunContext } from "./run-context.js";
import { createRegenerationStrategy } from "./strategies.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunState = "uninitialized" | "populated" | "processing" | "completed";

export type RegenerationRunResult = {
  runId: string;
  state: RunState;
  report: RegenerationReport;
  reportPath: string;
  candidates: number;
  cancelled: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runRegeneration(ctx: RunContext): Promise<RegenerationRunResult> {
  const { request, ports } = ctx;
  const log = (type: string, payload?: JsonObject): void =>
    ports.logSink.logRunEvent(ctx.logger, type, payload);

  let state: RunState = "uninitialized";
  const strategy = createRegenerationStrategy(request.selection);

  log("run.start", {
    mode: strategy.mode,
    kind: request.kind,
    concurrency: request.concurrency,
    dry_run: request.dryRun,
  });

  await ports.ledger.checkAvailable();

  const { group, unavailable } = await strategy.populate({
    kind: request.kind,
    source: ports.releaseSource,
    ledger: ports.ledger,
    log,
  });
  state = "populated";

  const aggregator = new ReportAggregator();
  let cancelled = false;

  if (group.size === 0) {
    log("run.empty", { mode: strategy.mode });
  } else {
    state = "processing";

    for (const releaseId of sortIds(unavailable)) {
      aggregator.record({ status: "skipped", releaseId, reason: "not-found" });
      log("release.skipped", { release_id: releaseId, reason: "not-found" });
    }

    const pending = sortIds(group).filter((id) => !unavailable.has(id));
    const pool = await runBoundedPool(
      pending,
      { concurrency: request.concurrency, signal: ctx.signal },
      async (releaseId) => {
        aggregator.record(await processRelease(ctx, releaseId, log));
      },
    );

    cancelled = pool.abandoned > 0 || Boolean(ctx.signal?.aborted);
    if (cancelled) {
      log("run.cancelled", { started: pool.started, abandoned: pool.abandoned });
    }
  }

  const metadata: ReportMetadata = {
    mode: strategy.mode,
    kind: request.kind,
    since: strategy.mode === "outage-window" ? strategy.since.toISOString() : undefined,
    until: strategy.mode === "outage-window" ? strategy.until.toISOString() : undefined,
    dry_run: request.dryRun,
    cancelled,
  };
  const report = aggregator.build(metadata, group.size);
  await writeReport(request.reportPath, report);
  state = "completed";

  log("run.complete", {
    candidates: group.size,
    recorded: aggregator.size,
    cancelled,
    report_path: request.reportPath,
  });

  return {
    runId: ctx.runId,
    state,
    report,
    reportPath: request.reportPath,
    candidates: group.size,
    cancelled,
  };
}

// =============================================================================
// PER-RELEASE UNIT
// =============================================================================

async function processRelease(
  ctx: RunContext,
  releaseId: ReleaseId,
  log: (type: string, payload?: JsonObject) => void,
): Promise<UploadOutcome> {
  const { request, ports } = ctx;

  let document: SbomDocument;
  try {
    document = await ports.producer.produce({ id: releaseId, kind: request.kind });
  } catch (err) {
    return recordFailure(ctx, releaseId, "produce", errorMessage(err), log);
  }
  log("release.produced", { release_id: releaseId, bytes: document.content.length });

  if (request.dryRun) {
    log("release.skipped", { release_id: releaseId, reason: "dry-run" });
    return { status: "skipped", releaseId, reason: "dry-run" };
  }

  const delivery = await ports.archive.upload(document);
  if (delivery.status === "failed") {
    return recordFailure(ctx, releaseId, delivery.reason, delivery.detail, log);
  }

  try {
    await ports.ledger.remove(releaseId);
  } catch (err) {
    log("ledger.remove_failed", { release_id: releaseId, error: errorMessage(err) });
  }

  log("release.delivered", {
    release_id: releaseId,
    urn: delivery.urn ?? null,
    already_present: delivery.alreadyPresent,
    attempts: delivery.attempts,
  });
  return {
    status: "delivered",
    releaseId,
    urn: delivery.urn,
    alreadyPresent: delivery.alreadyPresent,
  };
}

async function recordFailure(
  ctx: RunContext,
  releaseId: ReleaseId,
  reason: FailureReason,
  detail: string,
  log: (type: string, payload?: JsonObject) => void,
): Promise<FailedOutcome> {
  let attemptCount: number | null = null;
  if (ctx.request.dryRun) {
    log("release.failed", { release_id: releaseId, reason, detail, attempt_count: null });
    return { status: "failed", releaseId, reason, detail, attemptCount };
  }

  try {
    const record = await ctx.ports.ledger.upsert(releaseId, ctx.request.kind, reason);
    attemptCount = record.attempt_count;
    log("ledger.upsert", { release_id: releaseId, attempt_count: attemptCount, reason });
  } catch (err) {
    log("ledger.upsert_failed", { release_id: releaseId, error: errorMessage(err) });
  }

  log("release.failed", { release_id: releaseId, reason, detail, attempt_count: attemptCount });
  return { status: "failed", releaseId, reason, detail, attemptCount };
}

function sortIds(ids: Iterable<ReleaseId>): ReleaseId[] {
  return Array.from(ids).sort();
}

function errorMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
  return `${error.message}${cause}`;
}
