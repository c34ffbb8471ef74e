/*
Purpose: collect exactly one outcome per release and publish the run report atomically.
Assumptions: the report is written once, after the pool has joined.
Usage: const report = aggregator.build(metadata, candidates); await writeReport(path, report).
*/

import path from "node:path";

import fse from "fs-extra";

import type { OutcomeStatus, UploadOutcome } from "../core/outcome.js";
import type { ReleaseId, ReleaseKind } from "../core/release.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportMetadata = {
  mode: string;
  kind: ReleaseKind;
  since?: string;
  until?: string;
  dry_run: boolean;
  cancelled: boolean;
};

export type ReportTotals = {
  candidates: number;
  delivered: number;
  failed: number;
  skipped: number;
};

export type ReportOutcomeEntry = {
  release_id: ReleaseId;
  status: OutcomeStatus;
  reason?: string;
  detail?: string;
  urn?: string;
  already_present?: boolean;
  attempt_count?: number | null;
};

export type ReportSummary = {
  metadata: ReportMetadata;
  totals: ReportTotals;
  outcomes: ReportOutcomeEntry[];
};

export type RegenerationReport = {
  [K in ReleaseKind as `${K}_report`]?: ReportSummary;
};

// =============================================================================
// AGGREGATOR
// =============================================================================

export class ReportAggregator {
  private readonly outcomes = new Map<ReleaseId, UploadOutcome>();

  record(outcome: UploadOutcome): void {
    if (this.outcomes.has(outcome.releaseId)) {
      throw new Error(`Outcome for release ${outcome.releaseId} was already recorded`);
    }
    this.outcomes.set(outcome.releaseId, outcome);
  }

  get size(): number {
    return this.outcomes.size;
  }

  build(metadata: ReportMetadata, candidates: number): RegenerationReport {
    const entries = Array.from(this.outcomes.values())
      .sort((a, b) => compareCodeUnits(a.releaseId, b.releaseId))
      .map(toEntry);

    const summary: ReportSummary = {
      metadata,
      totals: {
        candidates,
        delivered: entries.filter((entry) => entry.status === "delivered").length,
        failed: entries.filter((entry) => entry.status === "failed").length,
        skipped: entries.filter((entry) => entry.status === "skipped").length,
      },
      outcomes: entries,
    };

    return metadata.kind === "component" ? { component_report: summary } : { product_report: summary };
  }
}

function toEntry(outcome: UploadOutcome): ReportOutcomeEntry {
  switch (outcome.status) {
    case "delivered":
      return {
        release_id: outcome.releaseId,
        status: outcome.status,
        urn: outcome.urn,
        already_present: outcome.alreadyPresent,
      };
    case "failed":
      return {
        release_id: outcome.releaseId,
        status: outcome.status,
        reason: outcome.reason,
        detail: outcome.detail,
        attempt_count: outcome.attemptCount,
      };
    case "skipped":
      return { release_id: outcome.releaseId, status: outcome.status, reason: outcome.reason };
  }
}

// =============================================================================
// SERIALIZATION
// =============================================================================

/** Same report in, same bytes out: keys sorted at every depth, 2-space indent, trailing newline. */
export function serializeReport(report: RegenerationReport): string {
  return `${JSON.stringify(report, sortObjectKeys, 2)}\n`;
}

export async function writeReport(reportPath: string, report: RegenerationReport): Promise<void> {
  const target = path.resolve(reportPath);
  const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  await fse.ensureDir(path.dirname(target));
  try {
    await fse.writeFile(tempPath, serializeReport(report), "utf8");
    await fse.rename(tempPath, target);
  } catch (err) {
    await fse.remove(tempPath);
    throw err;
  }
}

function sortObjectKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => compareCodeUnits(a, b)));
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
