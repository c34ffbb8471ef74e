/*
Purpose: turn the run's selection into the candidate release group.
Assumptions: strategies only populate; delivery is the pipeline's job and is shared by all modes.
Usage: const { group, unavailable } = await createRegenerationStrategy(request.selection).populate(ctx).
*/

import fse from "fs-extra";

import type { ReleaseSelection } from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import type { JsonObject } from "../../core/logger.js";
import {
  createReleaseGroup,
  unionReleaseGroups,
  type ReleaseId,
  type ReleaseKind,
  type SbomReleaseGroup,
} from "../../core/release.js";
import type { RetryLedger } from "../../ledger/retry-ledger.js";
import type { ReleaseSource } from "../../sources/release-source.js";

// =============================================================================
// TYPES
// =============================================================================

export type PopulateContext = {
  kind: ReleaseKind;
  source: ReleaseSource;
  ledger: RetryLedger;
  log: (type: string, payload?: JsonObject) => void;
};

export type PopulatedGroup = {
  group: SbomReleaseGroup;
  /** Candidates the release source does not know; reported as skipped. */
  unavailable: ReadonlySet<ReleaseId>;
};

export type RegenerationStrategy = ReleaseSelection & {
  populate: (ctx: PopulateContext) => Promise<PopulatedGroup>;
};

const NONE: ReadonlySet<ReleaseId> = new Set();

// =============================================================================
// STRATEGIES
// =============================================================================

export function createRegenerationStrategy(selection: ReleaseSelection): RegenerationStrategy {
  switch (selection.mode) {
    case "explicit-list":
      return {
        ...selection,
        populate: async (ctx) => populateExplicitList(selection.releaseIds, ctx),
      };
    case "outage-window":
      return {
        ...selection,
        populate: (ctx) => populateOutageWindow(selection.since, selection.until, ctx),
      };
    case "release-id":
      return { ...selection, populate: (ctx) => populateReleaseIds(selection.releaseIds, ctx) };
  }
}

function populateExplicitList(ids: ReleaseId[], ctx: PopulateContext): PopulatedGroup {
  const group = createReleaseGroup(ids);
  if (group.size === 0) {
    throw new ConfigError("The explicit release list is empty.");
  }
  ctx.log("strategy.populated", { mode: "explicit-list", candidates: group.size });
  return { group, unavailable: NONE };
}

async function populateOutageWindow(
  since: Date,
  until: Date,
  ctx: PopulateContext,
): Promise<PopulatedGroup> {
  if (since.getTime() >= until.getTime()) {
    throw new ConfigError(
      `Outage window start ${since.toISOString()} is not before its end ${until.toISOString()}.`,
    );
  }

  const created = await ctx.source.getReleaseIdsBetween(ctx.kind, since, until);
  const failed = (await ctx.ledger.getBetween(since, until))
    .filter((record) => record.kind === ctx.kind)
    .map((record) => record.release_id);

  const group = unionReleaseGroups(created, failed);
  ctx.log("strategy.populated", {
    mode: "outage-window",
    since: since.toISOString(),
    until: until.toISOString(),
    from_source: created.size,
    from_ledger: failed.length,
    candidates: group.size,
  });
  return { group, unavailable: NONE };
}

async function populateReleaseIds(ids: ReleaseId[], ctx: PopulateContext): Promise<PopulatedGroup> {
  const group = createReleaseGroup(ids);
  const known = await ctx.source.getReleaseIds(ctx.kind, group);
  const unavailable = new Set(Array.from(group).filter((id) => !known.has(id)));

  const prior = await ctx.ledger.get(group);
  for (const record of prior.values()) {
    ctx.log("strategy.prior_failure", {
      release_id: record.release_id,
      attempt_count: record.attempt_count,
      first_failed_at: record.first_failed_at,
    });
  }

  ctx.log("strategy.populated", {
    mode: "release-id",
    candidates: group.size,
    not_found: unavailable.size,
    previously_failed: prior.size,
  });
  return { group, unavailable };
}

// =============================================================================
// RELEASE ID FILES
// =============================================================================

/** One id per line; surrounding whitespace and quotes are stripped, blank lines skipped. */
export function parseReleaseIdList(text: string): ReleaseId[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/^["']+|["']+$/g, "").trim())
    .filter((line) => line.length > 0);
}

export async function readReleaseIdFile(filePath: string): Promise<ReleaseId[]> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read release id file ${filePath}`, err);
  }
  return parseReleaseIdList(text);
}
