/*
Purpose: durable record of releases whose last delivery attempt failed.
Assumptions: records are keyed by release id; concurrent writers resolve last-write-wins.
Usage: await ledger.upsert(id, kind, "transient"); await ledger.remove(id).
*/

import { z } from "zod";

import { FAILURE_REASONS, type FailureReason } from "../core/outcome.js";
import { ReleaseKindSchema, type ReleaseId, type ReleaseKind } from "../core/release.js";

// =============================================================================
// SCHEMA
// =============================================================================

const IsoTimestampSchema = z.string().datetime({ offset: true });

export const RetryRecordSchema = z.object({
  release_id: z.string().min(1),
  kind: ReleaseKindSchema,
  first_failed_at: IsoTimestampSchema,
  last_attempt_at: IsoTimestampSchema,
  attempt_count: z.number().int().positive(),
  last_reason: z.enum(FAILURE_REASONS).optional(),
});

export type RetryRecord = z.infer<typeof RetryRecordSchema>;

// =============================================================================
// PORT
// =============================================================================

export interface RetryLedger {
  /** Startup probe; rejects with LedgerUnavailableError. */
  checkAvailable(): Promise<void>;
  /** Records whose `first_failed_at` lies in `[since, until)`. */
  getBetween(since: Date, until: Date): Promise<RetryRecord[]>;
  get(ids: Iterable<ReleaseId>): Promise<Map<ReleaseId, RetryRecord>>;
  /**
   * Creates the record with `attempt_count = 1`, or bumps the count and
   * `last_attempt_at` while keeping `first_failed_at`.
   */
  upsert(releaseId: ReleaseId, kind: ReleaseKind, reason: FailureReason): Promise<RetryRecord>;
  /** No-op when the record does not exist. */
  remove(releaseId: ReleaseId): Promise<void>;
}

export function nextRetryRecord(
  existing: RetryRecord | null,
  input: { releaseId: ReleaseId; kind: ReleaseKind; reason: FailureReason; now: Date },
): RetryRecord {
  const timestamp = input.now.toISOString();
  if (!existing) {
    return {
      release_id: input.releaseId,
      kind: input.kind,
      first_failed_at: timestamp,
      last_attempt_at: timestamp,
      attempt_count: 1,
      last_reason: input.reason,
    };
  }

  return {
    ...existing,
    kind: input.kind,
    last_attempt_at: timestamp,
    attempt_count: existing.attempt_count + 1,
    last_reason: input.reason,
  };
}
