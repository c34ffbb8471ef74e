import type { ReleaseId } from "./release.js";

export const FAILURE_REASONS = ["produce", "non-retryable", "auth", "transient"] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

export type DeliveredOutcome = {
  status: "delivered";
  releaseId: ReleaseId;
  urn?: string;
  alreadyPresent: boolean;
};

export type FailedOutcome = {
  status: "failed";
  releaseId: ReleaseId;
  reason: FailureReason;
  detail: string;
  // null when nothing was recorded: the ledger write failed, or a dry run
  attemptCount: number | null;
};

export type SkippedOutcome = {
  status: "skipped";
  releaseId: ReleaseId;
  reason: string;
};

export type UploadOutcome = DeliveredOutcome | FailedOutcome | SkippedOutcome;

export type OutcomeStatus = UploadOutcome["status"];
