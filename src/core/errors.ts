/*
Purpose: error types shared by the regeneration pipeline, its adapters and CLI output.
Assumptions: UserFacingError instances are safe to display to operators.
Usage: throw new ConfigError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class RegenerationError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RegenerationError";
  }
}

export class ConfigError extends RegenerationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SourceUnavailableError extends RegenerationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SourceUnavailableError";
  }
}

export class LedgerUnavailableError extends RegenerationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LedgerUnavailableError";
  }
}

export class ProducerError extends RegenerationError {
  constructor(
    public readonly releaseId: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "ProducerError";
  }
}

export class TokenRequestError extends RegenerationError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "TokenRequestError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  source: "SOURCE_UNAVAILABLE",
  ledger: "LEDGER_UNAVAILABLE",
  cancelled: "RUN_CANCELLED",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// RUN-FATAL MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError | null {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid regeneration arguments.",
      message: error.message,
      hint: "Check the selection flags and the SBOM_REGEN_* environment variables.",
      cause: error.cause ?? error,
    });
  }

  if (error instanceof SourceUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.source,
      title: "Release source unavailable.",
      message: error.message,
      hint: "The candidate releases could not be determined, so nothing was processed.",
      next: "Check the bucket URL and AWS credentials, then re-run the same command.",
      cause: error.cause ?? error,
    });
  }

  if (error instanceof LedgerUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.ledger,
      title: "Retry ledger unavailable.",
      message: error.message,
      hint: "Failed deliveries could not be recorded, so the run was not started.",
      cause: error.cause ?? error,
    });
  }

  return null;
}
