/*
Purpose: turn run-fatal errors into operator-facing lines, optionally styled for a TTY.
Assumptions: debug mode may include error names, causes and stack traces.
Usage: renderError(err, { mode: "debug", stream: process.stderr }).
*/

import {
  USER_FACING_ERROR_CODES,
  UserFacingError,
  toUserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type OutputStream = { isTTY?: boolean; write: (chunk: string) => unknown };

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

const LINE_STYLES: Record<ErrorFormatLineKind, { label?: string; styles: AnsiStyle[] }> = {
  title: { styles: ["bold", "red"] },
  message: { styles: [] },
  hint: { label: "Hint: ", styles: ["yellow"] },
  next: { label: "Next: ", styles: ["cyan"] },
  code: { label: "Code: ", styles: ["dim"] },
  cause: { label: "Cause: ", styles: ["dim"] },
  stack: { styles: ["dim"] },
};

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if (options.mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    const stack = resolveStack(error, normalized.cause);
    if (stack) lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderError(
  error: unknown,
  options: { mode?: ErrorFormatMode; stream?: OutputStream } = {},
): void {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(Boolean(stream.isTTY));

  for (const line of formatErrorLines(error, { mode: options.mode })) {
    const style = LINE_STYLES[line.kind];
    stream.write(`${format(`${style.label ?? ""}${line.text}`, style.styles)}\n`);
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    const { message } = error as { message?: unknown };
    if (typeof message === "string" && message.trim()) return message.trim();
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";

function normalizeError(error: unknown): UserFacingErrorInput {
  const mapped = toUserFacingError(error);
  if (mapped) {
    return fromUserFacing(mapped);
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: formatErrorMessage(error),
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function fromUserFacing(error: UserFacingError): UserFacingErrorInput {
  return {
    code: error.code,
    title: error.title.trim() || DEFAULT_ERROR_TITLE,
    message: error.message.trim() || error.title,
    hint: error.hint?.trim() || undefined,
    next: error.next?.trim() || undefined,
    cause: error.cause,
  };
}

function resolveStack(error: unknown, cause: unknown): string | undefined {
  if (cause instanceof Error && cause.stack) return cause.stack;
  if (error instanceof Error && error.stack) return error.stack;
  return undefined;
}
