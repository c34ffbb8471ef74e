import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type JsonlLoggerOptions = {
  runId?: string;
  echo?: (line: string) => void;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

/**
 * Append-only JSON Lines event log. One object per line:
 * `{ ts, type, run_id?, ...payload }`.
 */
export class JsonlLogger {
  readonly filePath: string;
  private readonly runId?: string;
  private readonly echo?: (line: string) => void;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.runId = options.runId;
    this.echo = options.echo;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const record: JsonObject = { ts: isoNow(), type: event.type };
    if (this.runId) record.run_id = this.runId;
    Object.assign(record, event.payload ?? {});

    const line = JSON.stringify(record);
    fs.appendFileSync(this.filePath, `${line}\n`, "utf8");
    this.echo?.(line);
  }
}

export function logRunEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void {
  logger.log({ type, payload });
}
