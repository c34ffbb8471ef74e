/**
 * Regeneration ports.
 * Purpose: the adapters a run talks to, injected so tests can swap them for fakes.
 * Assumptions: ports are constructed once per run in the composition root.
 * Usage: buildRunContext({ request, ports: { producer: fakeProducer } }).
 */

import type { JsonObject, JsonlLogger } from "../../core/logger.js";
import type { RetryLedger } from "../../ledger/retry-ledger.js";
import type { SbomProducer } from "../../producer/sbom-producer.js";
import type { ReleaseSource } from "../../sources/release-source.js";
import type { SbomArchive } from "../../upload/archive-client.js";

export type LogSink = {
  createRunLogger: (logPath: string, runId: string) => JsonlLogger;
  logRunEvent: (logger: JsonlLogger, type: string, payload?: JsonObject) => void;
};

export type Clock = {
  now: () => Date;
  isoNow: () => string;
};

export type RegenerationPorts = {
  releaseSource: ReleaseSource;
  ledger: RetryLedger;
  producer: SbomProducer;
  archive: SbomArchive;
  logSink: LogSink;
  clock: Clock;
};
