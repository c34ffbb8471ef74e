import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import type { RegenerationRequest } from "../../core/config.js";

import { FakeClock, FakeLogSink, InMemoryObjectBucket } from "./__tests__/fakes.js";
import { createDefaultPorts } from "./run-context.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeRequest(outputDir: string): RegenerationRequest {
  return {
    kind: "product",
    selection: { mode: "explicit-list", releaseIds: ["p1"] },
    archive: {
      baseUrl: "https://tpa.example.test",
      auth: null,
      maxAttempts: 5,
      timeoutMs: 1_000,
      labels: {},
    },
    storage: { bucket: "test-bucket", region: "us-east-1", ledgerPrefix: "retry-ledger/" },
    producerCommand: ["sbom-generate", "{output}"],
    outputDir,
    reportPath: path.join(outputDir, "product_report.json"),
    concurrency: 1,
    dryRun: false,
  };
}

describe("createDefaultPorts", () => {
  it("stamps ledger records with the run clock", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "regen-context-"));
    tempDirs.push(dir);
    const clock = new FakeClock(new Date("2024-03-10T08:00:00.000Z"));
    const logSink = new FakeLogSink(path.join(dir, "logs"));
    const bucket = new InMemoryObjectBucket();

    const ports = createDefaultPorts(makeRequest(dir), {
      logger: logSink.createRunLogger(path.join(dir, "run.jsonl"), "run-1"),
      logSink,
      clock,
      bucket,
    });
    await ports.ledger.upsert("p1", "product", "transient");
    clock.advanceByMs(60_000);
    const second = await ports.ledger.upsert("p1", "product", "transient");

    expect(ports.clock).toBe(clock);
    expect(second).toMatchObject({
      first_failed_at: "2024-03-10T08:00:00.000Z",
      last_attempt_at: "2024-03-10T08:01:00.000Z",
      attempt_count: 2,
    });
  });
});
