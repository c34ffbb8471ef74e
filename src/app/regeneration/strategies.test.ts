import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ConfigError } from "../../core/errors.js";
import type { JsonObject } from "../../core/logger.js";

import { FakeClock, FakeReleaseSource, FakeRetryLedger } from "./__tests__/fakes.js";
import {
  createRegenerationStrategy,
  parseReleaseIdList,
  readReleaseIdFile,
  type PopulateContext,
} from "./strategies.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function createPopulateContext(): {
  ctx: PopulateContext;
  source: FakeReleaseSource;
  ledger: FakeRetryLedger;
  events: Array<{ type: string; payload?: JsonObject }>;
} {
  const source = new FakeReleaseSource();
  const ledger = new FakeRetryLedger(new FakeClock());
  const events: Array<{ type: string; payload?: JsonObject }> = [];
  const ctx: PopulateContext = {
    kind: "component",
    source,
    ledger,
    log: (type, payload) => events.push({ type, payload }),
  };
  return { ctx, source, ledger, events };
}

describe("explicit-list strategy", () => {
  it("deduplicates ids without consulting the source", async () => {
    const { ctx, source } = createPopulateContext();
    const strategy = createRegenerationStrategy({
      mode: "explicit-list",
      releaseIds: ["r2", " r1 ", "r2"],
    });

    const { group, unavailable } = await strategy.populate(ctx);

    expect(Array.from(group)).toEqual(["r2", "r1"]);
    expect(unavailable.size).toBe(0);
    expect(source.calls).toEqual([]);
  });

  it("rejects a list with only blank ids", async () => {
    const { ctx } = createPopulateContext();
    const strategy = createRegenerationStrategy({ mode: "explicit-list", releaseIds: ["  "] });

    await expect(strategy.populate(ctx)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("outage-window strategy", () => {
  it("unions window releases with same-kind ledger failures", async () => {
    const { ctx, source, ledger, events } = createPopulateContext();
    source
      .add("a", "component", "2024-02-01T00:00:00.000Z")
      .add("x", "product", "2024-02-01T00:00:00.000Z");
    for (const [id, kind] of [["a", "component"], ["b", "component"], ["y", "product"]] as const) {
      ledger.seed({
        release_id: id,
        kind,
        first_failed_at: "2024-02-01T05:00:00.000Z",
        last_attempt_at: "2024-02-01T05:00:00.000Z",
        attempt_count: 1,
      });
    }
    const strategy = createRegenerationStrategy({
      mode: "outage-window",
      since: new Date("2024-02-01T00:00:00.000Z"),
      until: new Date("2024-02-01T12:00:00.000Z"),
    });

    const { group } = await strategy.populate(ctx);

    expect(Array.from(group).sort()).toEqual(["a", "b"]);
    expect(events).toEqual([
      {
        type: "strategy.populated",
        payload: {
          mode: "outage-window",
          since: "2024-02-01T00:00:00.000Z",
          until: "2024-02-01T12:00:00.000Z",
          from_source: 1,
          from_ledger: 2,
          candidates: 2,
        },
      },
    ]);
  });

  it("refuses an empty window", async () => {
    const { ctx } = createPopulateContext();
    const at = new Date("2024-02-01T00:00:00.000Z");
    const strategy = createRegenerationStrategy({ mode: "outage-window", since: at, until: at });

    await expect(strategy.populate(ctx)).rejects.toThrow("is not before its end");
  });
});

describe("release-id strategy", () => {
  it("marks ids unknown to the source as unavailable", async () => {
    const { ctx, source } = createPopulateContext();
    source
      .add("r1", "component", "2024-01-01T00:00:00.000Z")
      .add("p1", "product", "2024-01-01T00:00:00.000Z");
    const strategy = createRegenerationStrategy({
      mode: "release-id",
      releaseIds: ["r1", "p1", "zz"],
    });

    const { group, unavailable } = await strategy.populate(ctx);

    expect(Array.from(group)).toEqual(["r1", "p1", "zz"]);
    expect(Array.from(unavailable)).toEqual(["p1", "zz"]);
  });
});

describe("parseReleaseIdList", () => {
  it("strips whitespace and quotes and skips blank lines", () => {
    expect(parseReleaseIdList(' r1 \n"r2"\r\n\n\'r3\'\n')).toEqual(["r1", "r2", "r3"]);
  });
});

describe("readReleaseIdFile", () => {
  it("reads ids from disk", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "regen-ids-"));
    tempDirs.push(dir);
    const file = path.join(dir, "ids.txt");
    fs.writeFileSync(file, "r1\nr2\n");

    await expect(readReleaseIdFile(file)).resolves.toEqual(["r1", "r2"]);
  });

  it("raises a configuration error for a missing file", async () => {
    await expect(readReleaseIdFile("/nonexistent/ids.txt")).rejects.toThrow(
      "Cannot read release id file /nonexistent/ids.txt",
    );
  });
});
