import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { Command } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { RegenerationRunResult } from "../app/regeneration/pipeline.js";
import type { RunContext } from "../app/regeneration/run-context.js";
import type { RegenerationRequest } from "../core/config.js";
import type { ReportSummary } from "../report/report.js";

import { registerRegenerateCommands } from "./regenerate.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  process.exitCode = undefined;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "regen-cli-"));
  tempDirs.push(dir);
  return dir;
}

const ENV = { SBOM_REGEN_TPA_AUTH_DISABLE: "true" };

const BASE_ARGS = [
  "--tpa-base-url",
  "https://tpa.example.test",
  "--s3-bucket-url",
  "https://release-bucket.s3.us-east-1.amazonaws.com",
  "--producer-command",
  "sbom-generate --output {output}",
];

function createCli(options: { cancelled?: boolean; ledgerWriteFailed?: boolean } = {}): {
  program: Command;
  requests: RegenerationRequest[];
  printed: string[];
  errors: string[];
  outputDirExistedDuringRun: boolean[];
} {
  const requests: RegenerationRequest[] = [];
  const printed: string[] = [];
  const errors: string[] = [];
  const outputDirExistedDuringRun: boolean[] = [];

  const run = vi.fn(async (ctx: RunContext): Promise<RegenerationRunResult> => {
    requests.push(ctx.request);
    outputDirExistedDuringRun.push(fs.existsSync(ctx.request.outputDir));
    const summary: ReportSummary = {
      metadata: {
        mode: ctx.request.selection.mode,
        kind: ctx.request.kind,
        dry_run: ctx.request.dryRun,
        cancelled: options.cancelled ?? false,
      },
      totals: { candidates: 2, delivered: 1, failed: 1, skipped: 0 },
      outcomes: [
        { release_id: "r1", status: "delivered", urn: "urn:uuid:r1", already_present: false },
        {
          release_id: "r2",
          status: "failed",
          reason: "transient",
          detail: "Archive responded with status 503: busy",
          attempt_count: options.ledgerWriteFailed ? null : 1,
        },
      ],
    };
    return {
      runId: "run-1",
      state: "completed",
      report:
        ctx.request.kind === "component" ? { component_report: summary } : { product_report: summary },
      reportPath: ctx.request.reportPath,
      candidates: 2,
      cancelled: options.cancelled ?? false,
    };
  });

  const program = new Command();
  program.exitOverride();
  registerRegenerateCommands(program, {
    run,
    env: ENV,
    print: (line) => printed.push(line),
    errorStream: {
      isTTY: false,
      write: (chunk: string) => errors.push(chunk),
    },
    signals: new EventEmitter(),
  });

  return { program, requests, printed, errors, outputDirExistedDuringRun };
}

// =============================================================================
// TESTS
// =============================================================================

describe("regenerate commands", () => {
  it("runs an explicit list and prints the summary", async () => {
    const outputDir = makeTempDir();
    const cli = createCli();

    await cli.program.parseAsync(
      [
        "component",
        "list",
        "r1",
        "r2",
        ...BASE_ARGS,
        "--output-dir",
        outputDir,
        "--label",
        "env=prod",
      ],
      { from: "user" },
    );

    expect(cli.requests).toHaveLength(1);
    const request = cli.requests[0];
    expect(request.selection).toEqual({ mode: "explicit-list", releaseIds: ["r1", "r2"] });
    expect(request.archive.labels).toEqual({ env: "prod" });
    expect(request.archive.auth).toBeNull();
    expect(request.storage.bucket).toBe("release-bucket");
    expect(request.producerCommand).toEqual(["sbom-generate", "--output", "{output}"]);
    expect(request.reportPath).toBe(path.join(outputDir, "component_report.json"));
    expect(cli.printed).toEqual([
      "Run run-1 component explicit-list: 2 candidate(s), 1 delivered, 1 failed, 0 skipped.",
      "- r2: transient: Archive responded with status 503: busy",
      `Report: ${path.join(outputDir, "component_report.json")}`,
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("lists failures the ledger did not record with a command to re-run them", async () => {
    const outputDir = makeTempDir();
    const cli = createCli({ ledgerWriteFailed: true });

    await cli.program.parseAsync(
      ["product", "list", "r1", "r2", ...BASE_ARGS, "--output-dir", outputDir],
      { from: "user" },
    );

    expect(cli.printed).toEqual([
      "Run run-1 product explicit-list: 2 candidate(s), 1 delivered, 1 failed, 0 skipped.",
      "- r2: transient: Archive responded with status 503: busy",
      "Not recorded in the retry ledger: r2. Re-run them with: sbom-regen product list r2",
      `Report: ${path.join(outputDir, "product_report.json")}`,
    ]);
  });

  it("does not flag dry-run failures as unrecorded", async () => {
    const outputDir = makeTempDir();
    const cli = createCli({ ledgerWriteFailed: true });

    await cli.program.parseAsync(
      ["component", "list", "r1", "r2", ...BASE_ARGS, "--output-dir", outputDir, "--dry-run"],
      { from: "user" },
    );

    expect(cli.printed).toEqual([
      "Run run-1 component explicit-list (dry run): 2 candidate(s), 1 delivered, 1 failed, 0 skipped.",
      "- r2: transient: Archive responded with status 503: busy",
      `Report: ${path.join(outputDir, "component_report.json")}`,
    ]);
  });

  it("parses outage windows and numeric options", async () => {
    const cli = createCli();

    await cli.program.parseAsync(
      [
        "product",
        "outage",
        "--since",
        "2024-02-01T00:00:00Z",
        "--until",
        "2024-02-02T00:00:00Z",
        ...BASE_ARGS,
        "--output-dir",
        makeTempDir(),
        "--concurrency",
        "3",
        "--tpa-retries",
        "2",
      ],
      { from: "user" },
    );

    const request = cli.requests[0];
    expect(request.kind).toBe("product");
    expect(request.selection).toEqual({
      mode: "outage-window",
      since: new Date("2024-02-01T00:00:00.000Z"),
      until: new Date("2024-02-02T00:00:00.000Z"),
    });
    expect(request.concurrency).toBe(3);
    expect(request.archive.maxAttempts).toBe(2);
  });

  it("merges repeated release ids with an id file", async () => {
    const outputDir = makeTempDir();
    const idFile = path.join(outputDir, "ids.txt");
    fs.writeFileSync(idFile, "r2\nr3\n");
    const cli = createCli();

    await cli.program.parseAsync(
      [
        "component",
        "release",
        "--release-id",
        "r1",
        "--release-id-file",
        idFile,
        ...BASE_ARGS,
        "--output-dir",
        outputDir,
      ],
      { from: "user" },
    );

    expect(cli.requests[0].selection).toEqual({
      mode: "release-id",
      releaseIds: ["r1", "r2", "r3"],
    });
  });

  it("renders configuration errors and exits non-zero without running", async () => {
    const cli = createCli();

    await cli.program.parseAsync(
      [
        "component",
        "outage",
        "--since",
        "2024-02-02T00:00:00Z",
        "--until",
        "2024-02-01T00:00:00Z",
        ...BASE_ARGS,
        "--output-dir",
        makeTempDir(),
      ],
      { from: "user" },
    );

    expect(cli.requests).toHaveLength(0);
    expect(cli.errors[0]).toBe("Invalid regeneration arguments.\n");
    expect(cli.errors[1]).toBe(
      "Invalid regeneration arguments:\nselection.since: --since must be earlier than --until\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("uses a temporary output dir that is removed after the run", async () => {
    const cli = createCli();

    await cli.program.parseAsync(["component", "list", "r1", ...BASE_ARGS], { from: "user" });

    const request = cli.requests[0];
    expect(cli.outputDirExistedDuringRun).toEqual([true]);
    expect(fs.existsSync(request.outputDir)).toBe(false);
    expect(request.reportPath).toBe(path.resolve("component_report.json"));
  });

  it("exits non-zero when the run was cancelled", async () => {
    const cli = createCli({ cancelled: true });

    await cli.program.parseAsync(
      ["component", "list", "r1", ...BASE_ARGS, "--output-dir", makeTempDir()],
      { from: "user" },
    );

    expect(cli.errors[0]).toBe("Run cancelled.\n");
    expect(cli.errors[1]).toBe("Run run-1 stopped by request before every release was processed.\n");
    expect(process.exitCode).toBe(1);
  });
});
