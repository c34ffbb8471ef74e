import os from "node:os";
import path from "node:path";

import { Command } from "commander";
import fse from "fs-extra";

import { runRegeneration, type RegenerationRunResult } from "../app/regeneration/pipeline.js";
import { buildRunContext } from "../app/regeneration/run-context.js";
import { readReleaseIdFile } from "../app/regeneration/strategies.js";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_LEDGER_PREFIX,
  DEFAULT_TPA_ATTEMPTS,
  DEFAULT_TPA_TIMEOUT_MS,
  resolveRegenerationRequest,
  type RawRequestInput,
} from "../core/config.js";
import { renderError, type OutputStream } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { RELEASE_KINDS, type ReleaseKind } from "../core/release.js";
import { defaultRunId } from "../core/utils.js";

import { createRunStopSignalHandler, type SignalSource } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

type CommonOptions = {
  tpaBaseUrl: string;
  s3BucketUrl: string;
  producerCommand?: string;
  outputDir?: string;
  report?: string;
  concurrency?: number;
  tpaRetries?: number;
  tpaTimeoutMs?: number;
  ledgerPrefix?: string;
  label: string[];
  dryRun: boolean;
  verbose: boolean;
  debug: boolean;
};

type OutageOptions = CommonOptions & { since: string; until: string };

type ReleaseOptions = CommonOptions & { releaseId: string[]; releaseIdFile?: string };

type RawSelection = RawRequestInput["selection"];

export type RegenerateCommandDeps = {
  run: typeof runRegeneration;
  env: NodeJS.ProcessEnv;
  print: (line: string) => void;
  errorStream: OutputStream;
  signals?: SignalSource;
};

const defaultDeps = (): RegenerateCommandDeps => ({
  run: runRegeneration,
  env: process.env,
  print: (line) => console.log(line),
  errorStream: process.stderr,
});

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerRegenerateCommands(
  program: Command,
  overrides: Partial<RegenerateCommandDeps> = {},
): void {
  const deps: RegenerateCommandDeps = { ...defaultDeps(), ...overrides };

  for (const kind of RELEASE_KINDS) {
    const kindCommand = program
      .command(kind)
      .description(`Regenerate and re-deliver ${kind} SBOMs`);

    withCommonOptions(
      kindCommand
        .command("list")
        .description(`Process exactly the given ${kind} release ids`)
        .argument("<ids...>", "Release ids"),
    ).action(async (ids: string[], _opts: unknown, command: Command) => {
      const opts = command.opts<CommonOptions>();
      await executeRegeneration(
        kind,
        async () => ({ mode: "explicit-list", releaseIds: ids }),
        opts,
        deps,
      );
    });

    withCommonOptions(
      kindCommand
        .command("outage")
        .description(`Process ${kind} releases created or failed inside an outage window`)
        .requiredOption("--since <iso>", "Window start (inclusive), ISO-8601")
        .requiredOption("--until <iso>", "Window end (exclusive), ISO-8601"),
    ).action(async (_opts: unknown, command: Command) => {
      const opts = command.opts<OutageOptions>();
      await executeRegeneration(
        kind,
        async () => ({ mode: "outage-window", since: opts.since, until: opts.until }),
        opts,
        deps,
      );
    });

    withCommonOptions(
      kindCommand
        .command("release")
        .description(`Process ${kind} releases by id, skipping ids the release index does not know`)
        .option("--release-id <id>", "Release id (repeatable)", collect, [])
        .option("--release-id-file <path>", "File with one release id per line"),
    ).action(async (_opts: unknown, command: Command) => {
      const opts = command.opts<ReleaseOptions>();
      await executeRegeneration(
        kind,
        async () => {
          const fromFile = opts.releaseIdFile ? await readReleaseIdFile(opts.releaseIdFile) : [];
          return { mode: "release-id", releaseIds: [...opts.releaseId, ...fromFile] };
        },
        opts,
        deps,
      );
    });
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .requiredOption("--tpa-base-url <url>", "Base URL of the SBOM archive")
    .requiredOption("--s3-bucket-url <url>", "URL of the bucket holding release data and the ledger")
    .option("--producer-command <command>", "SBOM generator command line with {placeholders}")
    .option("--output-dir <dir>", "Working directory (default: temporary, removed on exit)")
    .option("--report <path>", "Report path (default: <output-dir>/<kind>_report.json)")
    .option("--concurrency <n>", `Parallel releases (default: ${DEFAULT_CONCURRENCY})`, toInt)
    .option("--tpa-retries <n>", `Upload attempts per release (default: ${DEFAULT_TPA_ATTEMPTS})`, toInt)
    .option(
      "--tpa-timeout-ms <ms>",
      `Per-request upload timeout (default: ${DEFAULT_TPA_TIMEOUT_MS})`,
      toInt,
    )
    .option("--ledger-prefix <prefix>", `Ledger key prefix (default: ${DEFAULT_LEDGER_PREFIX})`)
    .option("--label <key=value>", "Label attached to every upload (repeatable)", collect, [])
    .option("--dry-run", "Produce SBOMs without uploading them", false)
    .option("--verbose", "Echo run events to stderr", false)
    .option("--debug", "Print stack traces for fatal errors", false);
}

// =============================================================================
// EXECUTION
// =============================================================================

async function executeRegeneration(
  kind: ReleaseKind,
  resolveSelection: () => Promise<RawSelection>,
  opts: CommonOptions,
  deps: RegenerateCommandDeps,
): Promise<void> {
  const runId = defaultRunId();
  const stopHandler = createRunStopSignalHandler({
    source: deps.signals,
    onSignal: (signal) => {
      deps.print(
        `Received ${signal}. Finishing in-flight releases of run ${runId}; the rest are abandoned.`,
      );
    },
  });

  let tempOutputDir: string | null = null;
  try {
    if (!opts.outputDir) {
      tempOutputDir = await fse.mkdtemp(path.join(os.tmpdir(), "sbom-regen-"));
    }

    const request = resolveRegenerationRequest(
      {
        kind,
        selection: await resolveSelection(),
        tpaBaseUrl: opts.tpaBaseUrl,
        s3BucketUrl: opts.s3BucketUrl,
        producerCommand: opts.producerCommand,
        outputDir: opts.outputDir ?? tempOutputDir ?? "",
        // A temporary output dir does not outlive the run, so its report lands in the cwd.
        reportPath: opts.report ?? (tempOutputDir ? `${kind}_report.json` : undefined),
        concurrency: opts.concurrency,
        tpaRetries: opts.tpaRetries,
        tpaTimeoutMs: opts.tpaTimeoutMs,
        ledgerPrefix: opts.ledgerPrefix,
        labels: opts.label,
        dryRun: opts.dryRun,
      },
      deps.env,
    );

    const ctx = buildRunContext({
      request,
      runId,
      signal: stopHandler.signal,
      echo: opts.verbose ? (line) => deps.errorStream.write(`${line}\n`) : undefined,
    });
    const result = await deps.run(ctx);

    printSummary(result, deps.print);
    if (result.cancelled) {
      const stoppedBy = stopHandler.stoppedBy() ?? "request";
      renderError(
        new UserFacingError({
          code: USER_FACING_ERROR_CODES.cancelled,
          title: "Run cancelled.",
          message: `Run ${result.runId} stopped by ${stoppedBy} before every release was processed.`,
          hint: "The partial report lists the releases that finished.",
          next: "Re-run the same command; failed releases are retried from the ledger.",
        }),
        { mode: opts.debug ? "debug" : "short", stream: deps.errorStream },
      );
      process.exitCode = 1;
    }
  } catch (err) {
    renderError(err, { mode: opts.debug ? "debug" : "short", stream: deps.errorStream });
    process.exitCode = 1;
  } finally {
    stopHandler.cleanup();
    if (tempOutputDir) {
      await fse.remove(tempOutputDir);
    }
  }
}

function printSummary(result: RegenerationRunResult, print: (line: string) => void): void {
  const summary = result.report.component_report ?? result.report.product_report;
  if (!summary) return;

  const { metadata, totals } = summary;
  const dryRunLabel = metadata.dry_run ? " (dry run)" : "";
  print(
    `Run ${result.runId} ${metadata.kind} ${metadata.mode}${dryRunLabel}: ` +
      `${totals.candidates} candidate(s), ${totals.delivered} delivered, ` +
      `${totals.failed} failed, ${totals.skipped} skipped.`,
  );
  const unrecorded: string[] = [];
  for (const outcome of summary.outcomes) {
    if (outcome.status !== "failed") continue;
    const detail = outcome.detail ? `: ${outcome.detail}` : "";
    print(`- ${outcome.release_id}: ${outcome.reason ?? "failed"}${detail}`);
    if (outcome.attempt_count === null) unrecorded.push(outcome.release_id);
  }
  // A dry run leaves attempt_count null on every failure.
  if (!metadata.dry_run && unrecorded.length > 0) {
    print(
      `Not recorded in the retry ledger: ${unrecorded.join(", ")}. ` +
        `Re-run them with: sbom-regen ${metadata.kind} list ${unrecorded.join(" ")}`,
    );
  }
  print(`Report: ${result.reportPath}`);
}

// =============================================================================
// OPTION PARSERS
// =============================================================================

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function toInt(value: string): number {
  return parseInt(value, 10);
}
