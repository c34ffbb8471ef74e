/*
Purpose: produce an SBOM by staging a release's input data and running an external generator.
Assumptions: the generator writes one JSON document to the {output} path it is given.
Usage: new CommandSbomProducer({ bucket, command: ["gen", "--out", "{output}"], outputDir }).
*/

import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { ProducerError } from "../core/errors.js";
import type { Release, ReleaseKind } from "../core/release.js";
import { encodeReleaseKey } from "../core/utils.js";
import type { ObjectBucket } from "../storage/object-bucket.js";

import type { SbomDocument, SbomProducer } from "./sbom-producer.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  failed: boolean;
  exitCode: number | undefined;
  stderr: string;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options: { cwd: string },
) => Promise<CommandResult>;

export type CommandSbomProducerOptions = {
  bucket: ObjectBucket;
  command: string[];
  outputDir: string;
  runCommand?: CommandRunner;
};

type StagedPaths = {
  snapshot: string;
  releaseData: string;
  output: string;
};

const STDERR_TAIL_CHARS = 2_000;

// =============================================================================
// DEFAULT RUNNER
// =============================================================================

export const runExternalCommand: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, { cwd: options.cwd, reject: false, stdin: "ignore" });
  return { failed: result.failed, exitCode: result.exitCode, stderr: result.stderr };
};

// =============================================================================
// PRODUCER
// =============================================================================

export class CommandSbomProducer implements SbomProducer {
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: CommandSbomProducerOptions) {
    if (options.command.length === 0) {
      throw new RangeError("Producer command must not be empty");
    }
    this.runCommand = options.runCommand ?? runExternalCommand;
  }

  async produce(release: Pick<Release, "id" | "kind">): Promise<SbomDocument> {
    const workDir = path.join(this.options.outputDir, encodeReleaseKey(release.id));
    const paths: StagedPaths = {
      snapshot: path.join(workDir, "snapshot.json"),
      releaseData: path.join(workDir, "release-data.json"),
      output: path.join(workDir, "sbom.json"),
    };

    await this.stageInputs(release, workDir, paths);

    const [file, ...args] = substituteCommand(this.options.command, {
      release_id: release.id,
      kind: release.kind,
      snapshot: paths.snapshot,
      release_data: release.kind === "product" ? paths.releaseData : "",
      output: paths.output,
    });

    let result: CommandResult;
    try {
      result = await this.runCommand(file, args, { cwd: workDir });
    } catch (err) {
      throw new ProducerError(release.id, `Producer command could not be started: ${file}`, err);
    }
    if (result.failed) {
      const status =
        result.exitCode === undefined ? "did not exit" : `exited with code ${result.exitCode}`;
      throw new ProducerError(release.id, `Producer command ${status}: ${tail(result.stderr)}`.trim());
    }

    return {
      releaseId: release.id,
      fileName: `${encodeReleaseKey(release.id)}.json`,
      content: await readDocument(release.id, paths.output),
    };
  }

  private async stageInputs(
    release: Pick<Release, "id" | "kind">,
    workDir: string,
    paths: StagedPaths,
  ): Promise<void> {
    try {
      await fse.ensureDir(workDir);
      await fse.remove(paths.output);

      await this.download(release.id, `snapshots/${release.id}`, paths.snapshot);
      if (release.kind === "product") {
        await this.download(release.id, `release-data/${release.id}`, paths.releaseData);
      }
    } catch (err) {
      if (err instanceof ProducerError) throw err;
      throw new ProducerError(release.id, `Failed to stage input data for ${release.id}`, err);
    }
  }

  private async download(releaseId: string, key: string, destination: string): Promise<void> {
    const body = await this.options.bucket.get(key);
    if (body === null) {
      throw new ProducerError(releaseId, `Input data s3://${this.options.bucket.name}/${key} not found`);
    }
    await fse.writeFile(destination, body);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export type CommandPlaceholders = {
  release_id: string;
  kind: ReleaseKind;
  snapshot: string;
  release_data: string;
  output: string;
};

export function substituteCommand(command: string[], values: CommandPlaceholders): string[] {
  return command.map((part) =>
    part.replace(
      /\{(release_id|kind|snapshot|release_data|output)\}/g,
      (_match, name: keyof CommandPlaceholders) => values[name],
    ),
  );
}

async function readDocument(releaseId: string, outputPath: string): Promise<Buffer> {
  let content: Buffer;
  try {
    content = await fse.readFile(outputPath);
  } catch (err) {
    throw new ProducerError(releaseId, `Producer did not write ${outputPath}`, err);
  }

  try {
    JSON.parse(content.toString("utf8"));
  } catch (err) {
    throw new ProducerError(releaseId, `Producer output is not valid JSON: ${outputPath}`, err);
  }
  return content;
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL_CHARS ? `...${trimmed.slice(-STDERR_TAIL_CHARS)}` : trimmed;
}
