import { Command } from "commander";

import { registerRegenerateCommands } from "./cli/regenerate.js";
import { renderError } from "./core/error-format.js";

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("sbom-regen")
    .description("Regenerate release SBOMs and re-deliver them to the archive")
    .version("0.1.0");

  registerRegenerateCommands(program);
  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await buildProgram().parseAsync(argv);
  } catch (err) {
    renderError(err);
    process.exitCode = 1;
  }
}
