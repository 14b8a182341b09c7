/**
 * ensure-conda CLI — Program
 */

import { Command } from "commander";
import { CLI_VERSION, PROGRAM_NAME } from "./config";
import { EnsureCommandDeps, registerEnsureCommand } from "./commands/ensure";

export function buildProgram(deps?: EnsureCommandDeps): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description(
      "Find a conda-compatible executable (mamba, micromamba, conda or conda-standalone), installing one if needed, and print its path",
    )
    .version(CLI_VERSION, "-V, --version");

  registerEnsureCommand(program, deps);
  return program;
}
