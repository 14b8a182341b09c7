#!/usr/bin/env node

/**
 * ensure-conda CLI — Entry Point
 *
 *   ensureconda [options]   Print the path of a usable conda executable
 *
 * Usage errors exit with 2, like any other failure to complete the search.
 */

import { CommanderError } from "commander";
import { getErrorMessage } from "@ensure-conda/engine";
import { EXIT_CODES } from "./config";
import { buildProgram } from "./program";

const program = buildProgram();
program.exitOverride();

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    // Commander has already printed help, the version or the usage error
    process.exit(err.exitCode === 0 ? 0 : EXIT_CODES.error);
  }
  console.error(`Error: ${getErrorMessage(err)}`);
  process.exit(EXIT_CODES.error);
});
