/**
 * ensure-conda CLI — Ensure Command
 *
 * Finds (or installs) a conda-compatible executable and prints its path.
 *
 * Usage:
 *   ensureconda                        Any of mamba, micromamba, conda, conda-standalone
 *   ensureconda --no-mamba --no-conda  Only micromamba or conda-standalone
 *   ensureconda --no-install           Never download anything
 *
 * Exit codes:
 *   0  found; the path is the only line on stdout
 *   1  nothing compatible found
 *   2  an error occurred while searching or installing
 */

import { Command, InvalidArgumentError, Option } from "commander";
import {
  ResolveRequest,
  Version,
  ensureConda,
  getErrorMessage,
  levelForVerbosity,
  parseVersion,
} from "@ensure-conda/engine";
import {
  DEFAULT_MIN_CONDA_VERSION,
  DEFAULT_MIN_MAMBA_VERSION,
  EXIT_CODES,
  MAX_VERBOSITY,
} from "../config";
import { printError, printEvent, printResult, printSuccess } from "../output";

export interface EnsureCliOptions {
  mamba: boolean;
  micromamba: boolean;
  conda: boolean;
  condaExe: boolean;
  install: boolean;
  minCondaVersion: Version;
  minMambaVersion: Version;
  verbosity: number;
}

export interface EnsureCommandDeps {
  ensure: typeof ensureConda;
  setExitCode: (code: number) => void;
}

const DEFAULT_DEPS: EnsureCommandDeps = {
  ensure: ensureConda,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

// ─── Argument Parsers ───────────────────────────────────────

export function parseMinVersion(value: string): Version {
  const version = parseVersion(value);
  if (!version) {
    throw new InvalidArgumentError(`"${value}" is not a valid version.`);
  }
  return version;
}

export function parseVerbosity(value: string): number {
  const level = Number(value);
  if (!/^\d+$/.test(value.trim()) || level > MAX_VERBOSITY) {
    throw new InvalidArgumentError(`Must be an integer from 0 to ${MAX_VERBOSITY}.`);
  }
  return level;
}

export function toResolveRequest(opts: EnsureCliOptions): ResolveRequest {
  return {
    mamba: opts.mamba,
    micromamba: opts.micromamba,
    conda: opts.conda,
    condaStandalone: opts.condaExe,
    allowInstall: opts.install,
    minCondaVersion: opts.minCondaVersion,
    minMambaVersion: opts.minMambaVersion,
  };
}

// ─── Registration ───────────────────────────────────────────

/**
 * Attach the ensure options and action to `program`. The program has no
 * subcommands; this is what runs for a bare `ensureconda`.
 */
export function registerEnsureCommand(
  program: Command,
  deps: EnsureCommandDeps = DEFAULT_DEPS,
): void {
  program
    .option("--mamba", "search for mamba", true)
    .option("--no-mamba", "do not search for mamba")
    .option("--micromamba", "search for micromamba, installing it if needed", true)
    .option("--no-micromamba", "do not search for micromamba")
    .option("--conda", "search for conda", true)
    .option("--no-conda", "do not search for conda")
    .option("--conda-exe", "search for conda-standalone, installing it if needed", true)
    .option("--no-conda-exe", "do not search for conda-standalone")
    .option("--no-install", "only search for existing executables, never download")
    .addOption(
      new Option("--min-conda-version <version>", "minimum conda version")
        .argParser(parseMinVersion)
        .default(parseMinVersion(DEFAULT_MIN_CONDA_VERSION), DEFAULT_MIN_CONDA_VERSION),
    )
    .addOption(
      new Option("--min-mamba-version <version>", "minimum mamba/micromamba version")
        .argParser(parseMinVersion)
        .default(parseMinVersion(DEFAULT_MIN_MAMBA_VERSION), DEFAULT_MIN_MAMBA_VERSION),
    )
    .addOption(
      new Option("-v, --verbosity <level>", `log verbosity from 0 to ${MAX_VERBOSITY}`)
        .argParser(parseVerbosity)
        .default(0),
    )
    .action(async (opts: EnsureCliOptions) => {
      const code = await runEnsure(opts, deps);
      deps.setExitCode(code);
    });
}

/**
 * Run the resolver and report the outcome.
 *
 * @returns The process exit code
 */
export async function runEnsure(
  opts: EnsureCliOptions,
  deps: Pick<EnsureCommandDeps, "ensure"> = DEFAULT_DEPS,
): Promise<number> {
  try {
    const found = await deps.ensure(toResolveRequest(opts), {
      logLevel: levelForVerbosity(opts.verbosity),
      onEvent: (event) => printEvent(event, opts.verbosity),
    });

    if (found === null) {
      printError("Could not find compatible executable");
      return EXIT_CODES.notFound;
    }
    printSuccess("Found compatible executable");
    printResult(found);
    return EXIT_CODES.found;
  } catch (err: unknown) {
    printError(`Error: ${getErrorMessage(err)}`);
    return EXIT_CODES.error;
  }
}
