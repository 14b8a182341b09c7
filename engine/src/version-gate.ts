/**
 * ensure-conda Engine — Version Gate
 *
 * Runs a candidate with `--version`, parses what it reports and compares
 * the result against an optional minimum.
 *
 * Parsing never throws: anything unrecognisable is 0.0.0, which every
 * positive minimum rejects and "no constraint" accepts. Failing to run the
 * executable at all is a ProcessInvocationError.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { ToolKind, VersionConstraint } from "./types";
import { ProcessInvocationError } from "./errors";
import {
  Version,
  compareVersions,
  parseVersionOrZero,
  zeroVersion,
} from "./utils/semver";

const execFileAsync = promisify(execFile);

/** Default timeout for `<exe> --version` */
export const VERSION_COMMAND_TIMEOUT_MS = 30000;

/**
 * Runs an executable and returns its stdout. Rejects if it cannot be run
 * or exits non-zero.
 */
export type CommandRunner = (
  executable: string,
  args: readonly string[],
) => Promise<string>;

export function createCommandRunner(
  platform: string = process.platform,
  timeoutMs: number = VERSION_COMMAND_TIMEOUT_MS,
): CommandRunner {
  return async (executable, args) => {
    // Batch files cannot be spawned without a shell on Windows
    const needsShell =
      platform === "win32" && /\.(bat|cmd)$/i.test(executable);
    const { stdout } = await execFileAsync(
      needsShell ? `"${executable}"` : executable,
      [...args],
      {
        encoding: "utf8",
        windowsHide: true,
        timeout: timeoutMs,
        shell: needsShell,
      },
    );
    return stdout;
  };
}

function outputLines(stdout: string): string[] {
  return stdout.trim().split(/\r?\n/);
}

function trailingToken(line: string): string {
  const tokens = line.trim().split(/\s+/);
  return tokens[tokens.length - 1] ?? "";
}

function versionFromLineWithPrefix(stdout: string, prefix: string): Version | null {
  for (const line of outputLines(stdout)) {
    if (line.startsWith(prefix)) {
      return parseVersionOrZero(trailingToken(line));
    }
  }
  return null;
}

/**
 * micromamba (and mamba >= 2) print a single line with the bare version.
 */
export function parseMicromambaVersionOutput(stdout: string): Version {
  const [first] = outputLines(stdout);
  if (!first) return zeroVersion();
  return parseVersionOrZero(trailingToken(first));
}

/**
 * mamba 1.x prints "mamba X" followed by "conda Y"; newer releases print
 * the micromamba format.
 */
export function parseMambaVersionOutput(stdout: string): Version {
  return (
    versionFromLineWithPrefix(stdout, "mamba") ??
    parseMicromambaVersionOutput(stdout)
  );
}

export function parseCondaVersionOutput(stdout: string): Version {
  return versionFromLineWithPrefix(stdout, "conda") ?? zeroVersion();
}

const OUTPUT_PARSERS: Record<ToolKind, (stdout: string) => Version> = {
  mamba: parseMambaVersionOutput,
  micromamba: parseMicromambaVersionOutput,
  conda: parseCondaVersionOutput,
  "conda-standalone": parseCondaVersionOutput,
};

/**
 * Version an executable of the given kind reports about itself.
 */
export async function versionOf(
  kind: ToolKind,
  executable: string,
  runner: CommandRunner,
): Promise<Version> {
  let stdout: string;
  try {
    stdout = await runner(executable, ["--version"]);
  } catch (err: unknown) {
    throw new ProcessInvocationError(executable, err);
  }
  return OUTPUT_PARSERS[kind](stdout);
}

export interface VersionGate {
  minVersion: VersionConstraint;
  versionOf: (executable: string) => Promise<Version>;
}

/**
 * True iff there is no minimum or the executable's version reaches it.
 * The executable is only run when there is a minimum to compare against.
 */
export async function satisfies(
  executable: string,
  gate: VersionGate,
): Promise<boolean> {
  if (gate.minVersion === null) return true;
  const version = await gate.versionOf(executable);
  return compareVersions(version, gate.minVersion) >= 0;
}

/**
 * Gate for one tool kind: mamba and micromamba share the mamba minimum,
 * conda and conda-standalone the conda minimum.
 */
export function gateFor(
  kind: ToolKind,
  minimums: { minCondaVersion: VersionConstraint; minMambaVersion: VersionConstraint },
  runner: CommandRunner,
): VersionGate {
  const minVersion =
    kind === "mamba" || kind === "micromamba"
      ? minimums.minMambaVersion
      : minimums.minCondaVersion;
  return {
    minVersion,
    versionOf: (executable) => versionOf(kind, executable, runner),
  };
}
