/**
 * ensure-conda Engine — Executable Probe
 *
 * Produces the candidates for one tool kind, lazily and in order:
 *   1. the tool's environment override (CONDA_EXE for conda)
 *   2. the managed cache directory
 *   3. the search path, with version-manager shim directories removed
 *
 * Consumers stop at the first candidate that passes the version gate, so
 * nothing is stat'ed beyond what they actually pull.
 */

import * as fs from "fs";
import { Candidate, TOOL_DEFINITIONS, ToolKind } from "./types";
import { executableExtensions, isWindows, pathFor } from "./platform";

export interface ProbeContext {
  env: NodeJS.ProcessEnv;
  platform: string;
  cacheDir: string;
}

/**
 * Path segments of version-manager shim directories. Their executables exist
 * but fail outside the manager's own environment.
 */
export const SHIM_SEGMENTS: readonly string[][] = [[".pyenv", "shims"]];

/**
 * Exists, is a regular file (links followed), and may be executed by us.
 */
export async function isExecutableFile(
  filePath: string,
  context: Pick<ProbeContext, "env" | "platform">,
): Promise<boolean> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch {
    return false;
  }
  if (!stat.isFile()) return false;

  if (isWindows(context.platform)) {
    const ext = pathFor(context.platform).extname(filePath).toLowerCase();
    return executableExtensions(context.platform, context.env).some(
      (candidate) => candidate.toLowerCase() === ext,
    );
  }

  try {
    await fs.promises.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export function isShimDirectory(dir: string, platform: string): boolean {
  const p = pathFor(platform);
  return SHIM_SEGMENTS.some((segments) => dir.includes(p.join(...segments)));
}

/**
 * Search-path directories with shim directories removed.
 */
export function searchPathDirectories(
  context: Pick<ProbeContext, "env" | "platform">,
): string[] {
  const p = pathFor(context.platform);
  // A copied Windows environment loses case-insensitivity
  const raw =
    context.env.PATH ??
    (isWindows(context.platform) ? context.env.Path : undefined) ??
    "";
  if (raw === "") return [];
  return raw
    .split(p.delimiter)
    .map((dir) => (dir === "" ? "." : dir))
    .filter((dir) => !isShimDirectory(dir, context.platform));
}

/**
 * First executable named `fileName` on the shim-free search path.
 */
export async function whichNoShims(
  fileName: string,
  context: Pick<ProbeContext, "env" | "platform">,
): Promise<string | null> {
  const p = pathFor(context.platform);
  for (const dir of searchPathDirectories(context)) {
    const candidate = p.join(dir, fileName);
    if (await isExecutableFile(candidate, context)) {
      return candidate;
    }
  }
  return null;
}

export async function* probeExecutables(
  kind: ToolKind,
  context: ProbeContext,
): AsyncGenerator<Candidate> {
  const definition = TOOL_DEFINITIONS[kind];
  const p = pathFor(context.platform);

  if (definition.envOverride) {
    const fromEnv = context.env[definition.envOverride];
    if (fromEnv && (await isExecutableFile(fromEnv, context))) {
      yield { path: fromEnv, source: "env" };
    }
  }

  const fileNames = executableExtensions(context.platform, context.env).map(
    (ext) => definition.executableName + ext,
  );

  for (const fileName of fileNames) {
    const cached = p.join(context.cacheDir, fileName);
    if (await isExecutableFile(cached, context)) {
      yield { path: cached, source: "cache" };
    }
  }

  for (const fileName of fileNames) {
    const found = await whichNoShims(fileName, context);
    if (found) {
      yield { path: found, source: "path" };
    }
  }
}
