/**
 * ensure-conda Engine — Platform Identifier
 *
 * Maps the running OS and machine to the conda subdir tag ("linux-64",
 * "osx-arm64", "win-64", ...) used both for searching and for downloads.
 * Every function takes its inputs explicitly so tests can pose as any host.
 */

import * as os from "os";
import * as path from "path";
import { UnsupportedPlatformError } from "./errors";

const PLATFORM_MAP: Record<string, string> = {
  linux: "linux",
  darwin: "osx",
  win32: "win",
};

/** Machines that are named in the tag instead of their pointer width */
const NON_X86_MACHINES = new Set(["aarch64", "arm64", "ppc64", "ppc64le"]);

const BITS_32_ARCHES = new Set(["ia32", "x32", "arm", "mips", "mipsel", "ppc", "s390"]);

export function pointerBits(arch: string = process.arch): 32 | 64 {
  return BITS_32_ARCHES.has(arch) ? 32 : 64;
}

/**
 * Canonical subdir tag for a platform.
 *
 * @param platform - Node platform name (process.platform)
 * @param machine - Machine hardware name as reported by uname (os.machine())
 * @param bits - Pointer width
 */
export function platformSubdir(
  platform: string = process.platform,
  machine: string = os.machine(),
  bits: 32 | 64 = pointerBits(),
): string {
  const plat = PLATFORM_MAP[platform];
  if (plat === undefined) {
    throw new UnsupportedPlatformError(platform);
  }
  if (NON_X86_MACHINES.has(machine)) {
    return `${plat}-${machine}`;
  }
  return `${plat}-${bits}`;
}

export function isWindows(platform: string = process.platform): boolean {
  return platform === "win32";
}

export function exeSuffix(platform: string = process.platform): string {
  return isWindows(platform) ? ".exe" : "";
}

/**
 * File extensions to try, in order, when looking for an executable.
 *
 * Windows: every entry of PATHEXT. Elsewhere: no extension, then ".exe".
 */
export function executableExtensions(
  platform: string = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  if (!isWindows(platform)) {
    return ["", ".exe"];
  }
  const exts = (env.PATHEXT ?? "")
    .split(";")
    .map((ext) => ext.trim())
    .filter((ext) => ext.length > 0);
  return exts.length > 0 ? exts : [""];
}

/** The path module matching a platform's separators */
export function pathFor(platform: string = process.platform): path.PlatformPath {
  return isWindows(platform) ? path.win32 : path.posix;
}
