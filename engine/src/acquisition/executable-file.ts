/**
 * Managed cache entries: freshness and atomic replacement.
 *
 * A file at a canonical name is either complete and executable or absent.
 * Bytes land in a uniquely named sibling first; only the final rename
 * touches the canonical name.
 */

import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { NEGATIVE_AGE_TOLERANCE_MS, REDOWNLOAD_AFTER_MS } from "../config";
import { ReplaceFailedError } from "../errors";
import { isWindows } from "../platform";
import { Logger } from "../utils/logger";
import { LockOptions, withLock } from "./lock";

export interface FreshnessWindow {
  redownloadAfterMs: number;
  negativeAgeToleranceMs: number;
}

export const DEFAULT_FRESHNESS: FreshnessWindow = {
  redownloadAfterMs: REDOWNLOAD_AFTER_MS,
  negativeAgeToleranceMs: NEGATIVE_AGE_TOLERANCE_MS,
};

/**
 * Whether `filePath` exists and was written recently enough to reuse.
 * A modification time too far in the future counts as stale.
 */
export async function isFresh(
  filePath: string,
  now: number,
  window: FreshnessWindow = DEFAULT_FRESHNESS,
): Promise<boolean> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(filePath);
  } catch {
    return false;
  }
  const age = now - stat.mtimeMs;
  return age >= window.negativeAgeToleranceMs && age < window.redownloadAfterMs;
}

export interface WriteExecutableOptions extends LockOptions {
  platform?: string;
}

/**
 * Atomically install `bytes` as `<dir>/<fileName>` with the owner execute
 * bit set. Concurrent writers of the same target serialize on
 * `<target>.lock`.
 *
 * @returns The canonical path
 */
export async function writeExecutable(
  dir: string,
  fileName: string,
  bytes: Buffer,
  options: WriteExecutableOptions,
): Promise<string> {
  const { logger } = options;
  const platform = options.platform ?? process.platform;
  const target = path.join(dir, fileName);

  await fs.promises.mkdir(dir, { recursive: true });

  return withLock(
    `${target}.lock`,
    `file write (${target})`,
    async () => {
      const temp = path.join(dir, uuidv4().replace(/-/g, ""));
      try {
        await fs.promises.writeFile(temp, bytes);
        const { mode } = await fs.promises.stat(temp);
        await fs.promises.chmod(temp, mode | fs.constants.S_IXUSR);
        await replaceFile(temp, target, platform, logger);
      } catch (err: unknown) {
        await removeQuietly(temp, logger);
        throw err;
      }
      logger.info({ path: target, bytes: bytes.length }, "Installed executable");
      return target;
    },
    options,
  );
}

async function replaceFile(
  source: string,
  target: string,
  platform: string,
  logger: Logger,
): Promise<void> {
  // rename() cannot overwrite an existing file on Windows
  if (isWindows(platform)) {
    try {
      await fs.promises.unlink(target);
    } catch (err: unknown) {
      if (!isNotFound(err)) {
        throw new ReplaceFailedError(target, err);
      }
    }
  }
  logger.debug({ from: source, to: target }, "Renaming into place");
  await fs.promises.rename(source, target);
}

async function removeQuietly(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (err: unknown) {
    logger.warn({ path: filePath, error: String(err) }, "Could not remove temporary file");
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
