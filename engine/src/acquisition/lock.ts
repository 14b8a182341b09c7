/**
 * Cross-process locking with progress feedback.
 *
 * Waiting for a lock is never an error: another ensure-conda process may
 * be in the middle of a large download. We try for one notification
 * interval at a time, report how long we have been waiting, and try again.
 */

import * as lockfile from "proper-lockfile";
import { LOCK_NOTIFY_INTERVAL_MS } from "../config";
import { getErrorMessage } from "../errors";
import { Logger } from "../utils/logger";
import { ResolverEventHandler } from "../types";

/** Delay between lock attempts within one notification interval */
const ATTEMPT_INTERVAL_MS = 100;

/** Waits shorter than this are not worth reporting */
const REPORT_WAIT_THRESHOLD_MS = 100;

export interface LockOptions {
  logger: Logger;
  emit?: ResolverEventHandler;
  notifyIntervalMs?: number;
  now?: () => number;
}

function isLockedError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ELOCKED";
}

/**
 * Run `fn` while holding the lock at `lockPath`.
 *
 * @param lockPath - Lock file path (created next to the resource it guards)
 * @param lockName - Human-readable name for waiting messages
 */
export async function withLock<T>(
  lockPath: string,
  lockName: string,
  fn: () => Promise<T>,
  options: LockOptions,
): Promise<T> {
  const { logger, emit } = options;
  const notifyIntervalMs = options.notifyIntervalMs ?? LOCK_NOTIFY_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const retries = Math.max(1, Math.floor(notifyIntervalMs / ATTEMPT_INTERVAL_MS));
  const start = now();

  let release: () => Promise<void>;
  for (;;) {
    try {
      release = await lockfile.lock(lockPath, {
        lockfilePath: lockPath,
        realpath: false,
        retries: {
          retries,
          factor: 1,
          minTimeout: ATTEMPT_INTERVAL_MS,
          maxTimeout: ATTEMPT_INTERVAL_MS,
        },
        onCompromised: (err) => {
          logger.error({ lock: lockPath, error: err.message }, "Lock was compromised");
        },
      });
      break;
    } catch (err: unknown) {
      if (!isLockedError(err)) throw err;
      const waitedSeconds = (now() - start) / 1000;
      logger.info({ lock: lockPath, waited_s: waitedSeconds }, "Waiting for lock");
      emit?.({ type: "lock_wait", lockName, waitedSeconds });
    }
  }

  const waitedMs = now() - start;
  if (waitedMs > REPORT_WAIT_THRESHOLD_MS) {
    emit?.({ type: "lock_acquired", lockName, waitedSeconds: waitedMs / 1000 });
  }
  logger.debug({ lock: lockPath, waited_ms: waitedMs }, "Lock acquired");

  try {
    return await fn();
  } finally {
    try {
      await release();
    } catch (err: unknown) {
      // A compromised lock is already gone; the work itself finished
      logger.warn({ lock: lockPath, error: getErrorMessage(err) }, "Failed to release lock");
    }
  }
}
