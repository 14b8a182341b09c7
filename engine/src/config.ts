/**
 * ensure-conda Engine — Configuration
 *
 * Central configuration loaded from environment variables with defaults.
 * Nothing here is cached at module level: callers (and tests) build a
 * config and thread it through the resolver and installer.
 */

import * as os from "os";
import { InvalidConfigurationError } from "./errors";
import { isWindows, pathFor } from "./platform";

/** Application name used for the managed cache directory */
export const APP_NAME = "ensure-conda";

/** Cached executables older than this are downloaded again (1 day) */
export const REDOWNLOAD_AFTER_MS = 24 * 60 * 60 * 1000;

/** Ages below this are treated as a bogus timestamp and trigger a download */
export const NEGATIVE_AGE_TOLERANCE_MS = -60 * 1000;

/** Interval between "waiting for lock" notices */
export const LOCK_NOTIFY_INTERVAL_MS = 5000;

/** Lower bound for the wait between download retries */
export const RETRY_MIN_WAIT_SECONDS = 15;

export const RETRY_ATTEMPTS = 10;

export const DEFAULT_CONDA_STANDALONE_CHANNEL = "anaconda";

const CHANNEL_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export interface EnsureCondaConfig {
  /** Managed cache directory holding downloaded executables */
  cacheDir: string;
  /** anaconda.org channel that conda-standalone is downloaded from */
  condaStandaloneChannel: string;
  redownloadAfterMs: number;
  negativeAgeToleranceMs: number;
  lockNotifyIntervalMs: number;
  retryMinWaitSeconds: number;
}

/**
 * Platform-standard per-user data directory.
 *
 *   Windows: %LOCALAPPDATA%\<app>\<app>
 *   macOS:   ~/Library/Application Support/<app>
 *   others:  $XDG_DATA_HOME/<app>, or ~/.local/share/<app>
 */
export function userDataDir(
  appName: string = APP_NAME,
  env: NodeJS.ProcessEnv = process.env,
  platform: string = process.platform,
  home: string = os.homedir(),
): string {
  const p = pathFor(platform);
  if (isWindows(platform)) {
    const base = env.LOCALAPPDATA || p.join(home, "AppData", "Local");
    return p.join(base, appName, appName);
  }
  if (platform === "darwin") {
    return p.join(home, "Library", "Application Support", appName);
  }
  const xdg = env.XDG_DATA_HOME?.trim();
  const base = xdg ? xdg : p.join(home, ".local", "share");
  return p.join(base, appName);
}

/**
 * Validate an anaconda.org channel name. Only checked when a listing is
 * about to be fetched, so a bad value never blocks discovery.
 */
export function validateChannelName(channel: string): string {
  if (!CHANNEL_NAME_PATTERN.test(channel)) {
    throw new InvalidConfigurationError(
      `Invalid channel name ${channel}. Channel names must be alphanumeric and may contain hyphens and underscores`,
    );
  }
  return channel;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: string = process.platform,
): EnsureCondaConfig {
  return {
    cacheDir: userDataDir(APP_NAME, env, platform),
    condaStandaloneChannel:
      env.ENSURECONDA_CONDA_STANDALONE_CHANNEL || DEFAULT_CONDA_STANDALONE_CHANNEL,
    redownloadAfterMs: REDOWNLOAD_AFTER_MS,
    negativeAgeToleranceMs: NEGATIVE_AGE_TOLERANCE_MS,
    lockNotifyIntervalMs: LOCK_NOTIFY_INTERVAL_MS,
    retryMinWaitSeconds: RETRY_MIN_WAIT_SECONDS,
  };
}
