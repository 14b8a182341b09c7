/**
 * ensure-conda Engine — Installer
 *
 * Downloads micromamba or conda-standalone into the managed cache.
 *
 * Each install runs entirely under a per-tool lock:
 *   freshness check → (listing → selection) → download → extract → atomic write
 *
 * Callers that queued behind the lock re-check freshness first, so a burst
 * of concurrent installs performs a single download.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { EnsureCondaConfig, loadConfig, validateChannelName } from "../config";
import { InvalidConfigurationError } from "../errors";
import { exeSuffix, isWindows, platformSubdir, pointerBits } from "../platform";
import {
  InstallableToolKind,
  ResolverEventHandler,
  TOOL_DEFINITIONS,
  ToolKind,
  isInstallable,
} from "../types";
import { Logger, createLogger } from "../utils/logger";
import { ArchiveExtractor, PackageArchiveExtractor } from "./archive";
import { downloadUrlOf, findCondaStandaloneCandidate } from "./candidates";
import { isFresh, writeExecutable } from "./executable-file";
import { HttpClient, NodeHttpClient } from "./http";
import { LockOptions, withLock } from "./lock";
import { RetryOptions, Sleep, requestWithRetry } from "./retry";

export const MICROMAMBA_BASE_URL = "https://micro.mamba.pm/api/micromamba";

/** Archive member holding the executable, per tool and OS family */
export const ARCHIVE_MEMBERS: Record<InstallableToolKind, { windows: string; unix: string }> = {
  micromamba: {
    windows: "Library/bin/micromamba.exe",
    unix: "bin/micromamba",
  },
  "conda-standalone": {
    windows: "standalone_conda/conda.exe",
    unix: "standalone_conda/conda.exe",
  },
};

/** Lock guarding the whole install of one tool */
const INSTALL_LOCK_NAMES: Record<InstallableToolKind, string> = {
  micromamba: "micromamba_install.lock",
  "conda-standalone": "conda_exe_install.lock",
};

export interface InstallerOptions {
  config?: Partial<EnsureCondaConfig>;
  env?: NodeJS.ProcessEnv;
  platform?: string;
  machine?: string;
  bits?: 32 | 64;
  http?: HttpClient;
  extractor?: ArchiveExtractor;
  logger?: Logger;
  emit?: ResolverEventHandler;
  now?: () => number;
  sleep?: Sleep;
}

export class Installer {
  private readonly config: EnsureCondaConfig;
  private readonly platform: string;
  private readonly machine: string;
  private readonly bits: 32 | 64;
  private readonly http: HttpClient;
  private readonly extractor: ArchiveExtractor;
  private readonly logger: Logger;
  private readonly emit: ResolverEventHandler;
  private readonly now: () => number;
  private readonly sleep: Sleep | undefined;

  constructor(options: InstallerOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.config = {
      ...loadConfig(options.env ?? process.env, this.platform),
      ...options.config,
    };
    this.machine = options.machine ?? os.machine();
    this.bits = options.bits ?? pointerBits();
    this.http = options.http ?? new NodeHttpClient();
    this.extractor = options.extractor ?? new PackageArchiveExtractor();
    this.logger = options.logger ?? createLogger();
    this.emit = options.emit ?? (() => undefined);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep;
  }

  get cacheDir(): string {
    return this.config.cacheDir;
  }

  /** Canonical cache path for an installable tool */
  targetPath(kind: InstallableToolKind): string {
    return path.join(
      this.config.cacheDir,
      TOOL_DEFINITIONS[kind].executableName + exeSuffix(this.platform),
    );
  }

  /**
   * Install (or reuse a fresh copy of) a tool.
   *
   * @returns Path of the executable in the managed cache
   */
  async acquire(kind: ToolKind): Promise<string> {
    if (!isInstallable(kind)) {
      throw new InvalidConfigurationError(`${kind} cannot be installed`);
    }
    return kind === "micromamba"
      ? this.installMicromamba()
      : this.installCondaStandalone();
  }

  async installMicromamba(): Promise<string> {
    return this.install("micromamba", async () => {
      const subdir = platformSubdir(this.platform, this.machine, this.bits);
      return `${MICROMAMBA_BASE_URL}/${subdir}/latest`;
    });
  }

  async installCondaStandalone(): Promise<string> {
    const channel = validateChannelName(this.config.condaStandaloneChannel);
    return this.install("conda-standalone", async () => {
      const subdir = platformSubdir(this.platform, this.machine, this.bits);
      const chosen = await findCondaStandaloneCandidate(
        this.http,
        channel,
        subdir,
        this.retryOptions(),
      );
      this.logger.info(
        {
          version: chosen.file.version,
          build: chosen.file.attrs.build,
          subdir,
        },
        "Selected conda-standalone package",
      );
      return downloadUrlOf(chosen);
    });
  }

  private async install(
    kind: InstallableToolKind,
    resolveUrl: () => Promise<string>,
  ): Promise<string> {
    const cacheDir = this.config.cacheDir;
    const target = this.targetPath(kind);
    await fs.promises.mkdir(cacheDir, { recursive: true });

    return withLock(
      path.join(cacheDir, INSTALL_LOCK_NAMES[kind]),
      `downloading ${kind}`,
      async () => {
        if (await isFresh(target, this.now(), this.config)) {
          this.logger.debug({ path: target }, "Cached executable is fresh");
          return target;
        }

        const url = await resolveUrl();
        this.logger.info({ url, kind }, "Downloading");
        this.emit({ type: "download", kind, url });
        const response = await requestWithRetry(this.http, url, this.retryOptions());

        const members = ARCHIVE_MEMBERS[kind];
        const member = isWindows(this.platform) ? members.windows : members.unix;
        const bytes = await this.extractor.extractMember(response.body, url, [member]);

        const installed = await writeExecutable(
          cacheDir,
          path.basename(target),
          bytes,
          { ...this.lockOptions(), platform: this.platform },
        );
        this.emit({ type: "installed", kind, path: installed });
        return installed;
      },
      this.lockOptions(),
    );
  }

  private lockOptions(): LockOptions {
    return {
      logger: this.logger,
      emit: this.emit,
      notifyIntervalMs: this.config.lockNotifyIntervalMs,
      now: this.now,
    };
  }

  private retryOptions(): RetryOptions {
    return {
      logger: this.logger,
      emit: this.emit,
      minWaitSeconds: this.config.retryMinWaitSeconds,
      sleep: this.sleep,
    };
  }
}
