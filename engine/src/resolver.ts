/**
 * ensure-conda Engine — Resolver
 *
 * Walks the enabled tool kinds in priority order and returns the first
 * executable that passes its version gate:
 *
 *   mamba → micromamba → conda → conda-standalone
 *
 * For each kind the probe's candidates are tried in order. micromamba and
 * conda-standalone can additionally be installed into the managed cache
 * when nothing on the machine qualifies.
 */

import * as os from "os";
import { EnsureCondaConfig, loadConfig } from "./config";
import { getErrorMessage } from "./errors";
import { Installer, InstallerOptions } from "./acquisition/installer";
import { probeExecutables } from "./probe";
import {
  ResolveRequest,
  ResolverEvent,
  ResolverEventHandler,
  TOOL_PRIORITY,
  ToolKind,
  isInstallable,
} from "./types";
import {
  CommandRunner,
  VersionGate,
  createCommandRunner,
  gateFor,
  satisfies,
} from "./version-gate";
import { LogLevel, Logger, createLogger } from "./utils/logger";

export interface ResolverOptions extends Omit<InstallerOptions, "logger" | "emit"> {
  logger?: Logger;
  logLevel?: LogLevel;
  /** Runs `<exe> --version` */
  runner?: CommandRunner;
  /** Replaces the installer built from the other options */
  installer?: Installer;
}

type ToolFlag = "mamba" | "micromamba" | "conda" | "condaStandalone";

const REQUEST_FLAGS: Record<ToolKind, ToolFlag> = {
  mamba: "mamba",
  micromamba: "micromamba",
  conda: "conda",
  "conda-standalone": "condaStandalone",
};

export class CondaResolver {
  private readonly config: EnsureCondaConfig;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: string;
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly installer: Installer;
  private readonly handlers: ResolverEventHandler[] = [];

  constructor(options: ResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.config = {
      ...loadConfig(this.env, this.platform),
      ...options.config,
    };
    this.logger = options.logger ?? createLogger({ level: options.logLevel ?? "silent" });
    this.runner = options.runner ?? createCommandRunner(this.platform);
    this.installer =
      options.installer ??
      new Installer({
        ...options,
        config: this.config,
        env: this.env,
        platform: this.platform,
        machine: options.machine ?? os.machine(),
        logger: this.logger,
        emit: (event) => this.emit(event),
      });
  }

  get cacheDir(): string {
    return this.config.cacheDir;
  }

  /**
   * Subscribe to progress events.
   *
   * @returns A function that removes the handler
   */
  on(handler: ResolverEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.indexOf(handler);
      if (index >= 0) this.handlers.splice(index, 1);
    };
  }

  private emit(event: ResolverEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.warn(
          { event: event.type, error: getErrorMessage(err) },
          "Event handler failed",
        );
      }
    }
  }

  /**
   * Path of the first enabled tool that satisfies its minimum version,
   * or null when there is none.
   */
  async resolve(request: ResolveRequest): Promise<string | null> {
    for (const kind of TOOL_PRIORITY) {
      if (!request[REQUEST_FLAGS[kind]]) continue;

      const found = await this.resolveKind(kind, request);
      if (found !== null) {
        this.logger.info({ kind, path: found }, "Found compatible executable");
        return found;
      }
    }
    this.logger.info("No compatible executable found");
    return null;
  }

  private async resolveKind(
    kind: ToolKind,
    request: ResolveRequest,
  ): Promise<string | null> {
    const gate = gateFor(kind, request, this.runner);
    const context = {
      env: this.env,
      platform: this.platform,
      cacheDir: this.config.cacheDir,
    };

    for await (const candidate of probeExecutables(kind, context)) {
      this.logger.debug({ kind, ...candidate }, "Checking candidate");
      if (await this.passes(kind, candidate.path, gate)) {
        return candidate.path;
      }
    }

    if (!request.allowInstall || !isInstallable(kind)) return null;

    // Acquisition failures propagate; only the gate result decides fall-through
    const installed = await this.installer.acquire(kind);
    return (await this.passes(kind, installed, gate)) ? installed : null;
  }

  private async passes(
    kind: ToolKind,
    executable: string,
    gate: VersionGate,
  ): Promise<boolean> {
    let ok: boolean;
    let reason: string;
    try {
      ok = await satisfies(executable, gate);
      reason = "version below minimum";
    } catch (err: unknown) {
      ok = false;
      reason = getErrorMessage(err);
    }
    if (!ok) {
      this.logger.debug({ kind, path: executable, reason }, "Candidate rejected");
      this.emit({ type: "candidate_rejected", kind, path: executable, reason });
    }
    return ok;
  }
}

export interface EnsureCondaOptions extends ResolverOptions {
  onEvent?: ResolverEventHandler;
}

/**
 * Two-pass resolution: first look only at what is already on the machine,
 * then, if installing is allowed and nothing qualified, try again with
 * installation enabled.
 */
export async function ensureConda(
  request: ResolveRequest,
  options: EnsureCondaOptions = {},
): Promise<string | null> {
  const resolver = new CondaResolver(options);
  if (options.onEvent) resolver.on(options.onEvent);

  const existing = await resolver.resolve({ ...request, allowInstall: false });
  if (existing !== null || !request.allowInstall) return existing;
  return resolver.resolve(request);
}
