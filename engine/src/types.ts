/**
 * ensure-conda Engine — Core Type Definitions
 */

import type { Version } from "./utils/semver";

// ─── Tool Kinds ──────────────────────────────────────────────────

export type ToolKind = "mamba" | "micromamba" | "conda" | "conda-standalone";

/** Resolution priority, highest first */
export const TOOL_PRIORITY: readonly ToolKind[] = [
  "mamba",
  "micromamba",
  "conda",
  "conda-standalone",
];

/** Tool kinds the engine can download into the managed cache */
export type InstallableToolKind = "micromamba" | "conda-standalone";

export interface ToolDefinition {
  kind: ToolKind;
  /** Executable name without extension, also the cache file name */
  executableName: string;
  /** Environment variable pointing directly at the executable */
  envOverride?: string;
  installable: boolean;
}

export const TOOL_DEFINITIONS: Readonly<Record<ToolKind, ToolDefinition>> = {
  mamba: { kind: "mamba", executableName: "mamba", installable: false },
  micromamba: {
    kind: "micromamba",
    executableName: "micromamba",
    installable: true,
  },
  conda: {
    kind: "conda",
    executableName: "conda",
    envOverride: "CONDA_EXE",
    installable: false,
  },
  "conda-standalone": {
    kind: "conda-standalone",
    executableName: "conda_standalone",
    installable: true,
  },
};

export function isInstallable(kind: ToolKind): kind is InstallableToolKind {
  return TOOL_DEFINITIONS[kind].installable;
}

// ─── Candidates ──────────────────────────────────────────────────

export type CandidateSource = "env" | "cache" | "path";

export interface Candidate {
  path: string;
  source: CandidateSource;
}

// ─── Version Constraints ─────────────────────────────────────────

/** null means "no constraint" */
export type VersionConstraint = Version | null;

// ─── Resolution ──────────────────────────────────────────────────

export interface ResolveRequest {
  mamba: boolean;
  micromamba: boolean;
  conda: boolean;
  condaStandalone: boolean;
  /** Download micromamba / conda-standalone when nothing suitable is found */
  allowInstall: boolean;
  minCondaVersion: VersionConstraint;
  minMambaVersion: VersionConstraint;
}

// ─── Events ──────────────────────────────────────────────────────

export type ResolverEvent =
  | { type: "lock_wait"; lockName: string; waitedSeconds: number }
  | { type: "lock_acquired"; lockName: string; waitedSeconds: number }
  | {
      type: "retry";
      url: string;
      attempt: number;
      waitSeconds: number;
      reason: string;
    }
  | { type: "download"; kind: InstallableToolKind; url: string }
  | { type: "installed"; kind: InstallableToolKind; path: string }
  | {
      type: "candidate_rejected";
      kind: ToolKind;
      path: string;
      reason: string;
    };

export type ResolverEventHandler = (event: ResolverEvent) => void;
