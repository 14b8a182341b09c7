/**
 * ensure-conda CLI — Output Helpers
 *
 * Centralized formatting for all CLI output. Uses chalk (v4, CommonJS
 * compatible) for ANSI colors.
 *
 * stdout carries exactly one thing, the resolved path, so scripts can
 * capture it. Everything else goes to stderr.
 */

import chalk from "chalk";
import { ResolverEvent } from "@ensure-conda/engine";

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
};

// ─── Print Helpers ──────────────────────────────────────────

export function printResult(path: string): void {
  console.log(path);
}

export function printSuccess(msg: string): void {
  console.error(colors.success(msg));
}

export function printError(msg: string): void {
  console.error(colors.error(msg));
}

export function printWarn(msg: string): void {
  console.error(colors.warn(msg));
}

export function printInfo(msg: string): void {
  console.error(colors.dim(msg));
}

// ─── Engine Events ──────────────────────────────────────────

function seconds(value: number): string {
  return `${value.toFixed(1)}s`;
}

/**
 * Human-readable line for an engine event, or null when the event is
 * not shown at this verbosity.
 */
export function formatEvent(event: ResolverEvent, verbosity: number): string | null {
  switch (event.type) {
    case "lock_wait":
      return `Waiting for ${event.lockName} lock... (${seconds(event.waitedSeconds)})`;
    case "lock_acquired":
      return `Acquired ${event.lockName} lock after ${seconds(event.waitedSeconds)}`;
    case "retry":
      return `Failed to fetch ${event.url} (${event.reason}), retrying in ${seconds(event.waitSeconds)} [attempt ${event.attempt}]`;
    case "download":
      return `Downloading ${event.kind} from ${event.url}`;
    case "installed":
      return `Installed ${event.kind} to ${event.path}`;
    case "candidate_rejected":
      return verbosity > 0 ? `Skipping ${event.path}: ${event.reason}` : null;
  }
}

export function printEvent(event: ResolverEvent, verbosity: number): void {
  const line = formatEvent(event, verbosity);
  if (line === null) return;
  if (event.type === "retry" || event.type === "lock_wait") {
    printWarn(line);
  } else {
    printInfo(line);
  }
}
