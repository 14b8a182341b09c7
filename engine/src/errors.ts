/**
 * ensure-conda Engine — Error Types
 *
 * Every failure the engine surfaces is an EnsureCondaError with a stable
 * code. Version-parse failures are not errors (they resolve to 0.0.0) and
 * lock contention is not an error (it waits).
 */

export type EnsureCondaErrorCode =
  | "UNSUPPORTED_PLATFORM"
  | "NO_CANDIDATES_FOUND"
  | "REMOTE_ERROR"
  | "RETRIES_EXHAUSTED"
  | "MEMBER_NOT_FOUND"
  | "UNSUPPORTED_ARCHIVE"
  | "INVALID_ARCHIVE"
  | "REPLACE_FAILED"
  | "PROCESS_INVOCATION_FAILED"
  | "INVALID_CONFIGURATION";

export interface SerializedError {
  readonly name: string;
  readonly code: EnsureCondaErrorCode;
  readonly message: string;
}

/**
 * Base class for all engine errors.
 */
export abstract class EnsureCondaError extends Error {
  abstract readonly code: EnsureCondaErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return { name: this.name, code: this.code, message: this.message };
  }
}

export class UnsupportedPlatformError extends EnsureCondaError {
  readonly code = "UNSUPPORTED_PLATFORM" as const;

  constructor(readonly platform: string) {
    super(`Unsupported platform: ${platform}`);
  }
}

export class NoCandidatesFoundError extends EnsureCondaError {
  readonly code = "NO_CANDIDATES_FOUND" as const;

  constructor(
    readonly packageName: string,
    readonly subdir: string,
  ) {
    super(`No ${packageName} package found for ${subdir}`);
  }
}

export class RemoteError extends EnsureCondaError {
  readonly code = "REMOTE_ERROR" as const;

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class RetriesExhaustedError extends EnsureCondaError {
  readonly code = "RETRIES_EXHAUSTED" as const;

  constructor(
    readonly url: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Could not retrieve ${url} in ${attempts} tries`, { cause });
  }
}

export class MemberNotFoundError extends EnsureCondaError {
  readonly code = "MEMBER_NOT_FOUND" as const;

  constructor(
    readonly memberNames: readonly string[],
    readonly url: string,
  ) {
    super(`Could not find ${memberNames.join(" or ")} in ${url}`);
  }
}

export type ArchiveErrorCode = "UNSUPPORTED_ARCHIVE" | "INVALID_ARCHIVE";

export class ArchiveError extends EnsureCondaError {
  readonly code: ArchiveErrorCode;

  constructor(message: string, code: ArchiveErrorCode, cause?: unknown) {
    super(message, { cause });
    this.code = code;
  }
}

export class ReplaceFailedError extends EnsureCondaError {
  readonly code = "REPLACE_FAILED" as const;

  constructor(
    readonly target: string,
    cause?: unknown,
  ) {
    super(`Could not remove existing executable ${target} for replacement`, {
      cause,
    });
  }
}

export class ProcessInvocationError extends EnsureCondaError {
  readonly code = "PROCESS_INVOCATION_FAILED" as const;

  constructor(
    readonly executable: string,
    cause?: unknown,
  ) {
    super(`Failed to run ${executable}: ${getErrorMessage(cause)}`, { cause });
  }
}

export class InvalidConfigurationError extends EnsureCondaError {
  readonly code = "INVALID_CONFIGURATION" as const;
}

/**
 * Extract a message from anything that was thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
