/**
 * ensure-conda CLI — Configuration
 *
 * Defaults for the command-line front end. Engine settings (cache
 * directory, channel, timings) come from the engine's own loadConfig().
 */

export const PROGRAM_NAME = "ensureconda";

export const CLI_VERSION = "0.1.0";

/** Oldest conda accepted unless --min-conda-version says otherwise */
export const DEFAULT_MIN_CONDA_VERSION = "4.8.2";

/** Oldest mamba / micromamba accepted unless --min-mamba-version says otherwise */
export const DEFAULT_MIN_MAMBA_VERSION = "0.7.3";

export const MAX_VERBOSITY = 3;

export const EXIT_CODES = {
  found: 0,
  notFound: 1,
  error: 2,
} as const;
