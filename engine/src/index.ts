/**
 * ensure-conda Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Resolution
export {
  CondaResolver,
  ensureConda,
  type EnsureCondaOptions,
  type ResolverOptions,
} from "./resolver";

// Types
export {
  TOOL_DEFINITIONS,
  TOOL_PRIORITY,
  isInstallable,
  type Candidate,
  type CandidateSource,
  type InstallableToolKind,
  type ResolveRequest,
  type ResolverEvent,
  type ResolverEventHandler,
  type ToolDefinition,
  type ToolKind,
  type VersionConstraint,
} from "./types";

// Discovery and version checks
export {
  probeExecutables,
  searchPathDirectories,
  whichNoShims,
  isExecutableFile,
  type ProbeContext,
} from "./probe";
export {
  createCommandRunner,
  gateFor,
  satisfies,
  versionOf,
  parseCondaVersionOutput,
  parseMambaVersionOutput,
  parseMicromambaVersionOutput,
  type CommandRunner,
  type VersionGate,
} from "./version-gate";

// Acquisition
export * from "./acquisition";

// Platform and configuration
export {
  executableExtensions,
  exeSuffix,
  isWindows,
  platformSubdir,
  pointerBits,
} from "./platform";
export {
  APP_NAME,
  DEFAULT_CONDA_STANDALONE_CHANNEL,
  loadConfig,
  userDataDir,
  validateChannelName,
  type EnsureCondaConfig,
} from "./config";

// Errors
export {
  EnsureCondaError,
  ArchiveError,
  InvalidConfigurationError,
  MemberNotFoundError,
  NoCandidatesFoundError,
  ProcessInvocationError,
  RemoteError,
  ReplaceFailedError,
  RetriesExhaustedError,
  UnsupportedPlatformError,
  getErrorMessage,
  type EnsureCondaErrorCode,
} from "./errors";

// Utilities
export {
  createLogger,
  levelForVerbosity,
  type LogLevel,
  type Logger,
} from "./utils/logger";
export {
  compareVersions,
  formatVersion,
  parseVersion,
  type Version,
} from "./utils/semver";
