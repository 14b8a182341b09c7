/**
 * ensure-conda Engine — Acquisition Pipeline (Barrel Export)
 */

export {
  Installer,
  ARCHIVE_MEMBERS,
  MICROMAMBA_BASE_URL,
  type InstallerOptions,
} from "./installer";

export {
  NodeHttpClient,
  isSuccessStatus,
  type HttpClient,
  type HttpResponse,
} from "./http";

export {
  requestWithRetry,
  backoffSeconds,
  defaultSleep,
  type RetryOptions,
  type Sleep,
} from "./retry";

export {
  PackageArchiveExtractor,
  extractTarMember,
  inferArchiveType,
  type ArchiveExtractor,
  type ArchiveType,
} from "./archive";

export {
  BROKEN_BUILD_MARKER,
  compareCandidates,
  downloadUrlOf,
  fetchPackageFiles,
  filterCandidates,
  findCondaStandaloneCandidate,
  listingUrl,
  selectCandidate,
  type DownloadCandidate,
  type PackageFile,
} from "./candidates";

export { withLock, type LockOptions } from "./lock";

export {
  isFresh,
  writeExecutable,
  DEFAULT_FRESHNESS,
  type FreshnessWindow,
  type WriteExecutableOptions,
} from "./executable-file";
