/**
 * ensure-conda Engine — conda-standalone Candidates
 *
 * Lists the conda-standalone files published on an anaconda.org channel
 * and picks the newest one for the current platform.
 *
 * Response shape (https://api.anaconda.org/package/<channel>/conda-standalone/files):
 *   [{ size, type, version, download_url, attrs: { subdir, build, build_number, timestamp } }, ...]
 */

import { z } from "zod";
import { HttpClient } from "./http";
import { RetryOptions, requestWithRetry } from "./retry";
import { NoCandidatesFoundError, RemoteError } from "../errors";
import { Logger } from "../utils/logger";
import { Version, compareVersions, parseVersion } from "../utils/semver";

export const CONDA_STANDALONE_PACKAGE = "conda-standalone";

/**
 * Builds containing this marker are "onedir" packages whose layout lacks
 * the single-file conda.exe.
 * See https://github.com/conda/conda-standalone/issues/182
 */
export const BROKEN_BUILD_MARKER = "_onedir_";

export const PackageFileSchema = z.object({
  size: z.number(),
  type: z.string(),
  version: z.string(),
  download_url: z.string().min(1),
  attrs: z.object({
    subdir: z.string(),
    build: z.string(),
    build_number: z.number().int(),
    timestamp: z.number(),
  }),
});

export const PackageFilesSchema = z.array(PackageFileSchema);

export type PackageFile = z.infer<typeof PackageFileSchema>;

export interface DownloadCandidate {
  version: Version;
  file: PackageFile;
}

export function listingUrl(channel: string): string {
  return `https://api.anaconda.org/package/${channel}/${CONDA_STANDALONE_PACKAGE}/files`;
}

/**
 * Keep files for `subdir`, minus broken builds and unparsable versions.
 */
export function filterCandidates(
  files: PackageFile[],
  subdir: string,
  logger: Logger,
): DownloadCandidate[] {
  const candidates: DownloadCandidate[] = [];
  for (const file of files) {
    if (file.attrs.subdir !== subdir) continue;
    if (file.attrs.build.includes(BROKEN_BUILD_MARKER)) continue;

    const version = parseVersion(file.version);
    if (!version) {
      logger.warn(
        { version: file.version, subdir: file.attrs.subdir },
        "Skipping unparsable conda-standalone version",
      );
      continue;
    }
    candidates.push({ version, file });
  }
  return candidates;
}

/**
 * Order by (version, build_number, timestamp).
 */
export function compareCandidates(a: DownloadCandidate, b: DownloadCandidate): number {
  return (
    compareVersions(a.version, b.version) ||
    a.file.attrs.build_number - b.file.attrs.build_number ||
    a.file.attrs.timestamp - b.file.attrs.timestamp
  );
}

export function selectCandidate(
  candidates: DownloadCandidate[],
  subdir: string,
): DownloadCandidate {
  if (candidates.length === 0) {
    throw new NoCandidatesFoundError(CONDA_STANDALONE_PACKAGE, subdir);
  }
  return candidates.reduce((best, candidate) =>
    compareCandidates(candidate, best) > 0 ? candidate : best,
  );
}

/**
 * anaconda.org returns protocol-relative download URLs ("//api.anaconda.org/...").
 */
export function downloadUrlOf(candidate: DownloadCandidate): string {
  const url = candidate.file.download_url;
  return url.startsWith("//") ? `https:${url}` : url;
}

export async function fetchPackageFiles(
  client: HttpClient,
  channel: string,
  retry: RetryOptions,
): Promise<PackageFile[]> {
  const url = listingUrl(channel);
  const response = await requestWithRetry(client, url, retry);

  let json: unknown;
  try {
    json = JSON.parse(response.body.toString("utf8"));
  } catch {
    throw new RemoteError(`Listing at ${url} is not valid JSON`, url, response.status);
  }

  const parsed = PackageFilesSchema.safeParse(json);
  if (!parsed.success) {
    throw new RemoteError(
      `Unexpected listing format from ${url}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      url,
      response.status,
    );
  }
  return parsed.data;
}

/**
 * Newest conda-standalone for `subdir` on `channel`.
 */
export async function findCondaStandaloneCandidate(
  client: HttpClient,
  channel: string,
  subdir: string,
  retry: RetryOptions,
): Promise<DownloadCandidate> {
  const files = await fetchPackageFiles(client, channel, retry);
  const candidates = filterCandidates(files, subdir, retry.logger);
  return selectCandidate(candidates, subdir);
}
