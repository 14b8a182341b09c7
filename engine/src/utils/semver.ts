/**
 * ensure-conda Engine — Version Utilities
 *
 * Parsing and total ordering for the versions reported by conda, mamba and
 * micromamba, and for the versions of remote conda-standalone packages.
 *
 * Handles the quirks seen in the wild: "v" prefix, whitespace, missing
 * minor/patch components ("4.8" == "4.8.0"), more than three release
 * components ("1.2.3.4"), attached pre-release tags ("23.11.0rc1",
 * "2.0.0-beta.3"), post and dev releases ("24.1.2.post1", "1.0.dev2")
 * and build metadata ("1.2.3+local").
 *
 * Ordering follows package-index precedence:
 *   dev < alpha/beta/rc < release < post
 */

export interface Version {
  major: number;
  minor: number;
  patch: number;
  /** Release components after the third, e.g. [4] for "1.2.3.4" */
  extra: number[];
  /** Identifiers after the release numbers: pre-, post- or dev-release tag */
  suffix: string[];
  /** Build metadata, ignored for ordering */
  build: string[];
}

const VERSION_PATTERN =
  /^(\d+(?:\.\d+)*)(?:[-_.]?([0-9A-Za-z][0-9A-Za-z.-]*))?(?:\+([0-9A-Za-z][0-9A-Za-z.-]*))?$/;

const PHASE_DEV = 0;
const PHASE_PRE = 1;
const PHASE_RELEASE = 2;
const PHASE_POST = 3;

const POST_RELEASE_TAGS = new Set(["post", "rev", "r"]);

/** Spellings that sort as the same pre-release tag */
const TAG_ALIASES: Record<string, string> = {
  alpha: "a",
  beta: "b",
  c: "rc",
  pre: "rc",
  preview: "rc",
};

/** Stands in for an unparsable version; every positive minimum rejects it */
export function zeroVersion(): Version {
  return { major: 0, minor: 0, patch: 0, extra: [], suffix: [], build: [] };
}

/**
 * Strip leading "v" or "V" and trim whitespace.
 *
 *   "v24.12.0"  → "24.12.0"
 *   " V1.2.3 "  → "1.2.3"
 */
export function normalizeSemver(version: string): string {
  return version.trim().replace(/^[vV]/, "");
}

/** "rc1" → ["rc", "1"], "beta.3" → ["beta", "3"] */
function splitSuffix(part: string | undefined): string[] {
  if (!part) return [];
  return part.match(/\d+|[A-Za-z]+/g) ?? [];
}

function splitBuild(part: string | undefined): string[] {
  if (!part) return [];
  return part.split(/[.-]/).filter((id) => id.length > 0);
}

/**
 * Parse a version string. Returns null if it cannot be parsed.
 *
 * Accepts:
 *   "1.2.3", "v1.2.3", "1.0" (patch defaults to 0), "24" (minor and patch 0),
 *   "1.2.3.4", "23.11.0rc1", "2.0.0-beta.3", "24.1.2.post1",
 *   "1.2.3+build.5"
 */
export function parseVersion(version: string): Version | null {
  const match = normalizeSemver(version).match(VERSION_PATTERN);
  if (!match) return null;

  const [major, minor = 0, patch = 0, ...extra] = match[1]
    .split(".")
    .map((part) => parseInt(part, 10));
  return {
    major,
    minor,
    patch,
    extra,
    suffix: splitSuffix(match[2]),
    build: splitBuild(match[3]),
  };
}

/**
 * Parse, falling back to 0.0.0.
 */
export function parseVersionOrZero(version: string): Version {
  return parseVersion(version) ?? zeroVersion();
}

function compareNumbers(a: number, b: number): -1 | 0 | 1 {
  if (a === b) return 0;
  return a > b ? 1 : -1;
}

function compareRelease(a: Version, b: Version): -1 | 0 | 1 {
  const head =
    compareNumbers(a.major, b.major) ||
    compareNumbers(a.minor, b.minor) ||
    compareNumbers(a.patch, b.patch);
  if (head !== 0) return head;

  const length = Math.max(a.extra.length, b.extra.length);
  for (let i = 0; i < length; i++) {
    const cmp = compareNumbers(a.extra[i] ?? 0, b.extra[i] ?? 0);
    if (cmp !== 0) return cmp;
  }
  return 0;
}

function phaseOf(suffix: string[]): number {
  if (suffix.length === 0) return PHASE_RELEASE;
  const head = suffix[0].toLowerCase();
  if (head === "dev") return PHASE_DEV;
  if (POST_RELEASE_TAGS.has(head)) return PHASE_POST;
  return PHASE_PRE;
}

function canonicalTag(id: string): string {
  const lower = id.toLowerCase();
  return TAG_ALIASES[lower] ?? lower;
}

function compareIdentifiers(a: string, b: string): -1 | 0 | 1 {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) return compareNumbers(parseInt(a, 10), parseInt(b, 10));
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  const ca = canonicalTag(a);
  const cb = canonicalTag(b);
  if (ca === cb) return 0;
  return ca > cb ? 1 : -1;
}

/**
 * Compare two parsed versions.
 *
 * Returns -1 if a < b, 0 if equal, 1 if a > b. Missing release components
 * count as zero; build metadata is not compared.
 */
export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  const release = compareRelease(a, b);
  if (release !== 0) return release;

  const phase = compareNumbers(phaseOf(a.suffix), phaseOf(b.suffix));
  if (phase !== 0) return phase;

  const shared = Math.min(a.suffix.length, b.suffix.length);
  for (let i = 0; i < shared; i++) {
    const cmp = compareIdentifiers(a.suffix[i], b.suffix[i]);
    if (cmp !== 0) return cmp;
  }
  return compareNumbers(a.suffix.length, b.suffix.length);
}

export function formatVersion(version: Version): string {
  let text = [version.major, version.minor, version.patch, ...version.extra].join(".");
  if (version.suffix.length > 0) text += `-${version.suffix.join(".")}`;
  if (version.build.length > 0) text += `+${version.build.join(".")}`;
  return text;
}
