/**
 * ensure-conda Engine — conda-standalone Candidate Tests
 */

import { describe, it, expect } from "vitest";
import {
  downloadUrlOf,
  fetchPackageFiles,
  filterCandidates,
  findCondaStandaloneCandidate,
  listingUrl,
  selectCandidate,
  PackageFile,
} from "../src/acquisition/candidates";
import { NoCandidatesFoundError, RemoteError } from "../src/errors";
import { createLogger } from "../src/utils/logger";
import { formatVersion } from "../src/utils/semver";
import { FakeHttpClient, respond } from "./helpers";

const logger = createLogger({ level: "silent" });
const retry = { logger, minWaitSeconds: 0, sleep: async () => undefined };

function file(
  version: string,
  subdir: string,
  overrides: Partial<PackageFile["attrs"]> = {},
): PackageFile {
  const build = overrides.build ?? "h0_0";
  return {
    size: 1000,
    type: "conda",
    version,
    download_url: `//api.anaconda.org/download/anaconda/conda-standalone/${version}/${subdir}/conda-standalone-${version}-${build}.tar.bz2`,
    attrs: {
      subdir,
      build,
      build_number: 0,
      timestamp: 1000,
      ...overrides,
    },
  };
}

describe("listingUrl", () => {
  it("points at the channel's conda-standalone files", () => {
    expect(listingUrl("anaconda")).toBe(
      "https://api.anaconda.org/package/anaconda/conda-standalone/files",
    );
  });
});

describe("filterCandidates", () => {
  it("keeps only the requested subdir", () => {
    const files = [file("24.1.2", "linux-64"), file("24.1.2", "osx-arm64")];
    const kept = filterCandidates(files, "linux-64", logger);
    expect(kept.map((c) => c.file.attrs.subdir)).toEqual(["linux-64"]);
  });

  it("drops onedir builds", () => {
    const files = [
      file("24.11.0", "linux-64", { build: "h_onedir_0" }),
      file("24.9.2", "linux-64"),
    ];
    const kept = filterCandidates(files, "linux-64", logger);
    expect(kept.map((c) => c.file.version)).toEqual(["24.9.2"]);
  });

  it("skips versions that cannot be parsed", () => {
    const files = [file("weird!", "linux-64"), file("4.10.3", "linux-64")];
    const kept = filterCandidates(files, "linux-64", logger);
    expect(kept.map((c) => formatVersion(c.version))).toEqual(["4.10.3"]);
  });
});

describe("selectCandidate", () => {
  it("prefers the highest version", () => {
    const kept = filterCandidates(
      [file("4.10.3", "linux-64"), file("24.1.2", "linux-64"), file("23.11.0", "linux-64")],
      "linux-64",
      logger,
    );
    expect(selectCandidate(kept, "linux-64").file.version).toBe("24.1.2");
  });

  it("prefers a post-release over the release it follows", () => {
    const kept = filterCandidates(
      [file("24.1.2", "linux-64"), file("24.1.2.post1", "linux-64"), file("24.1.1", "linux-64")],
      "linux-64",
      logger,
    );
    expect(selectCandidate(kept, "linux-64").file.version).toBe("24.1.2.post1");
  });

  it("compares release components past the third", () => {
    const kept = filterCandidates(
      [
        file("1.2.3.5", "linux-64", { build: "newer", timestamp: 1000 }),
        file("1.2.3.4", "linux-64", { build: "older", timestamp: 9000 }),
      ],
      "linux-64",
      logger,
    );
    expect(selectCandidate(kept, "linux-64").file.attrs.build).toBe("newer");
  });

  it("breaks version ties by build number, then timestamp", () => {
    const kept = filterCandidates(
      [
        file("24.1.2", "linux-64", { build: "a", build_number: 0, timestamp: 9000 }),
        file("24.1.2", "linux-64", { build: "b", build_number: 1, timestamp: 1000 }),
        file("24.1.2", "linux-64", { build: "c", build_number: 1, timestamp: 2000 }),
      ],
      "linux-64",
      logger,
    );
    expect(selectCandidate(kept, "linux-64").file.attrs.build).toBe("c");
  });

  it("fails when nothing is left", () => {
    expect(() => selectCandidate([], "linux-ppc64le")).toThrow(NoCandidatesFoundError);
    expect(() => selectCandidate([], "linux-ppc64le")).toThrow(
      "No conda-standalone package found for linux-ppc64le",
    );
  });
});

describe("downloadUrlOf", () => {
  it("adds https to protocol-relative URLs", () => {
    const [candidate] = filterCandidates([file("24.1.2", "linux-64")], "linux-64", logger);
    expect(downloadUrlOf(candidate)).toBe(
      "https://api.anaconda.org/download/anaconda/conda-standalone/24.1.2/linux-64/conda-standalone-24.1.2-h0_0.tar.bz2",
    );
  });

  it("leaves absolute URLs alone", () => {
    const absolute = { ...file("24.1.2", "linux-64"), download_url: "https://mirror.test/x.conda" };
    const [candidate] = filterCandidates([absolute], "linux-64", logger);
    expect(downloadUrlOf(candidate)).toBe("https://mirror.test/x.conda");
  });
});

describe("fetchPackageFiles", () => {
  it("parses the listing", async () => {
    const files = [file("24.1.2", "linux-64")];
    const client = new FakeHttpClient((url) => respond(url, 200, JSON.stringify(files)));
    expect(await fetchPackageFiles(client, "anaconda", retry)).toEqual(files);
  });

  it("rejects bodies that are not JSON", async () => {
    const client = new FakeHttpClient((url) => respond(url, 200, "<html>"));
    await expect(fetchPackageFiles(client, "anaconda", retry)).rejects.toBeInstanceOf(RemoteError);
  });

  it("rejects JSON of the wrong shape", async () => {
    const client = new FakeHttpClient((url) => respond(url, 200, JSON.stringify([{ version: 1 }])));
    await expect(fetchPackageFiles(client, "anaconda", retry)).rejects.toBeInstanceOf(RemoteError);
  });
});

describe("findCondaStandaloneCandidate", () => {
  it("lists the channel and returns the newest match", async () => {
    const files = [
      file("23.11.0", "osx-arm64"),
      file("24.1.2", "osx-arm64"),
      file("24.5.0", "linux-64"),
    ];
    const client = new FakeHttpClient((url) => respond(url, 200, JSON.stringify(files)));
    const chosen = await findCondaStandaloneCandidate(client, "conda-forge", "osx-arm64", retry);
    expect(client.requests).toEqual([
      "https://api.anaconda.org/package/conda-forge/conda-standalone/files",
    ]);
    expect(chosen.file.version).toBe("24.1.2");
  });
});
