/**
 * ensure-conda Engine — Probe Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  isExecutableFile,
  isShimDirectory,
  probeExecutables,
  searchPathDirectories,
  whichNoShims,
  ProbeContext,
} from "../src/probe";
import { Candidate, ToolKind } from "../src/types";
import { isWin, makeTempDir, removeDir, writeScript } from "./helpers";

async function collect(kind: ToolKind, context: ProbeContext): Promise<Candidate[]> {
  const out: Candidate[] = [];
  for await (const candidate of probeExecutables(kind, context)) {
    out.push(candidate);
  }
  return out;
}

// ─── Search path ─────────────────────────────────────────────────

describe("searchPathDirectories", () => {
  it("splits PATH and maps empty entries to the current directory", () => {
    expect(searchPathDirectories({ env: { PATH: "/a::/b" }, platform: "linux" })).toEqual([
      "/a",
      ".",
      "/b",
    ]);
  });

  it("returns nothing for an empty PATH", () => {
    expect(searchPathDirectories({ env: {}, platform: "linux" })).toEqual([]);
  });

  it("drops pyenv shim directories", () => {
    expect(
      searchPathDirectories({
        env: { PATH: "/home/u/.pyenv/shims:/usr/bin" },
        platform: "linux",
      }),
    ).toEqual(["/usr/bin"]);
  });

  it("reads Path on Windows when PATH is missing", () => {
    expect(
      searchPathDirectories({
        env: { Path: "C:\\Users\\u\\.pyenv\\shims;C:\\tools" },
        platform: "win32",
      }),
    ).toEqual(["C:\\tools"]);
  });
});

describe("isShimDirectory", () => {
  it("matches the shim segment pair only", () => {
    expect(isShimDirectory("/home/u/.pyenv/shims", "linux")).toBe(true);
    expect(isShimDirectory("/home/u/.pyenv/versions/3.12/bin", "linux")).toBe(false);
  });
});

// ─── Filesystem checks ───────────────────────────────────────────

describe("isExecutableFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("exec");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("rejects missing files and directories", async () => {
    expect(await isExecutableFile(path.join(dir, "missing"), { env: {}, platform: "linux" })).toBe(
      false,
    );
    expect(await isExecutableFile(dir, { env: {}, platform: "linux" })).toBe(false);
  });

  it("decides by extension on Windows", async () => {
    const exe = path.join(dir, "tool.exe");
    const txt = path.join(dir, "tool.txt");
    fs.writeFileSync(exe, "");
    fs.writeFileSync(txt, "");
    const context = { env: { PATHEXT: ".COM;.EXE;.BAT" }, platform: "win32" };
    expect(await isExecutableFile(exe, context)).toBe(true);
    expect(await isExecutableFile(txt, context)).toBe(false);
  });

  it.skipIf(isWin)("requires the execute permission elsewhere", async () => {
    const plain = path.join(dir, "plain");
    fs.writeFileSync(plain, "data", { mode: 0o644 });
    const script = writeScript(dir, "script", ["hi"]);
    expect(await isExecutableFile(plain, { env: {}, platform: "linux" })).toBe(false);
    expect(await isExecutableFile(script, { env: {}, platform: "linux" })).toBe(true);
  });
});

// ─── Candidate ordering ──────────────────────────────────────────

describe.skipIf(isWin)("probeExecutables", () => {
  let root: string;
  let cacheDir: string;
  let binA: string;
  let binB: string;

  beforeEach(() => {
    root = makeTempDir("probe");
    cacheDir = path.join(root, "cache");
    binA = path.join(root, "binA");
    binB = path.join(root, "binB");
    fs.mkdirSync(cacheDir);
    fs.mkdirSync(binA);
    fs.mkdirSync(binB);
  });

  afterEach(() => {
    removeDir(root);
  });

  function context(env: NodeJS.ProcessEnv): ProbeContext {
    return { env, platform: "linux", cacheDir };
  }

  it("yields the cache before the search path", async () => {
    const cached = writeScript(cacheDir, "micromamba", ["1.5.8"]);
    const onPath = writeScript(binA, "micromamba", ["1.5.8"]);
    writeScript(binB, "micromamba", ["1.5.8"]);

    const found = await collect("micromamba", context({ PATH: `${binA}:${binB}` }));
    expect(found).toEqual([
      { path: cached, source: "cache" },
      { path: onPath, source: "path" },
    ]);
  });

  it("tries every extension in the cache before searching the path", async () => {
    const bare = writeScript(cacheDir, "conda_standalone", ["conda 24.1.2"]);
    const exe = writeScript(cacheDir, "conda_standalone.exe", ["conda 24.1.2"]);
    const onPath = writeScript(binA, "conda_standalone", ["conda 24.1.2"]);

    const found = await collect("conda-standalone", context({ PATH: binA }));
    expect(found.map((c) => c.path)).toEqual([bare, exe, onPath]);
  });

  it("puts CONDA_EXE first for conda", async () => {
    const override = writeScript(path.join(root, "elsewhere"), "conda", ["conda 23.11.0"]);
    const onPath = writeScript(binA, "conda", ["conda 23.11.0"]);

    const found = await collect("conda", context({ PATH: binA, CONDA_EXE: override }));
    expect(found).toEqual([
      { path: override, source: "env" },
      { path: onPath, source: "path" },
    ]);
  });

  it("skips a CONDA_EXE that is not executable", async () => {
    const notExecutable = path.join(root, "conda-not-exec");
    fs.writeFileSync(notExecutable, "data", { mode: 0o644 });
    const onPath = writeScript(binA, "conda", ["conda 23.11.0"]);

    const found = await collect("conda", context({ PATH: binA, CONDA_EXE: notExecutable }));
    expect(found).toEqual([{ path: onPath, source: "path" }]);
  });

  it("ignores CONDA_EXE for other tools", async () => {
    const override = writeScript(root, "mamba", ["mamba 1.5.0"]);
    const found = await collect("mamba", context({ PATH: binA, CONDA_EXE: override }));
    expect(found).toEqual([]);
  });

  it("never yields from shim directories", async () => {
    const shims = path.join(root, ".pyenv", "shims");
    writeScript(shims, "conda", ["conda 23.11.0"]);
    const real = writeScript(binB, "conda", ["conda 23.11.0"]);

    expect(await whichNoShims("conda", { env: { PATH: `${shims}:${binB}` }, platform: "linux" })).toBe(
      real,
    );
    const found = await collect("conda", context({ PATH: `${shims}:${binB}` }));
    expect(found).toEqual([{ path: real, source: "path" }]);
  });

  it("skips non-executable files on the path", async () => {
    fs.writeFileSync(path.join(binA, "mamba"), "data", { mode: 0o644 });
    const real = writeScript(binB, "mamba", ["mamba 1.5.0"]);

    const found = await collect("mamba", context({ PATH: `${binA}:${binB}` }));
    expect(found).toEqual([{ path: real, source: "path" }]);
  });

  it("yields nothing when the tool is absent", async () => {
    expect(await collect("mamba", context({ PATH: binA }))).toEqual([]);
  });
});
