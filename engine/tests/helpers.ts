/**
 * Shared fixtures for engine tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { HttpClient, HttpResponse } from "../src/acquisition/http";

/** Shell-script stand-ins need a POSIX shell */
export const isWin = process.platform === "win32";

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `ensure-conda-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Body of a script printing `lines` and exiting with `exitCode` */
export function scriptSource(lines: string[], exitCode = 0): string {
  return ["#!/bin/sh", ...lines.map((line) => `echo '${line}'`), `exit ${exitCode}`, ""].join(
    "\n",
  );
}

/** Write an executable script and return its path */
export function writeScript(
  dir: string,
  name: string,
  lines: string[],
  exitCode = 0,
): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, name);
  fs.writeFileSync(file, scriptSource(lines, exitCode), { mode: 0o755 });
  return file;
}

export type Route = (url: string) => HttpResponse | Error;

/**
 * In-process HttpClient serving canned responses.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: string[] = [];

  constructor(private readonly route: Route) {}

  async get(url: string): Promise<HttpResponse> {
    this.requests.push(url);
    const result = this.route(url);
    if (result instanceof Error) throw result;
    return result;
  }
}

export function respond(url: string, status: number, body: string | Buffer = ""): HttpResponse {
  return { url, status, body: Buffer.isBuffer(body) ? body : Buffer.from(body) };
}
