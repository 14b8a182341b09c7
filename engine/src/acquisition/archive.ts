/**
 * Archive member extraction.
 *
 * Only one executable is ever needed from a package, so members are read
 * straight into memory instead of being unpacked to disk.
 *
 * Supported inputs:
 * - .tar.bz2 (and the micromamba ".../latest" endpoint, which serves one)
 * - .conda: a zip holding pkg-*.tar.zst and info-*.tar.zst
 */

import * as tar from "tar";
import bz2 from "unbzip2-stream";
import yauzl from "yauzl";
import { decompress as zstdDecompress } from "fzstd";
import { ArchiveError, MemberNotFoundError, getErrorMessage } from "../errors";

/**
 * Interface for pulling one member out of a downloaded archive.
 */
export interface ArchiveExtractor {
  /**
   * @param archive - Raw archive bytes
   * @param url - Where the archive came from; selects the format
   * @param memberNames - Accepted member paths; the first one in archive order wins
   * @throws MemberNotFoundError when none of the members is present
   * @throws ArchiveError on unsupported or corrupt archives
   */
  extractMember(
    archive: Buffer,
    url: string,
    memberNames: readonly string[],
  ): Promise<Buffer>;
}

export type ArchiveType = "tar.bz2" | "conda";

export function inferArchiveType(url: string): ArchiveType | null {
  const pathname = new URL(url).pathname;
  if (pathname.endsWith("/latest") || pathname.endsWith(".tar.bz2")) {
    return "tar.bz2";
  }
  if (pathname.endsWith(".conda")) {
    return "conda";
  }
  return null;
}

function normalizeMemberName(name: string): string {
  return name.replace(/^\.\//, "");
}

/**
 * Read one member of an uncompressed tarball. Resolves null when absent.
 */
export function extractTarMember(
  tarball: Buffer,
  memberNames: readonly string[],
): Promise<Buffer | null> {
  const wanted = new Set(memberNames.map(normalizeMemberName));

  return new Promise<Buffer | null>((resolve, reject) => {
    let found: Buffer | null = null;
    const parser = new tar.Parser({ strict: true });

    parser.on("entry", (entry: tar.ReadEntry) => {
      const isFile = entry.type === "File" || entry.type === "OldFile";
      if (found !== null || !isFile || !wanted.has(normalizeMemberName(entry.path))) {
        entry.resume();
        return;
      }
      const chunks: Buffer[] = [];
      entry.on("data", (chunk: Buffer) => chunks.push(chunk));
      entry.on("end", () => {
        found = Buffer.concat(chunks);
      });
    });
    parser.on("error", (err: Error) => {
      reject(new ArchiveError(`Invalid tar data: ${err.message}`, "INVALID_ARCHIVE", err));
    });
    parser.on("end", () => resolve(found));

    parser.end(tarball);
  });
}

function decompressBzip2(data: Buffer): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const stream = bz2();
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.on("end", () => resolve(Buffer.concat(chunks)));
    stream.on("error", (err: Error) => {
      reject(new ArchiveError(`Invalid bzip2 data: ${err.message}`, "INVALID_ARCHIVE", err));
    });
    stream.end(data);
  });
}

function decompressZstd(data: Buffer): Buffer {
  try {
    return Buffer.from(zstdDecompress(new Uint8Array(data)));
  } catch (err: unknown) {
    throw new ArchiveError(
      `Invalid zstd data: ${getErrorMessage(err)}`,
      "INVALID_ARCHIVE",
      err,
    );
  }
}

/**
 * Read the payload tarball (pkg-*.tar.zst) out of a .conda zip.
 */
function readCondaPayload(archive: Buffer): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const invalid = (message: string, cause?: unknown) =>
      reject(new ArchiveError(message, "INVALID_ARCHIVE", cause));

    yauzl.fromBuffer(archive, { lazyEntries: true }, (err, zipfile) => {
      if (err) {
        invalid(`Invalid .conda archive: ${err.message}`, err);
        return;
      }

      let matched = false;
      zipfile.on("entry", (entry: yauzl.Entry) => {
        if (!(entry.fileName.startsWith("pkg-") && entry.fileName.endsWith(".tar.zst"))) {
          zipfile.readEntry();
          return;
        }
        matched = true;
        zipfile.openReadStream(entry, (streamErr, readStream) => {
          if (streamErr) {
            invalid(`Failed to read ${entry.fileName}: ${streamErr.message}`, streamErr);
            return;
          }
          const chunks: Buffer[] = [];
          readStream.on("data", (chunk: Buffer) => chunks.push(chunk));
          readStream.on("end", () => {
            zipfile.close();
            resolve(Buffer.concat(chunks));
          });
          readStream.on("error", (readErr: Error) =>
            invalid(`Failed to read ${entry.fileName}: ${readErr.message}`, readErr),
          );
        });
      });
      zipfile.on("end", () => {
        if (!matched) {
          invalid("Could not find a pkg-*.tar.zst payload in the .conda archive");
        }
      });
      zipfile.on("error", (zipErr: Error) =>
        invalid(`Error reading .conda archive: ${zipErr.message}`, zipErr),
      );
      zipfile.readEntry();
    });
  });
}

/**
 * Extractor for the two package formats conda channels serve.
 */
export class PackageArchiveExtractor implements ArchiveExtractor {
  async extractMember(
    archive: Buffer,
    url: string,
    memberNames: readonly string[],
  ): Promise<Buffer> {
    const type = inferArchiveType(url);
    let tarball: Buffer;
    switch (type) {
      case "tar.bz2":
        tarball = await decompressBzip2(archive);
        break;
      case "conda":
        tarball = decompressZstd(await readCondaPayload(archive));
        break;
      default:
        throw new ArchiveError(
          `Unrecognized archive type for URL: ${url}`,
          "UNSUPPORTED_ARCHIVE",
        );
    }

    const member = await extractTarMember(tarball, memberNames);
    if (member === null) {
      throw new MemberNotFoundError(memberNames, url);
    }
    return member;
  }
}
