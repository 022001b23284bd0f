/**
 * Archive Extraction Step
 *
 * Pulls page images out of a ZIP/CBZ archive in two phases:
 * 1. Stream every qualifying entry into a temp file in the output directory
 * 2. Sort the staged pages by their path in the archive and rename them to
 *    the zero-padded sequence (1.png, 2.png, ...)
 *
 * Archive order rarely matches reading order, and the temp names keep an
 * entry's own name from colliding with a final name.
 *
 * On failure, temp and final files already written are left in place.
 */

import { randomBytes } from "node:crypto";
import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import { fileExtension, hasImageExtension } from "../../formats";
import { DecodeError } from "../errors";
import { comparatorFor } from "../natural-sort";
import { pageFileName } from "../sequence";
import { decodeEntryName, sanitizeEntryName } from "./entry-name";
import {
  logTo,
  nullProgress,
  type ArchiveExtractOptions,
  type Progress,
} from "../runner/types";

// ============================================================================
// Types
// ============================================================================

/** A page copied out of the archive but not yet given its final name. */
export interface StagedPage {
  pathInArchive: string;
  stagedPath: string;
  extension?: string;
}

// ============================================================================
// yauzl helpers
// ============================================================================

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

function openZip(inputPath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(
      inputPath,
      { lazyEntries: true, autoClose: false, decodeStrings: false },
      (err, zipfile) => {
        if (err) {
          reject(
            new DecodeError(
              isErrnoException(err)
                ? { kind: "zip-open-failed", path: inputPath }
                : { kind: "invalid-zip", path: inputPath },
              { cause: err }
            )
          );
          return;
        }
        resolve(zipfile);
      }
    );
  });
}

/**
 * Read the next entry, or `null` once the central directory is exhausted.
 */
function nextEntry(zipfile: ZipFile, index: number): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      zipfile.removeListener("entry", onEntry);
      zipfile.removeListener("end", onEnd);
      zipfile.removeListener("error", onError);
    };
    const onEntry = (entry: Entry) => {
      cleanup();
      resolve(entry);
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new DecodeError({ kind: "zip-entry-failed", index }, { cause: err }));
    };

    zipfile.on("entry", onEntry);
    zipfile.on("end", onEnd);
    zipfile.on("error", onError);
    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry, index: number): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err) {
        reject(new DecodeError({ kind: "zip-entry-failed", index }, { cause: err }));
        return;
      }
      resolve(stream);
    });
  });
}

/** Entry name as stored; yauzl hands out raw bytes with `decodeStrings: false`. */
function entryName(entry: Entry): string {
  const raw: unknown = entry.fileName;
  return Buffer.isBuffer(raw) ? decodeEntryName(raw, entry.generalPurposeBitFlag) : String(raw);
}

function isDirectoryName(name: string): boolean {
  return name.endsWith("/") || name.endsWith("\\");
}

// ============================================================================
// Phase 1: staging
// ============================================================================

function stagedFileName(ordinal: number): string {
  return `.pagecrate-${ordinal}-${randomBytes(4).toString("hex")}.tmp`;
}

async function stageEntry(
  zipfile: ZipFile,
  entry: Entry,
  index: number,
  pathInArchive: string,
  stagedPath: string
): Promise<void> {
  const readStream = await openEntryStream(zipfile, entry, index);

  let handle: FileHandle;
  try {
    handle = await fs.open(stagedPath, "wx");
  } catch (err) {
    readStream.destroy();
    throw new DecodeError({ kind: "output-file-create-failed", path: stagedPath }, { cause: err });
  }

  try {
    await pipeline(readStream, handle.createWriteStream());
  } catch (err) {
    throw new DecodeError(
      { kind: "zip-entry-copy-failed", pathInArchive, stagedPath },
      { cause: err }
    );
  }
}

async function stageEntries(
  zipfile: ZipFile,
  outputDir: string,
  options: ArchiveExtractOptions,
  progress: Progress
): Promise<StagedPage[]> {
  const total = zipfile.entryCount;
  const pages: StagedPage[] = [];

  for (let index = 0; ; index++) {
    logTo(progress, "trace", `Retrieving ZIP entry with ID ${index}...`);
    const entry = await nextEntry(zipfile, index);
    if (!entry) break;

    const name = entryName(entry);
    const pathInArchive = sanitizeEntryName(name);
    if (isDirectoryName(name) || pathInArchive === "") continue;

    if (options.imagesOnly && !hasImageExtension(pathInArchive, options.acceptExtendedFormats)) {
      logTo(progress, "trace", `Ignoring file ${index + 1}/${total} based on extension`, {
        path: pathInArchive,
      });
      continue;
    }

    if (pathInArchive.includes("\uFFFD")) {
      throw new DecodeError({ kind: "invalid-entry-name-encoding", pathInArchive });
    }

    const stagedPath = path.join(outputDir, stagedFileName(pages.length));
    logTo(progress, "debug", `Extracting file ${index + 1} out of ${total}...`, {
      path: pathInArchive,
    });
    await stageEntry(zipfile, entry, index, pathInArchive, stagedPath);

    pages.push({ pathInArchive, stagedPath, extension: fileExtension(pathInArchive) });
  }

  return pages;
}

// ============================================================================
// Phase 2: ordering and renaming
// ============================================================================

/**
 * Stable-sort staged pages into reading order.
 */
export function orderStagedPages(pages: StagedPage[], simpleSorting: boolean): StagedPage[] {
  const compare = comparatorFor(simpleSorting);
  return [...pages].sort((a, b) => compare(a.pathInArchive, b.pathInArchive));
}

async function renameStagedPages(
  pages: StagedPage[],
  outputDir: string,
  progress: Progress
): Promise<string[]> {
  const extracted: string[] = [];

  logTo(progress, "debug", "Renaming pictures...");

  for (const [i, page] of pages.entries()) {
    const target = path.join(outputDir, pageFileName(i, pages.length, page.extension));
    logTo(progress, "trace", `Renaming picture ${i + 1}/${pages.length}...`);

    try {
      await fs.rename(page.stagedPath, target);
    } catch (err) {
      throw new DecodeError({ kind: "rename-failed", from: page.stagedPath, to: target }, { cause: err });
    }

    extracted.push(target);
    progress.emit({ type: "page-written", page: i + 1, totalPages: pages.length, path: target });
  }

  return extracted;
}

// ============================================================================
// Main extraction function
// ============================================================================

/**
 * Extract the pages of a ZIP/CBZ archive into `outputDir`.
 *
 * @returns Output paths in reading order
 */
export async function extractArchive(
  inputPath: string,
  outputDir: string,
  options: ArchiveExtractOptions,
  progress: Progress = nullProgress
): Promise<string[]> {
  logTo(progress, "trace", "Opening ZIP archive...");
  const zipfile = await openZip(inputPath);

  let staged: StagedPage[];
  try {
    staged = await stageEntries(zipfile, outputDir, options, progress);
  } finally {
    zipfile.close();
  }

  logTo(progress, "trace", "Sorting pages...");
  const ordered = orderStagedPages(staged, options.simpleSorting);

  return renameStagedPages(ordered, outputDir, progress);
}
