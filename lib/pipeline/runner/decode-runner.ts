/**
 * Decode Runner
 *
 * Front door of the pipeline:
 * 1. Validate the input file and prepare the output directory
 * 2. Pick the extractor from the input's extension
 * 3. Time the extraction and report the ordered output paths
 */

import fs from "node:fs";
import path from "node:path";
import { Observable } from "rxjs";
import type { AppConfig } from "../../config";
import { DecodeError } from "../errors";
import { extractArchive } from "../steps/archive";
import { extractPdf } from "../steps/pdf";
import {
  archiveOptionsFrom,
  documentOptionsFrom,
  logTo,
  nullProgress,
  type Progress,
} from "./types";

// ============================================================================
// Format dispatch
// ============================================================================

export type InputFormat = "zip" | "pdf";

/**
 * Map the input's extension (case-insensitive) to a container format.
 */
export function resolveFormat(inputPath: string): InputFormat {
  const fileName = path.basename(inputPath);
  const ext = path.extname(fileName);
  if (ext.length <= 1) {
    throw new DecodeError({ kind: "unsupported-format", extension: "" });
  }

  const extension = ext.slice(1);
  if (extension.includes("\uFFFD")) {
    throw new DecodeError({ kind: "invalid-extension-encoding", fileName });
  }

  switch (extension.toLowerCase()) {
    case "zip":
    case "cbz":
      return "zip";
    case "pdf":
      return "pdf";
    default:
      throw new DecodeError({ kind: "unsupported-format", extension });
  }
}

function formatElapsed(ms: number): string {
  const secs = Math.floor(ms / 1000);
  const millis = String(Math.floor(ms % 1000)).padStart(3, "0");
  return `${secs}.${millis} s`;
}

function runExtractor(
  format: InputFormat,
  inputPath: string,
  outputDir: string,
  config: AppConfig,
  progress: Progress
): Promise<string[]> {
  switch (format) {
    case "zip":
      logTo(progress, "debug", "Matched input format: ZIP / CBZ");
      return extractArchive(inputPath, outputDir, archiveOptionsFrom(config), progress);
    case "pdf":
      logTo(progress, "debug", "Matched input format: PDF");
      return extractPdf(inputPath, outputDir, documentOptionsFrom(config), progress);
  }
}

async function timedExtract(
  format: InputFormat,
  inputPath: string,
  outputDir: string,
  config: AppConfig,
  progress: Progress
): Promise<string[]> {
  const started = Date.now();

  const pages = await runExtractor(format, inputPath, outputDir, config, progress);

  const elapsed = Date.now() - started;
  logTo(progress, "info", `Successfully extracted ${pages.length} pages in ${formatElapsed(elapsed)}!`, {
    pages: pages.length,
    elapsedMs: elapsed,
  });

  return pages;
}

/**
 * Extract the pages of `inputPath` into `outputDir`. Both paths must already
 * exist. Failures propagate unchanged and are not timed.
 */
export async function decodeFile(
  inputPath: string,
  outputDir: string,
  config: AppConfig,
  progress: Progress = nullProgress
): Promise<string[]> {
  return timedExtract(resolveFormat(inputPath), inputPath, outputDir, config, progress);
}

// ============================================================================
// Validation
// ============================================================================

export interface DecodeOptions {
  /** Input archive or PDF, relative to the working directory */
  input: string;
  /** Output directory; defaults to the input path without its extension */
  output?: string;
  config: AppConfig;
}

function currentDir(): string {
  try {
    return process.cwd();
  } catch (err) {
    throw new DecodeError({ kind: "cwd-unavailable" }, { cause: err });
  }
}

/** Stat `target`, or `null` if it doesn't exist. Other stat failures throw a `missing`-kind DecodeError. */
function statOrNull(
  target: string,
  missing: "input-not-found" | "output-dir-not-found"
): fs.Stats | null {
  try {
    return fs.statSync(target, { throwIfNoEntry: false }) ?? null;
  } catch (err) {
    throw new DecodeError({ kind: missing, path: target }, { cause: err });
  }
}

function createDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new DecodeError({ kind: "output-dir-create-failed", path: dir }, { cause: err });
  }
}

function validateInput(input: string): string {
  const resolved = path.resolve(currentDir(), input);
  const stat = statOrNull(resolved, "input-not-found");
  if (!stat) {
    throw new DecodeError({ kind: "input-not-found", path: resolved });
  }
  if (!stat.isFile()) {
    throw new DecodeError({ kind: "input-is-directory", path: resolved });
  }
  return resolved;
}

function prepareOutput(input: string, output: string | undefined, config: AppConfig): string {
  if (output === undefined) {
    const dir = input.slice(0, input.length - path.extname(input).length);
    createDir(dir);
    return dir;
  }

  const resolved = path.resolve(currentDir(), output);
  const stat = statOrNull(resolved, "output-dir-not-found");
  if (!stat) {
    if (!config.create_output_dir) {
      throw new DecodeError({ kind: "output-dir-not-found", path: resolved });
    }
    createDir(resolved);
  } else if (!stat.isDirectory()) {
    throw new DecodeError({ kind: "output-dir-is-file", path: resolved });
  }
  return resolved;
}

/**
 * Validate paths, then extract. Returns the created files in page order.
 *
 * The format is checked before any directory is created, so an unsupported
 * input leaves the filesystem untouched.
 */
export async function decode(
  options: DecodeOptions,
  progress: Progress = nullProgress
): Promise<string[]> {
  const input = validateInput(options.input);
  const format = resolveFormat(input);
  const outputDir = prepareOutput(input, options.output, options.config);
  return timedExtract(format, input, outputDir, options.config, progress);
}

// ============================================================================
// Observable wrapper
// ============================================================================

export type DecodeUpdate =
  | { type: "page"; page: number; totalPages: number }
  | { type: "done"; paths: string[] };

/**
 * Convenience wrapper for CLI usage: page updates while files are written,
 * then a single `done` carrying the output paths. Log events are forwarded
 * to `progress`.
 */
export function decode$(
  options: DecodeOptions,
  progress: Progress = nullProgress
): Observable<DecodeUpdate> {
  return new Observable<DecodeUpdate>((subscriber) => {
    const forward: Progress = {
      emit(event) {
        progress.emit(event);
        if (event.type === "page-written") {
          subscriber.next({ type: "page", page: event.page, totalPages: event.totalPages });
        }
      },
    };

    decode(options, forward).then(
      (paths) => {
        subscriber.next({ type: "done", paths });
        subscriber.complete();
      },
      (err: unknown) => subscriber.error(err)
    );
  });
}
