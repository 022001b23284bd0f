/**
 * PDF Extraction Step
 *
 * Collects the raster images referenced from each page's resources, in
 * page order and then resource order, and writes their stored JPEG bytes
 * unchanged as 1.jpg, 2.jpg, ...
 *
 * The document is read through the DocumentSource interface so the walk
 * can run against mupdf in production and against fakes in tests.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { DecodeError } from "../errors";
import { pageFileName } from "../sequence";
import {
  logTo,
  nullProgress,
  type DocumentExtractOptions,
  type Progress,
} from "../runner/types";
import { openPdfSource } from "./mupdf-source";

// ============================================================================
// Types
// ============================================================================

/** One raster image object referenced from a page's resources. */
export interface EmbeddedImage {
  /** Resource name (e.g. "Im1"); informational only */
  name: string;
  /** The image's JPEG file as stored. Throws when it is stored any other way. */
  jpegBytes(): Uint8Array;
}

export interface DocumentPage {
  /** Image resources in resource-dictionary order. Throws if they can't be resolved. */
  imageResources(): EmbeddedImage[];
}

export interface DocumentSource {
  countPages(): number;
  /** Throws if the page can't be resolved. */
  loadPage(index: number): DocumentPage;
  close(): void;
}

interface StoredImage {
  page: number;
  bytes: Uint8Array;
}

// ============================================================================
// Collection
// ============================================================================

function handleBadPage(
  err: DecodeError,
  options: DocumentExtractOptions,
  progress: Progress
): void {
  if (!options.skipBadPages) throw err;
  logTo(progress, "warn", err.message);
}

function readImages(
  images: EmbeddedImage[],
  pageNumber: number,
  progress: Progress
): StoredImage[] {
  const stored: StoredImage[] = [];
  for (const image of images) {
    try {
      stored.push({ page: pageNumber, bytes: image.jpegBytes() });
    } catch (err) {
      logTo(progress, "debug", "Skipping image that is not stored as JPEG", {
        page: pageNumber,
        name: image.name,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return stored;
}

function collectImages(
  source: DocumentSource,
  options: DocumentExtractOptions,
  progress: Progress
): StoredImage[] {
  const collected: StoredImage[] = [];
  const totalPages = source.countPages();

  for (let i = 0; i < totalPages; i++) {
    const pageNumber = i + 1;
    logTo(progress, "trace", `Counting images from page ${pageNumber}...`);

    let page: DocumentPage;
    try {
      page = source.loadPage(i);
    } catch (err) {
      handleBadPage(new DecodeError({ kind: "pdf-page-failed", page: pageNumber }, { cause: err }), options, progress);
      continue;
    }

    let images: EmbeddedImage[];
    try {
      images = page.imageResources();
    } catch (err) {
      handleBadPage(
        new DecodeError({ kind: "pdf-resources-failed", page: pageNumber }, { cause: err }),
        options,
        progress
      );
      continue;
    }

    collected.push(...readImages(images, pageNumber, progress));
  }

  return collected;
}

// ============================================================================
// Writing
// ============================================================================

async function writeImages(
  images: StoredImage[],
  outputDir: string,
  progress: Progress
): Promise<string[]> {
  const extracted: string[] = [];

  for (const [i, image] of images.entries()) {
    const target = path.join(outputDir, pageFileName(i, images.length, "jpg"));
    logTo(progress, "debug", `Extracting page ${i + 1}/${images.length}...`, { sourcePage: image.page });

    try {
      await fs.writeFile(target, image.bytes);
    } catch (err) {
      throw new DecodeError({ kind: "output-file-write-failed", page: i + 1, path: target }, { cause: err });
    }

    extracted.push(target);
    progress.emit({ type: "page-written", page: i + 1, totalPages: images.length, path: target });
  }

  return extracted;
}

// ============================================================================
// Main extraction functions
// ============================================================================

/**
 * Extract every embedded image of `source` into `outputDir`.
 *
 * Nothing is written until all pages have been walked, so a fatal page
 * failure leaves the output directory untouched.
 */
export async function extractDocument(
  source: DocumentSource,
  outputDir: string,
  options: DocumentExtractOptions,
  progress: Progress = nullProgress
): Promise<string[]> {
  logTo(progress, "debug", "Looking for images in the provided PDF...");
  const images = collectImages(source, options, progress);

  logTo(progress, "info", `Extracting ${images.length} images from PDF...`);
  return writeImages(images, outputDir, progress);
}

/**
 * Open a PDF file with mupdf and extract its images into `outputDir`.
 */
export async function extractPdf(
  inputPath: string,
  outputDir: string,
  options: DocumentExtractOptions,
  progress: Progress = nullProgress
): Promise<string[]> {
  logTo(progress, "trace", "Opening PDF document...");
  const source = openPdfSource(inputPath);
  try {
    return await extractDocument(source, outputDir, options, progress);
  } finally {
    source.close();
  }
}
