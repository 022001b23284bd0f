/**
 * Runner layer types.
 *
 * The extractors never log globally; they emit events on an injected
 * Progress so callers decide where output goes.
 */

import type { AppConfig } from "../../config";

// ============================================================================
// Progress Interface
// ============================================================================

export type LogLevel = AppConfig["log_level"];

export type LogFields = Record<string, string | number | boolean>;

export type ProgressEvent =
  | { type: "log"; level: LogLevel; message: string; fields?: LogFields }
  | { type: "page-written"; page: number; totalPages: number; path: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, feed a progress bar, collect events in
 * a test, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

const LEVEL_RANK: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
};

export function isLevelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts = Object.entries(fields).map(([k, v]) => `${k}=${v}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/**
 * Console-based progress emitter for CLI usage. Warnings go to stderr;
 * everything below `minLevel` is dropped.
 */
export function createConsoleProgress(minLevel: LogLevel = "info"): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "log":
          if (!isLevelEnabled(event.level, minLevel)) return;
          if (event.level === "warn") {
            console.warn(`WARN ${event.message}${formatFields(event.fields)}`);
          } else {
            console.log(`${event.level.toUpperCase()} ${event.message}${formatFields(event.fields)}`);
          }
          break;
        case "page-written":
          if (isLevelEnabled("debug", minLevel)) {
            console.log(`DEBUG Wrote page ${event.page}/${event.totalPages} path=${event.path}`);
          }
          break;
      }
    },
  };
}

/**
 * Callback-based progress emitter that flattens events to text lines.
 */
export function createCallbackProgress(
  callback: (message: string, level: LogLevel) => void
): Progress {
  return {
    emit(event) {
      switch (event.type) {
        case "log":
          callback(`${event.message}${formatFields(event.fields)}`, event.level);
          break;
        case "page-written":
          callback(`Wrote page ${event.page}/${event.totalPages}`, "debug");
          break;
      }
    },
  };
}

/**
 * Fan one event stream out to several emitters.
 */
export function combineProgress(...targets: Progress[]): Progress {
  return {
    emit(event) {
      for (const target of targets) target.emit(event);
    },
  };
}

export function logTo(
  progress: Progress,
  level: LogLevel,
  message: string,
  fields?: LogFields
): void {
  progress.emit({ type: "log", level, message, fields });
}

// ============================================================================
// Extractor options
// ============================================================================

export interface ArchiveExtractOptions {
  /** Skip entries whose extension isn't an image */
  imagesOnly: boolean;
  /** Widen the image extension set (webp, tiff, avif, ...) */
  acceptExtendedFormats: boolean;
  /** Plain code point ordering instead of natural ordering */
  simpleSorting: boolean;
}

export interface DocumentExtractOptions {
  /** Downgrade per-page failures to warnings */
  skipBadPages: boolean;
}

export function archiveOptionsFrom(config: AppConfig): ArchiveExtractOptions {
  return {
    imagesOnly: config.extract_images_only,
    acceptExtendedFormats: config.accept_extended_image_formats,
    simpleSorting: config.simple_sorting,
  };
}

export function documentOptionsFrom(config: AppConfig): DocumentExtractOptions {
  return { skipBadPages: config.skip_bad_pdf_pages };
}
