import { describe, it, expect, vi, afterEach } from "vitest";
import {
  archiveOptionsFrom,
  combineProgress,
  createCallbackProgress,
  createConsoleProgress,
  documentOptionsFrom,
  formatFields,
  isLevelEnabled,
  logTo,
  nullProgress,
  type LogLevel,
  type ProgressEvent,
} from "../types";
import { defaultConfig } from "@/lib/config";

describe("isLevelEnabled", () => {
  it("passes levels at or above the minimum", () => {
    expect(isLevelEnabled("warn", "info")).toBe(true);
    expect(isLevelEnabled("info", "info")).toBe(true);
    expect(isLevelEnabled("debug", "info")).toBe(false);
    expect(isLevelEnabled("trace", "trace")).toBe(true);
  });
});

describe("formatFields", () => {
  it("renders key=value pairs after a space", () => {
    expect(formatFields({ path: "a.png", page: 2, ok: true })).toBe(" path=a.png page=2 ok=true");
  });

  it("renders nothing without fields", () => {
    expect(formatFields()).toBe("");
    expect(formatFields({})).toBe("");
  });
});

describe("createConsoleProgress", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints enabled levels and drops the rest", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const progress = createConsoleProgress("info");

    logTo(progress, "debug", "hidden");
    logTo(progress, "info", "Extracting 3 images from PDF...");
    logTo(progress, "warn", "Failed to get PDF page 2", { page: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("INFO Extracting 3 images from PDF...");
    expect(warn).toHaveBeenCalledWith("WARN Failed to get PDF page 2 page=2");
  });

  it("prints written pages at debug", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    const event: ProgressEvent = { type: "page-written", page: 1, totalPages: 2, path: "/out/1.png" };
    createConsoleProgress("info").emit(event);
    createConsoleProgress("debug").emit(event);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("DEBUG Wrote page 1/2 path=/out/1.png");
  });
});

describe("createCallbackProgress", () => {
  it("flattens events into messages", () => {
    const seen: [string, LogLevel][] = [];
    const progress = createCallbackProgress((message, level) => seen.push([message, level]));

    logTo(progress, "trace", "Ignoring file 1/3 based on extension", { path: "notes.txt" });
    progress.emit({ type: "page-written", page: 3, totalPages: 4, path: "/out/3.png" });

    expect(seen).toEqual([
      ["Ignoring file 1/3 based on extension path=notes.txt", "trace"],
      ["Wrote page 3/4", "debug"],
    ]);
  });
});

describe("combineProgress", () => {
  it("forwards every event to each target", () => {
    const a: ProgressEvent[] = [];
    const b: ProgressEvent[] = [];
    const progress = combineProgress({ emit: (e) => a.push(e) }, nullProgress, { emit: (e) => b.push(e) });

    logTo(progress, "info", "hello");

    expect(a).toEqual([{ type: "log", level: "info", message: "hello", fields: undefined }]);
    expect(b).toEqual(a);
  });
});

describe("extractor options", () => {
  it("are derived from config", () => {
    const config = { ...defaultConfig(), extract_images_only: false, simple_sorting: true, skip_bad_pdf_pages: true };

    expect(archiveOptionsFrom(config)).toEqual({
      imagesOnly: false,
      acceptExtendedFormats: false,
      simpleSorting: true,
    });
    expect(documentOptionsFrom(config)).toEqual({ skipBadPages: true });
  });
});
