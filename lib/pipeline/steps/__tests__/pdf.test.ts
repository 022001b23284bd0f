import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { extractDocument, type DocumentSource, type EmbeddedImage } from "../pdf";
import { DecodeError } from "@/lib/pipeline/errors";
import type { ProgressEvent } from "@/lib/pipeline/runner/types";

type FakePage = EmbeddedImage[] | "bad-page" | "bad-resources";

function image(name: string, content: string): EmbeddedImage {
  return { name, jpegBytes: () => Buffer.from(content) };
}

function notJpeg(name: string): EmbeddedImage {
  return {
    name,
    jpegBytes: () => {
      throw new Error("image is not stored as JPEG");
    },
  };
}

function fakeSource(pages: FakePage[]): DocumentSource & { closed: boolean } {
  return {
    closed: false,
    countPages: () => pages.length,
    loadPage(index) {
      const page = pages[index];
      if (page === "bad-page") throw new Error("broken page");
      return {
        imageResources: () => {
          if (typeof page === "string") throw new Error("broken resources");
          return page;
        },
      };
    },
    close() {
      this.closed = true;
    },
  };
}

function recorder() {
  const events: ProgressEvent[] = [];
  return { events, progress: { emit: (e: ProgressEvent) => events.push(e) } };
}

describe("extractDocument", () => {
  let outDir: string;

  beforeEach(() => {
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), "pdf-test-"));
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  const read = (name: string) => fs.readFileSync(path.join(outDir, name), "utf-8");

  it("writes images in page order, then resource order", async () => {
    const source = fakeSource([[image("Im1", "p1-a"), image("Im2", "p1-b")], [image("Im1", "p2-a")]]);

    const result = await extractDocument(source, outDir, { skipBadPages: false });

    expect(result).toEqual(["1.jpg", "2.jpg", "3.jpg"].map((n) => path.join(outDir, n)));
    expect(read("1.jpg")).toBe("p1-a");
    expect(read("2.jpg")).toBe("p1-b");
    expect(read("3.jpg")).toBe("p2-a");
  });

  it("pads names to the width of the image count", async () => {
    const page = Array.from({ length: 10 }, (_, i) => image(`Im${i + 1}`, `img-${i + 1}`));

    const result = await extractDocument(fakeSource([page]), outDir, { skipBadPages: false });

    expect(result.map((p) => path.basename(p))[0]).toBe("01.jpg");
    expect(result.map((p) => path.basename(p))[9]).toBe("10.jpg");
    expect(read("10.jpg")).toBe("img-10");
  });

  it("skips a bad page with a warning when skipBadPages is on", async () => {
    const source = fakeSource([[image("Im1", "p1")], "bad-page", [image("Im1", "p3-a"), image("Im2", "p3-b")]]);
    const { events, progress } = recorder();

    const result = await extractDocument(source, outDir, { skipBadPages: true }, progress);

    expect(result.map((p) => path.basename(p))).toEqual(["1.jpg", "2.jpg", "3.jpg"]);
    expect(read("1.jpg")).toBe("p1");
    expect(read("2.jpg")).toBe("p3-a");
    expect(read("3.jpg")).toBe("p3-b");
    expect(events.filter((e) => e.type === "log" && e.level === "warn")).toEqual([
      { type: "log", level: "warn", message: "Failed to get PDF page 2: broken page", fields: undefined },
    ]);
  });

  it("fails on the first bad page when skipBadPages is off and writes nothing", async () => {
    const source = fakeSource([[image("Im1", "p1")], "bad-page", [image("Im1", "p3")]]);

    const promise = extractDocument(source, outDir, { skipBadPages: false });

    await expect(promise).rejects.toBeInstanceOf(DecodeError);
    await expect(promise).rejects.toMatchObject({ detail: { kind: "pdf-page-failed", page: 2 } });
    expect(fs.readdirSync(outDir)).toEqual([]);
  });

  it("treats unresolvable resources like a bad page", async () => {
    const source = fakeSource([[image("Im1", "p1")], "bad-resources"]);
    const { events, progress } = recorder();

    const result = await extractDocument(source, outDir, { skipBadPages: true }, progress);
    expect(result.map((p) => path.basename(p))).toEqual(["1.jpg"]);
    expect(events).toContainEqual({
      type: "log",
      level: "warn",
      message: "Failed to get resources of PDF page 2: broken resources",
      fields: undefined,
    });

    await expect(
      extractDocument(fakeSource([[image("Im1", "p1")], "bad-resources"]), outDir, { skipBadPages: false })
    ).rejects.toMatchObject({ detail: { kind: "pdf-resources-failed", page: 2 } });
  });

  it("drops images not stored as JPEG without leaving gaps", async () => {
    const source = fakeSource([[image("Im1", "a"), notJpeg("Im2"), image("Im3", "b")]]);
    const { events, progress } = recorder();

    const result = await extractDocument(source, outDir, { skipBadPages: false }, progress);

    expect(result.map((p) => path.basename(p))).toEqual(["1.jpg", "2.jpg"]);
    expect(read("2.jpg")).toBe("b");
    expect(events).toContainEqual({
      type: "log",
      level: "debug",
      message: "Skipping image that is not stored as JPEG",
      fields: { page: 1, name: "Im2", error: "image is not stored as JPEG" },
    });
  });

  it("reports the image count at info level", async () => {
    const { events, progress } = recorder();

    await extractDocument(fakeSource([[image("Im1", "a")], []]), outDir, { skipBadPages: false }, progress);

    expect(events).toContainEqual({
      type: "log",
      level: "info",
      message: "Extracting 1 images from PDF...",
      fields: undefined,
    });
  });

  it("returns an empty list for a document without images", async () => {
    await expect(extractDocument(fakeSource([[], []]), outDir, { skipBadPages: false })).resolves.toEqual([]);
    expect(fs.readdirSync(outDir)).toEqual([]);
  });

  it("fails with output-file-write-failed when the output directory is gone", async () => {
    const gone = path.join(outDir, "gone");

    await expect(
      extractDocument(fakeSource([[image("Im1", "a")]]), gone, { skipBadPages: false })
    ).rejects.toMatchObject({
      detail: { kind: "output-file-write-failed", page: 1, path: path.join(gone, "1.jpg") },
    });
  });
});
