import { describe, it, expect } from "vitest";
import { decodeCp437, decodeEntryName, sanitizeEntryName } from "../entry-name";

describe("decodeEntryName", () => {
  it("reads UTF-8 when the flag is set", () => {
    expect(decodeEntryName(new Uint8Array([0xc3, 0xa9, 0x2e, 0x70, 0x6e, 0x67]), 0x800)).toBe("\u00e9.png");
  });

  it("turns malformed UTF-8 into replacement characters", () => {
    expect(decodeEntryName(new Uint8Array([0xff, 0x2e, 0x70, 0x6e, 0x67]), 0x800)).toBe("\uFFFD.png");
  });

  it("reads CP437 otherwise", () => {
    expect(decodeEntryName(new Uint8Array([0x82, 0x2e, 0x70, 0x6e, 0x67]), 0)).toBe("\u00e9.png");
  });
});

describe("decodeCp437", () => {
  it("maps the upper half through the code page", () => {
    expect(decodeCp437(new Uint8Array([0x41, 0x80, 0x9c, 0xe1, 0xff]))).toBe("A\u00c7\u00a3\u00df\u00a0");
  });
});

describe("sanitizeEntryName", () => {
  it("keeps plain relative paths", () => {
    expect(sanitizeEntryName("ch1/p01.png")).toBe("ch1/p01.png");
  });

  it("drops root, drive, dot and parent parts", () => {
    expect(sanitizeEntryName("/notes.txt")).toBe("notes.txt");
    expect(sanitizeEntryName("C:\\scans\\p1.png")).toBe("scans/p1.png");
    expect(sanitizeEntryName("../../etc/./p2.png")).toBe("etc/p2.png");
    expect(sanitizeEntryName("a//b.png")).toBe("a/b.png");
  });

  it("cuts the name at a NUL", () => {
    expect(sanitizeEntryName("p1.png\0.exe")).toBe("p1.png");
  });

  it("can reduce a name to nothing", () => {
    expect(sanitizeEntryName("../")).toBe("");
  });
});
