import cp437 from "./cp437.json";

/** General purpose bit 11: name and comment are UTF-8. */
const UTF8_FLAG = 0x800;

const CP437_HIGH = cp437.high.join("");

export function decodeCp437(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte < 0x80 ? String.fromCharCode(byte) : CP437_HIGH[byte - 0x80];
  }
  return out;
}

/**
 * Decode a raw entry name. Invalid UTF-8 sequences become U+FFFD rather than
 * failing here, so callers decide whether the entry matters.
 */
export function decodeEntryName(raw: Uint8Array, generalPurposeBitFlag: number): string {
  return (generalPurposeBitFlag & UTF8_FLAG) !== 0 ? new TextDecoder("utf-8").decode(raw) : decodeCp437(raw);
}

/**
 * Reduce an entry name to plain relative segments joined by "/": anything
 * after a NUL is dropped, backslashes count as separators, and root, drive,
 * "." and ".." parts are removed.
 */
export function sanitizeEntryName(name: string): string {
  const [beforeNul] = name.split("\0");
  return beforeNul
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment, i) => segment !== "" && segment !== "." && segment !== ".." && !(i === 0 && /^[A-Za-z]:$/.test(segment)))
    .join("/");
}
