/**
 * Path ordering for archive entries.
 *
 * Natural order compares embedded digit runs by numeric value, so
 * "page2.png" sorts before "page10.png". Simple order compares by code
 * point only. Both work segment by segment on "/"-separated paths.
 */

export type PathComparator = (a: string, b: string) => number;

function splitSegments(key: string): string[] {
  return key.replace(/\\/g, "/").split("/");
}

function isDigit(cp: number | undefined): boolean {
  return cp !== undefined && cp >= 0x30 && cp <= 0x39;
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function codePoints(s: string): number[] {
  const out: number[] = [];
  for (const ch of s) {
    const cp = ch.codePointAt(0);
    if (cp !== undefined) out.push(cp);
  }
  return out;
}

/** Compare two strings by Unicode code point (not UTF-16 unit). */
export function compareCodePoints(a: string, b: string): number {
  const ca = codePoints(a);
  const cb = codePoints(b);
  const n = Math.min(ca.length, cb.length);
  for (let i = 0; i < n; i++) {
    if (ca[i] !== cb[i]) return sign(ca[i] - cb[i]);
  }
  return sign(ca.length - cb.length);
}

/**
 * Compare two digit runs as unsigned integers of any length.
 * Leading zeros are not significant.
 */
function compareDigitRuns(a: number[], b: number[]): number {
  let i = 0;
  while (i < a.length - 1 && a[i] === 0x30) i++;
  let j = 0;
  while (j < b.length - 1 && b[j] === 0x30) j++;
  const lenDiff = a.length - i - (b.length - j);
  if (lenDiff !== 0) return sign(lenDiff);
  for (; i < a.length; i++, j++) {
    if (a[i] !== b[j]) return sign(a[i] - b[j]);
  }
  return 0;
}

function takeDigitRun(cps: number[], start: number): number[] {
  let end = start;
  while (end < cps.length && isDigit(cps[end])) end++;
  return cps.slice(start, end);
}

/** Natural comparison of a single path segment. */
export function naturalSegmentCompare(a: string, b: string): number {
  const ca = codePoints(a);
  const cb = codePoints(b);
  let i = 0;
  let j = 0;

  while (i < ca.length && j < cb.length) {
    if (isDigit(ca[i]) && isDigit(cb[j])) {
      const runA = takeDigitRun(ca, i);
      const runB = takeDigitRun(cb, j);
      const cmp = compareDigitRuns(runA, runB);
      if (cmp !== 0) return cmp;
      i += runA.length;
      j += runB.length;
    } else {
      if (ca[i] !== cb[j]) return sign(ca[i] - cb[j]);
      i++;
      j++;
    }
  }

  return sign(ca.length - i - (cb.length - j));
}

function compareBySegments(
  a: string,
  b: string,
  segmentCompare: (x: string, y: string) => number
): number {
  const sa = splitSegments(a);
  const sb = splitSegments(b);
  const n = Math.min(sa.length, sb.length);
  for (let k = 0; k < n; k++) {
    const cmp = segmentCompare(sa[k], sb[k]);
    if (cmp !== 0) return cmp;
  }
  return sign(sa.length - sb.length);
}

export const naturalPathCompare: PathComparator = (a, b) =>
  compareBySegments(a, b, naturalSegmentCompare);

export const simplePathCompare: PathComparator = (a, b) =>
  compareBySegments(a, b, compareCodePoints);

export function comparatorFor(simpleSorting: boolean): PathComparator {
  return simpleSorting ? simplePathCompare : naturalPathCompare;
}
