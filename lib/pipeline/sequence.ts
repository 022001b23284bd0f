/** Number of decimal digits needed to print `count` (minimum 1). */
export function padWidth(count: number): number {
  return String(Math.max(count, 0)).length;
}

/**
 * Output file name for the 0-based `index` in a sequence of `count` pages:
 * 1-based, zero-padded to the width of `count`, with an optional extension.
 */
export function pageFileName(index: number, count: number, extension?: string): string {
  const stem = String(index + 1).padStart(padWidth(count), "0");
  return extension ? `${stem}.${extension}` : stem;
}
