#!/usr/bin/env node
/**
 * Decode CLI
 *
 * Extract the pages of a comic archive or PDF as numbered image files.
 *
 * Usage:
 *   npm run decode -- <input> [output] [options]
 */

import { tap } from "rxjs";
import { loadConfigWithOverrides } from "../config";
import { createConsoleProgress, decode$, isDecodeError } from "../pipeline/runner";
import { parseFlags } from "./flags";
import { runWithProgress } from "./progress";

const USAGE = `Usage: npm run decode -- <input> [output] [options]

Extracts the pages of a .zip/.cbz archive or a .pdf document into numbered
image files. Without [output], pages go to a directory named after the input.

Options:
  --config <path>         Config file (default: ./config.yaml if present)
  --create-output-dir     Create [output] if it doesn't exist
  --all-files             Extract every archive entry, not just images
  --extended-formats      Accept webp, tiff, avif, ... as images
  --simple-sorting        Order entries by plain code point comparison
  --skip-bad-pdf-pages    Warn and continue on unreadable PDF pages
  --log-level <level>     trace | debug | info | warn`;

async function main() {
  const flags = parseFlags(process.argv.slice(2));
  const [input, output] = flags.positional;

  if (flags.help || !input) {
    console.log(USAGE);
    process.exit(flags.help ? 0 : 1);
  }

  const config = loadConfigWithOverrides(flags.overrides, flags.configPath);
  const logs = createConsoleProgress(config.log_level);

  let paths: string[] = [];
  await runWithProgress(
    decode$({ input, output, config }, logs).pipe(
      tap((update) => {
        if (update.type === "done") paths = update.paths;
      })
    ),
    (update) =>
      update.type === "page"
        ? { current: update.page, total: update.totalPages }
        : { current: update.paths.length, total: update.paths.length },
    { label: "decode" }
  );

  console.log(`Extracted ${paths.length} pages`);
}

main().catch((err: unknown) => {
  if (isDecodeError(err)) {
    console.error(`\nDecoding failed (${err.kind}): ${err.message}`);
  } else {
    console.error("\nDecoding failed:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
