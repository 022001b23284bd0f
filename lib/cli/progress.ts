/**
 * Page progress for the decode CLI.
 *
 * On a TTY a spinner and bar are redrawn in place. Elsewhere (pipes, CI logs)
 * only the final line is written.
 */

import type { Observable } from "rxjs";

const ESC = "\x1b";
const CLEAR_LINE = `${ESC}[2K`;
const GREEN = `${ESC}[32m`;
const RED = `${ESC}[31m`;
const RESET = `${ESC}[0m`;

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

export interface PageCount {
  current: number;
  total: number;
}

export interface ProgressOptions {
  label: string;
  unit?: string;
  barWidth?: number;
  stream?: NodeJS.WritableStream;
  /** Redraw in place with colors; defaults to whether `stream` is a TTY */
  interactive?: boolean;
  /** Spinner redraw interval in ms */
  intervalMs?: number;
}

export function renderBar(current: number, total: number, barWidth: number): string {
  const filled = total > 0 ? Math.min(barWidth, Math.round((current / total) * barWidth)) : 0;
  return "█".repeat(filled) + "░".repeat(barWidth - filled);
}

function isTty(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

export function runWithProgress<T>(
  source: Observable<T>,
  mapper: (value: T) => PageCount,
  options: ProgressOptions
): Promise<void> {
  const {
    label,
    unit = "pages",
    barWidth = 20,
    stream = process.stderr,
    intervalMs = 80,
  } = options;
  const interactive = options.interactive ?? isTty(stream);

  let current = 0;
  let total = 0;
  let frame = 0;

  const counter = () => `${current}/${total} ${unit}`;
  const paint = (color: string, text: string) => (interactive ? `${color}${text}${RESET}` : text);

  function render() {
    const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
    frame++;
    stream.write(`\r${CLEAR_LINE}${spinner} ${label}  ${renderBar(current, total, barWidth)}  ${counter()}`);
  }

  return new Promise<void>((resolve, reject) => {
    const timer = interactive ? setInterval(render, intervalMs) : undefined;

    function finish(line: string) {
      clearInterval(timer);
      stream.write(interactive ? `\r${CLEAR_LINE}${line}\n` : `${line}\n`);
    }

    source.subscribe({
      next(value) {
        const count = mapper(value);
        current = count.current;
        total = count.total;
      },
      error(err: unknown) {
        finish(`${paint(RED, "✗")} ${label}  ${err instanceof Error ? err.message : String(err)}`);
        reject(err);
      },
      complete() {
        finish(`${paint(GREEN, "✔")} ${label}  ${"█".repeat(barWidth)}  ${counter()}`);
        resolve();
      },
    });
  });
}
