/**
 * Typed failures for the decode pipeline.
 *
 * Every failure is fatal to the call that raised it. The `detail` union lets
 * a front end render a precise diagnostic without parsing messages.
 */

export type DecodeErrorDetail =
  // Input validation
  | { kind: "cwd-unavailable" }
  | { kind: "input-not-found"; path: string }
  | { kind: "input-is-directory"; path: string }
  | { kind: "output-dir-not-found"; path: string }
  | { kind: "output-dir-is-file"; path: string }
  | { kind: "output-dir-create-failed"; path: string }
  // Format
  | { kind: "invalid-extension-encoding"; fileName: string }
  | { kind: "unsupported-format"; extension: string }
  // Container
  | { kind: "zip-open-failed"; path: string }
  | { kind: "invalid-zip"; path: string }
  | { kind: "zip-entry-failed"; index: number }
  | { kind: "pdf-open-failed"; path: string }
  | { kind: "pdf-page-failed"; page: number }
  | { kind: "pdf-resources-failed"; page: number }
  // I/O
  | { kind: "invalid-entry-name-encoding"; pathInArchive: string }
  | { kind: "output-file-create-failed"; path: string }
  | { kind: "zip-entry-copy-failed"; pathInArchive: string; stagedPath: string }
  | { kind: "rename-failed"; from: string; to: string }
  | { kind: "output-file-write-failed"; page: number; path: string };

export type DecodeErrorKind = DecodeErrorDetail["kind"];

export function describeDecodeError(detail: DecodeErrorDetail): string {
  switch (detail.kind) {
    case "cwd-unavailable":
      return "Failed to get the current working directory";
    case "input-not-found":
      return `Input file not found: ${detail.path}`;
    case "input-is-directory":
      return `Input path is a directory: ${detail.path}`;
    case "output-dir-not-found":
      return `Output directory not found: ${detail.path}`;
    case "output-dir-is-file":
      return `Output path is a file: ${detail.path}`;
    case "output-dir-create-failed":
      return `Failed to create output directory: ${detail.path}`;
    case "invalid-extension-encoding":
      return `Input file has an extension that is not valid UTF-8: ${detail.fileName}`;
    case "unsupported-format":
      return detail.extension
        ? `Unsupported input format: ${detail.extension}`
        : "Unsupported input format: input file has no extension";
    case "zip-open-failed":
      return `Failed to open ZIP file: ${detail.path}`;
    case "invalid-zip":
      return `Invalid ZIP archive: ${detail.path}`;
    case "zip-entry-failed":
      return `Failed to read ZIP entry #${detail.index + 1}`;
    case "pdf-open-failed":
      return `Failed to open PDF file: ${detail.path}`;
    case "pdf-page-failed":
      return `Failed to get PDF page ${detail.page}`;
    case "pdf-resources-failed":
      return `Failed to get resources of PDF page ${detail.page}`;
    case "invalid-entry-name-encoding":
      return `ZIP entry has a name that is not valid UTF-8: ${detail.pathInArchive}`;
    case "output-file-create-failed":
      return `Failed to create output file: ${detail.path}`;
    case "zip-entry-copy-failed":
      return `Failed to extract ${detail.pathInArchive} to ${detail.stagedPath}`;
    case "rename-failed":
      return `Failed to rename ${detail.from} to ${detail.to}`;
    case "output-file-write-failed":
      return `Failed to write PDF image ${detail.page} to ${detail.path}`;
  }
}

export class DecodeError extends Error {
  readonly detail: DecodeErrorDetail;

  constructor(detail: DecodeErrorDetail, options?: { cause?: unknown }) {
    const base = describeDecodeError(detail);
    const cause = options?.cause;
    super(cause instanceof Error ? `${base}: ${cause.message}` : base, options);
    this.name = "DecodeError";
    this.detail = detail;
  }

  get kind(): DecodeErrorKind {
    return this.detail.kind;
  }
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}
