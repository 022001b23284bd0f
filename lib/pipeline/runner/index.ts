/**
 * Decode pipeline public API.
 */

export type {
  Progress,
  ProgressEvent,
  LogLevel,
  LogFields,
  ArchiveExtractOptions,
  DocumentExtractOptions,
} from "./types";
export {
  nullProgress,
  createConsoleProgress,
  createCallbackProgress,
  combineProgress,
} from "./types";

export {
  decode,
  decode$,
  decodeFile,
  resolveFormat,
  type DecodeOptions,
  type DecodeUpdate,
  type InputFormat,
} from "./decode-runner";

export { extractArchive, type StagedPage } from "../steps/archive";
export {
  extractDocument,
  extractPdf,
  type DocumentSource,
  type DocumentPage,
  type EmbeddedImage,
} from "../steps/pdf";
export { openPdfSource } from "../steps/mupdf-source";

export { DecodeError, isDecodeError, type DecodeErrorDetail, type DecodeErrorKind } from "../errors";
export { naturalPathCompare, simplePathCompare, comparatorFor } from "../natural-sort";
export { padWidth, pageFileName } from "../sequence";
