import fs from "node:fs";
import mupdf, { type PDFDocument, type PDFObject } from "mupdf";
import { DecodeError } from "../errors";
import type { DocumentPage, DocumentSource, EmbeddedImage } from "./pdf";

function openPdf(buffer: Buffer): PDFDocument | null {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf").asPDF();
  } finally {
    process.stderr.write = origWrite;
  }
}

/** True when the stream's only filter is DCTDecode, i.e. it holds a complete JPEG file. */
function isDctEncoded(image: PDFObject): boolean {
  const filter = image.get("Filter");
  if (filter.isName()) return filter.asName() === "DCTDecode";
  if (filter.isArray() && filter.length === 1) {
    const only = filter.get(0);
    return only.isName() && only.asName() === "DCTDecode";
  }
  return false;
}

/**
 * Image XObjects listed directly in a resource dictionary, in dictionary
 * order. Form XObjects are not descended into.
 */
function imagesFromResources(resources: PDFObject): EmbeddedImage[] {
  const images: EmbeddedImage[] = [];
  if (resources.isNull()) return images;
  const xobjects = resources.get("XObject");
  if (xobjects.isNull()) return images;

  xobjects.forEach((xobj, key) => {
    const resolved = xobj.isIndirect() ? xobj.resolve() : xobj;
    const subtype = resolved.get("Subtype");
    if (subtype.isNull() || subtype.asName() !== "Image") return;

    images.push({
      name: String(key),
      jpegBytes: () => {
        if (!isDctEncoded(resolved)) {
          throw new Error("image is not stored as JPEG");
        }
        return xobj.readRawStream().asUint8Array();
      },
    });
  });

  return images;
}

/**
 * DocumentSource backed by mupdf. The whole file is read up front; the
 * mupdf document is released by `close()`.
 */
export function openPdfSource(pdfPath: string): DocumentSource {
  let pdfDoc: PDFDocument | null;
  try {
    pdfDoc = openPdf(fs.readFileSync(pdfPath));
  } catch (err) {
    throw new DecodeError({ kind: "pdf-open-failed", path: pdfPath }, { cause: err });
  }
  if (!pdfDoc) {
    throw new DecodeError({ kind: "pdf-open-failed", path: pdfPath });
  }
  const doc = pdfDoc;

  return {
    countPages: () => doc.countPages(),
    loadPage(index): DocumentPage {
      const page = doc.loadPage(index);
      return {
        imageResources: () => imagesFromResources(page.getObject().getInheritable("Resources")),
      };
    },
    close: () => doc.destroy(),
  };
}
