/**
 * PDF helpers built on mupdf: open, split into single pages, read native
 * text and rasterize.
 */

import mupdf, { type Document as MupdfDocument } from "mupdf";

export function openPdfFromBuffer(buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}

export function countPages(buffer: Buffer): number {
  return openPdfFromBuffer(buffer).countPages();
}

// ============================================================================
// Splitting
// ============================================================================

/**
 * Split a PDF into single-page PDFs. Element i of the result is page i + 1
 * of the source. Throws if the buffer is not a readable PDF.
 */
export function splitPdfPages(buffer: Buffer): Buffer[] {
  const doc = openPdfFromBuffer(buffer);
  const source = doc.asPDF();
  if (!source) {
    throw new Error("Document is not a PDF");
  }

  const totalPages = source.countPages();
  const pages: Buffer[] = [];
  for (let i = 0; i < totalPages; i++) {
    const single = new mupdf.PDFDocument();
    single.graftPage(-1, source, i);
    pages.push(Buffer.from(single.saveToBuffer("compress").asUint8Array()));
  }
  return pages;
}

// ============================================================================
// Text
// ============================================================================

/** Plain text of every page, in page order. */
export function readPagesText(buffer: Buffer): string[] {
  const doc = openPdfFromBuffer(buffer);
  const texts: string[] = [];
  for (let i = 0; i < doc.countPages(); i++) {
    texts.push(doc.loadPage(i).toStructuredText("").asText());
  }
  return texts;
}

/**
 * Layout-aware text of the first page: mupdf's structured-text JSON with
 * blocks, lines and per-line bounding boxes.
 */
export function readStructuredText(buffer: Buffer): unknown {
  const doc = openPdfFromBuffer(buffer);
  if (doc.countPages() === 0) {
    throw new Error("PDF has no pages");
  }
  const stext = doc.loadPage(0).toStructuredText("preserve-whitespace");
  return JSON.parse(stext.asJSON());
}

// ============================================================================
// Rendering
// ============================================================================

/** Render the first page as PNG at the given resolution. */
export function rasterizeFirstPage(buffer: Buffer, dpi: number): Buffer {
  const doc = openPdfFromBuffer(buffer);
  if (doc.countPages() === 0) {
    throw new Error("PDF has no pages");
  }
  const scale = dpi / 72;
  const pixmap = doc
    .loadPage(0)
    .toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false);
  return Buffer.from(pixmap.asPNG());
}
