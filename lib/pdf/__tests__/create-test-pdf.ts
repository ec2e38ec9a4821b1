/**
 * Helpers to generate test PDFs with mupdf so tests don't depend on
 * external files.
 */
import mupdf from "mupdf";

type PDFDoc = InstanceType<typeof mupdf.PDFDocument>;
type PDFObj = ReturnType<PDFDoc["addObject"]>;

function escapePdfString(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\(/g, "\\(").replace(/\)/g, "\\)");
}

function addTextPage(doc: PDFDoc, font: PDFObj, text: string) {
  const fonts = doc.newDictionary();
  fonts.put("F1", font);
  const resourcesDict = doc.newDictionary();
  resourcesDict.put("Font", fonts);
  const resources = doc.addObject(resourcesDict);

  const stream = text === "" ? "" : `BT\n/F1 24 Tf\n72 700 Td\n(${escapePdfString(text)}) Tj\nET`;
  const buf = new mupdf.Buffer();
  buf.writeLine(stream);
  doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, resources, buf));
}

/**
 * Create a PDF with one page per entry. An empty string produces a page
 * with no text operators (what a scan without a text layer looks like to
 * a text reader).
 */
export function createTextPdf(pages: string[]): Buffer {
  const doc = new mupdf.PDFDocument();
  const font = doc.addSimpleFont(new mupdf.Font("Helvetica"));
  for (const text of pages) {
    addTextPage(doc, font, text);
  }
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}

/**
 * A page with a filled rectangle and no text, rendered like a scan.
 */
export function createImageOnlyPdf(): Buffer {
  const doc = new mupdf.PDFDocument();
  const stream = `
q
0 0 0 rg
100 400 200 150 re f
Q
`;
  const buf = new mupdf.Buffer();
  buf.writeLine(stream);
  const resources = doc.addObject(doc.newDictionary());
  doc.insertPage(-1, doc.addPage([0, 0, 612, 792], 0, resources, buf));
  return Buffer.from(doc.saveToBuffer("").asUint8Array());
}
