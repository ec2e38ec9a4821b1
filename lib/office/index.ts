import type { DocumentType, OfficeBlock } from "../pipeline/core/schemas.js";
import { parseDocx } from "./docx.js";
import { parsePptx } from "./pptx.js";
import { parseXlsx } from "./xlsx.js";

export type OfficeType = Exclude<DocumentType, "pdf">;

const OFFICE_TYPES: readonly OfficeType[] = ["docx", "pptx", "xlsx"];

export function officeTypeOf(extension: string): OfficeType | undefined {
  return OFFICE_TYPES.find((type) => type === extension.toLowerCase());
}

/** Pages of an office document; each page is a list of content blocks. */
export function parseOfficeDocument(
  type: OfficeType,
  bytes: Buffer,
  documentId: string
): Promise<OfficeBlock[][]> {
  switch (type) {
    case "docx":
      return parseDocx(bytes, documentId);
    case "pptx":
      return parsePptx(bytes, documentId);
    case "xlsx":
      return parseXlsx(bytes, documentId);
  }
}

export { parseDocx, parsePptx, parseXlsx };
