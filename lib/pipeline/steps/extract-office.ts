/**
 * Office Extraction Step
 *
 * Parses a whole docx, pptx or xlsx file into logical pages. Unlike the
 * PDF path there is no split stage: the document is read once and every
 * page output comes out of the same call.
 */

import { parseOfficeDocument, type OfficeType } from "../../office/index.js";
import type { OfficeBlock } from "../core/schemas.js";
import type { OfficeExtraction, PageOutput } from "../core/types.js";

export interface OfficeSource {
  documentId: string;
  type: OfficeType;
  bytes: Buffer;
}

export type OfficeParser = (
  type: OfficeType,
  bytes: Buffer,
  documentId: string
) => Promise<OfficeBlock[][]>;

export async function extractOfficeDocument(
  source: OfficeSource,
  parse: OfficeParser = parseOfficeDocument
): Promise<OfficeExtraction> {
  const pages = await parse(source.type, source.bytes, source.documentId);
  return { documentId: source.documentId, type: source.type, pages };
}

export function officePageOutput(blocks: OfficeBlock[]): PageOutput {
  return { format: "json", content: blocks };
}
