/**
 * Native Text Extraction Step
 *
 * Stores mupdf's structured-text JSON rather than flattened text, so
 * consumers can recover line and span geometry.
 */

import { readStructuredText } from "../../pdf/document.js";
import type { PageExtractor, PageOutput, PageUnit } from "../core/types.js";

export function createNativeTextExtractor(
  readText: (bytes: Buffer) => unknown = readStructuredText
): PageExtractor {
  return {
    name: "native-text",
    async extract(unit: PageUnit): Promise<PageOutput> {
      return { format: "json", content: readText(unit.bytes) };
    },
  };
}
