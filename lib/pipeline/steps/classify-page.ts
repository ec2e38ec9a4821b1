/**
 * Page Classification Step
 *
 * Decides whether a page unit has an embedded text layer or needs OCR.
 * Pure function of the bytes: no storage access, no network.
 */

import { readPagesText } from "../../pdf/document.js";
import type { ClassificationLabel } from "../core/types.js";

export interface ClassifyPageInput {
  bytes: Buffer;
  /** Native text reader, one string per page. Defaults to mupdf. */
  readText?: (bytes: Buffer) => string[];
  /** Called when the unit cannot be read; the unit is then `scanned`. */
  onError?: (err: unknown) => void;
}

export function classifyPage(input: ClassifyPageInput): ClassificationLabel {
  const { bytes, readText = readPagesText, onError } = input;
  try {
    const texts = readText(bytes);
    return texts.some((t) => t.trim().length > 0) ? "has_native_text" : "scanned";
  } catch (err) {
    // Unreadable units go down the OCR path
    onError?.(err);
    return "scanned";
  }
}
