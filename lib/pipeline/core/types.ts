/**
 * Core types for the page pipeline.
 *
 * A document is split into page units, each page unit is extracted into
 * one page output, and page outputs are merged back into one document.
 */

import type { DocumentType, OfficeBlock } from "./schemas.js";

// ============================================================================
// Page units and outputs
// ============================================================================

export interface PageUnit {
  documentId: string;
  pageIndex: number; // 1-based
  bytes: Buffer;
}

export type ClassificationLabel = "has_native_text" | "scanned";

export type PageOutput =
  | { format: "markdown"; content: string }
  | { format: "json"; content: unknown };

/** Pages produced by the office extractor for one source file. */
export interface OfficeExtraction {
  documentId: string;
  type: Exclude<DocumentType, "pdf">;
  pages: OfficeBlock[][];
}

/**
 * One extraction strategy. Which strategy runs is decided by the caller.
 */
export interface PageExtractor<TUnit = PageUnit> {
  readonly name: string;
  extract(unit: TUnit): Promise<PageOutput>;
}

// ============================================================================
// Assembly state
// ============================================================================

export type AssemblyState =
  | { state: "splitting"; documentId: string }
  | {
      state: "assembling";
      documentId: string;
      pageCount: number;
      missingPages: number[];
    }
  | { state: "complete"; documentId: string; pageCount: number };
