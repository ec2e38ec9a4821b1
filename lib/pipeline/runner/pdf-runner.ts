/**
 * PDF stages
 *
 * split    pdf-raw/<file>.pdf            -> pdf-pages/<id>/page_NNN.pdf + manifest.json
 * classify pdf-pages/<id>/page_NNN.pdf   -> native-pages/... or scan-pages/...
 * native   native-pages/<id>/page_NNN.pdf -> text-pages/<id>/page_NNN.json
 * ocr      scan-pages/<id>/page_NNN.pdf  -> text-pages/<id>/page_NNN.md
 */

import { MalformedSourceError, errorMessage } from "../../errors.js";
import { splitPdfPages } from "../../pdf/document.js";
import { requireObject } from "../../storage/types.js";
import type { PageExtractor, PageUnit } from "../core/types.js";
import { ManifestTracker } from "../manifest.js";
import { classifyPage } from "../steps/classify-page.js";
import { documentIdFromKey, parsePageKey, resolveDocumentKeys } from "../types.js";
import type { Stage, StageContext, StageName } from "./types.js";

// ============================================================================
// Split
// ============================================================================

export function createSplitStage(ctx: StageContext): Stage {
  const { store, prefixes, progress } = ctx;
  const manifests = new ManifestTracker(store, prefixes);

  return {
    name: "split",
    prefix: prefixes.pdfRaw,
    async handle({ key }) {
      const documentId = documentIdFromKey(key);
      const source = await requireObject(store, key);

      // Every page is produced before the first write
      let pages: Buffer[];
      try {
        pages = splitPdfPages(source);
      } catch (err) {
        throw new MalformedSourceError(
          `${key} is not a readable PDF: ${errorMessage(err)}`,
          documentId,
          { cause: err }
        );
      }
      if (pages.length === 0) {
        throw new MalformedSourceError(`${key} has no pages`, documentId);
      }

      const keys = resolveDocumentKeys(documentId, prefixes);
      for (const [i, page] of pages.entries()) {
        const pageKey = keys.pageUnit(i + 1);
        await store.put(pageKey, page, "application/pdf");
        progress.emit({ type: "write", stage: "split", key: pageKey });
      }

      // The manifest goes last: combine treats it as "page count is final"
      const manifestKey = await manifests.write(documentId, pages.length, "pdf");
      progress.emit({ type: "write", stage: "split", key: manifestKey });
      return `${pages.length} pages`;
    },
  };
}

// ============================================================================
// Classify
// ============================================================================

export function createClassifyStage(ctx: StageContext): Stage {
  const { store, prefixes, progress } = ctx;

  return {
    name: "classify",
    prefix: prefixes.pdfPages,
    async handle({ key }) {
      const page = parsePageKey(key, prefixes.pdfPages);
      if (!page || page.extension !== "pdf") {
        return "not a page unit";
      }

      const bytes = await requireObject(store, key);
      const label = classifyPage({
        bytes,
        onError: (err) =>
          progress.emit({
            type: "warning",
            stage: "classify",
            key,
            message: `unreadable, treating as scanned: ${errorMessage(err)}`,
          }),
      });

      const target =
        label === "has_native_text"
          ? `${prefixes.nativePages}${page.relative}`
          : `${prefixes.scanPages}${page.relative}`;
      await store.put(target, bytes, "application/pdf");
      progress.emit({ type: "write", stage: "classify", key: target });
      return label;
    },
  };
}

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractionStageOptions {
  name: Extract<StageName, "native" | "ocr">;
  prefix: string;
  extractor: PageExtractor;
}

/**
 * Runs one extractor over page units found under `prefix` and writes the
 * page output. A failed extraction writes nothing.
 */
export function createExtractionStage(ctx: StageContext, options: ExtractionStageOptions): Stage {
  const { store, prefixes, progress } = ctx;
  const { name, prefix, extractor } = options;

  return {
    name,
    prefix,
    async handle({ key }) {
      const page = parsePageKey(key, prefix);
      if (!page || page.extension !== "pdf") {
        return "not a page unit";
      }

      const unit: PageUnit = {
        documentId: page.documentId,
        pageIndex: page.pageIndex,
        bytes: await requireObject(store, key),
      };
      const output = await extractor.extract(unit);

      const keys = resolveDocumentKeys(page.documentId, prefixes);
      let target: string;
      if (output.format === "markdown") {
        target = keys.pageOutput(page.pageIndex, "md");
        await store.put(target, output.content, "text/markdown");
      } else {
        target = keys.pageOutput(page.pageIndex, "json");
        await store.put(target, JSON.stringify(output.content), "application/json");
      }
      progress.emit({ type: "write", stage: name, key: target });
      return `${extractor.name} -> ${target}`;
    },
  };
}

export function createNativeStage(ctx: StageContext, extractor: PageExtractor): Stage {
  return createExtractionStage(ctx, {
    name: "native",
    prefix: ctx.prefixes.nativePages,
    extractor,
  });
}

export function createOcrStage(ctx: StageContext, extractor: PageExtractor): Stage {
  return createExtractionStage(ctx, {
    name: "ocr",
    prefix: ctx.prefixes.scanPages,
    extractor,
  });
}
