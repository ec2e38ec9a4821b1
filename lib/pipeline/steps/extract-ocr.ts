/**
 * OCR Extraction Step
 *
 * Renders the page unit, cleans the image up, runs the configured engine
 * and turns the recognised text into page Markdown.
 */

import { rasterizeFirstPage } from "../../pdf/document.js";
import { preprocessForOcr } from "../../ocr/preprocess.js";
import { postProcessText, toPageMarkdown } from "../../ocr/text.js";
import type { OcrEngine } from "../../ocr/types.js";
import type { PageExtractor, PageOutput, PageUnit } from "../core/types.js";

export interface OcrPageResult {
  documentId: string;
  pageIndex: number;
  engine: string;
  confidence: number;
  characters: number;
}

export interface OcrExtractorOptions {
  engine: OcrEngine;
  dpi: number;
  rasterize?: (bytes: Buffer, dpi: number) => Buffer;
  preprocess?: (png: Buffer) => Promise<Buffer>;
  onResult?: (result: OcrPageResult) => void;
}

export function createOcrExtractor(options: OcrExtractorOptions): PageExtractor {
  const {
    engine,
    dpi,
    rasterize = rasterizeFirstPage,
    preprocess = preprocessForOcr,
    onResult,
  } = options;

  return {
    name: `ocr-${engine.name}`,
    async extract(unit: PageUnit): Promise<PageOutput> {
      const image = await preprocess(rasterize(unit.bytes, dpi));
      const result = await engine.run(image);
      const text = postProcessText(result.text);
      onResult?.({
        documentId: unit.documentId,
        pageIndex: unit.pageIndex,
        engine: engine.name,
        confidence: result.confidence,
        characters: text.length,
      });
      return { format: "markdown", content: toPageMarkdown(text, unit.pageIndex) };
    },
  };
}
