/**
 * OCR engine contract. Every adapter returns plain text and a confidence
 * normalised to the 0..1 range.
 */

export interface OcrResult {
  text: string;
  confidence: number;
}

export interface OcrEngine {
  readonly name: string;
  run(image: Buffer): Promise<OcrResult>;
}

export interface OcrEngineOptions {
  languages: string[];
  timeoutMs: number;
  trocrEndpoint?: string;
  doclingEndpoint?: string;
  pythonPath?: string;
  /** Directory with `<lang>.traineddata.gz` files for tesseract */
  tesseractLangPath?: string;
}

export type OcrEngineFactory = (options: OcrEngineOptions) => OcrEngine;

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
