/**
 * Engine selection. The selector comes from configuration and is resolved
 * once, when the OCR stage is created.
 */

import { ConfigurationError, UnsupportedEngineError } from "../errors.js";
import { createDoclingEngine, createTrocrEngine } from "./http-engine.js";
import { createPythonEngine } from "./python-worker.js";
import { createTesseractEngine } from "./tesseract.js";
import type { OcrEngine, OcrEngineFactory, OcrEngineOptions } from "./types.js";

export type OcrEngineRegistry = Record<string, OcrEngineFactory>;

function requireEndpoint(engine: string, endpoint: string | undefined, parameter: string): string {
  if (!endpoint) {
    throw new ConfigurationError(`OCR engine "${engine}" requires ${parameter}`, [
      `ocr.${engine}Endpoint: required when OCR_ENGINE=${engine}`,
    ]);
  }
  return endpoint;
}

export const defaultOcrEngines: OcrEngineRegistry = {
  easyocr: (options) => createPythonEngine("easyocr", options),
  paddleocr: (options) => createPythonEngine("paddleocr", options),
  tesseract: (options) => createTesseractEngine(options),
  trocr: (options) =>
    createTrocrEngine({
      endpoint: requireEndpoint("trocr", options.trocrEndpoint, "TROCR_ENDPOINT"),
      timeoutMs: options.timeoutMs,
    }),
  docling: (options) =>
    createDoclingEngine({
      endpoint: requireEndpoint("docling", options.doclingEndpoint, "DOCLING_ENDPOINT"),
      timeoutMs: options.timeoutMs,
    }),
};

/**
 * @throws UnsupportedEngineError when the selector names no registered engine
 */
export function createOcrEngine(
  selector: string,
  options: OcrEngineOptions,
  registry: OcrEngineRegistry = defaultOcrEngines
): OcrEngine {
  const key = selector.trim().toLowerCase();
  const factory = Object.hasOwn(registry, key) ? registry[key] : undefined;
  if (!factory) {
    throw new UnsupportedEngineError(selector, Object.keys(registry));
  }
  return factory(options);
}
