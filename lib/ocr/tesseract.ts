/**
 * In-process OCR with tesseract.js. Language data is read from disk: the
 * `@tesseract.js-data/eng` package by default, or `TESSERACT_LANG_PATH` for
 * other languages.
 */

import { existsSync } from "node:fs";
import { createRequire } from "node:module";
import path from "node:path";
import { ConfigurationError, OcrEngineError, errorMessage } from "../errors.js";
import { clampConfidence, type OcrEngine, type OcrEngineOptions, type OcrResult } from "./types.js";

// Two-letter codes used elsewhere in the config map onto tesseract's names
const TESSERACT_LANGUAGES: Record<string, string> = {
  en: "eng",
  de: "deu",
  fr: "fra",
  es: "spa",
  it: "ita",
  pt: "por",
  nl: "nld",
};

const BUNDLED_LANGUAGE = "eng";
const BUNDLED_PACKAGE = "@tesseract.js-data/eng";
// Integer LSTM models, the set tesseract.js loads for its default engine mode
const BUNDLED_MODEL_DIR = "4.0.0_best_int";

export function tesseractLanguages(languages: string[]): string[] {
  return languages.map((lang) => TESSERACT_LANGUAGES[lang] ?? lang);
}

function bundledLangPath(): string | undefined {
  const require = createRequire(import.meta.url);
  const roots = require.resolve.paths(BUNDLED_PACKAGE) ?? [];
  for (const root of roots) {
    const dir = path.join(root, BUNDLED_PACKAGE, BUNDLED_MODEL_DIR);
    if (existsSync(dir)) return dir;
  }
  return undefined;
}

/**
 * Directory holding `<lang>.traineddata.gz` for every configured language.
 *
 * @throws ConfigurationError when a language other than English is set
 *   without `TESSERACT_LANG_PATH`, or the bundled data is not installed
 */
export function resolveTesseractLangPath(options: OcrEngineOptions): string {
  if (options.tesseractLangPath) return options.tesseractLangPath;

  const missing = tesseractLanguages(options.languages).filter((lang) => lang !== BUNDLED_LANGUAGE);
  if (missing.length > 0) {
    throw new ConfigurationError(`tesseract has no bundled data for ${missing.join(", ")}`, [
      "ocr.tesseractLangPath: required when OCR_LANGUAGES names a language other than en",
    ]);
  }
  const bundled = bundledLangPath();
  if (!bundled) {
    throw new ConfigurationError(`${BUNDLED_PACKAGE} is not installed`, [
      `ocr.tesseractLangPath: set TESSERACT_LANG_PATH or install ${BUNDLED_PACKAGE}`,
    ]);
  }
  return bundled;
}

export function createTesseractEngine(options: OcrEngineOptions): OcrEngine {
  const langs = tesseractLanguages(options.languages);
  const langPath = resolveTesseractLangPath(options);

  async function run(image: Buffer): Promise<OcrResult> {
    const { createWorker, OEM } = await import("tesseract.js");
    const worker = await createWorker(langs, OEM.LSTM_ONLY, { langPath, cacheMethod: "none" }).catch(
      (err: unknown) => {
        throw new OcrEngineError(`tesseract failed to start: ${errorMessage(err)}`, "tesseract", { cause: err });
      }
    );
    try {
      const result = await worker.recognize(image);
      // Tesseract confidence is 0-100
      return { text: result.data.text, confidence: clampConfidence(result.data.confidence / 100) };
    } catch (err) {
      throw new OcrEngineError(`tesseract failed: ${errorMessage(err)}`, "tesseract", { cause: err });
    } finally {
      await worker.terminate();
    }
  }

  return { name: "tesseract", run };
}
