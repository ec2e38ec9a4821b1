/**
 * Runner Factory
 *
 * Creates every stage from a loaded configuration. This is where the OCR
 * engine is resolved, so a bad engine selector fails here, before any
 * record is read.
 */

import type { AxiosInstance } from "axios";
import type { AppConfig } from "../../config.js";
import { createOcrEngine, type OcrEngineRegistry } from "../../ocr/registry.js";
import type { OcrEngine } from "../../ocr/types.js";
import { createObjectStore } from "../../storage/index.js";
import type { ObjectStore } from "../../storage/types.js";
import { CombineAssembler } from "../combine.js";
import type { PageExtractor } from "../core/types.js";
import { OutputDispatcher } from "../output.js";
import { createNativeTextExtractor } from "../steps/extract-native.js";
import { createOcrExtractor, type OcrExtractorOptions } from "../steps/extract-ocr.js";
import type { OfficeParser } from "../steps/extract-office.js";
import { createCombineStage } from "./combine-runner.js";
import { createOfficeStage } from "./office-runner.js";
import { createOutputStage } from "./output-runner.js";
import {
  createClassifyStage,
  createNativeStage,
  createOcrStage,
  createSplitStage,
} from "./pdf-runner.js";
import { createRouterStage } from "./source-runner.js";
import { nullProgress, type Progress, type Stage, type StageContext, type StageName } from "./types.js";

// ============================================================================
// Factory options
// ============================================================================

export interface CreatePipelineOptions {
  store?: ObjectStore;
  progress?: Progress;
  /** Engines the OCR selector is resolved against */
  ocrEngines?: OcrEngineRegistry;
  /** Image hooks for the OCR extractor */
  ocrImage?: Pick<OcrExtractorOptions, "rasterize" | "preprocess">;
  nativeExtractor?: PageExtractor;
  officeParser?: OfficeParser;
  /** HTTP client for the output stage */
  http?: AxiosInstance;
}

export interface Pipeline {
  config: AppConfig;
  context: StageContext;
  assembler: CombineAssembler;
  ocrEngine: OcrEngine;
  /** Stages in flow order. `output` is present only when an API URL is set. */
  stages: Stage[];
  stage(name: StageName): Stage | undefined;
}

// ============================================================================
// Factory function
// ============================================================================

/**
 * @throws UnsupportedEngineError for an unknown OCR engine selector
 * @throws ConfigurationError when the selected engine lacks its endpoint
 */
export function createPipeline(config: AppConfig, options: CreatePipelineOptions = {}): Pipeline {
  const progress = options.progress ?? nullProgress;
  const context: StageContext = {
    bucket: config.bucket,
    store: options.store ?? createObjectStore(config),
    prefixes: config.prefixes,
    progress,
  };

  const ocrEngine = createOcrEngine(config.ocr.engine, config.ocr, options.ocrEngines);
  const ocrExtractor = createOcrExtractor({
    engine: ocrEngine,
    dpi: config.ocr.dpi,
    ...options.ocrImage,
    onResult: (result) => {
      if (result.characters === 0) {
        progress.emit({
          type: "warning",
          stage: "ocr",
          key: `${result.documentId}/${result.pageIndex}`,
          message: `${result.engine} recognised no text`,
        });
      }
    },
  });

  const assembler = new CombineAssembler(context.store, context.prefixes, progress);

  const stages: Stage[] = [
    createRouterStage(context),
    createSplitStage(context),
    createClassifyStage(context),
    createNativeStage(context, options.nativeExtractor ?? createNativeTextExtractor()),
    createOcrStage(context, ocrExtractor),
    createOfficeStage(context, { assembler, parse: options.officeParser }),
    createCombineStage(context, assembler),
  ];

  if (config.output.apiUrl) {
    const dispatcher = new OutputDispatcher({
      apiUrl: config.output.apiUrl,
      apiKey: config.output.apiKey,
      http: options.http,
    });
    stages.push(createOutputStage(context, dispatcher));
  }

  return {
    config,
    context,
    assembler,
    ocrEngine,
    stages,
    stage: (name) => stages.find((s) => s.name === name),
  };
}
