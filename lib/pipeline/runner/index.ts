/**
 * Pipeline Runner Module
 *
 * Wires the pure steps to object storage, triggers and progress events.
 */

export {
  type Progress,
  type ProgressEvent,
  type Stage,
  type StageContext,
  type StageName,
  type StageResult,
  type RecordOutcome,
  nullProgress,
  describeEvent,
  createConsoleProgress,
  createJsonProgress,
  createCallbackProgress,
  createRecordingProgress,
} from "./types.js";

export {
  decodeS3Key,
  parseS3Event,
  toStageTrigger,
  processRecords,
  runBatch,
  runStage,
} from "./batch.js";

export { createRouterStage } from "./source-runner.js";
export {
  createSplitStage,
  createClassifyStage,
  createExtractionStage,
  createNativeStage,
  createOcrStage,
} from "./pdf-runner.js";
export { createOfficeStage } from "./office-runner.js";
export { createCombineStage } from "./combine-runner.js";
export { createOutputStage } from "./output-runner.js";

export { createPipeline, type CreatePipelineOptions, type Pipeline } from "./factory.js";
export { getPipeline, handleStageEvent } from "./handler.js";
