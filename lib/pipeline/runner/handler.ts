/**
 * Host entry points. Each deployed function calls `handleStageEvent` with
 * its stage name and the notification it was invoked with.
 */

import { ConfigurationError } from "../../errors.js";
import { defaultParameters, loadConfig, type ParameterSource } from "../../config.js";
import { runStage } from "./batch.js";
import { createPipeline, type Pipeline } from "./factory.js";
import { createJsonProgress, type StageName, type StageResult } from "./types.js";

let parameters: ParameterSource | undefined;
let pipeline: Promise<Pipeline> | undefined;

/**
 * The pipeline for this process, built on first use. Configuration is read
 * once and kept for the lifetime of the process.
 */
export function getPipeline(): Promise<Pipeline> {
  if (!pipeline) {
    parameters ??= defaultParameters();
    const pending = loadConfig(parameters).then((config) =>
      createPipeline(config, { progress: createJsonProgress() })
    );
    pipeline = pending;
    // A failed start is retried on the next invocation
    void pending.catch(() => {
      pipeline = undefined;
    });
  }
  return pipeline;
}

export async function handleStageEvent(name: StageName, event: unknown): Promise<StageResult> {
  const { context, stage } = await getPipeline();
  const selected = stage(name);
  if (!selected) {
    throw new ConfigurationError(`Stage "${name}" is not enabled`, [
      name === "output" ? "output.apiUrl: OUTPUT_API_URL must be set" : `stage ${name}`,
    ]);
  }
  return runStage(selected, event, context.bucket, context.progress);
}
