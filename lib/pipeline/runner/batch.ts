/**
 * Batch runner
 *
 * Delivers the records of one trigger to a stage, one at a time. A record
 * that fails is reported and the batch moves on.
 */

import { Observable, catchError, concatMap, defer, from, lastValueFrom, map, of, toArray } from "rxjs";
import { PipelineError, errorMessage } from "../../errors.js";
import {
  s3EventSchema,
  stageTriggerSchema,
  type S3Event,
  type StageTrigger,
  type TriggerRecord,
} from "../core/schemas.js";
import type { Progress, RecordOutcome, Stage, StageResult } from "./types.js";

// ============================================================================
// Triggers
// ============================================================================

/** S3 notification keys are form-encoded: `+` is a space. */
export function decodeS3Key(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, " "));
}

export function parseS3Event(event: S3Event): StageTrigger {
  const parsed = s3EventSchema.parse(event);
  return {
    records: parsed.Records.map((record) => ({
      bucket: record.s3.bucket.name,
      key: decodeS3Key(record.s3.object.key),
    })),
  };
}

/**
 * Accepts either a plain `{records}` trigger or an S3 notification.
 */
export function toStageTrigger(input: unknown): StageTrigger {
  const direct = stageTriggerSchema.safeParse(input);
  if (direct.success) return direct.data;
  return parseS3Event(s3EventSchema.parse(input));
}

// ============================================================================
// Processing
// ============================================================================

function processRecord(
  stage: Stage,
  bucket: string,
  record: TriggerRecord,
  progress: Progress
): Observable<RecordOutcome> {
  const { key } = record;

  if (record.bucket !== bucket) {
    const reason = `bucket ${record.bucket} is not ${bucket}`;
    progress.emit({ type: "record-skip", stage: stage.name, key, reason });
    return of({ key, status: "skipped", reason });
  }
  if (!key.startsWith(stage.prefix)) {
    const reason = `outside prefix ${stage.prefix}`;
    progress.emit({ type: "record-skip", stage: stage.name, key, reason });
    return of({ key, status: "skipped", reason });
  }

  return defer(() => {
    progress.emit({ type: "record-start", stage: stage.name, key });
    return from(stage.handle(record));
  }).pipe(
    map((message): RecordOutcome => {
      progress.emit({
        type: "record-complete",
        stage: stage.name,
        key,
        message,
      });
      return message ? { key, status: "complete", message } : { key, status: "complete" };
    }),
    catchError((err: unknown) => {
      const error = errorMessage(err);
      progress.emit({
        type: "record-error",
        stage: stage.name,
        key,
        error,
        category: err instanceof PipelineError ? err.category : undefined,
      });
      return of<RecordOutcome>({ key, status: "error", error });
    })
  );
}

/**
 * Stream of per-record outcomes, in record order.
 */
export function processRecords(
  stage: Stage,
  trigger: StageTrigger,
  bucket: string,
  progress: Progress
): Observable<RecordOutcome> {
  return from(trigger.records).pipe(
    concatMap((record) => processRecord(stage, bucket, record, progress))
  );
}

export async function runBatch(
  stage: Stage,
  trigger: StageTrigger,
  bucket: string,
  progress: Progress
): Promise<RecordOutcome[]> {
  return lastValueFrom(processRecords(stage, trigger, bucket, progress).pipe(toArray()));
}

/**
 * Entry point for the invoking host. Always reports success: per-record
 * failures are visible in progress events and in missing artifacts.
 */
export async function runStage(
  stage: Stage,
  input: unknown,
  bucket: string,
  progress: Progress
): Promise<StageResult> {
  await runBatch(stage, toStageTrigger(input), bucket, progress);
  return { statusCode: 200, body: { message: `${stage.name} executed` } };
}
