/**
 * Runner layer types.
 *
 * These interfaces define the contracts between the pure pipeline steps
 * and the infrastructure (object storage, progress emission, triggers).
 */

import type { PrefixConfig } from "../../config.js";
import type { PipelineErrorCategory } from "../../errors.js";
import type { ObjectStore } from "../../storage/types.js";
import type { TriggerRecord } from "../core/schemas.js";

// ============================================================================
// Progress Interface
// ============================================================================

export type StageName =
  | "router"
  | "split"
  | "classify"
  | "native"
  | "ocr"
  | "office"
  | "combine"
  | "output";

export type ProgressEvent =
  // Record lifecycle
  | { type: "record-start"; stage: StageName; key: string }
  | { type: "record-skip"; stage: StageName; key: string; reason: string }
  | { type: "record-complete"; stage: StageName; key: string; message?: string }
  | {
      type: "record-error";
      stage: StageName;
      key: string;
      error: string;
      category?: PipelineErrorCategory;
    }
  // Within a record
  | { type: "waiting"; stage: StageName; documentId: string; pageIndex: number; pageCount: number }
  | { type: "write"; stage: StageName; key: string }
  | { type: "warning"; stage: StageName; key: string; message: string };

/**
 * Progress emitter interface.
 *
 * Implementations can log to console, write structured logs, collect
 * events in tests, etc.
 */
export interface Progress {
  emit(event: ProgressEvent): void;
}

/**
 * No-op progress emitter for when progress tracking isn't needed.
 */
export const nullProgress: Progress = {
  emit: () => {},
};

/**
 * Human-readable message for an event, without the stage tag.
 */
export function describeEvent(event: ProgressEvent): string {
  switch (event.type) {
    case "record-start":
      return `Processing ${event.key}`;
    case "record-skip":
      return `Skipping ${event.key}: ${event.reason}`;
    case "record-complete":
      return event.message ? `Done ${event.key}: ${event.message}` : `Done ${event.key}`;
    case "record-error":
      return `Error processing ${event.key}: ${event.error}`;
    case "waiting":
      return `Waiting for page ${String(event.pageIndex).padStart(3, "0")} of ${event.documentId} (${event.pageCount} pages)`;
    case "write":
      return `Wrote ${event.key}`;
    case "warning":
      return `${event.key}: ${event.message}`;
  }
}

/**
 * Console-based progress emitter for CLI usage.
 */
export function createConsoleProgress(): Progress {
  return {
    emit(event) {
      const line = `[${event.stage}] ${describeEvent(event)}`;
      if (event.type === "record-error") {
        console.error(line);
      } else if (event.type === "warning") {
        console.warn(line);
      } else {
        console.log(line);
      }
    },
  };
}

/**
 * One JSON object per line, for hosted runtimes that ingest structured
 * logs.
 */
export function createJsonProgress(
  write: (line: string) => void = (line) => console.log(line)
): Progress {
  return {
    emit(event) {
      const level =
        event.type === "record-error" ? "error" : event.type === "warning" ? "warn" : "info";
      write(
        JSON.stringify({
          level,
          time: new Date().toISOString(),
          message: describeEvent(event),
          ...event,
        })
      );
    },
  };
}

/**
 * Callback-based progress emitter for job queue integration.
 */
export function createCallbackProgress(callback: (message: string) => void): Progress {
  return {
    emit(event) {
      callback(describeEvent(event));
    },
  };
}

/**
 * Collects events in memory. Handy for tests and for the CLI summary.
 */
export function createRecordingProgress(): Progress & { events: ProgressEvent[] } {
  const events: ProgressEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
  };
}

// ============================================================================
// Stage Interface
// ============================================================================

/**
 * Everything a stage handler needs besides the record itself.
 */
export interface StageContext {
  bucket: string;
  store: ObjectStore;
  prefixes: PrefixConfig;
  progress: Progress;
}

/**
 * A storage-triggered stage. The batch runner only hands it records for
 * the configured bucket whose key starts with `prefix`.
 */
export interface Stage {
  readonly name: StageName;
  readonly prefix: string;
  /** Returns a short summary for the completion event. */
  handle(record: TriggerRecord): Promise<string | undefined>;
}

/** What the invoking host gets back after a batch. */
export interface StageResult {
  statusCode: 200;
  body: { message: string };
}

export type RecordOutcome =
  | { key: string; status: "complete"; message?: string }
  | { key: string; status: "skipped"; reason: string }
  | { key: string; status: "error"; error: string };
