/**
 * Pipeline error classes.
 *
 * Configuration errors are thrown while a stage is being created and abort
 * the whole invocation. Every other category is local to one trigger record:
 * the batch runner catches it, reports it and moves on to the next record.
 */

export type PipelineErrorCategory =
  | "CONFIGURATION"
  | "UNSUPPORTED_ENGINE"
  | "MALFORMED_SOURCE"
  | "OCR_ENGINE"
  | "STORAGE"
  | "OUTPUT_DISPATCH";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: PipelineErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "CONFIGURATION");
    this.name = "ConfigurationError";
  }
}

export class UnsupportedEngineError extends PipelineError {
  constructor(
    public readonly engine: string,
    public readonly supported: readonly string[]
  ) {
    super(
      `Unsupported OCR engine "${engine}". Expected one of: ${supported.join(", ")}`,
      "UNSUPPORTED_ENGINE"
    );
    this.name = "UnsupportedEngineError";
  }
}

export class MalformedSourceError extends PipelineError {
  constructor(
    message: string,
    public readonly documentId: string,
    options?: { cause?: unknown }
  ) {
    super(message, "MALFORMED_SOURCE", options);
    this.name = "MalformedSourceError";
  }
}

export class OcrEngineError extends PipelineError {
  constructor(
    message: string,
    public readonly engine: string,
    options?: { cause?: unknown }
  ) {
    super(message, "OCR_ENGINE", options);
    this.name = "OcrEngineError";
  }
}

export class StorageError extends PipelineError {
  constructor(
    message: string,
    public readonly key: string,
    options?: { cause?: unknown }
  ) {
    super(message, "STORAGE", options);
    this.name = "StorageError";
  }
}

export class OutputDispatchError extends PipelineError {
  constructor(
    message: string,
    public readonly documentId: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "OUTPUT_DISPATCH", options);
    this.name = "OutputDispatchError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
