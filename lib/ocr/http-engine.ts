/**
 * OCR engines reached over HTTP: a TrOCR inference endpoint and a
 * docling-serve instance.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod/v4";
import { OcrEngineError, errorMessage } from "../errors.js";
import { clampConfidence, type OcrEngine, type OcrResult } from "./types.js";

export interface HttpEngineOptions {
  endpoint: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

// ============================================================================
// TrOCR
// ============================================================================

// Either a plain {text, confidence} reply or the inference-API list form
const trocrReplySchema = z.union([
  z.object({ text: z.string(), confidence: z.number().optional() }),
  z.array(z.object({ generated_text: z.string(), score: z.number().optional() })).min(1),
]);

export function createTrocrEngine(options: HttpEngineOptions): OcrEngine {
  const http = options.http ?? axios.create();

  async function run(image: Buffer): Promise<OcrResult> {
    const data = await post(http, "trocr", options, {
      image: image.toString("base64"),
    });
    const reply = trocrReplySchema.safeParse(data);
    if (!reply.success) {
      throw new OcrEngineError("trocr returned an unexpected reply", "trocr");
    }
    if (Array.isArray(reply.data)) {
      const [first] = reply.data;
      return { text: first.generated_text, confidence: clampConfidence(first.score ?? 0) };
    }
    return { text: reply.data.text, confidence: clampConfidence(reply.data.confidence ?? 0) };
  }

  return { name: "trocr", run };
}

// ============================================================================
// Docling
// ============================================================================

const doclingReplySchema = z.object({
  status: z.string().optional(),
  document: z.object({ md_content: z.string().nullable().optional() }),
  errors: z.array(z.unknown()).optional(),
});

export function createDoclingEngine(options: HttpEngineOptions): OcrEngine {
  const http = options.http ?? axios.create();

  async function run(image: Buffer): Promise<OcrResult> {
    const data = await post(http, "docling", options, {
      options: { to_formats: ["md"], do_ocr: true, force_ocr: true },
      sources: [{ kind: "file", base64_string: image.toString("base64"), filename: "page.png" }],
    });
    const reply = doclingReplySchema.safeParse(data);
    if (!reply.success) {
      throw new OcrEngineError("docling returned an unexpected reply", "docling");
    }
    if (reply.data.status && reply.data.status !== "success") {
      throw new OcrEngineError(`docling conversion ${reply.data.status}`, "docling");
    }
    // docling reports no confidence
    return { text: reply.data.document.md_content ?? "", confidence: 0 };
  }

  return { name: "docling", run };
}

// ============================================================================
// Shared
// ============================================================================

async function post(
  http: AxiosInstance,
  engine: string,
  options: HttpEngineOptions,
  body: unknown
): Promise<unknown> {
  try {
    const response = await http.post<unknown>(options.endpoint, body, {
      timeout: options.timeoutMs,
      headers: { "Content-Type": "application/json" },
    });
    return response.data;
  } catch (err) {
    if (axios.isAxiosError(err) && err.response) {
      throw new OcrEngineError(
        `${engine} endpoint responded ${err.response.status}`,
        engine,
        { cause: err }
      );
    }
    throw new OcrEngineError(`${engine} request failed: ${errorMessage(err)}`, engine, { cause: err });
  }
}
