/**
 * EasyOCR and PaddleOCR run in a Python child process. The image is written
 * to a temp file, the worker prints one JSON line with the result.
 */

import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { PythonShell, type Options } from "python-shell";
import { z } from "zod/v4";
import { OcrEngineError } from "../errors.js";
import { clampConfidence, type OcrEngine, type OcrEngineOptions, type OcrResult } from "./types.js";

export type PythonEngineName = "easyocr" | "paddleocr";

const MAX_STDERR_LENGTH = 8192;

const workerReplySchema = z.union([
  z.object({ text: z.string(), confidence: z.number() }),
  z.object({ error: z.string() }),
]);

/** The worker script ships in `python/` at the package root, next to `lib/` or `dist/`. */
export function defaultWorkerPath(): string {
  const candidates = ["../../python/ocr_worker.py", "../../../python/ocr_worker.py"].map((rel) =>
    fileURLToPath(new URL(rel, import.meta.url))
  );
  return candidates.find((candidate) => existsSync(candidate)) ?? candidates[0];
}

export interface PythonEngineOptions extends OcrEngineOptions {
  workerPath?: string;
}

export function createPythonEngine(
  engine: PythonEngineName,
  options: PythonEngineOptions
): OcrEngine {
  const workerPath = options.workerPath ?? defaultWorkerPath();

  async function run(image: Buffer): Promise<OcrResult> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "docpipe-ocr-"));
    const imagePath = path.join(dir, "page.png");
    try {
      await fs.writeFile(imagePath, image);
      const output = await runWorker(imagePath);
      return parseReply(output);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  function runWorker(imagePath: string): Promise<string> {
    const shellOptions: Options = {
      mode: "text",
      pythonPath: options.pythonPath,
      pythonOptions: ["-u"],
      args: ["--engine", engine, "--image", imagePath, "--languages", options.languages.join(",")],
    };

    return new Promise((resolve, reject) => {
      let settled = false;
      const shell = new PythonShell(workerPath, shellOptions);
      const lines: string[] = [];
      let stderr = "";

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        shell.kill();
        reject(new OcrEngineError(`${engine} timed out after ${options.timeoutMs}ms`, engine));
      }, options.timeoutMs);

      // Spawn failures (a missing interpreter) arrive here, not in `end`
      shell.on("error", (err: Error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new OcrEngineError(`${engine} worker failed to start: ${err.message}`, engine, { cause: err }));
      });

      shell.on("message", (line: string) => {
        lines.push(line);
      });

      shell.on("stderr", (line: string) => {
        if (stderr.length < MAX_STDERR_LENGTH) stderr += line + "\n";
      });

      shell.end((err?: Error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        if (err) {
          const detail = stderr.trim() || err.message;
          reject(new OcrEngineError(`${engine} worker failed: ${detail}`, engine, { cause: err }));
          return;
        }
        resolve(lines.join("\n"));
      });
    });
  }

  function parseReply(output: string): OcrResult {
    // The last non-empty line carries the result; earlier lines are library noise
    const last = output.trim().split("\n").pop() ?? "";
    let json: unknown;
    try {
      json = JSON.parse(last);
    } catch (err) {
      throw new OcrEngineError(`${engine} worker returned invalid JSON`, engine, { cause: err });
    }
    const reply = workerReplySchema.safeParse(json);
    if (!reply.success) {
      throw new OcrEngineError(`${engine} worker returned an unexpected reply`, engine);
    }
    if ("error" in reply.data) {
      throw new OcrEngineError(`${engine}: ${reply.data.error}`, engine);
    }
    return { text: reply.data.text, confidence: clampConfidence(reply.data.confidence) };
  }

  return { name: engine, run };
}
