import { envSource, loadConfig, type AppConfig } from "../../config.js";
import type { OcrEngine, OcrResult } from "../../ocr/types.js";

export async function createTestConfig(overrides: Record<string, string> = {}): Promise<AppConfig> {
  return loadConfig(
    envSource({
      BUCKET_NAME: "test-bucket",
      STORAGE_BACKEND: "fs",
      OCR_ENGINE: "fake",
      ...overrides,
    })
  );
}

/** OCR engine that returns fixed text and records the images it saw. */
export function createFakeOcrEngine(
  text: string,
  confidence = 0.9
): OcrEngine & { images: Buffer[] } {
  const images: Buffer[] = [];
  return {
    name: "fake",
    images,
    async run(image: Buffer): Promise<OcrResult> {
      images.push(image);
      return { text, confidence };
    },
  };
}
