import { describe, it, expect, beforeEach } from "vitest";
import { MalformedSourceError } from "../../../errors.js";
import { MemoryObjectStore } from "../../../storage/memory-store.js";
import { createImageOnlyPdf, createTextPdf } from "../../../pdf/__tests__/create-test-pdf.js";
import { readPagesText } from "../../../pdf/document.js";
import { createNativeTextExtractor } from "../../steps/extract-native.js";
import { createTestConfig } from "../../__tests__/test-config.js";
import { createClassifyStage, createNativeStage, createOcrStage, createSplitStage } from "../pdf-runner.js";
import { createRecordingProgress, type ProgressEvent, type StageContext } from "../types.js";

describe("PDF stages", () => {
  let store: MemoryObjectStore;
  let events: ProgressEvent[];
  let ctx: StageContext;

  beforeEach(async () => {
    const config = await createTestConfig();
    store = new MemoryObjectStore();
    const progress = createRecordingProgress();
    events = progress.events;
    ctx = { bucket: config.bucket, store, prefixes: config.prefixes, progress };
  });

  describe("split", () => {
    it("writes every page unit and then the manifest", async () => {
      await store.put("pdf-raw/report.pdf", createTextPdf(["Alpha", "Beta"]));
      const stage = createSplitStage(ctx);

      const message = await stage.handle({ bucket: "test-bucket", key: "pdf-raw/report.pdf" });

      expect(stage.prefix).toBe("pdf-raw/");
      expect(message).toBe("2 pages");
      expect(await store.list("pdf-pages/")).toEqual([
        "pdf-pages/report/manifest.json",
        "pdf-pages/report/page_001.pdf",
        "pdf-pages/report/page_002.pdf",
      ]);
      expect(JSON.parse(store.text("pdf-pages/report/manifest.json") ?? "")).toEqual({
        documentId: "report",
        pages: 2,
        type: "pdf",
      });
      expect(events.map((e) => (e.type === "write" ? e.key : e.type))).toEqual([
        "pdf-pages/report/page_001.pdf",
        "pdf-pages/report/page_002.pdf",
        "pdf-pages/report/manifest.json",
      ]);

      const page2 = await store.get("pdf-pages/report/page_002.pdf");
      expect(page2 && readPagesText(page2)[0].trim()).toBe("Beta");
    });

    it("uses the basename of nested keys as the document id", async () => {
      await store.put("pdf-raw/2024/q1/summary.pdf", createTextPdf(["One"]));

      await createSplitStage(ctx).handle({ bucket: "test-bucket", key: "pdf-raw/2024/q1/summary.pdf" });

      expect(await store.exists("pdf-pages/summary/manifest.json")).toBe(true);
    });

    it("writes nothing for a source that is not a PDF", async () => {
      await store.put("pdf-raw/fake.pdf", "this is not a pdf at all");

      const err = await createSplitStage(ctx)
        .handle({ bucket: "test-bucket", key: "pdf-raw/fake.pdf" })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(MalformedSourceError);
      expect(await store.list("pdf-pages/")).toEqual([]);
    });
  });

  describe("classify", () => {
    it("routes text pages to native-pages and image pages to scan-pages", async () => {
      await store.put("pdf-pages/doc/page_001.pdf", createTextPdf(["Has text"]));
      await store.put("pdf-pages/doc/page_002.pdf", createImageOnlyPdf());
      const stage = createClassifyStage(ctx);

      expect(await stage.handle({ bucket: "test-bucket", key: "pdf-pages/doc/page_001.pdf" })).toBe(
        "has_native_text"
      );
      expect(await stage.handle({ bucket: "test-bucket", key: "pdf-pages/doc/page_002.pdf" })).toBe(
        "scanned"
      );

      expect(await store.list("native-pages/")).toEqual(["native-pages/doc/page_001.pdf"]);
      expect(await store.list("scan-pages/")).toEqual(["scan-pages/doc/page_002.pdf"]);
      expect(store.objects.get("scan-pages/doc/page_002.pdf")?.body).toEqual(
        store.objects.get("pdf-pages/doc/page_002.pdf")?.body
      );
    });

    it("ignores the manifest", async () => {
      await store.put("pdf-pages/doc/manifest.json", '{"documentId":"doc","pages":1}');

      const message = await createClassifyStage(ctx).handle({
        bucket: "test-bucket",
        key: "pdf-pages/doc/manifest.json",
      });

      expect(message).toBe("not a page unit");
      expect(await store.list("native-pages/")).toEqual([]);
      expect(await store.list("scan-pages/")).toEqual([]);
    });
  });

  describe("extraction", () => {
    it("writes native structured text as JSON", async () => {
      await store.put("native-pages/doc/page_003.pdf", createTextPdf(["Page three"]));

      const message = await createNativeStage(ctx, createNativeTextExtractor()).handle({
        bucket: "test-bucket",
        key: "native-pages/doc/page_003.pdf",
      });

      expect(message).toBe("native-text -> text-pages/doc/page_003.json");
      const output: unknown = JSON.parse(store.text("text-pages/doc/page_003.json") ?? "");
      expect(output).toHaveProperty("blocks");
    });

    it("writes OCR output as Markdown", async () => {
      await store.put("scan-pages/doc/page_002.pdf", createImageOnlyPdf());
      const stage = createOcrStage(ctx, {
        name: "ocr-fake",
        extract: async (unit) => ({ format: "markdown", content: `## Page ${unit.pageIndex}\n\nscanned\n` }),
      });

      await stage.handle({ bucket: "test-bucket", key: "scan-pages/doc/page_002.pdf" });

      expect(store.text("text-pages/doc/page_002.md")).toBe("## Page 2\n\nscanned\n");
      expect(store.objects.get("text-pages/doc/page_002.md")?.contentType).toBe("text/markdown");
    });

    it("writes no output when extraction fails", async () => {
      await store.put("scan-pages/doc/page_001.pdf", createImageOnlyPdf());
      const stage = createOcrStage(ctx, {
        name: "ocr-broken",
        extract: async () => {
          throw new Error("engine timed out");
        },
      });

      await expect(
        stage.handle({ bucket: "test-bucket", key: "scan-pages/doc/page_001.pdf" })
      ).rejects.toThrow("engine timed out");
      expect(await store.list("text-pages/")).toEqual([]);
    });
  });
});
