import { describe, it, expect } from "vitest";
import { createNativeTextExtractor } from "../extract-native.js";
import { createTextPdf } from "../../../pdf/__tests__/create-test-pdf.js";

describe("createNativeTextExtractor", () => {
  it("returns structured text as JSON output", async () => {
    const extractor = createNativeTextExtractor();
    const output = await extractor.extract({
      documentId: "report",
      pageIndex: 1,
      bytes: createTextPdf(["Native words"]),
    });

    expect(extractor.name).toBe("native-text");
    expect(output.format).toBe("json");
    expect(output.content).toHaveProperty("blocks");
    expect(JSON.stringify(output.content)).toContain("Native words");
  });

  it("uses the injected reader", async () => {
    const extractor = createNativeTextExtractor(() => ({ blocks: [] }));
    const output = await extractor.extract({ documentId: "d", pageIndex: 4, bytes: Buffer.alloc(0) });
    expect(output).toEqual({ format: "json", content: { blocks: [] } });
  });

  it("rejects when the page cannot be read", async () => {
    const extractor = createNativeTextExtractor(() => {
      throw new Error("damaged page");
    });
    await expect(
      extractor.extract({ documentId: "d", pageIndex: 1, bytes: Buffer.alloc(0) })
    ).rejects.toThrow("damaged page");
  });
});
