import { describe, it, expect } from "vitest";
import { createTestConfig } from "./test-config.js";
import {
  documentIdFromKey,
  extensionOf,
  pageFileName,
  parsePageKey,
  resolveDocumentKeys,
} from "../types.js";

describe("resolveDocumentKeys", () => {
  it("builds every artifact key for a document", async () => {
    const { prefixes } = await createTestConfig();
    const keys = resolveDocumentKeys("report", prefixes);

    expect(keys.manifest).toBe("pdf-pages/report/manifest.json");
    expect(keys.merged).toBe("text-docs/report.json");
    expect(keys.pageUnit(1)).toBe("pdf-pages/report/page_001.pdf");
    expect(keys.nativePage(12)).toBe("native-pages/report/page_012.pdf");
    expect(keys.scanPage(3)).toBe("scan-pages/report/page_003.pdf");
    expect(keys.pageOutput(2, "md")).toBe("text-pages/report/page_002.md");
    expect(keys.pageOutput(2, "json")).toBe("text-pages/report/page_002.json");
  });
});

describe("pageFileName", () => {
  it("pads to three digits and prints wider numbers as-is", () => {
    expect(pageFileName(7, "pdf")).toBe("page_007.pdf");
    expect(pageFileName(1234, "md")).toBe("page_1234.md");
  });
});

describe("parsePageKey", () => {
  it("parses a page key under the prefix", () => {
    expect(parsePageKey("scan-pages/report/page_010.pdf", "scan-pages/")).toEqual({
      documentId: "report",
      pageIndex: 10,
      extension: "pdf",
      relative: "report/page_010.pdf",
    });
  });

  it("accepts page numbers wider than three digits", () => {
    expect(parsePageKey("text-pages/big/page_1001.md", "text-pages/")?.pageIndex).toBe(1001);
  });

  it("returns null outside the prefix, for manifests and for page zero", () => {
    expect(parsePageKey("other/report/page_001.pdf", "scan-pages/")).toBeNull();
    expect(parsePageKey("pdf-pages/report/manifest.json", "pdf-pages/")).toBeNull();
    expect(parsePageKey("pdf-pages/report/page_000.pdf", "pdf-pages/")).toBeNull();
  });
});

describe("key helpers", () => {
  it("derives the document id from the basename", () => {
    expect(documentIdFromKey("pdf-raw/2024/annual report.pdf")).toBe("annual report");
    expect(documentIdFromKey("office-docs/deck.v2.pptx")).toBe("deck.v2");
  });

  it("lower-cases extensions", () => {
    expect(extensionOf("raw/SCAN.PDF")).toBe("pdf");
    expect(extensionOf("raw/README")).toBe("");
  });
});
