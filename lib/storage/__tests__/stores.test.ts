import { describe, it, expect, beforeEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { StorageError } from "../../errors.js";
import { FsObjectStore } from "../fs-store.js";
import { MemoryObjectStore } from "../memory-store.js";
import { contentTypeForKey, requireObject, type ObjectStore } from "../types.js";

function storeContract(name: string, create: () => ObjectStore) {
  describe(name, () => {
    let store: ObjectStore;

    beforeEach(() => {
      store = create();
    });

    it("round-trips bodies and reports existence", async () => {
      await store.put("pdf-pages/doc/page_001.pdf", Buffer.from([1, 2, 3]));
      await store.put("text-pages/doc/page_001.md", "## Page 1\n");

      expect(await store.get("pdf-pages/doc/page_001.pdf")).toEqual(Buffer.from([1, 2, 3]));
      expect((await store.get("text-pages/doc/page_001.md"))?.toString("utf-8")).toBe("## Page 1\n");
      expect(await store.exists("text-pages/doc/page_001.md")).toBe(true);
      expect(await store.exists("text-pages/doc/page_002.md")).toBe(false);
    });

    it("returns null for a missing key", async () => {
      expect(await store.get("nope/missing.json")).toBeNull();
    });

    it("overwrites an existing key", async () => {
      await store.put("text-docs/doc.json", "{}");
      await store.put("text-docs/doc.json", '{"pageCount":2}');
      expect((await store.get("text-docs/doc.json"))?.toString("utf-8")).toBe('{"pageCount":2}');
    });

    it("lists keys under a prefix in ascending order", async () => {
      await store.put("pdf-pages/doc/page_002.pdf", "b");
      await store.put("pdf-pages/doc/manifest.json", "{}");
      await store.put("pdf-pages/doc/page_001.pdf", "a");
      await store.put("pdf-pages/other/page_001.pdf", "c");

      expect(await store.list("pdf-pages/doc/")).toEqual([
        "pdf-pages/doc/manifest.json",
        "pdf-pages/doc/page_001.pdf",
        "pdf-pages/doc/page_002.pdf",
      ]);
    });
  });
}

storeContract("MemoryObjectStore", () => new MemoryObjectStore());
storeContract(
  "FsObjectStore",
  () => new FsObjectStore(fs.mkdtempSync(path.join(os.tmpdir(), "fs-store-test-")))
);

describe("FsObjectStore", () => {
  it("rejects keys that escape the root", async () => {
    const store = new FsObjectStore(fs.mkdtempSync(path.join(os.tmpdir(), "fs-store-test-")));
    await expect(store.put("../outside.txt", "x")).rejects.toBeInstanceOf(StorageError);
  });

  it("does not list temp files", async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "fs-store-test-"));
    const store = new FsObjectStore(root);
    await store.put("raw/a.pdf", "a");
    fs.writeFileSync(path.join(root, "raw", "b.pdf.123.tmp"), "partial");

    expect(await store.list("raw/")).toEqual(["raw/a.pdf"]);
  });
});

describe("requireObject", () => {
  it("throws StorageError for a missing object", async () => {
    const err = await requireObject(new MemoryObjectStore(), "raw/gone.pdf").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    if (err instanceof StorageError) {
      expect(err.key).toBe("raw/gone.pdf");
      expect(err.message).toBe("Object raw/gone.pdf not found");
    }
  });
});

describe("contentTypeForKey", () => {
  it("maps pipeline extensions", () => {
    expect(contentTypeForKey("a/page_001.pdf")).toBe("application/pdf");
    expect(contentTypeForKey("a/page_001.md")).toBe("text/markdown");
    expect(contentTypeForKey("a/manifest.json")).toBe("application/json");
    expect(contentTypeForKey("raw/file.bin")).toBe("application/octet-stream");
  });
});
