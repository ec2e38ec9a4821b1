import { describe, it, expect } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  CachedParameters,
  chainSources,
  envSource,
  loadConfig,
  normalizePrefix,
  yamlSource,
  type ParameterSource,
} from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults when only the bucket is set", async () => {
    const config = await loadConfig(envSource({ BUCKET_NAME: "docs" }));

    expect(config.bucket).toBe("docs");
    expect(config.storage).toEqual({ backend: "s3", root: "objects" });
    expect(config.prefixes).toEqual({
      raw: "raw/",
      pdfRaw: "pdf-raw/",
      office: "office-docs/",
      pdfPages: "pdf-pages/",
      nativePages: "native-pages/",
      scanPages: "scan-pages/",
      textPages: "text-pages/",
      textDocs: "text-docs/",
    });
    expect(config.ocr.engine).toBe("easyocr");
    expect(config.ocr.languages).toEqual(["en"]);
    expect(config.ocr.dpi).toBe(300);
    expect(config.ocr.timeoutMs).toBe(60000);
    expect(config.output.apiUrl).toBeUndefined();
  });

  it("normalizes prefixes, engine and languages", async () => {
    const config = await loadConfig(
      envSource({
        BUCKET_NAME: "docs",
        RAW_PREFIX: "incoming",
        TEXT_DOC_PREFIX: "merged/",
        OCR_ENGINE: "PaddleOCR",
        OCR_LANGUAGES: "en, de,,fr",
        DPI: "150",
      })
    );

    expect(config.prefixes.raw).toBe("incoming/");
    expect(config.prefixes.textDocs).toBe("merged/");
    expect(config.ocr.engine).toBe("paddleocr");
    expect(config.ocr.languages).toEqual(["en", "de", "fr"]);
    expect(config.ocr.dpi).toBe(150);
  });

  it("treats empty environment values as unset", async () => {
    const config = await loadConfig(envSource({ BUCKET_NAME: "docs", OCR_ENGINE: "" }));
    expect(config.ocr.engine).toBe("easyocr");
  });

  it("rejects a missing bucket", async () => {
    const err = await loadConfig(envSource({})).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    if (err instanceof ConfigurationError) {
      expect(err.issues).toEqual(["bucket: BUCKET_NAME must be set"]);
      expect(err.category).toBe("CONFIGURATION");
    }
  });

  it("rejects an empty prefix", async () => {
    // YAML can carry an empty string, unlike the environment source
    const source = {
      async lookup(name: string) {
        if (name === "BUCKET_NAME") return "docs";
        return name === "RAW_PREFIX" ? "" : undefined;
      },
    };

    const err = await loadConfig(source).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    if (err instanceof ConfigurationError) {
      expect(err.issues).toEqual(["prefixes.raw: prefix must not be empty"]);
    }
  });

  it("reads the tesseract data directory", async () => {
    const config = await loadConfig(
      envSource({ BUCKET_NAME: "docs", TESSERACT_LANG_PATH: "/opt/tessdata" })
    );
    expect(config.ocr.tesseractLangPath).toBe("/opt/tessdata");
  });

  it("rejects an out-of-range DPI and a malformed URL", async () => {
    const err = await loadConfig(
      envSource({ BUCKET_NAME: "docs", DPI: "5", OUTPUT_API_URL: "not a url" })
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    if (err instanceof ConfigurationError) {
      expect(err.issues.map((i) => i.split(":")[0]).sort()).toEqual(["ocr.dpi", "output.apiUrl"]);
    }
  });
});

describe("parameter sources", () => {
  it("reads lower-case keys from YAML behind the environment", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
    const file = path.join(dir, "config.yaml");
    fs.writeFileSync(
      file,
      ["bucket_name: from-yaml", "dpi: 200", "ocr_languages:", "  - en", "  - fr", ""].join("\n")
    );

    const config = await loadConfig(
      chainSources(envSource({ BUCKET_NAME: "from-env" }), yamlSource(file))
    );

    expect(config.bucket).toBe("from-env");
    expect(config.ocr.dpi).toBe(200);
    expect(config.ocr.languages).toEqual(["en", "fr"]);
  });

  it("yields nothing for a missing YAML file", async () => {
    const source = yamlSource(path.join(os.tmpdir(), "does-not-exist", "config.yaml"));
    expect(await source.lookup("BUCKET_NAME")).toBeUndefined();
  });

  it("caches lookups for the lifetime of the instance", async () => {
    let calls = 0;
    const source: ParameterSource = {
      async lookup(name) {
        calls++;
        return name === "BUCKET_NAME" ? "docs" : undefined;
      },
    };
    const cached = new CachedParameters(source);

    expect(await cached.lookup("BUCKET_NAME")).toBe("docs");
    expect(await cached.lookup("BUCKET_NAME")).toBe("docs");
    expect(calls).toBe(1);
    expect(cached.size).toBe(1);
  });

  it("retries a lookup that failed", async () => {
    let calls = 0;
    const cached = new CachedParameters({
      async lookup() {
        calls++;
        if (calls === 1) throw new Error("parameter store unavailable");
        return "docs";
      },
    });

    await expect(cached.lookup("BUCKET_NAME")).rejects.toThrow("parameter store unavailable");
    expect(await cached.lookup("BUCKET_NAME")).toBe("docs");
    expect(calls).toBe(2);
  });
});

describe("normalizePrefix", () => {
  it("adds a trailing slash", () => {
    expect(normalizePrefix("raw")).toBe("raw/");
    expect(normalizePrefix("raw/")).toBe("raw/");
  });
});
