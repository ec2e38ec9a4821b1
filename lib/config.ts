import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "./errors.js";

// ============================================================================
// Parameter sources
// ============================================================================

/**
 * A named-parameter lookup. Parameters use the upper-case environment
 * names (`BUCKET_NAME`, `OCR_ENGINE`, ...).
 */
export interface ParameterSource {
  lookup(name: string): Promise<string | undefined>;
}

export function envSource(
  env: Record<string, string | undefined> = process.env
): ParameterSource {
  return {
    async lookup(name) {
      const value = env[name];
      return value === undefined || value === "" ? undefined : value;
    },
  };
}

/**
 * Reads a flat YAML mapping whose keys are the lower-case parameter names
 * (`bucket_name: my-bucket`). A missing file yields an empty source.
 */
export function yamlSource(configPath: string): ParameterSource {
  let values: Record<string, string> | undefined;

  function load(): Record<string, string> {
    if (values) return values;
    values = {};
    if (!fs.existsSync(configPath)) return values;
    const raw: unknown = yaml.load(fs.readFileSync(configPath, "utf-8"));
    if (raw === null || raw === undefined) return values;
    const parsed = z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])).safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${configPath}`, parsed.error.issues.map((i) => i.message));
    }
    for (const [key, value] of Object.entries(parsed.data)) {
      values[key.toLowerCase()] = Array.isArray(value) ? value.join(",") : String(value);
    }
    return values;
  }

  return {
    async lookup(name) {
      return load()[name.toLowerCase()];
    },
  };
}

/** First source that has a value wins. */
export function chainSources(...sources: ParameterSource[]): ParameterSource {
  return {
    async lookup(name) {
      for (const source of sources) {
        const value = await source.lookup(name);
        if (value !== undefined) return value;
      }
      return undefined;
    },
  };
}

/**
 * Caches lookups for the lifetime of the instance. Values are fetched on
 * first use and never invalidated; create a new instance to re-read.
 */
export class CachedParameters implements ParameterSource {
  private readonly cache = new Map<string, Promise<string | undefined>>();

  constructor(private readonly source: ParameterSource) {}

  lookup(name: string): Promise<string | undefined> {
    let pending = this.cache.get(name);
    if (!pending) {
      pending = this.source.lookup(name);
      this.cache.set(name, pending);
      // A failed lookup is not cached so the next invocation retries it
      void pending.catch(() => this.cache.delete(name));
    }
    return pending;
  }

  get size(): number {
    return this.cache.size;
  }
}

// ============================================================================
// Config schema
// ============================================================================

export function normalizePrefix(prefix: string): string {
  return prefix.endsWith("/") ? prefix : `${prefix}/`;
}

// An empty prefix would match every key, including each stage's own output
const prefix = (fallback: string) =>
  z.string().min(1, "prefix must not be empty").default(fallback).transform(normalizePrefix);

const configSchema = z.object({
  bucket: z.string({ error: "BUCKET_NAME must be set" }).min(1, "BUCKET_NAME must be set"),
  storage: z.object({
    backend: z.enum(["s3", "fs"]).default("s3"),
    root: z.string().default("objects"),
    region: z.string().optional(),
    endpoint: z.url().optional(),
  }),
  prefixes: z.object({
    raw: prefix("raw/"),
    pdfRaw: prefix("pdf-raw/"),
    office: prefix("office-docs/"),
    pdfPages: prefix("pdf-pages/"),
    nativePages: prefix("native-pages/"),
    scanPages: prefix("scan-pages/"),
    textPages: prefix("text-pages/"),
    textDocs: prefix("text-docs/"),
  }),
  ocr: z.object({
    engine: z.string().default("easyocr").transform((s) => s.toLowerCase()),
    languages: z
      .string()
      .default("en")
      .transform((s) => s.split(",").map((l) => l.trim()).filter(Boolean)),
    dpi: z.coerce.number().int().min(36).max(1200).default(300),
    timeoutMs: z.coerce.number().int().positive().default(60000),
    trocrEndpoint: z.url().optional(),
    doclingEndpoint: z.url().optional(),
    pythonPath: z.string().optional(),
    tesseractLangPath: z.string().optional(),
  }),
  output: z.object({
    apiUrl: z.url().optional(),
    apiKey: z.string().optional(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;
export type PrefixConfig = AppConfig["prefixes"];
export type OcrConfig = AppConfig["ocr"];

/** Parameter names read by {@link loadConfig}. */
export const PARAMETER_NAMES = [
  "BUCKET_NAME",
  "STORAGE_BACKEND",
  "STORAGE_ROOT",
  "AWS_REGION",
  "S3_ENDPOINT",
  "RAW_PREFIX",
  "PDF_RAW_PREFIX",
  "OFFICE_PREFIX",
  "PDF_PAGE_PREFIX",
  "PDF_TEXT_PAGE_PREFIX",
  "PDF_SCAN_PAGE_PREFIX",
  "TEXT_PAGE_PREFIX",
  "TEXT_DOC_PREFIX",
  "OCR_ENGINE",
  "OCR_LANGUAGES",
  "DPI",
  "OCR_TIMEOUT_MS",
  "TROCR_ENDPOINT",
  "DOCLING_ENDPOINT",
  "PYTHON_PATH",
  "TESSERACT_LANG_PATH",
  "OUTPUT_API_URL",
  "OUTPUT_API_KEY",
] as const;

type ParameterName = (typeof PARAMETER_NAMES)[number];

// ============================================================================
// Loading
// ============================================================================

/**
 * Default parameter provider: environment first, then `config.yaml` in the
 * working directory (or `CONFIG_PATH`).
 */
export function defaultParameters(
  env: Record<string, string | undefined> = process.env
): CachedParameters {
  const configPath = env.CONFIG_PATH ?? path.resolve(process.cwd(), "config.yaml");
  return new CachedParameters(chainSources(envSource(env), yamlSource(configPath)));
}

/**
 * Resolve and validate the pipeline configuration.
 *
 * @throws ConfigurationError when a required setting is missing or a value
 *   does not validate.
 */
export async function loadConfig(
  params: ParameterSource = defaultParameters()
): Promise<AppConfig> {
  const values = new Map<ParameterName, string | undefined>();
  for (const name of PARAMETER_NAMES) {
    values.set(name, await params.lookup(name));
  }
  const v = (name: ParameterName) => values.get(name);

  const raw = {
    bucket: v("BUCKET_NAME"),
    storage: {
      backend: v("STORAGE_BACKEND"),
      root: v("STORAGE_ROOT"),
      region: v("AWS_REGION"),
      endpoint: v("S3_ENDPOINT"),
    },
    prefixes: {
      raw: v("RAW_PREFIX"),
      pdfRaw: v("PDF_RAW_PREFIX"),
      office: v("OFFICE_PREFIX"),
      pdfPages: v("PDF_PAGE_PREFIX"),
      nativePages: v("PDF_TEXT_PAGE_PREFIX"),
      scanPages: v("PDF_SCAN_PAGE_PREFIX"),
      textPages: v("TEXT_PAGE_PREFIX"),
      textDocs: v("TEXT_DOC_PREFIX"),
    },
    ocr: {
      engine: v("OCR_ENGINE"),
      languages: v("OCR_LANGUAGES"),
      dpi: v("DPI"),
      timeoutMs: v("OCR_TIMEOUT_MS"),
      trocrEndpoint: v("TROCR_ENDPOINT"),
      doclingEndpoint: v("DOCLING_ENDPOINT"),
      pythonPath: v("PYTHON_PATH"),
      tesseractLangPath: v("TESSERACT_LANG_PATH"),
    },
    output: {
      apiUrl: v("OUTPUT_API_URL"),
      apiKey: v("OUTPUT_API_KEY"),
    },
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
