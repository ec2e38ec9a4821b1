import path from "node:path";
import type { PrefixConfig } from "../config.js";

export type PageOutputExtension = "md" | "json";

/**
 * Extensions probed for a page output, in precedence order. When both
 * exist for the same page the Markdown object is used.
 */
export const PAGE_OUTPUT_EXTENSIONS: readonly PageOutputExtension[] = ["md", "json"];

export function formatPageNumber(pageIndex: number): string {
  return String(pageIndex).padStart(3, "0");
}

export function pageFileName(pageIndex: number, ext: string): string {
  return `page_${formatPageNumber(pageIndex)}.${ext}`;
}

export interface DocumentKeys {
  documentId: string;
  manifest: string;
  merged: string;
  pageUnit(pageIndex: number): string;
  nativePage(pageIndex: number): string;
  scanPage(pageIndex: number): string;
  pageOutput(pageIndex: number, ext: PageOutputExtension): string;
}

export function resolveDocumentKeys(
  documentId: string,
  prefixes: PrefixConfig
): DocumentKeys {
  return {
    documentId,
    manifest: `${prefixes.pdfPages}${documentId}/manifest.json`,
    merged: `${prefixes.textDocs}${documentId}.json`,
    pageUnit: (n) => `${prefixes.pdfPages}${documentId}/${pageFileName(n, "pdf")}`,
    nativePage: (n) => `${prefixes.nativePages}${documentId}/${pageFileName(n, "pdf")}`,
    scanPage: (n) => `${prefixes.scanPages}${documentId}/${pageFileName(n, "pdf")}`,
    pageOutput: (n, ext) => `${prefixes.textPages}${documentId}/${pageFileName(n, ext)}`,
  };
}

/** Document id from a source key: the basename without its extension. */
export function documentIdFromKey(key: string): string {
  return path.posix.basename(key, path.posix.extname(key));
}

export function extensionOf(key: string): string {
  return path.posix.extname(key).slice(1).toLowerCase();
}

export interface PageKey {
  documentId: string;
  pageIndex: number;
  extension: string;
  /** Key with the prefix removed, e.g. `doc1/page_002.pdf` */
  relative: string;
}

const PAGE_KEY_PATTERN = /^(.+)\/page_(\d+)\.([A-Za-z0-9]+)$/;

/**
 * Parse `<prefix><documentId>/page_NNN.<ext>`. Returns null for keys
 * outside the prefix or with a different shape.
 */
export function parsePageKey(key: string, prefix: string): PageKey | null {
  if (!key.startsWith(prefix)) return null;
  const relative = key.slice(prefix.length);
  const match = PAGE_KEY_PATTERN.exec(relative);
  if (!match) return null;
  const pageIndex = Number.parseInt(match[2], 10);
  if (pageIndex < 1) return null;
  return {
    documentId: match[1],
    pageIndex,
    extension: match[3].toLowerCase(),
    relative,
  };
}
