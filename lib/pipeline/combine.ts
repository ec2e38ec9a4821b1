/**
 * Combine
 *
 * Re-checks a document every time one of its page outputs is written and
 * merges all pages once the last one exists. There is no shared counter:
 * completeness is derived from the manifest and what is in storage.
 *
 *   splitting  --manifest written-->  assembling  --all pages present-->  complete
 */

import type { PrefixConfig } from "../config.js";
import { MalformedSourceError, errorMessage } from "../errors.js";
import type { ObjectStore } from "../storage/types.js";
import type { MergedDocument } from "./core/schemas.js";
import type { AssemblyState } from "./core/types.js";
import { ManifestTracker } from "./manifest.js";
import { nullProgress, type Progress } from "./runner/types.js";
import {
  PAGE_OUTPUT_EXTENSIONS,
  resolveDocumentKeys,
  type DocumentKeys,
  type PageOutputExtension,
} from "./types.js";

export type AssembleResult =
  | { outcome: "no-manifest"; documentId: string }
  | { outcome: "waiting"; documentId: string; pageIndex: number; pageCount: number }
  | { outcome: "merged"; documentId: string; key: string; document: MergedDocument };

interface FoundOutput {
  key: string;
  extension: PageOutputExtension;
}

export class CombineAssembler {
  private readonly manifests: ManifestTracker;

  constructor(
    private readonly store: ObjectStore,
    private readonly prefixes: PrefixConfig,
    private readonly progress: Progress = nullProgress
  ) {
    this.manifests = new ManifestTracker(store, prefixes);
  }

  /**
   * Merge the document if every page output is present. Otherwise a no-op:
   * nothing is written while the manifest or any page is missing.
   */
  async assemble(documentId: string): Promise<AssembleResult> {
    const manifest = await this.manifests.read(documentId);
    if (!manifest) {
      return { outcome: "no-manifest", documentId };
    }

    const keys = resolveDocumentKeys(documentId, this.prefixes);
    const found: FoundOutput[] = [];
    for (let pageIndex = 1; pageIndex <= manifest.pages; pageIndex++) {
      const output = await this.findOutput(keys, pageIndex);
      if (!output) {
        this.progress.emit({
          type: "waiting",
          stage: "combine",
          documentId,
          pageIndex,
          pageCount: manifest.pages,
        });
        return { outcome: "waiting", documentId, pageIndex, pageCount: manifest.pages };
      }
      found.push(output);
    }

    const pages: unknown[] = [];
    for (const output of found) {
      pages.push(await this.readOutput(documentId, output));
    }

    const document: MergedDocument = {
      documentId,
      type: manifest.type ?? "pdf",
      pageCount: manifest.pages,
      pages,
    };
    await this.store.put(keys.merged, JSON.stringify(document), "application/json");
    this.progress.emit({ type: "write", stage: "combine", key: keys.merged });
    return { outcome: "merged", documentId, key: keys.merged, document };
  }

  /** Where the document is in its lifecycle, with every missing page. */
  async status(documentId: string): Promise<AssemblyState> {
    const manifest = await this.manifests.read(documentId);
    if (!manifest) {
      return { state: "splitting", documentId };
    }

    const keys = resolveDocumentKeys(documentId, this.prefixes);
    if (await this.store.exists(keys.merged)) {
      return { state: "complete", documentId, pageCount: manifest.pages };
    }

    const missingPages: number[] = [];
    for (let pageIndex = 1; pageIndex <= manifest.pages; pageIndex++) {
      if (!(await this.findOutput(keys, pageIndex))) missingPages.push(pageIndex);
    }
    return { state: "assembling", documentId, pageCount: manifest.pages, missingPages };
  }

  private async findOutput(keys: DocumentKeys, pageIndex: number): Promise<FoundOutput | null> {
    for (const extension of PAGE_OUTPUT_EXTENSIONS) {
      const key = keys.pageOutput(pageIndex, extension);
      if (await this.store.exists(key)) return { key, extension };
    }
    return null;
  }

  private async readOutput(documentId: string, output: FoundOutput): Promise<unknown> {
    const body = await this.store.get(output.key);
    if (body === null) {
      // Existed when probed
      throw new MalformedSourceError(`Page output ${output.key} disappeared`, documentId);
    }
    const text = body.toString("utf-8");
    if (output.extension === "md") return text;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new MalformedSourceError(
        `Page output ${output.key} is not valid JSON: ${errorMessage(err)}`,
        documentId,
        { cause: err }
      );
    }
  }
}
