import type { PrefixConfig } from "../config.js";
import { MalformedSourceError, errorMessage } from "../errors.js";
import type { ObjectStore } from "../storage/types.js";
import { manifestSchema, type DocumentType, type Manifest } from "./core/schemas.js";
import { resolveDocumentKeys } from "./types.js";

/**
 * Writes and reads the per-document manifest. The manifest is written once,
 * after every page unit, and is the signal that the page count is final.
 */
export class ManifestTracker {
  constructor(
    private readonly store: ObjectStore,
    private readonly prefixes: PrefixConfig
  ) {}

  keyFor(documentId: string): string {
    return resolveDocumentKeys(documentId, this.prefixes).manifest;
  }

  async write(documentId: string, pageCount: number, type?: DocumentType): Promise<string> {
    const manifest = manifestSchema.parse({ documentId, pages: pageCount, type });
    const key = this.keyFor(documentId);
    await this.store.put(key, JSON.stringify(manifest), "application/json");
    return key;
  }

  /**
   * The manifest, or null while the document is still being split.
   *
   * @throws MalformedSourceError when the stored manifest does not validate
   */
  async read(documentId: string): Promise<Manifest | null> {
    const key = this.keyFor(documentId);
    const body = await this.store.get(key);
    if (body === null) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(body.toString("utf-8"));
    } catch (err) {
      throw new MalformedSourceError(
        `Manifest ${key} is not valid JSON: ${errorMessage(err)}`,
        documentId,
        { cause: err }
      );
    }
    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedSourceError(
        `Manifest ${key} is invalid: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
        documentId
      );
    }
    return parsed.data;
  }
}
