import type { ObjectStore } from "./types.js";

export interface StoredObject {
  body: Buffer;
  contentType?: string;
}

/**
 * In-process store. Used by tests and by dry runs of the local driver.
 */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();

  async get(key: string): Promise<Buffer | null> {
    return this.objects.get(key)?.body ?? null;
  }

  async put(key: string, body: Buffer | string, contentType?: string): Promise<void> {
    this.objects.set(key, {
      body: typeof body === "string" ? Buffer.from(body, "utf-8") : body,
      contentType,
    });
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  /** Decoded UTF-8 body, for assertions */
  text(key: string): string | undefined {
    return this.objects.get(key)?.body.toString("utf-8");
  }
}
