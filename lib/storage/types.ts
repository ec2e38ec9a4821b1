import { StorageError } from "../errors.js";

/**
 * Object storage contract used by every pipeline stage.
 *
 * Keys are plain strings of the form `<prefix>/<documentId>/<artifact>`.
 * Implementations: S3, local filesystem, in-memory.
 */
export interface ObjectStore {
  /** Object body, or null when the key does not exist */
  get(key: string): Promise<Buffer | null>;

  put(key: string, body: Buffer | string, contentType?: string): Promise<void>;

  exists(key: string): Promise<boolean>;

  /** Keys under a prefix, sorted ascending */
  list(prefix: string): Promise<string[]>;
}

export function contentTypeForKey(key: string): string {
  const ext = key.slice(key.lastIndexOf(".") + 1).toLowerCase();
  switch (ext) {
    case "pdf":
      return "application/pdf";
    case "json":
      return "application/json";
    case "md":
      return "text/markdown";
    case "docx":
      return "application/vnd.openxmlformats-officedocument.wordprocessingml.document";
    case "pptx":
      return "application/vnd.openxmlformats-officedocument.presentationml.presentation";
    case "xlsx":
      return "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
    default:
      return "application/octet-stream";
  }
}

/**
 * Body of an object that the trigger says exists.
 *
 * @throws StorageError when the object is missing
 */
export async function requireObject(store: ObjectStore, key: string): Promise<Buffer> {
  const body = await store.get(key);
  if (body === null) {
    throw new StorageError(`Object ${key} not found`, key);
  }
  return body;
}
