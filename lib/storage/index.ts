import type { AppConfig } from "../config.js";
import type { ObjectStore } from "./types.js";
import { FsObjectStore } from "./fs-store.js";
import { S3ObjectStore } from "./s3-store.js";

export { type ObjectStore, contentTypeForKey, requireObject } from "./types.js";
export { FsObjectStore } from "./fs-store.js";
export { S3ObjectStore, type S3StoreConfig } from "./s3-store.js";
export { MemoryObjectStore, type StoredObject } from "./memory-store.js";

/**
 * Create the store selected by `STORAGE_BACKEND`. The filesystem backend
 * keeps one directory per bucket below `STORAGE_ROOT`.
 */
export function createObjectStore(config: AppConfig): ObjectStore {
  const { storage, bucket } = config;
  if (storage.backend === "fs") {
    return new FsObjectStore(`${storage.root}/${bucket}`);
  }
  return new S3ObjectStore({
    bucket,
    region: storage.region,
    endpoint: storage.endpoint,
  });
}
