import fs from "node:fs";
import path from "node:path";
import type { ObjectStore } from "./types.js";
import { StorageError } from "../errors.js";

/**
 * Filesystem-backed store: each key is a file below `root`.
 * Writes go to a temp file first and are renamed into place, so a reader
 * never observes a half-written object.
 */
export class FsObjectStore implements ObjectStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.root, key);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new StorageError(`Key escapes storage root: ${key}`, key);
    }
    return resolved;
  }

  async get(key: string): Promise<Buffer | null> {
    const file = this.resolveKey(key);
    if (!fs.existsSync(file)) return null;
    return fs.promises.readFile(file);
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    const file = this.resolveKey(key);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    const tmp = `${file}.${process.pid}.tmp`;
    await fs.promises.writeFile(tmp, body);
    await fs.promises.rename(tmp, file);
  }

  async exists(key: string): Promise<boolean> {
    return fs.existsSync(this.resolveKey(key));
  }

  async list(prefix: string): Promise<string[]> {
    if (!fs.existsSync(this.root)) return [];
    const keys: string[] = [];
    const walk = (dir: string) => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (!entry.name.endsWith(".tmp")) {
          const key = path.relative(this.root, full).split(path.sep).join("/");
          if (key.startsWith(prefix)) keys.push(key);
        }
      }
    };
    walk(this.root);
    return keys.sort();
  }
}
