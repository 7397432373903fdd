/**
 * Object storage on the local filesystem, one file per key under a root
 * directory.
 */
import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { StorageKeyError } from "../core/exceptions.js";
import type { StorageBackend } from "./backend.js";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DiskStorage implements StorageBackend {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /** Absolute path of `key`; keys resolving outside the root are rejected. */
  private pathOf(key: string): string {
    const path = resolve(this.root, key);
    const rel = relative(this.root, path);
    if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new StorageKeyError(key);
    }
    return path;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const path = this.pathOf(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  }

  async read(key: string): Promise<Uint8Array> {
    return new Uint8Array(await readFile(this.pathOf(key)));
  }

  async list(prefix: string): Promise<string[]> {
    const start = prefix === "" ? this.root : this.pathOf(prefix);
    try {
      if ((await stat(start)).isFile()) return [this.keyOf(start)];
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const keys: string[] = [];
    const pending = [start];
    for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
      const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const path = join(dir, entry.name);
        if (entry.isDirectory()) pending.push(path);
        else if (entry.isFile()) keys.push(this.keyOf(path));
      }
    }
    return keys.sort();
  }

  private keyOf(path: string): string {
    return relative(this.root, path).split(sep).join("/");
  }
}
