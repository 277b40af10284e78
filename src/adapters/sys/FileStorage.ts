import { promises as fs } from "fs";
import path from "path";
import type { StoragePort } from "../../ports/sys/StoragePort";

/** Writes values as files under a root directory; keys become file names. */
export class FileStorage implements StoragePort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async write(key: string, value: Buffer | string): Promise<string> {
    const target = this.resolveKey(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, value);
    return target;
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.root, key);
    const relative = path.relative(this.root, target);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Storage key "${key}" escapes ${this.root}.`);
    }
    return target;
  }
}
