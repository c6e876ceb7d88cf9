import { promises as fs } from "fs";
import path from "path";
import type { StoragePort } from "../../ports/sys/StoragePort";

/** Stores values as files inside one root directory. Keys are file names. */
export class LocalFileStorage implements StoragePort {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async write(key: string, value: Buffer | string): Promise<string> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, value);
    return target;
  }

  private resolve(key: string): string {
    const target = path.resolve(this.root, key);
    const relative = path.relative(this.root, target);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Key "${key}" resolves outside ${this.root}`);
    }
    return target;
  }
}
