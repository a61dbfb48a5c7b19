import fs from "node:fs";
import path from "node:path";
import { InvalidArgumentError, ObjectNotFoundError, StorageReadError, StorageWriteError } from "../core/errors";
import type { ObjectStore } from "./types";

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class LocalObjectStore implements ObjectStore {
  readonly location: string;
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    this.location = this.root;
  }

  async exists(key: string): Promise<boolean> {
    try {
      const stats = await fs.promises.stat(this.resolve(key));
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw new StorageReadError(key, { cause: error });
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.resolve(key));
    } catch (error) {
      if (isMissing(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw new StorageReadError(key, { cause: error });
    }
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    const finalPath = this.resolve(key);
    const tempPath = `${finalPath}.part`;

    try {
      await fs.promises.mkdir(path.dirname(finalPath), { recursive: true });
      await fs.promises.writeFile(tempPath, body);
      await fs.promises.rename(tempPath, finalPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw new StorageWriteError(key, { cause: error });
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    await this.walk(this.root, keys);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  private async walk(dir: string, keys: string[]): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walk(fullPath, keys);
      } else if (entry.isFile() && !entry.name.endsWith(".part")) {
        keys.push(path.relative(this.root, fullPath).split(path.sep).join("/"));
      }
    }
  }

  private resolve(key: string): string {
    const segments = key.split("/").filter((segment) => segment.length > 0);
    if (segments.some((segment) => segment === "..")) {
      throw new InvalidArgumentError(`Object key escapes the store root: ${key}`);
    }
    return path.join(this.root, ...segments);
  }
}
