import { ObjectNotFoundError } from "../core/errors";
import type { ObjectStore } from "./types";

export type StoreOperation = "exists" | "get" | "put" | "list";

export class MemoryObjectStore implements ObjectStore {
  readonly location: string;
  readonly operations: Array<{ op: StoreOperation; key: string }> = [];
  private readonly objects = new Map<string, Buffer>();

  constructor(location = "memory://") {
    this.location = location;
  }

  async exists(key: string): Promise<boolean> {
    this.operations.push({ op: "exists", key });
    return this.objects.has(key);
  }

  async get(key: string): Promise<Buffer> {
    this.operations.push({ op: "get", key });
    const body = this.objects.get(key);
    if (!body) {
      throw new ObjectNotFoundError(key);
    }
    return Buffer.from(body);
  }

  async put(key: string, body: Buffer | string): Promise<void> {
    this.operations.push({ op: "put", key });
    this.objects.set(key, Buffer.from(body));
  }

  async list(prefix: string): Promise<string[]> {
    this.operations.push({ op: "list", key: prefix });
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  count(op: StoreOperation): number {
    return this.operations.filter((entry) => entry.op === op).length;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
