import { z } from "zod";
import type { CollectionDefinition } from "../config/types";
import { collectionId } from "../config/collections";
import type { YearMonth } from "../core/dates";
import { ManifestNotFoundError, ObjectNotFoundError, StorageReadError, StorageWriteError } from "../core/errors";
import type { LinkManifest } from "../types";
import { manifestKey, manifestKeyDay, manifestPrefix } from "./keys";
import type { ObjectStore } from "./types";

const manifestBodySchema = z.union([
  z.object({
    collection: z.string(),
    date: z.string(),
    links: z.array(z.string()),
  }),
  z.array(z.string()),
]);

export class ManifestStore {
  constructor(private readonly store: ObjectStore) {}

  get location(): string {
    return this.store.location;
  }

  key(collection: CollectionDefinition, date: string): string {
    return manifestKey(collection, date);
  }

  async exists(collection: CollectionDefinition, date: string): Promise<boolean> {
    return this.store.exists(manifestKey(collection, date));
  }

  async read(collection: CollectionDefinition, date: string): Promise<LinkManifest> {
    const key = manifestKey(collection, date);
    let body: Buffer;
    try {
      body = await this.store.get(key);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        throw new ManifestNotFoundError(collectionId(collection), date);
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(body.toString("utf-8"));
    } catch (error) {
      throw new StorageReadError(key, { cause: error });
    }

    const parsed = manifestBodySchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageReadError(key, { cause: parsed.error });
    }

    // Older manifests hold only the bare list of links.
    if (Array.isArray(parsed.data)) {
      return { collection: collectionId(collection), date, links: parsed.data };
    }
    return parsed.data;
  }

  /** Writes the whole manifest in one put and returns its key. */
  async write(collection: CollectionDefinition, date: string, links: string[]): Promise<string> {
    const key = manifestKey(collection, date);
    const manifest: LinkManifest = { collection: collectionId(collection), date, links };
    try {
      await this.store.put(key, JSON.stringify(manifest), "application/json");
    } catch (error) {
      if (error instanceof StorageWriteError) {
        throw error;
      }
      throw new StorageWriteError(key, { cause: error });
    }
    return key;
  }

  /** Days of the month that have a manifest, sorted. */
  async listDays(collection: CollectionDefinition, yearMonth: YearMonth): Promise<string[]> {
    const keys = await this.store.list(manifestPrefix(collection, yearMonth));
    return keys.map(manifestKeyDay).filter((day): day is string => day !== undefined);
  }
}
