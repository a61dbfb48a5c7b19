import type { AppConfig, CollectionName, CollectionDefinition } from "./types";
import { InvalidArgumentError } from "../core/errors";

export const COLLECTION_NAMES: readonly CollectionName[] = ["HLSL30", "HLSS30"];

export const DEFAULT_COLLECTIONS: Readonly<Record<CollectionName, CollectionDefinition>> = {
  HLSL30: {
    name: "HLSL30",
    conceptId: "C2021957657-LPCLOUD",
    version: "2.0",
    originDate: "2013-04-11",
  },
  HLSS30: {
    name: "HLSS30",
    conceptId: "C2021957295-LPCLOUD",
    version: "2.0",
    originDate: "2015-11-28",
  },
};

export function isCollectionName(value: string): value is CollectionName {
  return COLLECTION_NAMES.some((name) => name === value);
}

export function collectionId(collection: CollectionDefinition): string {
  return `${collection.name}_${collection.version}`;
}

export function resolveCollection(config: AppConfig, raw: string): CollectionDefinition {
  const normalized = raw.trim().toUpperCase();
  if (!isCollectionName(normalized)) {
    throw new InvalidArgumentError(`Unsupported collection: ${raw} (expected one of ${COLLECTION_NAMES.join(", ")})`);
  }
  return config.collections[normalized];
}
