import type { CollectionDefinition } from "../config/types";
import { dayParts, formatYearMonth, type YearMonth } from "../core/dates";

export const MANIFEST_ROOT = "links";
export const ARTIFACT_EXTENSION = "parquet";

/** Path segment naming a collection and its version, e.g. `HLSL30.2.0`. */
export function collectionSegment(collection: CollectionDefinition): string {
  return `${collection.name}.${collection.version}`;
}

function monthSegment(month: number): string {
  return String(month).padStart(2, "0");
}

export function manifestPrefix(collection: CollectionDefinition, yearMonth: YearMonth): string {
  return `${MANIFEST_ROOT}/${collectionSegment(collection)}/${yearMonth.year}/${monthSegment(yearMonth.month)}/`;
}

export function manifestKey(collection: CollectionDefinition, date: string): string {
  const parts = dayParts(date);
  return `${MANIFEST_ROOT}/${collectionSegment(collection)}/${parts.year}/${parts.month}/${parts.year}-${parts.month}-${parts.day}.json`;
}

/** Day encoded in a manifest key, or undefined for keys of another shape. */
export function manifestKeyDay(key: string): string | undefined {
  const match = /\/(\d{4}-\d{2}-\d{2})\.json$/.exec(key);
  return match ? match[1] : undefined;
}

export function artifactName(collection: CollectionDefinition, yearMonth: YearMonth): string {
  return `${collectionSegment(collection)}-${formatYearMonth(yearMonth)}.${ARTIFACT_EXTENSION}`;
}

/** Output key; depends only on collection, month and version. */
export function artifactKey(collection: CollectionDefinition, yearMonth: YearMonth, version: string): string {
  return [
    version,
    collectionSegment(collection),
    `year=${yearMonth.year}`,
    `month=${monthSegment(yearMonth.month)}`,
    artifactName(collection, yearMonth),
  ].join("/");
}
