import type { BoundingBox } from "../types";

/** One granule record as returned by the catalog's JSON feed; only a few keys are relied on. */
export type CatalogEntry = Record<string, unknown>;

export interface CatalogQuery {
  conceptId: string;
  temporal: { start: string; end: string };
  boundingBox?: BoundingBox;
  pageSize: number;
}

export interface CatalogPage {
  entries: CatalogEntry[];
  /** Continuation token for the following page; absent on the last page. */
  nextCursor?: string;
}

export interface CatalogPageSource {
  fetchPage(query: CatalogQuery, cursor?: string): Promise<CatalogPage>;
}
