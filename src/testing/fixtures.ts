import { DEFAULT_COLLECTIONS } from "../config/collections";
import type { CatalogEntry, CatalogPage, CatalogPageSource, CatalogQuery } from "../catalog/types";
import type { HttpRequestInit, HttpResponseLike } from "../core/fetch";
import type { ItemDocument } from "../types";

export const HLSL30 = DEFAULT_COLLECTIONS.HLSL30;

export const noSleep = async (): Promise<void> => undefined;

export function itemDocument(id: string, lon = 10, lat = 45, datetime = "2024-01-15T10:00:00Z"): ItemDocument {
  return {
    type: "Feature",
    stac_version: "1.0.0",
    stac_extensions: [],
    id,
    geometry: {
      type: "Polygon",
      coordinates: [
        [
          [lon, lat],
          [lon + 1, lat],
          [lon + 1, lat + 1],
          [lon, lat + 1],
          [lon, lat],
        ],
      ],
    },
    bbox: [lon, lat, lon + 1, lat + 1],
    properties: { datetime, "eo:cloud_cover": 12 },
    assets: { B01: { href: `s3://bucket/${id}/B01.tif` } },
    links: [],
  };
}

export function catalogEntry(id: string, links: string[]): CatalogEntry {
  return { id, title: id, links: links.map((href) => ({ href, rel: "http://esipfed.org/ns/fedsearch/1.1/metadata#" })) };
}

/** Serves fixed pages keyed by cursor; the first page has no cursor. */
export class FakePageSource implements CatalogPageSource {
  readonly calls: Array<{ query: CatalogQuery; cursor?: string }> = [];

  constructor(private readonly pages: CatalogPage[] | ((query: CatalogQuery) => CatalogPage[])) {}

  async fetchPage(query: CatalogQuery, cursor?: string): Promise<CatalogPage> {
    this.calls.push({ query, cursor });
    const pages = typeof this.pages === "function" ? this.pages(query) : this.pages;
    const index = cursor === undefined ? 0 : Number.parseInt(cursor.replace("cursor-", ""), 10);
    return pages[index] ?? { entries: [] };
  }
}

export interface FakeResponseInit {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
}

export function fakeResponse(init: FakeResponseInit): HttpResponseLike {
  const status = init.status ?? 200;
  const headers = new Map(Object.entries(init.headers ?? {}).map(([key, value]) => [key.toLowerCase(), value]));
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
    text: async () => init.body ?? "",
  };
}

export type RecordedRequest = { url: string; init: HttpRequestInit };
