import { describe, expect, test } from "vitest";
import { Logger, MetricsRegistry } from "../observability";
import { catalogEntry, FakePageSource, HLSL30 } from "../testing/fixtures";
import { CatalogClient, CatalogPaginator } from "./catalogClient";
import type { CatalogQuery } from "./types";

const query: CatalogQuery = {
  conceptId: HLSL30.conceptId,
  temporal: { start: "2024-01-15T00:00:00Z", end: "2024-01-15T23:59:59Z" },
  pageSize: 2,
};

function threePages(): FakePageSource {
  return new FakePageSource([
    { entries: [catalogEntry("G1", []), catalogEntry("G2", [])], nextCursor: "cursor-1" },
    { entries: [catalogEntry("G3", []), catalogEntry("G4", [])], nextCursor: "cursor-2" },
    { entries: [catalogEntry("G5", [])] },
  ]);
}

describe("CatalogPaginator", () => {
  test("follows cursors until the source stops returning one", async () => {
    const source = threePages();
    const pages = new CatalogPaginator(source, query);

    expect((await pages.nextPage())?.length).toBe(2);
    expect((await pages.nextPage())?.length).toBe(2);
    expect((await pages.nextPage())?.length).toBe(1);
    expect(pages.isExhausted).toBe(true);
    expect(await pages.nextPage()).toBeUndefined();
    expect(pages.pageCount).toBe(3);
    expect(source.calls.map((call) => call.cursor)).toEqual([undefined, "cursor-1", "cursor-2"]);
  });

  test("stops on an empty page even with a cursor", async () => {
    const source = new FakePageSource([{ entries: [], nextCursor: "cursor-1" }]);
    const pages = new CatalogPaginator(source, query);

    expect(await pages.nextPage()).toEqual([]);
    expect(await pages.nextPage()).toBeUndefined();
    expect(source.calls).toHaveLength(1);
  });

  test("reset rewinds to the first page", async () => {
    const source = threePages();
    const pages = new CatalogPaginator(source, query);
    await pages.nextPage();
    await pages.nextPage();

    pages.reset();

    expect(pages.isExhausted).toBe(false);
    expect(pages.pageCount).toBe(0);
    await pages.nextPage();
    expect(source.calls.map((call) => call.cursor)).toEqual([undefined, "cursor-1", undefined]);
  });
});

describe("CatalogClient", () => {
  test("queries one UTC day and yields every entry", async () => {
    const source = threePages();
    const metrics = new MetricsRegistry();
    const client = new CatalogClient({ source, pageSize: 2, logger: Logger.silent(), metrics });

    const ids: unknown[] = [];
    for await (const entry of client.search(HLSL30, "2024-01-15", [-120, 35, -119, 36])) {
      ids.push(entry.id);
    }

    expect(ids).toEqual(["G1", "G2", "G3", "G4", "G5"]);
    expect(source.calls[0].query).toEqual({ ...query, boundingBox: [-120, 35, -119, 36] });
    expect(metrics.getCounter("catalog_pages")).toBe(3);
    expect(metrics.getCounter("catalog_results")).toBe(5);
  });
});
