import { describe, expect, test } from "vitest";
import type { ColumnarWriter } from "../artifact/types";
import { monthDays } from "../core/dates";
import { AggregationError, IncompleteLinksError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { BatchScheduler, type LinkFetcher } from "../schedule/batchScheduler";
import { ManifestStore } from "../storage/manifestStore";
import { MemoryObjectStore } from "../storage/memoryObjectStore";
import { HLSL30, itemDocument } from "../testing/fixtures";
import type { ItemDocument, MonthlyAggregationRequest } from "../types";
import { expectedDays, MonthlyAggregator } from "./monthlyAggregator";
import { sortBySpatialKey } from "./spatialOrder";

const JANUARY = { year: 2024, month: 1 };
const ARTIFACT_KEY = "v0.1.0/HLSL30.2.0/year=2024/month=01/HLSL30.2.0-2024-01.parquet";

class RecordingWriter implements ColumnarWriter {
  readonly contentType = "application/vnd.apache.parquet";
  readonly batches: ItemDocument[][] = [];

  async encode(items: readonly ItemDocument[]): Promise<Buffer> {
    this.batches.push([...items]);
    return Buffer.from(`rows:${items.length}`);
  }
}

function linkFor(day: string): string {
  return `s3://lp-prod-public/${day}_stac.json`;
}

async function seedManifests(store: MemoryObjectStore, days: string[]): Promise<void> {
  const manifests = new ManifestStore(store);
  for (const day of days) {
    await manifests.write(HLSL30, day, [linkFor(day)]);
  }
}

function setup(failing: ReadonlySet<string> = new Set()) {
  const store = new MemoryObjectStore("memory://archive");
  const writer = new RecordingWriter();
  const metrics = new MetricsRegistry();
  const fetched: string[] = [];
  const fetcher: LinkFetcher = async (link) => {
    fetched.push(link);
    if (failing.has(link)) {
      return { status: "failure", link, errorKind: "permanent", error: "HTTP 404", attempts: 1 };
    }
    const day = /(\d{4}-\d{2}-\d{2})/.exec(link)?.[1] ?? "2024-01-01";
    const dayOfMonth = Number.parseInt(day.slice(8), 10);
    return { status: "success", link, item: itemDocument(day, dayOfMonth, 10, `${day}T10:00:00Z`), attempts: 1 };
  };
  const aggregator = new MonthlyAggregator({
    openStore: () => store,
    scheduler: new BatchScheduler(fetcher),
    writer,
    logger: Logger.silent(),
    metrics,
    maxConcurrentDays: 4,
    maxConcurrentPerDay: 5,
    maxFailureRate: 0.01,
    defaultVersion: "v0.1.0",
  });
  return { store, writer, metrics, fetched, aggregator };
}

const request: MonthlyAggregationRequest = {
  collection: HLSL30,
  yearMonth: JANUARY,
  destination: "memory://archive",
  requireCompleteLinks: false,
  skipExisting: false,
};

describe("expectedDays", () => {
  test("starts at the collection origin day", () => {
    expect(expectedDays(HLSL30, { year: 2013, month: 4 })).toEqual(monthDays({ year: 2013, month: 4 }, 11));
    expect(expectedDays(HLSL30, { year: 2013, month: 3 })).toEqual([]);
    expect(expectedDays(HLSL30, JANUARY)).toHaveLength(31);
  });
});

describe("MonthlyAggregator", () => {
  test("writes one artifact from every manifest of the month", async () => {
    const failing = new Set([linkFor("2024-01-05"), linkFor("2024-01-20")]);
    const { store, writer, metrics, aggregator } = setup(failing);
    await seedManifests(store, monthDays(JANUARY));

    const result = await aggregator.aggregateMonth(request);

    expect(result).toMatchObject({
      outputPath: `memory://archive/${ARTIFACT_KEY}`,
      itemCount: 29,
      successCount: 29,
      failureCount: 2,
      missingDays: [],
      skipped: false,
    });
    expect(result.failedLinks.map((failure) => failure.link)).toEqual([linkFor("2024-01-05"), linkFor("2024-01-20")]);
    expect((await store.get(ARTIFACT_KEY)).toString()).toBe("rows:29");
    expect(writer.batches[0].every((item) => item.collection === "HLSL30_2.0")).toBe(true);
    expect(metrics.getCounter("artifacts_written")).toBe(1);
  });

  test("hands rows to the writer in spatial order", async () => {
    const { store, writer, aggregator } = setup();
    await seedManifests(store, ["2024-01-01", "2024-01-02", "2024-01-03", "2024-01-04"]);

    await aggregator.aggregateMonth(request);

    const written = writer.batches[0].map((item) => item.id);
    expect(written).toHaveLength(4);
    expect(sortBySpatialKey([...writer.batches[0]].reverse()).map((item) => item.id)).toEqual(written);
  });

  test("fails fast when a day is missing and completeness is required", async () => {
    const { store, fetched, aggregator } = setup();
    await seedManifests(
      store,
      monthDays(JANUARY).filter((day) => day !== "2024-01-17"),
    );

    const error = await aggregator.aggregateMonth({ ...request, requireCompleteLinks: true }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IncompleteLinksError);
    expect(error).toMatchObject({ missingDays: ["2024-01-17"] });
    expect(fetched).toHaveLength(0);
    expect(store.count("put")).toBe(30);
  });

  test("lists missing days and continues when completeness is optional", async () => {
    const { store, aggregator } = setup();
    await seedManifests(store, ["2024-01-01", "2024-01-02"]);

    const result = await aggregator.aggregateMonth(request);

    expect(result.itemCount).toBe(2);
    expect(result.missingDays).toHaveLength(29);
    expect(result.missingDays[0]).toBe("2024-01-03");
  });

  test("skips a month that already has an artifact", async () => {
    const { store, fetched, aggregator, metrics } = setup();
    await seedManifests(store, monthDays(JANUARY));

    await aggregator.aggregateMonth({ ...request, skipExisting: true });
    const putsAfterFirst = store.count("put");
    const second = await aggregator.aggregateMonth({ ...request, skipExisting: true });

    expect(second).toMatchObject({ skipped: true, itemCount: 0, outputPath: `memory://archive/${ARTIFACT_KEY}` });
    expect(store.count("put")).toBe(putsAfterFirst);
    expect(fetched).toHaveLength(31);
    expect(metrics.getCounter("artifacts_skipped")).toBe(1);
  });

  test("aborts above the failure-rate threshold when completeness is required", async () => {
    const { store, aggregator } = setup(new Set([linkFor("2024-01-09")]));
    await seedManifests(store, monthDays(JANUARY));

    const error = await aggregator.aggregateMonth({ ...request, requireCompleteLinks: true }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AggregationError);
    expect(error).toMatchObject({ kind: "high_failure_rate", details: { failureCount: 1, totalLinks: 31 } });
    expect(await store.exists(ARTIFACT_KEY)).toBe(false);
  });

  test("writes an empty artifact when every fetch fails and completeness is not required", async () => {
    const { store, writer, aggregator } = setup(new Set(["2024-01-01", "2024-01-02"].map(linkFor)));
    await seedManifests(store, ["2024-01-01", "2024-01-02"]);

    const result = await aggregator.aggregateMonth(request);

    expect(result).toMatchObject({ skipped: false, itemCount: 0, successCount: 0, failureCount: 2 });
    expect(result.failedLinks.map((failure) => failure.link)).toEqual(["2024-01-01", "2024-01-02"].map(linkFor));
    expect(writer.batches).toEqual([[]]);
    expect(await store.exists(ARTIFACT_KEY)).toBe(true);
  });

  test("fails when the month has no links at all", async () => {
    const { store, aggregator } = setup();
    await new ManifestStore(store).write(HLSL30, "2024-01-01", []);

    await expect(aggregator.aggregateMonth(request)).rejects.toMatchObject({
      kind: "no_links",
      message: "No item links found for HLSL30_2.0 2024-01",
    });
  });

  test("reports write failures", async () => {
    const { store, aggregator } = setup();
    await seedManifests(store, ["2024-01-01"]);
    store.put = async () => {
      throw new Error("access denied");
    };

    await expect(aggregator.aggregateMonth(request)).rejects.toMatchObject({ kind: "write_failed" });
  });

  test("stops when cancelled", async () => {
    const { store, aggregator } = setup();
    await seedManifests(store, ["2024-01-01"]);
    const controller = new AbortController();
    controller.abort();

    await expect(aggregator.aggregateMonth(request, controller.signal)).rejects.toMatchObject({ kind: "cancelled" });
    expect(await store.exists(ARTIFACT_KEY)).toBe(false);
  });

  test("honours an explicit output version", async () => {
    const { store, aggregator } = setup();
    await seedManifests(store, ["2024-01-01"]);

    const result = await aggregator.aggregateMonth({ ...request, version: "v2" });

    expect(result.outputPath).toBe("memory://archive/v2/HLSL30.2.0/year=2024/month=01/HLSL30.2.0-2024-01.parquet");
  });
});
