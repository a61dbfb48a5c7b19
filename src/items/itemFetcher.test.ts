import { describe, expect, test } from "vitest";
import type { FetchLike, HttpResponseLike } from "../core/fetch";
import { isTransientError } from "../core/fetch";
import { createRetryPolicy } from "../core/retry";
import { MetricsRegistry } from "../observability";
import { MemoryObjectStore } from "../storage/memoryObjectStore";
import { fakeResponse, itemDocument, noSleep } from "../testing/fixtures";
import { ItemFetcher, parseItemDocument } from "./itemFetcher";

const LINK = "https://data.example.test/HLS.L30.T10SEG_stac.json";

function fetcherWith(responses: Array<HttpResponseLike | Error>, bucket = new MemoryObjectStore("s3://lp-prod-public")) {
  const urls: string[] = [];
  const fetchFn: FetchLike = async (url) => {
    urls.push(url);
    const next = responses.shift();
    if (!next) {
      throw new Error("no more responses");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  const metrics = new MetricsRegistry();
  const fetcher = new ItemFetcher({
    clientId: "test-client",
    timeoutMs: 1000,
    retryPolicy: createRetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, isRetryable: isTransientError }),
    openStore: () => bucket,
    fetchFn,
    sleep: noSleep,
    metrics,
  });
  return { fetcher, urls, metrics };
}

describe("parseItemDocument", () => {
  test("requires a datetime or a start/end pair", () => {
    const item = itemDocument("A");
    expect(parseItemDocument(JSON.stringify(item), LINK).id).toBe("A");

    const noTime = { ...item, properties: { "eo:cloud_cover": 3 } };
    expect(() => parseItemDocument(JSON.stringify(noTime), LINK)).toThrow(
      `Item document at ${LINK} is malformed: properties: item needs properties.datetime or a start_datetime/end_datetime pair`,
    );

    const ranged = { ...item, properties: { datetime: null, start_datetime: "2024-01-01T00:00:00Z", end_datetime: "2024-01-31T23:59:59Z" } };
    expect(parseItemDocument(JSON.stringify(ranged), LINK).properties.start_datetime).toBe("2024-01-01T00:00:00Z");
  });
});

describe("ItemFetcher", () => {
  test("returns the parsed item on success", async () => {
    const { fetcher, metrics } = fetcherWith([fakeResponse({ body: JSON.stringify(itemDocument("A")) })]);

    const outcome = await fetcher.fetch(LINK);

    expect(outcome.status).toBe("success");
    expect(outcome.attempts).toBe(1);
    expect(metrics.getCounter("items_fetched")).toBe(1);
  });

  test("retries transient failures within the attempt budget", async () => {
    const { fetcher, urls, metrics } = fetcherWith([
      fakeResponse({ status: 503 }),
      new Error("socket hang up"),
      fakeResponse({ body: JSON.stringify(itemDocument("A")) }),
    ]);

    const outcome = await fetcher.fetch(LINK);

    expect(outcome).toMatchObject({ status: "success", attempts: 3 });
    expect(urls).toEqual([LINK, LINK, LINK]);
    expect(metrics.getCounter("item_retries")).toBe(2);
  });

  test("reports exhausted retries as a transient failure", async () => {
    const { fetcher } = fetcherWith([fakeResponse({ status: 500 }), fakeResponse({ status: 502 }), fakeResponse({ status: 503 })]);

    expect(await fetcher.fetch(LINK)).toEqual({
      status: "failure",
      link: LINK,
      errorKind: "transient",
      error: `HTTP 503 fetching ${LINK}`,
      attempts: 3,
    });
  });

  test("does not retry a missing document", async () => {
    const { fetcher, urls, metrics } = fetcherWith([fakeResponse({ status: 404 })]);

    expect(await fetcher.fetch(LINK)).toMatchObject({ status: "failure", errorKind: "permanent", attempts: 1 });
    expect(urls).toHaveLength(1);
    expect(metrics.getCounter("items_failed")).toBe(1);
  });

  test("treats an unparseable body as permanent", async () => {
    const { fetcher } = fetcherWith([fakeResponse({ body: "<html>oops</html>" })]);

    expect(await fetcher.fetch(LINK)).toMatchObject({
      status: "failure",
      errorKind: "permanent",
      error: `Item document at ${LINK} is not JSON`,
      attempts: 1,
    });
  });

  test("reads s3 links through the bucket store", async () => {
    const bucket = new MemoryObjectStore("s3://lp-prod-public");
    await bucket.put("HLS/A_stac.json", JSON.stringify(itemDocument("A")));
    const { fetcher, urls } = fetcherWith([], bucket);

    const found = await fetcher.fetch("s3://lp-prod-public/HLS/A_stac.json");
    const missing = await fetcher.fetch("s3://lp-prod-public/HLS/B_stac.json");

    expect(found).toMatchObject({ status: "success", attempts: 1 });
    expect(missing).toMatchObject({ status: "failure", errorKind: "permanent", error: "No object at s3://lp-prod-public/HLS/B_stac.json" });
    expect(urls).toHaveLength(0);
  });

  test("rejects unsupported schemes", async () => {
    const { fetcher } = fetcherWith([]);
    expect(await fetcher.fetch("ftp://example.test/a_stac.json")).toMatchObject({
      status: "failure",
      errorKind: "permanent",
      error: "Unsupported link scheme: ftp://example.test/a_stac.json",
    });
  });
});
