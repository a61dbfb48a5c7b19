import type { ColumnarWriter } from "../artifact/types";
import { collectionId } from "../config/collections";
import type { CollectionDefinition } from "../config/types";
import { formatYearMonth, monthDays, parseDay, type YearMonth } from "../core/dates";
import { AggregationError, errorMessage, IncompleteLinksError } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { BatchScheduler } from "../schedule/batchScheduler";
import { artifactKey } from "../storage/keys";
import { ManifestStore } from "../storage/manifestStore";
import type { StoreFactory } from "../storage/types";
import type { AggregationResult, FetchFailure, ItemDocument, MonthlyAggregationRequest } from "../types";
import { sortBySpatialKey } from "./spatialOrder";

export interface AggregatorDeps {
  openStore: StoreFactory;
  scheduler: BatchScheduler;
  writer: ColumnarWriter;
  logger: Logger;
  metrics: MetricsRegistry;
  maxConcurrentDays: number;
  maxConcurrentPerDay: number;
  maxFailureRate: number;
  defaultVersion: string;
}

/**
 * Days of `yearMonth` that can hold data: none before the collection's origin
 * month, from the origin day within it, every day after it.
 */
export function expectedDays(collection: CollectionDefinition, yearMonth: YearMonth): string[] {
  const [originYear, originMonth, originDay] = parseDay(collection.originDate).split("-").map(Number);
  const requested = yearMonth.year * 12 + yearMonth.month;
  const origin = originYear * 12 + originMonth;
  if (requested < origin) {
    return [];
  }
  return monthDays(yearMonth, requested === origin ? originDay : 1);
}

export class MonthlyAggregator {
  constructor(private readonly deps: AggregatorDeps) {}

  async aggregateMonth(request: MonthlyAggregationRequest, signal?: AbortSignal): Promise<AggregationResult> {
    const { logger, metrics } = this.deps;
    const store = this.deps.openStore(request.destination);
    const manifests = new ManifestStore(store);
    const key = artifactKey(request.collection, request.yearMonth, request.version ?? this.deps.defaultVersion);
    const outputPath = `${store.location.replace(/\/+$/, "")}/${key}`;
    const fields = { collection: collectionId(request.collection), month: formatYearMonth(request.yearMonth), key };

    if (request.skipExisting && (await store.exists(key))) {
      metrics.incrementCounter("artifacts_skipped", 1);
      logger.info("aggregate_month_skipped", { ...fields, outputPath });
      return {
        outputPath,
        itemCount: 0,
        successCount: 0,
        failureCount: 0,
        missingDays: [],
        skipped: true,
        failedLinks: [],
      };
    }

    const present = new Set(await manifests.listDays(request.collection, request.yearMonth));
    const expected = expectedDays(request.collection, request.yearMonth);
    const missingDays = expected.filter((day) => !present.has(day));
    if (missingDays.length > 0) {
      if (request.requireCompleteLinks) {
        throw new IncompleteLinksError(missingDays);
      }
      logger.warn("aggregate_month_missing_days", { ...fields, missingDays });
    }

    const daysOfLinks = new Map<string, string[]>();
    let totalLinks = 0;
    for (const day of expected) {
      if (!present.has(day)) {
        continue;
      }
      const manifest = await manifests.read(request.collection, day);
      daysOfLinks.set(day, manifest.links);
      totalLinks += manifest.links.length;
    }

    if (totalLinks === 0) {
      throw new AggregationError("no_links", `No item links found for ${fields.collection} ${fields.month}`, {
        missingDays,
      });
    }

    logger.info("aggregate_month_start", { ...fields, days: daysOfLinks.size, links: totalLinks });
    const batch = await this.deps.scheduler.runBatch(daysOfLinks, {
      maxConcurrentDays: this.deps.maxConcurrentDays,
      maxConcurrentPerDay: this.deps.maxConcurrentPerDay,
      signal,
      onDayComplete: (day, outcomes) => {
        const failures = outcomes.filter((outcome) => outcome.status === "failure").length;
        logger.debug("aggregate_day_fetched", { date: day, items: outcomes.length, failures });
      },
    });

    if (batch.cancelled) {
      throw new AggregationError("cancelled", `Aggregation of ${fields.collection} ${fields.month} was cancelled`);
    }

    const items: ItemDocument[] = [];
    const failedLinks: FetchFailure[] = [];
    for (const day of daysOfLinks.keys()) {
      for (const outcome of batch.outcomes.get(day) ?? []) {
        if (outcome.status === "success") {
          items.push({ ...outcome.item, collection: fields.collection });
        } else {
          failedLinks.push(outcome);
        }
      }
    }

    const failureRate = failedLinks.length / totalLinks;
    const tooManyFailures = request.requireCompleteLinks && failureRate > this.deps.maxFailureRate;
    if (tooManyFailures) {
      logger.error("aggregate_month_failure_rate", { ...fields, failures: failedLinks.length, links: totalLinks, failureRate });
      throw new AggregationError(
        "high_failure_rate",
        `${failedLinks.length} of ${totalLinks} item fetches failed for ${fields.collection} ${fields.month}`,
        { failureCount: failedLinks.length, totalLinks, failureRate, maxFailureRate: this.deps.maxFailureRate },
      );
    }

    const stopTimer = metrics.startTimer("artifact_write_ms");
    try {
      const body = await this.deps.writer.encode(sortBySpatialKey(items));
      await store.put(key, body, this.deps.writer.contentType);
    } catch (error) {
      throw new AggregationError("write_failed", `Failed to write ${outputPath}: ${errorMessage(error)}`, { key }, { cause: error });
    } finally {
      stopTimer();
    }

    metrics.incrementCounter("artifacts_written", 1);
    logger.info("aggregate_month_complete", {
      ...fields,
      outputPath,
      itemCount: items.length,
      failureCount: failedLinks.length,
    });

    return {
      outputPath,
      itemCount: items.length,
      successCount: items.length,
      failureCount: failedLinks.length,
      missingDays,
      skipped: false,
      failedLinks,
    };
  }
}
