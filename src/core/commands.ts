import { MonthlyAggregator } from "../aggregate";
import { GeoParquetWriter } from "../artifact";
import { CatalogClient, type CatalogPageSource, HttpCatalogPageSource } from "../catalog";
import { type AppConfig, collectionId, type CollectionDefinition, type LinkProtocol } from "../config";
import { DailyHarvester, type RangeHarvestResult } from "../harvest";
import { ItemFetcher } from "../items";
import type { Logger, MetricsRegistry } from "../observability";
import { type HarvestJobInput, HarvestJobPublisher, type SqsClientLike } from "../queue";
import { BatchScheduler } from "../schedule";
import type { StoreFactory } from "../storage";
import type { AggregationResult, BoundingBox } from "../types";
import { dayRange, type YearMonth } from "./dates";
import { ConfigError, InvalidArgumentError } from "./errors";
import { type FetchLike, isTransientError } from "./fetch";
import { createRetryPolicy, type RetryPolicy, type SleepFn } from "./retry";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  openStore: StoreFactory;
  signal?: AbortSignal;
  /** Replaces the HTTP catalog source. */
  catalogSource?: CatalogPageSource;
  fetchFn?: FetchLike;
  sqsClient?: SqsClientLike;
  sleep?: SleepFn;
}

export interface HarvestCommandOptions {
  collection: CollectionDefinition;
  startDate: string;
  endDate?: string;
  destination: string;
  boundingBox?: BoundingBox;
  protocol: LinkProtocol;
  skipExisting: boolean;
}

export interface AggregateCommandOptions {
  collection: CollectionDefinition;
  yearMonth: YearMonth;
  destination: string;
  version?: string;
  requireCompleteLinks: boolean;
  skipExisting: boolean;
}

export interface PublishCommandOptions {
  collection: CollectionDefinition;
  startDate: string;
  endDate: string;
  destination?: string;
  boundingBox?: BoundingBox;
  protocol: LinkProtocol;
  skipExisting: boolean;
}

function retryPolicy(config: AppConfig, maxAttempts: number): RetryPolicy {
  return createRetryPolicy({
    maxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    isRetryable: isTransientError,
  });
}

export function createHarvester(ctx: CommandContext): DailyHarvester {
  const { config } = ctx;
  const logger = ctx.logger.child("harvest");
  const source =
    ctx.catalogSource ??
    new HttpCatalogPageSource({
      baseUrl: config.catalogBaseUrl,
      clientId: config.clientId,
      timeoutMs: config.requestTimeoutMs,
      retryPolicy: retryPolicy(config, config.maxCatalogAttempts),
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      fetchFn: ctx.fetchFn,
      sleep: ctx.sleep,
      logger: ctx.logger.child("catalog"),
      metrics: ctx.metrics,
    });

  return new DailyHarvester({
    catalog: new CatalogClient({ source, pageSize: config.catalogPageSize, logger, metrics: ctx.metrics }),
    openStore: ctx.openStore,
    logger,
    metrics: ctx.metrics,
  });
}

export function createAggregator(ctx: CommandContext): MonthlyAggregator {
  const { config } = ctx;
  const fetcher = new ItemFetcher({
    clientId: config.clientId,
    timeoutMs: config.requestTimeoutMs,
    retryPolicy: retryPolicy(config, config.maxFetchAttempts),
    openStore: ctx.openStore,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    fetchFn: ctx.fetchFn,
    sleep: ctx.sleep,
    logger: ctx.logger.child("items"),
    metrics: ctx.metrics,
  });

  return new MonthlyAggregator({
    openStore: ctx.openStore,
    scheduler: new BatchScheduler((link) => fetcher.fetch(link)),
    writer: new GeoParquetWriter(config.parquetCompression),
    logger: ctx.logger.child("aggregate"),
    metrics: ctx.metrics,
    maxConcurrentDays: config.maxConcurrentDays,
    maxConcurrentPerDay: config.maxConcurrentPerDay,
    maxFailureRate: config.maxFailureRate,
    defaultVersion: config.outputVersion,
  });
}

export async function runHarvest(ctx: CommandContext, options: HarvestCommandOptions): Promise<RangeHarvestResult[]> {
  ctx.logger.info("harvest_start", {
    collection: collectionId(options.collection),
    startDate: options.startDate,
    endDate: options.endDate ?? options.startDate,
    destination: options.destination,
  });
  const results = await createHarvester(ctx).harvestRange(
    {
      collection: options.collection,
      destination: options.destination,
      boundingBox: options.boundingBox,
      protocol: options.protocol,
      skipExisting: options.skipExisting,
    },
    options.startDate,
    options.endDate ?? options.startDate,
  );

  const failed = results.filter((result) => result.status === "failed");
  ctx.logger.info("harvest_complete", {
    days: results.length,
    written: results.filter((result) => result.status === "ok" && result.written).length,
    failedDays: failed.map((result) => result.date),
  });
  return results;
}

export async function runAggregate(ctx: CommandContext, options: AggregateCommandOptions): Promise<AggregationResult> {
  return createAggregator(ctx).aggregateMonth(
    {
      collection: options.collection,
      yearMonth: options.yearMonth,
      destination: options.destination,
      version: options.version,
      requireCompleteLinks: options.requireCompleteLinks,
      skipExisting: options.skipExisting,
    },
    ctx.signal,
  );
}

/** Enqueues one harvest job per day of the range; returns the number sent. */
export async function runPublish(ctx: CommandContext, options: PublishCommandOptions): Promise<number> {
  const queueUrl = ctx.config.harvestQueueUrl;
  if (!queueUrl) {
    throw new ConfigError("publish needs HARVEST_QUEUE_URL (or harvestQueueUrl in the config file)");
  }
  const days = dayRange(options.startDate, options.endDate);
  if (days.length === 0) {
    throw new InvalidArgumentError("publish needs at least one day");
  }

  const jobs: HarvestJobInput[] = days.map((date) => ({
    collection: options.collection.name,
    date,
    dest: options.destination,
    bounding_box: options.boundingBox,
    protocol: options.protocol,
    skip_existing: options.skipExisting,
  }));

  const publisher = new HarvestJobPublisher({ queueUrl, client: ctx.sqsClient, sleep: ctx.sleep });
  const sent = await publisher.publish(jobs);
  ctx.logger.info("publish_complete", { collection: collectionId(options.collection), jobs: sent, queueUrl });
  return sent;
}
