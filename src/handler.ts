import type { CatalogPageSource } from "./catalog";
import { type AppConfig, loadConfig } from "./config";
import { createHarvester } from "./core/commands";
import { createRunId, Logger, type LogSink, MetricsRegistry } from "./observability";
import { type BatchResponse, handleHarvestQueueEvent, type SqsEvent } from "./queue";
import { createStoreFactory, type StoreFactory } from "./storage";

export interface QueueHandlerOptions {
  config?: AppConfig;
  openStore?: StoreFactory;
  catalogSource?: CatalogPageSource;
  logSink?: LogSink;
}

/** Builds the queue worker: one daily harvest per SQS record. */
export function createQueueHandler(options: QueueHandlerOptions = {}): (event: SqsEvent) => Promise<BatchResponse> {
  return async (event) => {
    const config = options.config ?? loadConfig(process.env.CONFIG_PATH);
    const runId = createRunId(new Date(), "job");
    const logger = new Logger({ component: "queue", runId }, options.logSink);
    const metrics = new MetricsRegistry();
    const harvester = createHarvester({
      runId,
      config,
      logger,
      metrics,
      openStore: options.openStore ?? createStoreFactory(config),
      catalogSource: options.catalogSource,
    });

    const response = await handleHarvestQueueEvent(event, { harvester, config, logger });
    logger.info("queue_batch_complete", {
      records: event.Records.length,
      failures: response.batchItemFailures.length,
      counters: metrics.getCounters(),
    });
    return response;
  };
}

export const handler = createQueueHandler();
