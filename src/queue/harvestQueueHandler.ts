import type { AppConfig } from "../config/types";
import { errorMessage } from "../core/errors";
import type { DailyHarvester } from "../harvest/harvester";
import type { Logger } from "../observability";
import { parseHarvestJob, toHarvestRequest } from "./harvestJobs";

export interface SqsRecord {
  messageId: string;
  body: string;
}

export interface SqsEvent {
  Records: SqsRecord[];
}

export interface BatchResponse {
  batchItemFailures: Array<{ itemIdentifier: string }>;
}

export interface HarvestQueueDeps {
  harvester: Pick<DailyHarvester, "harvestDay">;
  config: AppConfig;
  logger: Logger;
}

/**
 * Runs one daily harvest per queue record. Records that fail are reported
 * back so only they are redelivered.
 */
export async function handleHarvestQueueEvent(event: SqsEvent, deps: HarvestQueueDeps): Promise<BatchResponse> {
  const batchItemFailures: BatchResponse["batchItemFailures"] = [];

  for (const record of event.Records) {
    try {
      const request = toHarvestRequest(parseHarvestJob(record.body), deps.config);
      const result = await deps.harvester.harvestDay(request);
      deps.logger.info("harvest_job_done", { messageId: record.messageId, date: result.date, written: result.written });
    } catch (error) {
      deps.logger.error("harvest_job_failed", { messageId: record.messageId, error: errorMessage(error) });
      batchItemFailures.push({ itemIdentifier: record.messageId });
    }
  }

  return { batchItemFailures };
}
