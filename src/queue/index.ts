export { harvestJobMessageSchema, parseHarvestJob, toHarvestRequest, type HarvestJobInput, type HarvestJobMessage } from "./harvestJobs";
export { BATCH_LIMIT, HarvestJobPublisher, type HarvestJobPublisherOptions, type SqsClientLike } from "./harvestJobPublisher";
export { handleHarvestQueueEvent, type BatchResponse, type HarvestQueueDeps, type SqsEvent, type SqsRecord } from "./harvestQueueHandler";
