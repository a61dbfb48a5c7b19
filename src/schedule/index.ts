export { BatchScheduler, processWithConcurrency, type BatchOptions, type BatchResult, type LinkFetcher } from "./batchScheduler";
