export * from "./types";
export { Logger, type LoggerContext, type LogSink } from "./logger";
export { MetricsRegistry } from "./metrics";
export { createRunId } from "./runId";
