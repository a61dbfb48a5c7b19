export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  collection?: string;
  date?: string;
  url?: string;
  key?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "catalog_pages"
  | "catalog_results"
  | "links_skipped"
  | "manifests_written"
  | "manifests_skipped"
  | "items_fetched"
  | "items_failed"
  | "item_retries"
  | "artifacts_written"
  | "artifacts_skipped";

export type MetricTimerName = "catalog_page_ms" | "item_fetch_ms" | "artifact_write_ms";
