import { z } from "zod";
import type { Agent } from "undici";
import { CatalogQueryError, CatalogUnavailableError, errorMessage, FetchError } from "../core/errors";
import { defaultFetch, type FetchLike, getFetchDispatcher, getWithTimeout, isTransientError, statusErrorKind, type TextResponse } from "../core/fetch";
import { attemptWithRetry, type RetryPolicy, type SleepFn } from "../core/retry";
import { Logger, type MetricsRegistry } from "../observability";
import type { CatalogPage, CatalogPageSource, CatalogQuery } from "./types";

export const SEARCH_AFTER_HEADER = "cmr-search-after";

const catalogPageSchema = z.object({
  feed: z.object({
    entry: z.array(z.record(z.string(), z.unknown())),
  }),
});

export interface HttpCatalogPageSourceOptions {
  baseUrl: string;
  clientId: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export class HttpCatalogPageSource implements CatalogPageSource {
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly dispatcher: Agent | undefined;
  private readonly fetchFn: FetchLike;
  private readonly sleep?: SleepFn;
  private readonly logger: Logger;
  private readonly metrics?: MetricsRegistry;

  constructor(options: HttpCatalogPageSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.clientId = options.clientId;
    this.timeoutMs = options.timeoutMs;
    this.retryPolicy = options.retryPolicy;
    this.dispatcher = getFetchDispatcher(options.ignoreHttpsErrors ?? false);
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleep = options.sleep;
    this.logger = options.logger ?? Logger.silent("catalog");
    this.metrics = options.metrics;
  }

  buildUrl(query: CatalogQuery): string {
    const params = new URLSearchParams();
    params.set("collection_concept_id", query.conceptId);
    params.set("temporal", `${query.temporal.start},${query.temporal.end}`);
    params.set("page_size", String(query.pageSize));
    if (query.boundingBox) {
      params.set("bounding_box", query.boundingBox.join(","));
    }
    return `${this.baseUrl}/granules.json?${params.toString()}`;
  }

  async fetchPage(query: CatalogQuery, cursor?: string): Promise<CatalogPage> {
    const url = this.buildUrl(query);
    const headers: Record<string, string> = {
      "client-id": this.clientId,
      "user-agent": this.clientId,
      accept: "application/json",
    };
    if (cursor) {
      headers[SEARCH_AFTER_HEADER] = cursor;
    }

    const stopTimer = this.metrics?.startTimer("catalog_page_ms");
    const outcome = await attemptWithRetry(
      this.retryPolicy,
      async () => {
        const response = await getWithTimeout(this.fetchFn, url, {
          headers,
          timeoutMs: this.timeoutMs,
          dispatcher: this.dispatcher,
        });
        if (!response.ok) {
          throw new FetchError(statusErrorKind(response.status), `Catalog responded HTTP ${response.status}`, response.status);
        }
        return response;
      },
      {
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn("catalog_page_retry", { url, attempt, delayMs, error: errorMessage(error) });
        },
      },
    );
    const durationMs = stopTimer?.();

    if (!outcome.ok) {
      const status = outcome.error instanceof FetchError ? outcome.error.status : undefined;
      const reason = isTransientError(outcome.error) ? `after ${outcome.attempts} attempt(s)` : "with a non-retryable response";
      throw new CatalogUnavailableError(`Catalog request failed ${reason}: ${errorMessage(outcome.error)}`, status, {
        cause: outcome.error,
      });
    }

    const page = parsePage(outcome.value);
    this.logger.debug("catalog_page_fetched", { url, entries: page.entries.length, durationMs, hasNext: Boolean(page.nextCursor) });
    return page;
  }
}

function parsePage(response: TextResponse): CatalogPage {
  let json: unknown;
  try {
    json = JSON.parse(response.body);
  } catch (error) {
    throw new CatalogQueryError(`Catalog response is not JSON: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = catalogPageSchema.safeParse(json);
  if (!parsed.success) {
    throw new CatalogQueryError(`Catalog response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const nextCursor = response.headers.get(SEARCH_AFTER_HEADER) ?? undefined;
  return {
    entries: parsed.data.feed.entry,
    nextCursor: nextCursor && nextCursor.length > 0 ? nextCursor : undefined,
  };
}
