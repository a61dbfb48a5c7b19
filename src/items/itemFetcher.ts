import type { Agent } from "undici";
import { errorMessage, FetchError, ObjectNotFoundError } from "../core/errors";
import { defaultFetch, type FetchLike, getFetchDispatcher, getWithTimeout, isTransientError, statusErrorKind } from "../core/fetch";
import { attemptWithRetry, type RetryPolicy, type SleepFn } from "../core/retry";
import { Logger, type MetricsRegistry } from "../observability";
import { parseS3Url } from "../storage/s3ObjectStore";
import type { StoreFactory } from "../storage/types";
import { type FetchOutcome, type ItemDocument, itemDocumentSchema } from "../types";

export interface ItemFetcherOptions {
  clientId: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  /** Opens the bucket store used for `s3://` links. */
  openStore: StoreFactory;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export function parseItemDocument(body: string, link: string): ItemDocument {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new FetchError("permanent", `Item document at ${link} is not JSON`, undefined, { cause: error });
  }

  const parsed = itemDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new FetchError("permanent", `Item document at ${link} is malformed: ${where}${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

/**
 * Retrieves one item document per call. Never rejects: every problem ends up
 * in a failure outcome carrying the error kind and the number of attempts.
 */
export class ItemFetcher {
  private readonly options: ItemFetcherOptions;
  private readonly fetchFn: FetchLike;
  private readonly dispatcher: Agent | undefined;
  private readonly logger: Logger;

  constructor(options: ItemFetcherOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.dispatcher = getFetchDispatcher(options.ignoreHttpsErrors ?? false);
    this.logger = options.logger ?? Logger.silent("items");
  }

  async fetch(link: string): Promise<FetchOutcome> {
    const { metrics } = this.options;
    const stopTimer = metrics?.startTimer("item_fetch_ms");

    const outcome = await attemptWithRetry(this.options.retryPolicy, () => this.fetchOnce(link), {
      sleep: this.options.sleep,
      onRetry: (error, attempt, delayMs) => {
        metrics?.incrementCounter("item_retries", 1);
        this.logger.debug("item_fetch_retry", { url: link, attempt, delayMs, error: errorMessage(error) });
      },
    });
    stopTimer?.();

    if (outcome.ok) {
      metrics?.incrementCounter("items_fetched", 1);
      return { status: "success", link, item: outcome.value, attempts: outcome.attempts };
    }

    metrics?.incrementCounter("items_failed", 1);
    const errorKind = isTransientError(outcome.error) ? "transient" : "permanent";
    this.logger.warn("item_fetch_failed", {
      url: link,
      attempt: outcome.attempts,
      errorKind,
      error: errorMessage(outcome.error),
    });
    return { status: "failure", link, errorKind, error: errorMessage(outcome.error), attempts: outcome.attempts };
  }

  private async fetchOnce(link: string): Promise<ItemDocument> {
    if (link.startsWith("https://") || link.startsWith("http://")) {
      return parseItemDocument(await this.readHttp(link), link);
    }
    if (link.startsWith("s3://")) {
      return parseItemDocument(await this.readS3(link), link);
    }
    throw new FetchError("permanent", `Unsupported link scheme: ${link}`);
  }

  private async readHttp(link: string): Promise<string> {
    const response = await getWithTimeout(this.fetchFn, link, {
      headers: {
        "user-agent": this.options.clientId,
        accept: "application/json",
      },
      timeoutMs: this.options.timeoutMs,
      dispatcher: this.dispatcher,
    });

    if (!response.ok) {
      throw new FetchError(statusErrorKind(response.status), `HTTP ${response.status} fetching ${link}`, response.status);
    }
    return response.body;
  }

  private async readS3(link: string): Promise<string> {
    const { bucket, prefix } = parseS3Url(link);
    const store = this.options.openStore(`s3://${bucket}`);
    const timeoutMs = this.options.timeoutMs;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new FetchError("transient", `Timed out after ${timeoutMs}ms reading ${link}`)), timeoutMs);
    });

    try {
      const body = await Promise.race([store.get(prefix), timeout]);
      return body.toString("utf-8");
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (error instanceof ObjectNotFoundError) {
        throw new FetchError("permanent", `No object at ${link}`, 404, { cause: error });
      }
      throw new FetchError("transient", `Object store error reading ${link}: ${errorMessage(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
