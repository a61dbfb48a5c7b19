import { errorMessage } from "../core/errors";
import type { FetchOutcome } from "../types";

export type LinkFetcher = (link: string) => Promise<FetchOutcome>;

export interface BatchOptions {
  maxConcurrentDays: number;
  maxConcurrentPerDay: number;
  /** Checked before each admission; fetches already in flight are left to finish. */
  signal?: AbortSignal;
  onDayComplete?: (day: string, outcomes: FetchOutcome[]) => void;
}

export interface BatchResult {
  outcomes: Map<string, FetchOutcome[]>;
  cancelled: boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls outstanding.
 * Stops handing out items once `shouldStop` returns true, and resolves to
 * whether any item was left unstarted because of it.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
  shouldStop: () => boolean = () => false,
): Promise<boolean> {
  let index = 0;
  let stopped = false;
  const slots = new Array(Math.max(1, Math.min(concurrency, items.length))).fill(null).map(async () => {
    while (index < items.length) {
      if (shouldStop()) {
        stopped = true;
        break;
      }
      const current = index;
      index += 1;
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
  return stopped;
}

/**
 * Two nested worker pools: the outer one admits up to `maxConcurrentDays`
 * days, each admitted day runs its links through an inner pool of
 * `maxConcurrentPerDay`. At most days × perDay fetches are in flight.
 */
export class BatchScheduler {
  constructor(private readonly fetcher: LinkFetcher) {}

  async runBatch(daysOfLinks: ReadonlyMap<string, readonly string[]>, options: BatchOptions): Promise<BatchResult> {
    const outcomes = new Map<string, FetchOutcome[]>();
    const aborted = () => options.signal?.aborted ?? false;
    const days = [...daysOfLinks.keys()];
    let cancelled = false;

    const daysStopped = await processWithConcurrency(
      days,
      options.maxConcurrentDays,
      async (day) => {
        const dayOutcomes: FetchOutcome[] = [];
        const linksStopped = await processWithConcurrency(
          daysOfLinks.get(day) ?? [],
          options.maxConcurrentPerDay,
          async (link) => {
            dayOutcomes.push(await this.fetchSafely(link));
          },
          aborted,
        );
        cancelled ||= linksStopped;
        outcomes.set(day, dayOutcomes);
        options.onDayComplete?.(day, dayOutcomes);
      },
      aborted,
    );

    return { outcomes, cancelled: cancelled || daysStopped };
  }

  private async fetchSafely(link: string): Promise<FetchOutcome> {
    try {
      return await this.fetcher(link);
    } catch (error) {
      return { status: "failure", link, errorKind: "permanent", error: errorMessage(error), attempts: 1 };
    }
  }
}
