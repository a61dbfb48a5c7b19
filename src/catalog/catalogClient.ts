import { collectionId } from "../config/collections";
import type { CollectionDefinition } from "../config/types";
import { dayWindow } from "../core/dates";
import type { Logger, MetricsRegistry } from "../observability";
import type { BoundingBox } from "../types";
import type { CatalogEntry, CatalogPageSource, CatalogQuery } from "./types";

/**
 * Cursor-driven walk over the pages of one query. `nextPage()` resolves to
 * the next page's entries, or `undefined` once the source stops handing out
 * continuation tokens. `reset()` rewinds to the first page.
 */
export class CatalogPaginator {
  private cursor: string | undefined;
  private exhausted = false;
  private pagesRead = 0;

  constructor(
    private readonly source: CatalogPageSource,
    readonly query: CatalogQuery,
  ) {}

  get isExhausted(): boolean {
    return this.exhausted;
  }

  get pageCount(): number {
    return this.pagesRead;
  }

  async nextPage(): Promise<CatalogEntry[] | undefined> {
    if (this.exhausted) {
      return undefined;
    }

    const page = await this.source.fetchPage(this.query, this.cursor);
    this.pagesRead += 1;
    this.cursor = page.nextCursor;
    // An empty page ends the walk even if the server still returned a token.
    if (!page.nextCursor || page.entries.length === 0) {
      this.exhausted = true;
    }
    return page.entries;
  }

  reset(): void {
    this.cursor = undefined;
    this.exhausted = false;
    this.pagesRead = 0;
  }
}

export interface CatalogSearch {
  search(collection: CollectionDefinition, date: string, boundingBox?: BoundingBox): AsyncIterable<CatalogEntry>;
}

export interface CatalogClientDeps {
  source: CatalogPageSource;
  pageSize: number;
  logger: Logger;
  metrics: MetricsRegistry;
}

export class CatalogClient implements CatalogSearch {
  constructor(private readonly deps: CatalogClientDeps) {}

  buildQuery(collection: CollectionDefinition, date: string, boundingBox?: BoundingBox): CatalogQuery {
    return {
      conceptId: collection.conceptId,
      temporal: dayWindow(date),
      boundingBox,
      pageSize: this.deps.pageSize,
    };
  }

  paginator(collection: CollectionDefinition, date: string, boundingBox?: BoundingBox): CatalogPaginator {
    return new CatalogPaginator(this.deps.source, this.buildQuery(collection, date, boundingBox));
  }

  /** Every entry for the day; each call starts a fresh walk from the first page. */
  async *search(collection: CollectionDefinition, date: string, boundingBox?: BoundingBox): AsyncGenerator<CatalogEntry> {
    const pages = this.paginator(collection, date, boundingBox);
    let total = 0;

    for (let entries = await pages.nextPage(); entries !== undefined; entries = await pages.nextPage()) {
      this.deps.metrics.incrementCounter("catalog_pages", 1);
      this.deps.metrics.incrementCounter("catalog_results", entries.length);
      total += entries.length;
      yield* entries;
    }

    this.deps.logger.info("catalog_search_complete", {
      collection: collectionId(collection),
      date,
      pages: pages.pageCount,
      results: total,
    });
  }
}
