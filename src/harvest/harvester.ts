import type { CatalogSearch } from "../catalog/catalogClient";
import { entryIntersects } from "../catalog/geometry";
import { entryLabel, extractDocumentLink } from "../catalog/links";
import { collectionId } from "../config/collections";
import { dayRange } from "../core/dates";
import { errorMessage, HarvestFailedError } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import { ManifestStore } from "../storage/manifestStore";
import type { StoreFactory } from "../storage/types";
import type { HarvestRequest, HarvestResult } from "../types";

export interface HarvesterDeps {
  catalog: CatalogSearch;
  openStore: StoreFactory;
  logger: Logger;
  metrics: MetricsRegistry;
}

export type RangeHarvestResult =
  | ({ status: "ok" } & HarvestResult)
  | { status: "failed"; date: string; error: string };

export class DailyHarvester {
  constructor(private readonly deps: HarvesterDeps) {}

  async harvestDay(request: HarvestRequest): Promise<HarvestResult> {
    const { logger, metrics } = this.deps;
    const manifests = new ManifestStore(this.deps.openStore(request.destination));
    const key = manifests.key(request.collection, request.date);
    const fields = { collection: collectionId(request.collection), date: request.date, key };

    try {
      if (request.skipExisting && (await manifests.exists(request.collection, request.date))) {
        metrics.incrementCounter("manifests_skipped", 1);
        logger.info("harvest_day_skipped", { ...fields, location: manifests.location });
        return { date: request.date, key, written: false, linkCount: 0 };
      }

      logger.info("harvest_day_start", { ...fields, protocol: request.protocol, boundingBox: request.boundingBox });
      const links = await this.collectLinks(request);
      await manifests.write(request.collection, request.date, links);
      metrics.incrementCounter("manifests_written", 1);
      logger.info("harvest_day_complete", { ...fields, linkCount: links.length });
      return { date: request.date, key, written: true, linkCount: links.length };
    } catch (error) {
      logger.error("harvest_day_failed", { ...fields, error: errorMessage(error) });
      throw new HarvestFailedError(request.date, error);
    }
  }

  /** Harvests each day of `[startDate, endDate]` in order; a failed day does not stop the rest. */
  async harvestRange(request: Omit<HarvestRequest, "date">, startDate: string, endDate: string): Promise<RangeHarvestResult[]> {
    const results: RangeHarvestResult[] = [];
    for (const date of dayRange(startDate, endDate)) {
      try {
        const result = await this.harvestDay({ ...request, date });
        results.push({ status: "ok", ...result });
      } catch (error) {
        results.push({ status: "failed", date, error: errorMessage(error) });
      }
    }
    return results;
  }

  private async collectLinks(request: HarvestRequest): Promise<string[]> {
    const { logger, metrics } = this.deps;
    const links: string[] = [];
    const seen = new Set<string>();

    for await (const entry of this.deps.catalog.search(request.collection, request.date, request.boundingBox)) {
      if (request.boundingBox && !entryIntersects(entry, request.boundingBox)) {
        logger.debug("catalog_entry_outside_bbox", { date: request.date, granule: entryLabel(entry) });
        continue;
      }

      const link = extractDocumentLink(entry, request.protocol);
      if (!link) {
        metrics.incrementCounter("links_skipped", 1);
        logger.warn("catalog_entry_without_link", { date: request.date, granule: entryLabel(entry), protocol: request.protocol });
        continue;
      }

      if (!seen.has(link)) {
        seen.add(link);
        links.push(link);
      }
    }

    return links;
  }
}
