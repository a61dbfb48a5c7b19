import type { LinkProtocol } from "../config/types";
import type { CatalogEntry } from "./types";

export const DOCUMENT_SUFFIX = "stac.json";

const SCHEMES: Record<LinkProtocol, string> = {
  s3: "s3://",
  https: "https://",
};

export function protocolScheme(protocol: LinkProtocol): string {
  return SCHEMES[protocol];
}

function hrefOf(link: unknown): string | undefined {
  if (!link || typeof link !== "object" || !("href" in link)) {
    return undefined;
  }
  return typeof link.href === "string" ? link.href : undefined;
}

/**
 * First link of the entry pointing at an item document reachable over
 * `protocol`, or undefined when the entry has none.
 */
export function extractDocumentLink(entry: CatalogEntry, protocol: LinkProtocol): string | undefined {
  if (!Array.isArray(entry.links)) {
    return undefined;
  }

  const scheme = protocolScheme(protocol);
  for (const link of entry.links) {
    const href = hrefOf(link);
    if (href && href.endsWith(DOCUMENT_SUFFIX) && href.startsWith(scheme)) {
      return href;
    }
  }
  return undefined;
}

export function entryLabel(entry: CatalogEntry): string {
  if (typeof entry.title === "string") {
    return entry.title;
  }
  return typeof entry.id === "string" ? entry.id : "unknown";
}
