export * from "./types";
export { CatalogClient, CatalogPaginator, type CatalogClientDeps, type CatalogSearch } from "./catalogClient";
export { HttpCatalogPageSource, SEARCH_AFTER_HEADER, type HttpCatalogPageSourceOptions } from "./httpPageSource";
export { DOCUMENT_SUFFIX, entryLabel, extractDocumentLink, protocolScheme } from "./links";
export {
  boxesIntersect,
  entryFootprints,
  entryIntersects,
  geometryBounds,
  parseBoundingBox,
  splitAntimeridian,
  validateBoundingBox,
} from "./geometry";
