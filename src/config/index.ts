export * from "./types";
export * from "./collections";
export { loadConfig, DEFAULT_CONFIG, MAX_CATALOG_PAGE_SIZE } from "./loadConfig";
