export { ItemFetcher, parseItemDocument, type ItemFetcherOptions } from "./itemFetcher";
