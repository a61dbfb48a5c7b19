export type CollectionName = "HLSL30" | "HLSS30";

export type LinkProtocol = "s3" | "https";

export type ParquetCompression = "UNCOMPRESSED" | "SNAPPY" | "GZIP";

export interface CollectionDefinition {
  name: CollectionName;
  conceptId: string;
  version: string;
  /** First calendar day (YYYY-MM-DD) for which the catalog holds granules. */
  originDate: string;
}

export interface S3Settings {
  region?: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

export interface AppConfig {
  catalogBaseUrl: string;
  clientId: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  catalogPageSize: number;
  maxCatalogAttempts: number;
  maxFetchAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxConcurrentDays: number;
  maxConcurrentPerDay: number;
  maxFailureRate: number;
  outputVersion: string;
  parquetCompression: ParquetCompression;
  destination?: string;
  harvestQueueUrl?: string;
  s3: S3Settings;
  collections: Readonly<Record<CollectionName, CollectionDefinition>>;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "s3" | "collections">> & {
  s3?: Partial<S3Settings>;
};
