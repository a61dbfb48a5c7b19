import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import { DEFAULT_COLLECTIONS } from "./collections";
import type { AppConfig, ConfigOverrides, ParquetCompression } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  catalogBaseUrl: "https://cmr.earthdata.nasa.gov/search",
  clientId: "stac-monthly-archive/0.1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  catalogPageSize: 2000,
  maxCatalogAttempts: 4,
  maxFetchAttempts: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 10_000,
  maxConcurrentDays: 4,
  maxConcurrentPerDay: 25,
  maxFailureRate: 0.01,
  outputVersion: "v0.1.0",
  parquetCompression: "SNAPPY",
  destination: undefined,
  harvestQueueUrl: undefined,
  s3: {
    region: undefined,
    endpoint: undefined,
    forcePathStyle: false,
  },
  collections: DEFAULT_COLLECTIONS,
};

const MAX_CATALOG_PAGE_SIZE = 2000;

const compressionSchema = z.enum(["UNCOMPRESSED", "SNAPPY", "GZIP"]);

const configOverridesSchema = z
  .object({
    catalogBaseUrl: z.string().url(),
    clientId: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    catalogPageSize: z.number().int().positive(),
    maxCatalogAttempts: z.number().int().positive(),
    maxFetchAttempts: z.number().int().positive(),
    retryBaseDelayMs: z.number().int().nonnegative(),
    retryMaxDelayMs: z.number().int().nonnegative(),
    maxConcurrentDays: z.number().int().positive(),
    maxConcurrentPerDay: z.number().int().positive(),
    maxFailureRate: z.number().min(0).max(1),
    outputVersion: z.string().min(1),
    parquetCompression: compressionSchema,
    destination: z.string().min(1),
    harvestQueueUrl: z.string().min(1),
    s3: z
      .object({
        region: z.string().min(1),
        endpoint: z.string().url(),
        forcePathStyle: z.boolean(),
      })
      .partial(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = configOverridesSchema.safeParse(json ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${absolutePath}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toRate(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toCompression(value: string | undefined, fallback: ParquetCompression): ParquetCompression {
  const parsed = compressionSchema.safeParse(value?.trim().toUpperCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    s3: {
      ...DEFAULT_CONFIG.s3,
      ...(fileConfig.s3 ?? {}),
    },
    collections: DEFAULT_CONFIG.collections,
  };

  const pageSize = toInt(env.CATALOG_PAGE_SIZE, merged.catalogPageSize);

  return {
    ...merged,
    catalogBaseUrl: env.CATALOG_BASE_URL ?? merged.catalogBaseUrl,
    clientId: env.CLIENT_ID ?? merged.clientId,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    catalogPageSize: Math.min(Math.max(1, pageSize), MAX_CATALOG_PAGE_SIZE),
    maxCatalogAttempts: toInt(env.MAX_CATALOG_ATTEMPTS, merged.maxCatalogAttempts),
    maxFetchAttempts: toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts),
    retryBaseDelayMs: toInt(env.RETRY_BASE_DELAY_MS, merged.retryBaseDelayMs),
    retryMaxDelayMs: toInt(env.RETRY_MAX_DELAY_MS, merged.retryMaxDelayMs),
    maxConcurrentDays: toInt(env.MAX_CONCURRENT_DAYS, merged.maxConcurrentDays),
    maxConcurrentPerDay: toInt(env.MAX_CONCURRENT_PER_DAY, merged.maxConcurrentPerDay),
    maxFailureRate: toRate(env.MAX_FAILURE_RATE, merged.maxFailureRate),
    outputVersion: env.OUTPUT_VERSION ?? merged.outputVersion,
    parquetCompression: toCompression(env.PARQUET_COMPRESSION, merged.parquetCompression),
    destination: env.DESTINATION ?? (env.BUCKET_NAME ? `s3://${env.BUCKET_NAME}` : merged.destination),
    harvestQueueUrl: env.HARVEST_QUEUE_URL ?? merged.harvestQueueUrl,
    s3: {
      region: env.AWS_REGION ?? merged.s3.region,
      endpoint: env.S3_ENDPOINT ?? merged.s3.endpoint,
      forcePathStyle: toBool(env.S3_FORCE_PATH_STYLE, merged.s3.forcePathStyle),
    },
  };
}

export { DEFAULT_CONFIG, MAX_CATALOG_PAGE_SIZE };
