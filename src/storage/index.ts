import { fileURLToPath } from "node:url";
import type { S3Client } from "@aws-sdk/client-s3";
import type { AppConfig } from "../config";
import { LocalObjectStore } from "./localObjectStore";
import { createS3Client, parseS3Url, S3ObjectStore } from "./s3ObjectStore";
import type { ObjectStore, StoreFactory } from "./types";

export function createObjectStore(destination: string, config: AppConfig, s3Client?: S3Client): ObjectStore {
  if (destination.startsWith("s3://")) {
    return new S3ObjectStore(parseS3Url(destination), s3Client ?? createS3Client(config.s3));
  }
  if (destination.startsWith("file://")) {
    return new LocalObjectStore(fileURLToPath(destination));
  }
  return new LocalObjectStore(destination);
}

/** Store factory that shares one S3 client and one store per destination. */
export function createStoreFactory(config: AppConfig): StoreFactory {
  let s3Client: S3Client | undefined;
  const stores = new Map<string, ObjectStore>();

  return (destination) => {
    const cached = stores.get(destination);
    if (cached) {
      return cached;
    }
    if (destination.startsWith("s3://") && !s3Client) {
      s3Client = createS3Client(config.s3);
    }
    const store = createObjectStore(destination, config, s3Client);
    stores.set(destination, store);
    return store;
  };
}

export * from "./types";
export * from "./keys";
export { ManifestStore } from "./manifestStore";
export { LocalObjectStore } from "./localObjectStore";
export { MemoryObjectStore, type StoreOperation } from "./memoryObjectStore";
export { createS3Client, parseS3Url, S3ObjectStore, type S3Location } from "./s3ObjectStore";
