import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  type ListObjectsV2CommandOutput,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import type { S3Settings } from "../config/types";
import { InvalidArgumentError, ObjectNotFoundError, StorageReadError, StorageWriteError } from "../core/errors";
import type { ObjectStore } from "./types";

export interface S3Location {
  bucket: string;
  prefix: string;
}

export function parseS3Url(url: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(url.trim());
  if (!match || match[1].length === 0) {
    throw new InvalidArgumentError(`Invalid S3 URL: ${url} (expected s3://bucket[/prefix])`);
  }
  return {
    bucket: match[1],
    prefix: match[2].replace(/^\/+|\/+$/g, ""),
  };
}

export function createS3Client(settings: S3Settings): S3Client {
  return new S3Client({
    region: settings.region,
    endpoint: settings.endpoint,
    forcePathStyle: settings.forcePathStyle,
  });
}

function isNotFound(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata.httpStatusCode === 404;
}

export class S3ObjectStore implements ObjectStore {
  readonly location: string;
  readonly bucket: string;
  private readonly prefix: string;
  private readonly client: S3Client;

  constructor(location: S3Location, client: S3Client) {
    this.bucket = location.bucket;
    this.prefix = location.prefix;
    this.client = client;
    this.location = this.prefix ? `s3://${this.bucket}/${this.prefix}` : `s3://${this.bucket}`;
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new StorageReadError(key, { cause: error });
    }
  }

  async get(key: string): Promise<Buffer> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }));
      if (!response.Body) {
        return Buffer.alloc(0);
      }
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFound(error)) {
        throw new ObjectNotFoundError(key);
      }
      throw new StorageReadError(key, { cause: error });
    }
  }

  async put(key: string, body: Buffer | string, contentType?: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: this.fullKey(key),
          Body: body,
          ContentType: contentType,
        }),
      );
    } catch (error) {
      throw new StorageWriteError(key, { cause: error });
    }
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      let response: ListObjectsV2CommandOutput;
      try {
        response = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: this.fullKey(prefix),
            ContinuationToken: continuationToken,
          }),
        );
      } catch (error) {
        throw new StorageReadError(prefix, { cause: error });
      }

      for (const object of response.Contents ?? []) {
        if (object.Key) {
          keys.push(this.relativeKey(object.Key));
        }
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }

  private fullKey(key: string): string {
    const trimmed = key.replace(/^\/+/, "");
    return this.prefix ? `${this.prefix}/${trimmed}` : trimmed;
  }

  private relativeKey(fullKey: string): string {
    return this.prefix && fullKey.startsWith(`${this.prefix}/`) ? fullKey.slice(this.prefix.length + 1) : fullKey;
  }
}
