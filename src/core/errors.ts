export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InvalidArgumentError extends Error {
  override readonly name = "InvalidArgumentError";
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export class CatalogUnavailableError extends Error {
  override readonly name = "CatalogUnavailableError";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CatalogQueryError extends Error {
  override readonly name = "CatalogQueryError";
}

export class StorageWriteError extends Error {
  override readonly name = "StorageWriteError";

  constructor(
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to write object ${key}: ${errorMessage(options?.cause)}`, options);
  }
}

export class StorageReadError extends Error {
  override readonly name = "StorageReadError";

  constructor(
    readonly key: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to read object ${key}: ${errorMessage(options?.cause)}`, options);
  }
}

export class ObjectNotFoundError extends Error {
  override readonly name = "ObjectNotFoundError";

  constructor(readonly key: string) {
    super(`Object not found: ${key}`);
  }
}

export class ManifestNotFoundError extends Error {
  override readonly name = "ManifestNotFoundError";

  constructor(
    readonly collection: string,
    readonly date: string,
  ) {
    super(`No link manifest for ${collection} on ${date}`);
  }
}

export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends Error {
  override readonly name = "FetchError";

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class HarvestFailedError extends Error {
  override readonly name = "HarvestFailedError";

  constructor(
    readonly date: string,
    cause: unknown,
  ) {
    super(`Harvest failed for ${date}: ${errorMessage(cause)}`, { cause });
  }
}

export class IncompleteLinksError extends Error {
  override readonly name = "IncompleteLinksError";

  constructor(readonly missingDays: string[]) {
    super(`Link manifests missing for ${missingDays.length} day(s): ${missingDays.join(", ")}`);
  }
}

export type AggregationErrorKind = "high_failure_rate" | "no_links" | "write_failed" | "cancelled";

export class AggregationError extends Error {
  override readonly name = "AggregationError";

  constructor(
    readonly kind: AggregationErrorKind,
    message: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
