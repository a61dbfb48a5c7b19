import { z } from "zod";
import type { CollectionDefinition, LinkProtocol } from "../config/types";
import type { YearMonth } from "../core/dates";
import type { FetchErrorKind } from "../core/errors";

/** `[west, south, east, north]` in degrees. */
export type BoundingBox = [west: number, south: number, east: number, north: number];

const positionSchema = z.array(z.number()).min(2);

export const geometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Point"), coordinates: positionSchema }),
  z.object({ type: z.literal("MultiPoint"), coordinates: z.array(positionSchema) }),
  z.object({ type: z.literal("LineString"), coordinates: z.array(positionSchema) }),
  z.object({ type: z.literal("MultiLineString"), coordinates: z.array(z.array(positionSchema)) }),
  z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(positionSchema)) }),
  z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(z.array(z.array(positionSchema))) }),
]);

export type Geometry = z.infer<typeof geometrySchema>;

export const itemDocumentSchema = z
  .object({
    type: z.literal("Feature").optional(),
    stac_version: z.string().optional(),
    stac_extensions: z.array(z.string()).optional(),
    id: z.string().min(1),
    collection: z.string().optional(),
    geometry: geometrySchema.nullable(),
    bbox: z.array(z.number()).optional(),
    properties: z
      .object({
        datetime: z.string().nullable().optional(),
        start_datetime: z.string().optional(),
        end_datetime: z.string().optional(),
      })
      .passthrough(),
    assets: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
    links: z.array(z.record(z.string(), z.unknown())).default([]),
  })
  .passthrough()
  .refine((item) => Boolean(item.properties.datetime) || Boolean(item.properties.start_datetime && item.properties.end_datetime), {
    message: "item needs properties.datetime or a start_datetime/end_datetime pair",
    path: ["properties"],
  });

export type ItemDocument = z.infer<typeof itemDocumentSchema>;

export interface HarvestRequest {
  collection: CollectionDefinition;
  /** Calendar day, `YYYY-MM-DD` (UTC). */
  date: string;
  destination: string;
  boundingBox?: BoundingBox;
  protocol: LinkProtocol;
  skipExisting: boolean;
}

export interface HarvestResult {
  date: string;
  key: string;
  written: boolean;
  linkCount: number;
}

export interface LinkManifest {
  collection: string;
  date: string;
  links: string[];
}

export type FetchOutcome =
  | {
      status: "success";
      link: string;
      item: ItemDocument;
      attempts: number;
    }
  | {
      status: "failure";
      link: string;
      errorKind: FetchErrorKind;
      error: string;
      attempts: number;
    };

export type FetchFailure = Extract<FetchOutcome, { status: "failure" }>;

export interface MonthlyAggregationRequest {
  collection: CollectionDefinition;
  yearMonth: YearMonth;
  destination: string;
  version?: string;
  requireCompleteLinks: boolean;
  skipExisting: boolean;
}

export interface AggregationResult {
  outputPath: string;
  itemCount: number;
  successCount: number;
  failureCount: number;
  missingDays: string[];
  skipped: boolean;
  failedLinks: FetchFailure[];
}
