import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { ParquetCompression } from "../config/types";
import type { Geometry, ItemDocument } from "../types";
import { type ArtifactRow, toArtifactRow } from "./rows";
import type { ColumnarWriter } from "./types";

export const GEOPARQUET_VERSION = "1.1.0";

export function buildSchema(compression: ParquetCompression): ParquetSchema {
  return new ParquetSchema({
    id: { type: "UTF8", compression },
    collection: { type: "UTF8", optional: true, compression },
    datetime: { type: "TIMESTAMP_MILLIS", optional: true, compression },
    start_datetime: { type: "TIMESTAMP_MILLIS", optional: true, compression },
    end_datetime: { type: "TIMESTAMP_MILLIS", optional: true, compression },
    geometry: { type: "BYTE_ARRAY", optional: true, compression },
    bbox: {
      optional: true,
      fields: {
        xmin: { type: "DOUBLE", compression },
        ymin: { type: "DOUBLE", compression },
        xmax: { type: "DOUBLE", compression },
        ymax: { type: "DOUBLE", compression },
      },
    },
    stac_version: { type: "UTF8", optional: true, compression },
    stac_extensions: { type: "UTF8", compression },
    properties: { type: "UTF8", compression },
    assets: { type: "UTF8", compression },
    links: { type: "UTF8", compression },
  });
}

/** GeoParquet `geo` file metadata for the rows being written. */
export function geoMetadata(items: readonly ItemDocument[], rows: readonly ArtifactRow[]): Record<string, unknown> {
  const geometryTypes = new Set<Geometry["type"]>();
  for (const item of items) {
    if (item.geometry) {
      geometryTypes.add(item.geometry.type);
    }
  }

  let extent: [number, number, number, number] | undefined;
  for (const row of rows) {
    if (!row.bbox) {
      continue;
    }
    extent = extent
      ? [
          Math.min(extent[0], row.bbox.xmin),
          Math.min(extent[1], row.bbox.ymin),
          Math.max(extent[2], row.bbox.xmax),
          Math.max(extent[3], row.bbox.ymax),
        ]
      : [row.bbox.xmin, row.bbox.ymin, row.bbox.xmax, row.bbox.ymax];
  }

  return {
    version: GEOPARQUET_VERSION,
    primary_column: "geometry",
    columns: {
      geometry: {
        encoding: "WKB",
        geometry_types: [...geometryTypes].sort(),
        ...(extent ? { bbox: extent } : {}),
        covering: {
          bbox: {
            xmin: ["bbox", "xmin"],
            ymin: ["bbox", "ymin"],
            xmax: ["bbox", "xmax"],
            ymax: ["bbox", "ymax"],
          },
        },
      },
    },
  };
}

export class GeoParquetWriter implements ColumnarWriter {
  readonly contentType = "application/vnd.apache.parquet";

  constructor(private readonly compression: ParquetCompression = "SNAPPY") {}

  async encode(items: readonly ItemDocument[]): Promise<Buffer> {
    const rows = items.map(toArtifactRow);
    const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "stac-archive-"));
    const filePath = path.join(tempDir, "artifact.parquet");

    try {
      const writer = await ParquetWriter.openFile(buildSchema(this.compression), filePath);
      writer.setMetadata("geo", JSON.stringify(geoMetadata(items, rows)));
      for (const row of rows) {
        await writer.appendRow(row);
      }
      await writer.close();
      return await fs.promises.readFile(filePath);
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }
}
