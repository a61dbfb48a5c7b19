import { geometryBounds } from "../catalog/geometry";
import type { BoundingBox, ItemDocument } from "../types";
import { encodeWkb } from "./wkb";

export type BboxStruct = {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
};

export type ArtifactRow = {
  id: string;
  collection: string | null;
  datetime: Date | null;
  start_datetime: Date | null;
  end_datetime: Date | null;
  geometry: Buffer | null;
  bbox: BboxStruct | null;
  stac_version: string | null;
  stac_extensions: string;
  properties: string;
  assets: string;
  links: string;
};

function toDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

/** Item bbox when it carries a 2D or 3D one, else the bounds of its geometry. */
export function itemBounds(item: ItemDocument): BoundingBox | undefined {
  const bbox = item.bbox;
  if (bbox && bbox.length === 4) {
    return [bbox[0], bbox[1], bbox[2], bbox[3]];
  }
  if (bbox && bbox.length === 6) {
    return [bbox[0], bbox[1], bbox[3], bbox[4]];
  }
  return item.geometry ? geometryBounds(item.geometry) : undefined;
}

export function toArtifactRow(item: ItemDocument): ArtifactRow {
  const { datetime, start_datetime, end_datetime, ...otherProperties } = item.properties;
  const bounds = itemBounds(item);

  return {
    id: item.id,
    collection: item.collection ?? null,
    datetime: toDate(datetime),
    start_datetime: toDate(start_datetime),
    end_datetime: toDate(end_datetime),
    geometry: item.geometry ? encodeWkb(item.geometry) : null,
    bbox: bounds ? { xmin: bounds[0], ymin: bounds[1], xmax: bounds[2], ymax: bounds[3] } : null,
    stac_version: item.stac_version ?? null,
    stac_extensions: JSON.stringify(item.stac_extensions ?? []),
    properties: JSON.stringify(otherProperties),
    assets: JSON.stringify(item.assets),
    links: JSON.stringify(item.links),
  };
}
