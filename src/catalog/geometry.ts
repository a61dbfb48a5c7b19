import { InvalidArgumentError } from "../core/errors";
import type { BoundingBox, Geometry } from "../types";
import type { CatalogEntry } from "./types";

export function validateBoundingBox(bbox: readonly number[]): BoundingBox {
  if (bbox.length !== 4 || bbox.some((value) => !Number.isFinite(value))) {
    throw new InvalidArgumentError(`Bounding box needs 4 finite numbers, got [${bbox.join(", ")}]`);
  }

  const [west, south, east, north] = bbox;
  if (west < -180 || west > 180) {
    throw new InvalidArgumentError(`west must be between -180 and 180, got ${west}`);
  }
  if (east < -180 || east > 180) {
    throw new InvalidArgumentError(`east must be between -180 and 180, got ${east}`);
  }
  if (south < -90 || south > 90) {
    throw new InvalidArgumentError(`south must be between -90 and 90, got ${south}`);
  }
  if (north < -90 || north > 90) {
    throw new InvalidArgumentError(`north must be between -90 and 90, got ${north}`);
  }
  if (west >= east) {
    throw new InvalidArgumentError(`west (${west}) must be less than east (${east})`);
  }
  if (south >= north) {
    throw new InvalidArgumentError(`south (${south}) must be less than north (${north})`);
  }
  return [west, south, east, north];
}

export function parseBoundingBox(raw: string): BoundingBox {
  const values = raw.split(",").map((part) => Number.parseFloat(part.trim()));
  return validateBoundingBox(values);
}

/** Splits a box whose west edge lies east of its east edge at the antimeridian. */
export function splitAntimeridian(box: BoundingBox): BoundingBox[] {
  const [west, south, east, north] = box;
  if (west <= east) {
    return [box];
  }
  return [
    [west, south, 180, north],
    [-180, south, east, north],
  ];
}

/** Boundary contact counts as intersection. */
export function boxesIntersect(a: BoundingBox, b: BoundingBox): boolean {
  return splitAntimeridian(a).some(([aWest, aSouth, aEast, aNorth]) =>
    splitAntimeridian(b).some(
      ([bWest, bSouth, bEast, bNorth]) => aWest <= bEast && bWest <= aEast && aSouth <= bNorth && bSouth <= aNorth,
    ),
  );
}

function parseNumbers(text: string): number[] | undefined {
  const values = text.trim().split(/\s+/).map((part) => Number.parseFloat(part));
  return values.length > 0 && values.every((value) => Number.isFinite(value)) ? values : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];
}

function boundsOfLatLonPairs(values: number[]): BoundingBox | undefined {
  if (values.length < 2 || values.length % 2 !== 0) {
    return undefined;
  }
  let west = Number.POSITIVE_INFINITY;
  let south = Number.POSITIVE_INFINITY;
  let east = Number.NEGATIVE_INFINITY;
  let north = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < values.length; i += 2) {
    const lat = values[i];
    const lon = values[i + 1];
    west = Math.min(west, lon);
    east = Math.max(east, lon);
    south = Math.min(south, lat);
    north = Math.max(north, lat);
  }
  return [west, south, east, north];
}

/**
 * Footprints of a catalog entry. The catalog's JSON feed writes coordinates
 * as space-separated `lat lon` text: `boxes` are `"S W N E"`, each polygon
 * ring is a flat list of pairs, `points` are single pairs.
 */
export function entryFootprints(entry: CatalogEntry): BoundingBox[] {
  const footprints: BoundingBox[] = [];

  for (const box of stringList(entry.boxes)) {
    const values = parseNumbers(box);
    if (values && values.length === 4) {
      const [south, west, north, east] = values;
      footprints.push([west, south, east, north]);
    }
  }

  const polygons = Array.isArray(entry.polygons) ? entry.polygons : [];
  for (const polygon of polygons) {
    const outerRing = stringList(polygon)[0];
    const values = outerRing ? parseNumbers(outerRing) : undefined;
    const bounds = values ? boundsOfLatLonPairs(values) : undefined;
    if (bounds) {
      footprints.push(bounds);
    }
  }

  for (const point of stringList(entry.points)) {
    const values = parseNumbers(point);
    const bounds = values && values.length === 2 ? boundsOfLatLonPairs(values) : undefined;
    if (bounds) {
      footprints.push(bounds);
    }
  }

  return footprints;
}

/** Entries without any footprint are kept: there is nothing to test them against. */
export function entryIntersects(entry: CatalogEntry, bbox: BoundingBox): boolean {
  const footprints = entryFootprints(entry);
  return footprints.length === 0 || footprints.some((footprint) => boxesIntersect(footprint, bbox));
}

function visitPositions(geometry: Geometry, visit: (lon: number, lat: number) => void): void {
  switch (geometry.type) {
    case "Point":
      visit(geometry.coordinates[0], geometry.coordinates[1]);
      return;
    case "MultiPoint":
    case "LineString":
      geometry.coordinates.forEach((p) => visit(p[0], p[1]));
      return;
    case "MultiLineString":
    case "Polygon":
      geometry.coordinates.forEach((line) => line.forEach((p) => visit(p[0], p[1])));
      return;
    case "MultiPolygon":
      geometry.coordinates.forEach((polygon) => polygon.forEach((ring) => ring.forEach((p) => visit(p[0], p[1]))));
      return;
  }
}

export function geometryBounds(geometry: Geometry): BoundingBox | undefined {
  let west = Number.POSITIVE_INFINITY;
  let south = Number.POSITIVE_INFINITY;
  let east = Number.NEGATIVE_INFINITY;
  let north = Number.NEGATIVE_INFINITY;
  visitPositions(geometry, (lon, lat) => {
    west = Math.min(west, lon);
    east = Math.max(east, lon);
    south = Math.min(south, lat);
    north = Math.max(north, lat);
  });
  return Number.isFinite(west) ? [west, south, east, north] : undefined;
}
