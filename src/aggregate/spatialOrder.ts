import { itemBounds } from "../artifact/rows";
import type { ItemDocument } from "../types";

export const HILBERT_ORDER = 14;

/**
 * Position of grid cell (x, y) along a Hilbert curve filling a
 * 2^order × 2^order grid.
 */
export function hilbertIndex(x: number, y: number, order: number = HILBERT_ORDER): number {
  let rx: number;
  let ry: number;
  let d = 0;
  let cx = x;
  let cy = y;
  const n = 2 ** order;

  for (let s = n / 2; s >= 1; s /= 2) {
    rx = (cx & s) > 0 ? 1 : 0;
    ry = (cy & s) > 0 ? 1 : 0;
    d += s * s * ((3 * rx) ^ ry);

    if (ry === 0) {
      if (rx === 1) {
        cx = n - 1 - cx;
        cy = n - 1 - cy;
      }
      const swap = cx;
      cx = cy;
      cy = swap;
    }
  }
  return d;
}

function toCell(value: number, min: number, max: number, order: number): number {
  const cells = 2 ** order;
  const clamped = Math.min(Math.max(value, min), max);
  return Math.min(cells - 1, Math.floor(((clamped - min) / (max - min)) * cells));
}

/** Hilbert key of a lon/lat point on the whole-globe grid. */
export function lonLatKey(lon: number, lat: number, order: number = HILBERT_ORDER): number {
  return hilbertIndex(toCell(lon, -180, 180, order), toCell(lat, -90, 90, order), order);
}

/**
 * Returns a copy of `items` ordered along the Hilbert curve by bbox centre.
 * Items with no bbox or geometry keep their relative order at the end.
 */
export function sortBySpatialKey(items: readonly ItemDocument[], order: number = HILBERT_ORDER): ItemDocument[] {
  const keyed = items.map((item, position) => {
    const bounds = itemBounds(item);
    const key = bounds ? lonLatKey((bounds[0] + bounds[2]) / 2, (bounds[1] + bounds[3]) / 2, order) : Number.POSITIVE_INFINITY;
    return { item, key, position };
  });

  keyed.sort((a, b) => {
    if (a.key !== b.key) {
      return a.key < b.key ? -1 : 1;
    }
    return a.position - b.position;
  });
  return keyed.map((entry) => entry.item);
}
