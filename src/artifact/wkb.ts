import type { Geometry } from "../types";

const WKB_TYPE: Record<Geometry["type"], number> = {
  Point: 1,
  LineString: 2,
  Polygon: 3,
  MultiPoint: 4,
  MultiLineString: 5,
  MultiPolygon: 6,
};

type Position = number[];

class WkbBuilder {
  private readonly chunks: Buffer[] = [];

  header(type: Geometry["type"]): void {
    const buffer = Buffer.alloc(5);
    buffer.writeUInt8(1, 0);
    buffer.writeUInt32LE(WKB_TYPE[type], 1);
    this.chunks.push(buffer);
  }

  count(value: number): void {
    const buffer = Buffer.alloc(4);
    buffer.writeUInt32LE(value, 0);
    this.chunks.push(buffer);
  }

  position(position: Position): void {
    const buffer = Buffer.alloc(16);
    buffer.writeDoubleLE(position[0], 0);
    buffer.writeDoubleLE(position[1], 8);
    this.chunks.push(buffer);
  }

  positions(positions: Position[]): void {
    this.count(positions.length);
    positions.forEach((position) => this.position(position));
  }

  rings(rings: Position[][]): void {
    this.count(rings.length);
    rings.forEach((ring) => this.positions(ring));
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/** Little-endian, two-dimensional well-known binary; extra ordinates are dropped. */
export function encodeWkb(geometry: Geometry): Buffer {
  const wkb = new WkbBuilder();
  wkb.header(geometry.type);

  switch (geometry.type) {
    case "Point":
      wkb.position(geometry.coordinates);
      break;
    case "LineString":
      wkb.positions(geometry.coordinates);
      break;
    case "Polygon":
      wkb.rings(geometry.coordinates);
      break;
    case "MultiPoint":
      wkb.count(geometry.coordinates.length);
      geometry.coordinates.forEach((point) => {
        wkb.header("Point");
        wkb.position(point);
      });
      break;
    case "MultiLineString":
      wkb.count(geometry.coordinates.length);
      geometry.coordinates.forEach((line) => {
        wkb.header("LineString");
        wkb.positions(line);
      });
      break;
    case "MultiPolygon":
      wkb.count(geometry.coordinates.length);
      geometry.coordinates.forEach((polygon) => {
        wkb.header("Polygon");
        wkb.rings(polygon);
      });
      break;
  }

  return wkb.toBuffer();
}
