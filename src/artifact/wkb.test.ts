import { describe, expect, test } from "vitest";
import { encodeWkb } from "./wkb";

describe("encodeWkb", () => {
  test("encodes a point as little-endian WKB", () => {
    expect(encodeWkb({ type: "Point", coordinates: [1, 2] }).toString("hex")).toBe(
      "0101000000" + "000000000000f03f" + "0000000000000040",
    );
  });

  test("drops the third ordinate", () => {
    expect(encodeWkb({ type: "Point", coordinates: [1, 2, 300] })).toEqual(encodeWkb({ type: "Point", coordinates: [1, 2] }));
  });

  test("writes ring and point counts for polygons", () => {
    const wkb = encodeWkb({
      type: "Polygon",
      coordinates: [
        [
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 0],
        ],
      ],
    });

    expect(wkb.length).toBe(5 + 4 + 4 + 4 * 16);
    expect(wkb.readUInt32LE(1)).toBe(3);
    expect(wkb.readUInt32LE(5)).toBe(1);
    expect(wkb.readUInt32LE(9)).toBe(4);
    expect(wkb.readDoubleLE(13 + 16)).toBe(1);
  });

  test("nests full geometries inside multi types", () => {
    const wkb = encodeWkb({ type: "MultiPoint", coordinates: [[1, 2], [3, 4]] });

    expect(wkb.readUInt32LE(1)).toBe(4);
    expect(wkb.readUInt32LE(5)).toBe(2);
    expect(wkb.readUInt8(9)).toBe(1);
    expect(wkb.readUInt32LE(10)).toBe(1);
    expect(wkb.length).toBe(9 + 2 * 21);
  });
});
