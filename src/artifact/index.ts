export * from "./types";
export { GeoParquetWriter, GEOPARQUET_VERSION, buildSchema, geoMetadata } from "./geoParquetWriter";
export { itemBounds, toArtifactRow, type ArtifactRow, type BboxStruct } from "./rows";
export { encodeWkb } from "./wkb";
