import type { ItemDocument } from "../types";

/** Encodes a month of item documents into one artifact body. */
export interface ColumnarWriter {
  readonly contentType: string;
  encode(items: readonly ItemDocument[]): Promise<Buffer>;
}
