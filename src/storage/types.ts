/**
 * Whole-object key/value storage. Keys are `/`-separated and relative to the
 * store's root; `put` replaces the object in one step, so readers see either
 * the previous body or the new one.
 */
export interface ObjectStore {
  /** Human-readable location of the store root, used in logs. */
  readonly location: string;
  exists(key: string): Promise<boolean>;
  /** Rejects with `ObjectNotFoundError` when the key is absent. */
  get(key: string): Promise<Buffer>;
  put(key: string, body: Buffer | string, contentType?: string): Promise<void>;
  /** Keys under `prefix`, sorted. */
  list(prefix: string): Promise<string[]>;
}

export type StoreFactory = (destination: string) => ObjectStore;
