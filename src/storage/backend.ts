/**
 * Object storage holding the raw article partitions.
 *
 * Keys are `/`-separated paths relative to the store's root, e.g.
 * `raw/year=2021/month=1/part-0.cols.gz`. Writes replace whole objects.
 */
export interface StorageBackend {
  write(key: string, data: Uint8Array | string): Promise<void>;

  read(key: string): Promise<Uint8Array>;

  /**
   * Keys at or below `prefix`, sorted. A prefix naming a single object
   * returns that key; a missing prefix returns nothing.
   */
  list(prefix: string): Promise<string[]>;
}
