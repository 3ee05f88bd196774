export type StorageReadOptions = {
  /** Writes the fallback when nothing exists at the path yet. */
  writeIfMissing?: boolean;
};

export interface StoragePort {
  readJson<T>(path: string, fallback: T, options?: StorageReadOptions): Promise<T>;
}
