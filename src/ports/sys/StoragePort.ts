export interface StoragePort {
  /** Writes `value` under `key` and resolves with the absolute path written. */
  write(key: string, value: Buffer | string): Promise<string>;
}
