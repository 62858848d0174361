/**
 * Port interface for persistent storage operations
 *
 * Values are plain JSON data. Readers receive `unknown` and validate what
 * they load.
 */
export interface IStorageAdapter {
  /**
   * Read data from storage
   * @returns Stored data, or null if the key does not exist
   */
  read(key: string): Promise<unknown>;

  /**
   * Write data to storage. Resolves only once the data is durable; on
   * rejection the previous value is left in place.
   */
  write(key: string, data: unknown): Promise<void>;

  exists(key: string): Promise<boolean>;

  delete(key: string): Promise<void>;

  keys(): Promise<string[]>;

  clear(): Promise<void>;
}
