import type { IStorageAdapter } from '@/ports/IStorageAdapter';

/**
 * In-memory implementation of IStorageAdapter for testing
 *
 * Values are cloned on write and on read, so stored data behaves like a
 * serialized copy.
 */
export class InMemoryStorageAdapter implements IStorageAdapter {
  private storage: Map<string, unknown> = new Map();
  private pendingFailure: Error | null = null;
  private writeCount = 0;

  async read(key: string): Promise<unknown> {
    if (!this.storage.has(key)) {
      return null;
    }
    return structuredClone(this.storage.get(key));
  }

  async write(key: string, data: unknown): Promise<void> {
    if (this.pendingFailure) {
      const failure = this.pendingFailure;
      this.pendingFailure = null;
      throw failure;
    }
    this.storage.set(key, structuredClone(data));
    this.writeCount++;
  }

  async exists(key: string): Promise<boolean> {
    return this.storage.has(key);
  }

  async delete(key: string): Promise<void> {
    this.storage.delete(key);
  }

  async keys(): Promise<string[]> {
    return Array.from(this.storage.keys());
  }

  async clear(): Promise<void> {
    this.storage.clear();
  }

  /**
   * Make the next write reject without storing anything (for testing)
   */
  failNextWrite(error: Error = new Error('Simulated write failure')): void {
    this.pendingFailure = error;
  }

  /**
   * Number of successful writes so far (for testing)
   */
  get writes(): number {
    return this.writeCount;
  }

  /**
   * Set the storage directly (for testing)
   */
  _setStorage(data: Record<string, unknown>): void {
    this.storage = new Map(Object.entries(data));
  }
}
