import type { StorageBackend } from "./types";

/**
 * Non-persistent storage backed by a Map
 */
export class MemoryStorage implements StorageBackend {
  private data = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async listKeys(prefix: string): Promise<string[]> {
    return Array.from(this.data.keys())
      .filter(key => key.startsWith(prefix))
      .sort();
  }

  async close(): Promise<void> {
    this.data.clear();
  }

  /** Number of stored keys (for testing) */
  get size(): number {
    return this.data.size;
  }
}
