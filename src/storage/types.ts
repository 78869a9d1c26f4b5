/**
 * Key/value persistence consumed by the registry.
 * Values are opaque strings (JSON-encoded by callers).
 */
export interface StorageBackend {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  /** Returns true if the key existed */
  delete(key: string): Promise<boolean>;
  /** Keys starting with prefix, sorted ascending */
  listKeys(prefix: string): Promise<string[]>;
  close(): Promise<void>;
}
