export interface StoragePort {
  /** Parsed JSON, or undefined when the file is missing or unreadable. */
  readJson(path: string): Promise<unknown>;
  writeJson(path: string, data: unknown): Promise<void>;
  remove(path: string): Promise<void>;
}
