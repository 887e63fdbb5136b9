/** Core type definitions shared by the archiver components. */

// ─── Logger ───

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

// ─── Object storage ───

/**
 * Minimal put-only view of an object store. Keys are `/`-separated paths;
 * writing an existing key replaces it.
 */
export interface ObjectStore {
  /** Human-readable location of `key`, used in log lines. */
  describe(key: string): string;
  putObject(key: string, body: string, contentType: string): Promise<void>;
}
