import * as fs from "node:fs";
import * as path from "node:path";
import type { ObjectStore } from "./types.js";

/**
 * Object store backed by a local directory. Used by the CLI to archive
 * without S3; object keys become relative file paths.
 */
export class FileObjectStore implements ObjectStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(key: string): string {
    const filePath = path.resolve(this.baseDir, key);
    const root = path.resolve(this.baseDir);
    if (!filePath.startsWith(root + path.sep)) {
      throw new Error(`Key escapes the output directory: ${key}`);
    }
    return filePath;
  }

  private atomicWrite(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    fs.writeFileSync(tmp, content);
    fs.renameSync(tmp, filePath);
  }

  describe(key: string): string {
    return path.join(this.baseDir, key);
  }

  // Content type has no file-system counterpart; the .json key carries it.
  async putObject(key: string, body: string, _contentType: string): Promise<void> {
    this.atomicWrite(this.resolve(key), body);
  }
}

export function createFileObjectStore(baseDir: string): ObjectStore {
  return new FileObjectStore(baseDir);
}
