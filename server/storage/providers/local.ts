import * as fs from "fs/promises";
import * as path from "path";
import type { FileStore } from "../interfaces";

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class LocalFileStore implements FileStore {
  constructor(private readonly basePath: string) {}

  private resolvePath(key: string): string {
    const safePath = path.normalize(key).replace(/^(\.\.(\/|\\|$))+/, "");
    return path.join(this.basePath, safePath);
  }

  async save(key: string, data: Buffer): Promise<string> {
    const filePath = this.resolvePath(key);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, data, { flag: "wx" });
      return filePath;
    } catch (error) {
      throw new StorageError(
        `Failed to store ${key}: ${error instanceof Error ? error.message : String(error)}`,
        key,
        error
      );
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await fs.unlink(this.resolvePath(key));
    } catch (error) {
      if (isMissingFile(error)) return;
      throw new StorageError(
        `Failed to remove ${key}: ${error instanceof Error ? error.message : String(error)}`,
        key,
        error
      );
    }
  }
}
