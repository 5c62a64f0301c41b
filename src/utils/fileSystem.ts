import { promises as fs } from "fs";
import path from "path";

/**
 * Read access to a prompt library. Paths are relative to the file system root and use `/`.
 */
export interface FileSystem {
  readText(filePath: string): Promise<string>;
  exists(filePath: string): Promise<boolean>;
  /** Files directly inside `directory` whose names end with `suffix`. Empty when the directory is missing. */
  listFiles(directory: string, suffix?: string): Promise<string[]>;
  /** False when `listFiles` cannot enumerate directories and always returns nothing. */
  readonly canList: boolean;
  /** Human-readable origin used in error messages. */
  describe(): string;
}

export class LocalFileSystem implements FileSystem {
  readonly canList = true;

  constructor(public readonly baseDir: string) {}

  private resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  async readText(filePath: string): Promise<string> {
    return fs.readFile(this.resolve(filePath), "utf-8");
  }

  exists(filePath: string): Promise<boolean> {
    return pathExists(this.resolve(filePath));
  }

  async listFiles(directory: string, suffix = ""): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(this.resolve(directory), { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(suffix))
      .map((entry) => path.posix.join(directory, entry.name))
      .sort();
  }

  describe(): string {
    return this.baseDir;
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** Writes `content` to `filePath`, creating parent directories first. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
