import * as fs from "node:fs/promises";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import type { DataStorage } from "./storage.js";

export class FileSystemStorage implements DataStorage {
  readonly baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  private resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  async readText(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(filePath), "utf-8");
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async writeText(filePath: string, content: string): Promise<void> {
    const full = this.resolve(filePath);
    await fs.mkdir(path.dirname(full), { recursive: true });
    // Rename within one directory is atomic, so readers never see a partial file.
    const tmp = `${full}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tmp, content, "utf-8");
      await fs.rename(tmp, full);
    } catch (err: unknown) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
