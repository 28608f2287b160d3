import { join } from "node:path";

import fg from "fast-glob";
import fsExtra from "fs-extra";

import { StorageError } from "../errors.js";
import { readTextFile, writeJsonFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

/** JSON documents stored as files directly under one base directory. */
export class BaselineStorage {
  constructor(readonly baseDir: string) {}

  fullPath(filename: string): string {
    return join(this.baseDir, filename);
  }

  async save(filename: string, data: unknown): Promise<void> {
    const path = this.fullPath(filename);
    try {
      await writeJsonFile(path, data);
    } catch (error) {
      throw new StorageError(`Unable to write ${filename}`, path, error);
    }
    logger.debug("Saved JSON", { path });
  }

  /** Parsed contents, or null when the file does not exist. */
  async load(filename: string): Promise<unknown> {
    const path = this.fullPath(filename);
    const raw = await readTextFile(path);
    if (raw === null) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error) {
      throw new StorageError(`Corrupted JSON file ${filename}`, path, error);
    }
  }

  async exists(filename: string): Promise<boolean> {
    return fsExtra.pathExists(this.fullPath(filename));
  }

  /** File names matching the glob, sorted ascending. */
  async list(pattern = "*.json"): Promise<string[]> {
    if (!(await fsExtra.pathExists(this.baseDir))) {
      return [];
    }
    const entries = await fg(pattern, { cwd: this.baseDir, onlyFiles: true, dot: false, deep: 1 });
    return entries.sort();
  }

  async delete(filename: string): Promise<void> {
    const path = this.fullPath(filename);
    if (!(await fsExtra.pathExists(path))) {
      throw new StorageError(`File not found: ${filename}`, path);
    }
    await fsExtra.remove(path);
  }
}
