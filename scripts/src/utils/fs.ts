import { promises as fs } from "node:fs";
import { randomBytes } from "node:crypto";
import { basename, dirname, join } from "node:path";
import fsExtra from "fs-extra";

export function ensureLf(content: string): string {
  return content.replace(/\r\n/g, "\n");
}

export function ensureTrailingNewline(content: string): string {
  return content.endsWith("\n") ? content : `${content}\n`;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error) {
    const code = errorCode(error);
    if (code === "ENOENT" || code === "EISDIR") {
      return null;
    }
    throw error;
  }
}

/**
 * Write through a sibling temp file and rename it into place, so readers
 * never observe a partially written file.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await fsExtra.ensureDir(dir);
  const tempPath = join(dir, `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);
  const normalized = ensureTrailingNewline(ensureLf(content));
  try {
    await fs.writeFile(tempPath, normalized, "utf8");
    await fsExtra.move(tempPath, path, { overwrite: true });
  } catch (error) {
    await fsExtra.remove(tempPath);
    throw error;
  }
}

export async function writeJsonFile(path: string, data: unknown): Promise<void> {
  await writeTextFileAtomic(path, JSON.stringify(data, null, 2));
}
