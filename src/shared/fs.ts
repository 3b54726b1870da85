import { access, mkdir, stat, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Check if a file or directory exists.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
}

/**
 * Write a file, creating parent directories if needed.
 */
export async function outputFile(
  path: string,
  data: string | Uint8Array,
  options: { mode?: number } = {}
): Promise<void> {
  await ensureDir(dirname(path));
  if (typeof data === "string") {
    await writeFile(path, data, { encoding: "utf-8", ...options });
  } else {
    await writeFile(path, data, options);
  }
}

/**
 * Remove a file if it exists.
 */
export async function removeFile(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get file size in bytes, or null if file doesn't exist.
 */
export async function getFileSize(path: string): Promise<number | null> {
  try {
    const stats = await stat(path);
    return stats.size;
  } catch {
    return null;
  }
}
