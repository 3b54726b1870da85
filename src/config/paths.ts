import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.lecturecap/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".lecturecap");
export const HISTORY_DB_PATH = join(APP_DIR, "history.db");

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}
