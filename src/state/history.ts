import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { HISTORY_DB_PATH } from "../config/paths.js";

/**
 * One downloaded video, keyed by `<lecture id>:<track>`.
 */
export interface HistoryRecord {
  key: string;
  courseId: string;
  destination: string;
  downloadedAt: string;
}

interface HistoryRow {
  key: string;
  course_id: string;
  destination: string;
  downloaded_at: string;
}

/**
 * Record of videos already downloaded, so that deleting a file does not
 * make the next `--all` run fetch it again.
 */
export class DownloadHistory {
  private db: Database.Database;

  /**
   * @param dbPath - SQLite file, or ":memory:" for a throwaway history
   */
  constructor(dbPath: string = HISTORY_DB_PATH) {
    if (dbPath !== ":memory:") {
      // Ensure directory exists
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.initSchema();
  }

  /**
   * Initialize database schema.
   */
  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS downloads (
        key TEXT PRIMARY KEY,
        course_id TEXT NOT NULL,
        destination TEXT NOT NULL,
        downloaded_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_downloads_course ON downloads(course_id);
    `);
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  has(key: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>("SELECT 1 AS found FROM downloads WHERE key = ?")
      .get(key);
    return row !== undefined;
  }

  /**
   * Records a finished download. Re-recording a key updates it.
   */
  record(key: string, courseId: string, destination: string, at: Date = new Date()): void {
    this.db
      .prepare<[string, string, string, string]>(
        `INSERT INTO downloads (key, course_id, destination, downloaded_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           course_id = excluded.course_id,
           destination = excluded.destination,
           downloaded_at = excluded.downloaded_at`
      )
      .run(key, courseId, destination, at.toISOString());
  }

  /**
   * Lists recorded downloads, oldest first, optionally for one course.
   */
  list(courseId?: string): HistoryRecord[] {
    const rows =
      courseId === undefined
        ? this.db
            .prepare<[], HistoryRow>("SELECT * FROM downloads ORDER BY downloaded_at, key")
            .all()
        : this.db
            .prepare<[string], HistoryRow>(
              "SELECT * FROM downloads WHERE course_id = ? ORDER BY downloaded_at, key"
            )
            .all(courseId);

    return rows.map((row) => ({
      key: row.key,
      courseId: row.course_id,
      destination: row.destination,
      downloadedAt: row.downloaded_at,
    }));
  }

  /**
   * Forgets a course, or everything when no course is given.
   * Returns the number of removed records.
   */
  clear(courseId?: string): number {
    const result =
      courseId === undefined
        ? this.db.prepare("DELETE FROM downloads").run()
        : this.db.prepare<[string]>("DELETE FROM downloads WHERE course_id = ?").run(courseId);
    return result.changes;
  }
}
