import { join } from "node:path";
import { expandPath } from "../config/paths.js";
import type { DownloadTask } from "../downloader/types.js";
import type { Course } from "../scraper/course.js";
import type { Catalog, CatalogEntry, MediaStream, StreamTrack } from "../scraper/types.js";
import { pickStreams, type StreamPreference } from "../selection/selection.js";
import { outputFile } from "../shared/fs.js";
import { padOrdinal, slugify } from "../shared/slug.js";

// ============================================
// Pure functions - testable without mocking
// ============================================

/**
 * Folder for a course: the slug of the reported course title, or the
 * section id when the platform reports none.
 */
export function getCourseFolderName(courseTitle: string | undefined, sectionId: string): string {
  const slug = courseTitle ? slugify(courseTitle) : "";
  return slug || sectionId;
}

/**
 * `YYYY-MM-DD` from an ISO timestamp, or undefined when there is none.
 */
export function formatCaptureDate(timestamp: string | undefined): string | undefined {
  return timestamp ? /^(\d{4}-\d{2}-\d{2})/.exec(timestamp)?.[1] : undefined;
}

/**
 * Gets the base filename for a lecture (without extension).
 * Format: "03-2024-02-05-intro-to-sorting"
 */
export function getLectureBasename(entry: CatalogEntry, ordinalWidth = 2): string {
  const date = formatCaptureDate(entry.manifest.recordedAt ?? entry.lecture.captureDate);
  const parts = [
    padOrdinal(entry.ordinal, ordinalWidth),
    ...(date ? [date] : []),
    slugify(entry.lecture.title) || "lecture",
  ];
  return parts.join("-");
}

/**
 * Gets the video file path for one track of a lecture.
 */
export function getVideoPath(courseDir: string, basename: string, track: StreamTrack): string {
  return join(courseDir, `${basename}${track === "secondary" ? "-secondary" : ""}.mp4`);
}

export function getHistoryKey(lectureId: string, track: StreamTrack): string {
  return `${lectureId}:${track}`;
}

/**
 * Builds one download task per picked stream of each selected entry.
 * Entries without streams produce no task.
 */
export function buildDownloadTasks(
  course: Course,
  catalog: Catalog,
  selected: readonly CatalogEntry[],
  preference: StreamPreference,
  outputDir: string
): DownloadTask[] {
  const courseDir = join(
    expandPath(outputDir),
    getCourseFolderName(catalog.courseTitle, course.sectionId)
  );
  const ordinalWidth = String(catalog.entries.length).length;
  const tasks: DownloadTask[] = [];

  for (const entry of selected) {
    const basename = getLectureBasename(entry, ordinalWidth);
    const streams: MediaStream[] = pickStreams(entry.manifest, preference);

    for (const stream of streams) {
      const key = getHistoryKey(entry.lecture.id, stream.track);
      tasks.push({
        id: key,
        label: `${padOrdinal(entry.ordinal, ordinalWidth)} ${entry.lecture.title}${
          stream.track === "secondary" ? " [secondary]" : ""
        }`,
        destination: getVideoPath(courseDir, basename, stream.track),
        url: stream.url,
        expectedBytes: stream.size,
        resumeOffset: 0,
        historyKey: key,
      });
    }
  }

  return tasks;
}

/**
 * One line per task: the source URL, a tab, and where it would be saved.
 */
export function formatSourceLines(tasks: readonly DownloadTask[]): string[] {
  return tasks.map((task) => `${task.url}\t${task.destination}`);
}

// ============================================
// I/O functions - require filesystem access
// ============================================

/**
 * Writes source lines to a file, one per line.
 */
export async function saveSourceList(path: string, lines: readonly string[]): Promise<void> {
  await outputFile(expandPath(path), lines.length > 0 ? `${lines.join("\n")}\n` : "");
}
