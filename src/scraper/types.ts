/**
 * Catalog types produced by the metadata resolver.
 * Nothing outside src/scraper sees the platform's raw JSON.
 */

/**
 * One recorded class meeting.
 */
export interface LectureSession {
  id: string;
  title: string;
  /** 1-based position in syllabus order */
  ordinal: number;
  /** ISO timestamp of the capture, when the platform reports one */
  captureDate: string | undefined;
}

export type StreamTrack = "primary" | "secondary";

export interface MediaStream {
  /** e.g. "720p", or "unknown" when the height is not reported */
  label: string;
  width: number | undefined;
  height: number | undefined;
  track: StreamTrack;
  url: string;
  /** Size in bytes, if reported */
  size: number | undefined;
}

export interface MediaManifest {
  lectureId: string;
  /** Course title (section number) as reported alongside the media */
  courseTitle: string | undefined;
  /** Recording name as reported alongside the media */
  title: string | undefined;
  recordedAt: string | undefined;
  /** Platform media id, stable across runs */
  mediaId: string | undefined;
  streams: MediaStream[];
}

export interface CatalogEntry {
  ordinal: number;
  lecture: LectureSession;
  manifest: MediaManifest;
  /** Why the manifest is empty, when it is */
  skipReason: string | undefined;
}

export interface CatalogIssue {
  /** Affected lecture, or undefined for course-level issues */
  lectureId: string | undefined;
  code: "SCHEMA_ERROR" | "NETWORK_ERROR";
  message: string;
}

export interface Catalog {
  courseTitle: string | undefined;
  entries: CatalogEntry[];
  issues: CatalogIssue[];
}

export function emptyManifest(lectureId: string): MediaManifest {
  return {
    lectureId,
    courseTitle: undefined,
    title: undefined,
    recordedAt: undefined,
    mediaId: undefined,
    streams: [],
  };
}
