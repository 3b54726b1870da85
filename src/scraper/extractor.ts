/**
 * Turns validated API documents into catalog records.
 * Pure functions; every schema decision about the remote API lives here.
 */
import { SchemaError } from "../shared/errors.js";
import {
  type MediaFile,
  LessonMediaResponseSchema,
  safeParse,
  SYLLABUS_LESSON_TYPE,
  SyllabusLessonSchema,
  SyllabusResponseSchema,
} from "./schemas.js";
import {
  type LectureSession,
  type MediaManifest,
  type MediaStream,
  type StreamTrack,
  emptyManifest,
} from "./types.js";

export interface SyllabusLecture {
  lecture: LectureSession;
  /** False when the syllabus already says there is nothing to fetch */
  hasMedia: boolean;
}

export interface ParsedSyllabus {
  lectures: SyllabusLecture[];
  /** Human-readable notes about entries that could not be read */
  problems: string[];
}

function firstDefined(...values: (string | null | undefined)[]): string | undefined {
  for (const value of values) {
    if (value) return value;
  }
  return undefined;
}

/**
 * Parses the syllabus document into lectures in the order the API lists them.
 * A malformed document yields no lectures and one problem; entries that are
 * not lessons are ignored; malformed lesson entries are skipped with a problem.
 */
export function parseSyllabus(raw: unknown): ParsedSyllabus {
  const document = safeParse(SyllabusResponseSchema, raw);
  if (!document.success) {
    return { lectures: [], problems: [`Unexpected syllabus format: ${document.error}`] };
  }
  if (document.data.status !== "ok") {
    return {
      lectures: [],
      problems: [`Syllabus request returned status "${document.data.status}"`],
    };
  }

  const lectures: SyllabusLecture[] = [];
  const problems: string[] = [];

  for (const [index, item] of document.data.data.entries()) {
    if (item.type !== SYLLABUS_LESSON_TYPE) {
      continue;
    }

    const entry = safeParse(SyllabusLessonSchema, item);
    if (!entry.success) {
      problems.push(`Syllabus entry ${index + 1} skipped: ${entry.error}`);
      continue;
    }

    const { lesson } = entry.data;
    const ordinal = lectures.length + 1;
    lectures.push({
      lecture: {
        id: lesson.lesson.id,
        title: firstDefined(lesson.lesson.name) ?? `Lecture ${ordinal}`,
        ordinal,
        captureDate: firstDefined(
          lesson.lesson.timing?.start,
          lesson.startTimeUTC,
          lesson.lesson.createdAt
        ),
      },
      hasMedia: lesson.medias === undefined || lesson.medias === null || lesson.medias.length > 0,
    });
  }

  return { lectures, problems };
}

function toStreams(files: MediaFile[] | null | undefined, track: StreamTrack): MediaStream[] {
  return (files ?? []).map((file) => ({
    label: file.height !== undefined ? `${file.height}p` : "unknown",
    width: file.width,
    height: file.height,
    track,
    url: file.s3Url,
    size: file.size,
  }));
}

/**
 * Parses a lesson media document.
 * Recordings that are missing or not yet processed give an empty manifest;
 * a document of the wrong shape throws SchemaError.
 */
export function parseLessonMedia(lectureId: string, raw: unknown): MediaManifest {
  const document = safeParse(LessonMediaResponseSchema, raw);
  if (!document.success) {
    throw new SchemaError(`Unexpected media format for lecture ${lectureId}`, {
      details: document.error,
    });
  }
  if (document.data.status !== "ok") {
    throw new SchemaError(
      `Media request for lecture ${lectureId} returned status "${document.data.status}"`
    );
  }

  const [first] = document.data.data;
  const media = first?.video?.media;
  const current = media?.media?.current;
  if (!first || !media || media.status !== "Processed" || !current) {
    return emptyManifest(lectureId);
  }

  return {
    lectureId,
    courseTitle: firstDefined(first.userSection?.sectionNumber),
    title: firstDefined(media.name),
    recordedAt: firstDefined(media.createdAt),
    mediaId: current.mediaId,
    streams: [
      ...toStreams(current.primaryFiles, "primary"),
      ...toStreams(current.secondaryFiles, "secondary"),
    ],
  };
}
