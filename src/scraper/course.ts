/**
 * Course URL parsing and the platform endpoints derived from it.
 */
import { UserInputError } from "../shared/errors.js";

export interface Course {
  /** URL as given by the user */
  readonly url: string;
  /** Scheme + host, e.g. "https://video.example.edu" */
  readonly origin: string;
  /** Platform-assigned section identifier */
  readonly sectionId: string;
}

const SECTION_PATH = /^\/section\/([A-Za-z0-9-]+)(?:\/.*)?$/;

/**
 * Extracts the section id from a course URL of the form
 * `{origin}/section/{uuid}/...`.
 * Returns null for anything else.
 */
export function parseCourseUrl(input: string): Course | null {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    return null;
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    return null;
  }

  const sectionId = SECTION_PATH.exec(url.pathname)?.[1];
  if (!sectionId) {
    return null;
  }

  return Object.freeze({ url: input.trim(), origin: url.origin, sectionId });
}

/**
 * Like parseCourseUrl, but throws a UserInputError with a hint.
 */
export function requireCourse(input: string): Course {
  const course = parseCourseUrl(input);
  if (!course) {
    throw new UserInputError(`Not a course link: ${input}`, {
      details: "Expected a link like https://<platform>/section/<id>/home",
    });
  }
  return course;
}

export function getSyllabusUrl(course: Course): string {
  return `${course.origin}/section/${course.sectionId}/syllabus`;
}

export function getCourseHomeUrl(course: Course): string {
  return `${course.origin}/section/${course.sectionId}/home`;
}

export function getLessonMediaUrl(origin: string, lectureId: string): string {
  return `${origin}/lesson/${encodeURIComponent(lectureId)}/media`;
}

/**
 * Reads a course list file: one URL per line, blank lines and `#` comments ignored.
 */
export function parseCourseList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
