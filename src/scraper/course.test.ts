import { describe, expect, it } from "vitest";
import { UserInputError } from "../shared/errors.js";
import {
  getCourseHomeUrl,
  getLessonMediaUrl,
  getSyllabusUrl,
  parseCourseList,
  parseCourseUrl,
  requireCourse,
} from "./course.js";

const SECTION = "3f2c9a10-5b7e-4c1d-9e8f-0a1b2c3d4e5f";

describe("parseCourseUrl", () => {
  it("extracts origin and section id", () => {
    expect(parseCourseUrl(`https://video.example.test/section/${SECTION}/home`)).toEqual({
      url: `https://video.example.test/section/${SECTION}/home`,
      origin: "https://video.example.test",
      sectionId: SECTION,
    });
  });

  it("accepts links without a trailing page and trims whitespace", () => {
    expect(parseCourseUrl(`  https://video.example.test/section/${SECTION}  `)?.sectionId).toBe(SECTION);
    expect(parseCourseUrl(`https://video.example.test/section/${SECTION}/syllabus?x=1`)?.sectionId).toBe(
      SECTION
    );
  });

  it("keeps a non-default port in the origin", () => {
    expect(parseCourseUrl("http://localhost:8080/section/sec-1/home")?.origin).toBe(
      "http://localhost:8080"
    );
  });

  it("returns null for anything else", () => {
    expect(parseCourseUrl("not a link")).toBeNull();
    expect(parseCourseUrl("ftp://video.example.test/section/sec-1")).toBeNull();
    expect(parseCourseUrl("https://video.example.test/courses/sec-1")).toBeNull();
    expect(parseCourseUrl("https://video.example.test/section/")).toBeNull();
  });
});

describe("requireCourse", () => {
  it("throws UserInputError with a hint", () => {
    expect(() => requireCourse("not a link")).toThrow(UserInputError);
    expect(() => requireCourse("not a link")).toThrow("Not a course link: not a link");
  });
});

describe("endpoints", () => {
  const course = requireCourse("https://video.example.test/section/sec-1/home");

  it("derives the syllabus and home page", () => {
    expect(getSyllabusUrl(course)).toBe("https://video.example.test/section/sec-1/syllabus");
    expect(getCourseHomeUrl(course)).toBe("https://video.example.test/section/sec-1/home");
  });

  it("encodes lecture ids in media links", () => {
    expect(getLessonMediaUrl(course.origin, "G_abc/1")).toBe(
      "https://video.example.test/lesson/G_abc%2F1/media"
    );
  });
});

describe("parseCourseList", () => {
  it("skips blank lines and comments", () => {
    const content = "# term 1\r\nhttps://a.test/section/1\n\n  https://a.test/section/2  \n#done";

    expect(parseCourseList(content)).toEqual(["https://a.test/section/1", "https://a.test/section/2"]);
  });
});
