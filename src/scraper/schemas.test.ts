/**
 * Tests for the syllabus and lesson media schemas.
 */

import { describe, expect, it } from "vitest";
import {
  LessonMediaResponseSchema,
  MediaFileSchema,
  safeParse,
  SyllabusLessonSchema,
  SyllabusResponseSchema,
} from "./schemas.js";

describe("SyllabusLessonSchema", () => {
  it("validates a lesson entry", () => {
    const entry = {
      type: "SyllabusLessonType",
      lesson: {
        lesson: { id: "G_1", name: "Sorting", timing: { start: "2024-02-05T10:00:00Z" } },
        isPast: true,
        medias: [{ id: "m-1" }],
      },
    };

    const result = SyllabusLessonSchema.safeParse(entry);
    expect(result.success).toBe(true);
    expect(result.data?.lesson.lesson.timing?.start).toBe("2024-02-05T10:00:00Z");
  });

  it("accepts null names and timings", () => {
    const result = SyllabusLessonSchema.safeParse({
      type: "SyllabusLessonType",
      lesson: { lesson: { id: "G_1", name: null, timing: null }, medias: null },
    });
    expect(result.success).toBe(true);
  });

  it("rejects other entry types and empty ids", () => {
    expect(
      SyllabusLessonSchema.safeParse({ type: "SyllabusFolderType", lesson: { lesson: { id: "x" } } })
        .success
    ).toBe(false);
    expect(
      SyllabusLessonSchema.safeParse({ type: "SyllabusLessonType", lesson: { lesson: { id: "" } } })
        .success
    ).toBe(false);
  });
});

describe("SyllabusResponseSchema", () => {
  it("keeps unknown entry fields for per-entry validation", () => {
    const result = SyllabusResponseSchema.parse({
      status: "ok",
      data: [{ type: "SyllabusLessonType", lesson: { lesson: { id: "G_1" } } }],
    });
    expect(result.data[0]).toHaveProperty("lesson");
  });

  it("requires a data array", () => {
    expect(SyllabusResponseSchema.safeParse({ status: "ok" }).success).toBe(false);
  });
});

describe("MediaFileSchema", () => {
  it("requires a file URL", () => {
    expect(MediaFileSchema.safeParse({ s3Url: "https://cdn.example.test/a.mp4" }).success).toBe(true);
    expect(MediaFileSchema.safeParse({ s3Url: "", height: 720 }).success).toBe(false);
  });
});

describe("LessonMediaResponseSchema", () => {
  it("validates processed media with both tracks", () => {
    const result = LessonMediaResponseSchema.parse({
      status: "ok",
      data: [
        {
          userSection: { sectionNumber: "CS 101" },
          video: {
            media: {
              status: "Processed",
              media: {
                current: {
                  mediaId: "m-1",
                  primaryFiles: [{ s3Url: "https://cdn.example.test/p.mp4", width: 1280, height: 720 }],
                  secondaryFiles: [{ s3Url: "https://cdn.example.test/s.mp4" }],
                },
              },
            },
          },
        },
      ],
    });

    expect(result.data[0]?.video?.media?.media?.current?.primaryFiles?.[0]?.height).toBe(720);
    expect(result.data[0]?.userSection?.sectionNumber).toBe("CS 101");
  });

  it("accepts entries without video", () => {
    expect(LessonMediaResponseSchema.safeParse({ status: "ok", data: [{ video: null }] }).success).toBe(
      true
    );
  });
});

describe("safeParse", () => {
  it("returns data on success", () => {
    expect(safeParse(MediaFileSchema, { s3Url: "https://cdn.example.test/a.mp4" })).toEqual({
      success: true,
      data: { s3Url: "https://cdn.example.test/a.mp4" },
    });
  });

  it("returns a readable error on failure", () => {
    const result = safeParse(MediaFileSchema, { s3Url: 42 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain("s3Url");
    }
  });
});
