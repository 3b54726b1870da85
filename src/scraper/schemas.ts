/**
 * Zod schemas for the platform's JSON API responses.
 * These provide runtime validation and type inference.
 *
 * Fields the pipeline does not need are left out (zod strips them), and most
 * fields are optional: the API is undocumented and drifts between releases.
 */

import { z } from "zod";

// ============================================================================
// Syllabus API  (GET /section/{id}/syllabus)
// ============================================================================

export const SYLLABUS_LESSON_TYPE = "SyllabusLessonType";

export const SyllabusLessonSchema = z.object({
  type: z.literal(SYLLABUS_LESSON_TYPE),
  lesson: z.object({
    lesson: z.object({
      id: z.string().min(1),
      name: z.string().nullable().optional(),
      createdAt: z.string().nullable().optional(),
      timing: z
        .object({
          start: z.string().nullable().optional(),
        })
        .nullable()
        .optional(),
    }),
    isPast: z.boolean().optional(),
    hasContent: z.boolean().optional(),
    hasVideo: z.boolean().optional(),
    startTimeUTC: z.string().nullable().optional(),
    medias: z.array(z.unknown()).nullable().optional(),
  }),
});

// Entries are validated one by one so a single odd entry does not void the list
export const SyllabusResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  data: z.array(z.object({ type: z.string().optional() }).loose()),
});

// ============================================================================
// Lesson Media API  (GET /lesson/{id}/media)
// ============================================================================

export const MediaFileSchema = z.object({
  s3Url: z.string().min(1),
  width: z.number().optional(),
  height: z.number().optional(),
  size: z.number().optional(),
});

export type MediaFile = z.infer<typeof MediaFileSchema>;

export const LessonMediaSchema = z.object({
  userSection: z
    .object({
      sectionNumber: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
  video: z
    .object({
      media: z
        .object({
          status: z.string().optional(),
          name: z.string().nullable().optional(),
          createdAt: z.string().nullable().optional(),
          media: z
            .object({
              current: z
                .object({
                  mediaId: z.string().optional(),
                  primaryFiles: z.array(MediaFileSchema).nullable().optional(),
                  secondaryFiles: z.array(MediaFileSchema).nullable().optional(),
                })
                .optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .nullable()
    .optional(),
});

export const LessonMediaResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  data: z.array(LessonMediaSchema),
});

// ============================================================================
// Helper: Safe parse with a readable error
// ============================================================================

/**
 * Safely parses data with a Zod schema.
 * Returns the parsed data, or the flattened validation error as a string.
 */
export function safeParse<T>(
  schema: z.ZodType<T>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: z.prettifyError(result.error) };
}
