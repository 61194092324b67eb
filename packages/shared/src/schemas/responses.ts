import { z } from "zod";

const dateRangeSchema = z.object({ start: z.string(), end: z.string() });
const statusSchema = z.enum(["ok", "timeout", "error"]);
const subjectFields = { subjectId: z.string(), subjectLabel: z.string() };

export const gradeResponseSchema = z.object({
  date: z.string().nullable(),
  ...subjectFields,
  value: z.number().nullable(),
  outOf: z.number().nullable(),
  coefficient: z.number().nullable(),
  comment: z.string().nullable(),
});

export const lessonResponseSchema = z.object({
  date: z.string(),
  start: z.string(),
  end: z.string(),
  ...subjectFields,
  room: z.string().nullable(),
  canceled: z.boolean(),
  content: z
    .object({ title: z.string().nullable(), description: z.string().nullable() })
    .optional(),
});

export const homeworkResponseSchema = z.object({
  id: z.string(),
  given: z.string().nullable(),
  due: z.string().nullable(),
  ...subjectFields,
  title: z.string().nullable(),
  description: z.string().nullable(),
  done: z.boolean(),
});

export const envelopeResponseSchema = z.object({
  notes: z.object({
    periods: z.array(z.object({ name: z.string(), grades: z.array(gradeResponseSchema) })),
  }),
  lessons: z.object({ lessons: z.array(lessonResponseSchema) }),
  lessons_next7: z.object({ lessons: z.array(lessonResponseSchema) }),
  homework_next7: z.object({ homework: z.array(homeworkResponseSchema) }),
  meta: z.object({
    school_url: z.string(),
    range_past: dateRangeSchema,
    range_next7: dateRangeSchema,
    status: z.object({
      notes: statusSchema,
      lessons: statusSchema,
      lessons_next7: statusSchema,
      homework_next7: statusSchema,
    }),
    errors: z.record(z.string()),
    timing: z.record(z.number()),
    include_content: z.boolean(),
  }),
});

export const errorResponseSchema = z.object({
  error: z.union([z.string(), z.record(z.unknown())]),
});

export const pingResponseSchema = z.object({
  ok: z.literal(true),
  mode: z.enum(["MOCK", "REAL"]),
  include_content: z.boolean(),
});

export const probeLoginResponseSchema = z.union([
  z.object({ ok: z.literal(true), mode: z.literal("MOCK") }),
  z.object({ ok: z.literal(true), logged_in: z.literal(true) }),
]);
