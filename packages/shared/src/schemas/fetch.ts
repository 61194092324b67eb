import dayjs from "dayjs";
import { z } from "zod";
import { DEFAULT_PAST_DAYS, MAX_PAST_DAYS } from "../constants.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

// dayjs rolls 2025-02-30 over to March; only a day that formats back to itself exists
function isCalendarDay(day: string): boolean {
  const parsed = dayjs(day);
  return parsed.isValid() && parsed.format("YYYY-MM-DD") === day;
}

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE, "Expected an ISO date (YYYY-MM-DD)")
  .refine((value) => isCalendarDay(value.slice(0, 10)), "Invalid calendar date");

export const credentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

// days below 1 are clamped when the range is computed, not rejected
export const fetchRequestSchema = credentialsSchema.extend({
  days: z.number().int().max(MAX_PAST_DAYS).default(DEFAULT_PAST_DAYS),
  start: isoDateSchema.optional(),
  end: isoDateSchema.optional(),
});
