import { NO_VALUE_MARKERS } from "@repo/shared";
import dayjs from "dayjs";

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse a portal numeric field. Accepts numbers and numeric strings with either decimal
 * separator ("15,5" → 15.5); markers such as "abs" or "n/a", empty strings and anything
 * unparsable yield null.
 */
export function safeFloat(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const text = value.trim().replaceAll(",", ".");
  if (text === "" || NO_VALUE_MARKERS.has(text.toLowerCase())) return null;
  if (!DECIMAL.test(text)) return null;

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Render a date or date-time as YYYY-MM-DD; other values keep their string form. */
export function formatDate(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date || dayjs.isDayjs(value)) {
    const parsed = dayjs(value);
    return parsed.isValid() ? parsed.format("YYYY-MM-DD") : null;
  }
  return String(value);
}

export function formatTime(value: Date): string {
  return dayjs(value).format("HH:mm");
}

/** Sort key for date-like values; null when the value carries no usable date. */
export function dateSortKey(value: unknown): number | null {
  if (value === null || value === undefined || value === "") return null;
  if (value instanceof Date || dayjs.isDayjs(value) || typeof value === "string") {
    const parsed = dayjs(value);
    return parsed.isValid() ? parsed.valueOf() : null;
  }
  return null;
}
