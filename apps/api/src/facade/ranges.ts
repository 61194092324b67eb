import { type DateRange, type FetchRequest, NEXT_RANGE_DAYS } from "@repo/shared";
import dayjs, { type Dayjs } from "dayjs";

const ISO_DAY = "YYYY-MM-DD";

export interface RequestRanges {
  past: DateRange;
  next7: DateRange;
}

/**
 * The past range is taken verbatim when both bounds are given (start <= end is the
 * caller's concern), otherwise it covers the last `days` days (at least one) up to today.
 * The next-7 range always runs from today to today + 7.
 */
export function computeRanges(
  request: Pick<FetchRequest, "days" | "start" | "end">,
  today: Dayjs = dayjs(),
): RequestRanges {
  const day = today.startOf("day");

  const past: DateRange =
    request.start && request.end
      ? { start: request.start.slice(0, 10), end: request.end.slice(0, 10) }
      : {
          start: day.subtract(Math.max(1, request.days), "day").format(ISO_DAY),
          end: day.format(ISO_DAY),
        };

  return {
    past,
    next7: { start: day.format(ISO_DAY), end: day.add(NEXT_RANGE_DAYS, "day").format(ISO_DAY) },
  };
}
