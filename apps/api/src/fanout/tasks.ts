import type { DateRange, TaskName } from "@repo/shared";
import { buildHomework, buildLessons, buildNotes } from "../normalize/index.js";
import type { AnyTaskSpec } from "./aggregator.js";

export interface TaskSettings {
  taskDeadlinesMs: Record<TaskName, number>;
  /** Per upstream call, independent of the task deadline */
  httpTimeoutMs: number;
  includeContent: boolean;
}

/**
 * The fixed fan-out for one fetch request: grades, lessons over the past range, and
 * lessons plus homework over the next seven days.
 */
export function buildTaskSpecs(
  ranges: { past: DateRange; next7: DateRange },
  settings: TaskSettings,
): AnyTaskSpec[] {
  const { taskDeadlinesMs: deadlines, httpTimeoutMs: timeoutMs, includeContent } = settings;
  const lessonOptions = { includeContent };

  return [
    {
      name: "notes",
      deadlineMs: deadlines.notes,
      work: async (session, signal) => buildNotes(await session.periods({ signal, timeoutMs })),
    },
    {
      name: "lessons",
      deadlineMs: deadlines.lessons,
      work: async (session, signal) =>
        buildLessons(
          await session.lessons(ranges.past, { signal, timeoutMs, includeContent }),
          lessonOptions,
        ),
    },
    {
      name: "lessons_next7",
      deadlineMs: deadlines.lessons_next7,
      work: async (session, signal) =>
        buildLessons(
          await session.lessons(ranges.next7, { signal, timeoutMs, includeContent }),
          lessonOptions,
        ),
    },
    {
      name: "homework_next7",
      deadlineMs: deadlines.homework_next7,
      work: async (session, signal) =>
        buildHomework(await session.homework(ranges.next7, { signal, timeoutMs })),
    },
  ];
}
