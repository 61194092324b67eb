import type { Lesson, LessonsPayload } from "@repo/shared";
import type { RawLesson, RawSubject } from "../portal/types.js";
import { formatDate, formatTime } from "./values.js";

const UNKNOWN_SUBJECT: RawSubject = { name: "?", code: null };

export interface LessonOptions {
  /** Attach content{title, description}; only requested when the portal was asked for it. */
  includeContent: boolean;
}

export function normalizeLesson(lesson: RawLesson, options: LessonOptions): Lesson {
  const { name, code } = lesson.subject ?? UNKNOWN_SUBJECT;
  const item: Lesson = {
    date: formatDate(lesson.start) ?? "",
    start: formatTime(lesson.start),
    end: formatTime(lesson.end),
    subjectId: code || name,
    subjectLabel: name,
    room: lesson.classroom || null,
    canceled: lesson.canceled,
  };

  if (options.includeContent) {
    item.content = {
      title: lesson.content?.title ?? null,
      description: lesson.content?.description ?? null,
    };
  }

  return item;
}

export function buildLessons(lessons: RawLesson[], options: LessonOptions): LessonsPayload {
  const ordered = [...lessons].sort(
    (a, b) => a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime(),
  );
  return { lessons: ordered.map((lesson) => normalizeLesson(lesson, options)) };
}
