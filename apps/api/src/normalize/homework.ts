import type { Homework, HomeworkPayload } from "@repo/shared";
import type { RawHomework } from "../portal/types.js";
import { dateSortKey, formatDate } from "./values.js";

export function normalizeHomework(item: RawHomework): Homework {
  const subjectLabel = item.subject?.name ?? "?";
  const subjectId = item.subject?.code || subjectLabel;
  const given = formatDate(item.givenDate);

  return {
    id: item.id || `hw_${given ?? "undated"}_${subjectId}`,
    given,
    due: formatDate(item.dueDate),
    subjectId,
    subjectLabel,
    title: item.title || item.description,
    description: item.description,
    done: item.done,
  };
}

// Due date first, then the date it was given; items with neither go last
const homeworkOrder = (item: RawHomework) =>
  dateSortKey(item.dueDate) ?? dateSortKey(item.givenDate) ?? Number.POSITIVE_INFINITY;

export function buildHomework(items: RawHomework[]): HomeworkPayload {
  const ordered = [...items].sort((a, b) => {
    const left = homeworkOrder(a);
    const right = homeworkOrder(b);
    return left === right ? 0 : left - right;
  });
  return { homework: ordered.map(normalizeHomework) };
}
