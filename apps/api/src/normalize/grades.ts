import type { Grade, NotesPayload } from "@repo/shared";
import type { RawGrade, RawPeriod } from "../portal/types.js";
import { dateSortKey, formatDate, safeFloat } from "./values.js";

export function normalizeGrade(grade: RawGrade): Grade {
  const { name, code } = grade.subject;
  return {
    date: formatDate(grade.date),
    subjectId: code || name,
    subjectLabel: name,
    value: safeFloat(grade.grade),
    outOf: safeFloat(grade.outOf),
    coefficient: safeFloat(grade.coefficient),
    comment: grade.comment,
  };
}

// Undated grades come first
const gradeOrder = (grade: RawGrade) => dateSortKey(grade.date) ?? Number.NEGATIVE_INFINITY;

export function buildNotes(periods: RawPeriod[]): NotesPayload {
  return {
    periods: periods.map((period) => ({
      name: period.name,
      grades: [...period.grades]
        .sort((a, b) => {
          const left = gradeOrder(a);
          const right = gradeOrder(b);
          return left === right ? 0 : left - right;
        })
        .map(normalizeGrade),
    })),
  };
}
