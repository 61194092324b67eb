export { buildNotes, normalizeGrade } from "./grades.js";
export { buildHomework, normalizeHomework } from "./homework.js";
export { buildLessons, type LessonOptions, normalizeLesson } from "./lessons.js";
export { dateSortKey, formatDate, formatTime, safeFloat } from "./values.js";
