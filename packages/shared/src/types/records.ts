export interface Grade {
  date: string | null;
  subjectId: string;
  subjectLabel: string;
  value: number | null;
  outOf: number | null;
  coefficient: number | null;
  comment: string | null;
}

export interface Period {
  name: string;
  grades: Grade[];
}

export interface LessonContent {
  title: string | null;
  description: string | null;
}

export interface Lesson {
  date: string;
  start: string;
  end: string;
  subjectId: string;
  subjectLabel: string;
  room: string | null;
  canceled: boolean;
  content?: LessonContent;
}

export interface Homework {
  id: string;
  given: string | null;
  due: string | null;
  subjectId: string;
  subjectLabel: string;
  title: string | null;
  description: string | null;
  done: boolean;
}

export interface NotesPayload {
  periods: Period[];
}

export interface LessonsPayload {
  lessons: Lesson[];
}

export interface HomeworkPayload {
  homework: Homework[];
}
