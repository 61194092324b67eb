import type { TASK_NAMES } from "../constants.js";
import type { HomeworkPayload, LessonsPayload, NotesPayload } from "./records.js";

export type TaskName = (typeof TASK_NAMES)[number];

export type TaskStatus = "ok" | "timeout" | "error";

/** Payload type carried by each task of the fixed fan-out set. */
export interface TaskPayloads {
  notes: NotesPayload;
  lessons: LessonsPayload;
  lessons_next7: LessonsPayload;
  homework_next7: HomeworkPayload;
}

export interface DateRange {
  start: string;
  end: string;
}

export type TaskTiming = Partial<Record<TaskName, number>> & { total_s: number };

export interface EnvelopeMeta {
  school_url: string;
  range_past: DateRange;
  range_next7: DateRange;
  status: Record<TaskName, TaskStatus>;
  errors: Partial<Record<TaskName, string>>;
  timing: TaskTiming;
  include_content: boolean;
}

export type ResponseEnvelope = TaskPayloads & { meta: EnvelopeMeta };

export type PortalMode = "MOCK" | "REAL";

export interface PingResponse {
  ok: true;
  mode: PortalMode;
  include_content: boolean;
}

export type ProbeLoginResponse =
  | { ok: true; mode: "MOCK" }
  | { ok: true; logged_in: true };
