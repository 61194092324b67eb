import {
  type DateRange,
  type ResponseEnvelope,
  TASK_NAMES,
  type TaskName,
  type TaskPayloads,
  type TaskStatus,
  type TaskTiming,
} from "@repo/shared";
import { SpanStatusCode } from "@opentelemetry/api";
import { tracer } from "../instrumentation.js";
import { logger } from "../logger.js";
import { serializeSession } from "../portal/serialize.js";
import type { RemoteSession } from "../portal/types.js";
import type { WorkerPool } from "./pool.js";
import { runTimeBoxed, type TaskOutcome } from "./runner.js";

export interface TaskSpec<K extends TaskName = TaskName> {
  readonly name: K;
  readonly deadlineMs: number;
  readonly work: (session: RemoteSession, signal: AbortSignal) => Promise<TaskPayloads[K]>;
}

/** One spec per task name, each carrying the payload type of its own name. */
export type AnyTaskSpec = { [K in TaskName]: TaskSpec<K> }[TaskName];

export interface EnvelopeContext {
  pool: WorkerPool;
  schoolUrl: string;
  rangePast: DateRange;
  rangeNext7: DateRange;
  includeContent: boolean;
}

const EMPTY_PAYLOADS: { [K in TaskName]: () => TaskPayloads[K] } = {
  notes: () => ({ periods: [] }),
  lessons: () => ({ lessons: [] }),
  lessons_next7: () => ({ lessons: [] }),
  homework_next7: () => ({ homework: [] }),
};

export function emptyPayload<K extends TaskName>(name: K): TaskPayloads[K] {
  return EMPTY_PAYLOADS[name]();
}

const toSeconds = (ms: number) => Math.round(ms) / 1000;

interface Collected {
  data: TaskPayloads;
  status: Record<TaskName, TaskStatus>;
  errors: Partial<Record<TaskName, string>>;
  timing: Partial<Record<TaskName, number>>;
}

async function runSpec<K extends TaskName>(
  spec: TaskSpec<K>,
  session: RemoteSession,
  pool: WorkerPool,
): Promise<{ spec: TaskSpec<K>; outcome: TaskOutcome<TaskPayloads[K]> }> {
  const span = tracer.startSpan("portal.task", {
    attributes: { "task.name": spec.name, "task.deadline_ms": spec.deadlineMs },
  });

  const outcome = await runTimeBoxed((signal) => spec.work(session, signal), spec.deadlineMs, {
    pool,
    label: spec.name,
  });

  span.setAttribute("task.outcome", outcome.kind);
  if (outcome.kind === "timeout") {
    logger.warn("Task timed out", { task: spec.name, deadlineMs: spec.deadlineMs });
  } else if (outcome.kind === "error") {
    span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.error });
    logger.warn("Task failed", { task: spec.name, error: outcome.error });
  }
  span.end();

  return { spec, outcome };
}

function collect<K extends TaskName>(
  into: Collected,
  spec: TaskSpec<K>,
  outcome: TaskOutcome<TaskPayloads[K]>,
): void {
  const { name } = spec;
  into.timing[name] = toSeconds(outcome.elapsedMs);
  into.status[name] = outcome.kind;

  switch (outcome.kind) {
    case "ok":
      into.data[name] = outcome.payload;
      break;
    case "timeout":
      into.data[name] = emptyPayload(name);
      into.errors[name] = `timeout>${toSeconds(outcome.deadlineMs)}s`;
      break;
    case "error":
      into.data[name] = emptyPayload(name);
      into.errors[name] = outcome.error;
      break;
  }
}

/**
 * Run every spec concurrently against one session and fold the outcomes into a response
 * envelope. Individual timeouts and failures degrade to the task's empty payload plus a
 * status and error entry; they never make this call reject.
 *
 * Sessions that cannot serve concurrent reads are serialized before dispatch. Task names
 * must be unique; a name missing from `specs` is reported as an error.
 */
export async function aggregate(
  session: RemoteSession,
  specs: readonly AnyTaskSpec[],
  context: EnvelopeContext,
): Promise<ResponseEnvelope> {
  const names = specs.map((spec) => spec.name);
  if (new Set(names).size !== names.length) {
    throw new Error(`Duplicate task names in fan-out: ${names.join(", ")}`);
  }

  return tracer.startActiveSpan(
    "portal.fanout",
    { attributes: { "fanout.tasks": names.join(",") } },
    async (span): Promise<ResponseEnvelope> => {
      const started = performance.now();
      const shared = serializeSession(session);

      const collected: Collected = {
        data: {
          notes: emptyPayload("notes"),
          lessons: emptyPayload("lessons"),
          lessons_next7: emptyPayload("lessons_next7"),
          homework_next7: emptyPayload("homework_next7"),
        },
        status: {
          notes: "error",
          lessons: "error",
          lessons_next7: "error",
          homework_next7: "error",
        },
        errors: {},
        timing: {},
      };

      for (const name of TASK_NAMES) {
        if (!names.includes(name)) collected.errors[name] = "not_scheduled";
      }

      try {
        const results = await Promise.all(specs.map((spec) => runSpec(spec, shared, context.pool)));
        for (const { spec, outcome } of results) collect(collected, spec, outcome);

        const timing: TaskTiming = {
          ...collected.timing,
          total_s: toSeconds(performance.now() - started),
        };
        logger.info("Fan-out finished", { status: collected.status, total_s: timing.total_s });

        return {
          ...collected.data,
          meta: {
            school_url: context.schoolUrl,
            range_past: context.rangePast,
            range_next7: context.rangeNext7,
            status: collected.status,
            errors: collected.errors,
            timing,
            include_content: context.includeContent,
          },
        };
      } finally {
        span.end();
      }
    },
  );
}
