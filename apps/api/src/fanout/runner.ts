import { describeFault, logger } from "../logger.js";
import type { WorkerPool } from "./pool.js";

export type TaskOutcome<T> =
  | { kind: "ok"; payload: T; elapsedMs: number }
  | { kind: "timeout"; deadlineMs: number; elapsedMs: number }
  | { kind: "error"; error: string; cause: unknown; elapsedMs: number };

/** Abort reason handed to work whose deadline passed. */
export class DeadlineExceededError extends Error {
  readonly deadlineMs: number;

  constructor(deadlineMs: number) {
    super(`deadline of ${deadlineMs}ms exceeded`);
    this.name = "DeadlineExceededError";
    this.deadlineMs = deadlineMs;
  }
}

export interface RunOptions<T> {
  pool: WorkerPool;
  /** Used in log lines only */
  label?: string;
  /** Receives the result of work that succeeds after its deadline, e.g. to release it. */
  onLateSuccess?: (payload: T) => void;
}

type Settled<T> = { ok: true; payload: T } | { ok: false; error: unknown };

/**
 * Run `work` in the pool and race it against `deadlineMs`.
 *
 * Resolves with exactly one outcome and never rejects. On timeout the work's signal is
 * aborted and its eventual result is dropped; a timed-out outcome reports the deadline as
 * its elapsed time. Work still queued in the pool when its deadline passes never starts.
 */
export async function runTimeBoxed<T>(
  work: (signal: AbortSignal) => Promise<T>,
  deadlineMs: number,
  options: RunOptions<T>,
): Promise<TaskOutcome<T>> {
  const started = performance.now();
  const controller = new AbortController();
  const label = options.label ?? "task";

  const settled: Promise<Settled<T>> = options.pool
    .run(() => {
      controller.signal.throwIfAborted();
      return work(controller.signal);
    })
    .then(
      (payload): Settled<T> => ({ ok: true, payload }),
      (error: unknown): Settled<T> => ({ ok: false, error }),
    );

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<"expired">((resolve) => {
    timer = setTimeout(() => resolve("expired"), deadlineMs);
  });

  try {
    const winner = await Promise.race([settled, expired]);

    if (winner === "expired") {
      controller.abort(new DeadlineExceededError(deadlineMs));
      void settled.then((late) => {
        if (late.ok) {
          try {
            options.onLateSuccess?.(late.payload);
          } catch (error) {
            logger.warn("Late-result handler failed", { task: label, error: describeFault(error) });
          }
        }
        logger.debug("Abandoned task settled after its deadline", {
          task: label,
          deadlineMs,
          outcome: late.ok ? "ok" : describeFault(late.error),
        });
      });
      return { kind: "timeout", deadlineMs, elapsedMs: deadlineMs };
    }

    const elapsedMs = performance.now() - started;
    if (winner.ok) return { kind: "ok", payload: winner.payload, elapsedMs };
    return { kind: "error", error: describeFault(winner.error), cause: winner.error, elapsedMs };
  } finally {
    clearTimeout(timer);
  }
}
