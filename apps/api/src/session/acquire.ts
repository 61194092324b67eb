import type { Credentials } from "@repo/shared";
import { SpanStatusCode } from "@opentelemetry/api";
import type { WorkerPool } from "../fanout/pool.js";
import { runTimeBoxed } from "../fanout/runner.js";
import { tracer } from "../instrumentation.js";
import { describeFault, logger } from "../logger.js";
import {
  InvalidCredentialsError,
  type PortalConnector,
  type RemoteSession,
} from "../portal/types.js";

export type AcquisitionErrorKind = "timeout" | "unauthorized" | "upstream";

export class AcquisitionError extends Error {
  readonly kind: AcquisitionErrorKind;

  constructor(kind: AcquisitionErrorKind, message: string) {
    super(message);
    this.name = "AcquisitionError";
    this.kind = kind;
  }
}

export type AcquireResult =
  | { ok: true; session: RemoteSession }
  | { ok: false; error: AcquisitionError };

function releaseLateSession(session: RemoteSession): void {
  session.close().catch((error: unknown) => {
    logger.warn("Failed to close session from abandoned login", { error: describeFault(error) });
  });
}

/**
 * Log in under `deadlineMs`. Either a usable session or a typed error comes back; a login
 * that outlives the deadline is aborted and, should it still succeed, closed.
 */
export async function acquireSession(
  connector: PortalConnector,
  credentials: Credentials,
  deadlineMs: number,
  pool: WorkerPool,
): Promise<AcquireResult> {
  return tracer.startActiveSpan("portal.login", async (span): Promise<AcquireResult> => {
    const outcome = await runTimeBoxed(
      (signal) => connector.login(credentials, { signal, timeoutMs: deadlineMs }),
      deadlineMs,
      { pool, label: "login", onLateSuccess: releaseLateSession },
    );

    if (outcome.kind === "ok") {
      span.setAttribute("login.outcome", "ok");
      span.end();
      return { ok: true, session: outcome.payload };
    }

    const error =
      outcome.kind === "timeout"
        ? new AcquisitionError("timeout", `login_timeout>${deadlineMs / 1000}s`)
        : outcome.cause instanceof InvalidCredentialsError
          ? new AcquisitionError("unauthorized", "invalid_credentials")
          : new AcquisitionError("upstream", outcome.error);

    span.setAttribute("login.outcome", error.kind);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.end();
    logger.warn("Portal login failed", { kind: error.kind, error: error.message });
    return { ok: false, error };
  });
}
