import type { Credentials, FetchRequest, ProbeLoginResponse, ResponseEnvelope } from "@repo/shared";
import dayjs, { type Dayjs } from "dayjs";
import type { AppConfig } from "../config.js";
import { aggregate } from "../fanout/aggregator.js";
import type { WorkerPool } from "../fanout/pool.js";
import { buildTaskSpecs } from "../fanout/tasks.js";
import { describeFault, logger } from "../logger.js";
import type { PortalConnector, RemoteSession } from "../portal/types.js";
import {
  type AcquisitionError,
  type AcquisitionErrorKind,
  acquireSession,
} from "../session/acquire.js";
import { computeRanges } from "./ranges.js";

export interface FacadeDeps {
  config: AppConfig;
  connector: PortalConnector;
  pool: WorkerPool;
  today?: () => Dayjs;
}

export type FailureStatus = 401 | 502 | 504;

export interface FacadeFailure {
  ok: false;
  status: FailureStatus;
  error: string;
}

export type FetchOutcome = { ok: true; envelope: ResponseEnvelope } | FacadeFailure;
export type ProbeOutcome = { ok: true; body: ProbeLoginResponse } | FacadeFailure;

// A login timeout is a clean 504: the envelope is only built once a session exists
const STATUS_BY_KIND: Record<AcquisitionErrorKind, FailureStatus> = {
  unauthorized: 401,
  timeout: 504,
  upstream: 502,
};

function toFailure(error: AcquisitionError): FacadeFailure {
  return { ok: false, status: STATUS_BY_KIND[error.kind], error: error.message };
}

async function release(session: RemoteSession): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    logger.warn("Failed to close portal session", { error: describeFault(error) });
  }
}

/** Log in, fan out the four queries, and release the session whatever happened. */
export async function fetchPortalData(
  request: FetchRequest,
  deps: FacadeDeps,
): Promise<FetchOutcome> {
  const { config, connector, pool } = deps;
  const ranges = computeRanges(request, deps.today?.() ?? dayjs());

  const credentials = { username: request.username, password: request.password };
  const acquired = await acquireSession(connector, credentials, config.loginTimeoutMs, pool);
  if (!acquired.ok) return toFailure(acquired.error);

  try {
    const envelope = await aggregate(acquired.session, buildTaskSpecs(ranges, config), {
      pool,
      schoolUrl: connector.schoolUrl,
      rangePast: ranges.past,
      rangeNext7: ranges.next7,
      includeContent: config.includeContent,
    });
    return { ok: true, envelope };
  } finally {
    await release(acquired.session);
  }
}

/** Login-only diagnostic; mock mode answers without touching the portal. */
export async function probeLogin(
  credentials: Credentials,
  deps: FacadeDeps,
): Promise<ProbeOutcome> {
  if (deps.config.mock) return { ok: true, body: { ok: true, mode: "MOCK" } };

  const acquired = await acquireSession(
    deps.connector,
    credentials,
    deps.config.loginTimeoutMs,
    deps.pool,
  );
  if (!acquired.ok) return toFailure(acquired.error);

  await release(acquired.session);
  return { ok: true, body: { ok: true, logged_in: true } };
}
