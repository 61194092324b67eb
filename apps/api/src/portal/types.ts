/**
 * Port between the bridge and the school portal.
 *
 * Records crossing this boundary are already extracted into fixed shapes by the connector;
 * the normalizers never probe for optional fields themselves.
 */

import type { Credentials, DateRange } from "@repo/shared";
import type { Dayjs } from "dayjs";

/** Date-like values a connector may hand over; normalizers render them as YYYY-MM-DD. */
export type DateLike = Date | Dayjs | string;

export interface RawSubject {
  name: string;
  code: string | null;
}

export interface RawGrade {
  date: DateLike | null;
  subject: RawSubject;
  grade: string | number | null;
  outOf: string | number | null;
  coefficient: string | number | null;
  comment: string | null;
}

export interface RawPeriod {
  name: string;
  grades: RawGrade[];
}

export interface RawLesson {
  start: Date;
  end: Date;
  subject: RawSubject | null;
  classroom: string | null;
  canceled: boolean;
  content: { title: string | null; description: string | null } | null;
}

export interface RawHomework {
  id: string | null;
  subject: RawSubject | null;
  givenDate: DateLike | null;
  dueDate: DateLike | null;
  title: string | null;
  description: string | null;
  done: boolean;
}

/** Per-call deadline and cancellation, passed explicitly on every upstream call. */
export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs: number;
}

export interface LessonQueryOptions extends CallOptions {
  includeContent: boolean;
}

/**
 * An authenticated, request-scoped portal connection. Owned by one request and closed
 * when that request ends.
 */
export interface RemoteSession {
  /** False when two calls may not be in flight at once (e.g. sequenced request counters). */
  readonly supportsConcurrentReads: boolean;
  periods(options: CallOptions): Promise<RawPeriod[]>;
  lessons(range: DateRange, options: LessonQueryOptions): Promise<RawLesson[]>;
  homework(range: DateRange, options: CallOptions): Promise<RawHomework[]>;
  close(): Promise<void>;
}

export interface PortalConnector {
  /** Human-readable location echoed in meta.school_url */
  readonly schoolUrl: string;
  /**
   * Perform the login handshake. Rejects with InvalidCredentialsError when the portal refuses
   * the credentials; any other rejection is an upstream fault.
   */
  login(credentials: Credentials, options: CallOptions): Promise<RemoteSession>;
}

export class InvalidCredentialsError extends Error {
  constructor(message = "invalid_credentials") {
    super(message);
    this.name = "InvalidCredentialsError";
  }
}

export class PortalVersionError extends Error {
  constructor(expected: string, actual: string | null) {
    super(`portal_version_mismatch: expected ${expected}, got ${actual ?? "unknown"}`);
    this.name = "PortalVersionError";
  }
}
