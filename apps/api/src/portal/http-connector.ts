/**
 * Connector for a JSON portal gateway.
 *
 * The gateway speaks plain HTTP+JSON: POST /login returns a bearer token, the data endpoints
 * return lists of records, POST /logout ends the session. Every response is validated with
 * zod and flattened into the Raw* records of ./types.ts, including the alternate field names
 * the gateway uses for homework dates.
 */

import type { Credentials, DateRange } from "@repo/shared";
import dayjs from "dayjs";
import { z } from "zod";
import { describeFault, logger } from "../logger.js";
import {
  type CallOptions,
  InvalidCredentialsError,
  type LessonQueryOptions,
  type PortalConnector,
  PortalVersionError,
  type RawHomework,
  type RawLesson,
  type RawPeriod,
  type RemoteSession,
} from "./types.js";

export class PortalHttpError extends Error {
  readonly status: number;

  constructor(status: number, path: string) {
    super(`${path} answered HTTP ${status}`);
    this.name = "PortalHttpError";
    this.status = status;
  }
}

export class PortalProtocolError extends Error {
  constructor(path: string, issues: z.ZodIssue[]) {
    const first = issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : "unknown";
    super(`unexpected payload from ${path} (${where})`);
    this.name = "PortalProtocolError";
  }
}

export class PortalTimeoutError extends Error {
  constructor(path: string, timeoutMs: number) {
    super(`${path} exceeded ${timeoutMs}ms`);
    this.name = "PortalTimeoutError";
  }
}

// -- Gateway payloads --

const subjectSchema = z
  .object({ name: z.string(), code: z.string().nullish() })
  .transform((s) => ({ name: s.name, code: s.code || null }));

const scalarSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => v ?? null);

const textSchema = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

// Date-only strings are parsed in local time so the calendar day survives formatting
const optionalDateSchema = z
  .string()
  .nullish()
  .transform((v) => (v ? dayjs(v) : null));

const instantSchema = z.string().transform((value, ctx) => {
  const parsed = dayjs(value);
  if (!parsed.isValid()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date-time "${value}"` });
    return z.NEVER;
  }
  return parsed.toDate();
});

const loginResponseSchema = z.object({
  token: z.string().optional(),
  loggedIn: z.boolean().default(true),
  version: z.string().nullish(),
  concurrentReads: z.boolean().default(false),
});

const periodsResponseSchema = z.object({
  periods: z.array(
    z.object({
      name: z.string(),
      grades: z.array(
        z.object({
          date: optionalDateSchema,
          subject: subjectSchema,
          grade: scalarSchema,
          outOf: scalarSchema,
          coefficient: scalarSchema,
          comment: textSchema,
        }),
      ),
    }),
  ),
});

const lessonsResponseSchema = z.object({
  lessons: z.array(
    z
      .object({
        start: instantSchema,
        end: instantSchema,
        subject: subjectSchema.nullish(),
        classroom: textSchema,
        canceled: z.boolean().default(false),
        content: z
          .object({ title: textSchema, description: textSchema })
          .nullish(),
      })
      .transform(
        (l): RawLesson => ({
          start: l.start,
          end: l.end,
          subject: l.subject ?? null,
          classroom: l.classroom,
          canceled: l.canceled,
          content: l.content ?? null,
        }),
      ),
  ),
});

const homeworkResponseSchema = z.object({
  homework: z.array(
    z
      .object({
        id: z.union([z.string(), z.number()]).nullish(),
        subject: subjectSchema.nullish(),
        date: optionalDateSchema,
        assignedDate: optionalDateSchema,
        givenDate: optionalDateSchema,
        dueDate: optionalDateSchema,
        forDate: optionalDateSchema,
        title: textSchema,
        description: textSchema,
        done: z.boolean().default(false),
      })
      .transform(
        (h): RawHomework => ({
          id: h.id === null || h.id === undefined || h.id === "" ? null : String(h.id),
          subject: h.subject ?? null,
          givenDate: h.date ?? h.assignedDate ?? h.givenDate,
          dueDate: h.dueDate ?? h.forDate,
          title: h.title,
          description: h.description,
          done: h.done,
        }),
      ),
  ),
});

// -- Transport --

/** Abort after timeoutMs, or as soon as the caller's signal aborts. */
function callSignal(path: string, options: CallOptions) {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new PortalTimeoutError(path, options.timeoutMs)),
    options.timeoutMs,
  );
  const parent = options.signal;
  const onAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) onAbort();
  else parent?.addEventListener("abort", onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onAbort);
    },
  };
}

interface GatewayRequest {
  method?: "GET" | "POST";
  token?: string;
  body?: unknown;
}

async function callGateway<S extends z.ZodTypeAny>(
  baseUrl: string,
  path: string,
  schema: S,
  request: GatewayRequest,
  options: CallOptions,
): Promise<z.output<S>> {
  const { signal, dispose } = callSignal(path, options);
  const headers: Record<string, string> = { Accept: "application/json" };
  if (request.body !== undefined) headers["Content-Type"] = "application/json";
  if (request.token) headers.Authorization = `Bearer ${request.token}`;

  try {
    const res = await fetch(`${baseUrl}${path}`, {
      method: request.method ?? "GET",
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal,
    });

    if (!res.ok) throw new PortalHttpError(res.status, path.split("?")[0] ?? path);

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) throw new PortalProtocolError(path, parsed.error.issues);
    return parsed.data;
  } finally {
    dispose();
  }
}

class HttpPortalSession implements RemoteSession {
  constructor(
    private readonly baseUrl: string,
    private readonly token: string,
    readonly supportsConcurrentReads: boolean,
    private readonly closeTimeoutMs: number,
  ) {}

  async periods(options: CallOptions): Promise<RawPeriod[]> {
    const { periods } = await callGateway(
      this.baseUrl,
      "/periods",
      periodsResponseSchema,
      { token: this.token },
      options,
    );
    return periods;
  }

  async lessons(range: DateRange, options: LessonQueryOptions): Promise<RawLesson[]> {
    const query = new URLSearchParams({
      start: range.start,
      end: range.end,
      content: options.includeContent ? "1" : "0",
    });
    const { lessons } = await callGateway(
      this.baseUrl,
      `/lessons?${query.toString()}`,
      lessonsResponseSchema,
      { token: this.token },
      options,
    );
    return lessons;
  }

  async homework(range: DateRange, options: CallOptions): Promise<RawHomework[]> {
    const query = new URLSearchParams({ start: range.start, end: range.end });
    const { homework } = await callGateway(
      this.baseUrl,
      `/homework?${query.toString()}`,
      homeworkResponseSchema,
      { token: this.token },
      options,
    );
    return homework;
  }

  async close(): Promise<void> {
    const { signal, dispose } = callSignal("/logout", { timeoutMs: this.closeTimeoutMs });
    try {
      const res = await fetch(`${this.baseUrl}/logout`, {
        method: "POST",
        headers: { Authorization: `Bearer ${this.token}` },
        signal,
      });
      if (!res.ok) throw new PortalHttpError(res.status, "/logout");
    } finally {
      dispose();
    }
  }
}

export interface HttpPortalConnectorOptions {
  baseUrl: string;
  /** Per upstream HTTP call; the caller's own deadline still applies on top. */
  httpTimeoutMs: number;
  expectedVersion?: string | null;
}

export class HttpPortalConnector implements PortalConnector {
  readonly schoolUrl: string;
  private readonly baseUrl: string;

  constructor(private readonly options: HttpPortalConnectorOptions) {
    this.schoolUrl = options.baseUrl;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async login(credentials: Credentials, options: CallOptions): Promise<RemoteSession> {
    const callOptions: CallOptions = {
      signal: options.signal,
      timeoutMs: Math.min(options.timeoutMs, this.options.httpTimeoutMs),
    };

    let response: z.output<typeof loginResponseSchema>;
    try {
      response = await callGateway(
        this.baseUrl,
        "/login",
        loginResponseSchema,
        { method: "POST", body: credentials },
        callOptions,
      );
    } catch (error) {
      if (error instanceof PortalHttpError && (error.status === 401 || error.status === 403)) {
        throw new InvalidCredentialsError();
      }
      throw error;
    }

    if (!response.token) throw new InvalidCredentialsError();

    const session = new HttpPortalSession(
      this.baseUrl,
      response.token,
      response.concurrentReads,
      this.options.httpTimeoutMs,
    );

    const expected = this.options.expectedVersion;
    if (!response.loggedIn) {
      await this.discard(session);
      throw new InvalidCredentialsError();
    }
    if (expected && response.version !== expected) {
      await this.discard(session);
      throw new PortalVersionError(expected, response.version ?? null);
    }

    return session;
  }

  // A token was issued but the session is rejected; log out before reporting the failure.
  private async discard(session: HttpPortalSession): Promise<void> {
    await session.close().catch((error: unknown) => {
      logger.warn("Failed to log out a rejected portal session", { error: describeFault(error) });
    });
  }
}

