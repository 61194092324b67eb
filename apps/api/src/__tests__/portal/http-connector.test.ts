import { afterEach, describe, expect, test, vi } from "vitest";
import { logger } from "../../logger.js";
import {
  HttpPortalConnector,
  PortalHttpError,
  PortalProtocolError,
  PortalTimeoutError,
} from "../../portal/http-connector.js";
import { InvalidCredentialsError, PortalVersionError } from "../../portal/types.js";

vi.mock("../../logger.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../logger.js")>()),
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const BASE_URL = "https://gateway.test/portal/";
const credentials = { username: "student", password: "test-password" };

type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Route fetch calls by "METHOD /path" (query string excluded) and record them. */
function stubGateway(routes: Record<string, Route>) {
  const calls: { method: string; url: string; init: RequestInit | undefined }[] = [];
  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const url = new URL(String(input));
    const method = init?.method ?? "GET";
    calls.push({ method, url: url.toString(), init });
    const route = routes[`${method} ${url.pathname}`];
    if (!route) return json({ error: "not found" }, 404);
    return route(init);
  });
  return calls;
}

function connector(expectedVersion: string | null = null) {
  return new HttpPortalConnector({ baseUrl: BASE_URL, httpTimeoutMs: 1000, expectedVersion });
}

const loggedIn: Route = () => json({ token: "test-token", version: "2.1" });

afterEach(() => {
  vi.restoreAllMocks();
});

describe("HttpPortalConnector.login", () => {
  test("posts the credentials and returns a session", async () => {
    const calls = stubGateway({ "POST /portal/login": loggedIn });

    const session = await connector().login(credentials, { timeoutMs: 1000 });

    expect(session.supportsConcurrentReads).toBe(false);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe("https://gateway.test/portal/login");
    expect(JSON.parse(String(calls[0]?.init?.body))).toEqual(credentials);
  });

  test("honors the gateway's concurrent-read flag", async () => {
    stubGateway({
      "POST /portal/login": () => json({ token: "test-token", concurrentReads: true }),
    });
    const session = await connector().login(credentials, { timeoutMs: 1000 });
    expect(session.supportsConcurrentReads).toBe(true);
  });

  test("maps HTTP 401 to InvalidCredentialsError", async () => {
    stubGateway({ "POST /portal/login": () => json({ error: "nope" }, 401) });
    await expect(connector().login(credentials, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
  });

  test("maps loggedIn: false to InvalidCredentialsError", async () => {
    stubGateway({ "POST /portal/login": () => json({ loggedIn: false }) });
    await expect(connector().login(credentials, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
  });

  test("surfaces other HTTP errors as PortalHttpError", async () => {
    stubGateway({ "POST /portal/login": () => json({}, 503) });
    await expect(connector().login(credentials, { timeoutMs: 1000 })).rejects.toThrow(
      new PortalHttpError(503, "/login"),
    );
  });

  test("rejects a gateway reporting an unexpected version", async () => {
    stubGateway({ "POST /portal/login": loggedIn });
    await expect(connector("3.0").login(credentials, { timeoutMs: 1000 })).rejects.toThrow(
      new PortalVersionError("3.0", "2.1"),
    );
  });

  test("accepts the pinned version", async () => {
    stubGateway({ "POST /portal/login": loggedIn });
    await expect(connector("2.1").login(credentials, { timeoutMs: 1000 })).resolves.toBeDefined();
  });
});

describe("HttpPortalConnector rejected sessions", () => {
  test("logs out when the pinned version does not match", async () => {
    const calls = stubGateway({
      "POST /portal/login": () => json({ token: "test-token", version: "1.9" }),
      "POST /portal/logout": () => new Response(null, { status: 204 }),
    });

    await expect(connector("2.1").login(credentials, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      PortalVersionError,
    );
    expect(calls.map((call) => `${call.method} ${new URL(call.url).pathname}`)).toEqual([
      "POST /portal/login",
      "POST /portal/logout",
    ]);
  });

  test("logs out when a token comes back with loggedIn: false", async () => {
    const calls = stubGateway({
      "POST /portal/login": () => json({ token: "test-token", loggedIn: false }),
      "POST /portal/logout": () => new Response(null, { status: 204 }),
    });

    await expect(connector().login(credentials, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
    expect(calls.map((call) => call.method)).toEqual(["POST", "POST"]);
    expect(calls[1]?.url).toBe("https://gateway.test/portal/logout");
  });

  test("still reports the version mismatch when logout fails", async () => {
    stubGateway({
      "POST /portal/login": () => json({ token: "test-token", version: "1.9" }),
      "POST /portal/logout": () => json({ error: "boom" }, 500),
    });

    await expect(connector("2.1").login(credentials, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      PortalVersionError,
    );
    expect(logger.warn).toHaveBeenCalledWith("Failed to log out a rejected portal session", {
      error: "PortalHttpError: /logout answered HTTP 500",
    });
  });
});

describe("HttpPortalSession", () => {
  const range = { start: "2025-09-15", end: "2025-09-22" };

  test("extracts periods and grades", async () => {
    stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/periods": () =>
        json({
          periods: [
            {
              name: "Trimester 1",
              grades: [
                {
                  date: "2025-09-12",
                  subject: { name: "Mathematics" },
                  grade: "15,5",
                  outOf: 20,
                  coefficient: null,
                },
              ],
            },
          ],
        }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    const [period] = await session.periods({ timeoutMs: 1000 });
    const grade = period?.grades[0];

    expect(period?.name).toBe("Trimester 1");
    expect(grade?.subject).toEqual({ name: "Mathematics", code: null });
    expect(grade?.grade).toBe("15,5");
    expect(grade?.outOf).toBe(20);
    expect(grade?.coefficient).toBeNull();
    expect(grade?.comment).toBeNull();
  });

  test("sends the token and the range with lesson queries", async () => {
    const calls = stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/lessons": () =>
        json({
          lessons: [
            {
              start: "2025-09-15T08:00:00",
              end: "2025-09-15T09:00:00",
              subject: { name: "History", code: "HIST" },
              classroom: "B12",
              content: { title: "WW1" },
            },
          ],
        }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    const lessons = await session.lessons(range, { timeoutMs: 1000, includeContent: true });

    const lessonCall = calls[1];
    expect(lessonCall?.url).toBe(
      "https://gateway.test/portal/lessons?start=2025-09-15&end=2025-09-22&content=1",
    );
    expect(new Headers(lessonCall?.init?.headers).get("Authorization")).toBe("Bearer test-token");
    expect(lessons).toEqual([
      {
        start: new Date(2025, 8, 15, 8, 0),
        end: new Date(2025, 8, 15, 9, 0),
        subject: { name: "History", code: "HIST" },
        classroom: "B12",
        canceled: false,
        content: { title: "WW1", description: null },
      },
    ]);
  });

  test("reads the alternate homework date fields", async () => {
    stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/homework": () =>
        json({
          homework: [
            {
              id: 17,
              subject: { name: "English", code: "ENG" },
              assignedDate: "2025-09-15",
              forDate: "2025-09-18",
              description: "Read chapter 2",
            },
          ],
        }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    const [item] = await session.homework(range, { timeoutMs: 1000 });

    expect(item?.id).toBe("17");
    expect(item?.givenDate?.valueOf()).toBe(new Date(2025, 8, 15).valueOf());
    expect(item?.dueDate?.valueOf()).toBe(new Date(2025, 8, 18).valueOf());
    expect(item?.title).toBeNull();
    expect(item?.done).toBe(false);
  });

  test("rejects payloads that do not match the expected shape", async () => {
    stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/homework": () => json({ homework: [{ done: "yes" }] }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    await expect(session.homework(range, { timeoutMs: 1000 })).rejects.toBeInstanceOf(
      PortalProtocolError,
    );
  });

  test("aborts a call that exceeds its per-call timeout", async () => {
    stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/periods": (init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    await expect(session.periods({ timeoutMs: 20 })).rejects.toThrow(
      new PortalTimeoutError("/periods", 20),
    );
  });

  test("aborts a call when the caller's signal aborts", async () => {
    stubGateway({
      "POST /portal/login": loggedIn,
      "GET /portal/periods": (init) =>
        new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    const controller = new AbortController();
    const pending = session.periods({ timeoutMs: 1000, signal: controller.signal });
    controller.abort(new Error("task deadline"));

    await expect(pending).rejects.toThrow("task deadline");
  });

  test("logs out on close", async () => {
    const calls = stubGateway({
      "POST /portal/login": loggedIn,
      "POST /portal/logout": () => json({ ok: true }),
    });

    const session = await connector().login(credentials, { timeoutMs: 1000 });
    await session.close();

    expect(calls.map((c) => `${c.method} ${c.url}`)).toEqual([
      "POST https://gateway.test/portal/login",
      "POST https://gateway.test/portal/logout",
    ]);
  });
});
