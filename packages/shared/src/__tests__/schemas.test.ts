import { describe, expect, test } from "vitest";
import { envFlag, envSchema } from "../schemas/config.js";
import { credentialsSchema, fetchRequestSchema, isoDateSchema } from "../schemas/fetch.js";

describe("credentialsSchema", () => {
  test("accepts username and password", () => {
    expect(credentialsSchema.safeParse({ username: "u", password: "p" }).success).toBe(true);
  });

  test("rejects an empty password", () => {
    expect(credentialsSchema.safeParse({ username: "u", password: "" }).success).toBe(false);
  });

  test("rejects a missing username", () => {
    expect(credentialsSchema.safeParse({ password: "p" }).success).toBe(false);
  });
});

describe("fetchRequestSchema", () => {
  test("defaults days to 7", () => {
    const parsed = fetchRequestSchema.parse({ username: "u", password: "p" });
    expect(parsed.days).toBe(7);
    expect(parsed.start).toBeUndefined();
  });

  test("keeps non-positive days for clamping later", () => {
    expect(fetchRequestSchema.parse({ username: "u", password: "p", days: 0 }).days).toBe(0);
  });

  test("accepts the longest past range", () => {
    expect(fetchRequestSchema.parse({ username: "u", password: "p", days: 3650 }).days).toBe(3650);
  });

  test("rejects days beyond the longest past range", () => {
    expect(fetchRequestSchema.safeParse({ username: "u", password: "p", days: 3651 }).success).toBe(
      false,
    );
    expect(
      fetchRequestSchema.safeParse({ username: "u", password: "p", days: 1_000_000_000 }).success,
    ).toBe(false);
  });

  test("rejects fractional days", () => {
    expect(fetchRequestSchema.safeParse({ username: "u", password: "p", days: 1.5 }).success).toBe(
      false,
    );
  });

  test("accepts an explicit range", () => {
    const parsed = fetchRequestSchema.parse({
      username: "u",
      password: "p",
      start: "2025-09-01",
      end: "2025-09-10",
    });
    expect(parsed.start).toBe("2025-09-01");
    expect(parsed.end).toBe("2025-09-10");
  });
});

describe("isoDateSchema", () => {
  test("accepts a plain date", () => {
    expect(isoDateSchema.safeParse("2025-09-15").success).toBe(true);
  });

  test("accepts a datetime", () => {
    expect(isoDateSchema.safeParse("2025-09-15T08:30:00Z").success).toBe(true);
  });

  test("rejects day-first dates", () => {
    expect(isoDateSchema.safeParse("15/09/2025").success).toBe(false);
  });

  test.each(["2025-02-30", "2025-02-29", "2025-04-31", "2025-09-00"])(
    "rejects %s, which is not on the calendar",
    (value) => {
      expect(isoDateSchema.safeParse(value).success).toBe(false);
    },
  );

  test("accepts a leap day", () => {
    expect(isoDateSchema.safeParse("2024-02-29").success).toBe(true);
  });

  test("rejects an impossible day in a datetime", () => {
    expect(isoDateSchema.safeParse("2025-02-30T08:00:00Z").success).toBe(false);
  });

  test("rejects an impossible month", () => {
    expect(isoDateSchema.safeParse("2025-13-01").success).toBe(false);
  });
});

describe("envFlag", () => {
  test.each(["1", "true", "YES", " yes "])("%s enables the flag", (value) => {
    expect(envFlag.parse(value)).toBe(true);
  });

  test.each(["0", "false", "on", ""])("%s leaves it off", (value) => {
    expect(envFlag.parse(value)).toBe(false);
  });

  test("unset leaves it off", () => {
    expect(envFlag.parse(undefined)).toBe(false);
  });
});

describe("envSchema", () => {
  test("coerces numeric strings", () => {
    const env = envSchema.parse({ PORT: "9090", NOTES_TIMEOUT_SECONDS: "1.5" });
    expect(env.PORT).toBe(9090);
    expect(env.NOTES_TIMEOUT_SECONDS).toBe(1.5);
  });

  test("rejects a non-numeric deadline", () => {
    expect(envSchema.safeParse({ LOGIN_TIMEOUT_SECONDS: "soon" }).success).toBe(false);
  });

  test("rejects a malformed portal url", () => {
    expect(envSchema.safeParse({ PORTAL_URL: "not a url" }).success).toBe(false);
  });
});
