import { credentialsSchema, errorResponseSchema, probeLoginResponseSchema } from "@repo/shared";
import { Hono } from "hono";
import { describeRoute, resolver } from "hono-openapi";
import { type FacadeDeps, probeLogin } from "../facade/fetch.js";

export function createProbeRouter(deps: FacadeDeps) {
  const probeRouter = new Hono();

  // GET /probe/login - Check portal credentials without fetching data
  probeRouter.get(
    "/login",
    describeRoute({
      tags: ["Diagnostics"],
      summary: "Check portal login",
      responses: {
        200: {
          description: "Login succeeded (or mock mode)",
          content: {
            "application/json": {
              schema: resolver(probeLoginResponseSchema),
            },
          },
        },
        400: {
          description: "Missing username or password",
          content: {
            "application/json": {
              schema: resolver(errorResponseSchema),
            },
          },
        },
        401: { description: "Invalid portal credentials" },
        502: { description: "Portal error during login" },
        504: { description: "Portal login timed out" },
      },
    }),
    async (c) => {
      const parsed = credentialsSchema.safeParse({
        username: c.req.query("username"),
        password: c.req.query("password"),
      });

      if (!parsed.success) {
        return c.json({ error: parsed.error.flatten() }, 400);
      }

      const result = await probeLogin(parsed.data, deps);
      if (!result.ok) {
        return c.json({ error: result.error }, result.status);
      }

      return c.json(result.body);
    },
  );

  return probeRouter;
}
