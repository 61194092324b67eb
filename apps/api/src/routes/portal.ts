import { envelopeResponseSchema, errorResponseSchema, fetchRequestSchema } from "@repo/shared";
import { Hono } from "hono";
import { describeRoute, resolver } from "hono-openapi";
import { type FacadeDeps, fetchPortalData } from "../facade/fetch.js";

const errorContent = {
  "application/json": {
    schema: resolver(errorResponseSchema),
  },
};

export function createPortalRouter(deps: FacadeDeps) {
  const portalRouter = new Hono();

  // POST /portal/fetch - Log in and fetch grades, lessons and homework
  portalRouter.post(
    "/fetch",
    describeRoute({
      tags: ["Portal"],
      summary: "Fetch grades, lessons and homework",
      description:
        "Logs in to the portal and runs the four queries concurrently, each under its own deadline. Slow or failing queries are reported in meta.status and meta.errors with an empty payload.",
      requestBody: {
        content: {
          "application/json": {
            schema: resolver(fetchRequestSchema) as never,
          },
        },
      },
      responses: {
        200: {
          description: "Response envelope, possibly with degraded tasks",
          content: {
            "application/json": {
              schema: resolver(envelopeResponseSchema),
            },
          },
        },
        400: { description: "Validation error", content: errorContent },
        401: { description: "Invalid portal credentials", content: errorContent },
        502: { description: "Portal error during login", content: errorContent },
        504: { description: "Portal login timed out", content: errorContent },
      },
    }),
    async (c) => {
      const body: unknown = await c.req.json().catch(() => undefined);
      if (body === undefined) {
        return c.json({ error: "invalid_json" }, 400);
      }

      const parsed = fetchRequestSchema.safeParse(body);
      if (!parsed.success) {
        return c.json({ error: parsed.error.flatten() }, 400);
      }

      const result = await fetchPortalData(parsed.data, deps);
      if (!result.ok) {
        return c.json({ error: result.error }, result.status);
      }

      return c.json(result.envelope);
    },
  );

  return portalRouter;
}
