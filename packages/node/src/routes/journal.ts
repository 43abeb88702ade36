/**
 * Journal routes.
 *
 * GET /api/v1/journal         — Committed events (cursor pagination)
 * GET /api/v1/journal/verify  — Hash chain integrity check
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListJournalQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createJournalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListJournalQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: queryResult.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const entries = c.get("service").readJournal(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    return c.json(
      paginate(
        entries,
        { cursor: query.cursor, limit: query.limit },
        (entry) => entry.position,
        "position",
      ),
    );
  });

  routes.get("/verify", (c) => {
    return c.json({ data: c.get("service").verifyJournal() });
  });

  return routes;
}
