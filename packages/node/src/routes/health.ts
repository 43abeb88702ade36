/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service constructed, journal chain intact)
 */

import { Hono } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AppEnv } from "../types/api-contract.js";
import type { ProtocolService } from "../services/protocol-service.js";

export function createHealthRoutes(service: ProtocolService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyJournal();
    const ready = service.isReady() && integrity.valid;
    const status: ContentfulStatusCode = ready ? 200 : 503;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        journal: {
          valid: integrity.valid,
          lastVerifiedPosition: integrity.lastVerifiedPosition,
          errors: integrity.errors.length,
        },
        timestamp: new Date().toISOString(),
      },
      status,
    );
  });

  return routes;
}
