/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ProtocolService } from "./services/protocol-service.js";
import type { ProtocolServiceConfig } from "./services/protocol-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createDiscoveryRoutes } from "./routes/discovery.js";
import { createJournalRoutes } from "./routes/journal.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Used to build a service when `service` is not given */
  readonly serviceConfig?: ProtocolServiceConfig | undefined;
  /** An existing service, shared with embedding code */
  readonly service?: ProtocolService | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ProtocolService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = options.service
    ?? new ProtocolService(options.serviceConfig ?? { namespaceSeed: "warden" });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createDiscoveryRoutes());
  app.route("/api/v1/journal", createJournalRoutes());

  return { app, service };
}
