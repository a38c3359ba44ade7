/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { CustodyService, type CustodyServiceConfig } from "./services/custody-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWalletRoutes } from "./routes/wallet.js";
import { createVestingRoutes } from "./routes/vesting.js";
import { createTokenRoutes } from "./routes/tokens.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CustodyServiceConfig;

  /** Request logger. When omitted, requests are not logged. */
  readonly logger?: Logger;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new CustodyService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/wallet", createWalletRoutes());
  app.route("/api/v1/vesting", createVestingRoutes());
  app.route("/api/v1/tokens", createTokenRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
