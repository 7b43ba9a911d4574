/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { CommitlockService } from "./services/commitlock-service.js";
import type { CommitlockServiceConfig } from "./services/commitlock-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestContextMiddleware } from "./middleware/request-context.js";
import type { RequestLogSink } from "./middleware/request-context.js";
import {
  authMiddleware,
  principalHeaderMiddleware,
  requireWriteForMutations,
} from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createCommitmentRoutes } from "./routes/commitments.js";
import { createTokenRoutes } from "./routes/tokens.js";
import { createComplianceRoutes } from "./routes/compliance.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CommitlockServiceConfig;
  readonly logFn?: RequestLogSink | undefined;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CommitlockService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = new CommitlockService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestContextMiddleware(options.logFn));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Principal header or the admin
    app.use("/api/*", principalHeaderMiddleware(options.serviceConfig.adminPrincipal));
  }
  app.use("/api/*", requireWriteForMutations());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/commitments", createCommitmentRoutes());
  app.route("/api/v1/commitments", createComplianceRoutes());
  app.route("/api/v1", createTokenRoutes());

  return { app, service };
}
