/**
 * Ballot Service API -- Express Server
 *
 * Assembles all routes, middleware, and starts the HTTP server.
 *
 * Usage:
 *   Build, then: node dist/api/server.js
 *   Or import createApp() for testing without starting the listener.
 *
 * @module api/server
 * @license AGPL-3.0-or-later
 */

import express, { Express } from "express";
import cors from "cors";
import { loadConfig, ServiceConfig } from "../config";
import type { CandidateCatalog } from "../core/candidate-catalog";
import type { VoteCastingTransaction } from "../core/vote-casting";
import { createLogger } from "../utils/logger";
import { createVoteRoutes } from "./routes/votes";
import { createAuditRoutes } from "./routes/audit";
import { createAdminRoutes } from "./routes/admin";
import { notFoundHandler, errorHandler } from "./middleware/error-handler";
import { createRateLimiters } from "./middleware/rate-limiter";
import { requireAdminToken } from "./middleware/admin-auth";
import { createInMemoryService, createVotingService } from "./service";

const VERSION = "0.1.0";

// ============================================================
// App Factory
// ============================================================

interface AppOptions {
  voting: VoteCastingTransaction;
  /** Bearer token for /v1/admin (unset: no check) */
  adminToken?: string;
  /** Allowed CORS origins */
  corsOrigins?: string[];
  /** Disable rate limiting (for testing) */
  disableRateLimiting?: boolean;
}

/**
 * Creates and configures the Express app.
 */
export function createApp(options: AppOptions): Express {
  const app = express();
  const { voting } = options;
  const limiters = options.disableRateLimiting ? undefined : createRateLimiters();

  // --------------------------------------------------------
  // Global Middleware
  // --------------------------------------------------------

  app.use(express.json());

  app.use(
    cors({
      origin: options.corsOrigins ?? ["http://localhost:3000", "http://localhost:3001"],
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Authorization", "Content-Type"],
    })
  );

  // --------------------------------------------------------
  // Health Check
  // --------------------------------------------------------

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------------
  // API v1 Routes
  // --------------------------------------------------------

  // Votes
  if (limiters) app.use("/v1/votes", limiters.vote);
  app.use("/v1/votes", createVoteRoutes(voting));

  // Admin
  if (limiters) app.use("/v1/admin", limiters.admin);
  app.use("/v1/admin", requireAdminToken(options.adminToken), createAdminRoutes(voting));

  // Results, ballots, audit, stats
  if (limiters) app.use("/v1", limiters.read);
  app.use("/v1", createAuditRoutes(voting));

  // --------------------------------------------------------
  // Error Handling
  // --------------------------------------------------------

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Creates a fresh app over a fresh in-memory database (for testing).
 */
export function createTestApp(
  config: Partial<ServiceConfig> = {},
  catalog?: CandidateCatalog
): { app: Express; voting: VoteCastingTransaction } {
  const voting = createInMemoryService(config, { catalog });
  const app = createApp({
    voting,
    adminToken: config.adminToken,
    disableRateLimiting: true,
  });
  return { app, voting };
}

// ============================================================
// Start Server (only when run directly)
// ============================================================

const isDirectRun =
  require.main === module ||
  process.argv[1]?.endsWith("server.ts") ||
  process.argv[1]?.endsWith("server.js");

if (isDirectRun) {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const voting = createVotingService(config);
  const app = createApp({ voting, adminToken: config.adminToken });

  if (!config.adminToken) {
    logger.warn("VOTING_ADMIN_TOKEN is not set; admin routes are unauthenticated");
  }

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, version: VERSION }, "ballot service listening");
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      voting.close();
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}
