import { Hono } from "hono";
import type { Database } from "./db/index.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { monitorRoutes } from "./routes/monitor.ts";
import { apiError } from "./lib/errors.ts";
import { logger } from "./services/structured-logger.ts";

export interface AppOptions {
  /** Probed by /health when given */
  db?: Database;
}

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();

  // Health check
  app.route("/health", createHealthRoutes(options.db));

  // Risk monitor views and actions
  app.route("/api/v1/monitor", monitorRoutes);

  app.onError((err, c) => {
    logger.error("api", `Unhandled error on ${c.req.method} ${c.req.path}`, err);
    return apiError(c, "INTERNAL_ERROR", err.message);
  });

  return app;
}
