import { Hono } from "hono";
import { sql } from "drizzle-orm";
import type { Database } from "../db/index.ts";
import { errorMessage } from "../lib/errors.ts";
import { listMonitors } from "../services/monitor-registry.ts";

/**
 * GET /health - Process health with an optional database probe
 *
 * Returns:
 * - status: "ok", or "degraded" when the database probe fails
 * - uptime: milliseconds since the routes were created
 * - monitors: { total, running }
 * - database: { connected, latency?, error? } (only when a db is given)
 * - timestamp: current ISO timestamp
 */
export function createHealthRoutes(db?: Database): Hono {
  const healthRoutes = new Hono();

  /** Track server start time for uptime calculation */
  const serverStartTime = Date.now();

  healthRoutes.get("/", async (c) => {
    let dbConnected = true;
    let dbLatency: number | undefined;
    let dbError: string | undefined;

    if (db) {
      try {
        const dbCheckStart = Date.now();
        await db.execute(sql`SELECT 1 as health_check`);
        dbLatency = Date.now() - dbCheckStart;
      } catch (err) {
        dbConnected = false;
        dbError = errorMessage(err);
      }
    }

    const monitors = listMonitors();

    return c.json({
      status: dbConnected ? "ok" : "degraded",
      uptime: Date.now() - serverStartTime,
      monitors: {
        total: monitors.length,
        running: monitors.filter((m) => m.getState() === "running").length,
      },
      ...(db && {
        database: {
          connected: dbConnected,
          ...(dbLatency !== undefined && { latency: dbLatency }),
          ...(dbError && { error: dbError }),
        },
      }),
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
