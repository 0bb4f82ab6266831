/**
 * Risk Monitor Routes
 *
 * Read-only views of each trader's monitor plus the two operator actions.
 *
 * Routes:
 *   GET  /api/v1/monitor                                 - Status of every monitor
 *   GET  /api/v1/monitor/:traderId/status                - One monitor's status
 *   GET  /api/v1/monitor/:traderId/metrics               - Current metrics snapshot
 *   GET  /api/v1/monitor/:traderId/alerts?limit=         - Alerts, newest first
 *   POST /api/v1/monitor/:traderId/alerts/:alertId/resolve - Resolve an alert
 *   POST /api/v1/monitor/:traderId/refresh               - Run a refresh now
 */

import { Hono } from "hono";
import { apiError, handleError } from "../lib/errors.ts";
import { parseQueryInt } from "../lib/query-params.ts";
import { MAX_ALERT_LEDGER } from "../services/alert-ledger.ts";
import { listMonitors, requireMonitor } from "../services/monitor-registry.ts";

export const monitorRoutes = new Hono();

// ---------------------------------------------------------------------------
// GET / - All monitors
// ---------------------------------------------------------------------------

monitorRoutes.get("/", (c) => {
  const monitors = listMonitors().map((m) => m.status());
  return c.json({ monitors, count: monitors.length });
});

// ---------------------------------------------------------------------------
// GET /:traderId/status
// ---------------------------------------------------------------------------

monitorRoutes.get("/:traderId/status", (c) => {
  try {
    return c.json(requireMonitor(c.req.param("traderId")).status());
  } catch (err) {
    return handleError(c, err);
  }
});

// ---------------------------------------------------------------------------
// GET /:traderId/metrics
// ---------------------------------------------------------------------------

monitorRoutes.get("/:traderId/metrics", (c) => {
  try {
    const engine = requireMonitor(c.req.param("traderId"));
    return c.json({ traderId: engine.traderId, metrics: engine.snapshot() });
  } catch (err) {
    return handleError(c, err);
  }
});

// ---------------------------------------------------------------------------
// GET /:traderId/alerts - limit=0 (default) returns everything
// ---------------------------------------------------------------------------

monitorRoutes.get("/:traderId/alerts", (c) => {
  try {
    const engine = requireMonitor(c.req.param("traderId"));
    const limit = parseQueryInt(c.req.query("limit"), 0, MAX_ALERT_LEDGER);
    const alerts = engine.alerts(limit);
    return c.json({ traderId: engine.traderId, alerts, count: alerts.length });
  } catch (err) {
    return handleError(c, err);
  }
});

// ---------------------------------------------------------------------------
// POST /:traderId/alerts/:alertId/resolve
// ---------------------------------------------------------------------------

monitorRoutes.post("/:traderId/alerts/:alertId/resolve", (c) => {
  try {
    const engine = requireMonitor(c.req.param("traderId"));
    const alert = engine.resolveAlert(c.req.param("alertId"));
    return c.json({ alert });
  } catch (err) {
    return handleError(c, err);
  }
});

// ---------------------------------------------------------------------------
// POST /:traderId/refresh
// ---------------------------------------------------------------------------

monitorRoutes.post("/:traderId/refresh", async (c) => {
  try {
    const engine = requireMonitor(c.req.param("traderId"));
    const outcome = await engine.refresh();
    if (!outcome.ok) {
      return apiError(c, "DATA_ACCESS_FAILED", outcome.error?.message);
    }
    return c.json({
      traderId: engine.traderId,
      admitted: outcome.admitted,
      metrics: engine.snapshot(),
    });
  } catch (err) {
    return handleError(c, err);
  }
});
