import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.ts";
import { createApp } from "./app.ts";
import { createDb } from "./db/index.ts";
import {
  createDiscordAlertHandler,
  createWebhookAlertHandler,
  type AlertHandler,
} from "./services/alert-handlers.ts";
import { createDbDecisionHistory } from "./services/decision-history.ts";
import { MonitorEngine } from "./services/monitor-engine.ts";
import { registerMonitor, stopAllMonitors } from "./services/monitor-registry.ts";
import { createDbRuntimeConfig } from "./services/runtime-config.ts";
import { configureLogger, logger } from "./services/structured-logger.ts";

const env = loadEnv();

configureLogger({
  minLevel: env.NODE_ENV === "production" ? "INFO" : "DEBUG",
  jsonOutput: env.NODE_ENV === "production",
});

if (!env.DATABASE_URL) {
  logger.fatal("startup", "DATABASE_URL is required");
  process.exit(1);
}

const database = createDb(env.DATABASE_URL);
const runtimeConfig = createDbRuntimeConfig(database.db);

const handlers: AlertHandler[] = [];
if (env.ALERT_WEBHOOK_URL) {
  handlers.push(
    createWebhookAlertHandler({
      url: env.ALERT_WEBHOOK_URL,
      secret: env.ALERT_WEBHOOK_SECRET,
    }),
  );
}
if (env.DISCORD_ALERTS_WEBHOOK_URL) {
  handlers.push(
    createDiscordAlertHandler({ webhookUrl: env.DISCORD_ALERTS_WEBHOOK_URL }),
  );
}

for (const traderId of env.MONITOR_TRADER_IDS) {
  const engine = new MonitorEngine({
    traderId,
    history: createDbDecisionHistory(database.db, traderId),
    config: runtimeConfig,
    intervalMs: env.MONITOR_INTERVAL_MS,
  });
  for (const handler of handlers) engine.registerHandler(handler);
  registerMonitor(engine);
  engine.start();
}

if (env.MONITOR_TRADER_IDS.length === 0) {
  logger.warn("startup", "MONITOR_TRADER_IDS is empty; no traders are monitored");
}

const app = createApp({ db: database.db });

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    logger.info("startup", `Risk monitor API listening on port ${info.port}`, {
      traders: env.MONITOR_TRADER_IDS,
      handlers: handlers.map((h) => h.name),
    });
  },
);

async function shutdown(signal: string): Promise<void> {
  logger.info("startup", `Received ${signal}, shutting down`);
  server.close();
  await stopAllMonitors();
  await database.close();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.fatal(
          "startup",
          "Shutdown failed",
          err instanceof Error ? err : new Error(String(err)),
        );
        process.exit(1);
      });
  });
}
