/**
 * Monitor Registry
 *
 * Process-wide lookup of running monitor engines by trader id, used by the
 * API routes and by shutdown.
 */

import { NotFoundError } from "../lib/errors.ts";
import type { MonitorEngine } from "./monitor-engine.ts";

const monitors = new Map<string, MonitorEngine>();

/**
 * @throws Error when the trader already has an engine
 */
export function registerMonitor(engine: MonitorEngine): void {
  if (monitors.has(engine.traderId)) {
    throw new Error(`monitor for trader ${engine.traderId} already registered`);
  }
  monitors.set(engine.traderId, engine);
}

/**
 * @throws NotFoundError (code `trader_not_found`) when no engine is registered
 */
export function requireMonitor(traderId: string): MonitorEngine {
  const engine = monitors.get(traderId);
  if (!engine) {
    throw new NotFoundError(`trader ${traderId} not found`, "trader_not_found");
  }
  return engine;
}

export function listMonitors(): MonitorEngine[] {
  return [...monitors.values()];
}

/** Stop every registered engine, waiting for in-flight refreshes. */
export async function stopAllMonitors(): Promise<void> {
  await Promise.all(listMonitors().map((m) => m.stop()));
}

/** Forget all engines without stopping them. Used by tests. */
export function clearMonitors(): void {
  monitors.clear();
}
