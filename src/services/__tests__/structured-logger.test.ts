/**
 * Structured Logger Tests
 *
 * Validates level filtering, trader tagging, the ring buffer and stats.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  configureLogger,
  getLoggerConfig,
  getLoggerStats,
  getRecentLogs,
  logger,
  resetLoggerStats,
  type LoggerConfig,
} from "../structured-logger.ts";
import { DataAccessError } from "../../lib/errors.ts";

describe("Structured Logger", () => {
  let saved: LoggerConfig;

  beforeEach(() => {
    saved = getLoggerConfig();
    configureLogger({ silent: true, minLevel: "DEBUG" });
    resetLoggerStats();
  });

  afterEach(() => {
    configureLogger(saved);
  });

  it("should lift traderId from data onto the entry", () => {
    logger.info("risk-monitor", "Metrics updated", { traderId: "trader-a", riskScore: 30 });

    const [entry] = getRecentLogs();
    expect(entry).toMatchObject({
      level: "INFO",
      service: "risk-monitor",
      message: "Metrics updated",
      traderId: "trader-a",
      data: { traderId: "trader-a", riskScore: 30 },
    });
  });

  it("should record error code and message", () => {
    logger.warn("risk-monitor", "Refresh skipped", undefined, new DataAccessError("timeout"));

    expect(getRecentLogs()[0].error).toMatchObject({
      message: "timeout",
      code: "data_access_failed",
    });
    expect(getLoggerStats().errorsLogged).toBe(1);
  });

  it("should drop entries below the minimum level", () => {
    configureLogger({ minLevel: "WARN" });
    logger.debug("risk-monitor", "noise");
    logger.info("risk-monitor", "noise");
    logger.warn("risk-monitor", "kept");

    expect(getRecentLogs().map((l) => l.message)).toEqual(["kept"]);
    expect(getLoggerStats().totalLogs).toBe(1);
  });

  it("should filter recent logs by level, service and trader", () => {
    logger.info("risk-monitor", "a", { traderId: "trader-a" });
    logger.warn("risk-monitor", "b", { traderId: "trader-b" });
    logger.error("api", "c");
    logger.warn("risk-monitor", "d", { traderId: "trader-a" });

    expect(getRecentLogs({ level: "WARN" }).map((l) => l.message)).toEqual(["b", "c", "d"]);
    expect(getRecentLogs({ service: "api" }).map((l) => l.message)).toEqual(["c"]);
    expect(getRecentLogs({ traderId: "trader-a" }).map((l) => l.message)).toEqual(["a", "d"]);
    expect(getRecentLogs({ limit: 2 }).map((l) => l.message)).toEqual(["c", "d"]);
  });

  it("should bound the ring buffer", () => {
    configureLogger({ ringBufferSize: 3 });
    for (let i = 0; i < 5; i++) logger.info("risk-monitor", `entry ${i}`);

    expect(getRecentLogs().map((l) => l.message)).toEqual(["entry 2", "entry 3", "entry 4"]);
    expect(getLoggerStats().logsByLevel.INFO).toBe(5);
  });
});
