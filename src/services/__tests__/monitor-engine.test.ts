/**
 * Monitor Engine Tests
 *
 * Validates the refresh loop end to end against in-process collaborators:
 * - Lifecycle (start/stop idempotence, stop waiting for an in-flight refresh)
 * - Snapshot replacement and failed-fetch retention
 * - Alert admission, deduplication and resolution
 * - Handler isolation
 * - Hot-reloaded thresholds and latency reporting
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MonitorEngine } from "../monitor-engine.ts";
import { createStaticRuntimeConfig, type StaticRuntimeConfig } from "../runtime-config.ts";
import type {
  DecisionHistoryProvider,
  DecisionRecord,
  PerformanceSummary,
} from "../decision-history.ts";
import type { Alert } from "../alert-ledger.ts";
import { DataAccessError, NotFoundError } from "../../lib/errors.ts";
import { resetLoggerStats, getRecentLogs } from "../structured-logger.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const START = new Date("2026-03-02T09:00:00.000Z");
const INTERVAL_MS = 1000;
const HOUR = 60 * 60 * 1000;

/** In-process decision history with switchable failure. */
class FakeHistory implements DecisionHistoryProvider {
  records: DecisionRecord[];
  performance: PerformanceSummary = {
    totalTrades: 0,
    winRate: 0,
    profitFactor: 0,
    sharpeRatio: 0,
  };
  failWith: Error | null = null;
  gate: Promise<void> | null = null;
  recordCalls = 0;
  lastLimits: number[] = [];

  constructor(records: DecisionRecord[]) {
    this.records = records;
  }

  async analyzePerformance(limit: number): Promise<PerformanceSummary> {
    this.lastLimits.push(limit);
    if (this.failWith) throw this.failWith;
    return { ...this.performance };
  }

  async latestRecords(limit: number): Promise<DecisionRecord[]> {
    this.recordCalls++;
    this.lastLimits.push(limit);
    if (this.gate) await this.gate;
    return this.records.slice(-limit);
  }
}

/** Two records an hour apart at the given margin usage. */
function marginRecords(marginUsedPct: number): DecisionRecord[] {
  const t0 = START.getTime() - HOUR;
  return [
    { timestamp: new Date(t0), totalBalance: 1000, marginUsedPct },
    { timestamp: new Date(t0 + HOUR), totalBalance: 1000, marginUsedPct },
  ];
}

function currentBucket(): number {
  return Math.floor(Date.now() / 1000);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Monitor Engine", () => {
  let history: FakeHistory;
  let config: StaticRuntimeConfig;
  let engine: MonitorEngine;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    resetLoggerStats();
    history = new FakeHistory(marginRecords(85));
    config = createStaticRuntimeConfig();
    engine = new MonitorEngine({
      traderId: "trader-a",
      history,
      config,
      intervalMs: INTERVAL_MS,
    });
  });

  afterEach(async () => {
    await engine.stop();
    vi.useRealTimers();
  });

  describe("initial state", () => {
    it("should start stopped with an empty snapshot", () => {
      const status = engine.status();
      expect(status).toMatchObject({
        traderId: "trader-a",
        enabled: false,
        state: "stopped",
        lastUpdated: null,
        alertCount: 0,
        riskScore: 0,
      });
      expect(engine.snapshot().lastUpdated).toBeNull();
      expect(engine.alerts()).toEqual([]);
    });
  });

  describe("refresh loop", () => {
    it("should raise one critical risk alert for 85% margin usage", async () => {
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      const alerts = engine.alerts();
      expect(alerts).toHaveLength(1);
      expect(alerts[0]).toMatchObject({
        traderId: "trader-a",
        type: "risk",
        level: "critical",
        title: "Margin usage too high",
        message: "Margin usage at 85.0%, close to liquidation",
        resolvedAt: null,
      });
      expect(engine.snapshot().marginUsageRate).toBe(85);
      expect(engine.snapshot().liquidationDistance).toBe(15);
    });

    it("should not duplicate the alert on the next iteration", async () => {
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      expect(engine.status().refreshCount).toBe(2);
      expect(engine.alerts()).toHaveLength(1);
    });

    it("should wait one interval before the first refresh", async () => {
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS - 1);
      expect(history.recordCalls).toBe(0);
      await vi.advanceTimersByTimeAsync(1);
      expect(history.recordCalls).toBe(1);
    });

    it("should pass the configured query limits to the history", async () => {
      config.update({ queryLimits: { performanceLimit: 7, monitoringLimit: 3 } });
      await engine.refresh();
      expect(history.lastLimits).toEqual([7, 3]);
    });

    it("should stamp lastUpdated and uptime", async () => {
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);

      const snapshot = engine.snapshot();
      expect(snapshot.lastUpdated).toBe("2026-03-02T09:00:01.000Z");
      expect(snapshot.uptimeHours).toBeCloseTo(INTERVAL_MS / HOUR, 10);
    });

    it("should report the default risk score for an empty history", async () => {
      history.records = [];
      const outcome = await engine.refresh();
      expect(outcome.ok).toBe(true);
      expect(outcome.admitted).toEqual([]);
      expect(engine.snapshot().riskScore).toBe(50);
      expect(engine.snapshot().lastUpdated).toBe("2026-03-02T09:00:00.000Z");
    });
  });

  describe("failed fetch", () => {
    it("should keep the previous snapshot and report the failure", async () => {
      await engine.refresh();
      const before = engine.snapshot();

      vi.setSystemTime(new Date(START.getTime() + 5000));
      history.failWith = new Error("connection refused");
      const outcome = await engine.refresh();

      expect(outcome.ok).toBe(false);
      expect(outcome.error).toBeInstanceOf(DataAccessError);
      expect(outcome.error?.message).toBe("connection refused");
      expect(engine.snapshot()).toEqual(before);
      expect(engine.status()).toMatchObject({
        refreshCount: 1,
        failedRefreshes: 1,
        lastError: "connection refused",
      });
      expect(getRecentLogs({ level: "WARN", traderId: "trader-a" }).at(-1)?.message).toBe(
        "Refresh skipped, keeping previous snapshot",
      );
    });

    it("should keep refreshing on schedule after a failure", async () => {
      history.failWith = new DataAccessError("timeout");
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(engine.snapshot().lastUpdated).toBeNull();

      history.failWith = null;
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(engine.snapshot().lastUpdated).toBe("2026-03-02T09:00:02.000Z");
      expect(engine.status().lastError).toBeNull();
    });
  });

  describe("alert admission", () => {
    it("should keep only the first alert per (type, level) within one refresh", async () => {
      // risk score 30 now meets the critical threshold alongside margin usage
      config.update({ alertThresholds: { riskScoreCritical: 30 } });
      const outcome = await engine.refresh();

      expect(engine.snapshot().riskScore).toBe(30);
      expect(outcome.admitted).toHaveLength(1);
      expect(engine.alerts()).toEqual([
        expect.objectContaining({
          id: `risk_score_${currentBucket()}`,
          title: "Extreme risk warning",
        }),
      ]);
    });

    it("should re-raise after resolution with a distinct id", async () => {
      const first = await engine.refresh();
      const id = first.admitted[0].id;
      expect(id).toBe(`margin_usage_${currentBucket()}`);

      const resolved = engine.resolveAlert(id);
      expect(resolved.resolvedAt).toBe("2026-03-02T09:00:00.000Z");

      const second = await engine.refresh();
      expect(second.admitted).toHaveLength(1);
      expect(second.admitted[0].id).toBe(`${id}_2`);
      expect(engine.status()).toMatchObject({ alertCount: 2, openAlertCount: 1 });
    });

    it("should throw NotFoundError when resolving an unknown alert", () => {
      expect(() => engine.resolveAlert("missing")).toThrow(NotFoundError);
    });

    it("should apply updated thresholds on the next refresh", async () => {
      config.update({ alertThresholds: { marginUsageCritical: 90 } });
      await engine.refresh();
      expect(engine.alerts()).toEqual([]);

      config.update({ alertThresholds: { marginUsageCritical: 80 } });
      await engine.refresh();
      expect(engine.alerts()).toHaveLength(1);
    });
  });

  describe("handlers", () => {
    it("should deliver admitted alerts to every handler despite failures", async () => {
      const received: Alert[] = [];
      engine.registerHandler({
        name: "broken",
        handle: () => {
          throw new Error("boom");
        },
      });
      engine.registerHandler({
        name: "collector",
        handle: async (alert) => {
          received.push({ ...alert });
        },
      });

      const outcome = await engine.refresh();
      await vi.waitFor(() => {
        expect(engine.status().handlerFailures).toBe(1);
      });

      expect(outcome.ok).toBe(true);
      expect(received.map((a) => a.id)).toEqual([outcome.admitted[0].id]);
      expect(engine.alerts()).toHaveLength(1);
    });

    it("should hand each handler a frozen alert", async () => {
      const frozen: boolean[] = [];
      engine.registerHandler({
        name: "inspector",
        handle: (alert) => {
          frozen.push(Object.isFrozen(alert));
        },
      });
      await engine.refresh();
      await vi.waitFor(() => {
        expect(frozen).toEqual([true]);
      });
    });

    it("should not replay earlier alerts to a late handler", async () => {
      await engine.refresh();
      const late: string[] = [];
      engine.registerHandler({ name: "late", handle: (a) => void late.push(a.id) });
      await engine.refresh();
      expect(late).toEqual([]);
    });
  });

  describe("latency", () => {
    it("should average samples reported since the last refresh", async () => {
      engine.recordLatency("api", 6000);
      engine.recordLatency("api", 8000);
      engine.recordLatency("decision", 250);
      const outcome = await engine.refresh();

      expect(engine.snapshot().apiLatencyMs).toBe(7000);
      expect(engine.snapshot().decisionLatencyMs).toBe(250);
      expect(outcome.admitted.map((a) => a.message)).toContain(
        "API latency 7000 ms may delay order execution",
      );

      engine.recordLatency("api", 100);
      await engine.refresh();
      expect(engine.snapshot().apiLatencyMs).toBe(100);
    });

    it("should ignore invalid samples", async () => {
      engine.recordLatency("api", -5);
      engine.recordLatency("api", Number.NaN);
      await engine.refresh();
      expect(engine.snapshot().apiLatencyMs).toBe(0);
    });
  });

  describe("lifecycle", () => {
    it("should ignore a second start", async () => {
      engine.start();
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(history.recordCalls).toBe(1);
      expect(engine.status().state).toBe("running");
    });

    it("should stop refreshing after stop", async () => {
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      await engine.stop();
      await engine.stop();

      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 5);
      expect(history.recordCalls).toBe(1);
      expect(engine.status()).toMatchObject({ state: "stopped", enabled: false });
    });

    it("should let an in-flight refresh finish before stopping", async () => {
      let release: () => void = () => {};
      history.gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(history.recordCalls).toBe(1);

      const stopped = engine.stop();
      expect(engine.getState()).toBe("stopping");

      release();
      await stopped;

      expect(engine.getState()).toBe("stopped");
      expect(engine.status().refreshCount).toBe(1);
      expect(engine.alerts()).toHaveLength(1);
    });

    it("should join a refresh already in flight", async () => {
      let release: () => void = () => {};
      history.gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const first = engine.refresh();
      const second = engine.refresh();
      release();
      const [a, b] = await Promise.all([first, second]);

      expect(a).toBe(b);
      expect(history.recordCalls).toBe(1);
    });

    it("should be restartable", async () => {
      engine.start();
      await engine.stop();
      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      expect(engine.status()).toMatchObject({ state: "running", refreshCount: 1 });

      await engine.stop();
      expect(engine.getState()).toBe("stopped");

      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 5);
      expect(history.recordCalls).toBe(1);
      expect(engine.status()).toMatchObject({ state: "stopped", refreshCount: 1 });
    });

    it("should stop again after several start/stop cycles", async () => {
      for (let i = 0; i < 3; i++) {
        engine.start();
        await engine.stop();
      }
      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 5);
      expect(engine.getState()).toBe("stopped");
      expect(history.recordCalls).toBe(0);
    });

    it("should ignore start while a stop is draining", async () => {
      let release: () => void = () => {};
      history.gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      engine.start();
      await vi.advanceTimersByTimeAsync(INTERVAL_MS);
      const stopped = engine.stop();

      engine.start();
      expect(engine.getState()).toBe("stopping");

      release();
      await stopped;
      await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);
      expect(engine.getState()).toBe("stopped");
      expect(history.recordCalls).toBe(1);
    });
  });
});
