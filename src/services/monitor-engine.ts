/**
 * Risk Monitor Engine
 *
 * Owns one trader's metrics snapshot and alert ledger for the lifetime of a
 * monitoring session, and refreshes them on a fixed interval:
 *
 *   timer fires → read query limits and thresholds from the runtime config
 *   → fetch trade stats and recent decision records → compute the next
 *   snapshot → evaluate alert rules → admit new alerts → hand each admitted
 *   alert to every registered handler
 *
 * State transitions: stopped → running (start) → stopping (stop, while an
 * iteration drains) → stopped. Start while not stopped and stop while
 * stopped are no-ops.
 *
 * All collaborator I/O completes before any state is touched; the snapshot
 * replacement and alert admission then run synchronously in `commit()`, so
 * readers on the event loop never observe a half-applied refresh. Iterations
 * never overlap: the timer is re-armed only after the previous iteration
 * finishes, and a manual refresh() joins an iteration already in flight.
 */

import { DataAccessError, HandlerError, errorMessage } from "../lib/errors.ts";
import { mean } from "../lib/math-utils.ts";
import type {
  AlertThresholds,
  RiskScores,
  RiskThresholds,
} from "../config/risk-defaults.ts";
import { AlertLedger, MAX_ALERT_LEDGER, type Alert } from "./alert-ledger.ts";
import { evaluateAlertRules } from "./alert-rules.ts";
import type { AlertHandler } from "./alert-handlers.ts";
import type {
  DecisionHistoryProvider,
  DecisionRecord,
  PerformanceSummary,
} from "./decision-history.ts";
import {
  computeRiskMetrics,
  createEmptySnapshot,
  type MetricsSnapshot,
} from "./risk-calculator.ts";
import type { RuntimeConfigProvider } from "./runtime-config.ts";
import { logger } from "./structured-logger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MonitorState = "stopped" | "running" | "stopping";

export type LatencyKind = "api" | "decision";

export interface MonitorEngineOptions {
  traderId: string;
  history: DecisionHistoryProvider;
  config: RuntimeConfigProvider;
  /** Refresh interval (default: 30 seconds) */
  intervalMs?: number;
  /** Ledger capacity before Resolved alerts are evicted */
  maxAlerts?: number;
}

export interface RefreshOutcome {
  ok: boolean;
  /** Alerts admitted to the ledger by this iteration */
  admitted: Alert[];
  error?: DataAccessError;
}

export interface MonitorStatus {
  traderId: string;
  enabled: boolean;
  state: MonitorState;
  lastUpdated: string | null;
  alertCount: number;
  openAlertCount: number;
  riskScore: number;
  refreshCount: number;
  failedRefreshes: number;
  handlerFailures: number;
  lastError: string | null;
}

interface FetchedBatch {
  records: DecisionRecord[];
  performance: PerformanceSummary;
  thresholds: RiskThresholds;
  scores: RiskScores;
  alertThresholds: AlertThresholds;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const SERVICE = "risk-monitor";

export const DEFAULT_REFRESH_INTERVAL_MS = 30_000;

/** Latency samples kept per kind between refreshes */
const MAX_LATENCY_SAMPLES = 200;

const MS_PER_HOUR = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class MonitorEngine {
  readonly traderId: string;
  private readonly history: DecisionHistoryProvider;
  private readonly config: RuntimeConfigProvider;
  private readonly intervalMs: number;

  private state: MonitorState = "stopped";
  private metrics: MetricsSnapshot = createEmptySnapshot();
  private readonly ledger: AlertLedger;
  private readonly handlers: AlertHandler[] = [];

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<RefreshOutcome> | null = null;
  private draining: Promise<void> | null = null;
  private startedAt: number | null = null;
  private readonly latencySamples: Record<LatencyKind, number[]> = {
    api: [],
    decision: [],
  };

  private refreshCount = 0;
  private failedRefreshes = 0;
  private handlerFailures = 0;
  private lastError: string | null = null;

  constructor(options: MonitorEngineOptions) {
    this.traderId = options.traderId;
    this.history = options.history;
    this.config = options.config;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.ledger = new AlertLedger(options.maxAlerts ?? MAX_ALERT_LEDGER);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Begin periodic refreshes. Returns immediately; the first iteration runs
   * one interval from now. Ignored unless the engine is stopped, including
   * while a stop() is still draining: await stop() before starting again.
   */
  start(): void {
    if (this.state !== "stopped") return;

    this.state = "running";
    this.startedAt = Date.now();
    this.schedule();
    logger.info(SERVICE, "Risk monitor started", {
      traderId: this.traderId,
      intervalMs: this.intervalMs,
    });
  }

  /**
   * Stop refreshing. An iteration already in flight completes first; the
   * returned promise settles once the engine is stopped.
   */
  stop(): Promise<void> {
    if (this.state === "stopped") return Promise.resolve();
    if (this.state === "stopping" && this.draining) return this.draining;

    this.state = "stopping";
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.draining = this.drain().finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  getState(): MonitorState {
    return this.state;
  }

  private async drain(): Promise<void> {
    if (this.inFlight) {
      await Promise.allSettled([this.inFlight]);
    }
    this.state = "stopped";
    logger.info(SERVICE, "Risk monitor stopped", { traderId: this.traderId });
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.refresh()
        .catch((err: unknown) => {
          logger.error(
            SERVICE,
            "Refresh iteration crashed",
            err instanceof Error ? err : new Error(String(err)),
            { traderId: this.traderId },
          );
        })
        .finally(() => {
          if (this.state === "running") this.schedule();
        });
    }, this.intervalMs);
  }

  // -------------------------------------------------------------------------
  // Refresh
  // -------------------------------------------------------------------------

  /**
   * Run one iteration now, or join the one already in flight.
   */
  refresh(): Promise<RefreshOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.runIteration().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async runIteration(): Promise<RefreshOutcome> {
    let batch: FetchedBatch;
    try {
      batch = await this.fetchBatch();
    } catch (err) {
      const error =
        err instanceof DataAccessError
          ? err
          : new DataAccessError(errorMessage(err), { cause: err });
      this.failedRefreshes++;
      this.lastError = error.message;
      logger.warn(
        SERVICE,
        "Refresh skipped, keeping previous snapshot",
        { traderId: this.traderId },
        error,
      );
      return { ok: false, admitted: [], error };
    }

    const admitted = this.commit(batch);
    for (const alert of admitted) {
      this.dispatch(alert);
    }
    return { ok: true, admitted };
  }

  /** Limits and thresholds are re-read every iteration. */
  private async fetchBatch(): Promise<FetchedBatch> {
    const limits = await this.config.queryLimits();
    const [thresholds, scores, alertThresholds] = await Promise.all([
      this.config.riskThresholds(),
      this.config.riskScores(),
      this.config.alertThresholds(),
    ]);
    const performance = await this.history.analyzePerformance(
      limits.performanceLimit,
    );
    const records = await this.history.latestRecords(limits.monitoringLimit);
    return { records, performance, thresholds, scores, alertThresholds };
  }

  /**
   * Replace the snapshot and admit alerts. Synchronous: nothing else runs
   * between the first and last mutation.
   */
  private commit(batch: FetchedBatch): Alert[] {
    const now = new Date();
    const next = computeRiskMetrics({
      records: batch.records,
      performance: batch.performance,
      thresholds: batch.thresholds,
      scores: batch.scores,
      previous: this.metrics,
    });
    next.apiLatencyMs = this.takeLatency("api") ?? next.apiLatencyMs;
    next.decisionLatencyMs =
      this.takeLatency("decision") ?? next.decisionLatencyMs;
    if (this.startedAt !== null) {
      next.uptimeHours = (now.getTime() - this.startedAt) / MS_PER_HOUR;
    }
    next.lastUpdated = now.toISOString();

    this.metrics = next;
    this.refreshCount++;
    this.lastError = null;

    const bucket = Math.floor(now.getTime() / 1000);
    const candidates = evaluateAlertRules(next, {
      risk: batch.thresholds,
      alert: batch.alertThresholds,
    });

    const admitted: Alert[] = [];
    for (const candidate of candidates) {
      const alert: Alert = {
        id: this.ledger.uniqueId(`${candidate.key}_${bucket}`),
        traderId: this.traderId,
        type: candidate.type,
        level: candidate.level,
        title: candidate.title,
        message: candidate.message,
        raisedAt: now.toISOString(),
        resolvedAt: null,
      };
      if (this.ledger.admit(alert)) {
        admitted.push(alert);
        logger.warn(SERVICE, `${alert.level}: ${alert.title} - ${alert.message}`, {
          traderId: this.traderId,
          alertId: alert.id,
          type: alert.type,
        });
      }
    }

    logger.info(SERVICE, "Metrics updated", {
      traderId: this.traderId,
      records: batch.records.length,
      winRate: next.winRate,
      sharpeRatio: next.sharpeRatio,
      riskScore: next.riskScore,
    });

    return admitted;
  }

  /**
   * Fire-and-forget delivery: each handler runs on its own, and a failure
   * is logged without touching the refresh loop or other handlers.
   */
  private dispatch(alert: Alert): void {
    const delivered: Readonly<Alert> = Object.freeze({ ...alert });
    for (const handler of [...this.handlers]) {
      void Promise.resolve()
        .then(() => handler.handle(delivered))
        .catch((err: unknown) => {
          const error =
            err instanceof HandlerError
              ? err
              : new HandlerError(handler.name, alert.id, errorMessage(err), {
                  cause: err,
                });
          this.handlerFailures++;
          logger.warn(
            SERVICE,
            "Alert handler failed",
            { traderId: this.traderId, handler: handler.name, alertId: alert.id },
            error,
          );
        });
    }
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  /** A copy of the current snapshot. */
  snapshot(): MetricsSnapshot {
    return { ...this.metrics };
  }

  /** Alerts newest first; `limit <= 0` returns all. */
  alerts(limit = 0): Alert[] {
    return this.ledger.list(limit);
  }

  /**
   * @throws NotFoundError when the id is unknown
   */
  resolveAlert(id: string): Alert {
    const alert = this.ledger.resolve(id);
    logger.info(SERVICE, "Alert resolved", {
      traderId: this.traderId,
      alertId: id,
    });
    return alert;
  }

  /** Takes effect from the next admitted alert; no replay. */
  registerHandler(handler: AlertHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Report an observed exchange API call or decision-cycle duration. The
   * mean of samples reported since the previous refresh becomes the
   * snapshot's latency.
   */
  recordLatency(kind: LatencyKind, durationMs: number): void {
    if (!Number.isFinite(durationMs) || durationMs < 0) return;
    const samples = this.latencySamples[kind];
    samples.push(durationMs);
    if (samples.length > MAX_LATENCY_SAMPLES) {
      samples.splice(0, samples.length - MAX_LATENCY_SAMPLES);
    }
  }

  private takeLatency(kind: LatencyKind): number | null {
    const samples = this.latencySamples[kind];
    if (samples.length === 0) return null;
    const avg = mean(samples);
    samples.length = 0;
    return avg;
  }

  status(): MonitorStatus {
    return {
      traderId: this.traderId,
      enabled: this.state === "running",
      state: this.state,
      lastUpdated: this.metrics.lastUpdated,
      alertCount: this.ledger.size,
      openAlertCount: this.ledger.openCount,
      riskScore: this.metrics.riskScore,
      refreshCount: this.refreshCount,
      failedRefreshes: this.failedRefreshes,
      handlerFailures: this.handlerFailures,
      lastError: this.lastError,
    };
  }
}
