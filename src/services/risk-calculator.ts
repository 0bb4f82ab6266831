/**
 * Risk Calculator
 *
 * Pure functions that turn one batch of decision records (plus the trade
 * statistics fetched alongside them) into a metrics snapshot:
 *
 * - Drawdown: running-peak max drawdown and current drawdown
 * - Value at Risk: Gaussian approximation over per-cycle returns
 * - Composite risk score: additive threshold tiers
 * - Trading frequency: trades per hour and an overtrading band
 *
 * Fields a batch is too small to recompute keep the value they had in the
 * previous snapshot.
 */

import type {
  RiskScores,
  RiskThresholds,
} from "../config/risk-defaults.ts";
import { mean, populationStdDev, stepReturns } from "../lib/math-utils.ts";
import type {
  DecisionRecord,
  PerformanceSummary,
} from "./decision-history.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MetricsSnapshot {
  // Trade statistics
  totalTrades: number;
  /** Percent (0-100) */
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;

  // Drawdown (percent)
  maxDrawdown: number;
  currentDrawdown: number;

  // Risk
  /** Currency units */
  var95: number;
  /** Currency units */
  var99: number;
  /** Additive score; nominally 0-100 but not clamped */
  riskScore: number;
  marginUsageRate: number;
  /** Percent of headroom left before margin is exhausted */
  liquidationDistance: number;

  // Live state
  currentBalance: number;
  availableBalance: number;
  unrealizedPnl: number;
  totalPnl: number;

  // Frequency
  tradesPerHour: number;
  avgHoldingMinutes: number;
  /** One of 10, 40, 70, 100 (0 until first computed) */
  overtradingScore: number;

  // System health
  apiLatencyMs: number;
  decisionLatencyMs: number;
  /** Percent of failed decision cycles */
  errorRate: number;
  uptimeHours: number;

  /** ISO timestamp of the last successful refresh */
  lastUpdated: string | null;
}

export interface RiskComputationInput {
  records: readonly DecisionRecord[];
  performance: PerformanceSummary;
  thresholds: RiskThresholds;
  scores: RiskScores;
  previous: MetricsSnapshot;
}

export interface RiskScoreFactors {
  marginUsage: number;
  maxDrawdown: number;
  sharpeRatio: number;
  winRate: number;
}

export interface ValueAtRisk {
  var95: number;
  var99: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** One-sided z-scores of the standard normal distribution */
const Z_95 = 1.645;
const Z_99 = 2.326;

/** Minimum balance samples before VaR is estimated */
export const MIN_BALANCES_FOR_VAR = 10;

/** Risk score reported when there are no records to judge */
export const DEFAULT_RISK_SCORE = 50;

/** Points added when win rate is below the low threshold */
const LOW_WIN_RATE_SCORE = 10;

const MS_PER_HOUR = 60 * 60 * 1000;

export function createEmptySnapshot(): MetricsSnapshot {
  return {
    totalTrades: 0,
    winRate: 0,
    profitFactor: 0,
    sharpeRatio: 0,
    maxDrawdown: 0,
    currentDrawdown: 0,
    var95: 0,
    var99: 0,
    riskScore: 0,
    marginUsageRate: 0,
    liquidationDistance: 0,
    currentBalance: 0,
    availableBalance: 0,
    unrealizedPnl: 0,
    totalPnl: 0,
    tradesPerHour: 0,
    avgHoldingMinutes: 0,
    overtradingScore: 0,
    apiLatencyMs: 0,
    decisionLatencyMs: 0,
    errorRate: 0,
    uptimeHours: 0,
    lastUpdated: null,
  };
}

// ---------------------------------------------------------------------------
// Drawdown
// ---------------------------------------------------------------------------

function drawdownFrom(peak: number, balance: number): number {
  if (peak <= 0) return 0;
  return ((peak - balance) / peak) * 100;
}

/**
 * Largest peak-to-later-balance decline, in percent. A single forward pass
 * tracking the running peak. Returns 0 for fewer than 2 samples.
 *
 * @example
 * calculateMaxDrawdown([1000, 1200, 900, 950]) // 25
 */
export function calculateMaxDrawdown(balances: readonly number[]): number {
  if (balances.length < 2) return 0;

  let peak = balances[0];
  let maxDrawdown = 0;
  for (const balance of balances) {
    if (balance > peak) peak = balance;
    const drawdown = drawdownFrom(peak, balance);
    if (drawdown > maxDrawdown) maxDrawdown = drawdown;
  }
  return maxDrawdown;
}

/**
 * Decline of the last balance from the running peak, in percent.
 * Never exceeds calculateMaxDrawdown() of the same series.
 *
 * @example
 * calculateCurrentDrawdown([1000, 1200, 900, 950]) // 20.833...
 */
export function calculateCurrentDrawdown(balances: readonly number[]): number {
  if (balances.length === 0) return 0;
  let peak = balances[0];
  for (const balance of balances) {
    if (balance > peak) peak = balance;
  }
  return drawdownFrom(peak, balances[balances.length - 1]);
}

// ---------------------------------------------------------------------------
// Value at Risk
// ---------------------------------------------------------------------------

/**
 * Gaussian VaR: |mean - z * std| * currentBalance over per-step returns,
 * using the population standard deviation. Returns null below
 * MIN_BALANCES_FOR_VAR samples.
 *
 * The absolute value means VaR95 can exceed VaR99 when the mean return is
 * large relative to its spread.
 */
export function calculateVaR(
  balances: readonly number[],
  currentBalance: number,
): ValueAtRisk | null {
  if (balances.length < MIN_BALANCES_FOR_VAR) return null;

  const returns = stepReturns(balances);
  const avg = mean(returns);
  const std = populationStdDev(returns, avg);

  return {
    var95: Math.abs(avg - Z_95 * std) * currentBalance,
    var99: Math.abs(avg - Z_99 * std) * currentBalance,
  };
}

// ---------------------------------------------------------------------------
// Risk Score
// ---------------------------------------------------------------------------

/**
 * Additive composite score. Each factor contributes at most one tier; the
 * highest matching tier wins. The sum is not clamped to 100.
 */
export function calculateRiskScore(
  factors: RiskScoreFactors,
  thresholds: RiskThresholds,
  scores: RiskScores,
): number {
  let score = 0;

  if (factors.marginUsage > thresholds.marginHigh) {
    score += scores.marginHighScore;
  } else if (factors.marginUsage > thresholds.marginMedium) {
    score += scores.marginMediumScore;
  }

  if (factors.maxDrawdown > thresholds.drawdownCritical) {
    score += scores.drawdownCriticalScore;
  } else if (factors.maxDrawdown > thresholds.drawdownHigh) {
    score += scores.drawdownHighScore;
  } else if (factors.maxDrawdown > thresholds.drawdownMedium) {
    score += scores.drawdownMediumScore;
  }

  if (factors.sharpeRatio < thresholds.sharpeLow) {
    score += scores.sharpeLowScore;
  } else if (factors.sharpeRatio < thresholds.sharpePoor) {
    score += scores.sharpePoorScore;
  }

  if (factors.winRate < thresholds.winRateLow) {
    score += LOW_WIN_RATE_SCORE;
  }

  return score;
}

// ---------------------------------------------------------------------------
// Trading Frequency
// ---------------------------------------------------------------------------

/**
 * Step function of trades per hour: >2 → 100, >1 → 70, >0.5 → 40, else 10.
 */
export function overtradingScore(tradesPerHour: number): number {
  if (tradesPerHour > 2) return 100;
  if (tradesPerHour > 1) return 70;
  if (tradesPerHour > 0.5) return 40;
  return 10;
}

/**
 * Trades per hour across the span of the records' own timestamps.
 * Returns null with fewer than 2 records or a zero-length span.
 */
export function calculateTradesPerHour(
  records: readonly DecisionRecord[],
  totalTrades: number,
): number | null {
  if (records.length < 2) return null;
  const first = records[0].timestamp.getTime();
  const last = records[records.length - 1].timestamp.getTime();
  const hours = (last - first) / MS_PER_HOUR;
  if (hours <= 0) return null;
  return totalTrades / hours;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/**
 * Compute the next snapshot from one fetched batch. `lastUpdated` and the
 * latency/uptime fields are left to the caller.
 */
export function computeRiskMetrics(input: RiskComputationInput): MetricsSnapshot {
  const { records, performance, thresholds, scores } = input;
  const next: MetricsSnapshot = {
    ...input.previous,
    totalTrades: performance.totalTrades,
    winRate: performance.winRate,
    profitFactor: performance.profitFactor,
    sharpeRatio: performance.sharpeRatio,
  };
  if (performance.totalPnl !== undefined) next.totalPnl = performance.totalPnl;
  if (performance.avgHoldingMinutes !== undefined) {
    next.avgHoldingMinutes = performance.avgHoldingMinutes;
  }

  if (records.length === 0) {
    next.riskScore = DEFAULT_RISK_SCORE;
    return next;
  }

  const balances = records.map((r) => r.totalBalance);
  const latest = records[records.length - 1];

  next.maxDrawdown = calculateMaxDrawdown(balances);
  next.currentDrawdown = calculateCurrentDrawdown(balances);
  next.currentBalance = latest.totalBalance;
  if (latest.availableBalance !== undefined) {
    next.availableBalance = latest.availableBalance;
  }
  if (latest.unrealizedPnl !== undefined) {
    next.unrealizedPnl = latest.unrealizedPnl;
  }

  const valueAtRisk = calculateVaR(balances, next.currentBalance);
  if (valueAtRisk) {
    next.var95 = valueAtRisk.var95;
    next.var99 = valueAtRisk.var99;
  }

  next.marginUsageRate = latest.marginUsedPct;
  next.liquidationDistance = Math.max(0, 100 - latest.marginUsedPct);
  next.riskScore = calculateRiskScore(
    {
      marginUsage: next.marginUsageRate,
      maxDrawdown: next.maxDrawdown,
      sharpeRatio: next.sharpeRatio,
      winRate: next.winRate,
    },
    thresholds,
    scores,
  );

  const flagged = records.filter((r) => r.success !== undefined);
  if (flagged.length > 0) {
    const failed = flagged.filter((r) => r.success === false).length;
    next.errorRate = (failed / flagged.length) * 100;
  }

  if (records.length >= 2) {
    const tradesPerHour = calculateTradesPerHour(records, next.totalTrades);
    if (tradesPerHour !== null) next.tradesPerHour = tradesPerHour;
    next.overtradingScore = overtradingScore(next.tradesPerHour);
  }

  return next;
}
