/**
 * Decision History Provider
 *
 * Read-only access to a trader's decision cycles and closed trades. The risk
 * monitor depends only on the `DecisionHistoryProvider` interface; the
 * drizzle-backed implementation below is what the server wires in.
 */

import { desc, eq } from "drizzle-orm";
import type { Database } from "../db/index.ts";
import { decisionRecords, tradeOutcomes } from "../db/schema/index.ts";
import { DataAccessError, errorMessage } from "../lib/errors.ts";
import { mean, populationStdDev, stepReturns } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One decision cycle's account state. */
export interface DecisionRecord {
  timestamp: Date;
  totalBalance: number;
  /** Margin in use as a percentage of equity */
  marginUsedPct: number;
  availableBalance?: number;
  unrealizedPnl?: number;
  /** Whether the cycle completed without error */
  success?: boolean;
}

/** Aggregated trade statistics over a lookback window. */
export interface PerformanceSummary {
  totalTrades: number;
  /** Percentage of trades with positive P&L (0-100) */
  winRate: number;
  profitFactor: number;
  sharpeRatio: number;
  totalPnl?: number;
  avgHoldingMinutes?: number;
}

export interface DecisionHistoryProvider {
  /** Fails with DataAccessError when the store cannot be read. */
  analyzePerformance(limit: number): Promise<PerformanceSummary>;
  /** Up to `limit` most recent records, ordered oldest to newest. */
  latestRecords(limit: number): Promise<DecisionRecord[]>;
}

export interface TradeOutcome {
  pnl: number;
  durationMinutes: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Profit factor reported when there are winning trades but no losses */
const PROFIT_FACTOR_NO_LOSSES = 999;

/** Sharpe ratio magnitude reported when returns have zero variance */
const SHARPE_ZERO_VARIANCE = 999;

/** Closed trades fetched per decision cycle of lookback */
const TRADES_PER_CYCLE = 10;

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Summarize closed trades into win rate, profit factor, total P&L and
 * average holding time. Break-even trades count toward the total but are
 * neither wins nor losses.
 */
export function summarizeTradeOutcomes(
  outcomes: readonly TradeOutcome[],
): Omit<PerformanceSummary, "sharpeRatio"> {
  if (outcomes.length === 0) {
    return {
      totalTrades: 0,
      winRate: 0,
      profitFactor: 0,
      totalPnl: 0,
      avgHoldingMinutes: 0,
    };
  }

  let wins = 0;
  let grossWin = 0;
  let grossLoss = 0;
  for (const trade of outcomes) {
    if (trade.pnl > 0) {
      wins++;
      grossWin += trade.pnl;
    } else if (trade.pnl < 0) {
      grossLoss += -trade.pnl;
    }
  }

  let profitFactor = 0;
  if (grossLoss > 0) {
    profitFactor = grossWin / grossLoss;
  } else if (grossWin > 0) {
    profitFactor = PROFIT_FACTOR_NO_LOSSES;
  }

  return {
    totalTrades: outcomes.length,
    winRate: (wins / outcomes.length) * 100,
    profitFactor,
    totalPnl: grossWin - grossLoss,
    avgHoldingMinutes: mean(outcomes.map((t) => t.durationMinutes)),
  };
}

/**
 * Per-cycle Sharpe ratio (mean return / population std) over the positive
 * balances of an equity series.
 */
export function calculateSharpeRatio(balances: readonly number[]): number {
  const equities = balances.filter((b) => b > 0);
  if (equities.length < 2) return 0;

  const returns = stepReturns(equities);
  if (returns.length === 0) return 0;

  const avg = mean(returns);
  const std = populationStdDev(returns, avg);
  if (std === 0) {
    if (avg > 0) return SHARPE_ZERO_VARIANCE;
    if (avg < 0) return -SHARPE_ZERO_VARIANCE;
    return 0;
  }
  return avg / std;
}

// ---------------------------------------------------------------------------
// Database-backed provider
// ---------------------------------------------------------------------------

/**
 * Decision history for one trader, read through drizzle. Every query
 * failure surfaces as a DataAccessError.
 */
export function createDbDecisionHistory(
  db: Database,
  traderId: string,
): DecisionHistoryProvider {
  async function latestRecords(limit: number): Promise<DecisionRecord[]> {
    try {
      const rows = await db
        .select({
          timestamp: decisionRecords.timestamp,
          totalBalance: decisionRecords.totalBalance,
          marginUsedPct: decisionRecords.marginUsedPct,
          availableBalance: decisionRecords.availableBalance,
          unrealizedPnl: decisionRecords.totalUnrealizedProfit,
          success: decisionRecords.success,
        })
        .from(decisionRecords)
        .where(eq(decisionRecords.traderId, traderId))
        .orderBy(desc(decisionRecords.timestamp))
        .limit(limit);

      return rows.reverse();
    } catch (err) {
      throw new DataAccessError(
        `failed to read decision records for ${traderId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async function analyzePerformance(limit: number): Promise<PerformanceSummary> {
    let trades: TradeOutcome[];
    try {
      trades = await db
        .select({
          pnl: tradeOutcomes.pnl,
          durationMinutes: tradeOutcomes.durationMinutes,
        })
        .from(tradeOutcomes)
        .where(eq(tradeOutcomes.traderId, traderId))
        .orderBy(desc(tradeOutcomes.closeTime))
        .limit(limit * TRADES_PER_CYCLE);
    } catch (err) {
      throw new DataAccessError(
        `failed to read trade outcomes for ${traderId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const records = await latestRecords(limit);
    return {
      ...summarizeTradeOutcomes(trades),
      sharpeRatio: calculateSharpeRatio(records.map((r) => r.totalBalance)),
    };
  }

  return { analyzePerformance, latestRecords };
}
