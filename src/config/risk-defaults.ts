/**
 * Default Risk Configuration
 *
 * Fallback values for the runtime configuration providers. The monitor
 * engine never reads these directly: it asks its configuration provider on
 * every refresh, and the providers fall back to these when a key is unset.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueryLimits {
  /** Trade lookback passed to analyzePerformance() */
  performanceLimit: number;
  /** Number of most recent decision records fetched per refresh */
  monitoringLimit: number;
}

export interface RiskThresholds {
  marginHigh: number;
  marginMedium: number;
  drawdownCritical: number;
  drawdownHigh: number;
  drawdownMedium: number;
  sharpeLow: number;
  sharpePoor: number;
  winRateLow: number;
  errorRateHigh: number;
  minTradesForStats: number;
}

export interface RiskScores {
  marginHighScore: number;
  marginMediumScore: number;
  drawdownCriticalScore: number;
  drawdownHighScore: number;
  drawdownMediumScore: number;
  sharpeLowScore: number;
  sharpePoorScore: number;
}

export interface AlertThresholds {
  riskScoreCritical: number;
  riskScoreHigh: number;
  /** Margin usage (%) at or above which a critical risk alert fires */
  marginUsageCritical: number;
  /** Max drawdown (%) at or above which a critical risk alert fires */
  maxDrawdownCritical: number;
  apiLatencyMs: number;
  overtradingScore: number;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_QUERY_LIMITS: QueryLimits = {
  performanceLimit: 100,
  monitoringLimit: 50,
};

/**
 * Margin usage and drawdown are percentages; Sharpe thresholds are unitless.
 * Win rate below 30% only raises an alert once at least 10 trades exist.
 */
export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  marginHigh: 50,
  marginMedium: 20,
  drawdownCritical: 30,
  drawdownHigh: 20,
  drawdownMedium: 10,
  sharpeLow: -0.5,
  sharpePoor: 0,
  winRateLow: 30,
  errorRateHigh: 10,
  minTradesForStats: 10,
};

/** Points each tier adds to the composite risk score. */
export const DEFAULT_RISK_SCORES: RiskScores = {
  marginHighScore: 20,
  marginMediumScore: 10,
  drawdownCriticalScore: 30,
  drawdownHighScore: 20,
  drawdownMediumScore: 10,
  sharpeLowScore: 20,
  sharpePoorScore: 10,
};

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  riskScoreCritical: 80,
  riskScoreHigh: 60,
  marginUsageCritical: 80,
  maxDrawdownCritical: 30,
  apiLatencyMs: 5000,
  overtradingScore: 70,
};
