/**
 * Alert Rules
 *
 * The fixed, ordered rule table checked against every fresh snapshot. Order
 * matters: when two rules share a (type, level) pair in one refresh, the
 * ledger keeps the first.
 */

import type {
  AlertThresholds,
  RiskThresholds,
} from "../config/risk-defaults.ts";
import type { AlertLevel, AlertType } from "./alert-ledger.ts";
import type { MetricsSnapshot } from "./risk-calculator.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuleThresholds {
  risk: RiskThresholds;
  alert: AlertThresholds;
}

export interface AlertRule {
  /** Id prefix for alerts raised by this rule */
  key: string;
  type: AlertType;
  level: AlertLevel;
  title: string;
  /** Returns the alert message when the rule fires, null otherwise */
  evaluate(m: MetricsSnapshot, t: RuleThresholds): string | null;
}

export interface AlertCandidate {
  key: string;
  type: AlertType;
  level: AlertLevel;
  title: string;
  message: string;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export const ALERT_RULES: readonly AlertRule[] = [
  {
    key: "risk_score",
    type: "risk",
    level: "critical",
    title: "Extreme risk warning",
    evaluate: (m, t) =>
      m.riskScore >= t.alert.riskScoreCritical
        ? `Risk score reached ${m.riskScore}/100; reduce exposure or stop trading now`
        : null,
  },
  {
    key: "risk_score",
    type: "risk",
    level: "warning",
    title: "High risk warning",
    evaluate: (m, t) =>
      m.riskScore >= t.alert.riskScoreHigh &&
      m.riskScore < t.alert.riskScoreCritical
        ? `Risk score reached ${m.riskScore}/100; trade with caution`
        : null,
  },
  {
    key: "margin_usage",
    type: "risk",
    level: "critical",
    title: "Margin usage too high",
    evaluate: (m, t) =>
      m.marginUsageRate >= t.alert.marginUsageCritical
        ? `Margin usage at ${m.marginUsageRate.toFixed(1)}%, close to liquidation`
        : null,
  },
  {
    key: "max_drawdown",
    type: "risk",
    level: "critical",
    title: "Max drawdown too large",
    evaluate: (m, t) =>
      m.maxDrawdown >= t.alert.maxDrawdownCritical
        ? `Max drawdown reached ${m.maxDrawdown.toFixed(1)}%; consider pausing trading`
        : null,
  },
  {
    key: "sharpe_ratio",
    type: "performance",
    level: "warning",
    title: "Sharpe ratio too low",
    evaluate: (m, t) =>
      m.sharpeRatio < t.risk.sharpeLow
        ? `Sharpe ratio ${m.sharpeRatio.toFixed(2)}; strategy is underperforming`
        : null,
  },
  {
    key: "win_rate",
    type: "performance",
    level: "warning",
    title: "Win rate too low",
    evaluate: (m, t) =>
      m.winRate < t.risk.winRateLow && m.totalTrades >= t.risk.minTradesForStats
        ? `Win rate only ${m.winRate.toFixed(1)}%; strategy needs tuning`
        : null,
  },
  {
    key: "overtrading",
    type: "trade",
    level: "warning",
    title: "Overtrading warning",
    evaluate: (m, t) =>
      m.overtradingScore >= t.alert.overtradingScore
        ? `${m.tradesPerHour.toFixed(1)} trades per hour; possible overtrading`
        : null,
  },
  {
    key: "api_latency",
    type: "system",
    level: "warning",
    title: "API latency too high",
    evaluate: (m, t) =>
      m.apiLatencyMs > t.alert.apiLatencyMs
        ? `API latency ${m.apiLatencyMs.toFixed(0)} ms may delay order execution`
        : null,
  },
  {
    key: "error_rate",
    type: "system",
    level: "warning",
    title: "Error rate too high",
    evaluate: (m, t) =>
      m.errorRate > t.risk.errorRateHigh
        ? `Error rate ${m.errorRate.toFixed(1)}%; the trading system may be unhealthy`
        : null,
  },
];

/**
 * Every rule that fires for this snapshot, in table order.
 */
export function evaluateAlertRules(
  snapshot: MetricsSnapshot,
  thresholds: RuleThresholds,
  rules: readonly AlertRule[] = ALERT_RULES,
): AlertCandidate[] {
  const fired: AlertCandidate[] = [];
  for (const rule of rules) {
    const message = rule.evaluate(snapshot, thresholds);
    if (message !== null) {
      fired.push({
        key: rule.key,
        type: rule.type,
        level: rule.level,
        title: rule.title,
        message,
      });
    }
  }
  return fired;
}
