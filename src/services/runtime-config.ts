/**
 * Runtime Configuration Provider
 *
 * Hot-reloadable query limits, risk thresholds, risk-score weights and alert
 * thresholds. The monitor engine asks its provider on every refresh and never
 * caches the answer, so an edit to the `system_configs` table (or a call to
 * `update()` on the static provider) takes effect on the next iteration.
 */

import { z } from "zod";
import type { Database } from "../db/index.ts";
import { systemConfigs } from "../db/schema/index.ts";
import {
  DEFAULT_ALERT_THRESHOLDS,
  DEFAULT_QUERY_LIMITS,
  DEFAULT_RISK_SCORES,
  DEFAULT_RISK_THRESHOLDS,
  type AlertThresholds,
  type QueryLimits,
  type RiskScores,
  type RiskThresholds,
} from "../config/risk-defaults.ts";
import { DataAccessError, errorMessage } from "../lib/errors.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RuntimeConfigProvider {
  queryLimits(): Promise<QueryLimits>;
  riskThresholds(): Promise<RiskThresholds>;
  riskScores(): Promise<RiskScores>;
  alertThresholds(): Promise<AlertThresholds>;
}

export interface RuntimeConfigValues {
  queryLimits: QueryLimits;
  riskThresholds: RiskThresholds;
  riskScores: RiskScores;
  alertThresholds: AlertThresholds;
}

export interface RuntimeConfigOverrides {
  queryLimits?: Partial<QueryLimits>;
  riskThresholds?: Partial<RiskThresholds>;
  riskScores?: Partial<RiskScores>;
  alertThresholds?: Partial<AlertThresholds>;
}

export interface StaticRuntimeConfig extends RuntimeConfigProvider {
  /** Replace part of the configuration; visible on the next read. */
  update(overrides: RuntimeConfigOverrides): void;
}

// ---------------------------------------------------------------------------
// Key mapping (system_configs.key → field)
// ---------------------------------------------------------------------------

const QUERY_LIMIT_KEYS: Record<keyof QueryLimits, string> = {
  performanceLimit: "query_limit_performance",
  monitoringLimit: "query_limit_monitoring",
};

const RISK_THRESHOLD_KEYS: Record<keyof RiskThresholds, string> = {
  marginHigh: "risk_margin_high_threshold",
  marginMedium: "risk_margin_medium_threshold",
  drawdownCritical: "risk_drawdown_critical_threshold",
  drawdownHigh: "risk_drawdown_high_threshold",
  drawdownMedium: "risk_drawdown_medium_threshold",
  sharpeLow: "risk_sharpe_low_threshold",
  sharpePoor: "risk_sharpe_poor_threshold",
  winRateLow: "risk_winrate_low_threshold",
  errorRateHigh: "risk_error_rate_high_threshold",
  minTradesForStats: "risk_min_trades_for_stats",
};

const RISK_SCORE_KEYS: Record<keyof RiskScores, string> = {
  marginHighScore: "risk_score_margin_high",
  marginMediumScore: "risk_score_margin_medium",
  drawdownCriticalScore: "risk_score_drawdown_critical",
  drawdownHighScore: "risk_score_drawdown_high",
  drawdownMediumScore: "risk_score_drawdown_medium",
  sharpeLowScore: "risk_score_sharpe_low",
  sharpePoorScore: "risk_score_sharpe_poor",
};

const ALERT_THRESHOLD_KEYS: Record<keyof AlertThresholds, string> = {
  riskScoreCritical: "alert_risk_score_critical",
  riskScoreHigh: "alert_risk_score_high",
  marginUsageCritical: "alert_margin_usage_critical",
  maxDrawdownCritical: "alert_max_drawdown_critical",
  apiLatencyMs: "alert_api_latency_ms",
  overtradingScore: "alert_overtrading_score",
};

/** Fields stored as integers; everything else is a float. */
const INTEGER_FIELDS = new Set<string>([
  "performanceLimit",
  "monitoringLimit",
  "minTradesForStats",
  ...Object.keys(RISK_SCORE_KEYS),
]);

const floatValue = z.coerce.number().finite();
const intValue = z.coerce.number().int();
const positiveIntValue = intValue.positive();

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function resolveSection<T extends object>(
  entries: ReadonlyMap<string, string>,
  keys: Readonly<Record<string, string>>,
  defaults: T,
  schemaFor: (field: string) => z.ZodType<number>,
): T {
  const section = { ...defaults };
  for (const [field, key] of Object.entries(keys)) {
    const raw = entries.get(key);
    if (raw === undefined || raw.trim() === "") continue;
    const parsed = schemaFor(field).safeParse(raw);
    if (parsed.success) {
      Object.assign(section, { [field]: parsed.data });
    }
  }
  return section;
}

/**
 * Build the full configuration from raw key/value entries. Missing or
 * malformed values fall back to the defaults.
 */
export function resolveRuntimeConfig(
  entries: ReadonlyMap<string, string>,
): RuntimeConfigValues {
  return {
    queryLimits: resolveSection(
      entries,
      QUERY_LIMIT_KEYS,
      DEFAULT_QUERY_LIMITS,
      () => positiveIntValue,
    ),
    riskThresholds: resolveSection(
      entries,
      RISK_THRESHOLD_KEYS,
      DEFAULT_RISK_THRESHOLDS,
      (field) => (INTEGER_FIELDS.has(field) ? intValue : floatValue),
    ),
    riskScores: resolveSection(
      entries,
      RISK_SCORE_KEYS,
      DEFAULT_RISK_SCORES,
      () => intValue,
    ),
    alertThresholds: resolveSection(
      entries,
      ALERT_THRESHOLD_KEYS,
      DEFAULT_ALERT_THRESHOLDS,
      () => floatValue,
    ),
  };
}

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

/**
 * In-process provider seeded from the defaults.
 */
export function createStaticRuntimeConfig(
  overrides: RuntimeConfigOverrides = {},
): StaticRuntimeConfig {
  let values: RuntimeConfigValues = resolveRuntimeConfig(new Map());

  function update(next: RuntimeConfigOverrides): void {
    values = {
      queryLimits: { ...values.queryLimits, ...next.queryLimits },
      riskThresholds: { ...values.riskThresholds, ...next.riskThresholds },
      riskScores: { ...values.riskScores, ...next.riskScores },
      alertThresholds: { ...values.alertThresholds, ...next.alertThresholds },
    };
  }

  update(overrides);

  return {
    update,
    queryLimits: async () => ({ ...values.queryLimits }),
    riskThresholds: async () => ({ ...values.riskThresholds }),
    riskScores: async () => ({ ...values.riskScores }),
    alertThresholds: async () => ({ ...values.alertThresholds }),
  };
}

/**
 * Provider backed by the `system_configs` table. Reads the table on every
 * call.
 */
export function createDbRuntimeConfig(db: Database): RuntimeConfigProvider {
  async function load(): Promise<RuntimeConfigValues> {
    try {
      const rows = await db
        .select({ key: systemConfigs.key, value: systemConfigs.value })
        .from(systemConfigs);
      return resolveRuntimeConfig(new Map(rows.map((r) => [r.key, r.value])));
    } catch (err) {
      throw new DataAccessError(
        `failed to read system_configs: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  return {
    queryLimits: async () => (await load()).queryLimits,
    riskThresholds: async () => (await load()).riskThresholds,
    riskScores: async () => (await load()).riskScores,
    alertThresholds: async () => (await load()).alertThresholds,
  };
}
