/**
 * Decision Records Schema
 *
 * One row per decision cycle of a trader, including the account state
 * observed when the decision was made. The risk monitor reads the balance
 * and margin columns to build its drawdown and VaR series.
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  boolean,
  index,
} from "drizzle-orm/pg-core";

export const decisionRecords = pgTable(
  "decision_records",
  {
    /** Auto-generated ID */
    id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

    /** Trader this cycle belongs to */
    traderId: text("trader_id").notNull(),

    /** Monotonic cycle counter per trader */
    cycleNumber: integer("cycle_number").notNull(),

    /** When the decision cycle ran */
    timestamp: timestamp("timestamp", { withTimezone: true }).notNull(),

    /** Whether the cycle completed without error */
    success: boolean("success").notNull(),

    errorMessage: text("error_message"),

    /** Account equity at decision time */
    totalBalance: doublePrecision("total_balance").notNull(),

    availableBalance: doublePrecision("available_balance").notNull(),

    totalUnrealizedProfit: doublePrecision("total_unrealized_profit").notNull(),

    positionCount: integer("position_count").notNull(),

    /** Margin in use as a percentage of equity */
    marginUsedPct: doublePrecision("margin_used_pct").notNull(),

    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => [index("idx_decision_records_trader_ts").on(table.traderId, table.timestamp)],
);
