/**
 * Trade Outcomes Schema
 *
 * Closed trades with their realized P&L. Aggregated into win rate, profit
 * factor and holding time for the risk monitor.
 */

import {
  pgTable,
  text,
  integer,
  doublePrecision,
  timestamp,
  boolean,
} from "drizzle-orm/pg-core";

export const tradeOutcomes = pgTable("trade_outcomes", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

  traderId: text("trader_id").notNull(),

  symbol: text("symbol").notNull(),

  /** "long" or "short" */
  side: text("side").notNull(),

  quantity: doublePrecision("quantity").notNull(),

  leverage: integer("leverage").notNull(),

  openPrice: doublePrecision("open_price").notNull(),

  closePrice: doublePrecision("close_price").notNull(),

  /** Realized P&L in account currency */
  pnl: doublePrecision("pnl").notNull(),

  pnlPct: doublePrecision("pnl_pct").notNull(),

  durationMinutes: integer("duration_minutes").notNull(),

  openTime: timestamp("open_time", { withTimezone: true }).notNull(),

  closeTime: timestamp("close_time", { withTimezone: true }).notNull(),

  wasStopLoss: boolean("was_stop_loss").default(false).notNull(),

  createdAt: timestamp("created_at").defaultNow().notNull(),
});
