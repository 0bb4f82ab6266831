/**
 * System Configs Schema
 *
 * Key/value runtime settings (query limits, risk thresholds, score weights).
 * Edited externally; the monitor re-reads them on every refresh.
 */

import { pgTable, text, integer, timestamp } from "drizzle-orm/pg-core";

export const systemConfigs = pgTable("system_configs", {
  id: integer("id").primaryKey().generatedAlwaysAsIdentity(),

  /** Setting name, e.g. "risk_margin_high_threshold" */
  key: text("key").notNull().unique(),

  /** Raw value; parsed by the runtime config provider */
  value: text("value").notNull(),

  description: text("description"),

  /** Grouping such as "risk", "database", "alert" */
  configType: text("config_type").notNull(),

  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});
