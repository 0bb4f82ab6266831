import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().default(""),
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Traders to monitor, comma-separated (e.g. "binance_main,okx_swing")
  MONITOR_TRADER_IDS: z
    .string()
    .optional()
    .default("")
    .transform((val) =>
      val
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    ),
  MONITOR_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),

  // Alert delivery (optional; alerts are still logged without them)
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  ALERT_WEBHOOK_SECRET: z.string().optional(),
  DISCORD_ALERTS_WEBHOOK_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  return result.data;
}
