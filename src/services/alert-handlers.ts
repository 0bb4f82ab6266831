/**
 * Alert Handlers
 *
 * Delivery targets for admitted alerts. The monitor engine invokes every
 * registered handler independently; a handler that throws is logged and
 * otherwise ignored. Nothing here retries.
 *
 * - Webhook: signed JSON POST (HMAC-SHA256 over the body)
 * - Discord: embed posted to a channel webhook
 */

import { createHmac } from "crypto";
import { HandlerError, errorMessage } from "../lib/errors.ts";
import type { Alert, AlertLevel } from "./alert-ledger.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AlertHandler {
  /** Used in logs when the handler fails */
  name: string;
  handle(alert: Readonly<Alert>): Promise<void> | void;
}

export interface WebhookHandlerOptions {
  url: string;
  /** HMAC signing secret; unsigned when omitted */
  secret?: string;
  timeoutMs?: number;
}

export interface DiscordHandlerOptions {
  webhookUrl: string;
  username?: string;
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** HTTP timeout for alert delivery requests: 10 seconds */
const DELIVERY_TIMEOUT_MS = 10_000;

const LEVEL_COLORS: Record<AlertLevel, number> = {
  info: 0x2979ff, // Blue
  warning: 0xffab00, // Amber
  critical: 0xff1744, // Red
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function signPayload(payload: string, secret: string): string {
  return createHmac("sha256", secret).update(payload).digest("hex");
}

async function post(
  handler: string,
  alert: Readonly<Alert>,
  url: string,
  init: { headers: Record<string, string>; body: string; timeoutMs: number },
): Promise<void> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: init.headers,
      body: init.body,
      signal: AbortSignal.timeout(init.timeoutMs),
    });
  } catch (err) {
    throw new HandlerError(handler, alert.id, errorMessage(err), { cause: err });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "no body");
    throw new HandlerError(handler, alert.id, `HTTP ${response.status}: ${body}`);
  }
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

/**
 * POST each alert as JSON. With a secret, the body is signed and the
 * signature sent as `X-Monitor-Signature: sha256=<hex>`.
 */
export function createWebhookAlertHandler(
  options: WebhookHandlerOptions,
): AlertHandler {
  const name = "webhook";
  return {
    name,
    async handle(alert) {
      const body = JSON.stringify({ event: "alert_raised", alert });
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
        "X-Monitor-Event": "alert_raised",
        "X-Monitor-Alert-Id": alert.id,
        "User-Agent": "Trader-Risk-Monitor/1.0",
      };
      if (options.secret) {
        headers["X-Monitor-Signature"] = `sha256=${signPayload(body, options.secret)}`;
      }
      await post(name, alert, options.url, {
        headers,
        body,
        timeoutMs: options.timeoutMs ?? DELIVERY_TIMEOUT_MS,
      });
    },
  };
}

/**
 * Post each alert to a Discord channel as a colour-coded embed.
 */
export function createDiscordAlertHandler(
  options: DiscordHandlerOptions,
): AlertHandler {
  const name = "discord";
  return {
    name,
    async handle(alert) {
      const body = JSON.stringify({
        username: options.username ?? "Risk Monitor",
        embeds: [
          {
            title: `[${alert.level.toUpperCase()}] ${alert.title}`,
            description: alert.message,
            color: LEVEL_COLORS[alert.level],
            fields: [
              { name: "Trader", value: alert.traderId, inline: true },
              { name: "Category", value: alert.type, inline: true },
            ],
            footer: { text: alert.id },
            timestamp: alert.raisedAt,
          },
        ],
      });
      await post(name, alert, options.webhookUrl, {
        headers: { "Content-Type": "application/json" },
        body,
        timeoutMs: options.timeoutMs ?? DELIVERY_TIMEOUT_MS,
      });
    },
  };
}
