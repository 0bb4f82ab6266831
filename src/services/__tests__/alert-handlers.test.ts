/**
 * Alert Handler Tests
 *
 * Validates webhook and Discord delivery against a stubbed fetch:
 * request shape, HMAC signing, and HandlerError on failure.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import {
  createDiscordAlertHandler,
  createWebhookAlertHandler,
  signPayload,
} from "../alert-handlers.ts";
import type { Alert } from "../alert-ledger.ts";
import { HandlerError } from "../../lib/errors.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const alert: Alert = {
  id: "margin_usage_1772442000",
  traderId: "trader-a",
  type: "risk",
  level: "critical",
  title: "Margin usage too high",
  message: "Margin usage at 85.0%, close to liquidation",
  raisedAt: "2026-03-02T09:00:00.000Z",
  resolvedAt: null,
};

function stubFetch(response: () => Promise<Response>) {
  const fetchMock = vi.fn((_url: string, _init?: RequestInit) => response());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Alert Handlers", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("signPayload", () => {
    it("should be deterministic per secret", () => {
      const a = signPayload('{"x":1}', "test-secret");
      expect(a).toMatch(/^[0-9a-f]{64}$/);
      expect(signPayload('{"x":1}', "test-secret")).toBe(a);
      expect(signPayload('{"x":1}', "other-secret")).not.toBe(a);
    });
  });

  describe("webhook handler", () => {
    it("should POST the alert as signed JSON", async () => {
      const fetchMock = stubFetch(async () => new Response("ok", { status: 200 }));
      const handler = createWebhookAlertHandler({
        url: "https://hooks.example.test/risk",
        secret: "test-secret",
      });

      await handler.handle(alert);

      expect(handler.name).toBe("webhook");
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      const body = JSON.stringify({ event: "alert_raised", alert });
      expect(url).toBe("https://hooks.example.test/risk");
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(body);
      expect(init?.headers).toEqual({
        "Content-Type": "application/json",
        "X-Monitor-Event": "alert_raised",
        "X-Monitor-Alert-Id": "margin_usage_1772442000",
        "User-Agent": "Trader-Risk-Monitor/1.0",
        "X-Monitor-Signature": `sha256=${signPayload(body, "test-secret")}`,
      });
    });

    it("should omit the signature without a secret", async () => {
      const fetchMock = stubFetch(async () => new Response(null, { status: 204 }));
      await createWebhookAlertHandler({ url: "https://hooks.example.test/risk" }).handle(alert);

      const init = fetchMock.mock.calls[0][1];
      expect(init?.headers).not.toHaveProperty("X-Monitor-Signature");
    });

    it("should throw HandlerError on a non-2xx response", async () => {
      stubFetch(async () => new Response("boom", { status: 500 }));
      const handler = createWebhookAlertHandler({ url: "https://hooks.example.test/risk" });

      const failure = handler.handle(alert);
      await expect(failure).rejects.toBeInstanceOf(HandlerError);
      await expect(failure).rejects.toThrow("webhook: HTTP 500: boom");
    });

    it("should throw HandlerError when the request fails", async () => {
      stubFetch(async () => {
        throw new Error("ECONNREFUSED");
      });
      const handler = createWebhookAlertHandler({ url: "https://hooks.example.test/risk" });

      await expect(handler.handle(alert)).rejects.toMatchObject({
        name: "HandlerError",
        handler: "webhook",
        alertId: "margin_usage_1772442000",
        message: "webhook: ECONNREFUSED",
      });
    });
  });

  describe("discord handler", () => {
    it("should post a colour-coded embed", async () => {
      const fetchMock = stubFetch(async () => new Response(null, { status: 204 }));
      const handler = createDiscordAlertHandler({
        webhookUrl: "https://discord.example.test/api/webhooks/1/test-token",
      });

      await handler.handle(alert);

      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe("https://discord.example.test/api/webhooks/1/test-token");
      expect(JSON.parse(String(init?.body))).toEqual({
        username: "Risk Monitor",
        embeds: [
          {
            title: "[CRITICAL] Margin usage too high",
            description: "Margin usage at 85.0%, close to liquidation",
            color: 0xff1744,
            fields: [
              { name: "Trader", value: "trader-a", inline: true },
              { name: "Category", value: "risk", inline: true },
            ],
            footer: { text: "margin_usage_1772442000" },
            timestamp: "2026-03-02T09:00:00.000Z",
          },
        ],
      });
    });

    it("should throw HandlerError when Discord rejects the post", async () => {
      stubFetch(async () => new Response("rate limited", { status: 429 }));
      const handler = createDiscordAlertHandler({
        webhookUrl: "https://discord.example.test/api/webhooks/1/test-token",
      });

      await expect(handler.handle(alert)).rejects.toThrow(
        "discord: HTTP 429: rate limited",
      );
    });
  });
});
