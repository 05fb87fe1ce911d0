import { type fetch as undiciFetch, Response } from "undici";
import { describe, expect, it, vi } from "vitest";
import type { Notification } from "../notifier.js";
import { TelegramService, buildSendMessagePayload, escapeHtml, normalizeProxyUrl } from "../telegram-service.js";

function fetchReturning(response: () => Response) {
  return vi.fn<typeof undiciFetch>(async () => response());
}

const failure: Notification = {
  level: "error",
  title: "Auto-save error",
  body: "Backup of Survival~Muldraugh failed: disk full"
};

describe("TelegramService", () => {
  it("is disabled and sends nothing without a bot token and chat id", async () => {
    const fetchImpl = fetchReturning(() => new Response("{}"));
    const service = new TelegramService({ botToken: "test-token" }, fetchImpl);

    await service.send(failure);

    expect(service.enabled).toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("posts the notification to the bot's chat", async () => {
    const fetchImpl = fetchReturning(() => new Response("{}"));
    const service = new TelegramService({ botToken: "test-token", chatId: "42" }, fetchImpl);

    await service.send(failure);

    expect(service.enabled).toBe(true);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: "42",
      text: "<b>Auto-save error</b>\nBackup of Survival~Muldraugh failed: disk full",
      parse_mode: "HTML",
      disable_web_page_preview: true,
      disable_notification: false
    });
    expect(init?.dispatcher).toBeUndefined();
  });

  it("posts into the configured forum topic", async () => {
    const fetchImpl = fetchReturning(() => new Response("{}"));
    const service = new TelegramService({ botToken: "test-token", chatId: "42", threadId: 7 }, fetchImpl);

    await service.send(failure);

    const [, init] = fetchImpl.mock.calls[0];
    expect(JSON.parse(String(init?.body)).message_thread_id).toBe(7);
  });

  it("raises the description from a Bot API error", async () => {
    const fetchImpl = fetchReturning(
      () => new Response(JSON.stringify({ ok: false, description: "Bad Request: chat not found" }), { status: 400 })
    );
    const service = new TelegramService({ botToken: "test-token", chatId: "42" }, fetchImpl);

    await expect(service.send(failure)).rejects.toThrow("Telegram API error (400): Bad Request: chat not found");
  });

  it("falls back to the response text when the error is not JSON", async () => {
    const fetchImpl = fetchReturning(() => new Response("bad gateway", { status: 502 }));
    const service = new TelegramService({ botToken: "test-token", chatId: "42" }, fetchImpl);

    await expect(service.send(failure)).rejects.toThrow("Telegram API error (502): bad gateway");
  });
});

describe("buildSendMessagePayload", () => {
  it("escapes markup in titles and bodies", () => {
    expect(escapeHtml("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");

    const payload = buildSendMessagePayload("42", { level: "warning", title: "<Limit>", body: "Tom & Jerry" });

    expect(payload.text).toBe("<b>&lt;Limit&gt;</b>\nTom &amp; Jerry");
  });

  it("delivers info quietly unless other levels are chosen", () => {
    const info: Notification = { level: "info", title: "Auto-save complete", body: "Backups created for: A~1" };

    expect(buildSendMessagePayload("42", info).disable_notification).toBe(true);
    expect(buildSendMessagePayload("42", failure).disable_notification).toBe(false);
    expect(buildSendMessagePayload("42", info, { silentLevels: [] }).disable_notification).toBe(false);
    expect(buildSendMessagePayload("42", info).message_thread_id).toBeUndefined();
  });
});

describe("normalizeProxyUrl", () => {
  it("accepts http and https proxies and ignores blanks", () => {
    expect(normalizeProxyUrl("  ")).toBeNull();
    expect(normalizeProxyUrl(undefined)).toBeNull();
    expect(normalizeProxyUrl("http://127.0.0.1:7890")).toBe("http://127.0.0.1:7890/");
  });

  it("rejects other schemes", () => {
    expect(() => normalizeProxyUrl("socks5://127.0.0.1:1080")).toThrow(
      "Telegram proxy URL must use http:// or https://"
    );
  });
});
