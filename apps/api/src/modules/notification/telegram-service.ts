import { fetch as undiciFetch, ProxyAgent } from "undici";
import { z } from "zod";
import type { Notification, NotificationLevel, Notifier } from "./notifier.js";

export interface TelegramConfig {
  botToken?: string;
  chatId?: string;
  /** Forum topic to post into, for chats with topics enabled. */
  threadId?: number;
  proxyUrl?: string;
  /** Levels delivered without a sound. */
  silentLevels?: NotificationLevel[];
}

export interface SendMessagePayload {
  chat_id: string;
  text: string;
  parse_mode: "HTML";
  disable_web_page_preview: true;
  disable_notification: boolean;
  message_thread_id?: number;
}

const apiErrorSchema = z.object({ description: z.string() });

const proxyAgents = new Map<string, ProxyAgent>();

function proxyAgentFor(proxyUrl: string): ProxyAgent {
  let agent = proxyAgents.get(proxyUrl);
  if (!agent) {
    agent = new ProxyAgent(proxyUrl);
    proxyAgents.set(proxyUrl, agent);
  }
  return agent;
}

export function normalizeProxyUrl(input?: string): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;
  const parsed = new URL(trimmed);
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error("Telegram proxy URL must use http:// or https://");
  }
  return parsed.toString();
}

export function escapeHtml(text: string): string {
  return text.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}

export function buildSendMessagePayload(
  chatId: string,
  notification: Notification,
  options: Pick<TelegramConfig, "threadId" | "silentLevels"> = {}
): SendMessagePayload {
  const payload: SendMessagePayload = {
    chat_id: chatId,
    text: `<b>${escapeHtml(notification.title)}</b>\n${escapeHtml(notification.body)}`,
    parse_mode: "HTML",
    disable_web_page_preview: true,
    disable_notification: (options.silentLevels ?? ["info"]).includes(notification.level)
  };
  if (options.threadId !== undefined) {
    payload.message_thread_id = options.threadId;
  }
  return payload;
}

/** Bot API errors come back as `{ ok: false, description }`. */
async function describeFailure(res: Awaited<ReturnType<typeof undiciFetch>>): Promise<string> {
  const parsed = apiErrorSchema.safeParse(await res.clone().json().catch(() => null));
  if (parsed.success) {
    return parsed.data.description;
  }
  const text = await res.text().catch(() => "");
  return text || "unknown error";
}

export class TelegramService implements Notifier {
  constructor(
    private readonly config: TelegramConfig,
    private readonly fetchImpl: typeof undiciFetch = undiciFetch
  ) {}

  get enabled(): boolean {
    return Boolean(this.config.botToken && this.config.chatId);
  }

  async send(notification: Notification): Promise<void> {
    const { botToken, chatId } = this.config;
    if (!botToken || !chatId) {
      return;
    }

    const proxyUrl = normalizeProxyUrl(this.config.proxyUrl);
    const res = await this.fetchImpl(`https://api.telegram.org/bot${botToken}/sendMessage`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(buildSendMessagePayload(chatId, notification, this.config)),
      ...(proxyUrl ? { dispatcher: proxyAgentFor(proxyUrl) } : {})
    });

    if (!res.ok) {
      throw new Error(`Telegram API error (${res.status}): ${await describeFailure(res)}`);
    }
  }
}
