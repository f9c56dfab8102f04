import { setTimeout as sleep } from "node:timers/promises";
import type { InlineKeyboard } from "./options.js";
import { maskSecret, type SessionConfig } from "./session-config.js";

// --- Types ---

export interface SendMessageBody {
  chat_id: string;
  text: string;
  message_thread_id?: number;
  reply_markup?: InlineKeyboard;
}

// --- Request building ---

const API_BASE = "https://api.telegram.org";

export function sendMessageUrl(botToken: string): string {
  return `${API_BASE}/bot${botToken}/sendMessage`;
}

/**
 * Plain text only: no parse_mode is set, so terminal content reaches the
 * chat exactly as extracted.
 */
export function buildSendMessageBody(
  config: Pick<SessionConfig, "chatId" | "topicId">,
  text: string,
  keyboard: InlineKeyboard | null = null
): SendMessageBody {
  const body: SendMessageBody = { chat_id: config.chatId, text };
  if (config.topicId) {
    const thread = Number(config.topicId);
    if (Number.isInteger(thread)) body.message_thread_id = thread;
  }
  if (keyboard) body.reply_markup = keyboard;
  return body;
}

async function isOkResponse(res: Response): Promise<boolean> {
  if (!res.ok) return false;
  try {
    const data: unknown = await res.json();
    return typeof data === "object" && data !== null && "ok" in data && data.ok === true;
  } catch {
    return false;
  }
}

// --- Dispatcher ---

// Pause before each attempt; the first goes out at once
const ATTEMPT_DELAYS_MS = [0, 1000, 2000];
const REQUEST_TIMEOUT_MS = 5000;

type Attempt = { delivered: true } | { delivered: false; reason: string };

async function postOnce(url: string, body: string): Promise<Attempt> {
  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (await isOkResponse(res)) return { delivered: true };
    return { delivered: false, reason: `HTTP ${res.status}` };
  } catch (err) {
    return { delivered: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * POST a message to the session's chat (and topic) with retry.
 * Returns true when the Bot API answers ok, false after all attempts fail.
 */
export async function sendMessage(
  config: SessionConfig,
  text: string,
  keyboard: InlineKeyboard | null = null
): Promise<boolean> {
  const body = JSON.stringify(buildSendMessageBody(config, text, keyboard));
  const url = sendMessageUrl(config.botToken);
  const bot = maskSecret(config.botToken);

  for (const [index, delay] of ATTEMPT_DELAYS_MS.entries()) {
    if (delay > 0) await sleep(delay);
    const attempt = await postOnce(url, body);
    if (attempt.delivered) return true;
    console.error(`[telegram] sendMessage (bot ${bot}) error on attempt ${index + 1}: ${attempt.reason}`);
  }
  return false;
}
