import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

// --- Types ---

export interface SessionConfig {
  botToken: string;
  chatId: string;
  /** Forum topic (message thread) the session posts into. */
  topicId: string | null;
  debounceSeconds: number;
}

// --- Paths ---

export function relayHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.RELAY_HOME || join(homedir(), ".term-relay");
}

export function sessionConfigPath(session: string, home: string): string {
  return join(home, "sessions", `${session}.conf`);
}

export function globalConfigPath(home: string): string {
  return join(home, "telegram-remote.conf");
}

export function notifyFlagPath(home: string): string {
  return join(home, "notifications-enabled");
}

export function defaultTmuxSession(session: string, env: NodeJS.ProcessEnv = process.env): string {
  return env.TMUX_SESSION || `relay-${session}`;
}

// --- Validation ---

const SESSION_NAME = /^[A-Za-z0-9_-]+$/;

export function isValidSessionName(name: string): boolean {
  return SESSION_NAME.test(name);
}

export function notificationsEnabled(home: string): boolean {
  return existsSync(notifyFlagPath(home));
}

/** Keep enough of a secret to recognise it in a log line. */
export function maskSecret(value: string): string {
  if (value.length <= 8) return "***";
  return `${value.slice(0, 3)}...${value.slice(-2)}`;
}

// --- Parsing ---

const ASSIGNMENT = /^(?:export\s+)?([A-Z_][A-Z0-9_]*)=(.*)$/;

function unquote(value: string): string {
  return value.replace(/^(["'])(.*)\1$/, "$2");
}

/**
 * Parse KEY=value lines. Values are taken literally (never expanded or
 * executed); comments, blank lines and anything that is not an upper-case
 * assignment are skipped.
 */
export function parseConfigFile(raw: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const m = trimmed.match(ASSIGNMENT);
    if (!m) continue;
    values[m[1]] = unquote(m[2].trim());
  }
  return values;
}

function parseDebounce(value: string | undefined): number {
  if (!value) return 0;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

/**
 * Load a session's chat settings from sessions/<name>.conf, falling back to
 * the global telegram-remote.conf.
 * Returns null if neither exists or the token or chat id is missing.
 */
export function loadSessionConfig(session: string, home: string): SessionConfig | null {
  const candidates = [sessionConfigPath(session, home), globalConfigPath(home)];
  const file = candidates.find((path) => existsSync(path));
  if (!file) return null;

  let raw: string;
  try {
    raw = readFileSync(file, "utf-8");
  } catch (err) {
    console.error(`[config] Failed to read ${file}:`, err instanceof Error ? err.message : err);
    return null;
  }

  const values = parseConfigFile(raw);
  const botToken = values.TELEGRAM_BOT_TOKEN;
  const chatId = values.TELEGRAM_CHAT_ID;
  if (!botToken || !chatId) return null;

  return {
    botToken,
    chatId,
    topicId: values.TELEGRAM_TOPIC_ID || null,
    debounceSeconds: parseDebounce(values.NOTIFY_DEBOUNCE),
  };
}
