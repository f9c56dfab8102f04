import * as tmux from "./tmux.js";
import { formatForNotification, DEFAULT_CONTEXT_LINES } from "./terminal-format.js";
import { extractNotificationContext, DEFAULT_MAX_CHARS } from "./context-extractor.js";
import { buildOptionKeyboard } from "./options.js";
import {
  isValidSessionName,
  loadSessionConfig,
  notificationsEnabled,
} from "./session-config.js";
import { waitForQuiet } from "./debounce.js";
import { sendMessage } from "./telegram.js";

// --- Types ---

export type NotifyEvent =
  | "notification"
  | "permission"
  | "idle"
  | "stop"
  | "complete"
  | "error";

export type NotifyResult =
  | "sent"
  | "failed"
  | "disabled"
  | "unconfigured"
  | "invalid-session"
  | "cancelled";

export interface NotifyOptions {
  session: string;
  /** Hook event name; unknown names are sent as a generic alert. */
  event: string;
  home: string;
  tmuxSession: string;
  maxChars?: number;
  contextLines?: number;
}

export const CONTEXT_UNAVAILABLE = "[Terminal context not available]";

// --- Message ---

const EVENT_HEADERS: Record<NotifyEvent, string> = {
  notification: "Awaiting Input",
  permission: "Awaiting Input",
  idle: "Awaiting Input",
  stop: "Task Complete",
  complete: "Task Complete",
  error: "Error",
};

function isNotifyEvent(event: string): event is NotifyEvent {
  return Object.hasOwn(EVENT_HEADERS, event);
}

export function eventHeader(event: string): string {
  return isNotifyEvent(event) ? EVENT_HEADERS[event] : "Alert";
}

export function buildNotificationMessage(session: string, event: string, context: string): string {
  const body = context || "(no output)";
  return `[${session}] ${eventHeader(event)}\n\n${body}\n\nReply here to respond`;
}

// --- Capture ---

export async function captureContext(
  tmuxSession: string,
  lines: number = DEFAULT_CONTEXT_LINES
): Promise<string> {
  if (!(await tmux.hasSession(tmuxSession))) return CONTEXT_UNAVAILABLE;
  try {
    const raw = await tmux.capturePane(tmuxSession, lines);
    return formatForNotification(raw, lines);
  } catch (err) {
    console.error(`[tmux] Failed to capture ${tmuxSession}:`, err instanceof Error ? err.message : err);
    return CONTEXT_UNAVAILABLE;
  }
}

// --- Hook ---

/**
 * Notify the session's chat topic about a hook event: capture the pane,
 * extract the readable part, wait out the debounce, then send it with a
 * keyboard for any numbered options.
 */
export async function runNotify(options: NotifyOptions): Promise<NotifyResult> {
  const { session, event, home, tmuxSession } = options;

  if (!isValidSessionName(session)) {
    console.error(`[notify] Invalid session name: ${JSON.stringify(session)}`);
    return "invalid-session";
  }
  if (!notificationsEnabled(home)) return "disabled";

  const config = loadSessionConfig(session, home);
  if (!config) {
    console.error(`[notify] No chat configured for session ${session}`);
    return "unconfigured";
  }

  const quiet = await waitForQuiet(session, home, config.debounceSeconds * 1000);
  if (quiet === "cancelled") {
    console.log(`[notify] ${session}: superseded before sending`);
    return "cancelled";
  }

  // Captured after the debounce so the excerpt shows the settled screen
  const raw = await captureContext(tmuxSession, options.contextLines);
  const context = extractNotificationContext(raw, options.maxChars ?? DEFAULT_MAX_CHARS);
  const message = buildNotificationMessage(session, event, context);
  const keyboard = buildOptionKeyboard(context, session);

  const ok = await sendMessage(config, message, keyboard);
  if (ok) console.log(`[notify] ${session}: sent ${event} notification`);
  return ok ? "sent" : "failed";
}
