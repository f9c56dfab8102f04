import * as tmux from "./tmux.js";
import { stripAnsi } from "./terminal-format.js";
import { cancelPendingNotification } from "./debounce.js";

// C0/C1 controls and DEL, except tab and newline
const CONTROL_CHARS = /[\x00-\x08\x0b-\x1f\x7f-\x9f]/g;

/** Remove escape sequences and control characters from chat input. */
export function sanitizeInput(text: string): string {
  return stripAnsi(text).replace(CONTROL_CHARS, "");
}

export type InjectResult = "sent" | "no-session" | "empty" | "failed";

/**
 * Type a chat reply into the session's pane and press Enter.
 * A reply also answers whatever notification is still debouncing.
 */
export async function injectReply(
  tmuxSession: string,
  text: string,
  session: string,
  home: string
): Promise<InjectResult> {
  if (!(await tmux.hasSession(tmuxSession))) {
    console.error(`[tmux] session ${tmuxSession} not found`);
    return "no-session";
  }

  const input = sanitizeInput(text);
  if (!input.trim()) return "empty";

  try {
    await tmux.sendKeys(tmuxSession, input);
    await tmux.sendSpecialKey(tmuxSession, "Enter");
  } catch (err) {
    console.error(`[tmux] Failed to inject into ${tmuxSession}:`, err instanceof Error ? err.message : err);
    return "failed";
  }

  cancelPendingNotification(session, home);
  const preview = input.length > 50 ? `${input.slice(0, 50)}...` : input;
  console.log(`[tmux] Injected into ${tmuxSession}: ${preview}`);
  return "sent";
}
