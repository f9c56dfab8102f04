import { text as readStream } from "node:stream/consumers";
import { extractNotificationContext, DEFAULT_MAX_CHARS } from "./context-extractor.js";
import { runNotify } from "./notify.js";
import { cancelPendingNotification } from "./debounce.js";
import { injectReply } from "./inject.js";
import { defaultTmuxSession, isValidSessionName, relayHome } from "./session-config.js";

// --- Types ---

export interface CliIO {
  readStdin: () => Promise<string>;
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
}

export const processIO: CliIO = {
  readStdin: () => readStream(process.stdin),
  stdout: (chunk) => process.stdout.write(chunk),
  stderr: (chunk) => process.stderr.write(chunk),
};

// --- extract ---

export interface ExtractArgs {
  /** null means read stdin */
  text: string | null;
  maxChars: number;
}

export function parseExtractArgs(args: string[]): ExtractArgs | { error: string } {
  const [text, budget] = args;
  if (budget === undefined) return { text: text ?? null, maxChars: DEFAULT_MAX_CHARS };
  if (!/^\d+$/.test(budget)) return { error: `max_chars must be a non-negative integer, got ${JSON.stringify(budget)}` };
  return { text: text ?? null, maxChars: parseInt(budget, 10) };
}

/** `extract [text] [max_chars]`: print the notification excerpt of text or stdin. */
export async function runExtractCli(args: string[], io: CliIO = processIO): Promise<number> {
  const parsed = parseExtractArgs(args);
  if ("error" in parsed) {
    io.stderr(`Usage: term-relay-extract [text] [max_chars]\n${parsed.error}\n`);
    return 2;
  }
  const input = parsed.text ?? (await io.readStdin());
  io.stdout(`${extractNotificationContext(input, parsed.maxChars)}\n`);
  return 0;
}

// --- notify ---

export type NotifyCommand =
  | { kind: "notify"; event: string; session: string }
  | { kind: "cancel"; session: string }
  | { kind: "reply"; session: string; text: string };

export function parseNotifyArgs(args: string[], env: NodeJS.ProcessEnv = process.env): NotifyCommand {
  let session = env.RELAY_SESSION || "default";
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if ((args[i] === "--session" || args[i] === "-s") && args[i + 1] !== undefined) {
      session = args[i + 1];
      i++;
    } else {
      positional.push(args[i]);
    }
  }

  const [first, ...rest] = positional;
  if (first === "cancel") return { kind: "cancel", session };
  if (first === "reply") return { kind: "reply", session, text: rest.join(" ") };
  return { kind: "notify", event: first ?? "notification", session };
}

/**
 * Hook entry point. Exits 0 whatever happens to the notification itself,
 * so a chat outage never blocks the agent; only a bad session name or a
 * failed reply is an error.
 */
export async function runNotifyCli(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO
): Promise<number> {
  const command = parseNotifyArgs(args, env);
  if (!isValidSessionName(command.session)) {
    io.stderr(`Invalid session name: ${command.session}. Use only letters, digits, dash and underscore.\n`);
    return 1;
  }

  const home = relayHome(env);
  const tmuxSession = defaultTmuxSession(command.session, env);

  switch (command.kind) {
    case "cancel":
      cancelPendingNotification(command.session, home);
      return 0;
    case "reply": {
      const result = await injectReply(tmuxSession, command.text, command.session, home);
      if (result !== "sent") io.stderr(`Reply not delivered: ${result}\n`);
      return result === "sent" ? 0 : 1;
    }
    case "notify":
      try {
        await runNotify({ session: command.session, event: command.event, home, tmuxSession });
      } catch (err) {
        console.error(`[notify] ${command.session}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return 0;
  }
}
