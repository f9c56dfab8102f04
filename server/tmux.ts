import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const TMUX_TIMEOUT_MS = 10_000;

/** Run one tmux command and return its stdout; rejects when tmux exits non-zero. */
async function runTmux(args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("tmux", args, { timeout: TMUX_TIMEOUT_MS });
  return stdout;
}

export async function hasSession(name: string): Promise<boolean> {
  try {
    await runTmux(["has-session", "-t", name]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Capture the visible pane, plus `historyLines` of scrollback when given.
 * Escape sequences are kept (-e); callers strip them.
 */
export async function capturePane(target: string, historyLines?: number): Promise<string> {
  const args = ["capture-pane", "-p", "-e", "-t", target];
  if (historyLines !== undefined && historyLines > 0) {
    args.push("-S", `-${historyLines}`);
  }
  return runTmux(args);
}

/** Type `keys` literally; `--` keeps a leading dash from being read as a flag. */
export async function sendKeys(target: string, keys: string): Promise<void> {
  await runTmux(["send-keys", "-t", target, "-l", "--", keys]);
}

export async function sendSpecialKey(target: string, key: string): Promise<void> {
  await runTmux(["send-keys", "-t", target, key]);
}
