import { watch } from "chokidar";
import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { existsSync, rmSync } from "node:fs";
import { dirname, join } from "node:path";

export type QuietResult = "elapsed" | "cancelled";

// --- Paths ---

export function pendingDir(home: string): string {
  return join(home, "notifications-pending");
}

export function pendingMarkerPath(session: string, home: string): string {
  return join(pendingDir(home), `${session}.pid`);
}

async function readMarker(marker: string): Promise<string | null> {
  try {
    return (await readFile(marker, "utf-8")).trim();
  } catch {
    return null;
  }
}

/**
 * Hold a notification back for `delayMs`.
 *
 * A marker file under notifications-pending/ records the waiting notifier.
 * The wait ends early with "cancelled" when the marker is deleted (the user
 * answered) or rewritten by a newer notifier for the same session. Only the
 * notifier that still owns its marker when the delay runs out gets "elapsed".
 * If the marker cannot be written the result is "elapsed" at once.
 */
export async function waitForQuiet(
  session: string,
  home: string,
  delayMs: number
): Promise<QuietResult> {
  if (delayMs <= 0) return "elapsed";

  const marker = pendingMarkerPath(session, home);
  const token = `${process.pid}:${randomUUID()}`;
  try {
    await mkdir(dirname(marker), { recursive: true });
    await writeFile(marker, token, "utf-8");
  } catch (err) {
    // Without a marker nothing can cancel the wait; send right away instead
    console.error(
      `[debounce] Cannot write marker for ${session}, sending without debounce:`,
      err instanceof Error ? err.message : err
    );
    return "elapsed";
  }

  const watcher = watch(marker, { ignoreInitial: true });

  const result = await new Promise<QuietResult>((resolve) => {
    let settled = false;
    const finish = (outcome: QuietResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(outcome);
    };

    const timer = setTimeout(() => {
      // Events can be missed before the watcher is ready; the marker decides
      void readMarker(marker).then((owner) => finish(owner === token ? "elapsed" : "cancelled"));
    }, delayMs);

    watcher.on("unlink", () => finish("cancelled"));
    watcher.on("change", () => {
      void readMarker(marker).then((owner) => {
        if (owner !== token) finish("cancelled");
      });
    });
    watcher.on("error", (err: unknown) => {
      console.error(`[debounce] watcher error for ${session}:`, err instanceof Error ? err.message : err);
    });
  });

  await watcher.close();
  if (result === "elapsed") await rm(marker, { force: true });
  return result;
}

/**
 * Cancel a debounced notification for `session`.
 * Returns true if one was pending.
 */
export function cancelPendingNotification(session: string, home: string): boolean {
  const marker = pendingMarkerPath(session, home);
  if (!existsSync(marker)) return false;
  rmSync(marker, { force: true });
  return true;
}
