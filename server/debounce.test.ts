import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "node:events";
import { join } from "node:path";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";

// In-process stand-in for the chokidar watcher; tests emit its events
class FakeWatcher extends EventEmitter {
  close = vi.fn(() => Promise.resolve());
}

let watcher = new FakeWatcher();

vi.mock("chokidar", () => ({
  watch: vi.fn(() => watcher),
}));

const { watch } = await import("chokidar");
const { waitForQuiet, cancelPendingNotification, pendingMarkerPath } = await import("./debounce.js");

// ─── Helpers ─────────────────────────────────────────────────────────────────

function makeTmpDir(): string {
  const dir = join(tmpdir(), `relay-debounce-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

async function watcherStarted(): Promise<void> {
  await vi.waitFor(() => expect(watch).toHaveBeenCalled());
}

// ─── waitForQuiet ────────────────────────────────────────────────────────────

describe("waitForQuiet", () => {
  let home: string;

  beforeEach(() => {
    home = makeTmpDir();
    watcher = new FakeWatcher();
    vi.mocked(watch).mockClear();
  });
  afterEach(() => { rmSync(home, { recursive: true, force: true }); });

  it("returns immediately without a marker when debounce is off", async () => {
    expect(await waitForQuiet("api", home, 0)).toBe("elapsed");
    expect(watch).not.toHaveBeenCalled();
    expect(existsSync(pendingMarkerPath("api", home))).toBe(false);
  });

  it("writes a marker naming this process while waiting", async () => {
    const pending = waitForQuiet("api", home, 5_000);
    await watcherStarted();
    const owner = readFileSync(pendingMarkerPath("api", home), "utf-8");
    expect(owner.startsWith(`${process.pid}:`)).toBe(true);
    watcher.emit("unlink", pendingMarkerPath("api", home));
    await pending;
  });

  it("elapses and removes its marker when nothing interrupts", async () => {
    expect(await waitForQuiet("api", home, 20)).toBe("elapsed");
    expect(existsSync(pendingMarkerPath("api", home))).toBe(false);
    expect(watcher.close).toHaveBeenCalledTimes(1);
  });

  it("is cancelled as soon as the marker is deleted", async () => {
    const pending = waitForQuiet("api", home, 60_000);
    await watcherStarted();
    expect(cancelPendingNotification("api", home)).toBe(true);
    watcher.emit("unlink", pendingMarkerPath("api", home));
    expect(await pending).toBe("cancelled");
    expect(watcher.close).toHaveBeenCalledTimes(1);
  });

  it("is cancelled when a newer notifier takes over the marker", async () => {
    const pending = waitForQuiet("api", home, 60_000);
    await watcherStarted();
    writeFileSync(pendingMarkerPath("api", home), "99999:newer", "utf-8");
    watcher.emit("change", pendingMarkerPath("api", home));
    expect(await pending).toBe("cancelled");
    // The newer notifier's marker stays
    expect(readFileSync(pendingMarkerPath("api", home), "utf-8")).toBe("99999:newer");
  });

  it("sends at once when the marker cannot be written", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    writeFileSync(join(home, "notifications-pending"), "not a directory");
    expect(await waitForQuiet("api", home, 1_000)).toBe("elapsed");
    expect(watch).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toBe(
      "[debounce] Cannot write marker for api, sending without debounce:"
    );
    vi.mocked(console.error).mockRestore();
  });

  it("checks the marker when the delay ends even if no event arrived", async () => {
    const pending = waitForQuiet("api", home, 500);
    await watcherStarted();
    rmSync(pendingMarkerPath("api", home));
    expect(await pending).toBe("cancelled");
  });
});

// ─── cancelPendingNotification ───────────────────────────────────────────────

describe("cancelPendingNotification", () => {
  let home: string;

  beforeEach(() => { home = makeTmpDir(); });
  afterEach(() => { rmSync(home, { recursive: true, force: true }); });

  it("removes a pending marker", () => {
    mkdirSync(join(home, "notifications-pending"));
    writeFileSync(pendingMarkerPath("api", home), "123:abc");
    expect(cancelPendingNotification("api", home)).toBe(true);
    expect(existsSync(pendingMarkerPath("api", home))).toBe(false);
  });

  it("leaves other sessions alone", () => {
    mkdirSync(join(home, "notifications-pending"));
    writeFileSync(pendingMarkerPath("web", home), "123:abc");
    expect(cancelPendingNotification("api", home)).toBe(false);
    expect(existsSync(pendingMarkerPath("web", home))).toBe(true);
  });

  it("is a no-op when the pending directory does not exist", () => {
    expect(cancelPendingNotification("api", home)).toBe(false);
  });
});
