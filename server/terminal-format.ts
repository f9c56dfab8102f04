// CSI (colours, cursor movement) and OSC (window titles, hyperlinks)
const CSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;
const OSC_PATTERN = /\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

export const DEFAULT_CONTEXT_LINES = 15;

export function stripAnsi(text: string): string {
  return text.replace(OSC_PATTERN, "").replace(CSI_PATTERN, "");
}

/** Drop blank lines and keep the last `lines` of what remains. */
export function tailNonEmpty(text: string, lines: number): string {
  if (lines <= 0) return "";
  const kept = text.split("\n").filter((line) => line.trim() !== "");
  return kept.slice(-lines).join("\n");
}

/**
 * Turn a raw pane capture into the plain text the context extractor
 * expects.
 */
export function formatForNotification(raw: string, lines: number = DEFAULT_CONTEXT_LINES): string {
  return tailNonEmpty(stripAnsi(raw), lines);
}
