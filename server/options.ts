import { OPTION_PATTERN } from "./line-classifier.js";

// --- Types ---

export interface DetectedOption {
  number: string;
  label: string;
}

export interface InlineButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboard {
  inline_keyboard: InlineButton[][];
}

// --- Limits ---

const MIN_OPTIONS = 2;
const MAX_BUTTONS = 8;
const MAX_LABEL_CHARS = 37;
// callback_data is capped at 64 bytes by the Bot API
const MAX_SESSION_CHARS = 40;

// --- Detection ---

export function detectOptions(text: string): DetectedOption[] {
  const options: DetectedOption[] = [];
  for (const line of text.split("\n")) {
    const m = line.trimEnd().match(OPTION_PATTERN);
    if (!m) continue;
    const number = m[1] ?? m[2] ?? m[3];
    if (number === undefined) continue;
    options.push({ number, label: m[4].trim() });
  }
  return options;
}

function buttonLabel(option: DetectedOption): string {
  const label =
    option.label.length > MAX_LABEL_CHARS
      ? `${option.label.slice(0, MAX_LABEL_CHARS)}...`
      : option.label;
  return `${option.number}. ${label}`;
}

/**
 * One button per numbered option, so a reply is a single tap.
 * Returns null when the text does not look like a choice (fewer than two
 * options).
 */
export function buildOptionKeyboard(text: string, session: string): InlineKeyboard | null {
  const options = detectOptions(text);
  if (options.length < MIN_OPTIONS) return null;

  const sessionKey = session.slice(0, MAX_SESSION_CHARS);
  return {
    inline_keyboard: options.slice(0, MAX_BUTTONS).map((option) => [
      { text: buttonLabel(option), callback_data: `opt:${sessionKey}:${option.number}` },
    ]),
  };
}
