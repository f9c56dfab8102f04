import {
  classifyLines,
  LineCategory,
  NATURAL_LANGUAGE,
  NOISE,
  type ClassifiedLine,
} from "./line-classifier.js";

export const DEFAULT_MAX_CHARS = 500;

// Below this many characters the extraction is considered a miss
const MIN_USEFUL_CHARS = 10;

const TRAILING_PROMPT = new Set<LineCategory>([LineCategory.PROMPT, LineCategory.EMPTY]);

// Status bars and key hints at the bottom of the screen look like code
const TRAILING_CHROME = new Set<LineCategory>([...NOISE, LineCategory.EMPTY]);

function isBlank(line: string): boolean {
  return line.trim() === "";
}

// Code points, so an emoji costs one character like any other
function charCount(text: string): number {
  return [...text].length;
}

function trimTrailing(classified: ClassifiedLine[], categories: Set<LineCategory>): void {
  while (classified.length > 0 && categories.has(classified[classified.length - 1].category)) {
    classified.pop();
  }
}

/**
 * Keep whole lines from the end of `lines` while each one's length plus its
 * newline fits into `maxChars`, then restore top-to-bottom order.
 * The last non-blank line is always kept whole, even over budget.
 */
function takeFromBottom(lines: string[], maxChars: number): string {
  const kept: string[] = [];
  let total = 0;
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (kept.length === 0 && isBlank(line)) continue;
    const cost = charCount(line) + 1;
    if (total + cost > maxChars) {
      if (kept.length === 0) kept.push(line);
      break;
    }
    kept.push(line);
    total += cost;
  }
  return kept.reverse().join("\n").trim();
}

function collapseBlankRuns(lines: string[]): string[] {
  const out: string[] = [];
  let prevBlank = false;
  for (const line of lines) {
    const blank = isBlank(line);
    if (blank && prevBlank) continue;
    out.push(line);
    prevBlank = blank;
  }
  return out;
}

/**
 * Extract the natural-language part of a block of terminal output:
 * questions, summaries, numbered options and bullet lists.
 *
 * Works backwards from the end, since the most recent output is the most
 * relevant, and stops at the first code, diff or file-path block. When that
 * yields almost nothing, falls back to as much of the end of the input as
 * fits in `maxChars`. Input must already be ANSI-stripped; content is never
 * escaped.
 */
export function extractNotificationContext(
  text: string,
  maxChars: number = DEFAULT_MAX_CHARS
): string {
  if (!text || !text.trim()) return "";

  const lines = text.split("\n");
  const classified = classifyLines(lines);

  trimTrailing(classified, TRAILING_PROMPT);
  trimTrailing(classified, TRAILING_CHROME);

  if (classified.length === 0) {
    const whole = text.trim();
    if (charCount(whole) <= maxChars) return whole;
    return takeFromBottom(lines, maxChars);
  }

  // Collected bottom-up; reversed below
  const collected: string[] = [];
  let total = 0;
  let hitNoise = false;

  for (let i = classified.length - 1; i >= 0; i--) {
    const { line, category } = classified[i];

    if (NOISE.has(category)) {
      hitNoise = true;
      break;
    }
    if (category === LineCategory.EMPTY) {
      if (collected.length > 0) collected.push(line);
      continue;
    }
    if (NATURAL_LANGUAGE.has(category)) {
      const cost = charCount(line) + 1;
      if (total + cost > maxChars) break;
      collected.push(line);
      total += cost;
    }
  }

  // "I've made the following changes:" without the changes
  if (hitNoise && collected.length > 0 && collected[collected.length - 1].trim().endsWith(":")) {
    collected.pop();
  }

  collected.reverse();

  while (collected.length > 0 && isBlank(collected[0])) collected.shift();
  while (collected.length > 0 && isBlank(collected[collected.length - 1])) collected.pop();

  const result = collapseBlankRuns(collected).join("\n").trim();

  if (charCount(result) < MIN_USEFUL_CHARS) {
    const fallback = classified
      .filter((c) => c.category !== LineCategory.PROMPT)
      .map((c) => c.line);
    return takeFromBottom(fallback, maxChars);
  }

  return result;
}
