// --- Types ---

export const LineCategory = {
  EMPTY: "empty",
  PROMPT: "prompt",
  OPTION: "option",
  BULLET: "bullet",
  DIFF: "diff",
  FILE_PATH: "filepath",
  CODE: "code",
  TEXT: "text",
} as const;

export type LineCategory = (typeof LineCategory)[keyof typeof LineCategory];

export interface ClassifiedLine {
  line: string;
  category: LineCategory;
}

/** Categories worth surfacing in a notification. */
export const NATURAL_LANGUAGE: ReadonlySet<LineCategory> = new Set([
  LineCategory.TEXT,
  LineCategory.BULLET,
  LineCategory.OPTION,
]);

/** Dropped, and halts the backward scan. */
export const NOISE: ReadonlySet<LineCategory> = new Set([
  LineCategory.CODE,
  LineCategory.DIFF,
  LineCategory.FILE_PATH,
]);

// --- Patterns ---

// The agent's input prompt: ">", "> ", "> _"
const PROMPT_PATTERN = /^>\s*_?$/;

// 1. / 1) / #1 / (1), optionally behind a selection cursor (>, ❯, ›).
// Groups: 1-3 = number (one of the three forms), 4 = label.
export const OPTION_PATTERN =
  /^\s*(?:[>❯›]\s*)?(?:(\d+)[.)]\s+|#(\d+)\s+|\((\d+)\)\s+)(.+)$/;

// "- text" is a bullet; "-text" is a removed diff line
const BULLET_PATTERN = /^\s?[-*]\s/;

const DIFF_PATTERN = /^[+-]\S|^\+{2,3}\s|^-{2,3}\s|^@@\s|^diff --git/;

// "src/app.js - Added auth", "src/app.js (New)", "src/app.js — notes"
const FILE_PATH_PATTERN = /^\s*\S+\/\S+\.[\p{L}\p{N}_]+\s*[-—(]/u;

// Keywords bounded by non-letters in any script, so "élet" is not "let"
const CODE_SIGNALS =
  /[{}[\]();]|(?<![\p{L}\p{N}_])(?:import|from|def|class|function|const|let|var|return|if|else|for|while)(?![\p{L}\p{N}_])|=>|->|::|&&|\|\|/u;

// --- Classification ---

function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

/**
 * Classify one line of ANSI-stripped terminal output.
 * Rules are checked in order and the first match wins, so option and
 * bullet lines are never mistaken for diffs that share their first character.
 */
export function classifyLine(line: string): LineCategory {
  const stripped = line.trimEnd();

  if (!stripped) return LineCategory.EMPTY;
  if (PROMPT_PATTERN.test(stripped)) return LineCategory.PROMPT;
  if (OPTION_PATTERN.test(stripped)) return LineCategory.OPTION;
  if (BULLET_PATTERN.test(stripped)) return LineCategory.BULLET;
  if (DIFF_PATTERN.test(stripped)) return LineCategory.DIFF;
  if (FILE_PATH_PATTERN.test(stripped)) return LineCategory.FILE_PATH;
  if (leadingWhitespace(stripped) >= 2 && CODE_SIGNALS.test(stripped)) {
    return LineCategory.CODE;
  }
  return LineCategory.TEXT;
}

export function classifyLines(lines: string[]): ClassifiedLine[] {
  return lines.map((line) => ({ line, category: classifyLine(line) }));
}
