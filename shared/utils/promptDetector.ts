/**
 * Confirmation prompt detection over recent terminal output.
 *
 * Two independent passes run over the ANSI-stripped buffer:
 * - Yes/No: the last few non-blank lines end in a yes/no suffix such as
 *   "(y/n)", "[Y/n]" or "(yes/no)", or are an "Are you sure…?" question.
 *   A shell prompt printed after that line means it was already answered.
 *   Always high confidence, answered with `y` + Enter.
 * - Menu: an already-selected affirmative option ("❯ Yes", "● Yes") with
 *   corroborating signals deciding the confidence. Answered with Enter.
 *
 * The Yes/No pass runs first and wins when both would match.
 */

import type { PromptConfidence, PromptDetectionResult } from "../types/terminal.js";

export interface PromptPatternConfig {
  /** Buffers shorter than this (after ANSI stripping and trimming) never match */
  minLength: number;

  /** Number of trailing non-blank lines the Yes/No pass inspects */
  yesNoScanLines: number;

  /** Tested against each inspected line, trailing whitespace removed */
  yesNoPatterns: RegExp[];

  /** A shell prompt line; a yes/no line before one is stale */
  shellPromptPatterns: RegExp[];

  /** Number of trailing lines the menu pass inspects */
  menuScanLines: number;

  /** A selected affirmative option */
  menuMarkerPatterns: RegExp[];

  /** Keyboard instructions shown under a selection menu */
  instructionPatterns: RegExp[];

  /** A drawn box around the menu, or a status line that only appears inside one */
  framePatterns: RegExp[];

  /** An explicit question sentence */
  questionPatterns: RegExp[];
}

/*
 * The shortest affirmative menu marker ("❯ Yes") is five characters, so the
 * minimum sits there: a bare marker still classifies as a low-confidence hit.
 */
export const MIN_PROMPT_BUFFER_LENGTH = 5;

export const DEFAULT_PROMPT_PATTERNS: PromptPatternConfig = {
  minLength: MIN_PROMPT_BUFFER_LENGTH,
  yesNoScanLines: 3,
  yesNoPatterns: [
    // (y/n) [Y/n] [y/N] (yes/no) [Yes/No], optionally followed by ':' or '?'
    /[([]\s*y(?:es)?\s*\/\s*n(?:o)?\s*[)\]]\s*[:?]?$/i,
    // "Are you sure you want to delete this?"
    /\bare you sure\b.*\?$/i,
    // "Continue? y/n" without brackets
    /\?\s+y(?:es)?\/n(?:o)?$/i,
  ],
  // "user@host:~$", "root#", "% ", "PS C:\Users\dev>", "❯"
  shellPromptPatterns: [/[$#%>❯›]$/],
  menuScanLines: 15,
  menuMarkerPatterns: [
    // "❯ Yes", "> 1. Yes", also inside a frame: "│ ❯ Yes │"
    /^[^\S\n]*(?:[│║┃][^\S\n]*)?[❯›>][^\S\n]*(?:\d+[.)][^\S\n]*)?Yes\b/m,
    /^[^\S\n]*(?:[│║┃][^\S\n]*)?[●◉][^\S\n]*(?:\d+[.)][^\S\n]*)?Yes\b/m,
  ],
  instructionPatterns: [
    /use arrow keys/i,
    /arrow keys.*enter/i,
    /\benter to (?:select|confirm|continue)/i,
    /confirm with number keys/i,
    /press enter to/i,
    /esc to cancel/i,
  ],
  framePatterns: [/[╭╮╰╯│┌┐└┘├┤═║]/, /remaining requests/i],
  questionPatterns: [/^[^\n❯›>●◉]*\w[^\n]*\?\s*$/m],
};

const NOT_WAITING: PromptDetectionResult = {
  waiting: false,
  responseType: "none",
  confidence: "none",
  pass: "none",
};

/**
 * Strip ANSI escape codes from text for pattern matching.
 * Handles CSI sequences, OSC sequences, and simple escape sequences.
 */
export function stripAnsi(text: string): string {
  /* eslint-disable no-control-regex */
  return text
    .replace(/\x1b\[[0-9;?]*[A-Za-z]/g, "") // CSI sequences
    .replace(/\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g, "") // OSC sequences
    .replace(/\x1b[()][AB012]/g, "") // Character set designation
    .replace(/\x1b[=>]/g, "") // Keypad mode
    .replace(/\x1b[78]/g, "") // Save/restore cursor
    .replace(/\x1b[DME]/g, ""); // Line control
  /* eslint-enable no-control-regex */
}

/**
 * Split cleaned output into display lines. A bare carriage return inside a
 * line means the text after it overwrote the text before it.
 */
export function toDisplayLines(text: string): string[] {
  return text.split("\n").map((line) => {
    const withoutCr = line.endsWith("\r") ? line.slice(0, -1) : line;
    const lastCr = withoutCr.lastIndexOf("\r");
    return lastCr === -1 ? withoutCr : withoutCr.slice(lastCr + 1);
  });
}

function firstMatch(patterns: RegExp[], text: string): string | undefined {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      return match[0];
    }
  }
  return undefined;
}

export function detectYesNoPrompt(
  lines: string[],
  config: PromptPatternConfig = DEFAULT_PROMPT_PATTERNS
): PromptDetectionResult | null {
  const candidates = lines
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)
    .slice(-config.yesNoScanLines);

  for (let index = candidates.length - 1; index >= 0; index--) {
    const line = candidates[index];
    if (firstMatch(config.yesNoPatterns, line) !== undefined) {
      return {
        waiting: true,
        responseType: "affirm",
        confidence: "high",
        pass: "yes-no",
        matchedText: line.trim(),
      };
    }
    if (firstMatch(config.shellPromptPatterns, line) !== undefined) {
      return null;
    }
  }
  return null;
}

export function detectMenuPrompt(
  lines: string[],
  config: PromptPatternConfig = DEFAULT_PROMPT_PATTERNS
): PromptDetectionResult | null {
  const text = lines.slice(-config.menuScanLines).join("\n");

  const marker = firstMatch(config.menuMarkerPatterns, text);
  if (marker === undefined) {
    return null;
  }

  const hasInstruction = firstMatch(config.instructionPatterns, text) !== undefined;
  const hasFrame = firstMatch(config.framePatterns, text) !== undefined;
  const hasQuestion = firstMatch(config.questionPatterns, text) !== undefined;

  let confidence: PromptConfidence = "low";
  if (hasInstruction || hasFrame) {
    confidence = "high";
  } else if (hasQuestion) {
    confidence = "medium";
  }

  return {
    waiting: true,
    responseType: "acknowledge",
    confidence,
    pass: "menu",
    matchedText: marker.trim(),
  };
}

/**
 * Classify whether the shell is blocked on a confirmation prompt.
 *
 * @param buffer Recent raw terminal output (may include ANSI codes)
 */
export function detectPrompt(
  buffer: string,
  config: PromptPatternConfig = DEFAULT_PROMPT_PATTERNS
): PromptDetectionResult {
  const clean = stripAnsi(buffer);
  if (clean.trim().length < config.minLength) {
    return { ...NOT_WAITING };
  }

  const lines = toDisplayLines(clean);

  return detectYesNoPrompt(lines, config) ?? detectMenuPrompt(lines, config) ?? { ...NOT_WAITING };
}

/** Only medium and high confidence results authorize an automatic response. */
export function shouldAutoRespond(result: PromptDetectionResult): boolean {
  return (
    result.waiting &&
    result.responseType !== "none" &&
    (result.confidence === "medium" || result.confidence === "high")
  );
}
