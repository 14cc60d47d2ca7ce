import { spanContains, type ParsedCommand, type TextSpan, type Token } from "../model/text.js";

/**
 * Quote-aware shell word splitting and command segmentation.
 *
 * Supports single quotes (literal, no escapes), double quotes (backslash
 * escapes the next character) and bare backslash escapes. Unterminated
 * quotes run to the end of the text instead of failing, since the text is
 * usually being typed.
 */

export const DEFAULT_CLI_NAME = "qiime";

type QuoteState = "none" | "single" | "double";

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\v";
}

/**
 * Splits `text` into words. Offsets are shifted by `base` so a caller can
 * tokenize a slice and still get offsets into the enclosing text.
 */
export function tokenizeShell(text: string, base = 0): Token[] {
  const tokens: Token[] = [];
  const n = text.length;
  let i = 0;

  while (i < n) {
    while (i < n && isWhitespace(text.charAt(i))) i++;
    if (i >= n) break;

    const start = i;
    const parts: string[] = [];
    let state: QuoteState = "none";

    while (i < n) {
      const ch = text.charAt(i);

      if (state === "single") {
        if (ch === "'") state = "none";
        else parts.push(ch);
        i += 1;
        continue;
      }

      if (ch === "\\" && i + 1 < n) {
        parts.push(text.charAt(i + 1));
        i += 2;
        continue;
      }

      if (state === "double") {
        if (ch === '"') state = "none";
        else parts.push(ch);
        i += 1;
        continue;
      }

      if (isWhitespace(ch)) break;
      if (ch === "'") state = "single";
      else if (ch === '"') state = "double";
      else parts.push(ch);
      i += 1;
    }

    tokens.push({ text: parts.join(""), start: base + start, end: base + i });
  }

  return tokens;
}

// `;` and newline are one character, `|` one or two (`||`), `&` only as `&&`.
function separatorWidth(text: string, i: number): number {
  const ch = text.charAt(i);
  if (ch === ";" || ch === "\n") return 1;
  if (ch === "|") return text.charAt(i + 1) === "|" ? 2 : 1;
  if (ch === "&" && text.charAt(i + 1) === "&") return 2;
  return 0;
}

/**
 * Spans between top-level separators. Separators inside quotes or escaped
 * with a backslash do not split. The last segment always runs to the end.
 */
export function splitSegments(text: string): TextSpan[] {
  const segments: TextSpan[] = [];
  const n = text.length;
  let state: QuoteState = "none";
  let segmentStart = 0;
  let i = 0;

  while (i < n) {
    const ch = text.charAt(i);

    if (state === "single") {
      if (ch === "'") state = "none";
      i += 1;
      continue;
    }
    if (ch === "\\" && i + 1 < n) {
      i += 2;
      continue;
    }
    if (state === "double") {
      if (ch === '"') state = "none";
      i += 1;
      continue;
    }
    if (ch === "'") {
      state = "single";
      i += 1;
      continue;
    }
    if (ch === '"') {
      state = "double";
      i += 1;
      continue;
    }

    const width = separatorWidth(text, i);
    if (width > 0) {
      segments.push({ start: segmentStart, end: i });
      i += width;
      segmentStart = i;
      continue;
    }
    i += 1;
  }

  segments.push({ start: segmentStart, end: n });
  return segments;
}

/**
 * Every segment whose first word is exactly `cliName` (case-sensitive).
 * `sudo qiime info` is therefore not a command.
 */
export function splitCommands(text: string, cliName: string = DEFAULT_CLI_NAME): ParsedCommand[] {
  const commands: ParsedCommand[] = [];
  for (const segment of splitSegments(text)) {
    const tokens = tokenizeShell(text.slice(segment.start, segment.end), segment.start);
    const head = tokens[0];
    if (head === undefined || head.text !== cliName) continue;
    commands.push({ tokens, start: head.start, end: segment.end });
  }
  return commands;
}

/** First command whose `[start, end]` contains `offset`, both ends inclusive. */
export function commandAtOffset(commands: readonly ParsedCommand[], offset: number): ParsedCommand | null {
  return commands.find((command) => spanContains(command, offset)) ?? null;
}
