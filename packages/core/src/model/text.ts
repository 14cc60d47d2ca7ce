// Spans and tokens shared by every layer. Offsets are UTF-16 code unit
// indices into the text the value was cut from.

export interface TextSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * One shell word. `text` is the unquoted, unescaped value; `start`/`end`
 * bound the raw characters consumed, quotes and escapes included.
 */
export interface Token extends TextSpan {
  readonly text: string;
}

/**
 * One invocation of the CLI inside a script. `tokens[0]` is the CLI name.
 * `end` is the end of the whole segment, so trailing whitespace before the
 * next separator (or the end of text) still belongs to the command.
 */
export interface ParsedCommand extends TextSpan {
  readonly tokens: readonly Token[];
}

export function spanContains(span: TextSpan, offset: number): boolean {
  return span.start <= offset && offset <= span.end;
}
