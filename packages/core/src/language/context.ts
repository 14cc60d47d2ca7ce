import { spanContains, type ParsedCommand, type Token } from "../model/text.js";
import { normalizeContinuations } from "../parsing/continuations.js";
import { commandAtOffset, DEFAULT_CLI_NAME, splitCommands } from "../parsing/shell.js";
import { debug } from "../shared/debug.js";

/** What the word under the cursor completes to. */
export const CompletionMode = {
  /** Outside a command, or on the CLI name itself. */
  None: "none",
  /** First word after the CLI name: plugins and builtins. */
  Root: "root",
  /** Second word: actions of the plugin, subcommands of the builtin. */
  Plugin: "plugin",
  /** Third word onwards: options of the action. */
  Parameter: "parameter",
} as const;
export type CompletionMode = (typeof CompletionMode)[keyof typeof CompletionMode];

export interface CompletionContext {
  readonly mode: CompletionMode;
  readonly command: ParsedCommand | null;
  /** Token containing the cursor, inclusive of both ends. */
  readonly currentToken: Token | null;
  /** Index of the word being completed; -1 when outside every command. */
  readonly tokenIndex: number;
  /** Text of `currentToken` up to the cursor. */
  readonly prefix: string;
}

const NO_CONTEXT: CompletionContext = {
  mode: CompletionMode.None,
  command: null,
  currentToken: null,
  tokenIndex: -1,
  prefix: "",
};

/** Index 0 is the CLI name, never completed. */
export function determineMode(tokenIndex: number): CompletionMode {
  if (tokenIndex <= 0) return CompletionMode.None;
  if (tokenIndex === 1) return CompletionMode.Root;
  if (tokenIndex === 2) return CompletionMode.Plugin;
  return CompletionMode.Parameter;
}

/**
 * Locates the cursor (an offset into the original, unnormalized `text`)
 * inside the command it belongs to. Token offsets in the result are in
 * normalized coordinates.
 */
export function resolveCompletionContext(
  text: string,
  offset: number,
  cliName: string = DEFAULT_CLI_NAME,
): CompletionContext {
  const normalized = normalizeContinuations(text);
  const cursor = normalized.offsetMap.toNormalized(offset);
  const command = commandAtOffset(splitCommands(normalized.text, cliName), cursor);

  if (command === null) {
    return NO_CONTEXT;
  }

  let currentToken: Token | null = null;
  let tokenIndex = -1;
  let prefix = "";

  for (const [index, token] of command.tokens.entries()) {
    if (spanContains(token, cursor)) {
      currentToken = token;
      tokenIndex = index;
      prefix = token.text.slice(0, cursor - token.start);
      break;
    }
    if (token.end < cursor) {
      tokenIndex = index + 1;
    }
  }

  // Between words: a cursor after whitespace, or at the very end, starts a new word.
  if (currentToken === null) {
    const before = normalized.text.charAt(cursor - 1);
    if (cursor >= normalized.text.length || before === " " || before === "\t") {
      tokenIndex = command.tokens.length;
    }
  }

  const mode = determineMode(tokenIndex);
  debug.completion("context", { cursor, tokenIndex, mode, prefix });

  return { mode, command, currentToken, tokenIndex, prefix };
}
