import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { debug } from "@q2lsp/core";
import { formatError, type Logger } from "./types.js";

const execFileAsync = promisify(execFile);

// CSI sequences such as colors (`ESC[31m`) and erase-line (`ESC[K`).
const ANSI_ESCAPE = /\u001b\[[0-9;]*[A-Za-z]/g;
// C0 controls except tab and newline, plus DEL.
const CONTROL_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f]/g;

/** Makes CLI help output safe for a plain-text hover: no escapes, no CR, no control characters. */
export function sanitizeHelpText(text: string): string {
  return text.replace(ANSI_ESCAPE, "").replace(/\r\n?/g, "\n").replace(CONTROL_CHARS, "");
}

/**
 * Help text for a command path, fetched without blocking the server.
 * Core's synchronous `HelpProvider` reads the settled result.
 */
export type AsyncHelpProvider = (commandPath: readonly string[]) => Promise<string | null>;

/** Most distinct paths the memo holds before dropping the oldest. */
export const HELP_MEMO_LIMIT = 256;

export interface HelpProviderOptions {
  readonly executable: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly cwd?: string;
  readonly memoLimit?: number;
  /** Runs the executable and resolves with stdout. Swapped in tests. */
  readonly run?: (executable: string, args: readonly string[], timeoutMs: number) => Promise<string>;
}

async function runHelp(executable: string, args: readonly string[], timeoutMs: number, cwd?: string): Promise<string> {
  const { stdout } = await execFileAsync(executable, args, {
    cwd,
    encoding: "utf8",
    timeout: timeoutMs,
    env: { ...process.env, NO_COLOR: "1" },
  });
  return stdout;
}

/**
 * Help text from `<executable> <path...> --help`, memoized per path.
 * A failing or timed-out invocation is logged and remembered as "no help".
 * Concurrent requests for one path share a single invocation.
 */
export function createHelpProvider(options: HelpProviderOptions): AsyncHelpProvider {
  const { executable, timeoutMs, logger, cwd } = options;
  const limit = options.memoLimit ?? HELP_MEMO_LIMIT;
  const run = options.run ?? ((exe, args, ms) => runHelp(exe, args, ms, cwd));
  const memo = new Map<string, Promise<string | null>>();

  const fetchHelp = async (commandPath: readonly string[]): Promise<string | null> => {
    const display = commandPath.join(" ");
    try {
      const output = sanitizeHelpText(await run(executable, [...commandPath, "--help"], timeoutMs));
      const help = output.trim() ? output : null;
      debug.hover("help", { path: display, found: help !== null });
      return help;
    } catch (e) {
      logger.warn(`[hover] '${[executable, ...commandPath].join(" ")} --help' failed: ${formatError(e)}`);
      debug.hover("help", { path: display, found: false });
      return null;
    }
  };

  return (commandPath) => {
    const key = JSON.stringify(commandPath);
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    // Oldest entry goes first; Map iterates in insertion order.
    if (memo.size >= limit) {
      const oldest = memo.keys().next();
      if (!oldest.done) memo.delete(oldest.value);
    }
    const pending = fetchHelp(commandPath);
    memo.set(key, pending);
    return pending;
  };
}
