import { firstText, getChildNode, getList, getRootNode, getString } from "../hierarchy/nodes.js";
import type { CommandHierarchy } from "../hierarchy/types.js";
import type { Token } from "../model/text.js";
import { DEFAULT_CLI_NAME } from "../parsing/shell.js";
import { debug } from "../shared/debug.js";
import { resolveCompletionContext } from "./context.js";

/**
 * Help text for a command path: `[]` for the CLI itself, `[plugin]`, or
 * `[plugin, action]`. Returns null when no help is available.
 */
export type HelpProvider = (commandPath: readonly string[]) => string | null;

export interface HoverOptions {
  readonly hierarchy?: CommandHierarchy;
  /** Preferred over `hierarchy` when both are given. */
  readonly helpProvider?: HelpProvider;
  readonly cliName?: string;
}

/** Plain-text help for the token under `offset`, or null. */
export function getHoverHelp(text: string, offset: number, options: HoverOptions = {}): string | null {
  const ctx = resolveCompletionContext(text, offset, options.cliName ?? DEFAULT_CLI_NAME);
  if (ctx.command === null || ctx.currentToken === null) {
    return null;
  }

  const path = commandPath(ctx.command.tokens, ctx.tokenIndex);
  if (path === null) {
    return null;
  }
  debug.hover("path", { path, provider: options.helpProvider !== undefined });

  if (options.helpProvider) {
    return options.helpProvider(path);
  }
  if (options.hierarchy) {
    return hierarchyHelp(options.hierarchy, path);
  }
  return null;
}

/** Raw token texts naming what the hovered token refers to; null past the action. */
export function commandPath(tokens: readonly Token[], tokenIndex: number): string[] | null {
  if (tokenIndex < 0 || tokenIndex > 2) {
    return null;
  }
  const path = tokens.slice(1, tokenIndex + 1).map((token) => token.text);
  return path.length === tokenIndex ? path : null;
}

function hierarchyHelp(hierarchy: CommandHierarchy, path: readonly string[]): string | null {
  const root = getRootNode(hierarchy);
  if (root === null) {
    return null;
  }

  const [pluginName, actionName] = path;
  if (pluginName === undefined) {
    return firstText(root, ["help", "short_help"]) ?? null;
  }

  const plugin = getChildNode(root, pluginName);
  if (plugin === null) {
    return null;
  }
  if (actionName === undefined) {
    return firstText(plugin, ["help", "short_help", "short_description", "description"]) ?? null;
  }

  const action = getChildNode(plugin, actionName);
  const description = action && getString(action, "description");
  if (!action || !description) {
    return null;
  }

  const epilog = getList(action, "epilog")
    .filter((line): line is string => typeof line === "string")
    .join("\n");
  return epilog ? `${description}\n\n${epilog}` : description;
}
