import {
  builtinNames,
  childNames,
  firstText,
  getChildNode,
  getRootNode,
  getString,
  isBuiltinLeaf,
  pluginNames,
} from "../hierarchy/nodes.js";
import { optionLabelMatchesPrefix, usedParamNames } from "../hierarchy/options.js";
import { signatureParams, type SignatureParam } from "../hierarchy/signature.js";
import type { CommandHierarchy, JsonObject } from "../hierarchy/types.js";
import { debug } from "../shared/debug.js";
import { CompletionMode, type CompletionContext } from "./context.js";

export const CompletionKind = {
  Plugin: "plugin",
  Action: "action",
  Parameter: "parameter",
  Builtin: "builtin",
} as const;
export type CompletionKind = (typeof CompletionKind)[keyof typeof CompletionKind];

export interface CompletionItem {
  readonly label: string;
  readonly detail: string;
  readonly kind: CompletionKind;
  /** Text to insert when it differs from `label`. */
  readonly insertText?: string;
}

const HELP_ITEM: CompletionItem = {
  label: "--help",
  detail: "Show help message",
  kind: CompletionKind.Parameter,
};

/** Options start after `<cli> <plugin> <action>`. */
const FIRST_OPTION_INDEX = 3;

export function getCompletions(ctx: CompletionContext, hierarchy: CommandHierarchy): CompletionItem[] {
  if (ctx.mode === CompletionMode.None || ctx.command === null) {
    return [];
  }
  const root = getRootNode(hierarchy);
  if (root === null) {
    return [];
  }

  const tokens = ctx.command.tokens;
  const word = (index: number): string => tokens[index]?.text ?? "";

  let items: CompletionItem[];
  switch (ctx.mode) {
    case CompletionMode.Root:
      items = completeRoot(root, ctx.prefix);
      break;
    case CompletionMode.Plugin:
      items = completePlugin(root, word(1), ctx.prefix);
      break;
    case CompletionMode.Parameter: {
      const used = new Set(tokens.slice(FIRST_OPTION_INDEX).flatMap((token) => usedParamNames(token.text)));
      items = completeParameters(root, word(1), word(2), ctx.prefix, used);
      break;
    }
  }

  debug.completion("items", { mode: ctx.mode, prefix: ctx.prefix, count: items.length });
  return items;
}

function completeRoot(root: JsonObject, prefix: string): CompletionItem[] {
  const items: CompletionItem[] = [];

  for (const name of builtinNames(root)) {
    if (!name.startsWith(prefix)) continue;
    const node = getChildNode(root, name);
    items.push({
      label: name,
      detail: (node && firstText(node, ["short_help", "help"])) || "Built-in command",
      kind: CompletionKind.Builtin,
    });
  }

  for (const name of pluginNames(root)) {
    if (!name.startsWith(prefix)) continue;
    const node = getChildNode(root, name);
    items.push({
      label: name,
      detail: (node && firstText(node, ["short_description", "description"])) || "Plugin",
      kind: CompletionKind.Plugin,
    });
  }

  return items;
}

function completePlugin(root: JsonObject, pluginName: string, prefix: string): CompletionItem[] {
  const node = getChildNode(root, pluginName);
  if (node === null) {
    return [];
  }

  const items: CompletionItem[] = [];
  for (const name of childNames(node)) {
    if (!name.startsWith(prefix)) continue;
    const action = getChildNode(node, name);
    items.push({
      label: name,
      detail: (action && getString(action, "description")) || "Action",
      kind: CompletionKind.Action,
    });
  }

  // A builtin with subcommands that simply didn't match gets nothing.
  if (items.length === 0 && isBuiltinLeaf(root, pluginName, node) && HELP_ITEM.label.startsWith(prefix)) {
    return [HELP_ITEM];
  }
  return items;
}

function completeParameters(
  root: JsonObject,
  pluginName: string,
  actionName: string,
  prefix: string,
  used: ReadonlySet<string>,
): CompletionItem[] {
  const plugin = getChildNode(root, pluginName);
  const action = plugin && getChildNode(plugin, actionName);
  if (!action) {
    return [];
  }

  const items: CompletionItem[] = [];
  for (const param of signatureParams(action)) {
    if (used.has(param.name)) continue;
    if (!optionLabelMatchesPrefix(param.label, prefix)) continue;
    items.push({ label: param.label, detail: parameterDetail(param), kind: CompletionKind.Parameter });
  }

  if (!used.has("help") && optionLabelMatchesPrefix(HELP_ITEM.label, prefix)) {
    items.push(HELP_ITEM);
  }
  return items;
}

function parameterDetail(param: SignatureParam): string {
  const parts: string[] = [];
  if (param.required) parts.push("(required)");
  const type = getString(param.spec, "type");
  if (type) parts.push(`[${type}]`);
  const description = getString(param.spec, "description");
  if (description) parts.push(description);
  return parts.length > 0 ? parts.join(" ") : "Parameter";
}
