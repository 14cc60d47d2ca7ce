import { childNames, commandNames, getChildNode, isBuiltinLeaf, isBuiltinNode } from "../hierarchy/nodes.js";
import { HELP_OPTION_LABELS, normalizeOptionToParamName, optionName } from "../hierarchy/options.js";
import { optionLabels, signatureParams } from "../hierarchy/signature.js";
import type { JsonObject } from "../hierarchy/types.js";
import type { Token } from "../model/text.js";
import { DiagnosticCode } from "./codes.js";
import { formatDidYouMean, getSuggestions, isExactMatch } from "./matching.js";

/** One problem found in a command. Offsets are in the coordinates of the tokens checked. */
export interface DiagnosticIssue {
  readonly message: string;
  readonly start: number;
  readonly end: number;
  readonly code: DiagnosticCode;
  /** "Did you mean" candidates, best first. */
  readonly suggestions: readonly string[];
}

function issueAt(token: Token, code: DiagnosticCode, message: string, suggestions: readonly string[] = []): DiagnosticIssue {
  return { message, start: token.start, end: token.end, code, suggestions };
}

/** Plugin or builtin name (token 1). */
export function checkCommandName(token: Token, root: JsonObject): DiagnosticIssue | null {
  const candidates = commandNames(root);
  if (isExactMatch(token.text, candidates)) {
    return null;
  }
  const suggestions = getSuggestions(token.text, candidates);
  return issueAt(
    token,
    DiagnosticCode.UnknownRoot,
    `Unknown QIIME command '${token.text}'.${formatDidYouMean(suggestions)}`,
    suggestions,
  );
}

/**
 * Action or subcommand name (token 2) under the resolved `parentName`.
 * Builtin leaves take free arguments, so nothing is reported for them.
 */
export function checkActionName(token: Token, root: JsonObject, parentName: string): DiagnosticIssue | null {
  const parent = getChildNode(root, parentName);
  if (parent === null || isBuiltinLeaf(root, parentName, parent)) {
    return null;
  }

  const candidates = childNames(parent);
  if (isExactMatch(token.text, candidates)) {
    return null;
  }

  const suggestions = getSuggestions(token.text, candidates);
  const builtin = isBuiltinNode(root, parentName, parent);
  const code = builtin ? DiagnosticCode.UnknownSubcommand : DiagnosticCode.UnknownAction;
  const noun = builtin ? "subcommand" : "action";
  return issueAt(
    token,
    code,
    `Unknown ${noun} '${token.text}' for '${parentName}'.${formatDidYouMean(suggestions)}`,
    suggestions,
  );
}

/** Every `--option` token against the action's rendered labels. Values and short flags are skipped. */
export function checkOptions(optionTokens: readonly Token[], action: JsonObject): DiagnosticIssue[] {
  const labels = optionLabels(action);
  const issues: DiagnosticIssue[] = [];

  for (const token of optionTokens) {
    if (!token.text.startsWith("--")) continue;
    const name = optionName(token.text);
    if (HELP_OPTION_LABELS.has(name)) continue;
    if (isExactMatch(name, labels)) continue;

    const suggestions = getSuggestions(name, labels);
    issues.push(
      issueAt(token, DiagnosticCode.UnknownOption, `Unknown option '${name}'.${formatDidYouMean(suggestions)}`, suggestions),
    );
  }
  return issues;
}

/**
 * Required parameters absent from `optionTokens`, anchored at the action
 * token. A help request disables the check. A required option that is the
 * single suggestion of an unknown-option issue is treated as mistyped
 * rather than missing.
 */
export function checkRequiredOptions(
  actionToken: Token,
  optionTokens: readonly Token[],
  action: JsonObject,
  unknownOptions: readonly DiagnosticIssue[],
): DiagnosticIssue[] {
  if (optionTokens.some((token) => HELP_OPTION_LABELS.has(optionName(token.text)))) {
    return [];
  }

  const present = new Set<string>();
  for (const token of optionTokens) {
    const name = normalizeOptionToParamName(token.text);
    if (name !== null) present.add(name);
  }

  const mistyped = new Set<string>();
  for (const issue of unknownOptions) {
    const [only, ...rest] = issue.suggestions;
    if (only === undefined || rest.length > 0) continue;
    const name = normalizeOptionToParamName(only);
    if (name !== null) mistyped.add(name);
  }

  const issues: DiagnosticIssue[] = [];
  const reported = new Set<string>();
  for (const param of signatureParams(action)) {
    if (!param.required) continue;
    const name = normalizeOptionToParamName(param.label);
    if (name === null || present.has(name) || mistyped.has(name) || reported.has(name)) continue;
    reported.add(name);
    issues.push(
      issueAt(actionToken, DiagnosticCode.MissingRequiredOption, `Required option '${param.label}' is not specified.`),
    );
  }
  return issues;
}
