import { childNames, commandNames, findCaseInsensitive, getChildNode, getRootNode } from "../hierarchy/nodes.js";
import type { CommandHierarchy } from "../hierarchy/types.js";
import type { ParsedCommand } from "../model/text.js";
import { debug } from "../shared/debug.js";
import { uniquePrefixMatch } from "./matching.js";
import { checkActionName, checkCommandName, checkOptions, checkRequiredOptions, type DiagnosticIssue } from "./stages.js";

/**
 * Checks one command against the hierarchy in stages:
 *
 * 1. plugin/builtin name (token 1)
 * 2. action/subcommand name (token 2), also attempted when token 1 is a
 *    typo with a single prefix completion
 * 3. `--option` names, only once tokens 1 and 2 both matched
 * 4. required options, under the same condition
 *
 * Tokens starting with `-` in position 1 or 2 are left alone. Malformed
 * hierarchy data yields fewer issues, never an exception.
 */
export function validateCommand(command: ParsedCommand, hierarchy: CommandHierarchy): DiagnosticIssue[] {
  try {
    return runStages(command, hierarchy);
  } catch (e) {
    debug.diagnostics("validate.failed", { error: e instanceof Error ? e.message : String(e) });
    return [];
  }
}

function runStages(command: ParsedCommand, hierarchy: CommandHierarchy): DiagnosticIssue[] {
  const root = getRootNode(hierarchy);
  if (root === null) {
    return [];
  }

  const issues: DiagnosticIssue[] = [];
  const [, pluginToken, actionToken, ...optionTokens] = command.tokens;

  // Stage 1. `parentName` is the hierarchy key token 1 resolves to.
  let pluginValid = true;
  let parentName: string | undefined;
  if (pluginToken && !pluginToken.text.startsWith("-")) {
    const names = commandNames(root);
    const issue = checkCommandName(pluginToken, root);
    if (issue) {
      issues.push(issue);
      pluginValid = false;
      parentName = uniquePrefixMatch(pluginToken.text, names);
    } else {
      parentName = findCaseInsensitive(names, pluginToken.text);
    }
  }

  // Stage 2.
  let actionValid = true;
  if (parentName !== undefined && actionToken && !actionToken.text.startsWith("-")) {
    const issue = checkActionName(actionToken, root, parentName);
    if (issue) {
      issues.push(issue);
      actionValid = false;
    }
  }

  if (!pluginValid || !actionValid || parentName === undefined || !actionToken) {
    debug.diagnostics("validate", { tokens: command.tokens.length, issues: issues.length });
    return issues;
  }

  // Stages 3 and 4 need a concrete action node.
  const parent = getChildNode(root, parentName);
  const actionName = parent ? findCaseInsensitive(childNames(parent), actionToken.text) : undefined;
  const action = parent && actionName !== undefined ? getChildNode(parent, actionName) : null;
  if (action !== null) {
    const unknownOptions = checkOptions(optionTokens, action);
    issues.push(...unknownOptions);
    issues.push(...checkRequiredOptions(actionToken, optionTokens, action, unknownOptions));
  }

  debug.diagnostics("validate", { tokens: command.tokens.length, issues: issues.length });
  return issues;
}
