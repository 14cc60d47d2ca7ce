import { getBoolean, getString, hasKey } from "./nodes.js";
import type { JsonObject } from "./types.js";

/*
 * Option labels for signature parameters. A parameter's declared kind picks a
 * one-letter prefix, so `table` declared as an input is spelled `--i-table`.
 * Completion and diagnostics both build labels here, which keeps the set of
 * suggested labels and the set of accepted labels identical.
 */

export type KindPrefix = "i" | "o" | "p" | "m" | "";

const KIND_PREFIXES: ReadonlyArray<readonly [kind: string, prefix: Exclude<KindPrefix, "">]> = [
  ["input", "i"],
  ["artifact", "i"],
  ["output", "o"],
  ["parameter", "p"],
  ["metadata", "m"],
];

const PREFIX_LETTERS: ReadonlySet<string> = new Set(["i", "o", "p", "m"]);

export const HELP_OPTION_LABELS: ReadonlySet<string> = new Set(["--help", "-h"]);

/**
 * Declared kind of a parameter: `signature_type` when present, else `type`
 * when it starts with a known kind word. Lower-cased.
 */
export function signatureKind(param: JsonObject): string | null {
  const signatureType = getString(param, "signature_type");
  if (signatureType !== undefined) return signatureType.toLowerCase();

  const type = getString(param, "type")?.toLowerCase();
  if (type !== undefined && KIND_PREFIXES.some(([kind]) => type.startsWith(kind))) {
    return type;
  }
  return null;
}

export function optionPrefix(param: JsonObject): KindPrefix {
  const kind = signatureKind(param);
  if (kind === null) return "";
  for (const [word, prefix] of KIND_PREFIXES) {
    if (kind.startsWith(word)) return prefix;
  }
  return "";
}

/** `("i", "sample_metadata")` → `--i-sample-metadata`. */
export function formatOptionLabel(prefix: KindPrefix, name: string): string {
  const dashed = name.replaceAll("_", "-");
  return prefix ? `--${prefix}-${dashed}` : `--${dashed}`;
}

/**
 * Explicit `required` wins; otherwise a parameter with a recognized kind and
 * no `default` key is required.
 */
export function paramIsRequired(param: JsonObject): boolean {
  const explicit = getBoolean(param, "required");
  if (explicit !== undefined) return explicit;
  return optionPrefix(param) !== "" && !hasKey(param, "default");
}

/**
 * Prefix filter shared by parameter completion: the label matches when it
 * starts with the typed text, or when the text without dashes matches the
 * label with its dashes and kind prefix removed (`--tab` finds `--i-table`).
 */
export function optionLabelMatchesPrefix(label: string, typed: string): boolean {
  if (!typed) return true;
  if (label.startsWith(typed)) return true;

  let bare = stripLeadingDashes(label);
  const typedBare = stripLeadingDashes(typed);
  if (bare.length >= 2 && PREFIX_LETTERS.has(bare.charAt(0)) && bare.charAt(1) === "-") {
    bare = bare.slice(2);
  }
  return bare.startsWith(typedBare);
}

function stripLeadingDashes(text: string): string {
  let i = 0;
  while (text.charAt(i) === "-") i++;
  return text.slice(i);
}

/** `--p-n-jobs=4` → `--p-n-jobs`. */
export function optionName(tokenText: string): string {
  const eq = tokenText.indexOf("=");
  return eq === -1 ? tokenText : tokenText.slice(0, eq);
}

/**
 * Snake-cased parameter name of a `--` option token, value dropped:
 * `--p-n-jobs=4` → `p_n_jobs`. Null for anything that is not a long option.
 */
export function optionParamName(tokenText: string): string | null {
  if (!tokenText.startsWith("--")) return null;
  const name = stripLeadingDashes(optionName(tokenText)).replaceAll("-", "_");
  return name || null;
}

/**
 * Canonical, kind-independent name used to compare required parameters with
 * the options present: kind prefix segment dropped, lower-cased.
 * `--i-Table` and `--table` both give `table`.
 */
export function normalizeOptionToParamName(tokenText: string): string | null {
  const name = optionParamName(tokenText);
  if (name === null) return null;
  const sep = name.indexOf("_");
  const canonical = sep > 0 && PREFIX_LETTERS.has(name.slice(0, sep)) ? name.slice(sep + 1) : name;
  return canonical ? canonical.toLowerCase() : null;
}

/**
 * Names a token counts as already used: the raw snake-cased name and, when
 * it carries a kind prefix, the bare name too.
 */
export function usedParamNames(tokenText: string): string[] {
  const name = optionParamName(tokenText);
  if (name === null) return [];
  const sep = name.indexOf("_");
  if (sep > 0 && PREFIX_LETTERS.has(name.slice(0, sep))) {
    return [name, name.slice(sep + 1)];
  }
  return [name];
}
