import { BUILTIN_NODE_METADATA_KEYS, COMMAND_METADATA_KEYS, ROOT_METADATA_KEYS } from "./keys.js";
import type { CommandHierarchy, JsonObject, JsonValue } from "./types.js";

/*
 * Conservative accessors over hierarchy nodes. Absent keys, wrong value
 * types and non-object children all read as "not there"; nothing here throws.
 */

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonArray(value: JsonValue | undefined): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function own(node: JsonObject, key: string): JsonValue | undefined {
  return Object.hasOwn(node, key) ? node[key] : undefined;
}

/** The single root node (usually "qiime"), or null for an empty hierarchy. */
export function getRootNode(hierarchy: CommandHierarchy): JsonObject | null {
  const first = Object.values(hierarchy)[0];
  return isJsonObject(first) ? first : null;
}

export function getChildNode(node: JsonObject, key: string): JsonObject | null {
  const value = own(node, key);
  return isJsonObject(value) ? value : null;
}

export function getString(node: JsonObject, key: string): string | undefined {
  const value = own(node, key);
  return typeof value === "string" ? value : undefined;
}

export function getBoolean(node: JsonObject, key: string): boolean | undefined {
  const value = own(node, key);
  return typeof value === "boolean" ? value : undefined;
}

export function hasKey(node: JsonObject, key: string): boolean {
  return Object.hasOwn(node, key);
}

/** First non-empty string among `keys`, in order. */
export function firstText(node: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = getString(node, key);
    if (value) return value;
  }
  return undefined;
}

export function getList(node: JsonObject, key: string): readonly JsonValue[] {
  const value = own(node, key);
  return isJsonArray(value) ? value : [];
}

/** Names listed in `root.builtins`, in order. Non-string entries are skipped. */
export function builtinNames(root: JsonObject): string[] {
  return getList(root, "builtins").filter((entry): entry is string => typeof entry === "string");
}

/** Object-valued, non-metadata keys of `node`. Empty keys never count. */
export function childNames(node: JsonObject, metadataKeys: ReadonlySet<string> = COMMAND_METADATA_KEYS): string[] {
  const names: string[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (!key || metadataKeys.has(key)) continue;
    if (!isJsonObject(value)) continue;
    names.push(key);
  }
  return names;
}

/** Plugins are the root's object-valued, non-metadata keys that are not builtins. */
export function pluginNames(root: JsonObject): string[] {
  const builtins = new Set(builtinNames(root));
  return childNames(root, ROOT_METADATA_KEYS).filter((name) => !builtins.has(name));
}

/** Builtins first, then plugins; both deduplicated. */
export function commandNames(root: JsonObject): string[] {
  const builtins = builtinNames(root);
  const seen = new Set(builtins);
  return [...new Set(builtins), ...pluginNames(root).filter((name) => !seen.has(name))];
}

export function isBuiltinNode(root: JsonObject, name: string, node: JsonObject): boolean {
  return builtinNames(root).includes(name) || getString(node, "type") === "builtin";
}

/** A builtin without subcommands, e.g. `qiime info`. */
export function isBuiltinLeaf(root: JsonObject, name: string, node: JsonObject): boolean {
  return isBuiltinNode(root, name, node) && childNames(node, BUILTIN_NODE_METADATA_KEYS).length === 0;
}

/** The candidate equal to `text` ignoring case; exact-case hits win. */
export function findCaseInsensitive(candidates: readonly string[], text: string): string | undefined {
  if (candidates.includes(text)) return text;
  const folded = text.toLowerCase();
  return candidates.find((candidate) => candidate.toLowerCase() === folded);
}
