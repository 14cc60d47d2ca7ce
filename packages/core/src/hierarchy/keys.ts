// Keys that carry metadata rather than child nodes. Any other key whose value
// is an object is a child: a plugin/builtin under the root, an action or
// subcommand under a plugin/builtin.

/** Root keys that are not plugin/builtin entries. */
export const ROOT_METADATA_KEYS: ReadonlySet<string> = new Set([
  "name",
  "help",
  "short_help",
  "builtins",
]);

/** Plugin/builtin keys that are not action entries. */
export const COMMAND_METADATA_KEYS: ReadonlySet<string> = new Set([
  "id",
  "name",
  "version",
  "website",
  "user_support_text",
  "description",
  "short_description",
  "short_help",
  "help",
  "actions",
  "type",
]);

/** Used when deciding whether a builtin is a leaf. */
export const BUILTIN_NODE_METADATA_KEYS: ReadonlySet<string> = new Set([
  ...COMMAND_METADATA_KEYS,
  "builtins",
]);

/** Groups of the legacy mapping-shaped signature, in label order. */
export const LEGACY_SIGNATURE_GROUPS = ["inputs", "outputs", "parameters", "metadata"] as const;
