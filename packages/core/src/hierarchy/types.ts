// Shapes of the command hierarchy produced by the external builder.
//
// The data is untrusted and may be stale relative to the installed CLI, so
// it is typed as plain JSON and read through the accessors in nodes.ts.
// Nothing validates it eagerly.
//
// Expected layout:
//
//   { "qiime": {                                  root node
//       name, help, short_help, builtins: [...],  root metadata
//       "tools": { type: "builtin", help, "import": {...action} },
//       "feature-table": {                        plugin node
//         id, name, version, description, short_description, ...,
//         "summarize": {                          action node
//           description, epilog: [...],
//           signature: [ { name, type, signature_type?, description?,
//                          default?, required?, metavar?, multiple?,
//                          is_bool_flag? }, ... ]
//         } } } }
//
// `signature` may also be the legacy mapping
// `{ inputs: [...], outputs: [...], parameters: [...], metadata: [...] }`.

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;
export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/** Root CLI name → root node. Exactly one root is expected. */
export type CommandHierarchy = Readonly<Record<string, JsonObject>>;

/** Zero-argument capability that yields the (cached) hierarchy. */
export type HierarchyProvider = () => Promise<CommandHierarchy>;
