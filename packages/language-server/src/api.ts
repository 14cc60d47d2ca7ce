// Canonical test-facing exports for language-server internals.
// Keeps test imports package-based instead of reaching into ../../src paths.
export * from "./context.js";
export * from "./server.js";
export * from "./handlers/features.js";
export * from "./handlers/lifecycle.js";
export * from "./mapping/lsp-types.js";
export * from "./services/help-provider.js";
export * from "./services/hierarchy-source.js";
export * from "./services/settings.js";
export * from "./services/types.js";
