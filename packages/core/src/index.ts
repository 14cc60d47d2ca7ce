// Model
export { spanContains, type TextSpan, type Token, type ParsedCommand } from "./model/text.js";

// Parsing
export { OffsetMap, normalizeContinuations, type NormalizedText } from "./parsing/continuations.js";
export { DEFAULT_CLI_NAME, tokenizeShell, splitSegments, splitCommands, commandAtOffset } from "./parsing/shell.js";

// Hierarchy
export type {
  JsonPrimitive,
  JsonValue,
  JsonObject,
  CommandHierarchy,
  HierarchyProvider,
} from "./hierarchy/types.js";
export {
  ROOT_METADATA_KEYS,
  COMMAND_METADATA_KEYS,
  BUILTIN_NODE_METADATA_KEYS,
  LEGACY_SIGNATURE_GROUPS,
} from "./hierarchy/keys.js";
export {
  isJsonObject,
  isJsonArray,
  getRootNode,
  getChildNode,
  getString,
  builtinNames,
  childNames,
  pluginNames,
  commandNames,
  isBuiltinNode,
  isBuiltinLeaf,
  findCaseInsensitive,
} from "./hierarchy/nodes.js";
export {
  HELP_OPTION_LABELS,
  signatureKind,
  optionPrefix,
  formatOptionLabel,
  paramIsRequired,
  optionLabelMatchesPrefix,
  optionName,
  optionParamName,
  normalizeOptionToParamName,
  usedParamNames,
  type KindPrefix,
} from "./hierarchy/options.js";
export { signatureParams, optionLabels, requiredOptionLabels, type SignatureParam } from "./hierarchy/signature.js";

// Language features
export {
  CompletionMode,
  determineMode,
  resolveCompletionContext,
  type CompletionContext,
} from "./language/context.js";
export { CompletionKind, getCompletions, type CompletionItem } from "./language/completions.js";
export { getHoverHelp, commandPath, type HelpProvider, type HoverOptions } from "./language/hover.js";

// Diagnostics
export {
  DiagnosticCode,
  DIAGNOSTIC_NAMESPACE,
  namespacedCode,
  issueSeverity,
  type IssueSeverity,
} from "./diagnostics/codes.js";
export {
  SUGGESTION_LIMIT,
  isExactMatch,
  getSuggestions,
  uniquePrefixMatch,
  formatDidYouMean,
} from "./diagnostics/matching.js";
export { type DiagnosticIssue } from "./diagnostics/stages.js";
export { validateCommand } from "./diagnostics/validator.js";
export { validateDocument, type ValidateDocumentOptions } from "./diagnostics/document.js";

// Runtime
export {
  DebounceScheduler,
  DebounceCancelledError,
  delay,
  isAbortError,
  type DebouncedAction,
  type DebounceSchedulerOptions,
} from "./runtime/debounce.js";
export { LazyCache, createCachedProvider } from "./runtime/lazy-cache.js";

// Shared
export { similarityRatio, closeMatches, type CloseMatchOptions } from "./shared/suggestions.js";
export {
  debug,
  configureDebug,
  DEFAULT_DEBUG_CONFIG,
  refreshDebugChannels,
  isDebugEnabled,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./shared/debug.js";
