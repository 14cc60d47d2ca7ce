/**
 * Debug Channels
 *
 * Targeted debug logging for following what the analysis pipeline decides:
 * which command the cursor resolved to, which candidates a diagnostic stage
 * compared against, when a debounced pass was superseded.
 *
 * Enable via environment variable:
 * ```bash
 * Q2LSP_DEBUG=diagnostics npm test          # One channel
 * Q2LSP_DEBUG=completion,hover npm test     # Several
 * Q2LSP_DEBUG=* npm test                    # Everything
 * ```
 *
 * Channels are always present in code and cost a single no-op call when off.
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to stderr so stdio transports stay clean. */
  output: (message: string) => void;
}

export const DEFAULT_DEBUG_CONFIG: Readonly<DebugConfig> = {
  format: "pretty",
  timestamps: false,
  output: (message) => process.stderr.write(`${message}\n`),
};

let config: DebugConfig = { ...DEFAULT_DEBUG_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env["Q2LSP_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  if (parts.length === 0) return "{}";
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 5) return `[${value.map((v) => formatValue(v)).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Re-read Q2LSP_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.completion = createChannel("completion");
  debug.diagnostics = createChannel("diagnostics");
  debug.hover = createChannel("hover");
  debug.hierarchy = createChannel("hierarchy");
  debug.debounce = createChannel("debounce");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Completion context resolution and item synthesis */
  completion: createChannel("completion"),

  /** Validator stages and document passes */
  diagnostics: createChannel("diagnostics"),

  /** Hover path resolution */
  hover: createChannel("hover"),

  /** Hierarchy cache and sources */
  hierarchy: createChannel("hierarchy"),

  /** Debounce scheduling and supersession */
  debounce: createChannel("debounce"),
};

export type Debug = typeof debug;
