import { DEFAULT_CLI_NAME } from "@q2lsp/core";

/**
 * Server settings, resolved once at `initialize`. Each value comes from the
 * client's `initializationOptions`, else the environment, else a default.
 */
export interface ServerSettings {
  readonly cliName: string;
  readonly diagnosticsDelayMs: number;
  /** JSON dump of the command hierarchy. Relative paths resolve against the workspace root. */
  readonly hierarchyFile: string | null;
  /** Command (program + args) printing the hierarchy JSON on stdout. */
  readonly hierarchyCommand: readonly string[] | null;
  /** Executable asked for `--help` text on hover; null falls back to hierarchy metadata. */
  readonly qiimeExecutable: string | null;
  readonly helpTimeoutMs: number;
}

export const DEFAULT_SETTINGS: ServerSettings = {
  cliName: DEFAULT_CLI_NAME,
  diagnosticsDelayMs: 400,
  hierarchyFile: null,
  hierarchyCommand: null,
  qiimeExecutable: null,
  helpTimeoutMs: 10_000,
};

export const SettingsEnv = {
  cliName: "Q2LSP_CLI_NAME",
  diagnosticsDelayMs: "Q2LSP_DIAGNOSTICS_DELAY_MS",
  hierarchyFile: "Q2LSP_HIERARCHY_FILE",
  hierarchyCommand: "Q2LSP_HIERARCHY_COMMAND",
  qiimeExecutable: "Q2LSP_QIIME_EXECUTABLE",
  helpTimeoutMs: "Q2LSP_HELP_TIMEOUT_MS",
} as const;

type Env = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionString(options: Readonly<Record<string, unknown>>, key: string): string | undefined {
  const value = options[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function optionMs(options: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = options[key];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? Math.floor(value) : undefined;
}

function optionArgv(options: Readonly<Record<string, unknown>>, key: string): string[] | undefined {
  const value = options[key];
  if (!Array.isArray(value)) return undefined;
  const argv = value.filter((part): part is string => typeof part === "string" && part !== "");
  return argv.length > 0 ? argv : undefined;
}

function envString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envMs(env: Env, name: string): number | undefined {
  const raw = envString(env, name);
  if (raw === undefined || !/^\d+$/.test(raw)) return undefined;
  return Number.parseInt(raw, 10);
}

function envArgv(env: Env, name: string): string[] | undefined {
  const argv = envString(env, name)?.split(/\s+/);
  return argv && argv.length > 0 ? argv : undefined;
}

/** Values of the wrong type or out of range are ignored, not rejected. */
export function resolveSettings(initializationOptions: unknown, env: Env = process.env): ServerSettings {
  const options = isRecord(initializationOptions) ? initializationOptions : {};

  return {
    cliName: optionString(options, "cliName") ?? envString(env, SettingsEnv.cliName) ?? DEFAULT_SETTINGS.cliName,
    diagnosticsDelayMs:
      optionMs(options, "diagnosticsDelayMs") ??
      envMs(env, SettingsEnv.diagnosticsDelayMs) ??
      DEFAULT_SETTINGS.diagnosticsDelayMs,
    hierarchyFile:
      optionString(options, "hierarchyFile") ?? envString(env, SettingsEnv.hierarchyFile) ?? DEFAULT_SETTINGS.hierarchyFile,
    hierarchyCommand:
      optionArgv(options, "hierarchyCommand") ??
      envArgv(env, SettingsEnv.hierarchyCommand) ??
      DEFAULT_SETTINGS.hierarchyCommand,
    qiimeExecutable:
      optionString(options, "qiimeExecutable") ??
      envString(env, SettingsEnv.qiimeExecutable) ??
      DEFAULT_SETTINGS.qiimeExecutable,
    helpTimeoutMs:
      optionMs(options, "helpTimeoutMs") ?? envMs(env, SettingsEnv.helpTimeoutMs) ?? DEFAULT_SETTINGS.helpTimeoutMs,
  };
}
