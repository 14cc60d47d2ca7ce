import { execFile } from "node:child_process";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { debug, type CommandHierarchy, type JsonObject, type JsonValue } from "@q2lsp/core";
import type { ServerSettings } from "./settings.js";
import { formatError, type Logger } from "./types.js";

const execFileAsync = promisify(execFile);

/** Upper bound for a hierarchy command; dumping every plugin can take a while. */
export const HIERARCHY_COMMAND_TIMEOUT_MS = 120_000;
const MAX_HIERARCHY_BYTES = 64 * 1024 * 1024;

export class HierarchyFormatError extends Error {
  override readonly name = "HierarchyFormatError";
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every((item) => isJsonValue(item));
      return Object.values(value).every((item) => isJsonValue(item));
    default:
      return false;
  }
}

function isJsonObjectValue(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isJsonValue(value);
}

/**
 * Parses a hierarchy dump. The top level must be an object whose values are
 * objects; anything deeper is left to the tolerant accessors in the core.
 */
export function parseHierarchy(json: string, origin: string): CommandHierarchy {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new HierarchyFormatError(`${origin}: invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new HierarchyFormatError(`${origin}: expected an object mapping the CLI name to its root node`);
  }

  const hierarchy: Record<string, JsonObject> = {};
  for (const [name, node] of Object.entries(parsed)) {
    if (!isJsonObjectValue(node)) {
      throw new HierarchyFormatError(`${origin}: root '${name}' is not an object`);
    }
    hierarchy[name] = node;
  }
  return hierarchy;
}

export async function readHierarchyFile(file: string): Promise<CommandHierarchy> {
  return parseHierarchy(await readFile(file, "utf8"), file);
}

export async function runHierarchyCommand(
  argv: readonly string[],
  options: { cwd?: string; timeoutMs?: number } = {},
): Promise<CommandHierarchy> {
  const [program, ...args] = argv;
  if (program === undefined) {
    throw new HierarchyFormatError("hierarchy command is empty");
  }
  const { stdout } = await execFileAsync(program, args, {
    cwd: options.cwd,
    timeout: options.timeoutMs ?? HIERARCHY_COMMAND_TIMEOUT_MS,
    maxBuffer: MAX_HIERARCHY_BYTES,
    encoding: "utf8",
  });
  return parseHierarchy(stdout, argv.join(" "));
}

/**
 * Picks the hierarchy builder for `settings`: a configured file wins over a
 * configured command; with neither the hierarchy is empty. The returned
 * builder logs how long the build took and rethrows failures so the cache
 * retries on the next request.
 */
export function createHierarchySource(
  settings: ServerSettings,
  workspaceRoot: string | null,
  logger: Logger,
): () => Promise<CommandHierarchy> {
  const cwd = workspaceRoot ?? process.cwd();
  let label: string;
  let build: () => Promise<CommandHierarchy>;

  if (settings.hierarchyFile !== null) {
    const file = path.resolve(cwd, settings.hierarchyFile);
    label = `file ${file}`;
    build = () => readHierarchyFile(file);
  } else if (settings.hierarchyCommand !== null) {
    const argv = settings.hierarchyCommand;
    label = `command '${argv.join(" ")}'`;
    build = () => runHierarchyCommand(argv, { cwd });
  } else {
    return async () => {
      logger.warn("[hierarchy] no hierarchy source configured; completions and diagnostics are disabled");
      return {};
    };
  }

  return async () => {
    const started = performance.now();
    logger.info(`[hierarchy] building from ${label}`);
    try {
      const hierarchy = await build();
      const elapsed = Math.round(performance.now() - started);
      logger.info(`[hierarchy] built in ${elapsed}ms (roots: ${Object.keys(hierarchy).join(", ") || "none"})`);
      debug.hierarchy("built", { source: label, ms: elapsed });
      return hierarchy;
    } catch (e) {
      const elapsed = Math.round(performance.now() - started);
      logger.error(`[hierarchy] build failed after ${elapsed}ms: ${formatError(e)}`);
      throw e;
    }
  };
}
