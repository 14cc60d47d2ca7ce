import type { Connection, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { DebounceScheduler, LazyCache, type CommandHierarchy } from "@q2lsp/core";
import { createHelpProvider, type AsyncHelpProvider } from "./services/help-provider.js";
import { createHierarchySource } from "./services/hierarchy-source.js";
import { DEFAULT_SETTINGS, type ServerSettings } from "./services/settings.js";
import { formatError, type Logger } from "./services/types.js";

/**
 * Shared server context passed to all handlers.
 * Holds the connection, the document store and the analysis services.
 */
export interface ServerContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
  readonly logger: Logger;
  /** Pending diagnostics passes, keyed by document URI. */
  readonly scheduler: DebounceScheduler;
  /** Environment consulted for settings at initialize. */
  readonly env: Readonly<Record<string, string | undefined>>;

  // Set during onInitialize
  workspaceRoot: string | null;
  settings: ServerSettings;
  hierarchy: LazyCache<CommandHierarchy>;
  helpProvider: AsyncHelpProvider | null;

  /** Applies `settings`, replacing the hierarchy cache and help provider. */
  configure(settings: ServerSettings): void;
}

/** What the completion and hover handlers read. */
export type FeatureContext = Pick<ServerContext, "settings" | "hierarchy" | "helpProvider">;

export interface ServerContextInit {
  connection: Connection;
  documents: TextDocuments<TextDocument>;
  logger: Logger;
  env?: Readonly<Record<string, string | undefined>>;
}

export function createServerContext(init: ServerContextInit): ServerContext {
  const { connection, documents, logger } = init;

  const scheduler = new DebounceScheduler({
    onError: (uri, e) => logger.error(`[diagnostics] failed for ${uri}: ${formatError(e)}`),
  });

  const ctx: ServerContext = {
    connection,
    documents,
    logger,
    scheduler,
    env: init.env ?? process.env,
    workspaceRoot: null,
    settings: DEFAULT_SETTINGS,
    hierarchy: new LazyCache(createHierarchySource(DEFAULT_SETTINGS, null, logger)),
    helpProvider: null,

    configure(settings) {
      ctx.settings = settings;
      ctx.hierarchy = new LazyCache(createHierarchySource(settings, ctx.workspaceRoot, logger));
      ctx.helpProvider =
        settings.qiimeExecutable === null
          ? null
          : createHelpProvider({
              executable: settings.qiimeExecutable,
              timeoutMs: settings.helpTimeoutMs,
              logger,
              cwd: ctx.workspaceRoot ?? undefined,
            });
    },
  };
  return ctx;
}
