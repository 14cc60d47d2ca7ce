import { TextDocuments, type Connection } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { createServerContext, type ServerContext } from "./context.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers } from "./handlers/lifecycle.js";
import type { Logger } from "./services/types.js";

export const LOG_PREFIX = "[q2lsp]";

/** Logger that writes to the LSP connection console. */
export function createConnectionLogger(connection: Connection): Logger {
  return {
    log: (m: string) => connection.console.log(`${LOG_PREFIX} ${m}`),
    info: (m: string) => connection.console.info(`${LOG_PREFIX} ${m}`),
    warn: (m: string) => connection.console.warn(`${LOG_PREFIX} ${m}`),
    error: (m: string) => connection.console.error(`${LOG_PREFIX} ${m}`),
  };
}

export interface StartServerOptions {
  /** Environment consulted for settings. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Wires the document store and all handlers onto `connection` and starts
 * listening. Any transport works: stdio from the entry point, in-memory
 * streams in tests.
 */
export function startServer(connection: Connection, options: StartServerOptions = {}): ServerContext {
  const documents = new TextDocuments(TextDocument);
  const ctx = createServerContext({
    connection,
    documents,
    logger: createConnectionLogger(connection),
    env: options.env,
  });

  registerLifecycleHandlers(ctx);
  registerFeatureHandlers(ctx);

  documents.listen(connection);
  connection.listen();
  return ctx;
}
