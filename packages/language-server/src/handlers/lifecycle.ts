/**
 * LSP lifecycle handlers: initialize, document events, diagnostics scheduling
 */
import {
  TextDocumentSyncKind,
  type Diagnostic,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { URI } from "vscode-uri";
import { debug, validateDocument, type CommandHierarchy } from "@q2lsp/core";
import type { ServerContext } from "../context.js";
import { mapDiagnostics } from "../mapping/lsp-types.js";
import { resolveSettings } from "../services/settings.js";
import { formatError } from "../services/types.js";

export const COMPLETION_TRIGGER_CHARACTERS = [" ", "-"];

export function diagnosticsFor(
  ctx: Pick<ServerContext, "settings">,
  doc: TextDocument,
  hierarchy: CommandHierarchy,
): Diagnostic[] {
  const issues = validateDocument(doc.getText(), hierarchy, { cliName: ctx.settings.cliName });
  return mapDiagnostics(issues, doc);
}

/**
 * One diagnostics pass for the document at `version`. Superseded passes stop
 * at the next abort check; a pass whose document changed or closed while it
 * waited for the hierarchy publishes nothing.
 */
export async function publishDiagnostics(
  ctx: ServerContext,
  uri: string,
  version: number,
  signal: AbortSignal,
): Promise<void> {
  const hierarchy = await ctx.hierarchy.get();
  signal.throwIfAborted();

  const doc = ctx.documents.get(uri);
  if (!doc || doc.version !== version) {
    debug.diagnostics("stale", { uri, version, current: doc?.version ?? null });
    return;
  }

  const diagnostics = diagnosticsFor(ctx, doc, hierarchy);
  signal.throwIfAborted();
  await ctx.connection.sendDiagnostics({ uri, diagnostics });
}

export function scheduleDiagnostics(ctx: ServerContext, doc: TextDocument, delayMs: number): Promise<void> {
  const { uri, version } = doc;
  return ctx.scheduler.schedule(uri, (signal) => publishDiagnostics(ctx, uri, version, signal), delayMs);
}

export async function closeDocument(ctx: ServerContext, uri: string): Promise<void> {
  try {
    await ctx.scheduler.cancel(uri);
    await ctx.connection.sendDiagnostics({ uri, diagnostics: [] });
  } catch (e) {
    ctx.logger.error(`[diagnostics] clearing failed for ${uri}: ${formatError(e)}`);
  }
}

export function handleInitialize(ctx: ServerContext, params: InitializeParams): InitializeResult {
  ctx.workspaceRoot = params.rootUri ? URI.parse(params.rootUri).fsPath : null;
  ctx.configure(resolveSettings(params.initializationOptions, ctx.env));
  const { cliName, diagnosticsDelayMs, qiimeExecutable } = ctx.settings;
  ctx.logger.info(
    `initialize: root=${ctx.workspaceRoot ?? "<cwd>"} cli=${cliName} delay=${diagnosticsDelayMs}ms help=${qiimeExecutable ?? "<hierarchy>"}`,
  );
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: { triggerCharacters: COMPLETION_TRIGGER_CHARACTERS },
      hoverProvider: true,
    },
    serverInfo: { name: "q2lsp" },
  };
}

/**
 * Registers all lifecycle handlers on the connection and documents.
 */
export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params) => handleInitialize(ctx, params));

  // Start the hierarchy build early; the first request would otherwise wait for it.
  ctx.connection.onInitialized(() => {
    void ctx.hierarchy.get().catch((e: unknown) => {
      ctx.logger.warn(`[hierarchy] prefetch failed, retrying on first request: ${formatError(e)}`);
    });
  });

  ctx.connection.onShutdown(() => ctx.scheduler.cancelAll());

  // The document store reports an open as an open followed by a content change.
  const justOpened = new Set<string>();

  ctx.documents.onDidOpen((e) => {
    ctx.logger.log(`didOpen ${e.document.uri}`);
    justOpened.add(e.document.uri);
    void scheduleDiagnostics(ctx, e.document, 0);
  });

  ctx.documents.onDidChangeContent((e) => {
    if (justOpened.delete(e.document.uri)) return;
    void scheduleDiagnostics(ctx, e.document, ctx.settings.diagnosticsDelayMs);
  });

  ctx.documents.onDidClose((e) => {
    ctx.logger.log(`didClose ${e.document.uri}`);
    justOpened.delete(e.document.uri);
    void closeDocument(ctx, e.document.uri);
  });
}
