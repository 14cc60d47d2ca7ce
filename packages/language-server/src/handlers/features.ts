/**
 * LSP feature handlers: completions, hover
 *
 * Each handler is wrapped in try/catch to prevent exceptions from destabilizing
 * the LSP connection. Errors are logged and graceful fallbacks are returned.
 */
import type { CompletionItem, CompletionParams, Hover, Position, TextDocumentPositionParams } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { commandPath, CompletionMode, getCompletions, getHoverHelp, resolveCompletionContext } from "@q2lsp/core";
import type { FeatureContext, ServerContext } from "../context.js";
import { mapCompletions, mapHover } from "../mapping/lsp-types.js";
import { formatError } from "../services/types.js";

export async function completionsAt(ctx: FeatureContext, doc: TextDocument, position: Position): Promise<CompletionItem[]> {
  const context = resolveCompletionContext(doc.getText(), doc.offsetAt(position), ctx.settings.cliName);
  if (context.mode === CompletionMode.None) return [];
  const hierarchy = await ctx.hierarchy.get();
  return mapCompletions(getCompletions(context, hierarchy), position, context.prefix);
}

/**
 * `--help` output when a help provider is configured, hierarchy metadata otherwise.
 * The help fetch is awaited before core hover runs, so core reads a settled value.
 */
export async function hoverAt(ctx: FeatureContext, doc: TextDocument, position: Position): Promise<Hover | null> {
  const text = doc.getText();
  const offset = doc.offsetAt(position);
  const cliName = ctx.settings.cliName;
  if (ctx.helpProvider) {
    const context = resolveCompletionContext(text, offset, cliName);
    if (context.command === null || context.currentToken === null) return null;
    const path = commandPath(context.command.tokens, context.tokenIndex);
    if (path === null) return null;
    const help = await ctx.helpProvider(path);
    return mapHover(getHoverHelp(text, offset, { helpProvider: () => help, cliName }));
  }
  const hierarchy = await ctx.hierarchy.get();
  return mapHover(getHoverHelp(text, offset, { hierarchy, cliName }));
}

export async function handleCompletion(ctx: ServerContext, params: CompletionParams): Promise<CompletionItem[]> {
  try {
    const doc = ctx.documents.get(params.textDocument.uri);
    if (!doc) return [];
    return await completionsAt(ctx, doc, params.position);
  } catch (e) {
    ctx.logger.error(`[completion] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return [];
  }
}

export async function handleHover(ctx: ServerContext, params: TextDocumentPositionParams): Promise<Hover | null> {
  try {
    const doc = ctx.documents.get(params.textDocument.uri);
    if (!doc) return null;
    return await hoverAt(ctx, doc, params.position);
  } catch (e) {
    ctx.logger.error(`[hover] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

/**
 * Registers all LSP feature handlers on the connection.
 */
export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onCompletion((params) => handleCompletion(ctx, params));
  ctx.connection.onHover((params) => handleHover(ctx, params));
}
