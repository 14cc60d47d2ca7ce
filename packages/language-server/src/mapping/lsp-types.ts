/**
 * Type mapping utilities: analysis results → LSP types
 */
import {
  CompletionItemKind,
  DiagnosticSeverity,
  type CompletionItem,
  type Diagnostic,
  type Hover,
  type Position,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import {
  CompletionKind,
  DIAGNOSTIC_NAMESPACE,
  issueSeverity,
  namespacedCode,
  type CompletionItem as Q2CompletionItem,
  type DiagnosticIssue,
} from "@q2lsp/core";

export function toLspCompletionKind(kind: CompletionKind): CompletionItemKind {
  switch (kind) {
    case CompletionKind.Plugin:
      return CompletionItemKind.Module;
    case CompletionKind.Action:
      return CompletionItemKind.Function;
    case CompletionKind.Parameter:
      return CompletionItemKind.Field;
    case CompletionKind.Builtin:
      return CompletionItemKind.Class;
  }
}

/** With a typed prefix, each item carries an edit replacing the prefix on the cursor line. */
export function mapCompletions(items: readonly Q2CompletionItem[], position: Position, prefix: string): CompletionItem[] {
  const replaceFrom = { line: position.line, character: Math.max(0, position.character - prefix.length) };
  return items.map((item) => {
    const completion: CompletionItem = {
      label: item.label,
      kind: toLspCompletionKind(item.kind),
      detail: item.detail,
    };
    const newText = item.insertText ?? item.label;
    if (item.insertText) completion.insertText = item.insertText;
    if (prefix) {
      completion.textEdit = { range: { start: replaceFrom, end: position }, newText };
    }
    return completion;
  });
}

export function mapDiagnostics(issues: readonly DiagnosticIssue[], doc: TextDocument): Diagnostic[] {
  return issues.map((issue) => ({
    range: { start: doc.positionAt(issue.start), end: doc.positionAt(issue.end) },
    message: issue.message,
    severity: issueSeverity(issue.code) === "error" ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
    code: namespacedCode(issue.code),
    source: DIAGNOSTIC_NAMESPACE,
  }));
}

export function mapHover(text: string | null): Hover | null {
  if (!text) return null;
  return { contents: { kind: "plaintext", value: text } };
}
