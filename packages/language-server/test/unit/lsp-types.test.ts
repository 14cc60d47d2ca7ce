/**
 * Unit tests for LSP type mapping utilities.
 *
 * These test pure transformation functions without starting a server.
 */
import { describe, test, expect } from "vitest";
import { CompletionItemKind, DiagnosticSeverity } from "vscode-languageserver/node.js";
import { CompletionKind, DiagnosticCode } from "@q2lsp/core";
import { mapCompletions, mapDiagnostics, mapHover, toLspCompletionKind } from "@q2lsp/language-server/api";
import { doc } from "../helpers/test-factories.js";

test("toLspCompletionKind", () => {
  expect(toLspCompletionKind(CompletionKind.Plugin)).toBe(CompletionItemKind.Module);
  expect(toLspCompletionKind(CompletionKind.Action)).toBe(CompletionItemKind.Function);
  expect(toLspCompletionKind(CompletionKind.Parameter)).toBe(CompletionItemKind.Field);
  expect(toLspCompletionKind(CompletionKind.Builtin)).toBe(CompletionItemKind.Class);
});

describe("mapCompletions", () => {
  test("maps items without an edit when nothing was typed", () => {
    const items = [{ label: "info", detail: "Display info", kind: CompletionKind.Builtin }];

    expect(mapCompletions(items, { line: 0, character: 6 }, "")).toEqual([
      { label: "info", kind: CompletionItemKind.Class, detail: "Display info" },
    ]);
  });

  test("replaces the typed prefix on the cursor line", () => {
    const items = [{ label: "--i-table", detail: "(required)", kind: CompletionKind.Parameter }];

    expect(mapCompletions(items, { line: 2, character: 10 }, "--i")).toEqual([
      {
        label: "--i-table",
        kind: CompletionItemKind.Field,
        detail: "(required)",
        textEdit: {
          range: { start: { line: 2, character: 7 }, end: { line: 2, character: 10 } },
          newText: "--i-table",
        },
      },
    ]);
  });

  test("inserts insertText when it differs from the label", () => {
    const items = [{ label: "table", detail: "", kind: CompletionKind.Parameter, insertText: "--i-table" }];

    const [item] = mapCompletions(items, { line: 0, character: 3 }, "tab");

    expect(item?.insertText).toBe("--i-table");
    expect(item?.textEdit).toEqual({
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 3 } },
      newText: "--i-table",
    });
  });
});

describe("mapDiagnostics", () => {
  const document = doc("qiime feature-tabel\nqiime feature-table summarize");

  test("converts offsets and namespaces the code", () => {
    const issues = [
      {
        message: "Unknown QIIME command 'feature-tabel'.",
        start: 6,
        end: 19,
        code: DiagnosticCode.UnknownRoot,
        suggestions: [],
      },
    ];

    expect(mapDiagnostics(issues, document)).toEqual([
      {
        range: { start: { line: 0, character: 6 }, end: { line: 0, character: 19 } },
        message: "Unknown QIIME command 'feature-tabel'.",
        severity: DiagnosticSeverity.Warning,
        code: "q2lsp/unknown-root",
        source: "q2lsp",
      },
    ]);
  });

  test("a missing required option is an error", () => {
    const issues = [
      {
        message: "Required option '--i-table' is not specified.",
        start: 40,
        end: 49,
        code: DiagnosticCode.MissingRequiredOption,
        suggestions: [],
      },
    ];

    const [diagnostic] = mapDiagnostics(issues, document);

    expect(diagnostic?.severity).toBe(DiagnosticSeverity.Error);
    expect(diagnostic?.range).toEqual({ start: { line: 1, character: 20 }, end: { line: 1, character: 29 } });
  });
});

test("mapHover", () => {
  expect(mapHover(null)).toBeNull();
  expect(mapHover("")).toBeNull();
  expect(mapHover("Usage: qiime info")).toEqual({ contents: { kind: "plaintext", value: "Usage: qiime info" } });
});
