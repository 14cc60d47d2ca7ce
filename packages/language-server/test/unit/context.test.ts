import { describe, test, expect } from "vitest";
import { TextDocumentSyncKind } from "vscode-languageserver/node.js";
import { diagnosticsFor, DEFAULT_SETTINGS, handleInitialize } from "@q2lsp/language-server/api";
import { doc, HIERARCHY, HIERARCHY_FILE, serverContext } from "../helpers/test-factories.js";

describe("createServerContext", () => {
  test("starts from the defaults", () => {
    const { ctx } = serverContext();

    expect(ctx.settings).toEqual(DEFAULT_SETTINGS);
    expect(ctx.workspaceRoot).toBeNull();
    expect(ctx.helpProvider).toBeNull();
  });

  test("configure replaces the hierarchy cache", async () => {
    const { ctx } = serverContext();
    const before = ctx.hierarchy;

    ctx.configure({ ...DEFAULT_SETTINGS, hierarchyFile: HIERARCHY_FILE });

    expect(ctx.hierarchy).not.toBe(before);
    await expect(ctx.hierarchy.get()).resolves.toEqual(HIERARCHY);
  });

  test("configure installs a help provider only with an executable", () => {
    const { ctx } = serverContext();

    ctx.configure({ ...DEFAULT_SETTINGS, qiimeExecutable: "qiime" });
    expect(typeof ctx.helpProvider).toBe("function");

    ctx.configure(DEFAULT_SETTINGS);
    expect(ctx.helpProvider).toBeNull();
  });
});

describe("handleInitialize", () => {
  test("resolves settings from options and environment", () => {
    const { ctx, logger } = serverContext({ Q2LSP_CLI_NAME: "q2" });

    const result = handleInitialize(ctx, {
      processId: null,
      rootUri: "file:///work/project",
      capabilities: {},
      initializationOptions: { diagnosticsDelayMs: 5 },
    });

    expect(ctx.workspaceRoot).toBe("/work/project");
    expect(ctx.settings.cliName).toBe("q2");
    expect(ctx.settings.diagnosticsDelayMs).toBe(5);
    expect(logger.info).toHaveBeenCalledWith("initialize: root=/work/project cli=q2 delay=5ms help=<hierarchy>");
    expect(result).toEqual({
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Incremental,
        completionProvider: { triggerCharacters: [" ", "-"] },
        hoverProvider: true,
      },
      serverInfo: { name: "q2lsp" },
    });
  });

  test("works without a workspace root", () => {
    const { ctx } = serverContext();

    handleInitialize(ctx, { processId: null, rootUri: null, capabilities: {} });

    expect(ctx.workspaceRoot).toBeNull();
  });
});

test("diagnosticsFor maps issues to document positions", () => {
  const diagnostics = diagnosticsFor({ settings: DEFAULT_SETTINGS }, doc("qiime \\\nfeature-tabel x"), HIERARCHY);

  expect(diagnostics.map((d) => [d.code, d.range])).toEqual([
    ["q2lsp/unknown-root", { start: { line: 1, character: 0 }, end: { line: 1, character: 13 } }],
  ]);
});
