#!/usr/bin/env node
/**
 * q2lsp Language Server - Entry Point
 *
 * This is a thin entry point that creates the connection and hands it to the
 * server. The actual logic is split into:
 *
 * - server.ts             - Wiring of document store, logger and handlers
 * - context.ts            - ServerContext with settings, hierarchy cache and scheduler
 * - mapping/lsp-types.ts  - Type conversion from analysis results to LSP types
 * - handlers/features.ts  - LSP feature handlers (completions, hover)
 * - handlers/lifecycle.ts - Lifecycle, document events and diagnostics scheduling
 *
 * The transport (`--stdio`, `--node-ipc`, `--socket=<port>`) is chosen by
 * the command-line flags.
 */
import { createConnection, ProposedFeatures } from "vscode-languageserver/node.js";
import { startServer } from "./server.js";

startServer(createConnection(ProposedFeatures.all));
