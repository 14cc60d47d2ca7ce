import { splitCommands, type CommandHierarchy, type ParsedCommand } from "@q2lsp/core";

/** The single command in `text`; fails the test when there is none. */
export function parseCommand(text: string, cliName?: string): ParsedCommand {
  const [command] = splitCommands(text, cliName);
  if (command === undefined) {
    throw new Error(`no command in ${JSON.stringify(text)}`);
  }
  return command;
}

/** One plugin, one action, one required input. */
export const MINIMAL_HIERARCHY: CommandHierarchy = {
  qiime: {
    builtins: [],
    "feature-table": {
      summarize: {
        signature: [{ name: "table", signature_type: "input" }],
      },
    },
  },
};

export const HIERARCHY: CommandHierarchy = {
  qiime: {
    name: "qiime",
    help: "QIIME 2 command-line interface",
    short_help: "QIIME 2 CLI",
    builtins: ["info", "tools"],
    info: {
      type: "builtin",
      name: "info",
      short_help: "Display information about current deployment.",
    },
    tools: {
      type: "builtin",
      name: "tools",
      short_help: "Tools for working with QIIME 2 files.",
      import: {
        description: "Import data into a new QIIME 2 Artifact.",
        signature: [
          { name: "type", type: "text", description: "The semantic type of the artifact.", required: true },
          { name: "input_path", type: "path", required: true },
          { name: "output_path", type: "path", required: true },
        ],
      },
      export: {
        description: "Export data from a QIIME 2 Artifact.",
        signature: [],
      },
    },
    "feature-table": {
      id: "feature_table",
      name: "feature-table",
      version: "2024.10.0",
      short_description: "Plugin for working with sample by feature tables.",
      description: "Generic operations on feature tables.",
      summarize: {
        description: "Summarize table",
        epilog: ["See also: tabulate-seqs"],
        signature: [
          {
            name: "table",
            type: "FeatureTable[Frequency]",
            signature_type: "input",
            description: "The feature table to be summarized.",
          },
          {
            name: "sample_metadata",
            type: "Metadata",
            signature_type: "metadata",
            default: null,
            description: "The sample metadata.",
          },
          { name: "visualization", type: "Visualization", signature_type: "output" },
        ],
      },
      rarefy: {
        description: "Rarefy table",
        signature: [
          { name: "table", type: "FeatureTable[Frequency]", signature_type: "input" },
          { name: "sampling_depth", type: "Int", signature_type: "parameter" },
          { name: "with_replacement", type: "Bool", signature_type: "parameter", default: false },
          { name: "rarefied_table", type: "FeatureTable[Frequency]", signature_type: "output" },
        ],
      },
    },
    diversity: {
      name: "diversity",
      description: "Plugin for exploring community diversity.",
      "alpha-rarefaction": {
        description: "Alpha rarefaction curves",
        signature: {
          inputs: [{ name: "table", type: "FeatureTable[Frequency]", signature_type: "input" }],
          parameters: [{ name: "max_depth", type: "Int", signature_type: "parameter" }],
          outputs: [{ name: "visualization", type: "Visualization", signature_type: "output" }],
        },
      },
    },
  },
};
