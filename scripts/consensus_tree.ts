import { assertKnownFlags, booleanFlag, numberFlag, parseArgs, stringFlag } from "../src/cli/args.js";
import { cliLogger, loadCliSettings } from "../src/cli/runtime.js";
import { buildConsensus, consensusRequest } from "../src/pipelines/consensusPipeline.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/consensus_tree.ts [--config <yaml>] [--tree-dir <dir>] [--output <file>] [--threshold <0.5..1>]",
    "                                [--annotate-support]",
    "",
    "Majority-rule consensus of every .nwk file in the tree directory.",
    "",
    "env:",
    "  PIPELINE_CONFIG (default config/default.pipeline.yaml)",
    "  LOG_LEVEL (optional)",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2), ["annotate-support"]);
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  assertKnownFlags(args, ["config", "tree-dir", "output", "threshold", "annotate-support"]);

  const settings = await loadCliSettings(stringFlag(args, "config"), {
    consensus: {
      tree_dir: stringFlag(args, "tree-dir"),
      output_file: stringFlag(args, "output"),
      threshold: numberFlag(args, "threshold"),
      annotate_support: booleanFlag(args, "annotate-support")
    }
  });
  const logger = cliLogger(settings, "consensus_tree");
  const outcome = await buildConsensus(consensusRequest(settings, logger));
  process.stdout.write(`${outcome.newick}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
