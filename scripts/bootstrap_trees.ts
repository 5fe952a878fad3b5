import { runReplicateBatch } from "../src/batch/replicateBatch.js";
import { assertKnownFlags, intFlag, parseArgs, stringFlag } from "../src/cli/args.js";
import { cliLogger, loadCliSettings, openCliLedger } from "../src/cli/runtime.js";
import { LocalProcessInvoker } from "../src/execution/backends/localProcess.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/bootstrap_trees.ts [--config <yaml>] [--alignment <fasta>] [--output-dir <dir>]",
    "                                 [--replicates <n>] [--seed <text>] [--concurrency <n>]",
    "",
    "Resamples alignment columns with replacement and infers one FastTree tree per replicate.",
    "The same --seed reproduces the same replicate alignments.",
    "",
    "env:",
    "  PIPELINE_CONFIG (default config/default.pipeline.yaml)",
    "  DATABASE_URL (optional, records the batch in the run ledger)",
    "  LOG_LEVEL (optional)",
    ""
  ].join("\n");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(usage());
    return;
  }
  assertKnownFlags(args, ["config", "alignment", "output-dir", "replicates", "seed", "concurrency"]);

  const settings = await loadCliSettings(stringFlag(args, "config"), {
    bootstrap: {
      alignment_path: stringFlag(args, "alignment"),
      output_dir: stringFlag(args, "output-dir"),
      replicates: intFlag(args, "replicates"),
      seed: stringFlag(args, "seed"),
      concurrency: intFlag(args, "concurrency")
    }
  });
  const logger = cliLogger(settings, "bootstrap_trees");
  const ledger = await openCliLedger();
  try {
    const report = await runReplicateBatch(settings, {
      invoker: new LocalProcessInvoker(),
      logger,
      recorder: ledger?.recorder()
    });
    process.stdout.write(`${report.succeeded}/${report.outcomes.length} trees in ${report.outputDir}\n`);
  } finally {
    await ledger?.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
