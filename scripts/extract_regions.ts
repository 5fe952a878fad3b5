import { runSampleBatch } from "../src/batch/sampleBatch.js";
import { assertKnownFlags, intFlag, listFlag, parseArgs, stringFlag } from "../src/cli/args.js";
import { cliLogger, loadCliSettings, openCliLedger } from "../src/cli/runtime.js";
import { LocalProcessInvoker } from "../src/execution/backends/localProcess.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/extract_regions.ts [--config <yaml>] [--samples <id,id,...>] [--input-dir <dir>] [--output-dir <dir>]",
    "                                 [--region <label>] [--concurrency <n>]",
    "",
    "Predicts rRNA regions with barrnap, extracts them with bedtools and keeps the",
    "longest region whose header contains the label. Writes one summary row per sample.",
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
  assertKnownFlags(args, ["config", "samples", "input-dir", "output-dir", "region", "concurrency"]);

  const settings = await loadCliSettings(stringFlag(args, "config"), {
    samples: {
      ids: listFlag(args, "samples"),
      input_dir: stringFlag(args, "input-dir"),
      output_dir: stringFlag(args, "output-dir"),
      region_label: stringFlag(args, "region"),
      concurrency: intFlag(args, "concurrency")
    }
  });
  const logger = cliLogger(settings, "extract_regions");
  const ledger = await openCliLedger();
  try {
    const report = await runSampleBatch(settings, {
      invoker: new LocalProcessInvoker(),
      logger,
      recorder: ledger?.recorder()
    });
    process.stdout.write(`${report.summaryPath}\n`);
  } finally {
    await ledger?.close();
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
