import { assertKnownFlags, parseArgs, stringFlag } from "../src/cli/args.js";
import { cliLogger, loadCliSettings } from "../src/cli/runtime.js";
import { LocalProcessInvoker } from "../src/execution/backends/localProcess.js";
import { alignContext, buildAlignment } from "../src/pipelines/alignPipeline.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/align_regions.ts [--config <yaml>] [--input-dir <dir>] [--combined <fasta>] [--aligned <fasta>]",
    "",
    "Concatenates the extracted region files and aligns them with MAFFT.",
    "",
    "env:",
    "  PIPELINE_CONFIG (default config/default.pipeline.yaml)",
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
  assertKnownFlags(args, ["config", "input-dir", "combined", "aligned"]);

  const settings = await loadCliSettings(stringFlag(args, "config"), {
    alignment: {
      input_dir: stringFlag(args, "input-dir"),
      combined_path: stringFlag(args, "combined"),
      aligned_path: stringFlag(args, "aligned")
    }
  });
  const logger = cliLogger(settings, "align_regions");
  const outcome = await buildAlignment(alignContext(settings, { invoker: new LocalProcessInvoker(), logger }));
  if (!outcome.success) {
    process.exitCode = 1;
    return;
  }
  process.stdout.write(`${outcome.alignedPath}\n`);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
