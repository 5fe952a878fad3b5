import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { PipelineSettings } from "../config/settings.js";
import type { Logger } from "../logging/logger.js";
import type { ToolInvoker } from "../execution/backends/types.js";
import { ensureWritableDir, unitWorkspace } from "../execution/workspace.js";
import { readAlignment, type Alignment } from "../sequences/alignment.js";
import { replicateRandom } from "../resampling/random.js";
import { processReplicate, type ReplicateContext, type ReplicateOutcome } from "../pipelines/replicatePipeline.js";
import { runBatch } from "./driver.js";
import type { BatchRecorder } from "./recorder.js";

export interface ReplicateBatchDeps {
  invoker: ToolInvoker;
  logger: Logger;
  recorder?: BatchRecorder;
}

export interface ReplicateBatchReport {
  outputDir: string;
  outcomes: ReplicateOutcome[];
  succeeded: number;
  failed: number;
}

async function loadSourceAlignment(filePath: string): Promise<Alignment> {
  try {
    return await readAlignment(filePath);
  } catch (e) {
    throw new ConfigurationError(`unable to load source alignment ${filePath}: ${errorMessage(e)}`, { cause: e });
  }
}

/**
 * Draws `bootstrap.replicates` column-resampled replicates of one alignment and
 * infers a tree for each. Replicates are independent; a failed one is logged
 * and the rest still run.
 */
export async function runReplicateBatch(settings: PipelineSettings, deps: ReplicateBatchDeps): Promise<ReplicateBatchReport> {
  const cfg = settings.bootstrap;
  const logger = deps.logger;

  const outputDir = await ensureWritableDir(cfg.output_dir);
  const source = await loadSourceAlignment(cfg.alignment_path);
  logger.info({ sequences: source.records.length, columns: source.columnCount }, "source alignment loaded");

  const ctx: ReplicateContext = {
    source,
    workspace: unitWorkspace(outputDir),
    treeBuilder: settings.tool("fasttree"),
    invoker: deps.invoker,
    logger,
    timeoutMs: settings.toolTimeoutMs(),
    randomFor: (index) => replicateRandom(cfg.seed, index)
  };

  const indices = Array.from({ length: cfg.replicates }, (_, i) => i + 1);

  try {
    await deps.recorder?.start({
      workflow: "bootstrap_replicates",
      itemCount: indices.length,
      settingsHash: settings.settingsHash,
      params: { alignment_path: cfg.alignment_path, output_dir: outputDir, replicates: cfg.replicates, seed: cfg.seed }
    });

    const outcomes = await runBatch(indices, (index) => processReplicate(index, ctx), {
      concurrency: cfg.concurrency,
      sentinel: (index, error): ReplicateOutcome => {
        logger.error({ replicate: index, err: error }, "replicate failed");
        return { index, success: false, treePath: null, detail: errorMessage(error) };
      },
      onOutcome: async (outcome, position) => {
        await deps.recorder?.item({
          position,
          itemKey: `replicate_${outcome.index}`,
          status: outcome.success ? "inferred" : "failed",
          value: null,
          detail: outcome.detail
        });
      }
    });

    const succeeded = outcomes.filter((o) => o.success).length;
    const failed = outcomes.length - succeeded;
    await deps.recorder?.finish({ succeeded, failed, output_dir: outputDir });
    logger.info({ succeeded, failed, output_dir: outputDir }, "all bootstrap replicates completed");
    return { outputDir, outcomes, succeeded, failed };
  } catch (e) {
    await deps.recorder?.fail(errorMessage(e));
    throw e;
  }
}
