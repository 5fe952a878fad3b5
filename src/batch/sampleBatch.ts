import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { PipelineSettings } from "../config/settings.js";
import type { Logger } from "../logging/logger.js";
import type { ToolInvoker } from "../execution/backends/types.js";
import { ensureWritableDir, safeJoin, unitWorkspace } from "../execution/workspace.js";
import { processSample, type SampleContext, type SampleOutcome, type SampleStatus } from "../pipelines/samplePipeline.js";
import { runBatch } from "./driver.js";
import type { BatchRecorder } from "./recorder.js";
import { SummaryTableWriter } from "./summaryTable.js";

export interface SampleBatchDeps {
  invoker: ToolInvoker;
  logger: Logger;
  recorder?: BatchRecorder;
}

export interface SampleBatchReport {
  summaryPath: string;
  outcomes: SampleOutcome[];
  counts: Record<SampleStatus, number>;
}

export function countSampleStatuses(outcomes: readonly SampleOutcome[]): Record<SampleStatus, number> {
  const counts: Record<SampleStatus, number> = { extracted: 0, no_region: 0, skipped: 0, failed: 0 };
  for (const o of outcomes) counts[o.status]++;
  return counts;
}

function assertUniqueIds(ids: readonly string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) throw new ConfigurationError(`duplicate sample id in work list: ${id}`);
    seen.add(id);
  }
}

/**
 * Runs the sample pipeline over `samples.ids` and writes one summary row per
 * sample, in list order, with 0 for samples that produced no region.
 */
export async function runSampleBatch(settings: PipelineSettings, deps: SampleBatchDeps): Promise<SampleBatchReport> {
  const cfg = settings.samples;
  const logger = deps.logger;
  assertUniqueIds(cfg.ids);

  const outDir = await ensureWritableDir(cfg.output_dir);
  const summaryPath = safeJoin(outDir, cfg.summary_file);

  const ctx: SampleContext = {
    inputDir: cfg.input_dir,
    inputSuffix: cfg.input_suffix,
    workspace: unitWorkspace(outDir),
    regionLabel: cfg.region_label,
    tools: { predictor: settings.tool("barrnap"), extractor: settings.tool("bedtools") },
    invoker: deps.invoker,
    logger,
    timeoutMs: settings.toolTimeoutMs()
  };

  let table: SummaryTableWriter;
  try {
    table = await SummaryTableWriter.create(summaryPath);
  } catch (e) {
    throw new ConfigurationError(`unable to create summary table ${summaryPath}`, { cause: e });
  }

  if (!cfg.ids.length) logger.warn("sample work list is empty");

  try {
    await deps.recorder?.start({
      workflow: "sample_regions",
      itemCount: cfg.ids.length,
      settingsHash: settings.settingsHash,
      params: { sample_ids: cfg.ids, input_dir: cfg.input_dir, output_dir: outDir, region_label: cfg.region_label }
    });

    const outcomes = await runBatch(cfg.ids, (sampleId) => processSample(sampleId, ctx), {
      concurrency: cfg.concurrency,
      sentinel: (sampleId, error): SampleOutcome => {
        logger.error({ sample_id: sampleId, err: error }, "sample processing failed");
        return { sampleId, length: 0, status: "failed", detail: errorMessage(error) };
      },
      onOutcome: async (outcome, position) => {
        await table.append(outcome.sampleId, outcome.length);
        await deps.recorder?.item({
          position,
          itemKey: outcome.sampleId,
          status: outcome.status,
          value: outcome.length,
          detail: outcome.detail
        });
      }
    });

    const counts = countSampleStatuses(outcomes);
    await deps.recorder?.finish({ ...counts, summary_path: summaryPath });
    logger.info({ ...counts, summary: summaryPath }, "all samples processed");
    return { summaryPath, outcomes, counts };
  } catch (e) {
    await deps.recorder?.fail(errorMessage(e));
    throw e;
  } finally {
    await table.close();
  }
}
