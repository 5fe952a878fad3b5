import path from "path";
import type { Logger } from "../logging/logger.js";
import type { ToolInvoker, ToolSpec } from "../execution/backends/types.js";
import { isRegularFile, safeJoin, type UnitWorkspace } from "../execution/workspace.js";
import { readFastaRecords, writeFasta } from "../sequences/fasta.js";
import { labelContains, selectLongest } from "../sequences/selector.js";
import { logToolFailure, runStage } from "./stage.js";

export type SampleStatus = "extracted" | "no_region" | "skipped" | "failed";

export interface SampleOutcome {
  sampleId: string;
  // 0 unless status is "extracted".
  length: number;
  status: SampleStatus;
  detail: string | null;
}

export interface SampleContext {
  inputDir: string;
  inputSuffix: string;
  workspace: UnitWorkspace;
  regionLabel: string;
  tools: { predictor: ToolSpec; extractor: ToolSpec };
  invoker: ToolInvoker;
  logger: Logger;
  timeoutMs: number;
}

export interface SampleArtifacts {
  input: string;
  annotations: string;
  predictorLog: string;
  regions: string;
  selected: string;
}

export function sampleArtifacts(sampleId: string, ctx: Pick<SampleContext, "inputDir" | "inputSuffix" | "workspace" | "regionLabel">): SampleArtifacts {
  return {
    input: safeJoin(path.resolve(ctx.inputDir), `${sampleId}${ctx.inputSuffix}`),
    annotations: ctx.workspace.artifactPath(sampleId, "rrna.gff"),
    predictorLog: ctx.workspace.artifactPath(sampleId, "barrnap.log"),
    regions: ctx.workspace.artifactPath(sampleId, "rrna.fasta"),
    selected: ctx.workspace.artifactPath(sampleId, `${ctx.regionLabel}.fasta`)
  };
}

/**
 * input check -> region prediction -> region extraction -> longest labeled record.
 * Tool failures and a missing input resolve to length 0.
 */
export async function processSample(sampleId: string, ctx: SampleContext): Promise<SampleOutcome> {
  const log = ctx.logger.child({ sample_id: sampleId });
  const paths = sampleArtifacts(sampleId, ctx);
  const { predictor, extractor } = ctx.tools;

  if (!(await isRegularFile(paths.input))) {
    log.warn({ input: paths.input }, "input file not found, sample skipped");
    return { sampleId, length: 0, status: "skipped", detail: `missing input ${paths.input}` };
  }

  const predicted = await runStage(() =>
    ctx.invoker.run({
      program: predictor.command,
      args: [...predictor.args, paths.input],
      stdoutPath: paths.annotations,
      stderrPath: paths.predictorLog,
      timeoutMs: ctx.timeoutMs
    })
  );
  if (!predicted.ok) {
    logToolFailure(log, "predict", predicted.error);
    return { sampleId, length: 0, status: "failed", detail: predicted.error.message };
  }
  log.info({ annotations: paths.annotations }, "region prediction completed");

  const extracted = await runStage(() =>
    ctx.invoker.run({
      program: extractor.command,
      args: ["getfasta", "-fi", paths.input, "-bed", paths.annotations, "-fo", paths.regions, ...extractor.args],
      timeoutMs: ctx.timeoutMs
    })
  );
  if (!extracted.ok) {
    logToolFailure(log, "extract", extracted.error);
    return { sampleId, length: 0, status: "failed", detail: extracted.error.message };
  }
  log.info({ regions: paths.regions }, "regions extracted");

  const selection = await selectLongest(readFastaRecords(paths.regions), labelContains(ctx.regionLabel));
  if (!selection.found) {
    log.warn({ label: ctx.regionLabel }, "no matching region records");
    return { sampleId, length: 0, status: "no_region", detail: `no ${ctx.regionLabel} records` };
  }

  await writeFasta(paths.selected, [selection.record]);
  const length = selection.record.sequence.length;
  log.info({ length, record: selection.record.id }, `longest ${ctx.regionLabel} selected`);
  return { sampleId, length, status: "extracted", detail: null };
}
