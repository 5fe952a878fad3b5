import type { Logger } from "../logging/logger.js";
import type { ToolInvoker, ToolSpec } from "../execution/backends/types.js";
import type { UnitWorkspace } from "../execution/workspace.js";
import type { Alignment } from "../sequences/alignment.js";
import { writeFasta } from "../sequences/fasta.js";
import { bootstrapAlignment } from "../resampling/bootstrap.js";
import type { RandomSource } from "../resampling/random.js";
import { logToolFailure, runStage } from "./stage.js";

export interface ReplicateOutcome {
  index: number;
  success: boolean;
  treePath: string | null;
  detail: string | null;
}

export interface ReplicateContext {
  // Shared by every replicate, never written.
  source: Alignment;
  workspace: UnitWorkspace;
  treeBuilder: ToolSpec;
  invoker: ToolInvoker;
  logger: Logger;
  timeoutMs: number;
  randomFor(index: number): RandomSource;
}

export interface ReplicateArtifacts {
  alignment: string;
  tree: string;
  log: string;
}

export function replicateArtifacts(index: number, workspace: UnitWorkspace): ReplicateArtifacts {
  return {
    alignment: workspace.artifactPath("replicate", `${index}.fasta`),
    tree: workspace.artifactPath("replicate", `${index}.nwk`),
    log: workspace.artifactPath(`replicate_${index}`, "fasttree.log")
  };
}

export async function processReplicate(index: number, ctx: ReplicateContext): Promise<ReplicateOutcome> {
  const log = ctx.logger.child({ replicate: index });
  const paths = replicateArtifacts(index, ctx.workspace);

  const replicate = bootstrapAlignment(ctx.source, ctx.randomFor(index));
  await writeFasta(paths.alignment, replicate.alignment.records);

  const inferred = await runStage(() =>
    ctx.invoker.run({
      program: ctx.treeBuilder.command,
      args: [...ctx.treeBuilder.args, paths.alignment],
      stdoutPath: paths.tree,
      stderrPath: paths.log,
      timeoutMs: ctx.timeoutMs
    })
  );
  if (!inferred.ok) {
    logToolFailure(log, "infer", inferred.error);
    return { index, success: false, treePath: null, detail: inferred.error.message };
  }

  log.info({ tree: paths.tree }, "replicate tree written");
  return { index, success: true, treePath: paths.tree, detail: null };
}
