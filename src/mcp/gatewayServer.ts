import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import type { PipelineSettings } from "../config/settings.js";
import { ConfigurationError, SequenceFormatError, TreeFormatError } from "../core/errors.js";
import { isRunId } from "../core/ids.js";
import type { Logger } from "../logging/logger.js";
import type { ToolInvoker } from "../execution/backends/types.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { PathPolicy } from "../policy/pathPolicy.js";
import { BatchRun } from "../runs/batchRun.js";
import { runSampleBatch } from "../batch/sampleBatch.js";
import { runReplicateBatch } from "../batch/replicateBatch.js";
import { alignContext, buildAlignment } from "../pipelines/alignPipeline.js";
import { buildConsensus, consensusOutputPath, consensusRequest } from "../pipelines/consensusPipeline.js";
import {
  zAlignmentBuildInput,
  zAlignmentBuildOutput,
  zBatchRunGetInput,
  zBatchRunGetOutput,
  zBootstrapBatchRunInput,
  zBootstrapBatchRunOutput,
  zConsensusBuildInput,
  zConsensusBuildOutput,
  zSampleBatchRunInput,
  zSampleBatchRunOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  settings: PipelineSettings;
  store: PostgresStore;
  invoker: ToolInvoker;
  logger: Logger;
}

// Bad input surfaces as InvalidParams; policy refusals are already McpErrors.
function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof ConfigurationError || e instanceof SequenceFormatError || e instanceof TreeFormatError) {
    return new McpError(ErrorCode.InvalidParams, e.message);
  }
  return e;
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "ribotree-gateway",
    version: "0.1.0"
  });
  const policy = new PathPolicy(deps.settings.pathPrefixAllowlist());

  mcp.registerTool(
    "sample_batch_run",
    {
      description: "Predict rRNA regions for each sample and keep the longest matching region per sample.",
      inputSchema: zSampleBatchRunInput,
      outputSchema: zSampleBatchRunOutput
    },
    async (args) => {
      const logger = deps.logger.child({ tool: "sample_batch_run" });
      try {
        const settings = deps.settings.override({
          samples: {
            ids: args.sample_ids,
            input_dir: await policy.assertAllowedOptional(args.input_dir, "input_dir"),
            output_dir: await policy.assertAllowedOptional(args.output_dir, "output_dir"),
            concurrency: args.concurrency
          }
        });
        const run = new BatchRun(deps.store);
        const report = await runSampleBatch(settings, { invoker: deps.invoker, logger, recorder: run });

        const structured: z.infer<typeof zSampleBatchRunOutput> = {
          run_id: run.runId,
          summary_path: report.summaryPath,
          counts: report.counts,
          samples: report.outcomes.map((o) => ({ sample_id: o.sampleId, length: o.length, status: o.status }))
        };
        return {
          content: [
            {
              type: "text",
              text: `Processed ${report.outcomes.length} samples (${report.counts.extracted} extracted) into ${report.summaryPath}`
            }
          ],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "bootstrap_batch_run",
    {
      description: "Draw column-resampled replicates of an alignment and infer one tree per replicate.",
      inputSchema: zBootstrapBatchRunInput,
      outputSchema: zBootstrapBatchRunOutput
    },
    async (args) => {
      const logger = deps.logger.child({ tool: "bootstrap_batch_run" });
      try {
        const settings = deps.settings.override({
          bootstrap: {
            alignment_path: await policy.assertAllowedOptional(args.alignment_path, "alignment_path"),
            output_dir: await policy.assertAllowedOptional(args.output_dir, "output_dir"),
            replicates: args.replicates,
            seed: args.seed,
            concurrency: args.concurrency
          }
        });
        const run = new BatchRun(deps.store);
        const report = await runReplicateBatch(settings, { invoker: deps.invoker, logger, recorder: run });

        const structured: z.infer<typeof zBootstrapBatchRunOutput> = {
          run_id: run.runId,
          output_dir: report.outputDir,
          succeeded: report.succeeded,
          failed: report.failed,
          replicates: report.outcomes.map((o) => ({ index: o.index, success: o.success, tree_path: o.treePath }))
        };
        return {
          content: [{ type: "text", text: `Inferred ${report.succeeded} of ${report.outcomes.length} replicate trees` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "alignment_build",
    {
      description: "Merge the extracted region files and align them.",
      inputSchema: zAlignmentBuildInput,
      outputSchema: zAlignmentBuildOutput
    },
    async (args) => {
      const logger = deps.logger.child({ tool: "alignment_build" });
      try {
        const settings = deps.settings.override({
          alignment: {
            input_dir: await policy.assertAllowedOptional(args.input_dir, "input_dir"),
            combined_path: await policy.assertAllowedOptional(args.combined_path, "combined_path"),
            aligned_path: await policy.assertAllowedOptional(args.aligned_path, "aligned_path")
          }
        });
        const outcome = await buildAlignment(alignContext(settings, { invoker: deps.invoker, logger }));

        const structured: z.infer<typeof zAlignmentBuildOutput> = {
          success: outcome.success,
          merged_files: outcome.mergedFiles,
          combined_path: outcome.combinedPath,
          aligned_path: outcome.alignedPath,
          detail: outcome.detail
        };
        return {
          content: [
            {
              type: "text",
              text: outcome.success
                ? `Aligned ${outcome.mergedFiles.length} region files into ${outcome.alignedPath}`
                : `Alignment failed: ${outcome.detail ?? "unknown error"}`
            }
          ],
          structuredContent: structured,
          isError: !outcome.success
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "consensus_build",
    {
      description: "Majority-rule consensus of the replicate trees in a directory.",
      inputSchema: zConsensusBuildInput,
      outputSchema: zConsensusBuildOutput
    },
    async (args) => {
      const logger = deps.logger.child({ tool: "consensus_build" });
      try {
        const settings = deps.settings.override({
          consensus: {
            tree_dir: await policy.assertAllowedOptional(args.tree_dir, "tree_dir"),
            output_file: args.output_file,
            threshold: args.threshold,
            annotate_support: args.annotate_support
          }
        });
        const req = consensusRequest(settings, logger);
        if (args.output_file !== undefined) {
          await policy.assertAllowed(consensusOutputPath(req.treeDir, req.outputFile), "output_file");
        }
        const outcome = await buildConsensus(req);

        const structured: z.infer<typeof zConsensusBuildOutput> = {
          output_path: outcome.outputPath,
          tree_files: outcome.treeFiles,
          tree_count: outcome.treeCount,
          newick: outcome.newick
        };
        return {
          content: [{ type: "text", text: outcome.newick }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "batch_run_get",
    {
      description: "Fetch a recorded batch and its per-item outcomes from the run ledger.",
      inputSchema: zBatchRunGetInput,
      outputSchema: zBatchRunGetOutput
    },
    async (args) => {
      if (!isRunId(args.run_id)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${args.run_id}`);
      const run = await deps.store.getBatchRun(args.run_id);
      if (!run) throw new McpError(ErrorCode.InvalidParams, `unknown run_id: ${args.run_id}`);
      const items = await deps.store.listBatchItems(run.runId);

      const structured: z.infer<typeof zBatchRunGetOutput> = {
        run: {
          run_id: run.runId,
          workflow: run.workflow,
          status: run.status,
          settings_hash: run.settingsHash,
          params: run.params,
          item_count: run.itemCount,
          created_at: run.createdAt,
          finished_at: run.finishedAt,
          summary: run.summary,
          error: run.error
        },
        items: items.map((i) => ({
          position: i.position,
          item_key: i.itemKey,
          status: i.status,
          value: i.value,
          detail: i.detail
        }))
      };
      return {
        content: [{ type: "text", text: `${run.workflow} ${run.runId}: ${run.status} (${items.length}/${run.itemCount} items)` }],
        structuredContent: structured
      };
    }
  );

  return mcp;
}
