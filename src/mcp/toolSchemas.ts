import * as z from "zod/v4";
import { zItemId } from "../config/settings.js";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
const zPath = z.string().min(1).max(4096);
const zConcurrency = z.number().int().min(1).max(64);

export const zRunRef = z.object({
  run_id: zRunId
});

export const zSampleBatchRunInput = z.object({
  sample_ids: z.array(zItemId).min(1).max(10000).optional(),
  input_dir: zPath.optional(),
  output_dir: zPath.optional(),
  concurrency: zConcurrency.optional()
});

export const zSampleStatus = z.enum(["extracted", "no_region", "skipped", "failed"]);

export const zSampleBatchRunOutput = zRunRef.extend({
  summary_path: z.string(),
  counts: z.object({
    extracted: z.number().int(),
    no_region: z.number().int(),
    skipped: z.number().int(),
    failed: z.number().int()
  }),
  samples: z.array(
    z.object({
      sample_id: z.string(),
      length: z.number().int(),
      status: zSampleStatus
    })
  )
});

export const zBootstrapBatchRunInput = z.object({
  alignment_path: zPath.optional(),
  output_dir: zPath.optional(),
  replicates: z.number().int().min(1).max(100000).optional(),
  seed: z.string().min(1).max(256).optional(),
  concurrency: zConcurrency.optional()
});

export const zBootstrapBatchRunOutput = zRunRef.extend({
  output_dir: z.string(),
  succeeded: z.number().int(),
  failed: z.number().int(),
  replicates: z.array(
    z.object({
      index: z.number().int(),
      success: z.boolean(),
      tree_path: z.string().nullable()
    })
  )
});

export const zAlignmentBuildInput = z.object({
  input_dir: zPath.optional(),
  combined_path: zPath.optional(),
  aligned_path: zPath.optional()
});

export const zAlignmentBuildOutput = z.object({
  success: z.boolean(),
  merged_files: z.array(z.string()),
  combined_path: z.string(),
  aligned_path: z.string(),
  detail: z.string().nullable()
});

export const zConsensusBuildInput = z.object({
  tree_dir: zPath.optional(),
  output_file: zPath.optional(),
  threshold: z.number().min(0.5).max(1).optional(),
  annotate_support: z.boolean().optional()
});

export const zConsensusBuildOutput = z.object({
  output_path: z.string(),
  tree_files: z.array(z.string()),
  tree_count: z.number().int(),
  newick: z.string()
});

export const zBatchRunGetInput = zRunRef;

export const zBatchRunGetOutput = z.object({
  run: z.object({
    run_id: zRunId,
    workflow: z.enum(["sample_regions", "bootstrap_replicates"]),
    status: z.enum(["running", "succeeded", "failed"]),
    settings_hash: z.string(),
    params: z.record(z.string(), z.unknown()),
    item_count: z.number().int(),
    created_at: z.string(),
    finished_at: z.string().nullable(),
    summary: z.record(z.string(), z.unknown()).nullable(),
    error: z.string().nullable()
  }),
  items: z.array(
    z.object({
      position: z.number().int(),
      item_key: z.string(),
      status: z.string(),
      value: z.number().int().nullable(),
      detail: z.string().nullable()
    })
  )
});
