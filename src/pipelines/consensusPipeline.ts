import { promises as fs, type Dirent } from "fs";
import path from "path";
import { ConfigurationError } from "../core/errors.js";
import type { PipelineSettings } from "../config/settings.js";
import type { Logger } from "../logging/logger.js";
import { majorityRuleConsensus } from "../tree/consensus.js";
import { formatNewick, parseNewickTrees, type TreeNode } from "../tree/newick.js";

export interface ConsensusRequest {
  treeDir: string;
  // Relative paths are taken inside treeDir.
  outputFile: string;
  threshold: number;
  annotateSupport: boolean;
  logger: Logger;
}

export interface ConsensusOutcome {
  outputPath: string;
  treeFiles: string[];
  treeCount: number;
  newick: string;
}

export function consensusRequest(settings: PipelineSettings, logger: Logger): ConsensusRequest {
  const cfg = settings.consensus;
  return {
    treeDir: cfg.tree_dir,
    outputFile: cfg.output_file,
    threshold: cfg.threshold,
    annotateSupport: cfg.annotate_support,
    logger
  };
}

export function consensusOutputPath(treeDir: string, outputFile: string): string {
  return path.resolve(path.resolve(treeDir), outputFile);
}

async function listTreeFiles(treeDir: string, outputPath: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(treeDir, { withFileTypes: true });
  } catch (e) {
    throw new ConfigurationError(`unable to read tree directory ${treeDir}`, { cause: e });
  }
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".nwk") && path.join(treeDir, e.name) !== outputPath)
    .map((e) => e.name)
    .sort();
}

/**
 * Majority-rule consensus over every `.nwk` file in a directory. Empty files
 * (replicates whose inference failed) are skipped.
 */
export async function buildConsensus(req: ConsensusRequest): Promise<ConsensusOutcome> {
  const treeDir = path.resolve(req.treeDir);
  const outputPath = consensusOutputPath(treeDir, req.outputFile);
  const names = await listTreeFiles(treeDir, outputPath);
  if (!names.length) throw new ConfigurationError(`no .nwk files found in ${treeDir}`);

  const trees: TreeNode[] = [];
  const treeFiles: string[] = [];
  for (const name of names) {
    const text = await fs.readFile(path.join(treeDir, name), "utf8");
    if (!text.trim()) {
      req.logger.warn({ file: name }, "empty tree file skipped");
      continue;
    }
    trees.push(...parseNewickTrees(text));
    treeFiles.push(name);
  }
  if (!trees.length) throw new ConfigurationError(`all .nwk files in ${treeDir} are empty`);

  const result = majorityRuleConsensus(trees, { threshold: req.threshold, annotateSupport: req.annotateSupport });
  const newick = formatNewick(result.tree);
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, `${newick}\n`, "utf8");
  req.logger.info(
    { trees: result.treeCount, leaves: result.leafCount, splits: result.splits.length, output: outputPath },
    "consensus tree written"
  );

  return { outputPath, treeFiles, treeCount: result.treeCount, newick };
}
