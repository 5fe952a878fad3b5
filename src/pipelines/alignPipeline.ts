import { promises as fs, type Dirent } from "fs";
import path from "path";
import { ConfigurationError } from "../core/errors.js";
import type { PipelineSettings } from "../config/settings.js";
import type { Logger } from "../logging/logger.js";
import type { ToolInvoker, ToolSpec } from "../execution/backends/types.js";
import { logToolFailure, runStage } from "./stage.js";

export interface AlignContext {
  inputDir: string;
  inputSuffix: string;
  combinedPath: string;
  alignedPath: string;
  aligner: ToolSpec;
  invoker: ToolInvoker;
  logger: Logger;
  timeoutMs: number;
}

export interface AlignOutcome {
  success: boolean;
  mergedFiles: string[];
  combinedPath: string;
  alignedPath: string;
  detail: string | null;
}

export function alignContext(settings: PipelineSettings, deps: { invoker: ToolInvoker; logger: Logger }): AlignContext {
  const cfg = settings.alignment;
  return {
    inputDir: cfg.input_dir,
    inputSuffix: cfg.input_suffix,
    combinedPath: cfg.combined_path,
    alignedPath: cfg.aligned_path,
    aligner: settings.tool("mafft"),
    invoker: deps.invoker,
    logger: deps.logger,
    timeoutMs: settings.toolTimeoutMs()
  };
}

async function listRegionFiles(inputDir: string, suffix: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(inputDir, { withFileTypes: true });
  } catch (e) {
    throw new ConfigurationError(`unable to read region directory ${inputDir}`, { cause: e });
  }
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(suffix))
    .map((e) => e.name)
    .sort();
}

/** Concatenates every `*{suffix}` file of a directory, in name order. */
export async function mergeFastaFiles(
  inputDir: string,
  suffix: string,
  combinedPath: string,
  logger: Logger
): Promise<string[]> {
  const dir = path.resolve(inputDir);
  const names = await listRegionFiles(dir, suffix);
  if (!names.length) throw new ConfigurationError(`no *${suffix} files found in ${dir}`);

  await fs.mkdir(path.dirname(path.resolve(combinedPath)), { recursive: true });
  const chunks: string[] = [];
  for (const name of names) {
    logger.debug({ file: name }, "adding region file");
    const text = await fs.readFile(path.join(dir, name), "utf8");
    chunks.push(text.length && !text.endsWith("\n") ? `${text}\n` : text);
  }
  await fs.writeFile(combinedPath, chunks.join(""), "utf8");
  logger.info({ files: names.length, combined: combinedPath }, "region files merged");
  return names;
}

export async function buildAlignment(ctx: AlignContext): Promise<AlignOutcome> {
  const mergedFiles = await mergeFastaFiles(ctx.inputDir, ctx.inputSuffix, ctx.combinedPath, ctx.logger);
  await fs.mkdir(path.dirname(path.resolve(ctx.alignedPath)), { recursive: true });

  const aligned = await runStage(() =>
    ctx.invoker.run({
      program: ctx.aligner.command,
      args: [...ctx.aligner.args, ctx.combinedPath],
      stdoutPath: ctx.alignedPath,
      stderrPath: `${ctx.alignedPath}.log`,
      timeoutMs: ctx.timeoutMs
    })
  );

  const base = { mergedFiles, combinedPath: ctx.combinedPath, alignedPath: ctx.alignedPath };
  if (!aligned.ok) {
    logToolFailure(ctx.logger, "align", aligned.error);
    return { ...base, success: false, detail: aligned.error.message };
  }
  ctx.logger.info({ aligned: ctx.alignedPath }, "alignment written");
  return { ...base, success: true, detail: null };
}
