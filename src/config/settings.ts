import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import { canonicalizeJson, sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import type { JsonObject } from "../core/json.js";
import type { ToolSpec } from "../execution/backends/types.js";

const zToolSpec = (command: string, args: string[]) =>
  z
    .object({
      command: z.string().min(1),
      args: z.array(z.string()).default(args)
    })
    .prefault({ command });

export const zItemId = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "ids may only contain letters, digits, '.', '_' and '-'");

const zConcurrency = z.number().int().min(1).max(64).default(1);

export const zPipelineConfig = z.object({
  version: z.literal(1),
  logging: z
    .object({
      level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
    })
    .prefault({}),
  tools: z
    .object({
      barrnap: zToolSpec("barrnap", ["--kingdom", "euk"]),
      bedtools: zToolSpec("bedtools", []),
      mafft: zToolSpec("mafft", ["--auto"]),
      fasttree: zToolSpec("FastTree", ["-nt", "-gtr", "-gamma"]),
      timeout_seconds: z.number().int().min(0).default(0)
    })
    .prefault({}),
  samples: z
    .object({
      ids: z.array(zItemId).default([]),
      input_dir: z.string().min(1).default("data/scaffolds"),
      input_suffix: z.string().min(1).default("_scaffolds.fasta"),
      output_dir: z.string().min(1).default("var/barrnap_results"),
      region_label: z.string().min(1).default("18S"),
      summary_file: z.string().min(1).default("summary_18S_extraction.csv"),
      concurrency: zConcurrency
    })
    .prefault({}),
  alignment: z
    .object({
      input_dir: z.string().min(1).default("var/barrnap_results"),
      input_suffix: z.string().min(1).default("_18S.fasta"),
      combined_path: z.string().min(1).default("var/all_18s.fasta"),
      aligned_path: z.string().min(1).default("var/aligned_18s.fasta")
    })
    .prefault({}),
  bootstrap: z
    .object({
      alignment_path: z.string().min(1).default("var/aligned_18s.fasta"),
      output_dir: z.string().min(1).default("var/bootstrap_trees"),
      replicates: z.number().int().min(1).max(100_000).default(100),
      seed: z.string().min(1).nullable().default(null),
      concurrency: zConcurrency
    })
    .prefault({}),
  consensus: z
    .object({
      tree_dir: z.string().min(1).default("var/bootstrap_trees"),
      output_file: z.string().min(1).default("consensus.nwk"),
      threshold: z.number().min(0.5).max(1).default(0.5),
      annotate_support: z.boolean().default(false)
    })
    .prefault({}),
  gateway: z
    .object({
      path_prefix_allowlist: z.array(z.string().min(1)).default([])
    })
    .prefault({})
});

export type PipelineConfig = z.output<typeof zPipelineConfig>;
export type SamplesConfig = PipelineConfig["samples"];
export type AlignmentConfig = PipelineConfig["alignment"];
export type BootstrapConfig = PipelineConfig["bootstrap"];
export type ConsensusConfig = PipelineConfig["consensus"];
export type LogLevel = PipelineConfig["logging"]["level"];

export interface SettingsPatch {
  samples?: Partial<SamplesConfig>;
  alignment?: Partial<AlignmentConfig>;
  bootstrap?: Partial<BootstrapConfig>;
  consensus?: Partial<ConsensusConfig>;
}

function lookupEnv(varName: string, where: string): string {
  const v = process.env[varName]?.trim();
  if (!v) throw new ConfigurationError(`environment variable ${varName} is not set (referenced at ${where})`);
  return v;
}

// `$VAR` as a whole value, or `${VAR}` anywhere inside one.
function expandEnvString(value: string, where: string): string {
  const whole = /^\$([A-Z0-9_]+)$/.exec(value.trim());
  if (whole?.[1]) return lookupEnv(whole[1], where);
  return value.replace(/\$\{([A-Z0-9_]+)\}/g, (_match, varName: string) => lookupEnv(varName, where));
}

function expandEnv(value: unknown, where: string): unknown {
  if (typeof value === "string") return expandEnvString(value, where);
  if (Array.isArray(value)) return value.map((v, i) => expandEnv(v, `${where}[${i}]`));
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnv(v, where ? `${where}.${k}` : k);
    return out;
  }
  return value;
}

function definedEntries(patch: object | undefined): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(patch ?? {})) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/**
 * Validated pipeline settings. Built once at startup and handed to every
 * workflow; nothing else reads configuration from the environment.
 */
export class PipelineSettings {
  readonly settingsHash: `sha256:${string}`;

  private constructor(private readonly config: PipelineConfig) {
    this.settingsHash = sha256Prefixed(stableJsonStringify(config));
  }

  static fromObject(raw: unknown, source = "settings"): PipelineSettings {
    const parsed = zPipelineConfig.safeParse(expandEnv(raw, ""));
    if (!parsed.success) {
      throw new ConfigurationError(`invalid ${source}: ${z.prettifyError(parsed.error)}`);
    }
    return new PipelineSettings(parsed.data);
  }

  static async loadFromFile(filePath: string): Promise<PipelineSettings> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (e) {
      throw new ConfigurationError(`unable to read settings at ${filePath}`, { cause: e });
    }
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (e) {
      throw new ConfigurationError(`settings at ${filePath} are not valid YAML`, { cause: e });
    }
    return PipelineSettings.fromObject(parsed, `settings at ${filePath}`);
  }

  override(patch: SettingsPatch): PipelineSettings {
    return PipelineSettings.fromObject({
      ...this.config,
      samples: { ...this.config.samples, ...definedEntries(patch.samples) },
      alignment: { ...this.config.alignment, ...definedEntries(patch.alignment) },
      bootstrap: { ...this.config.bootstrap, ...definedEntries(patch.bootstrap) },
      consensus: { ...this.config.consensus, ...definedEntries(patch.consensus) }
    });
  }

  snapshot(): JsonObject {
    const value = canonicalizeJson(this.config);
    if (typeof value !== "object" || value === null || Array.isArray(value)) return {};
    return value;
  }

  get samples(): SamplesConfig {
    return this.config.samples;
  }

  get alignment(): AlignmentConfig {
    return this.config.alignment;
  }

  get bootstrap(): BootstrapConfig {
    return this.config.bootstrap;
  }

  get consensus(): ConsensusConfig {
    return this.config.consensus;
  }

  get logLevel(): LogLevel {
    return this.config.logging.level;
  }

  tool(name: "barrnap" | "bedtools" | "mafft" | "fasttree"): ToolSpec {
    const spec = this.config.tools[name];
    return { command: spec.command, args: [...spec.args] };
  }

  toolTimeoutMs(): number {
    return this.config.tools.timeout_seconds * 1000;
  }

  pathPrefixAllowlist(): string[] {
    return [...this.config.gateway.path_prefix_allowlist];
  }
}
