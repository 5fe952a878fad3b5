import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { PipelineSettings } from "../src/config/settings.js";
import { ConfigurationError } from "../src/core/errors.js";

describe("PipelineSettings", () => {
  afterEach(() => {
    delete process.env.RIBOTREE_TEST_DATA;
  });

  it("loads the shipped defaults", async () => {
    const settings = await PipelineSettings.loadFromFile(path.resolve("config/default.pipeline.yaml"));
    expect(settings.tool("barrnap")).toEqual({ command: "barrnap", args: ["--kingdom", "euk"] });
    expect(settings.tool("fasttree")).toEqual({ command: "FastTree", args: ["-nt", "-gtr", "-gamma"] });
    expect(settings.bootstrap.replicates).toBe(100);
    expect(settings.bootstrap.seed).toBeNull();
    expect(settings.samples.summary_file).toBe("summary_18S_extraction.csv");
    expect(settings.toolTimeoutMs()).toBe(0);
    expect(settings.settingsHash).toMatch(/^sha256:[a-f0-9]{64}$/);
  });

  it("fills every section from defaults", () => {
    const settings = PipelineSettings.fromObject({ version: 1 });
    expect(settings.samples.ids).toEqual([]);
    expect(settings.consensus).toEqual({
      tree_dir: "var/bootstrap_trees",
      output_file: "consensus.nwk",
      threshold: 0.5,
      annotate_support: false
    });
    expect(settings.logLevel).toBe("info");
    expect(Object.keys(settings.snapshot())).toEqual(["alignment", "bootstrap", "consensus", "gateway", "logging", "samples", "tools", "version"]);
  });

  it("expands environment variables in string values", () => {
    process.env.RIBOTREE_TEST_DATA = "/srv/ribo";
    const settings = PipelineSettings.fromObject({
      version: 1,
      samples: { input_dir: "${RIBOTREE_TEST_DATA}/scaffolds", output_dir: "$RIBOTREE_TEST_DATA" }
    });
    expect(settings.samples.input_dir).toBe("/srv/ribo/scaffolds");
    expect(settings.samples.output_dir).toBe("/srv/ribo");
  });

  it("rejects unset variables and invalid values", () => {
    expect(() => PipelineSettings.fromObject({ version: 1, samples: { input_dir: "${RIBOTREE_TEST_DATA}" } })).toThrow(
      "environment variable RIBOTREE_TEST_DATA is not set (referenced at samples.input_dir)"
    );
    expect(() => PipelineSettings.fromObject({ version: 2 })).toThrow(ConfigurationError);
    expect(() => PipelineSettings.fromObject({ version: 1, samples: { ids: ["../escape"] } })).toThrow(ConfigurationError);
    expect(() => PipelineSettings.fromObject({ version: 1, bootstrap: { replicates: 0 } })).toThrow(ConfigurationError);
    expect(() => PipelineSettings.fromObject({ version: 1, consensus: { threshold: 0.4 } })).toThrow(ConfigurationError);
  });

  it("overrides single fields and ignores undefined ones", () => {
    const base = PipelineSettings.fromObject({ version: 1, bootstrap: { replicates: 10, seed: "a" } });
    const next = base.override({ bootstrap: { replicates: 20, seed: undefined }, samples: { ids: ["S1"] } });
    expect(next.bootstrap.replicates).toBe(20);
    expect(next.bootstrap.seed).toBe("a");
    expect(next.samples.ids).toEqual(["S1"]);
    expect(base.bootstrap.replicates).toBe(10);
    expect(next.settingsHash).not.toBe(base.settingsHash);
    expect(() => base.override({ bootstrap: { concurrency: 0 } })).toThrow(ConfigurationError);
  });

  it("reports unreadable and malformed files", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "ribotree-settings-"));
    try {
      await expect(PipelineSettings.loadFromFile(path.join(dir, "none.yaml"))).rejects.toThrow(ConfigurationError);
      const bad = path.join(dir, "bad.yaml");
      await writeFile(bad, "version: [1\n", "utf8");
      await expect(PipelineSettings.loadFromFile(bad)).rejects.toThrow("is not valid YAML");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
