import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { PipelineSettings } from "../src/config/settings.js";
import { ConfigurationError } from "../src/core/errors.js";
import { silentLogger } from "../src/logging/logger.js";
import { runSampleBatch } from "../src/batch/sampleBatch.js";
import type { BatchItemRecord, BatchRecorder } from "../src/batch/recorder.js";
import type { JsonObject } from "../src/core/json.js";
import { FakeInvoker, fakeRegionTools } from "./helpers/fakeInvoker.js";

class MemoryRecorder implements BatchRecorder {
  readonly events: string[] = [];
  readonly items: BatchItemRecord[] = [];
  summary: JsonObject | null = null;

  async start(info: { workflow: string; itemCount: number }): Promise<void> {
    this.events.push(`start ${info.workflow} ${info.itemCount}`);
  }
  async item(record: BatchItemRecord): Promise<void> {
    this.items.push(record);
  }
  async finish(summary: JsonObject): Promise<void> {
    this.events.push("finish");
    this.summary = summary;
  }
  async fail(message: string): Promise<void> {
    this.events.push(`fail ${message}`);
  }
}

const REGIONS = {
  S1: ">r1 18S_rRNA::scaf1:10-18\nACGTACGT\n>r2 18S_rRNA::scaf2:1-4\nACG\n>r3 28S_rRNA::scaf1:40-55\nAAAAAAAAAAAAAAA\n",
  S2: { fail: "barrnap" as const },
  S3: ">r1 5_8S_rRNA::scaf9:1-6\nACGTAC\n"
};

describe("runSampleBatch", () => {
  let tmpDir: string;
  let inputDir: string;
  let outputDir: string;

  function settings(ids: string[], extra: Record<string, unknown> = {}): PipelineSettings {
    return PipelineSettings.fromObject({
      version: 1,
      samples: { ids, input_dir: inputDir, output_dir: outputDir, ...extra }
    });
  }

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "ribotree-samples-"));
    inputDir = path.join(tmpDir, "scaffolds");
    outputDir = path.join(tmpDir, "out");
    await mkdir(inputDir);
    for (const id of ["S1", "S2", "S3"]) {
      await writeFile(path.join(inputDir, `${id}_scaffolds.fasta`), `>${id}_scaffold\nACGT\n`, "utf8");
    }
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("writes one row per sample with 0 for every sample without a region", async () => {
    const invoker = new FakeInvoker(fakeRegionTools(REGIONS));
    const report = await runSampleBatch(settings(["S1", "S2", "S3", "S4"]), { invoker, logger: silentLogger() });

    expect(await readFile(report.summaryPath, "utf8")).toBe(
      "SampleID,Longest18S_Length\r\nS1,8\r\nS2,0\r\nS3,0\r\nS4,0\r\n"
    );
    expect(report.summaryPath).toBe(path.join(outputDir, "summary_18S_extraction.csv"));
    expect(report.outcomes.map((o) => o.status)).toEqual(["extracted", "failed", "no_region", "skipped"]);
    expect(report.counts).toEqual({ extracted: 1, no_region: 1, skipped: 1, failed: 1 });
    expect(await readFile(path.join(outputDir, "S1_18S.fasta"), "utf8")).toBe(">r1 18S_rRNA::scaf1:10-18\nACGTACGT\n");
  });

  it("runs barrnap then bedtools with the configured arguments", async () => {
    const invoker = new FakeInvoker(fakeRegionTools(REGIONS));
    await runSampleBatch(settings(["S1"]), { invoker, logger: silentLogger() });

    const input = path.join(inputDir, "S1_scaffolds.fasta");
    expect(invoker.calls.map((c) => [c.program, [...c.args]])).toEqual([
      ["barrnap", ["--kingdom", "euk", input]],
      [
        "bedtools",
        [
          "getfasta",
          "-fi",
          input,
          "-bed",
          path.join(outputDir, "S1_rrna.gff"),
          "-fo",
          path.join(outputDir, "S1_rrna.fasta")
        ]
      ]
    ]);
    expect(invoker.calls[0]?.stdoutPath).toBe(path.join(outputDir, "S1_rrna.gff"));
    expect(invoker.calls[0]?.stderrPath).toBe(path.join(outputDir, "S1_barrnap.log"));
  });

  it("never invokes tools for a missing input", async () => {
    const invoker = new FakeInvoker(fakeRegionTools(REGIONS));
    const report = await runSampleBatch(settings(["S4"]), { invoker, logger: silentLogger() });
    expect(invoker.calls).toEqual([]);
    expect(report.outcomes).toEqual([
      { sampleId: "S4", length: 0, status: "skipped", detail: `missing input ${path.join(inputDir, "S4_scaffolds.fasta")}` }
    ]);
  });

  it("records 0 when a processor throws something other than a tool failure", async () => {
    const invoker = new FakeInvoker({
      ...fakeRegionTools(REGIONS),
      bedtools: async (inv) => {
        const fo = inv.args[inv.args.indexOf("-fo") + 1] ?? "";
        await writeFile(fo, "not fasta\n", "utf8");
        return {};
      }
    });
    const report = await runSampleBatch(settings(["S1", "S3"]), { invoker, logger: silentLogger() });
    expect(report.outcomes.map((o) => [o.sampleId, o.length, o.status])).toEqual([
      ["S1", 0, "failed"],
      ["S3", 0, "failed"]
    ]);
  });

  it("produces the same table on a re-run and under concurrency", async () => {
    const ids = ["S3", "S1", "S4", "S2"];
    const first = await runSampleBatch(settings(ids), {
      invoker: new FakeInvoker(fakeRegionTools(REGIONS)),
      logger: silentLogger()
    });
    const firstTable = await readFile(first.summaryPath, "utf8");
    const second = await runSampleBatch(settings(ids, { concurrency: 4 }), {
      invoker: new FakeInvoker(fakeRegionTools(REGIONS)),
      logger: silentLogger()
    });
    expect(await readFile(second.summaryPath, "utf8")).toBe(firstTable);
    expect(firstTable).toBe("SampleID,Longest18S_Length\r\nS3,0\r\nS1,8\r\nS4,0\r\nS2,0\r\n");
  });

  it("reports every item to the recorder in order", async () => {
    const recorder = new MemoryRecorder();
    await runSampleBatch(settings(["S1", "S2"]), {
      invoker: new FakeInvoker(fakeRegionTools(REGIONS)),
      logger: silentLogger(),
      recorder
    });
    expect(recorder.events).toEqual(["start sample_regions 2", "finish"]);
    expect(recorder.items.map((i) => [i.position, i.itemKey, i.status, i.value])).toEqual([
      [0, "S1", "extracted", 8],
      [1, "S2", "failed", 0]
    ]);
    expect(recorder.summary).toMatchObject({ extracted: 1, failed: 1, no_region: 0, skipped: 0 });
  });

  it("writes only the header for an empty work list", async () => {
    const report = await runSampleBatch(settings([]), {
      invoker: new FakeInvoker(fakeRegionTools(REGIONS)),
      logger: silentLogger()
    });
    expect(await readFile(report.summaryPath, "utf8")).toBe("SampleID,Longest18S_Length\r\n");
  });

  it("aborts before any sample on duplicate ids or an unusable output directory", async () => {
    const invoker = new FakeInvoker(fakeRegionTools(REGIONS));
    await expect(runSampleBatch(settings(["S1", "S1"]), { invoker, logger: silentLogger() })).rejects.toThrow(
      ConfigurationError
    );

    const blocker = path.join(tmpDir, "blocker");
    await writeFile(blocker, "", "utf8");
    outputDir = path.join(blocker, "out");
    await expect(runSampleBatch(settings(["S1"]), { invoker, logger: silentLogger() })).rejects.toThrow(ConfigurationError);
    expect(invoker.calls).toEqual([]);
  });
});
