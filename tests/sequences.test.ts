import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { SequenceFormatError } from "../src/core/errors.js";
import { collectRecords, formatFasta, parseFasta, readFastaRecords, writeFasta } from "../src/sequences/fasta.js";
import { labelContains, selectLongest } from "../src/sequences/selector.js";
import { createAlignment, readAlignment } from "../src/sequences/alignment.js";

describe("FASTA", () => {
  it("parses ids, full headers and multi-line sequences", async () => {
    const records = await collectRecords(parseFasta(">r1 18S_rRNA::s1:10-20\nACGT\nAC\n\n>r2\r\nGG\r\n"));
    expect(records).toEqual([
      { id: "r1", description: "r1 18S_rRNA::s1:10-20", sequence: "ACGTAC" },
      { id: "r2", description: "r2", sequence: "GG" }
    ]);
  });

  it("rejects sequence data before the first header", async () => {
    await expect(collectRecords(parseFasta("ACGT\n>r1\nAC\n"))).rejects.toThrow(SequenceFormatError);
  });

  it("yields nothing for an empty file", async () => {
    expect(await collectRecords(parseFasta(""))).toEqual([]);
  });

  it("wraps residues at 60 columns", () => {
    const seq = "A".repeat(61);
    expect(formatFasta([{ id: "x", description: "x long name", sequence: seq }])).toBe(
      `>x long name\n${"A".repeat(60)}\nA\n`
    );
  });

  it("round-trips a file on disk", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "ribotree-fasta-"));
    try {
      const file = path.join(dir, "a.fasta");
      await writeFasta(file, [{ id: "s1", description: "s1 18S", sequence: "ACGTN" }]);
      expect(await readFile(file, "utf8")).toBe(">s1 18S\nACGTN\n");
      const back = await collectRecords(readFastaRecords(file));
      expect(back).toEqual([{ id: "s1", description: "s1 18S", sequence: "ACGTN" }]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("selectLongest", () => {
  const records = [
    { id: "a", description: "a 16S_rRNA", sequence: "AAAAAAAAAA" },
    { id: "b", description: "b 18S_rRNA", sequence: "CCCC" },
    { id: "c", description: "c 18S_rRNA", sequence: "GGGGGG" },
    { id: "d", description: "d 18S_rRNA", sequence: "TTTTTT" }
  ];

  it("keeps the longest record whose description has the label", async () => {
    const sel = await selectLongest(records, labelContains("18S"));
    expect(sel).toEqual({ found: true, record: records[2] });
  });

  it("keeps the first record on equal length", async () => {
    const tied = [
      { id: "d", description: "d 18S_rRNA", sequence: "TTTTTT" },
      { id: "c", description: "c 18S_rRNA", sequence: "GGGGGG" }
    ];
    const sel = await selectLongest(tied, labelContains("18S"));
    expect(sel.found && sel.record.id).toBe("d");
  });

  it("is case sensitive", async () => {
    expect(await selectLongest(records, labelContains("18s"))).toEqual({ found: false });
  });

  it("reports nothing found for an empty input", async () => {
    expect(await selectLongest(parseFasta(""), labelContains("18S"))).toEqual({ found: false });
  });
});

describe("createAlignment", () => {
  it("records the column count and freezes the rows", () => {
    const aln = createAlignment([
      { id: "A", description: "A", sequence: "AC-T" },
      { id: "B", description: "B", sequence: "ACGT" }
    ]);
    expect(aln.columnCount).toBe(4);
    expect(Object.isFrozen(aln.records)).toBe(true);
  });

  it("rejects unaligned input, duplicate ids and empty alignments", () => {
    expect(() =>
      createAlignment([
        { id: "A", description: "A", sequence: "ACG" },
        { id: "B", description: "B", sequence: "AC" }
      ])
    ).toThrow("input is not aligned");
    expect(() =>
      createAlignment([
        { id: "A", description: "A", sequence: "AC" },
        { id: "A", description: "A", sequence: "GT" }
      ])
    ).toThrow("duplicate sequence id in alignment: A");
    expect(() => createAlignment([])).toThrow(SequenceFormatError);
    expect(() => createAlignment([{ id: "A", description: "A", sequence: "" }])).toThrow("alignment has no columns");
  });

  it("reads an aligned FASTA file", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "ribotree-aln-"));
    try {
      const file = path.join(dir, "aln.fasta");
      await writeFile(file, ">A\nAC-T\n>B\nACGT\n", "utf8");
      const aln = await readAlignment(file);
      expect(aln.records.map((r) => r.id)).toEqual(["A", "B"]);
      expect(aln.columnCount).toBe(4);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
