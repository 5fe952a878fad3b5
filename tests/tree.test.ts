import { describe, it, expect } from "vitest";
import { TreeFormatError } from "../src/core/errors.js";
import { formatNewick, leafNames, parseNewick, parseNewickTrees } from "../src/tree/newick.js";
import { majorityRuleConsensus } from "../src/tree/consensus.js";

describe("Newick", () => {
  it("reads lengths, internal labels, quotes and comments", () => {
    const tree = parseNewick("((A:0.1,'B c':0.2)0.95:0.05,[note]C:1e-3);");
    expect(leafNames(tree)).toEqual(["A", "B c", "C"]);
    const inner = tree.children[0];
    expect(inner?.name).toBe("0.95");
    expect(inner?.length).toBe(0.05);
    expect(tree.children[1]?.length).toBe(0.001);
  });

  it("writes labels back, quoting where needed", () => {
    expect(formatNewick(parseNewick("((A:0.1,'B c':0.2)0.95:0.05,'it''s');"))).toBe("((A:0.1,'B c':0.2)0.95:0.05,'it''s');");
  });

  it("reads several trees from one document", () => {
    expect(parseNewickTrees("(A,B,C);\n(A,C,B);\n").map(leafNames)).toEqual([
      ["A", "B", "C"],
      ["A", "C", "B"]
    ]);
  });

  it("rejects malformed input", () => {
    expect(() => parseNewick("(A,B;")).toThrow(TreeFormatError);
    expect(() => parseNewick("(A,,B);")).toThrow("leaf without a name");
    expect(() => parseNewick("")).toThrow("no tree found");
    expect(() => parseNewick("(A,B);(A,B);")).toThrow("expected one tree, found 2");
  });
});

describe("majorityRuleConsensus", () => {
  const trees = ["((A,B),(C,D),E);", "((A,B),C,(D,E));", "((A,C),B,(D,E));"].map(parseNewick);

  it("keeps splits found in more than half of the trees", () => {
    const result = majorityRuleConsensus(trees);
    expect(formatNewick(result.tree)).toBe("(A,B,(C,(D,E)));");
    expect(result.treeCount).toBe(3);
    expect(result.leafCount).toBe(5);
    expect(result.splits.map((s) => [s.leaves, s.count])).toEqual([
      [["C", "D", "E"], 2],
      [["D", "E"], 2]
    ]);
  });

  it("labels internal nodes with their support", () => {
    expect(formatNewick(majorityRuleConsensus(trees, { annotateSupport: true }).tree)).toBe("(A,B,(C,(D,E)0.67)0.67);");
  });

  it("collapses to a star when no split is in every tree", () => {
    expect(formatNewick(majorityRuleConsensus(trees, { threshold: 1 }).tree)).toBe("(A,B,C,D,E);");
  });

  it("treats differently rooted copies of a tree as the same", () => {
    const rerooted = ["((A,B),(C,D));", "(A,B,(C,D));", "(((C,D),B),A);"].map(parseNewick);
    expect(formatNewick(majorityRuleConsensus(rerooted, { threshold: 1 }).tree)).toBe("(A,B,(C,D));");
  });

  it("rejects trees with different leaves and bad thresholds", () => {
    const mismatched = ["(A,B,C);", "(A,B,D);"].map(parseNewick);
    expect(() => majorityRuleConsensus(mismatched)).toThrow("tree 2 does not have the same leaf set as tree 1");
    expect(() => majorityRuleConsensus(trees, { threshold: 0.3 })).toThrow(RangeError);
    expect(() => majorityRuleConsensus([])).toThrow("no trees to summarize");
  });
});
