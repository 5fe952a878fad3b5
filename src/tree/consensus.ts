import { TreeFormatError } from "../core/errors.js";
import { leafNames, type TreeNode } from "./newick.js";

export interface ConsensusOptions {
  // Splits with a frequency strictly above this are kept; 1 keeps splits found in every tree.
  threshold?: number;
  // Label each internal node with the fraction of trees containing its split.
  annotateSupport?: boolean;
}

export interface ConsensusSplit {
  leaves: string[];
  count: number;
  support: number;
}

export interface ConsensusResult {
  tree: TreeNode;
  treeCount: number;
  leafCount: number;
  splits: ConsensusSplit[];
}

interface BuildNode {
  leaves: number[];
  count: number;
  children: BuildNode[];
}

function leafIndex(trees: readonly TreeNode[]): { names: string[]; index: Map<string, number> } {
  const [first, ...rest] = trees;
  if (!first) throw new TreeFormatError("no trees to summarize");
  const names = leafNames(first);
  const index = new Map<string, number>();
  for (const name of names) {
    if (index.has(name)) throw new TreeFormatError(`duplicate leaf name: ${name}`);
    index.set(name, index.size);
  }

  rest.forEach((tree, i) => {
    const other = leafNames(tree);
    const seen = new Set(other);
    if (other.length !== names.length || seen.size !== other.length || !other.every((n) => index.has(n))) {
      throw new TreeFormatError(`tree ${i + 2} does not have the same leaf set as tree 1`);
    }
  });

  return { names, index };
}

/**
 * Non-trivial splits of one tree. Each split is oriented to the side without
 * leaf 0, so the same bipartition gets the same key however the tree is rooted.
 */
function treeSplits(tree: TreeNode, index: Map<string, number>, leafCount: number): Map<string, number[]> {
  const splits = new Map<string, number[]>();

  const visit = (node: TreeNode, isRoot: boolean): number[] => {
    if (!node.children.length) return [index.get(node.name ?? "") ?? -1];
    const below = node.children.flatMap((c) => visit(c, false));
    if (!isRoot) {
      const inside = new Set(below);
      const side = inside.has(0)
        ? Array.from({ length: leafCount }, (_, i) => i).filter((i) => !inside.has(i))
        : [...below].sort((a, b) => a - b);
      if (side.length >= 2 && side.length <= leafCount - 2) splits.set(side.join(","), side);
    }
    return below;
  };

  visit(tree, true);
  return splits;
}

function keep(count: number, treeCount: number, threshold: number): boolean {
  if (threshold >= 1) return count === treeCount;
  return count / treeCount > threshold;
}

function formatSupport(support: number): string {
  return String(Number(support.toFixed(2)));
}

/**
 * Majority-rule consensus of trees sharing one leaf set. The result has no
 * branch lengths; children follow the leaf order of the first tree.
 */
export function majorityRuleConsensus(trees: readonly TreeNode[], opts: ConsensusOptions = {}): ConsensusResult {
  const threshold = opts.threshold ?? 0.5;
  if (!(threshold >= 0.5 && threshold <= 1)) throw new RangeError(`threshold must be in [0.5, 1], got ${threshold}`);

  const { names, index } = leafIndex(trees);
  const leafCount = names.length;

  const counts = new Map<string, { leaves: number[]; count: number }>();
  for (const tree of trees) {
    for (const [key, leaves] of treeSplits(tree, index, leafCount)) {
      const entry = counts.get(key);
      if (entry) entry.count++;
      else counts.set(key, { leaves, count: 1 });
    }
  }

  const kept = [...counts.values()]
    .filter((s) => keep(s.count, trees.length, threshold))
    .sort((a, b) => b.leaves.length - a.leaves.length || a.leaves.join(",").localeCompare(b.leaves.join(",")));

  const root: BuildNode = { leaves: names.map((_, i) => i), count: trees.length, children: [] };
  const placed: BuildNode[] = [root];
  for (const split of kept) {
    const members = new Set(split.leaves);
    let parent = root;
    for (let i = placed.length - 1; i >= 0; i--) {
      const candidate = placed[i];
      if (candidate && split.leaves.every((l) => candidate.leaves.includes(l)) && candidate.leaves.length > members.size) {
        parent = candidate;
        break;
      }
    }
    const node: BuildNode = { leaves: split.leaves, count: split.count, children: [] };
    parent.children.push(node);
    placed.push(node);
  }

  const toTree = (node: BuildNode, isRoot: boolean): TreeNode => {
    const covered = new Set(node.children.flatMap((c) => c.leaves));
    const parts: Array<{ first: number; tree: TreeNode }> = node.leaves
      .filter((l) => !covered.has(l))
      .map((l) => ({ first: l, tree: { name: names[l] ?? "", length: null, children: [] } }));
    for (const child of node.children) {
      parts.push({ first: Math.min(...child.leaves), tree: toTree(child, false) });
    }
    parts.sort((a, b) => a.first - b.first);
    const name = !isRoot && opts.annotateSupport ? formatSupport(node.count / trees.length) : null;
    return { name, length: null, children: parts.map((p) => p.tree) };
  };

  return {
    tree: toTree(root, true),
    treeCount: trees.length,
    leafCount,
    splits: kept.map((s) => ({
      leaves: s.leaves.map((l) => names[l] ?? ""),
      count: s.count,
      support: s.count / trees.length
    }))
  };
}
