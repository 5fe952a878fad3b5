import { TreeFormatError } from "../core/errors.js";

export interface TreeNode {
  name: string | null;
  length: number | null;
  children: TreeNode[];
}

const UNQUOTED_STOP = new Set(["(", ")", "[", "]", "'", ":", ";", ","]);

class NewickReader {
  private pos = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    this.skipBlank();
    return this.pos >= this.text.length;
  }

  readTree(): TreeNode {
    const root = this.readSubtree();
    this.skipBlank();
    if (this.peek() === ";") this.pos++;
    else if (this.pos < this.text.length) this.fail(`expected ';'`);
    return root;
  }

  private readSubtree(): TreeNode {
    this.skipBlank();
    const children: TreeNode[] = [];
    if (this.peek() === "(") {
      this.pos++;
      children.push(this.readSubtree());
      this.skipBlank();
      while (this.peek() === ",") {
        this.pos++;
        children.push(this.readSubtree());
        this.skipBlank();
      }
      if (this.peek() !== ")") this.fail(`expected ',' or ')'`);
      this.pos++;
    }

    const name = this.readLabel();
    let length: number | null = null;
    this.skipBlank();
    if (this.peek() === ":") {
      this.pos++;
      length = this.readLength();
    }
    if (!children.length && name === null) this.fail("leaf without a name");
    return { name, length, children };
  }

  private readLabel(): string | null {
    this.skipBlank();
    if (this.peek() === "'") return this.readQuoted();
    const start = this.pos;
    while (this.pos < this.text.length) {
      const c = this.text.charAt(this.pos);
      if (UNQUOTED_STOP.has(c) || /\s/.test(c)) break;
      this.pos++;
    }
    return this.pos > start ? this.text.slice(start, this.pos) : null;
  }

  private readQuoted(): string {
    this.pos++;
    let out = "";
    for (;;) {
      if (this.pos >= this.text.length) this.fail("unterminated quoted label");
      const c = this.text.charAt(this.pos++);
      if (c !== "'") {
        out += c;
        continue;
      }
      if (this.peek() === "'") {
        out += "'";
        this.pos++;
        continue;
      }
      return out;
    }
  }

  private readLength(): number {
    this.skipBlank();
    const m = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(this.text.slice(this.pos));
    if (!m) return this.fail("expected a branch length");
    this.pos += m[0].length;
    return Number(m[0]);
  }

  private skipBlank(): void {
    while (this.pos < this.text.length) {
      const c = this.text.charAt(this.pos);
      if (/\s/.test(c)) {
        this.pos++;
      } else if (c === "[") {
        const end = this.text.indexOf("]", this.pos);
        if (end < 0) this.fail("unterminated comment");
        this.pos = end + 1;
      } else {
        return;
      }
    }
  }

  private peek(): string {
    return this.text.charAt(this.pos);
  }

  private fail(message: string): never {
    throw new TreeFormatError(`newick offset ${this.pos}: ${message}`);
  }
}

/** Every tree in a Newick document, in order. */
export function parseNewickTrees(text: string): TreeNode[] {
  const reader = new NewickReader(text);
  const trees: TreeNode[] = [];
  while (!reader.atEnd()) trees.push(reader.readTree());
  return trees;
}

export function parseNewick(text: string): TreeNode {
  const trees = parseNewickTrees(text);
  const first = trees[0];
  if (!first) throw new TreeFormatError("no tree found");
  if (trees.length > 1) throw new TreeFormatError(`expected one tree, found ${trees.length}`);
  return first;
}

export function leafNames(node: TreeNode): string[] {
  if (!node.children.length) return node.name === null ? [] : [node.name];
  return node.children.flatMap(leafNames);
}

function quoteLabel(name: string): string {
  if (name.length && ![...name].some((c) => UNQUOTED_STOP.has(c) || /\s/.test(c))) return name;
  return `'${name.replace(/'/g, "''")}'`;
}

function formatNode(node: TreeNode): string {
  const inner = node.children.length ? `(${node.children.map(formatNode).join(",")})` : "";
  const label = node.name === null ? "" : quoteLabel(node.name);
  const length = node.length === null ? "" : `:${node.length}`;
  return `${inner}${label}${length}`;
}

export function formatNewick(tree: TreeNode): string {
  return `${formatNode(tree)};`;
}
