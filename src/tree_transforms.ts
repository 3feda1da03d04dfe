import { StructuralInvariantError, TreeSyntaxError } from "./errors";

export type LeafNode = {
  kind: "leaf";
  label: string;
  terminal: string;
};

export type InternalNode = {
  kind: "internal";
  label: string;
  children: TreeNode[];
};

export type TreeNode = LeafNode | InternalNode;

type BracketToken = {
  text: string;
  offset: number;
};

export function leaf(label: string, terminal: string): LeafNode {
  return { kind: "leaf", label, terminal };
}

export function internal(label: string, children: TreeNode[]): InternalNode {
  return { kind: "internal", label, children };
}

function tokenizeBracket(input: string): BracketToken[] {
  const out: BracketToken[] = [];
  const re = /\(|\)|[^\s()]+/g;
  for (const m of input.matchAll(re)) out.push({ text: m[0], offset: m.index ?? 0 });
  return out;
}

/**
 * Parses one bracketed tree: `(LABEL child ...)` for internal nodes and
 * `(TAG word)` for leaves. Whitespace between tokens is insignificant.
 */
export function parseTree(text: string): TreeNode {
  const tokens = tokenizeBracket(text);
  if (tokens.length === 0) throw new TreeSyntaxError("empty tree text", 0);
  let cursor = 0;

  const offsetAt = (index: number): number => tokens[index]?.offset ?? text.length;

  function readNode(): TreeNode {
    const open = tokens[cursor];
    if (open?.text !== "(") throw new TreeSyntaxError(`expected '(' but found '${open?.text ?? "end of input"}'`, offsetAt(cursor));
    cursor += 1;

    const labelToken = tokens[cursor];
    if (!labelToken) throw new TreeSyntaxError("unbalanced parentheses: unterminated node", text.length);
    if (labelToken.text === "(" || labelToken.text === ")") throw new TreeSyntaxError("empty label", labelToken.offset);
    const label = labelToken.text;
    cursor += 1;

    const first = tokens[cursor];
    if (!first) throw new TreeSyntaxError(`unbalanced parentheses: node '${label}' is not closed`, text.length);
    if (first.text === ")") throw new TreeSyntaxError(`node '${label}' has no children and no terminal`, first.offset);

    if (first.text !== "(") {
      cursor += 1;
      const close = tokens[cursor];
      if (!close) throw new TreeSyntaxError(`unbalanced parentheses: leaf '${label}' is not closed`, text.length);
      if (close.text !== ")") {
        throw new TreeSyntaxError(`terminal '${first.text}' must be the only child of '${label}'`, close.offset);
      }
      cursor += 1;
      return leaf(label, first.text);
    }

    const children: TreeNode[] = [];
    while (cursor < tokens.length) {
      const next = tokens[cursor];
      if (!next || next.text === ")") break;
      if (next.text !== "(") {
        throw new TreeSyntaxError(`terminal '${next.text}' must be the only child of '${label}'`, next.offset);
      }
      children.push(readNode());
    }

    if (tokens[cursor]?.text !== ")") throw new TreeSyntaxError(`unbalanced parentheses: node '${label}' is not closed`, text.length);
    cursor += 1;
    return internal(label, children);
  }

  const tree = readNode();
  if (cursor !== tokens.length) throw new TreeSyntaxError("unexpected tokens after tree", offsetAt(cursor));
  return tree;
}

export function serializeTree(tree: TreeNode): string {
  if (tree.kind === "leaf") return `(${tree.label} ${tree.terminal})`;
  return `(${tree.label} ${tree.children.map(serializeTree).join(" ")})`;
}

export function treeLeaves(tree: TreeNode): LeafNode[] {
  if (tree.kind === "leaf") return [tree];
  const out: LeafNode[] = [];
  for (const child of tree.children) out.push(...treeLeaves(child));
  return out;
}

export function treeTerminals(tree: TreeNode): string[] {
  return treeLeaves(tree).map((node) => node.terminal);
}

export function treeDepth(tree: TreeNode): number {
  if (tree.kind === "leaf") return 1;
  let depth = 1;
  for (const child of tree.children) depth = Math.max(depth, 1 + treeDepth(child));
  return depth;
}

export function treeSize(tree: TreeNode): number {
  if (tree.kind === "leaf") return 1;
  return tree.children.reduce((acc, child) => acc + treeSize(child), 1);
}

export function treesEqual(a: TreeNode, b: TreeNode): boolean {
  if (a.label !== b.label) return false;
  if (a.kind === "leaf") return b.kind === "leaf" && a.terminal === b.terminal;
  if (b.kind !== "internal" || a.children.length !== b.children.length) return false;
  return a.children.every((child, idx) => {
    const other = b.children[idx];
    return other !== undefined && treesEqual(child, other);
  });
}

export function mapTreeLabels(tree: TreeNode, fn: (label: string) => string): TreeNode {
  if (tree.kind === "leaf") return leaf(fn(tree.label), tree.terminal);
  return internal(
    fn(tree.label),
    tree.children.map((child) => mapTreeLabels(child, fn)),
  );
}

/** Rewrites terminals left to right; `index` is the leaf position in the sentence. */
export function mapTerminals(tree: TreeNode, fn: (terminal: string, index: number) => string): TreeNode {
  let index = 0;
  const visit = (node: TreeNode): TreeNode => {
    if (node.kind === "leaf") {
      const terminal = fn(node.terminal, index);
      index += 1;
      return leaf(node.label, terminal);
    }
    return internal(node.label, node.children.map(visit));
  };
  return visit(tree);
}

/**
 * Drops every node labeled `emptyLabel` (trace and null elements) and any
 * ancestor left without children. Returns null when nothing survives.
 */
export function removeEmptyElements(tree: TreeNode, emptyLabel = "-NONE-"): TreeNode | null {
  if (tree.label === emptyLabel) return null;
  if (tree.kind === "leaf") return leaf(tree.label, tree.terminal);
  const children: TreeNode[] = [];
  for (const child of tree.children) {
    const kept = removeEmptyElements(child, emptyLabel);
    if (kept) children.push(kept);
  }
  return children.length === 0 ? null : internal(tree.label, children);
}

/** Puts the original sentence back under a tree whose terminals were masked. */
export function restoreTerminals(tree: TreeNode, words: readonly string[]): TreeNode {
  const leafCount = treeLeaves(tree).length;
  if (leafCount !== words.length) {
    throw new StructuralInvariantError(`tree has ${leafCount} leaves but sentence has ${words.length} words`);
  }
  return mapTerminals(tree, (terminal, index) => words[index] ?? terminal);
}
