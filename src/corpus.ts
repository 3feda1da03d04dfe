import { TreeSyntaxError } from "./errors";
import { parseTree, serializeTree, type TreeNode } from "./tree_transforms";

export type TreebankEntry =
  | { kind: "tree"; lineNumber: number; tree: TreeNode }
  | { kind: "blank"; lineNumber: number }
  | { kind: "error"; lineNumber: number; error: TreeSyntaxError };

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/g);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * One entry per input line, numbered from 1. A line that fails to parse
 * becomes an `error` entry and reading carries on with the next line.
 */
export function readTreebank(text: string): TreebankEntry[] {
  return splitLines(text).map((line, idx): TreebankEntry => {
    const lineNumber = idx + 1;
    if (!line.trim()) return { kind: "blank", lineNumber };
    try {
      return { kind: "tree", lineNumber, tree: parseTree(line) };
    } catch (error) {
      if (!(error instanceof TreeSyntaxError)) throw error;
      return { kind: "error", lineNumber, error: error.atLine(lineNumber) };
    }
  });
}

export function treesOf(entries: readonly TreebankEntry[]): TreeNode[] {
  const out: TreeNode[] = [];
  for (const entry of entries) if (entry.kind === "tree") out.push(entry.tree);
  return out;
}

/** Trees in line order, with `null` standing in for blank and unparseable lines. */
export function alignedTreesOf(entries: readonly TreebankEntry[]): Array<TreeNode | null> {
  return entries.map((entry) => (entry.kind === "tree" ? entry.tree : null));
}

export function syntaxErrorsOf(entries: readonly TreebankEntry[]): TreeSyntaxError[] {
  const out: TreeSyntaxError[] = [];
  for (const entry of entries) if (entry.kind === "error") out.push(entry.error);
  return out;
}

export function writeTreebank(trees: ReadonlyArray<TreeNode | null>): string {
  if (trees.length === 0) return "";
  return `${trees.map((tree) => (tree ? serializeTree(tree) : "")).join("\n")}\n`;
}

/** Whitespace-tokenized sentences, one per line. */
export function readSentences(text: string): string[][] {
  return splitLines(text).map((line) => line.trim().split(/\s+/g).filter(Boolean));
}
