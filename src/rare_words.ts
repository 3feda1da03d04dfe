import { DEFAULT_CONFIG } from "./config";
import { mapTerminals, treeTerminals, type TreeNode } from "./tree_transforms";

export type TerminalCounts = ReadonlyMap<string, number>;

export type MaskOptions = {
  /** Terminals seen fewer times than this are masked. */
  minCount?: number;
  sentinel?: string;
};

function increment(map: Map<string, number>, k: string): void {
  map.set(k, (map.get(k) ?? 0) + 1);
}

export function countTerminals(corpus: Iterable<TreeNode>): TerminalCounts {
  const counts = new Map<string, number>();
  for (const tree of corpus) {
    for (const terminal of treeTerminals(tree)) increment(counts, terminal);
  }
  return counts;
}

export function maskRareWords(tree: TreeNode, counts: TerminalCounts, options: MaskOptions = {}): TreeNode {
  const minCount = options.minCount ?? DEFAULT_CONFIG.minCount;
  const sentinel = options.sentinel ?? DEFAULT_CONFIG.sentinel;
  return mapTerminals(tree, (terminal) => ((counts.get(terminal) ?? 0) < minCount ? sentinel : terminal));
}

export type MaskedCorpus = {
  trees: TreeNode[];
  counts: TerminalCounts;
  maskedTokens: number;
};

/** Counts terminals over the whole corpus, then masks each tree against that table. */
export function maskCorpus(corpus: readonly TreeNode[], options: MaskOptions = {}): MaskedCorpus {
  const counts = countTerminals(corpus);
  const minCount = options.minCount ?? DEFAULT_CONFIG.minCount;
  let maskedTokens = 0;
  for (const count of counts.values()) if (count < minCount) maskedTokens += count;
  return {
    trees: corpus.map((tree) => maskRareWords(tree, counts, options)),
    counts,
    maskedTokens,
  };
}
