import { DEFAULT_CONFIG } from "./config";
import { StructuralInvariantError } from "./errors";
import { internal, leaf, type TreeNode } from "./tree_transforms";

export type BaselineOptions = {
  topLabel?: string;
  phraseLabel?: string;
  tag?: string;
};

/**
 * Grammar-free floor for the scorer: every word is tagged `NNP` and each
 * `NP` covers one word plus the rest of the sentence.
 */
export function rightBranchingTree(words: readonly string[], options: BaselineOptions = {}): TreeNode {
  const topLabel = options.topLabel ?? DEFAULT_CONFIG.topLabel;
  const phraseLabel = options.phraseLabel ?? "NP";
  const tag = options.tag ?? "NNP";
  if (words.length === 0) throw new StructuralInvariantError("cannot build a tree for an empty sentence");

  const leaves = words.map((word) => leaf(tag, word));
  let phrase = internal(phraseLabel, leaves.slice(-2));
  for (let i = leaves.length - 3; i >= 0; i -= 1) {
    phrase = internal(phraseLabel, [...leaves.slice(i, i + 1), phrase]);
  }
  return internal(topLabel, [phrase]);
}
