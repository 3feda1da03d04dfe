import { rightBranchingTree } from "./baseline";
import { binarizeTree } from "./binarize";
import { scoreCorpus, type CorpusScore, type ScoreOptions } from "./bracket_score";
import type { TreebankConfig } from "./config";
import { alignedTreesOf, readSentences, readTreebank, syntaxErrorsOf, treesOf, writeTreebank, type TreebankEntry } from "./corpus";
import { debinarizeTree } from "./debinarize";
import { StructuralInvariantError, TreebankError } from "./errors";
import type { TreebankLogger } from "./logging";
import { maskCorpus } from "./rare_words";
import { removeEmptyElements, restoreTerminals, type TreeNode } from "./tree_transforms";

export type CommandResult = {
  output: string;
  failures: TreebankError[];
  summary: string;
};

export type BinarizeCommandOptions = Pick<TreebankConfig, "topLabel" | "direction" | "emptyLabel" | "minCount" | "sentinel"> & {
  removeEmpty: boolean;
  mask: boolean;
};

/** One `warn` line per failure, in the order they were collected. */
export function logFailures(logger: TreebankLogger, failures: readonly TreebankError[]): void {
  for (const failure of failures) logger.warn(failure.message);
}

function lineFailure(lineNumber: number, error: TreebankError): StructuralInvariantError {
  return new StructuralInvariantError(`line ${lineNumber}: ${error.message}`, error);
}

function transformEntry(
  entry: Extract<TreebankEntry, { kind: "tree" }>,
  failures: TreebankError[],
  transform: (tree: TreeNode) => TreeNode | null,
): TreeNode | null {
  try {
    return transform(entry.tree);
  } catch (error) {
    if (!(error instanceof StructuralInvariantError)) throw error;
    failures.push(lineFailure(entry.lineNumber, error));
    return null;
  }
}

/** Training-side transform: unparseable or rejected lines are dropped from the output. */
export function runBinarize(text: string, options: BinarizeCommandOptions): CommandResult {
  const entries = readTreebank(text);
  const failures: TreebankError[] = [];
  const trees: TreeNode[] = [];

  for (const entry of entries) {
    if (entry.kind === "error") failures.push(entry.error);
    if (entry.kind !== "tree") continue;
    const out = transformEntry(entry, failures, (tree) => {
      const kept = options.removeEmpty ? removeEmptyElements(tree, options.emptyLabel) : tree;
      if (!kept) throw new StructuralInvariantError(`tree is empty once '${options.emptyLabel}' elements are removed`);
      return binarizeTree(kept, { topLabel: options.topLabel, direction: options.direction });
    });
    if (out) trees.push(out);
  }

  let summary = `binarized ${trees.length} of ${treesOf(entries).length + syntaxErrorsOf(entries).length} trees`;
  let output = trees;
  if (options.mask) {
    const masked = maskCorpus(trees, { minCount: options.minCount, sentinel: options.sentinel });
    output = masked.trees;
    summary += `, masked ${masked.maskedTokens} rare tokens`;
  }
  return { output: writeTreebank(output), failures, summary };
}

/**
 * Parser-side transform. Output stays line-aligned with the input: blank
 * and failed lines come out blank. With `sentences`, masked terminals are
 * replaced by the words of the matching input line.
 */
export function runDebinarize(text: string, sentences?: readonly string[][]): CommandResult {
  const entries = readTreebank(text);
  const failures: TreebankError[] = [];
  let restored = 0;

  const trees = entries.map((entry): TreeNode | null => {
    if (entry.kind === "error") failures.push(entry.error);
    if (entry.kind !== "tree") return null;
    return transformEntry(entry, failures, (tree) => {
      const original = debinarizeTree(tree);
      const words = sentences?.[entry.lineNumber - 1];
      if (!sentences) return original;
      if (!words) throw new StructuralInvariantError("no input sentence for this line");
      const out = restoreTerminals(original, words);
      restored += 1;
      return out;
    });
  });

  const converted = trees.filter((tree) => tree !== null).length;
  const summary = `debinarized ${converted} of ${entries.length} lines${sentences ? `, restored words in ${restored}` : ""}`;
  return { output: writeTreebank(trees), failures, summary };
}

export function runMask(text: string, options: Pick<TreebankConfig, "minCount" | "sentinel">): CommandResult {
  const entries = readTreebank(text);
  const masked = maskCorpus(treesOf(entries), options);
  return {
    output: writeTreebank(masked.trees),
    failures: syntaxErrorsOf(entries),
    summary: `masked ${masked.maskedTokens} tokens across ${masked.counts.size} word types`,
  };
}

export function runBaseline(text: string, topLabel: string): CommandResult {
  const failures: TreebankError[] = [];
  const trees = readSentences(text).map((words, idx): TreeNode | null => {
    try {
      return rightBranchingTree(words, { topLabel });
    } catch (error) {
      if (!(error instanceof StructuralInvariantError)) throw error;
      failures.push(lineFailure(idx + 1, error));
      return null;
    }
  });
  return { output: writeTreebank(trees), failures, summary: `built ${trees.length - failures.length} baseline trees` };
}

export type ScoreCommandResult = {
  score: CorpusScore;
  failures: TreebankError[];
};

export function runScore(hypothesisText: string, goldText: string, options: ScoreOptions = {}): ScoreCommandResult {
  const hypotheses = readTreebank(hypothesisText);
  const golds = readTreebank(goldText);
  const score = scoreCorpus(alignedTreesOf(hypotheses), alignedTreesOf(golds), options);
  const failures: TreebankError[] = [
    ...syntaxErrorsOf(hypotheses).map((error) => new TreebankError(`hypothesis ${error.message}`, error)),
    ...syntaxErrorsOf(golds).map((error) => new TreebankError(`gold ${error.message}`, error)),
  ];
  for (const { index, error } of score.errors) {
    failures.push(new TreebankError(`sentence ${index + 1}: ${error.message}`, error));
  }
  return { score, failures };
}

function percent(value: number): string {
  return (value * 100).toFixed(2);
}

export function formatScore(score: CorpusScore): string {
  const average = score.sentences === 0 ? 0 : score.crossing / score.sentences;
  return [
    `Sentences scored:   ${score.sentences}`,
    `Sentences flagged:  ${score.errors.length}`,
    `Matched brackets:   ${score.matched}`,
    `Proposed brackets:  ${score.proposed}`,
    `Gold brackets:      ${score.gold}`,
    `Bracket precision:  ${percent(score.precision)}`,
    `Bracket recall:     ${percent(score.recall)}`,
    `Bracket F1:         ${percent(score.f1)}`,
    `Exact matches:      ${score.exactMatches}`,
    `Average crossing:   ${average.toFixed(2)}`,
  ].join("\n");
}
