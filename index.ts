export {
  internal,
  leaf,
  mapTerminals,
  mapTreeLabels,
  parseTree,
  removeEmptyElements,
  restoreTerminals,
  serializeTree,
  treeDepth,
  treeLeaves,
  treesEqual,
  treeSize,
  treeTerminals,
} from "./src/tree_transforms";
export type { InternalNode, LeafNode, TreeNode } from "./src/tree_transforms";

export {
  binarizeCorpus,
  binarizeTree,
  FUSION_SEPARATOR,
  isBinaryTree,
  RIGHT_BRANCHING_LABELS,
  SYNTHETIC_SUFFIX,
} from "./src/binarize";
export type { BinarizeOptions } from "./src/binarize";
export { debinarizeCorpus, debinarizeTree } from "./src/debinarize";

export { countTerminals, maskCorpus, maskRareWords } from "./src/rare_words";
export type { MaskedCorpus, MaskOptions, TerminalCounts } from "./src/rare_words";

export {
  assertAligned,
  bracketRates,
  compareConstituents,
  extractConstituents,
  fMeasure,
  scoreCorpus,
  scoreSentence,
} from "./src/bracket_score";
export type {
  BracketCounts,
  Constituent,
  CorpusScore,
  CorpusScoreError,
  ScoreOptions,
  SentenceScore,
} from "./src/bracket_score";

export {
  alignedTreesOf,
  readSentences,
  readTreebank,
  syntaxErrorsOf,
  treesOf,
  writeTreebank,
} from "./src/corpus";
export type { TreebankEntry } from "./src/corpus";

export { rightBranchingTree } from "./src/baseline";
export type { BaselineOptions } from "./src/baseline";

export {
  formatScore,
  logFailures,
  runBaseline,
  runBinarize,
  runDebinarize,
  runMask,
  runScore,
} from "./src/commands";
export type { BinarizeCommandOptions, CommandResult, ScoreCommandResult } from "./src/commands";

export { DEFAULT_CONFIG, RESERVED_MARKERS, resolveConfig } from "./src/config";
export type { BinarizationDirection, ConfigOverrides, LogLevel, TreebankConfig } from "./src/config";

export { ScoringAlignmentError, StructuralInvariantError, TreebankError, TreeSyntaxError } from "./src/errors";
export { createLogger } from "./src/logging";
export type { TreebankLogger } from "./src/logging";
