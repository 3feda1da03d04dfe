import { DEFAULT_CONFIG } from "./config";
import { ScoringAlignmentError, type TreebankError } from "./errors";
import { treeTerminals, type TreeNode } from "./tree_transforms";

export type Constituent = {
  label: string;
  start: number;
  end: number;
};

export type ScoreOptions = {
  topLabel?: string;
  /** Constituents with these labels are not counted on either side. */
  ignoreLabels?: readonly string[];
  /** Maps a label onto the label it should match as, e.g. `{ PRT: "ADVP" }`. */
  equivalentLabels?: Readonly<Record<string, string>>;
};

export type BracketCounts = {
  matched: number;
  proposed: number;
  gold: number;
  crossing: number;
};

export type SentenceScore = BracketCounts & {
  exact: boolean;
  precision: number;
  recall: number;
  f1: number;
};

export type CorpusScoreError = {
  index: number;
  error: TreebankError;
};

export type CorpusScore = BracketCounts & {
  sentences: number;
  exactMatches: number;
  precision: number;
  recall: number;
  f1: number;
  perSentence: Array<SentenceScore | null>;
  errors: CorpusScoreError[];
};

function key(item: Constituent): string {
  return `${item.label}\u0001${item.start}\u0001${item.end}`;
}

function compareConstituent(a: Constituent, b: Constituent): number {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return b.end - a.end;
  return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
}

/**
 * Labeled spans of the internal nodes, sorted by start then widest first.
 * Leaves, the root carrying the top label, and a sentence-wide node sitting
 * directly over an identical sentence-wide node are not brackets.
 */
export function extractConstituents(tree: TreeNode, options: ScoreOptions = {}): Constituent[] {
  const topLabel = options.topLabel ?? DEFAULT_CONFIG.topLabel;
  const ignored = new Set(options.ignoreLabels ?? []);
  const equivalent = new Map(Object.entries(options.equivalentLabels ?? {}));
  const total = treeTerminals(tree).length;
  const out: Constituent[] = [];

  const visit = (node: TreeNode, start: number, isRoot: boolean): number => {
    if (node.kind === "leaf") return start + 1;
    let end = start;
    for (const child of node.children) end = visit(child, end, false);

    const only = node.children.length === 1 ? node.children[0] : undefined;
    const vacuous = start === 0 && end === total && only?.kind === "internal" && only.label === node.label;
    const isTop = isRoot && node.label === topLabel;
    if (!isTop && !vacuous && !ignored.has(node.label)) {
      out.push({ label: equivalent.get(node.label) ?? node.label, start, end });
    }
    return end;
  };

  visit(tree, 0, true);
  return out.sort(compareConstituent);
}

function crosses(a: Constituent, b: Constituent): boolean {
  return (a.start < b.start && b.start < a.end && a.end < b.end) || (b.start < a.start && a.start < b.end && b.end < a.end);
}

/** Multiset intersection: each gold bracket can absorb at most one identical hypothesis bracket. */
export function compareConstituents(hypothesis: readonly Constituent[], gold: readonly Constituent[]): BracketCounts {
  const remaining = new Map<string, number>();
  for (const item of gold) remaining.set(key(item), (remaining.get(key(item)) ?? 0) + 1);

  let matched = 0;
  let crossing = 0;
  for (const item of hypothesis) {
    const k = key(item);
    const left = remaining.get(k) ?? 0;
    if (left > 0) {
      matched += 1;
      remaining.set(k, left - 1);
    }
    if (gold.some((other) => crosses(item, other))) crossing += 1;
  }

  return { matched, proposed: hypothesis.length, gold: gold.length, crossing };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

export function fMeasure(precision: number, recall: number): number {
  return precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
}

export function bracketRates(counts: BracketCounts): BracketCounts & { precision: number; recall: number; f1: number } {
  const precision = ratio(counts.matched, counts.proposed);
  const recall = ratio(counts.matched, counts.gold);
  return { ...counts, precision, recall, f1: fMeasure(precision, recall) };
}

export function assertAligned(hypothesis: TreeNode, gold: TreeNode): void {
  const hyp = treeTerminals(hypothesis);
  const ref = treeTerminals(gold);
  if (hyp.length !== ref.length) {
    throw new ScoringAlignmentError(`hypothesis has ${hyp.length} leaves but gold has ${ref.length}`, hyp.length, ref.length);
  }
  const idx = hyp.findIndex((token, i) => token !== ref[i]);
  if (idx >= 0) {
    throw new ScoringAlignmentError(
      `leaf ${idx} differs: hypothesis '${hyp[idx] ?? ""}' vs gold '${ref[idx] ?? ""}'`,
      hyp.length,
      ref.length,
    );
  }
}

export function scoreSentence(hypothesis: TreeNode, gold: TreeNode, options: ScoreOptions = {}): SentenceScore {
  assertAligned(hypothesis, gold);
  const counts = compareConstituents(extractConstituents(hypothesis, options), extractConstituents(gold, options));
  return {
    ...bracketRates(counts),
    exact: counts.matched === counts.proposed && counts.matched === counts.gold,
  };
}

/**
 * Micro-averaged scores: bracket counts are summed over every aligned
 * sentence pair before dividing. A missing tree (`null`) or a misaligned
 * pair is left out of the totals and reported in `errors`.
 */
export function scoreCorpus(
  hypotheses: ReadonlyArray<TreeNode | null>,
  golds: ReadonlyArray<TreeNode | null>,
  options: ScoreOptions = {},
): CorpusScore {
  if (hypotheses.length !== golds.length) {
    throw new ScoringAlignmentError(
      `hypothesis corpus has ${hypotheses.length} trees but gold has ${golds.length}`,
      hypotheses.length,
      golds.length,
    );
  }

  const totals: BracketCounts = { matched: 0, proposed: 0, gold: 0, crossing: 0 };
  const perSentence: Array<SentenceScore | null> = [];
  const errors: CorpusScoreError[] = [];
  let exactMatches = 0;

  golds.forEach((gold, index) => {
    const hypothesis = hypotheses[index] ?? null;
    if (!hypothesis || !gold) {
      const side = gold ? "hypothesis" : "gold";
      errors.push({ index, error: new ScoringAlignmentError(`missing ${side} tree`, hypothesis ? 1 : 0, gold ? 1 : 0) });
      perSentence.push(null);
      return;
    }
    try {
      const score = scoreSentence(hypothesis, gold, options);
      totals.matched += score.matched;
      totals.proposed += score.proposed;
      totals.gold += score.gold;
      totals.crossing += score.crossing;
      if (score.exact) exactMatches += 1;
      perSentence.push(score);
    } catch (error) {
      if (!(error instanceof ScoringAlignmentError)) throw error;
      errors.push({ index, error });
      perSentence.push(null);
    }
  });

  return {
    ...bracketRates(totals),
    sentences: perSentence.length - errors.length,
    exactMatches,
    perSentence,
    errors,
  };
}
