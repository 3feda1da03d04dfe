import { expect, test } from "vitest";
import {
  internal,
  leaf,
  mapTreeLabels,
  parseTree,
  removeEmptyElements,
  restoreTerminals,
  serializeTree,
  StructuralInvariantError,
  treeDepth,
  treesEqual,
  treeSize,
  treeTerminals,
  TreeSyntaxError,
  type TreeNode,
} from "../index";

const bracket = "(TOP (S (VP (VB Book) (NP (DT that) (NN flight)))) (PUNC .))";

const tree: TreeNode = internal("TOP", [
  internal("S", [
    internal("VP", [leaf("VB", "Book"), internal("NP", [leaf("DT", "that"), leaf("NN", "flight")])]),
  ]),
  leaf("PUNC", "."),
]);

test("parse builds leaves and internal nodes", () => {
  expect(parseTree(bracket)).toEqual(tree);
});

test("tree utilities expose terminals, depth and size", () => {
  expect(treeTerminals(tree)).toEqual(["Book", "that", "flight", "."]);
  expect(treeDepth(tree)).toBe(5);
  expect(treeSize(tree)).toBe(8);
});

test("tree bracket conversion round-trips", () => {
  expect(serializeTree(tree)).toBe(bracket);
  expect(serializeTree(parseTree(bracket))).toBe(bracket);
});

test("incidental whitespace does not survive serialization", () => {
  expect(serializeTree(parseTree("  (TOP\n\t(NN  x) )  "))).toBe("(TOP (NN x))");
});

test("parse rejects malformed bracket text", () => {
  const cases: Array<[string, string]> = [
    ["", "empty tree text"],
    ["(TOP (NN x)", "unbalanced parentheses: node 'TOP' is not closed"],
    ["(TOP (NN x)))", "unexpected tokens after tree"],
    ["(TOP)", "node 'TOP' has no children and no terminal"],
    ["( (NN x))", "empty label"],
    ["(NP the (NN dog))", "terminal 'the' must be the only child of 'NP'"],
    ["(NP (NN dog) the)", "terminal 'the' must be the only child of 'NP'"],
    ["(NN", "unbalanced parentheses: node 'NN' is not closed"],
  ];
  for (const [input, message] of cases) {
    expect(() => parseTree(input)).toThrow(TreeSyntaxError);
    expect(() => parseTree(input)).toThrow(message);
  }
});

test("syntax errors carry the offset of the offending token", () => {
  try {
    parseTree("(TOP)");
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(TreeSyntaxError);
    if (error instanceof TreeSyntaxError) {
      expect(error.position).toBe(4);
      expect(error.atLine(7).message).toBe("line 7: node 'TOP' has no children and no terminal");
    }
  }
});

test("structural equality compares labels, terminals and shape", () => {
  expect(treesEqual(tree, parseTree(bracket))).toBe(true);
  expect(treesEqual(tree, parseTree("(TOP (S (VP (VB Book) (NP (DT that) (NN flights)))) (PUNC .))"))).toBe(false);
  expect(treesEqual(tree, parseTree("(TOP (S (VP (VB Book) (NP (DT that) (NN flight)))))"))).toBe(false);
});

test("label mapping leaves the input untouched", () => {
  const lower = mapTreeLabels(tree, (label) => label.toLowerCase());
  expect(serializeTree(lower)).toBe("(top (s (vp (vb Book) (np (dt that) (nn flight)))) (punc .))");
  expect(serializeTree(tree)).toBe(bracket);
});

test("empty elements are removed along with childless ancestors", () => {
  const withTrace = parseTree("(TOP (S (NP (-NONE- *T*)) (VP (VB go))))");
  const pruned = removeEmptyElements(withTrace);
  expect(pruned && serializeTree(pruned)).toBe("(TOP (S (VP (VB go))))");
  expect(removeEmptyElements(parseTree("(TOP (-NONE- *))"))).toBeNull();
});

test("masked terminals can be restored from the sentence", () => {
  const masked = parseTree("(TOP (NP (NN <unk>) (NN dog)))");
  expect(serializeTree(restoreTerminals(masked, ["the", "dog"]))).toBe("(TOP (NP (NN the) (NN dog)))");
  expect(() => restoreTerminals(masked, ["dog"])).toThrow(StructuralInvariantError);
  expect(() => restoreTerminals(masked, ["dog"])).toThrow("tree has 2 leaves but sentence has 1 words");
});
