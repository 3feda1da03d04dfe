import { expect, test } from "vitest";
import {
  alignedTreesOf,
  parseTree,
  readSentences,
  readTreebank,
  serializeTree,
  syntaxErrorsOf,
  treesOf,
  TreeSyntaxError,
  writeTreebank,
} from "../index";

const text = "(TOP (NN a))\n\n(TOP (NN b)\n(TOP (NN c))\n";

test("treebank lines are read one tree per line", () => {
  const entries = readTreebank(text);
  expect(entries.map((entry) => entry.kind)).toEqual(["tree", "blank", "error", "tree"]);
  expect(entries.map((entry) => entry.lineNumber)).toEqual([1, 2, 3, 4]);
  expect(treesOf(entries).map(serializeTree)).toEqual(["(TOP (NN a))", "(TOP (NN c))"]);
});

test("a bad line is reported with its line number and reading continues", () => {
  const errors = syntaxErrorsOf(readTreebank(text));
  expect(errors).toHaveLength(1);
  expect(errors[0]).toBeInstanceOf(TreeSyntaxError);
  expect(errors[0]?.lineNumber).toBe(3);
  expect(errors[0]?.message).toBe("line 3: unbalanced parentheses: node 'TOP' is not closed");
});

test("aligned trees keep a slot for every line", () => {
  const aligned = alignedTreesOf(readTreebank(text));
  expect(aligned.map((tree) => (tree ? serializeTree(tree) : null))).toEqual(["(TOP (NN a))", null, null, "(TOP (NN c))"]);
});

test("windows line endings are accepted", () => {
  expect(treesOf(readTreebank("(TOP (NN a))\r\n(TOP (NN b))\r\n"))).toHaveLength(2);
});

test("writing keeps blank lines for missing trees", () => {
  expect(writeTreebank([parseTree("(TOP (NN a))"), null])).toBe("(TOP (NN a))\n\n");
  expect(writeTreebank([])).toBe("");
});

test("sentences are whitespace tokenized", () => {
  expect(readSentences("Book  that flight .\n\n")).toEqual([["Book", "that", "flight", "."], []]);
});
