import { expect, test } from "vitest";
import {
  binarizeTree,
  debinarizeCorpus,
  debinarizeTree,
  parseTree,
  serializeTree,
  StructuralInvariantError,
  treesEqual,
} from "../index";

const corpus = [
  "(TOP (S (VP (VB Book) (NP (DT that) (NN flight)))) (PUNC .))",
  "(TOP (S (NP (DT the) (JJ old) (NN man)) (VP (VBD gave) (NP (PRP her)) (NP (DT a) (NN book)) (PP (IN on) (NP (NNP Monday)))) (PUNC .)))",
  "(TOP (A (B (C (D (E (NN x)))))))",
  "(TOP (FRAG (NP (NN yes))) (PUNC !) (INTJ (UH well)))",
  "(TOP (SQ (VBZ Is) (NP (PRP it)) (ADJP (JJ ready)) (PUNC ?)))",
  "(TOP (NN word))",
];

test("debinarize inverts right-branching binarization", () => {
  for (const text of corpus) {
    const original = parseTree(text);
    const restored = debinarizeTree(binarizeTree(original));
    expect(treesEqual(restored, original)).toBe(true);
    expect(serializeTree(restored)).toBe(text);
  }
});

test("debinarize inverts left-branching binarization", () => {
  for (const text of corpus) {
    const restored = debinarizeTree(binarizeTree(parseTree(text), { direction: "left" }));
    expect(serializeTree(restored)).toBe(text);
  }
});

test("debinarize inverts heuristic binarization", () => {
  for (const text of corpus) {
    const restored = debinarizeTree(binarizeTree(parseTree(text), { direction: "heuristic" }));
    expect(serializeTree(restored)).toBe(text);
  }
});

test("very wide nodes flatten back into one node", () => {
  const words = Array.from({ length: 15 }, (_, i) => `(NN w${i})`).join(" ");
  const text = `(TOP (S (NP ${words}) (VP (VB run))))`;
  expect(serializeTree(debinarizeTree(binarizeTree(parseTree(text))))).toBe(text);
});

test("parser output in binary form comes back in original form", () => {
  const parsed = parseTree("(TOP (S_VP (VB Book) (NP (DT that) (NP* (JJ cheap) (NN flight)))) (PUNC .))");
  expect(serializeTree(debinarizeTree(parsed))).toBe("(TOP (S (VP (VB Book) (NP (DT that) (JJ cheap) (NN flight)))) (PUNC .))");
});

test("debinarizeCorpus maps every tree", () => {
  const out = debinarizeCorpus([parseTree("(TOP (A_B (NN x)))"), parseTree("(TOP (NN y))")]);
  expect(out.map(serializeTree)).toEqual(["(TOP (A (B (NN x))))", "(TOP (NN y))"]);
});

test("corrupted binary trees are rejected", () => {
  const cases: Array<[string, string]> = [
    ["(TOP (NP* (NN a)))", "synthetic node 'NP*' has 1 child(ren), expected 2"],
    ["(TOP* (NN a) (NN b))", "root 'TOP*' is a synthetic node"],
    ["(TOP (A__B (NN a)))", "fused label 'A__B' has an empty component"],
    ["(TOP (NP (NN* a) (NN b)))", "leaf 'NN*' carries the synthetic marker"],
  ];
  for (const [input, message] of cases) {
    expect(() => debinarizeTree(parseTree(input))).toThrow(StructuralInvariantError);
    expect(() => debinarizeTree(parseTree(input))).toThrow(message);
  }
});
