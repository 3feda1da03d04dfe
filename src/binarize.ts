import { DEFAULT_CONFIG, RESERVED_MARKERS, type BinarizationDirection } from "./config";
import { StructuralInvariantError } from "./errors";
import { internal, leaf, type TreeNode } from "./tree_transforms";

export type BinarizeOptions = {
  topLabel?: string;
  direction?: BinarizationDirection;
  /** Labels cascaded to the right under the `heuristic` direction; every other label goes left. */
  rightBranchingLabels?: readonly string[];
};

export const RIGHT_BRANCHING_LABELS: readonly string[] = ["SQ"];

export const SYNTHETIC_SUFFIX = "*";
export const FUSION_SEPARATOR = "_";

function assertUnreserved(label: string): void {
  for (const marker of RESERVED_MARKERS) {
    if (label.includes(marker)) {
      throw new StructuralInvariantError(`label '${label}' contains reserved marker '${marker}'`);
    }
  }
}

// c1 (L* c2 (L* c3 ... ck))
function rightCascade(label: string, children: TreeNode[]): TreeNode[] {
  if (children.length <= 2) return children;
  return [...children.slice(0, 1), internal(`${label}${SYNTHETIC_SUFFIX}`, rightCascade(label, children.slice(1)))];
}

// (L* (L* c1 c2) ... ck-1) ck
function leftCascade(label: string, children: TreeNode[]): TreeNode[] {
  if (children.length <= 2) return children;
  return [internal(`${label}${SYNTHETIC_SUFFIX}`, leftCascade(label, children.slice(0, -1))), ...children.slice(-1)];
}

function collapseUnary(label: string, children: TreeNode[]): { label: string; children: TreeNode[] } {
  let fused = label;
  let current = children;
  for (;;) {
    const only = current.length === 1 ? current[0] : undefined;
    if (!only || only.kind !== "internal") break;
    fused = `${fused}${FUSION_SEPARATOR}${only.label}`;
    current = only.children;
  }
  return { label: fused, children: current };
}

/**
 * Rewrites a tree so every internal node has one or two children: unary
 * chains of internal nodes fuse into one `A_B_C` node and wider nodes become
 * a cascade of `L*` nodes, right-branching unless `direction` says
 * otherwise. Preterminals stay unary, and so does the root
 * wrapper carrying the top label.
 */
export function binarizeTree(tree: TreeNode, options: BinarizeOptions = {}): TreeNode {
  const topLabel = options.topLabel ?? DEFAULT_CONFIG.topLabel;
  const direction = options.direction ?? DEFAULT_CONFIG.direction;
  const rightBranching = new Set(options.rightBranchingLabels ?? RIGHT_BRANCHING_LABELS);
  const cascadeFor = (label: string) => {
    if (direction === "heuristic") return rightBranching.has(label) ? rightCascade : leftCascade;
    return direction === "left" ? leftCascade : rightCascade;
  };

  if (tree.label !== topLabel) {
    throw new StructuralInvariantError(`root label '${tree.label}' is not the top label '${topLabel}'`);
  }

  const visit = (node: TreeNode, isRoot: boolean): TreeNode => {
    assertUnreserved(node.label);
    if (node.kind === "leaf") return leaf(node.label, node.terminal);
    if (node.children.length === 0) throw new StructuralInvariantError(`internal node '${node.label}' has no children`);

    const children = node.children.map((child) => visit(child, false));
    if (isRoot && children.length === 1) return internal(node.label, children);

    const collapsed = collapseUnary(node.label, children);
    return internal(collapsed.label, cascadeFor(node.label)(collapsed.label, collapsed.children));
  };

  return visit(tree, true);
}

export function binarizeCorpus(trees: readonly TreeNode[], options: BinarizeOptions = {}): TreeNode[] {
  return trees.map((tree) => binarizeTree(tree, options));
}

/** True when every internal node has exactly one or two children. */
export function isBinaryTree(tree: TreeNode): boolean {
  if (tree.kind === "leaf") return true;
  if (tree.children.length < 1 || tree.children.length > 2) return false;
  return tree.children.every(isBinaryTree);
}
