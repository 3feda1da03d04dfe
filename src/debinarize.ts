import { FUSION_SEPARATOR, SYNTHETIC_SUFFIX } from "./binarize";
import { StructuralInvariantError } from "./errors";
import { internal, leaf, type TreeNode } from "./tree_transforms";

function unfuse(label: string, children: TreeNode[]): TreeNode {
  const labels = label.split(FUSION_SEPARATOR);
  if (labels.some((part) => part.length === 0)) {
    throw new StructuralInvariantError(`fused label '${label}' has an empty component`);
  }
  let node: TreeNode = internal(labels[labels.length - 1] ?? label, children);
  for (let i = labels.length - 2; i >= 0; i -= 1) node = internal(labels[i] ?? label, [node]);
  return node;
}

function expand(node: TreeNode): TreeNode[] {
  if (node.kind === "leaf") {
    if (node.label.endsWith(SYNTHETIC_SUFFIX)) {
      throw new StructuralInvariantError(`leaf '${node.label}' carries the synthetic marker`);
    }
    return [leaf(node.label, node.terminal)];
  }

  const children = node.children.flatMap(expand);
  if (node.label.endsWith(SYNTHETIC_SUFFIX)) {
    if (node.children.length < 2) {
      throw new StructuralInvariantError(`synthetic node '${node.label}' has ${node.children.length} child(ren), expected 2`);
    }
    return children;
  }
  if (children.length === 0) throw new StructuralInvariantError(`internal node '${node.label}' has no children`);
  return [unfuse(node.label, children)];
}

/**
 * Undoes {@link binarizeTree}: splices `L*` nodes into their parents and
 * re-expands `A_B_C` labels into unary chains.
 */
export function debinarizeTree(tree: TreeNode): TreeNode {
  if (tree.label.endsWith(SYNTHETIC_SUFFIX)) {
    throw new StructuralInvariantError(`root '${tree.label}' is a synthetic node`);
  }
  const [root, ...rest] = expand(tree);
  if (!root || rest.length > 0) throw new StructuralInvariantError("debinarization did not yield a single root");
  return root;
}

export function debinarizeCorpus(trees: readonly TreeNode[]): TreeNode[] {
  return trees.map(debinarizeTree);
}
